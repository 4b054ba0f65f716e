import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it, vi } from 'vitest';
import { makeConfig, silentLogger } from '../test-utils.js';
import { AIService } from './ai-service.js';
import { OpenRouterClient, type FetchFn } from './llm.js';
import type { Message } from './types.js';

const BASE_DIR = join(tmpdir(), 'askai-ai-service');

function service(overrides: Record<string, unknown> = {}) {
  const config = makeConfig(BASE_DIR, overrides);
  const client = new OpenRouterClient(
    { apiKey: config.api_key, baseUrl: config.base_url, defaultModel: config.default_model },
    silentLogger(),
    vi.fn<FetchFn>(),
  );
  return { client, ai: new AIService(config, client, silentLogger(), { spinner: false }) };
}

describe('AIService.resolveModel', () => {
  const { ai } = service({ default_model: 'default/model' });

  it('falls back to the configured default, which may be swapped', () => {
    expect(ai.resolveModel({})).toEqual({ source: 'default', explicit: false, config: { name: 'default/model' } });
  });

  it('prefers the command line model', () => {
    expect(ai.resolveModel({ modelName: 'cli/model' })).toEqual({
      source: 'cli',
      explicit: true,
      config: { name: 'cli/model' },
    });
  });

  it('prefers the pattern model over the command line', () => {
    const resolved = ai.resolveModel({
      modelName: 'cli/model',
      patternModel: { name: 'pattern/model', temperature: 0.1 },
    });
    expect(resolved.source).toBe('pattern');
    expect(resolved.config).toEqual({ name: 'pattern/model', temperature: 0.1 });
  });

  it('applies pattern sampling settings to other models', () => {
    expect(ai.resolveModel({ modelName: 'cli/model', patternModel: { max_tokens: 500 } }).config).toEqual({
      name: 'cli/model',
      max_tokens: 500,
    });
  });
});

describe('AIService.resolveWebSearch', () => {
  it('is off unless enabled or a URL is given', () => {
    const { ai } = service();
    expect(ai.resolveWebSearch({})).toEqual({});
    expect(ai.resolveWebSearch({ url: 'https://example.com' })).toEqual({ plugin: { id: 'web', max_results: 5 } });
  });

  it('uses web_search_options when configured', () => {
    const { ai } = service({ web_search: { enabled: true, method: 'options', context_size: 'high' } });
    expect(ai.resolveWebSearch({})).toEqual({ options: { search_context_size: 'high' } });
  });

  it('prefers the pattern web plugin', () => {
    const { ai } = service({ web_search: { enabled: true, search_prompt: 'Sources:' } });
    expect(ai.resolveWebSearch({ patternModel: { web_plugin: { max_results: 2 } } })).toEqual({
      plugin: { id: 'web', max_results: 2 },
    });
    expect(ai.resolveWebSearch({})).toEqual({ plugin: { id: 'web', max_results: 5, search_prompt: 'Sources:' } });
  });
});

describe('AIService.getAIResponse', () => {
  it('passes the resolved model and web settings to the client', async () => {
    const { ai, client } = service();
    const request = vi
      .spyOn(client, 'requestCompletion')
      .mockResolvedValue({ content: 'ok', annotations: [], raw: {} });
    const messages: Message[] = [{ role: 'user', content: 'Hi' }];

    const result = await ai.getAIResponse(messages, { modelName: 'cli/model', url: 'https://example.com' });

    expect(result.content).toBe('ok');
    const [sent, modelConfig, options] = request.mock.calls[0];
    expect(sent).toBe(messages);
    expect(modelConfig).toEqual({ name: 'cli/model' });
    expect(options).toEqual({ explicitModel: true, plugins: [{ id: 'web', max_results: 5 }] });
  });

  it('propagates client errors', async () => {
    const { ai, client } = service();
    vi.spyOn(client, 'requestCompletion').mockRejectedValue(new Error('down'));
    await expect(ai.getAIResponse([{ role: 'user', content: 'Hi' }])).rejects.toThrow('down');
  });
});
