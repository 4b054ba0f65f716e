import { describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../core/errors.js';
import { OpenRouterClient, type FetchFn } from '../core/llm.js';
import { silentLogger } from '../test-utils.js';
import type { ModelInfo } from '../core/types.js';
import { filterModels, formatCredits, formatModels, runOpenRouterCommand, truncateDescription } from './openrouter.js';

const MODELS: ModelInfo[] = [
  {
    id: 'vendor/alpha-large',
    name: 'Alpha Large',
    description: 'A large model.',
    context_length: 200000,
    pricing: { prompt: '0.000003', completion: '0.000015' },
    top_provider: { max_completion_tokens: 8192 },
  },
  { id: 'other/beta', name: 'Beta' },
];

describe('formatCredits', () => {
  it('shows the remaining balance', () => {
    expect(formatCredits({ total_credits: 10, total_usage: 2.5 })).toBe(
      [
        '',
        'OpenRouter Credit Balance:',
        '-'.repeat(40),
        'Total Credits:     $10.0000',
        'Total Usage:       $2.5000',
        'Remaining Credits: $7.5000',
        '-'.repeat(40),
      ].join('\n'),
    );
  });
});

describe('truncateDescription', () => {
  it('keeps short descriptions', () => {
    expect(truncateDescription('Short.')).toBe('Short.');
  });

  it('cuts at a late sentence end', () => {
    const text = `${'a'.repeat(160)}. ${'b'.repeat(100)}`;
    expect(truncateDescription(text)).toBe(`${'a'.repeat(160)}....`);
  });

  it('cuts at a late word boundary', () => {
    const text = `${'a'.repeat(170)} ${'b'.repeat(100)}`;
    expect(truncateDescription(text)).toBe(`${'a'.repeat(170)}...`);
  });

  it('cuts hard when there is no boundary', () => {
    expect(truncateDescription('x'.repeat(250))).toBe(`${'x'.repeat(200)}...`);
  });
});

describe('formatModels', () => {
  it('matches filters against id and name', () => {
    expect(filterModels(MODELS, ['BETA']).map((m) => m.id)).toEqual(['other/beta']);
    expect(filterModels(MODELS, ['vendor', 'beta'])).toHaveLength(2);
  });

  it('prints the details of each model', () => {
    const lines = formatModels(MODELS, ['alpha']).split('\n');
    expect(lines).toEqual([
      '',
      'Filtered OpenRouter Models (1 of 2 total, filter: alpha):',
      '='.repeat(100),
      'ID: vendor/alpha-large',
      'Name: Alpha Large',
      'Description: A large model.',
      'Context Length: 200,000',
      'Max Completion Tokens: 8,192',
      'Pricing: $0.00000300/token (prompt), $0.00001500/token (completion)',
      '-'.repeat(100),
    ]);
  });

  it('fills in missing details', () => {
    const lines = formatModels([MODELS[1]]).split('\n');
    expect(lines.slice(1, 9)).toEqual([
      'Available OpenRouter Models (1 total):',
      '='.repeat(100),
      'ID: other/beta',
      'Name: Beta',
      'Description: No description available',
      'Context Length: N/A',
      'Max Completion Tokens: N/A',
      'Pricing: $N/A/token (prompt), $N/A/token (completion)',
    ]);
  });

  it('says when nothing matches', () => {
    expect(formatModels(MODELS, ['gamma', 'delta'])).toBe('No models found matching filter(s): gamma, delta');
  });
});

describe('runOpenRouterCommand', () => {
  const fetchFn = vi.fn<FetchFn>();
  const client = new OpenRouterClient(
    { apiKey: 'test-secret', baseUrl: 'https://openrouter.test/api/v1/', defaultModel: 'default/model' },
    silentLogger(),
    fetchFn,
  );

  it('fetches and formats the credit balance', async () => {
    fetchFn.mockResolvedValueOnce(
      new Response(JSON.stringify({ data: { total_credits: 5, total_usage: 1 } }), { status: 200 }),
    );
    const text = await runOpenRouterCommand(client, silentLogger(), 'check-credits');
    expect(text).toContain('Remaining Credits: $4.0000');
    expect(fetchFn.mock.calls[0][0]).toBe('https://openrouter.test/api/v1/credits');
  });

  it('rejects unknown commands', async () => {
    await expect(runOpenRouterCommand(client, silentLogger(), 'top-up')).rejects.toThrow(
      new ValidationError("Invalid OpenRouter command 'top-up'. Valid commands: check-credits, list-models"),
    );
  });
});
