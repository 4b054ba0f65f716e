import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ChatManager } from '../chat/manager.js';
import { AIService } from '../core/ai-service.js';
import { OpenRouterClient, type FetchFn } from '../core/llm.js';
import { MessageBuilder } from '../core/message-builder.js';
import { makeConfig, makeTempDir, removeTempDir, silentLogger } from '../test-utils.js';
import { InteractiveChat } from './interactive.js';

function reply(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status: 200 });
}

describe('InteractiveChat', () => {
  let dir: string;
  let fetchFn: Mock<FetchFn>;
  let chatManager: ChatManager;
  let chat: InteractiveChat;
  let log: Mock<(...args: unknown[]) => void>;

  beforeEach(async () => {
    dir = await makeTempDir();
    const logger = silentLogger();
    const config = makeConfig(dir);
    fetchFn = vi.fn<FetchFn>();
    const client = new OpenRouterClient(
      { apiKey: config.api_key, baseUrl: config.base_url, defaultModel: config.default_model },
      logger,
      fetchFn,
    );
    chatManager = new ChatManager({ storageDir: config.chat.storage_path }, logger);
    const chatId = await chatManager.createChat();
    chat = new InteractiveChat({
      chatManager,
      aiService: new AIService(config, client, logger, { spinner: false }),
      messageBuilder: new MessageBuilder(logger),
      logger,
      chatId,
    });
    log = vi.fn();
    vi.spyOn(console, 'log').mockImplementation(log);
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('stores each exchange and replays it as context', async () => {
    fetchFn.mockResolvedValueOnce(reply('Hello!')).mockResolvedValueOnce(reply('You said hi.'));

    expect(await chat.handleLine('hi')).toBe(true);
    expect(await chat.handleLine('What did I say?')).toBe(true);

    expect(log).toHaveBeenCalledWith('\nHello!\n');
    const body: unknown = JSON.parse(String(fetchFn.mock.calls[1][1]?.body));
    expect(body).toMatchObject({
      messages: [
        { role: 'system', content: 'Please provide your response as plain text.' },
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'Hello!' },
        { role: 'user', content: 'What did I say?' },
      ],
    });
    expect(await chatManager.getChatHistory(chat.currentChatId)).toHaveLength(2);
  });

  it('keeps going when a request fails', async () => {
    fetchFn.mockResolvedValueOnce(new Response('overloaded', { status: 503 }));

    expect(await chat.handleLine('hi')).toBe(true);

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(await chatManager.getChatHistory(chat.currentChatId)).toEqual([]);
  });

  it('handles slash commands', async () => {
    const first = chat.currentChatId;

    expect(await chat.handleLine('   ')).toBe(true);
    expect(await chat.handleLine('/history')).toBe(true);
    expect(log).toHaveBeenCalledWith('No messages yet.\n');
    expect(await chat.handleLine('/bogus')).toBe(true);
    expect(log).toHaveBeenCalledWith('Unknown command: /bogus. Type /help for available commands.\n');

    expect(await chat.handleLine('/new')).toBe(true);
    expect(chat.currentChatId).not.toBe(first);

    expect(await chat.handleLine('/quit')).toBe(false);
    expect(await chat.handleLine('/exit')).toBe(false);
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
