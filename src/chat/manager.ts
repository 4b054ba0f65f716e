/**
 * Chat Manager
 *
 * Persistent chats stored as one JSON file per chat. Each run of a
 * question appends a conversation; recent conversations are replayed as
 * context on the next run.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { mkdir, writeFile, readFile, unlink, readdir, copyFile } from 'fs/promises';
import { join } from 'path';
import { existsSync } from 'fs';
import type { Logger } from 'pino';
import { ChatError } from '../core/errors.js';
import { messageText, stripInlineData } from '../core/content.js';
import type { Message } from '../core/types.js';
import type { PatternOutput } from '../patterns/types.js';
import type { Prompter } from '../utils/prompt.js';
import {
  chatFileSchema,
  type ChatEventHandler,
  type ChatEventName,
  type ChatEvents,
  type ChatFile,
  type ChatManagerConfig,
  type ChatSummary,
  type Conversation,
  type OutputRecord,
  type PersistentChatResult,
} from './types.js';

export class ChatManager extends EventEmitter {
  private config: Required<ChatManagerConfig>;
  private logger: Logger;

  constructor(config: ChatManagerConfig, logger: Logger) {
    super();
    this.config = {
      maxHistory: 10,
      ...config,
    };
    this.logger = logger;
  }

  /**
   * Make sure the storage directory exists
   */
  async init(): Promise<void> {
    await mkdir(this.config.storageDir, { recursive: true });
  }

  get storageDir(): string {
    return this.config.storageDir;
  }

  chatPath(chatId: string): string {
    return join(this.config.storageDir, `${chatId}.json`);
  }

  // ========================================================================
  // Chat Lifecycle
  // ========================================================================

  async createChat(): Promise<string> {
    await this.init();
    const chatId = randomUUID().slice(0, 8);
    const chat: ChatFile = {
      chat_id: chatId,
      created_at: new Date().toISOString(),
      conversations: [],
    };
    await this.saveChat(chat);
    this.logger.info({ chat_id: chatId }, 'Created chat');
    this.emit('chat:created', { chatId });
    return chatId;
  }

  async loadChat(chatId: string): Promise<ChatFile> {
    const filePath = this.chatPath(chatId);
    if (!existsSync(filePath)) {
      throw new ChatError(`Chat ${chatId} does not exist`);
    }

    let data: unknown;
    try {
      data = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
      this.logger.error({ chat_id: chatId, error: String(error) }, 'Corrupted chat file');
      throw new ChatError(`Chat file ${chatId} is corrupted: ${String(error)}`);
    }

    const parsed = chatFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new ChatError(`Chat file ${chatId} is corrupted: ${parsed.error.issues[0]?.message ?? 'invalid format'}`);
    }
    return parsed.data;
  }

  private async saveChat(chat: ChatFile): Promise<void> {
    await writeFile(this.chatPath(chat.chat_id), JSON.stringify(chat, null, 2));
  }

  async deleteChat(chatId: string): Promise<void> {
    const filePath = this.chatPath(chatId);
    if (!existsSync(filePath)) {
      throw new ChatError(`Chat ${chatId} does not exist`);
    }
    await unlink(filePath);
    this.logger.info({ chat_id: chatId }, 'Deleted chat');
    this.emit('chat:deleted', { chatId });
  }

  // ========================================================================
  // Conversations
  // ========================================================================

  /**
   * Append a conversation. Only system messages and the last user
   * message are kept.
   */
  async addConversation(
    chatId: string,
    messages: Message[],
    response: string,
    outputs?: OutputRecord[],
  ): Promise<void> {
    const chat = await this.loadChat(chatId);

    const kept: Message[] = messages.filter((m) => m.role === 'system');
    const lastUser = messages.filter((m) => m.role === 'user').pop();
    if (lastUser) kept.push(lastUser);

    const conversation: Conversation = {
      timestamp: new Date().toISOString(),
      messages: kept.map((m) => ({ role: m.role, content: stripInlineData(m.content) })),
      response,
    };
    if (outputs && outputs.length > 0) conversation.outputs = outputs;

    chat.conversations.push(conversation);
    await this.saveChat(chat);
    this.emit('conversation:added', { chatId, conversationCount: chat.conversations.length });
  }

  /**
   * Record a finished exchange, with the pattern's output definitions when there are any
   */
  async storeConversation(
    chatId: string,
    messages: Message[],
    response: string,
    patternOutputs?: PatternOutput[],
  ): Promise<void> {
    const outputs = patternOutputs?.map((o) => ({ name: o.name, type: o.type, definition: o.description || null }));
    await this.addConversation(chatId, messages, response, outputs);
  }

  async getChatHistory(chatId: string, maxConversations?: number): Promise<Conversation[]> {
    const chat = await this.loadChat(chatId);
    return maxConversations ? chat.conversations.slice(-maxConversations) : chat.conversations;
  }

  /**
   * Recent conversations as user/assistant pairs
   */
  async buildContextMessages(chatId: string): Promise<Message[]> {
    const context: Message[] = [];
    if (this.config.maxHistory === 0) return context;

    for (const conversation of await this.getChatHistory(chatId, this.config.maxHistory)) {
      const user = conversation.messages.filter((m) => m.role === 'user').pop();
      if (!user) continue;
      context.push({ role: 'user', content: user.content });
      context.push({ role: 'assistant', content: conversation.response });
    }
    return context;
  }

  // ========================================================================
  // Queries
  // ========================================================================

  /**
   * Valid chats, newest first. Unreadable files are skipped.
   */
  async listChats(): Promise<ChatSummary[]> {
    if (!existsSync(this.config.storageDir)) return [];

    const chats: ChatSummary[] = [];
    let corrupted = 0;
    for (const file of (await readdir(this.config.storageDir)).filter((f) => f.endsWith('.json'))) {
      try {
        const chat = await this.loadChat(file.slice(0, -'.json'.length));
        chats.push({
          chatId: chat.chat_id,
          createdAt: chat.created_at,
          conversationCount: chat.conversations.length,
        });
      } catch (error) {
        if (!(error instanceof ChatError)) throw error;
        corrupted++;
      }
    }

    if (corrupted > 0) {
      this.logger.warn({ count: corrupted }, 'Found corrupted chat files');
    }
    return chats.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  /**
   * Ids of chat files that cannot be read
   */
  async scanCorruptedChats(): Promise<string[]> {
    if (!existsSync(this.config.storageDir)) return [];

    const corrupted: string[] = [];
    for (const file of (await readdir(this.config.storageDir)).filter((f) => f.endsWith('.json'))) {
      const chatId = file.slice(0, -'.json'.length);
      try {
        await this.loadChat(chatId);
      } catch (error) {
        if (!(error instanceof ChatError)) throw error;
        corrupted.push(chatId);
      }
    }
    return corrupted.sort();
  }

  /**
   * Back the file up as <id>.json.bak and reset it to an empty chat
   */
  async repairChat(chatId: string): Promise<string> {
    const filePath = this.chatPath(chatId);
    if (!existsSync(filePath)) {
      throw new ChatError(`Chat ${chatId} does not exist`);
    }

    const backupPath = `${filePath}.bak`;
    await copyFile(filePath, backupPath);
    await this.saveChat({ chat_id: chatId, created_at: new Date().toISOString(), conversations: [] });

    this.logger.info({ chat_id: chatId, backup: backupPath }, 'Repaired chat file');
    this.emit('chat:repaired', { chatId, backupPath });
    return backupPath;
  }

  formatChatList(chats: ChatSummary[]): string {
    const rule = '-'.repeat(60);
    const lines = ['Available chats:', rule];
    chats.forEach((chat, i) => {
      lines.push(`${i + 1}. Chat ID: ${chat.chatId}`);
      lines.push(`   Created: ${chat.createdAt}`);
      lines.push(`   Messages: ${chat.conversationCount}`);
      lines.push(rule);
    });
    return lines.join('\n');
  }

  async formatChat(chatId: string): Promise<string> {
    const chat = await this.loadChat(chatId);
    const lines = [`Chat ID: ${chat.chat_id}`, `Created: ${chat.created_at}`, ''];

    chat.conversations.forEach((conversation, i) => {
      lines.push(`Conversation ${i + 1} - ${conversation.timestamp}`);
      lines.push('-'.repeat(50));
      for (const message of conversation.messages) {
        if (message.role === 'user') lines.push(`User: ${messageText(message.content)}`);
      }
      lines.push('');
      lines.push(`Assistant: ${conversation.response}`);
      lines.push('='.repeat(50));
      lines.push('');
    });
    return lines.join('\n');
  }

  // ========================================================================
  // Interactive selection
  // ========================================================================

  /**
   * Numbered chat menu. Resolves with a chat id, 'new' for option 0, or
   * null when the user quits.
   */
  async selectChat(prompter: Prompter, allowNew = true): Promise<string | null> {
    const chats = await this.listChats();
    if (chats.length === 0) {
      console.log('\nNo valid chat files found.');
      const corrupted = await this.scanCorruptedChats();
      if (corrupted.length > 0) {
        console.log(`WARNING: Found ${corrupted.length} potentially corrupted chat files.`);
        console.log('Run with --manage-chats to repair or delete them.');
      }
      if (!allowNew) return null;
      return (await prompter.confirm('Create a new chat?', true)) ? 'new' : null;
    }

    console.log(`\n${this.formatChatList(chats)}`);
    console.log('\nOptions:');
    if (allowNew) console.log('0. Create new chat');
    console.log(`1-${chats.length}. Select existing chat`);
    console.log('q. Quit');

    const min = allowNew ? 0 : 1;
    for (;;) {
      const choice = (await prompter.ask(`\nEnter your choice (${min}-${chats.length} or q): `)).toLowerCase();
      if (choice === 'q') return null;
      const index = Number.parseInt(choice, 10);
      if (allowNew && index === 0) return 'new';
      if (!Number.isNaN(index) && index >= 1 && index <= chats.length) {
        return chats[index - 1].chatId;
      }
      console.log(`Please enter a number between ${min} and ${chats.length}`);
    }
  }

  /**
   * Resolve the chat reference from the command line and put its history
   * between the system messages and the new user message.
   *
   * `n` always creates a chat, `new` opens the selection menu, anything
   * else is a chat id. Resolves with null when the selection is cancelled.
   */
  async handlePersistentChat(
    chatRef: string,
    messages: Message[],
    prompter?: Prompter,
  ): Promise<PersistentChatResult | null> {
    let chatId: string;
    if (chatRef === 'n') {
      chatId = await this.createChat();
      console.log(`\nCreated new chat with ID: ${chatId}`);
    } else if (chatRef === 'new') {
      if (!prompter) {
        throw new ChatError('Choosing a chat needs an interactive terminal; pass a chat id or "n"');
      }
      const selected = await this.selectChat(prompter);
      if (selected === null) return null;
      if (selected === 'new') {
        chatId = await this.createChat();
        console.log(`\nCreated new chat with ID: ${chatId}`);
      } else {
        chatId = selected;
      }
    } else {
      chatId = chatRef;
    }

    const context = await this.buildContextMessages(chatId);
    const system = messages.filter((m) => m.role === 'system');
    const user = messages.filter((m) => m.role === 'user');
    console.log(`\nContinuing chat: ${chatId}`);
    return { chatId, messages: [...system, ...context, ...user] };
  }

  /**
   * Repair or delete corrupted chats, or delete any chat
   */
  async manageChats(prompter: Prompter): Promise<void> {
    for (;;) {
      const corrupted = await this.scanCorruptedChats();
      const chats = await this.listChats();

      console.log('\nChat management');
      console.log('-'.repeat(60));
      console.log(`Valid chats: ${chats.length}`);
      console.log(`Corrupted chats: ${corrupted.length}${corrupted.length ? ` (${corrupted.join(', ')})` : ''}`);
      console.log('\n1. Repair corrupted chats');
      console.log('2. Delete corrupted chats');
      console.log('3. Delete a chat');
      console.log('q. Quit');

      const choice = (await prompter.ask('\nEnter your choice: ')).toLowerCase();
      if (choice === 'q' || choice === '') return;

      if (choice === '1') {
        for (const chatId of corrupted) {
          const backup = await this.repairChat(chatId);
          console.log(`Repaired ${chatId} (backup: ${backup})`);
        }
        if (corrupted.length === 0) console.log('No corrupted chats found.');
      } else if (choice === '2') {
        for (const chatId of corrupted) {
          if (await prompter.confirm(`Delete corrupted chat ${chatId}?`)) {
            await this.deleteChat(chatId);
            console.log(`Deleted ${chatId}`);
          }
        }
        if (corrupted.length === 0) console.log('No corrupted chats found.');
      } else if (choice === '3') {
        const selected = await this.selectChat(prompter, false);
        if (selected && (await prompter.confirm(`Delete chat ${selected}?`))) {
          await this.deleteChat(selected);
          console.log(`Deleted ${selected}`);
        }
      } else {
        console.log('Please enter 1, 2, 3 or q');
      }
    }
  }

  /**
   * Typed event emitter methods
   */
  on<T extends ChatEventName>(event: T, handler: ChatEventHandler<T>): this {
    return super.on(event, handler);
  }

  emit<T extends ChatEventName>(event: T, payload: ChatEvents[T]): boolean {
    return super.emit(event, payload);
  }
}
