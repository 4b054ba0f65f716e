/**
 * Interactive Chat
 *
 * Line-based chat loop on top of a persistent chat. Every exchange is
 * stored, so a session can be resumed later with -c <id>.
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { Logger } from 'pino';
import type { ChatManager } from '../chat/manager.js';
import type { AIService } from '../core/ai-service.js';
import { messageText } from '../core/content.js';
import { errorMessage } from '../core/errors.js';
import type { MessageBuilder } from '../core/message-builder.js';
import type { ResponseFormat } from '../core/types.js';
import { formatForConsole } from '../output/display.js';
import { formatError } from '../utils/console.js';

const COMMANDS = {
  '/help': 'Show available commands',
  '/history': 'Show this chat so far',
  '/new': 'Start a new chat',
  '/quit': 'Exit the chat',
  '/exit': 'Exit the chat',
};

export interface InteractiveChatOptions {
  chatManager: ChatManager;
  aiService: AIService;
  messageBuilder: MessageBuilder;
  logger: Logger;
  chatId: string;
  modelName?: string;
  format?: ResponseFormat;
  plainMd?: boolean;
}

export class InteractiveChat {
  private options: InteractiveChatOptions;
  private chatId: string;

  constructor(options: InteractiveChatOptions) {
    this.options = options;
    this.chatId = options.chatId;
  }

  get currentChatId(): string {
    return this.chatId;
  }

  /**
   * Read lines until /quit or end of input
   */
  async start(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout): Promise<void> {
    const rl = readline.createInterface({ input, output, prompt: '> ' });
    console.log(`Chat ${this.chatId} started. Type /help for commands, /quit to exit.\n`);

    rl.prompt();
    try {
      for await (const line of rl) {
        if (!(await this.handleLine(line))) break;
        rl.prompt();
      }
    } finally {
      rl.close();
      console.log('\nGoodbye!\n');
    }
  }

  /**
   * Handle one line of input. Resolves with false when the session should end.
   */
  async handleLine(input: string): Promise<boolean> {
    const trimmed = input.trim();
    if (!trimmed) return true;

    if (trimmed.startsWith('/')) {
      return this.handleCommand(trimmed);
    }
    await this.handleMessage(trimmed);
    return true;
  }

  /**
   * Handle slash commands
   */
  private async handleCommand(cmd: string): Promise<boolean> {
    switch (cmd) {
      case '/help':
        this.showHelp();
        return true;

      case '/history':
        await this.showHistory();
        return true;

      case '/new':
        this.chatId = await this.options.chatManager.createChat();
        console.log(`Started new chat ${this.chatId}\n`);
        return true;

      case '/quit':
      case '/exit':
        return false;

      default:
        console.log(`Unknown command: ${cmd}. Type /help for available commands.\n`);
        return true;
    }
  }

  /**
   * Send a message with the chat's history as context and store the exchange
   */
  private async handleMessage(text: string): Promise<void> {
    const { chatManager, aiService, messageBuilder, logger } = this.options;
    const format = this.options.format ?? 'rawtext';
    try {
      const built = await messageBuilder.buildQuestionMessages({ question: text, format });
      const context = await chatManager.buildContextMessages(this.chatId);
      const system = built.filter((m) => m.role === 'system');
      const user = built.filter((m) => m.role === 'user');
      const messages = [...system, ...context, ...user];

      const result = await aiService.getAIResponse(messages, { modelName: this.options.modelName });
      console.log(`\n${formatForConsole(result.content, format, this.options.plainMd)}\n`);
      await chatManager.storeConversation(this.chatId, messages, result.content);
    } catch (error) {
      logger.error({ err: error, chat_id: this.chatId }, 'Interactive message failed');
      console.error(`\n${formatError(errorMessage(error))}\n`);
    }
  }

  private showHelp(): void {
    console.log('\nAvailable Commands:');
    console.log('-------------------');
    Object.entries(COMMANDS).forEach(([cmd, desc]) => {
      console.log(`  ${cmd.padEnd(12)} ${desc}`);
    });
    console.log();
  }

  private async showHistory(): Promise<void> {
    const history = await this.options.chatManager.getChatHistory(this.chatId);
    if (history.length === 0) {
      console.log('No messages yet.\n');
      return;
    }

    console.log('\nConversation History:');
    console.log('---------------------');
    history.forEach((conversation, i) => {
      const user = conversation.messages.filter((m) => m.role === 'user').pop();
      const question = user ? messageText(user.content) : '';
      console.log(`  ${i + 1}. ${chalk.cyan('you')} ${question.slice(0, 50).replace(/\n/g, ' ')}`);
      console.log(`     ${chalk.green('ai')}  ${conversation.response.slice(0, 50).replace(/\n/g, ' ')}`);
    });
    console.log(`\n  Total: ${history.length} exchanges\n`);
  }
}
