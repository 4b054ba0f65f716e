/**
 * Question Processor
 *
 * Final step of question mode: print the reply, write requested files
 * and record the exchange in the active chat.
 */

import chalk from 'chalk';
import type { Logger } from 'pino';
import type { ChatManager } from '../chat/manager.js';
import type { CompletionResult, Message } from '../core/types.js';
import type { OutputCoordinator, QuestionOutputOptions } from '../output/coordinator.js';

export interface QuestionResponseOptions extends QuestionOutputOptions {
  chatId?: string;
}

/**
 * Numbered list of the web sources cited in the reply, or null
 */
export function formatSources(result: CompletionResult): string | null {
  const urls = new Map<string, string>();
  for (const annotation of result.annotations ?? []) {
    const citation = annotation.url_citation;
    if (annotation.type === 'url_citation' && citation && !urls.has(citation.url)) {
      urls.set(citation.url, citation.title ?? citation.url);
    }
  }
  if (urls.size === 0) return null;
  const lines = Array.from(urls, ([url, title], i) => `${i + 1}. ${title === url ? url : `${title} - ${url}`}`);
  return `Sources:\n${lines.join('\n')}`;
}

export class QuestionProcessor {
  private coordinator: OutputCoordinator;
  private chatManager: ChatManager | undefined;
  private logger: Logger;

  constructor(coordinator: OutputCoordinator, logger: Logger, chatManager?: ChatManager) {
    this.coordinator = coordinator;
    this.logger = logger;
    this.chatManager = chatManager;
  }

  /**
   * Resolves with the files written
   */
  async processQuestionResponse(
    result: CompletionResult,
    messages: Message[],
    options: QuestionResponseOptions,
  ): Promise<string[]> {
    const { display, createdFiles } = await this.coordinator.processQuestionOutput(result.content, options);

    console.log(display);
    const sources = formatSources(result);
    if (sources) console.log(`\n${chalk.dim(sources)}`);
    for (const file of createdFiles) {
      console.log(chalk.green(`Response written to ${file}`));
    }

    if (options.chatId && this.chatManager) {
      await this.chatManager.storeConversation(options.chatId, messages, result.content);
      this.logger.debug({ chat_id: options.chatId }, 'Stored conversation');
    }
    return createdFiles;
  }
}
