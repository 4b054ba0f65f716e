/**
 * Terminal prompts
 *
 * Everything that asks the user a question goes through a Prompter.
 */

import { createInterface, type Interface } from 'readline/promises';

export interface Prompter {
  /** Ask a question and resolve with the trimmed answer */
  ask(question: string): Promise<string>;
  /** Ask a yes/no question; an empty answer gives `defaultValue` */
  confirm(question: string, defaultValue?: boolean): Promise<boolean>;
  close(): void;
}

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY);
}

export class ReadlinePrompter implements Prompter {
  private rl: Interface | undefined;

  async ask(question: string): Promise<string> {
    if (!this.rl) {
      this.rl = createInterface({ input: process.stdin, output: process.stdout });
    }
    const answer = await this.rl.question(question);
    return answer.trim();
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    const hint = defaultValue ? '[Y/n]' : '[y/N]';
    const answer = (await this.ask(`${question} ${hint}: `)).toLowerCase();
    if (!answer) return defaultValue;
    return answer === 'y' || answer === 'yes';
  }

  close(): void {
    this.rl?.close();
    this.rl = undefined;
  }
}
