/**
 * Helpers shared by the test files
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseConfig, resolvePaths, type AskAIConfig } from './config/index.js';
import { silentLogger } from './logging/logger.js';
import type { Prompter } from './utils/prompt.js';

export { silentLogger };

/**
 * Prompter that replays canned answers and records the questions
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected prompt: ${question}`);
    }
    return answer.trim();
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    const answer = (await this.ask(question)).toLowerCase();
    if (!answer) return defaultValue;
    return answer === 'y' || answer === 'yes';
  }

  close(): void {}

  get remaining(): number {
    return this.answers.length;
  }
}

export async function makeTempDir(prefix = 'askai-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Validated config rooted in `baseDir`
 */
export function makeConfig(baseDir: string, overrides: Record<string, unknown> = {}): AskAIConfig {
  const paths = resolvePaths({ ASKAI_HOME: baseDir });
  return parseConfig({ api_key: 'test-secret', enable_logging: false, ...overrides }, paths, {});
}
