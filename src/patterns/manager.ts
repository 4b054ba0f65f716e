/**
 * Pattern Manager
 *
 * Finds pattern files in the built-in directory and the user's private
 * directory. Private patterns win over built-in ones with the same id.
 */

import { existsSync } from 'fs';
import { mkdir, readdir, readFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { Logger } from 'pino';
import type { Prompter } from '../utils/prompt.js';
import { PatternInputProcessor, type InputProcessingOptions } from './inputs.js';
import { parsePattern, parsePatternName } from './parser.js';
import type { PatternDefinition, PatternInputValues, PatternSource, PatternSummary } from './types.js';

export const BUILTIN_PATTERNS_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'patterns');

export interface PatternManagerConfig {
  builtinDir?: string;
  privateDir?: string | null;
}

export class PatternManager {
  private config: Required<PatternManagerConfig>;
  private logger: Logger;
  private inputProcessor: PatternInputProcessor;

  constructor(logger: Logger, config: PatternManagerConfig = {}) {
    this.config = {
      builtinDir: BUILTIN_PATTERNS_DIR,
      privateDir: null,
      ...config,
    };
    this.logger = logger;
    this.inputProcessor = new PatternInputProcessor(logger);
  }

  /**
   * Offer to create a configured private directory that does not exist yet
   */
  async preparePrivateDirectory(prompter?: Prompter): Promise<void> {
    const dir = this.config.privateDir;
    if (!dir || existsSync(dir)) return;

    if (!prompter) {
      this.logger.warn({ path: dir }, 'Private patterns directory does not exist');
      return;
    }

    console.log(`\nWarning: Private patterns directory does not exist: ${dir}`);
    if (await prompter.confirm(`Would you like to create the directory '${dir}'?`)) {
      await mkdir(dir, { recursive: true });
      console.log(`Created private patterns directory: ${dir}`);
      this.logger.info({ path: dir }, 'Created private patterns directory');
    } else {
      console.log('Continuing without private patterns directory.');
    }
  }

  /**
   * Private directory first, then built-in
   */
  private directories(): Array<{ dir: string; source: PatternSource }> {
    const dirs: Array<{ dir: string; source: PatternSource }> = [];
    if (this.config.privateDir) dirs.push({ dir: this.config.privateDir, source: 'private' });
    dirs.push({ dir: this.config.builtinDir, source: 'built-in' });
    return dirs;
  }

  async listPatterns(): Promise<PatternSummary[]> {
    const patterns: PatternSummary[] = [];
    const seen = new Set<string>();

    for (const { dir, source } of this.directories()) {
      if (!existsSync(dir)) continue;

      const files = (await readdir(dir)).filter((f) => f.endsWith('.md') && !f.startsWith('_')).sort();
      for (const file of files) {
        const id = basename(file, '.md');
        if (seen.has(id)) continue;

        const filePath = join(dir, file);
        try {
          const content = await readFile(filePath, 'utf-8');
          patterns.push({ id, name: parsePatternName(content), filePath, source });
          seen.add(id);
        } catch (error) {
          this.logger.warn({ path: filePath, error: String(error) }, 'Error reading pattern file');
        }
      }
    }

    return patterns.sort((a, b) => a.name.localeCompare(b.name));
  }

  private async locate(patternId: string): Promise<{ filePath: string; source: PatternSource } | null> {
    for (const { dir, source } of this.directories()) {
      const filePath = join(dir, `${patternId}.md`);
      if (existsSync(filePath)) return { filePath, source };
    }
    return null;
  }

  /**
   * Raw markdown of a pattern
   */
  async getPatternContent(patternId: string): Promise<string | null> {
    const found = await this.locate(patternId);
    return found ? readFile(found.filePath, 'utf-8') : null;
  }

  async getPattern(patternId: string): Promise<PatternDefinition | null> {
    const found = await this.locate(patternId);
    if (!found) return null;

    const content = await readFile(found.filePath, 'utf-8');
    const pattern = parsePattern(content, {
      id: patternId,
      name: parsePatternName(content),
      filePath: found.filePath,
      source: found.source,
    });
    this.logger.debug(
      { pattern_id: patternId, source: found.source, inputs: pattern.inputs.length, outputs: pattern.outputs.length },
      'Loaded pattern',
    );
    return pattern;
  }

  async processInputs(
    pattern: PatternDefinition,
    provided: Record<string, unknown> | undefined,
    options: InputProcessingOptions,
  ): Promise<PatternInputValues> {
    return this.inputProcessor.process(pattern, provided, options);
  }

  formatPatternList(patterns: PatternSummary[]): string {
    const rule = '-'.repeat(70);
    const lines = ['Available patterns:', rule];
    patterns.forEach((pattern, i) => {
      const marker = pattern.source === 'private' ? '[private]' : '[built-in]';
      lines.push(`${i + 1}. ${pattern.name} ${marker}`);
      lines.push(`   ID: ${pattern.id}`);
      lines.push(rule);
    });
    return lines.join('\n');
  }

  /**
   * Numbered menu; resolves with the chosen id or null for quit
   */
  async selectPattern(prompter: Prompter): Promise<string | null> {
    const patterns = await this.listPatterns();
    if (patterns.length === 0) {
      console.log('No pattern files found.');
      return null;
    }

    console.log(`\n${this.formatPatternList(patterns)}`);
    console.log(`\n1-${patterns.length}. Select pattern`);
    console.log('q. Quit');

    for (;;) {
      const choice = (await prompter.ask(`\nEnter your choice (1-${patterns.length} or q): `)).toLowerCase();
      if (choice === 'q') return null;
      const index = Number.parseInt(choice, 10);
      if (!Number.isNaN(index) && index >= 1 && index <= patterns.length) {
        return patterns[index - 1].id;
      }
      console.log(`Please enter a number between 1 and ${patterns.length}`);
    }
  }
}
