/**
 * Output Coordinator
 *
 * Decides what happens to a model reply: which parts are printed, which
 * are written to files and which commands are offered for execution.
 * File writes and trailing commands are held back until
 * executePendingOperations() so the display output comes first.
 */

import { join } from 'path';
import type { Logger } from 'pino';
import type { ResponseFormat } from '../core/types.js';
import { outputFileName, resolveOutputAction } from '../patterns/outputs.js';
import type { PatternOutput } from '../patterns/types.js';
import type { Prompter } from '../utils/prompt.js';
import { formatDisplayBlocks, formatForConsole } from './display.js';
import { isDirectoryTarget, resolveOutputDirectory } from './directory.js';
import { CommandExecutor } from './executor.js';
import { CssExtractor, HtmlExtractor, JsExtractor, JsonExtractor } from './extractors/index.js';
import { normalizeResponse } from './normalizer.js';
import { PatternProcessor } from './pattern-processor.js';
import { extractStructuredData } from './structured.js';
import { FileWriterChain } from './writers.js';

export const NO_PATTERN_CONTENT = 'No pattern content found';
export const NO_DISPLAY_CONTENT = 'No display content found for any pattern outputs';

const FORMAT_EXTENSIONS: Record<ResponseFormat, string> = {
  rawtext: '.txt',
  md: '.md',
  json: '.json',
};

export interface OutputCoordinatorOptions {
  prompter?: Prompter;
  /** Skip the directory question and write pattern files here */
  outputDir?: string;
  executor?: CommandExecutor;
  writer?: FileWriterChain;
}

export interface QuestionOutputOptions {
  format: ResponseFormat;
  outputFile?: string;
  plainMd?: boolean;
}

export interface QuestionOutput {
  display: string;
  createdFiles: string[];
}

interface PendingItem {
  output: PatternOutput;
  content: string;
}

export class OutputCoordinator {
  private logger: Logger;
  private prompter: Prompter | undefined;
  private outputDir: string | undefined;
  private executor: CommandExecutor;
  private writer: FileWriterChain;
  private processor: PatternProcessor;
  private pendingCommands: PendingItem[] = [];
  private pendingWrites: PendingItem[] = [];

  constructor(logger: Logger, options: OutputCoordinatorOptions = {}) {
    this.logger = logger;
    this.prompter = options.prompter;
    this.outputDir = options.outputDir;
    this.executor = options.executor ?? new CommandExecutor(logger, options.prompter);
    this.writer = options.writer ?? new FileWriterChain(logger);
    this.processor = new PatternProcessor(logger);
  }

  get hasPendingOperations(): boolean {
    return this.pendingCommands.length > 0 || this.pendingWrites.length > 0;
  }

  // ========================================================================
  // Pattern mode
  // ========================================================================

  /**
   * Text to print for the pattern's display outputs, in definition order.
   * Execute outputs followed by displayed content run right away; the
   * rest wait, together with the file writes.
   */
  async processPatternOutput(response: unknown, outputs: PatternOutput[]): Promise<string> {
    const text = normalizeResponse(response);
    const contents = this.processor.extractPatternContents(text, outputs);
    if (Object.keys(contents).length === 0) {
      this.logger.warn({ outputs: outputs.map((o) => o.name) }, NO_PATTERN_CONTENT);
      return NO_PATTERN_CONTENT;
    }

    const blocks: Array<[string, string]> = [];
    for (const [index, output] of outputs.entries()) {
      const content = contents[output.name];
      if (!content) continue;

      switch (resolveOutputAction(output)) {
        case 'display':
          blocks.push([output.name, content]);
          break;
        case 'write':
          this.pendingWrites.push({ output, content });
          break;
        case 'execute': {
          const displayFollows = outputs
            .slice(index + 1)
            .some((later) => resolveOutputAction(later) === 'display' && Boolean(contents[later.name]));
          if (displayFollows) {
            await this.executor.execute(content, output.name);
          } else {
            this.pendingCommands.push({ output, content });
          }
          break;
        }
        case 'none':
          break;
      }
    }

    if (blocks.length === 0) return NO_DISPLAY_CONTENT;
    return formatDisplayBlocks(blocks);
  }

  /**
   * Run deferred commands, then write deferred files. Resolves with the
   * paths of the files written.
   */
  async executePendingOperations(): Promise<string[]> {
    const commands = this.pendingCommands;
    const writes = this.pendingWrites;
    this.pendingCommands = [];
    this.pendingWrites = [];

    for (const { output, content } of commands) {
      await this.executor.execute(content, output.name);
    }
    if (writes.length === 0) return [];

    const directory = await resolveOutputDirectory(this.prompter, this.outputDir);
    const cssFile = writes.find((w) => w.output.type === 'css');
    const jsFile = writes.find((w) => w.output.type === 'js');
    const linkOptions = {
      cssPath: cssFile ? outputFileName(cssFile.output) : undefined,
      jsPath: jsFile ? outputFileName(jsFile.output) : undefined,
    };

    const created: string[] = [];
    for (const { output, content } of writes) {
      const filePath = join(directory, outputFileName(output));
      await this.writer.writeByExtension(content, filePath, linkOptions);
      created.push(filePath);
    }
    return created;
  }

  // ========================================================================
  // Question mode
  // ========================================================================

  async processQuestionOutput(response: unknown, options: QuestionOutputOptions): Promise<QuestionOutput> {
    const text = normalizeResponse(response);
    const createdFiles: string[] = [];

    if (options.outputFile) {
      if (isDirectoryTarget(options.outputFile)) {
        createdFiles.push(...(await this.writeWebFiles(text, options.outputFile, options.format)));
      } else {
        const content = options.format === 'json' ? this.jsonContent(text) : text;
        await this.writer.writeByExtension(content, options.outputFile);
        createdFiles.push(options.outputFile);
      }
    }

    return { display: formatForConsole(text, options.format, options.plainMd), createdFiles };
  }

  /**
   * Structured data as indented JSON, else the first JSON value in the
   * text, else the text itself
   */
  private jsonContent(text: string): string {
    const structured = extractStructuredData(text);
    if (Object.keys(structured).length > 0) return JSON.stringify(structured, null, 2);
    const value = new JsonExtractor().extract(text);
    return value === null ? text : JSON.stringify(value, null, 2);
  }

  /**
   * index.html, styles.css and script.js from whatever web content the
   * reply holds; a plain response file when it holds none
   */
  private async writeWebFiles(text: string, directory: string, format: ResponseFormat): Promise<string[]> {
    const dir = await resolveOutputDirectory(undefined, directory);
    const css = new CssExtractor().extract(text);
    const js = new JsExtractor().extract(text);
    const files: Array<[string, string | null]> = [
      ['index.html', new HtmlExtractor().extract(text)],
      ['styles.css', css],
      ['script.js', js],
    ];
    const linkOptions = { cssPath: css ? 'styles.css' : undefined, jsPath: js ? 'script.js' : undefined };

    const created: string[] = [];
    for (const [name, content] of files) {
      if (!content) continue;
      const filePath = join(dir, name);
      await this.writer.writeByExtension(content, filePath, linkOptions);
      created.push(filePath);
    }
    if (created.length === 0) {
      const filePath = join(dir, `response${FORMAT_EXTENSIONS[format]}`);
      await this.writer.writeByExtension(format === 'json' ? this.jsonContent(text) : text, filePath);
      created.push(filePath);
    }
    return created;
  }
}
