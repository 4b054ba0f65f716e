/**
 * Command line definition
 */

import { Command, Option } from 'commander';
import type { ResponseFormat } from '../core/types.js';

export type CliOptions = {
  question?: string;
  fileInput?: string;
  url?: string;
  image?: string;
  imageUrl?: string;
  pdf?: string;
  pdfUrl?: string;
  output?: string;
  format: ResponseFormat;
  plainMd?: boolean;
  model?: string;
  /** `true` when given without an id */
  persistentChat?: string | true;
  listChats?: boolean;
  viewChat?: string | true;
  manageChats?: boolean;
  usePattern?: string | true;
  listPatterns?: boolean;
  viewPattern?: string | true;
  patternInput?: string;
  interactive?: boolean;
  openrouter?: string[];
  config?: string | true;
  debug?: boolean;
};

export function buildProgram(version: string): Command {
  const program = new Command();

  program
    .name('askai')
    .description('AskAI - AI assistant for your terminal')
    .version(`AskAI CLI ${version}`, '-V, --version')
    .showHelpAfterError();

  program
    .option('-q, --question <text>', 'your question for the AI')
    .option('--file-input <path>', 'file to include as context')
    .option('--url <url>', 'URL to analyze or summarize along with your question')
    .option('--image <path>', 'image file to analyze (jpg, png, webp, ...)')
    .option('--image-url <url>', 'image URL to analyze')
    .option('--pdf <path>', 'PDF file to analyze')
    .option('--pdf-url <url>', 'PDF URL to analyze')
    .option('-o, --output <file>', 'write the result to a file (a directory gets index.html, styles.css, script.js)')
    .addOption(
      new Option('-f, --format <format>', 'response format')
        .choices(['rawtext', 'json', 'md'])
        .default('rawtext'),
    )
    .option('--plain-md', 'with -f md, print markdown without highlighting')
    .option('-m, --model <model>', 'override the default model');

  program
    .option('-c, --persistent-chat [id]', 'continue a chat by id, "n" for a new one, or choose one')
    .option('--list-chats', 'list saved chats')
    .option('--view-chat [id]', 'show a chat, or choose one')
    .option('--manage-chats', 'repair or delete chat files');

  program
    .option('-p, --use-pattern [id]', 'run a pattern, or choose one')
    .option('--list-patterns', 'list available patterns')
    .option('--view-pattern [id]', 'show a pattern file, or choose one')
    .option('--pattern-input <json>', 'pattern input values as a JSON object');

  program
    .option('-i, --interactive', 'line-based chat session')
    .option('--openrouter <command...>', 'OpenRouter commands: check-credits, list-models [filter...]')
    .option('--config [action]', 'create-test-config, show-config-path or show-structure')
    .option('--debug', 'debug logging for this run');

  return program;
}
