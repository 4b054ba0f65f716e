import type { OutputAction, OutputType, PatternOutput } from './types.js';

const EXTENSIONS: Record<OutputType, string> = {
  html: '.html',
  css: '.css',
  js: '.js',
  json: '.json',
  markdown: '.md',
  table: '.csv',
  code: '.txt',
  command: '.txt',
  text: '.txt',
  list: '.txt',
};

export function fileExtensionFor(type: OutputType): string {
  return EXTENSIONS[type];
}

export function shouldWriteToFile(output: PatternOutput): boolean {
  return Boolean(output.write_to_file && output.write_to_file.trim());
}

export function shouldPromptForExecution(output: PatternOutput): boolean {
  return (output.type === 'code' || output.type === 'command') && output.auto_run;
}

/**
 * Explicit action, else inferred from write_to_file / auto_run
 */
export function resolveOutputAction(output: PatternOutput): OutputAction {
  if (output.action) return output.action;
  if (shouldWriteToFile(output)) return 'write';
  if (shouldPromptForExecution(output)) return 'execute';
  return 'display';
}

/**
 * Target file name for a write output, with the type's extension added when missing
 */
export function outputFileName(output: PatternOutput): string {
  const name = output.write_to_file?.trim() || output.name;
  const extension = fileExtensionFor(output.type);
  return /\.[A-Za-z0-9]+$/.test(name) ? name : `${name}${extension}`;
}
