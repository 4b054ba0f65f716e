import { highlight } from 'cli-highlight';
import type { ResponseFormat } from '../core/types.js';

/**
 * Console rendering: markdown is highlighted unless `plain` is set
 */
export function formatForConsole(text: string, format: ResponseFormat, plain = false): string {
  if (format !== 'md' || plain) return text;
  return highlight(text, { language: 'markdown', ignoreIllegals: true });
}

/**
 * `NAME:\ncontent\n` blocks joined by blank lines
 */
export function formatDisplayBlocks(blocks: Array<[name: string, content: string]>): string {
  return blocks.map(([name, content]) => `${name.toUpperCase()}:\n${content}\n`).join('\n');
}
