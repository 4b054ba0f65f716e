/**
 * Response normalization
 *
 * Reduces whatever came back from the model (a string or a response
 * object) to clean text.
 */

import { isRecord } from './common.js';

function contentOf(response: Record<string, unknown>): unknown {
  const choices = response.choices;
  if (Array.isArray(choices) && isRecord(choices[0]) && isRecord(choices[0].message)) {
    return choices[0].message.content;
  }
  if ('content' in response) return response.content;
  if ('result' in response) return response.result;
  if (isRecord(response.message)) return response.message.content;
  return undefined;
}

/**
 * Trim, unify line endings and drop trailing whitespace on every line
 */
export function cleanContent(content: string): string {
  return content
    .trim()
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n');
}

export function normalizeResponse(response: unknown): string {
  if (typeof response === 'string') return cleanContent(response);

  if (isRecord(response)) {
    const content = contentOf(response);
    if (typeof content === 'string') return cleanContent(content);
    if (content !== undefined && content !== null) return JSON.stringify(content, null, 2);
  }

  return cleanContent(JSON.stringify(response ?? '', null, 2));
}
