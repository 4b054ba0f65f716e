/**
 * Structured data recovery
 *
 * Pulls a `{name: value}` map out of a model reply, whether the reply is
 * clean JSON, JSON with a broken `results` object, or prose with fenced
 * code blocks.
 */

import { captureAll, isRecord, stripCodeFences, tryParseJson, unescapeString } from './common.js';

export type StructuredData = Record<string, unknown>;

const CODE_BLOCK_LANGUAGES: Array<[key: string, labels: string[]]> = [
  ['html', ['html']],
  ['css', ['css']],
  ['javascript', ['javascript', 'js']],
  ['markdown', ['markdown', 'md']],
  ['sql', ['sql']],
  ['python', ['python', 'py']],
];

/**
 * Values that are themselves JSON documents are parsed in place
 */
function expandNestedJson(data: StructuredData): StructuredData {
  const expanded: StructuredData = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value === 'string' && /^\s*[{[]/.test(value)) {
      const parsed = tryParseJson(value);
      expanded[key] = parsed === undefined ? value : parsed;
    } else {
      expanded[key] = value;
    }
  }
  return expanded;
}

function fromJson(text: string): StructuredData | null {
  const parsed = tryParseJson(stripCodeFences(text));
  if (!isRecord(parsed)) return null;
  return expandNestedJson(isRecord(parsed.results) ? parsed.results : parsed);
}

/**
 * `"key": "value"` pairs after `"results": {`, for replies whose JSON
 * does not parse
 */
function fromMalformedResults(text: string): StructuredData | null {
  const start = text.search(/"results"\s*:\s*\{/);
  if (start === -1) return null;

  const data: StructuredData = {};
  const pairs = text.slice(start).matchAll(/"([^"\\]+)"\s*:\s*"((?:[^"\\]|\\.)*)"/g);
  for (const [, key, value] of pairs) {
    data[key] = unescapeString(value.replace(/\\"/g, '"'));
  }
  return Object.keys(data).length > 0 ? data : null;
}

function fromCodeBlocks(text: string): StructuredData | null {
  const data: StructuredData = {};
  for (const [key, labels] of CODE_BLOCK_LANGUAGES) {
    for (const label of labels) {
      const blocks = captureAll(text, new RegExp('```' + label + '[ \\t]*\\n([\\s\\S]*?)\\n?```', 'gi'));
      if (blocks.length > 0) {
        data[key] = blocks.map((block) => block.trim()).join('\n\n');
        break;
      }
    }
  }
  return Object.keys(data).length > 0 ? data : null;
}

/**
 * Structured data from the reply, or `{}` when nothing is recognised
 */
export function extractStructuredData(text: string): StructuredData {
  return fromJson(text) ?? fromMalformedResults(text) ?? fromCodeBlocks(text) ?? {};
}
