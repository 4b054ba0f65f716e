/**
 * Content extractors
 *
 * Each extractor tries a list of strategies in order and returns the
 * first candidate that is long enough. Nothing here throws on bad input:
 * a failed strategy falls through to the next one.
 */

import {
  captureAll,
  escapeRegExp,
  findJsonObjects,
  findLargestMatch,
  isRecord,
  tryParseJson,
  unescapeString,
} from '../common.js';

/** Minimum length of an accepted candidate */
export const MIN_CONTENT_LENGTH = 50;
/** Minimum length of a fenced block */
export const MIN_CODE_BLOCK_LENGTH = 20;

export type ExtractionStrategy = (text: string, outputName: string) => string | null;

export abstract class ContentExtractor {
  /** Output name used when the caller gives none */
  abstract readonly defaultName: string;

  /** Strategies in order of preference */
  protected abstract strategies(): ExtractionStrategy[];

  extract(response: unknown, outputName?: string): string | null {
    const name = outputName ?? this.defaultName;

    if (isRecord(response)) {
      const direct = response[name];
      if (typeof direct === 'string' && direct.trim()) return unescapeString(direct);
      const text = JSON.stringify(response);
      return this.extract(text, name);
    }
    if (typeof response !== 'string' || !response.trim()) return null;

    for (const strategy of this.strategies()) {
      const candidate = strategy(response, name);
      if (candidate && candidate.trim().length > MIN_CONTENT_LENGTH) {
        return candidate.trim();
      }
    }
    return null;
  }
}

/**
 * The value of `field` in any JSON object found in the text, top level
 * or inside `results`; else a regex over `"field": "..."`.
 */
export function extractJsonField(text: string, field: string): string | null {
  const candidates = [text.trim(), ...findJsonObjects(text)];
  for (const candidate of candidates) {
    const parsed = tryParseJson(candidate);
    if (!isRecord(parsed)) continue;
    const container = isRecord(parsed.results) ? parsed.results : parsed;
    const value = container[field];
    if (typeof value === 'string' && value.length > MIN_CONTENT_LENGTH) return value;
  }

  const pattern = new RegExp(`"${escapeRegExp(field)}"\\s*:\\s*"((?:[^"\\\\]|\\\\.)*)"`, 'g');
  const match = findLargestMatch(captureAll(text, pattern), MIN_CONTENT_LENGTH);
  return match ? unescapeString(match) : null;
}

/**
 * Largest fenced block, labelled with one of `languages` if given,
 * else any unlabelled block
 */
export function extractCodeBlock(text: string, languages: string[] = []): string | null {
  const labelled = languages.flatMap((language) =>
    captureAll(text, new RegExp('```' + escapeRegExp(language) + '[ \\t]*\\n([\\s\\S]*?)\\n?```', 'gi')),
  );
  const fromLabelled = findLargestMatch(labelled, MIN_CODE_BLOCK_LENGTH);
  if (fromLabelled) return unescapeString(fromLabelled.trim());

  const plain = captureAll(text, /```[ \t]*\n([\s\S]*?)\n?```/g);
  const fromPlain = findLargestMatch(plain, MIN_CODE_BLOCK_LENGTH);
  return fromPlain ? unescapeString(fromPlain.trim()) : null;
}

/**
 * Body of a `## name` or `### name` section, up to the next heading,
 * with a surrounding fence removed
 */
export function extractSection(text: string, name: string): string | null {
  const pattern = new RegExp(`(?:##|###)\\s*${escapeRegExp(name)}[^\\n]*\\n([\\s\\S]*?)(?=\\n##|\\n###|$)`, 'i');
  const match = text.match(pattern);
  if (!match) return null;
  const body = match[1]
    .trim()
    .replace(/^```[^\n]*\n/, '')
    .replace(/```$/, '')
    .trim();
  return body ? unescapeString(body) : null;
}
