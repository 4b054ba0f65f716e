import { captureAll, findLargestMatch, unescapeString } from '../common.js';
import {
  ContentExtractor,
  extractCodeBlock,
  extractJsonField,
  extractSection,
  type ExtractionStrategy,
} from './base.js';

function extractStyleTags(text: string): string | null {
  const blocks = captureAll(text, /<style[^>]*>([\s\S]*?)<\/style>/gi).map((block) => block.trim());
  const joined = blocks.filter(Boolean).join('\n\n');
  return joined ? unescapeString(joined) : null;
}

/** Runs of `selector { declarations }` rules */
function extractRules(text: string): string | null {
  const runs = captureAll(text, /((?:[^{}\n`]+\{[^{}]*:[^{}]*\}\s*)+)/g);
  return findLargestMatch(runs, 100);
}

export class CssExtractor extends ContentExtractor {
  readonly defaultName = 'css_styles';

  protected strategies(): ExtractionStrategy[] {
    return [
      (text, name) => extractJsonField(text, name),
      (text) => extractJsonField(text, 'css'),
      (text) => extractCodeBlock(text, ['css']),
      (text) => extractStyleTags(text),
      (text, name) => extractSection(text, name),
      (text) => extractSection(text, 'CSS'),
      (text) => extractRules(text),
    ];
  }
}
