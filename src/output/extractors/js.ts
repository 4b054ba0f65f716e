import { captureAll, findLargestMatch, unescapeString } from '../common.js';
import {
  ContentExtractor,
  extractCodeBlock,
  extractJsonField,
  extractSection,
  type ExtractionStrategy,
} from './base.js';

function extractScriptTags(text: string): string | null {
  const blocks = captureAll(text, /<script(?![^>]*\bsrc=)[^>]*>([\s\S]*?)<\/script>/gi).map((block) => block.trim());
  const joined = blocks.filter(Boolean).join('\n\n');
  return joined ? unescapeString(joined) : null;
}

/** From the first declaration or event hookup to the last closing brace */
function extractScriptBody(text: string): string | null {
  const runs = captureAll(
    text,
    /((?:document\.addEventListener|window\.addEventListener|function\s+\w+|const\s+\w+\s*=|let\s+\w+\s*=)[\s\S]*[}\]);])/g,
  );
  return findLargestMatch(runs, 100);
}

export class JsExtractor extends ContentExtractor {
  readonly defaultName = 'javascript';

  protected strategies(): ExtractionStrategy[] {
    return [
      (text, name) => extractJsonField(text, name),
      (text) => extractJsonField(text, 'js'),
      (text) => extractCodeBlock(text, ['javascript', 'js']),
      (text) => extractScriptTags(text),
      (text, name) => extractSection(text, name),
      (text) => extractSection(text, 'JavaScript'),
      (text) => extractScriptBody(text),
    ];
  }
}
