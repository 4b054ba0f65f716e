import { captureAll, findLargestMatch, unescapeString } from '../common.js';
import {
  ContentExtractor,
  extractCodeBlock,
  extractJsonField,
  extractSection,
  type ExtractionStrategy,
} from './base.js';

const DOCUMENT_PATTERNS = [
  /(<!DOCTYPE html>[\s\S]*?<\/html>)/gi,
  /(<html[\s\S]*?<\/html>)/gi,
  /(<body[\s\S]*?<\/body>)/gi,
  /(<div\s+id=[\s\S]*<\/div>)/gi,
];

function extractDocument(text: string): string | null {
  for (const pattern of DOCUMENT_PATTERNS) {
    const match = findLargestMatch(captureAll(text, pattern), 100);
    if (match) return unescapeString(match);
  }
  return null;
}

export class HtmlExtractor extends ContentExtractor {
  readonly defaultName = 'html_content';

  protected strategies(): ExtractionStrategy[] {
    return [
      (text, name) => extractJsonField(text, name),
      (text) => extractCodeBlock(text, ['html']),
      (text, name) => extractSection(text, name),
      (text) => extractSection(text, 'HTML'),
      (text) => extractDocument(text),
    ];
  }
}
