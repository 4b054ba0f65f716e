import {
  ContentExtractor,
  extractCodeBlock,
  extractJsonField,
  extractSection,
  type ExtractionStrategy,
} from './base.js';

/** Everything from the first markdown heading on */
function extractFromFirstHeading(text: string): string | null {
  const index = text.search(/^#{1,6}\s+\S/m);
  return index === -1 ? null : text.slice(index).trim();
}

export class MarkdownExtractor extends ContentExtractor {
  readonly defaultName = 'markdown_content';

  protected strategies(): ExtractionStrategy[] {
    return [
      (text, name) => extractJsonField(text, name),
      (text, name) => extractSection(text, name),
      (text) => extractCodeBlock(text, ['markdown', 'md']),
      (text) => extractFromFirstHeading(text),
    ];
  }
}
