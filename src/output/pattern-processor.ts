/**
 * Pattern output extraction
 *
 * Maps each output a pattern declares to its content in the reply.
 */

import type { Logger } from 'pino';
import type { PatternOutput } from '../patterns/types.js';
import {
  captureAll,
  escapeRegExp,
  findLargestMatch,
  looksLikeCommand,
  stripCodeFences,
  unescapeString,
} from './common.js';
import {
  CssExtractor,
  extractCodeBlock,
  extractSection,
  HtmlExtractor,
  JsExtractor,
  JsonExtractor,
  MarkdownExtractor,
} from './extractors/index.js';
import { extractStructuredData } from './structured.js';

export type PatternContents = Record<string, string>;

function stringify(value: unknown): string {
  if (typeof value === 'string') return unescapeString(value);
  if (Array.isArray(value) && value.every((item) => typeof item === 'string')) return value.join('\n');
  return JSON.stringify(value, null, 2);
}

/**
 * Content found through the output's name: a fence labelled with the
 * name, a `name:` line, a `## name` section or a `**name**:` paragraph.
 */
export function extractByName(text: string, name: string): string | null {
  const escaped = escapeRegExp(name);

  const fenced = findLargestMatch(captureAll(text, new RegExp('```' + escaped + '[ \\t]*\\n([\\s\\S]*?)\\n?```', 'gi')));
  if (fenced) return fenced.trim();

  const bold = text.match(new RegExp(`\\*\\*${escaped}\\*\\*:?\\s*([\\s\\S]*?)(?=\\n\\*\\*|\\n##|$)`, 'i'));
  if (bold?.[1].trim()) return bold[1].trim();

  const section = extractSection(text, name);
  if (section) return section;

  const line = text.match(new RegExp(`^${escaped}:\\s*(.+)$`, 'im'));
  if (line?.[1].trim()) return line[1].trim();

  return null;
}

/** First fenced block, else the first line that reads like a command */
function extractCommand(text: string): string | null {
  const block = extractCodeBlock(text, ['bash', 'sh', 'shell', 'zsh']);
  if (block) return block;
  const fence = text.match(/```[\w-]*[ \t]*\n([\s\S]*?)\n?```/);
  if (fence?.[1].trim()) return fence[1].trim();
  return text.split('\n').find((line) => looksLikeCommand(line))?.trim() ?? null;
}

export class PatternProcessor {
  private logger: Logger;
  private html = new HtmlExtractor();
  private css = new CssExtractor();
  private js = new JsExtractor();
  private json = new JsonExtractor();
  private markdown = new MarkdownExtractor();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Content for every output that could be found, keyed by output name
   */
  extractPatternContents(response: string, outputs: PatternOutput[]): PatternContents {
    const structured = extractStructuredData(response);
    const contents: PatternContents = {};

    for (const output of outputs) {
      const value = output.name in structured ? stringify(structured[output.name]) : this.extractByType(response, output);
      if (value && value.trim()) {
        contents[output.name] = output.type === 'command' || output.type === 'code' ? stripCodeFences(value) : value;
      } else {
        this.logger.warn({ output: output.name, type: output.type }, 'No content found for pattern output');
      }
    }

    // A lone output with nothing recognisable gets the whole reply
    if (outputs.length === 1 && Object.keys(contents).length === 0 && response.trim()) {
      contents[outputs[0].name] = response.trim();
    }
    return contents;
  }

  private extractByType(response: string, output: PatternOutput): string | null {
    const byName = extractByName(response, output.name);
    if (byName) return byName;

    switch (output.type) {
      case 'html':
        return this.html.extract(response, output.name);
      case 'css':
        return this.css.extract(response, output.name);
      case 'js':
        return this.js.extract(response, output.name);
      case 'markdown':
        return this.markdown.extract(response, output.name);
      case 'json': {
        const value = this.json.extract(response, output.name);
        return value === null ? null : stringify(value);
      }
      case 'code':
      case 'command':
        return extractCommand(response);
      default:
        return null;
    }
  }
}
