/**
 * File writers
 *
 * One writer per kind of file, chosen by extension. Each writer tidies
 * its content before it goes to disk and creates missing directories.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, extname } from 'path';
import type { Logger } from 'pino';
import { isRecord, stripCodeFences, tryParseJson } from './common.js';

export interface WriteOptions {
  /** Stylesheet an HTML file should link, relative to it */
  cssPath?: string;
  /** Script an HTML file should load, relative to it */
  jsPath?: string;
}

export interface FileWriter {
  readonly extensions: string[];
  prepare(content: string, options: WriteOptions): string;
}

// ============================================================================
// Writers
// ============================================================================

export class TextWriter implements FileWriter {
  readonly extensions = ['.txt'];

  prepare(content: string): string {
    return content;
  }
}

export class HtmlWriter implements FileWriter {
  readonly extensions = ['.html', '.htm'];

  prepare(content: string, options: WriteOptions): string {
    let html = stripCodeFences(content);

    if (!/<html[\s>]/i.test(html)) {
      html =
        '<!DOCTYPE html>\n<html lang="en">\n<head>\n' +
        '    <meta charset="UTF-8">\n' +
        '    <meta name="viewport" content="width=device-width, initial-scale=1.0">\n' +
        '    <title>Generated Page</title>\n' +
        '</head>\n<body>\n' +
        `${html}\n` +
        '</body>\n</html>';
    } else if (!/<head[\s>]/i.test(html)) {
      html = html.replace(/(<html[^>]*>)/i, '$1\n<head>\n    <meta charset="UTF-8">\n</head>');
    }

    // Only files written next to the page get linked
    if (options.cssPath) {
      const linkTag = `<link rel="stylesheet" href="${options.cssPath}">`;
      if (/<link[^>]*rel=["']stylesheet["'][^>]*>/i.test(html)) {
        html = html.replace(/<link[^>]*rel=["']stylesheet["'][^>]*>/i, linkTag);
      } else {
        html = html.replace(/<\/head>/i, `    ${linkTag}\n</head>`);
      }
    }

    if (options.jsPath) {
      const scriptTag = `<script src="${options.jsPath}" defer></script>`;
      if (/<script[^>]*\bsrc=["'][^"']*["'][^>]*>\s*<\/script>/i.test(html)) {
        html = html.replace(/<script[^>]*\bsrc=["'][^"']*["'][^>]*>\s*<\/script>/i, scriptTag);
      } else {
        html = html.replace(/<\/head>/i, `    ${scriptTag}\n</head>`);
      }
    }

    if (!/^\s*<!DOCTYPE html>/i.test(html)) {
      html = `<!DOCTYPE html>\n${html.trimStart()}`;
    }
    return html;
  }
}

export class CssWriter implements FileWriter {
  readonly extensions = ['.css'];

  prepare(content: string): string {
    const css = stripCodeFences(content)
      .replace(/<\/?style[^>]*>/gi, '')
      .trim();
    if (css.startsWith('/*')) return `${css}\n`;
    return `/*\n * Generated CSS file\n */\n\n${css}\n`;
  }
}

export class JsWriter implements FileWriter {
  readonly extensions = ['.js'];

  prepare(content: string): string {
    const js = stripCodeFences(content)
      .replace(/<script[^>]*>/gi, '')
      .replace(/<\/script>/gi, '')
      .trim();
    if (/^['"]use strict['"]/.test(js)) return `${js}\n`;
    return `'use strict';\n\n${js}\n`;
  }
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (!isRecord(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key]);
  }
  return sorted;
}

/**
 * Repairs the usual model mistakes: comments, trailing commas and single quotes
 */
export function fixJson(text: string): string {
  let fixed = text
    .replace(/^\s*\/\/.*$/gm, '')
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/,(\s*[}\]])/g, '$1');
  if (!fixed.includes('"')) {
    fixed = fixed.replace(/'/g, '"');
  }
  return fixed.trim();
}

export class JsonWriter implements FileWriter {
  readonly extensions = ['.json'];

  prepare(content: string): string {
    const raw = stripCodeFences(content);
    const parsed = tryParseJson(raw) ?? tryParseJson(fixJson(raw));
    if (parsed === undefined) return raw;
    return `${JSON.stringify(sortKeys(parsed), null, 2)}\n`;
  }
}

export class MarkdownWriter implements FileWriter {
  readonly extensions = ['.md', '.markdown'];

  prepare(content: string): string {
    const markdown = content
      .replace(/\r\n/g, '\n')
      .replace(/([^\n])\n(#{1,6}\s)/g, '$1\n\n$2')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
    return `${markdown}\n`;
  }
}

// ============================================================================
// Chain
// ============================================================================

export class FileWriterChain {
  private logger: Logger;
  private writers: FileWriter[];
  private fallback = new TextWriter();

  constructor(logger: Logger, writers?: FileWriter[]) {
    this.logger = logger;
    this.writers = writers ?? [
      new HtmlWriter(),
      new CssWriter(),
      new JsWriter(),
      new JsonWriter(),
      new MarkdownWriter(),
      this.fallback,
    ];
  }

  writerFor(filePath: string): FileWriter {
    const extension = extname(filePath).toLowerCase();
    return this.writers.find((writer) => writer.extensions.includes(extension)) ?? this.fallback;
  }

  /**
   * Write `content` to `filePath` through the writer for its extension
   */
  async writeByExtension(content: string, filePath: string, options: WriteOptions = {}): Promise<void> {
    const writer = this.writerFor(filePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, writer.prepare(content, options), 'utf-8');
    this.logger.info({ file_path: filePath, writer: writer.constructor.name }, 'Wrote output file');
  }
}
