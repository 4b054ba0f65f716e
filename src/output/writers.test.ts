import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir, removeTempDir, silentLogger } from '../test-utils.js';
import { CssWriter, FileWriterChain, HtmlWriter, JsonWriter, JsWriter, MarkdownWriter, TextWriter } from './writers.js';

describe('HtmlWriter', () => {
  const writer = new HtmlWriter();

  it('wraps a fragment in a document linked to the stylesheet and script', () => {
    const html = writer.prepare('<h1>Hi</h1>', { cssPath: 'styles.css', jsPath: 'script.js' });
    expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">\n<head>')).toBe(true);
    expect(html).toContain(
      '    <link rel="stylesheet" href="styles.css">\n    <script src="script.js" defer></script>\n</head>',
    );
    expect(html).toContain('<body>\n<h1>Hi</h1>\n</body>');
  });

  it('replaces an existing stylesheet link and adds the doctype', () => {
    const html = writer.prepare('<html><head><link rel="stylesheet" href="main.css"></head><body></body></html>', {
      cssPath: 'theme.css',
    });
    expect(html).toBe('<!DOCTYPE html>\n<html><head><link rel="stylesheet" href="theme.css"></head><body></body></html>');
  });

  it('links nothing when no stylesheet or script was written', () => {
    const html = writer.prepare('<p>Plain</p>', {});
    expect(html).not.toContain('<link');
    expect(html).not.toContain('<script');
    expect(html).toContain('    <title>Generated Page</title>\n</head>');
  });
});

describe('CssWriter', () => {
  it('strips fences and adds a header comment', () => {
    expect(new CssWriter().prepare('```css\nbody { margin: 0; }\n```')).toBe(
      '/*\n * Generated CSS file\n */\n\nbody { margin: 0; }\n',
    );
  });
});

describe('JsWriter', () => {
  it('strips script tags and adds strict mode', () => {
    expect(new JsWriter().prepare('<script>\nconsole.log("hi");\n</script>')).toBe(
      '\'use strict\';\n\nconsole.log("hi");\n',
    );
  });
});

describe('JsonWriter', () => {
  const writer = new JsonWriter();

  it('repairs quotes and trailing commas, then sorts keys', () => {
    expect(writer.prepare("{'b': 1, 'a': [1, 2,],}")).toBe('{\n  "a": [\n    1,\n    2\n  ],\n  "b": 1\n}\n');
  });

  it('writes text that is not json as it is', () => {
    expect(writer.prepare('not json')).toBe('not json');
  });
});

describe('MarkdownWriter', () => {
  it('spaces headings and collapses blank lines', () => {
    expect(new MarkdownWriter().prepare('Intro\n## Section\n\n\n\nBody')).toBe('Intro\n\n## Section\n\nBody\n');
  });
});

describe('FileWriterChain', () => {
  let dir: string;
  const chain = new FileWriterChain(silentLogger());

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('picks the writer by extension and falls back to text', () => {
    expect(chain.writerFor('page.HTM')).toBeInstanceOf(HtmlWriter);
    expect(chain.writerFor('notes.markdown')).toBeInstanceOf(MarkdownWriter);
    expect(chain.writerFor('data.unknown')).toBeInstanceOf(TextWriter);
  });

  it('creates missing directories', async () => {
    const target = join(dir, 'a', 'b', 'site.css');
    await chain.writeByExtension('p { color: red; }', target);
    expect(existsSync(target)).toBe(true);
    expect(await readFile(target, 'utf-8')).toBe('/*\n * Generated CSS file\n */\n\np { color: red; }\n');
  });
});
