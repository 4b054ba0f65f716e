import { describe, expect, it } from 'vitest';
import { CssExtractor, HtmlExtractor, JsExtractor, JsonExtractor, MarkdownExtractor } from './index.js';

const CARD_HTML = '<div class="card"><h1>Title</h1><p>Some paragraph text here.</p></div>';

describe('HtmlExtractor', () => {
  const extractor = new HtmlExtractor();

  it('takes the largest html code block', () => {
    const text = `Here:\n\`\`\`html\n${CARD_HTML}\n\`\`\`\nDone`;
    expect(extractor.extract(text)).toBe(CARD_HTML);
  });

  it('reads a field nested under results', () => {
    const response = { results: { html_content: CARD_HTML } };
    expect(extractor.extract(response)).toBe(CARD_HTML);
  });

  it('rejects content that is too short', () => {
    expect(extractor.extract('```html\n<p>hi</p>\n```')).toBeNull();
  });
});

describe('CssExtractor', () => {
  it('reads style tags', () => {
    const text =
      'Page:\n<style>\nbody { margin: 0; padding: 0; }\n.header { color: #333; font-size: 2rem; }\n</style>';
    expect(new CssExtractor().extract(text)).toBe(
      'body { margin: 0; padding: 0; }\n.header { color: #333; font-size: 2rem; }',
    );
  });
});

describe('JsExtractor', () => {
  it('reads a section named after the output', () => {
    const text =
      '## javascript\nconst items = document.querySelectorAll(".item");\n' +
      'items.forEach((item) => item.classList.add("ready"));\n## Notes\nnothing';
    expect(new JsExtractor().extract(text)).toBe(
      'const items = document.querySelectorAll(".item");\nitems.forEach((item) => item.classList.add("ready"));',
    );
  });
});

describe('MarkdownExtractor', () => {
  it('falls back to everything after the first heading', () => {
    const text = 'Sure! Here you go:\n\n# Report\n\nThe quarterly numbers improved across every region we track.';
    expect(new MarkdownExtractor().extract(text)).toBe(
      '# Report\n\nThe quarterly numbers improved across every region we track.',
    );
  });
});

describe('JsonExtractor', () => {
  const extractor = new JsonExtractor();

  it('parses a fenced json block', () => {
    expect(extractor.extract('Result below\n```json\n{"name": "Ada", "age": 36}\n```')).toEqual({
      name: 'Ada',
      age: 36,
    });
  });

  it('picks a named value from results', () => {
    expect(extractor.extract('{"results": {"data": {"a": 1}}}', 'data')).toEqual({ a: 1 });
  });

  it('returns null without json', () => {
    expect(extractor.extract('no json here')).toBeNull();
  });
});
