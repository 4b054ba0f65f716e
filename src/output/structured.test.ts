import { describe, expect, it } from 'vitest';
import { silentLogger } from '../test-utils.js';
import type { PatternOutput } from '../patterns/types.js';
import { PatternProcessor } from './pattern-processor.js';
import { extractStructuredData } from './structured.js';

function output(name: string, type: PatternOutput['type'], action?: PatternOutput['action']): PatternOutput {
  return { name, description: '', type, action, required: true, auto_run: false };
}

describe('extractStructuredData', () => {
  it('reads results and parses nested json strings', () => {
    const text = JSON.stringify({ results: { summary: 'ok', data: '{"a": 1}' } });
    expect(extractStructuredData(text)).toEqual({ summary: 'ok', data: { a: 1 } });
  });

  it('recovers pairs from a results object that does not parse', () => {
    const text = '{"results": {"explanation": "Lists files\\nin detail", "command": "ls -la",}}';
    expect(extractStructuredData(text)).toEqual({ explanation: 'Lists files\nin detail', command: 'ls -la' });
  });

  it('collects labelled code blocks', () => {
    const text = 'Page:\n```html\n<p>Hi</p>\n```\nStyle:\n```css\np { color: red; }\n```';
    expect(extractStructuredData(text)).toEqual({ html: '<p>Hi</p>', css: 'p { color: red; }' });
  });

  it('returns an empty object for plain text', () => {
    expect(extractStructuredData('')).toEqual({});
  });
});

describe('PatternProcessor', () => {
  const processor = new PatternProcessor(silentLogger());

  it('maps json results to outputs', () => {
    const response = JSON.stringify({ results: { explanation: 'Shows files', command: 'ls -la' } });
    const contents = processor.extractPatternContents(response, [
      output('explanation', 'markdown', 'display'),
      output('command', 'command', 'execute'),
    ]);
    expect(contents).toEqual({ explanation: 'Shows files', command: 'ls -la' });
  });

  it('finds a command in a shell code block', () => {
    const response = 'Use this:\n```bash\nfind . -name "*.log" -delete\n```';
    expect(processor.extractPatternContents(response, [output('command', 'command')])).toEqual({
      command: 'find . -name "*.log" -delete',
    });
  });

  it('reads a "name:" line', () => {
    const response = 'title: Weekly report\nbody text';
    expect(processor.extractPatternContents(response, [output('title', 'text'), output('body', 'text')])).toEqual({
      title: 'Weekly report',
    });
  });

  it('gives a lone output the whole reply when nothing matches', () => {
    expect(processor.extractPatternContents('Just some prose.', [output('summary', 'text')])).toEqual({
      summary: 'Just some prose.',
    });
  });
});
