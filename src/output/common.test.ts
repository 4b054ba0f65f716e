import { describe, expect, it } from 'vitest';
import {
  findJsonObjects,
  findLargestMatch,
  looksLikeCommand,
  stripCodeFences,
  unescapeString,
} from './common.js';
import { cleanContent, normalizeResponse } from './normalizer.js';

describe('unescapeString', () => {
  it('converts escaped newlines when they outnumber real ones', () => {
    expect(unescapeString('line1\\nline2\\nline3')).toBe('line1\nline2\nline3');
  });

  it('converts escaped quotes together with newlines', () => {
    expect(unescapeString('a\\n\\"b\\"')).toBe('a\n"b"');
  });

  it('leaves text with mostly real newlines alone', () => {
    const text = 'a\nb\nc\\nd';
    expect(unescapeString(text)).toBe(text);
  });

  it('leaves text without escapes alone', () => {
    expect(unescapeString('plain text')).toBe('plain text');
  });
});

describe('findLargestMatch', () => {
  it('returns the longest match above the minimum', () => {
    expect(findLargestMatch(['ab', 'abcd', 'abc'], 3)).toBe('abcd');
  });

  it('returns null when nothing is long enough', () => {
    expect(findLargestMatch(['ab'], 2)).toBeNull();
    expect(findLargestMatch([])).toBeNull();
  });
});

describe('looksLikeCommand', () => {
  it('recognises commands and pipelines', () => {
    expect(looksLikeCommand('ls -la')).toBe(true);
    expect(looksLikeCommand('cat file.txt | grep error')).toBe(true);
  });

  it('rejects prose', () => {
    expect(looksLikeCommand('This command lists files')).toBe(false);
    expect(looksLikeCommand('hello world')).toBe(false);
    expect(looksLikeCommand('')).toBe(false);
  });
});

describe('findJsonObjects', () => {
  it('finds top-level objects and ignores braces inside strings', () => {
    expect(findJsonObjects('x {"a": "}"} y {"b": {"c": 1}}')).toEqual(['{"a": "}"}', '{"b": {"c": 1}}']);
  });
});

describe('stripCodeFences', () => {
  it('removes a labelled fence', () => {
    expect(stripCodeFences('```bash\nls -la\n```')).toBe('ls -la');
  });

  it('returns unfenced text trimmed', () => {
    expect(stripCodeFences('  echo hi  ')).toBe('echo hi');
  });
});

describe('normalizeResponse', () => {
  it('reads the first choice of a completion', () => {
    expect(normalizeResponse({ choices: [{ message: { content: '  hi  \r\nthere  ' } }] })).toBe('hi\nthere');
  });

  it('serialises non-string content', () => {
    expect(normalizeResponse({ result: { a: 1 } })).toBe('{\n  "a": 1\n}');
  });

  it('cleans plain strings', () => {
    expect(normalizeResponse(' text ')).toBe('text');
    expect(cleanContent('a  \nb\t')).toBe('a\nb');
  });
});
