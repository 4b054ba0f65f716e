/**
 * Text helpers shared by the output extractors and writers
 */

const ESCAPES: Record<string, string> = {
  '\\': '\\',
  'n': '\n',
  't': '\t',
  'r': '\r',
  '"': '"',
  "'": "'",
};

/**
 * Turn literal \n, \t, \" ... into the characters they stand for, but
 * only when escaped newlines dominate real ones.
 */
export function unescapeString(text: string): string {
  if (!text || !/\\[nt"'\\r]/.test(text)) return text;

  const literalNewlines = (text.match(/\n/g) ?? []).length;
  const escapedNewlines = (text.match(/\\n/g) ?? []).length;
  if (escapedNewlines === 0 || literalNewlines >= escapedNewlines * 2) return text;

  return text.replace(/\\([\\ntr"'])/g, (_match, ch: string) => ESCAPES[ch] ?? ch);
}

/**
 * Longest string, if it is longer than `minLength`
 */
export function findLargestMatch(matches: string[], minLength = 0): string | null {
  if (matches.length === 0) return null;
  const largest = matches.reduce((a, b) => (b.length > a.length ? b : a));
  return largest.length > minLength ? largest : null;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * All capture-group-1 matches of a global regex
 */
export function captureAll(text: string, pattern: RegExp): string[] {
  return Array.from(text.matchAll(pattern), (match) => match[1] ?? match[0]);
}

/**
 * Remove a surrounding ``` fence, keeping the body
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```[\w-]*\s*\n?([\s\S]*?)\n?```$/);
  return match ? match[1].trim() : trimmed;
}

const COMMAND_PREFIXES = [
  'ls ', 'cd ', 'mkdir ', 'rm ', 'cp ', 'mv ', 'cat ', 'grep ', 'find ', 'ps ', 'kill ', 'pkill ',
  'sudo ', 'chmod ', 'chown ', 'tar ', 'zip ', 'unzip ', 'wget ', 'curl ', 'ssh ', 'scp ',
  'git ', 'docker ', 'systemctl ', 'service ', 'mount ', 'umount ', 'df ', 'du ', 'top ', 'htop ',
];

const PROSE_PREFIXES = ['this command', 'the command', 'explanation:', 'note:', 'warning:', 'example:'];

/**
 * Heuristic: does this line read like a shell command?
 */
export function looksLikeCommand(text: string): boolean {
  const line = text.trim();
  if (!line) return false;
  if (PROSE_PREFIXES.some((prefix) => line.toLowerCase().startsWith(prefix))) return false;

  return (
    COMMAND_PREFIXES.some((prefix) => line.startsWith(prefix)) ||
    line.includes(' | ') ||
    line.includes(' > ') ||
    line.includes(' >> ') ||
    line.includes(' < ') ||
    line.includes(' && ') ||
    line.includes(' || ') ||
    line.includes('; ')
  );
}

/**
 * Top-level {...} spans, ignoring braces inside strings
 */
export function findJsonObjects(text: string): string[] {
  const found: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0 && start !== -1) {
        found.push(text.slice(start, i + 1));
        start = -1;
      }
    }
  }
  return found;
}

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
