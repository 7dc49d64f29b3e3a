/**
 * named-model — Token Codecs
 *
 * Small shared pieces of the named.conf grammar: booleans, integers,
 * quoted strings, string lists, brace-aware splitting and tokenizing,
 * and statement header fields.
 */

import type { Statement } from './cst';

const BARE_NAME = /^[A-Za-z0-9-]+$/;
const INTEGER = /^[+-]?\d+$/;

const HEAD_NAME = /^[a-z-]+\s+"([^"]+)"/;
const HEAD_CLASS = /^[a-z-]+\s+"[^"]+"\s+([A-Za-z]+)/;
const CLASS_WORD = /^[A-Za-z]+$/;

/** Whitespace-separated words. */
export function words(text: string): string[] {
  return text.trim().split(/\s+/).filter(word => word.length > 0);
}

/**
 * `yes` → true, `no` → false (case-insensitive, first word only).
 * Anything else is unset, not false.
 */
export function decodeBool(text: string): boolean | undefined {
  const [first] = words(text);
  switch (first?.toLowerCase()) {
    case 'yes':
      return true;
    case 'no':
      return false;
    default:
      return undefined;
  }
}

export function encodeBool(value: boolean): string {
  return value ? 'yes' : 'no';
}

/** First word as a base-10 integer. */
export function decodeInt(text: string): number | undefined {
  const [first] = words(text);
  if (first === undefined || !INTEGER.test(first)) return undefined;
  return Number.parseInt(first, 10);
}

/** Remove one layer of double quotes. */
export function unquote(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

export function quote(text: string): string {
  return `"${text}"`;
}

/** Quote a name unless it is a bare alphanumeric/hyphen token. */
export function quoteIfNeeded(name: string): string {
  return BARE_NAME.test(name) ? name : quote(name);
}

/**
 * Index of the `}` closing the `{` at `start`, or -1.
 * Quoted text is skipped.
 */
function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let quoted = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') quoted = false;
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/** Strip one pair of enclosing braces, when the whole text is braced. */
export function unwrapBraces(text: string): string {
  const trimmed = text.trim();
  if (trimmed.startsWith('{') && matchingBrace(trimmed, 0) === trimmed.length - 1) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

/**
 * Split on `sep` outside braces and quotes. Segments are trimmed and
 * empty ones dropped.
 */
export function splitTopLevel(text: string, sep = ';'): string[] {
  const segments: string[] = [];
  let depth = 0;
  let quoted = false;
  let current = '';

  for (const ch of text) {
    if (quoted) {
      current += ch;
      if (ch === '"') quoted = false;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth = Math.max(0, depth - 1);
    } else if (ch === sep && depth === 0) {
      segments.push(current);
      current = '';
      continue;
    }

    current += ch;
  }
  segments.push(current);

  return segments.map(segment => segment.trim()).filter(segment => segment.length > 0);
}

/**
 * Split into tokens: bare words, quoted strings (quotes kept) and
 * balanced brace groups (braces kept). Top-level `;` separates tokens.
 *
 * @example
 * ```ts
 * tokenize('127.0.0.1 port 953 allow { localhost; }');
 * // ['127.0.0.1', 'port', '953', 'allow', '{ localhost; }']
 * ```
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (/\s/.test(ch) || ch === ';') {
      i++;
      continue;
    }

    if (ch === '"') {
      const end = text.indexOf('"', i + 1);
      const stop = end === -1 ? text.length : end + 1;
      tokens.push(text.slice(i, stop));
      i = stop;
      continue;
    }

    if (ch === '{') {
      const end = matchingBrace(text, i);
      const stop = end === -1 ? text.length : end + 1;
      tokens.push(text.slice(i, stop));
      i = stop;
      continue;
    }

    let word = '';
    while (i < text.length && !/\s/.test(text[i]) && !'{};"'.includes(text[i])) {
      word += text[i];
      i++;
    }
    if (word.length === 0) {
      // stray closing brace
      i++;
      continue;
    }
    tokens.push(word);
  }

  return tokens;
}

/** Optional `{ }`, `;`-separated, one layer of quotes removed per item. */
export function decodeStringList(text: string): string[] {
  return splitTopLevel(unwrapBraces(text)).map(unquote);
}

/** `{ "a"; "b"; }` */
export function encodeStringList(items: string[]): string {
  if (items.length === 0) return '{ }';
  return `{ ${items.map(item => `${quote(item)};`).join(' ')} }`;
}

/**
 * The quoted name after the keyword, e.g. `example.com` for
 * `zone "example.com" IN`. Falls back to the second word.
 */
export function headerName(stmt: Statement): string {
  const head = stmt.head.trim();
  const match = HEAD_NAME.exec(head);
  if (match) return match[1];

  const fields = words(head);
  return fields.length > 1 ? unquote(fields[1]) : '';
}

/** The class word after the name, e.g. `IN`, if any. */
export function headerClass(stmt: Statement): string | undefined {
  const head = stmt.head.trim();
  const match = HEAD_CLASS.exec(head);
  if (match) return match[1];

  const fields = words(head);
  if (fields.length > 2 && !fields[1].startsWith('"') && CLASS_WORD.test(fields[2])) {
    return fields[2];
  }
  return undefined;
}
