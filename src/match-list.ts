/**
 * named-model — Address Match Lists
 *
 * Decodes and encodes `{ 10.0.0.0/8; !bogons; key "xfer"; { a; b; }; }`.
 *
 * Each `;`-separated segment is classified in this order:
 *   1. leading `!` → negated, then classify the rest
 *   2. `key <name>` → key reference
 *   3. leading `{` → nested list
 *   4. a fully quoted segment → ACL reference
 *   5. contains `/`, more than one `:`, or exactly three `.` → address
 *   6. anything else → ACL reference
 */

import type { MatchTerm } from './types';
import { quote, quoteIfNeeded, splitTopLevel, unquote, unwrapBraces } from './tokens';

function isQuoted(text: string): boolean {
  return text.length >= 2 && text.startsWith('"') && text.endsWith('"');
}

function countOf(text: string, ch: string): number {
  return text.split(ch).length - 1;
}

function looksLikeAddress(text: string): boolean {
  return text.includes('/') || countOf(text, ':') > 1 || countOf(text, '.') === 3;
}

/**
 * Classify a single match-list segment.
 *
 * @example
 * ```ts
 * decodeMatchTerm('!trusted');
 * // { kind: 'acl', name: 'trusted', negated: true }
 * ```
 */
export function decodeMatchTerm(segment: string): MatchTerm {
  let text = segment.trim();
  let negated = false;

  if (text.startsWith('!')) {
    negated = true;
    text = text.slice(1).trim();
  }

  const term = classify(text);
  if (negated) term.negated = true;
  return term;
}

function classify(text: string): MatchTerm {
  if (/^key\s/.test(text)) {
    return { kind: 'key', key: unquote(text.slice(4)) };
  }
  if (text.startsWith('{')) {
    return { kind: 'nested', terms: decodeMatchList(text) };
  }
  if (isQuoted(text)) {
    return { kind: 'acl', name: unquote(text) };
  }
  if (looksLikeAddress(text)) {
    return { kind: 'address', address: text };
  }
  return { kind: 'acl', name: text };
}

/** Decode a match list, with or without its enclosing braces. */
export function decodeMatchList(text: string): MatchTerm[] {
  return splitTopLevel(unwrapBraces(text)).map(decodeMatchTerm);
}

/** Thrown when a nested match list contains itself. */
export class CyclicMatchListError extends Error {
  constructor() {
    super('Match list contains itself');
    this.name = 'CyclicMatchListError';
  }
}

function encodeTerm(term: MatchTerm, open: Set<MatchTerm[]>): string {
  const bang = term.negated ? '!' : '';

  switch (term.kind) {
    case 'address':
      return `${bang}${term.address}`;
    case 'key':
      return `${bang}key ${quote(term.key)}`;
    case 'acl':
      return `${bang}${quoteIfNeeded(term.name)}`;
    case 'nested':
      return `${bang}${encodeList(term.terms, open)}`;
  }
}

function encodeList(terms: MatchTerm[], open: Set<MatchTerm[]>): string {
  if (open.has(terms)) throw new CyclicMatchListError();
  if (terms.length === 0) return '{ }';

  open.add(terms);
  const body = terms.map(term => `${encodeTerm(term, open)};`).join(' ');
  open.delete(terms);

  return `{ ${body} }`;
}

/** Encode one term without the trailing `;`. */
export function encodeMatchTerm(term: MatchTerm): string {
  return encodeTerm(term, new Set());
}

/**
 * Encode a match list wrapped in braces, every element terminated by `;`.
 *
 * @example
 * ```ts
 * encodeMatchList([{ kind: 'acl', name: 'any' }]);
 * // '{ any; }'
 * ```
 */
export function encodeMatchList(terms: MatchTerm[]): string {
  return encodeList(terms, new Set());
}
