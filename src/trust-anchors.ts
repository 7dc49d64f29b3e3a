/**
 * named-model — Trust Anchor Entries
 *
 *   trust-anchors {
 *     "." initial-ds 12345 8 2 "0123456789ABCDEF0123456789ABCDEF";
 *   };
 *
 * The record text after the name is kept as written; only its kind is
 * inferred.
 */

import type { TrustAnchorItem, TrustAnchors } from './types';
import type { DropFn } from './servers';
import { quote, splitTopLevel, unquote, unwrapBraces, words } from './tokens';

const ENTRY = /^("[^"]*"|\S+)\s*([\s\S]*)$/;

const ignore: DropFn = () => {};

/** The kind a record's text implies, if any. */
export function recordKind(record: string): TrustAnchorItem['kind'] | undefined {
  const [anchorType = ''] = words(record);
  if (anchorType.endsWith('-ds')) return 'ds';
  if (anchorType.endsWith('-key')) return 'dnskey';
  if (record.includes('ds')) return 'ds';
  if (record.includes('key')) return 'dnskey';
  return undefined;
}

/** Decode `"<name>" <record>`; entries of neither kind are dropped. */
export function decodeTrustAnchorEntry(text: string, onDrop: DropFn = ignore): TrustAnchorItem | undefined {
  const match = ENTRY.exec(text.trim());
  if (!match) return undefined;

  const record = match[2].trim();
  const kind = recordKind(record);
  if (kind === undefined) {
    onDrop(text.trim());
    return undefined;
  }

  return { name: unquote(match[1]), kind, record };
}

export function encodeTrustAnchorEntry(item: TrustAnchorItem): string {
  return `${quote(item.name)} ${item.record}`;
}

export function decodeTrustAnchors(text: string, onDrop: DropFn = ignore): TrustAnchors {
  const items: TrustAnchorItem[] = [];
  for (const entry of splitTopLevel(unwrapBraces(text))) {
    const item = decodeTrustAnchorEntry(entry, onDrop);
    if (item) items.push(item);
  }
  return { items };
}
