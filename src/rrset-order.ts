/**
 * named-model — RRset Ordering Rules
 *
 *   rrset-order { type A name "www.example.com" order random; order cyclic; };
 *
 * An entry without an `order` keyword takes its last token as the policy.
 */

import type { RRsetOrder } from './types';
import { quote, splitTopLevel, tokenize, unquote, unwrapBraces } from './tokens';

export function decodeRRsetOrderEntry(text: string): RRsetOrder | undefined {
  const tokens = tokenize(text);
  if (tokens.length === 0) return undefined;

  const rule: Partial<RRsetOrder> = {};

  for (let i = 0; i < tokens.length - 1; i++) {
    const next = tokens[i + 1];
    switch (tokens[i]) {
      case 'class':
        rule.class = next;
        i++;
        break;
      case 'type':
        rule.type = next;
        i++;
        break;
      case 'name':
        rule.name = unquote(next);
        i++;
        break;
      case 'order':
        rule.order = next;
        i++;
        break;
    }
  }

  return { ...rule, order: rule.order ?? tokens[tokens.length - 1] };
}

export function decodeRRsetOrder(text: string): RRsetOrder[] {
  const rules: RRsetOrder[] = [];
  for (const entry of splitTopLevel(unwrapBraces(text))) {
    const rule = decodeRRsetOrderEntry(entry);
    if (rule) rules.push(rule);
  }
  return rules;
}

export function encodeRRsetOrderEntry(rule: RRsetOrder): string {
  const parts: string[] = [];
  if (rule.class !== undefined) parts.push(`class ${rule.class}`);
  if (rule.type !== undefined) parts.push(`type ${rule.type}`);
  if (rule.name !== undefined) parts.push(`name ${quote(rule.name)}`);
  parts.push(`order ${rule.order}`);
  return parts.join(' ');
}

/** `{ type A order random; order cyclic; }` */
export function encodeRRsetOrder(rules: RRsetOrder[]): string {
  if (rules.length === 0) return '{ }';
  return `{ ${rules.map(rule => `${encodeRRsetOrderEntry(rule)};`).join(' ')} }`;
}
