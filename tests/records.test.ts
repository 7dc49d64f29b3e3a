import { describe, it, expect } from 'vitest';
import { decodeRRsetOrder, decodeRRsetOrderEntry, encodeRRsetOrder } from '../src/rrset-order';
import { decodeTrustAnchorEntry, decodeTrustAnchors, encodeTrustAnchorEntry } from '../src/trust-anchors';

describe('rrset-order', () => {
  const text = '{ type A name "www.example.com" order random; order cyclic; }';

  it('decodes qualified and bare rules', () => {
    expect(decodeRRsetOrder(text)).toEqual([
      { type: 'A', name: 'www.example.com', order: 'random' },
      { order: 'cyclic' },
    ]);
  });

  it('takes the last token as the policy when order is missing', () => {
    expect(decodeRRsetOrderEntry('class IN fixed')).toEqual({ class: 'IN', order: 'fixed' });
  });

  it('encodes back to the same text', () => {
    expect(encodeRRsetOrder(decodeRRsetOrder(text))).toBe(text);
  });

  it('decodes empty braces as no rules', () => {
    expect(decodeRRsetOrder('{ }')).toEqual([]);
    expect(decodeRRsetOrderEntry('')).toBeUndefined();
  });
});

describe('trust anchors', () => {
  it('tells DS from DNSKEY by the anchor type', () => {
    const anchors = decodeTrustAnchors('"." initial-ds 12345 8 2 "ABCD"; "example." static-key 257 3 8 "AwEAAc";');

    expect(anchors.items).toEqual([
      { name: '.', kind: 'ds', record: 'initial-ds 12345 8 2 "ABCD"' },
      { name: 'example.', kind: 'dnskey', record: 'static-key 257 3 8 "AwEAAc"' },
    ]);
  });

  it('falls back to a substring match on the record', () => {
    expect(decodeTrustAnchorEntry('"." dnskey 257 3 8 "AwEAAc"')?.kind).toBe('dnskey');
  });

  it('drops and reports records of neither kind', () => {
    const dropped: string[] = [];
    const anchors = decodeTrustAnchors('"bad." nothing 1', text => dropped.push(text));

    expect(anchors.items).toEqual([]);
    expect(dropped).toEqual(['"bad." nothing 1']);
  });

  it('encodes the name quoted and the record as written', () => {
    expect(encodeTrustAnchorEntry({ name: '.', kind: 'ds', record: 'initial-ds 12345 8 2 "ABCD"' })).toBe(
      '"." initial-ds 12345 8 2 "ABCD"',
    );
  });
});
