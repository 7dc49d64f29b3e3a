import { describe, it, expect } from 'vitest';
import type { MatchTerm } from '../src/types';
import {
  CyclicMatchListError,
  decodeMatchList,
  decodeMatchTerm,
  encodeMatchList,
  encodeMatchTerm,
} from '../src/match-list';

describe('match lists', () => {
  describe('term classification', () => {
    it('negates and re-classifies', () => {
      expect(decodeMatchTerm('!trusted')).toEqual({ kind: 'acl', name: 'trusted', negated: true });
      expect(decodeMatchTerm('! 10.0.0.0/8')).toEqual({ kind: 'address', address: '10.0.0.0/8', negated: true });
    });

    it('reads key references with or without quotes', () => {
      expect(decodeMatchTerm('key "xfer"')).toEqual({ kind: 'key', key: 'xfer' });
      expect(decodeMatchTerm('key xfer')).toEqual({ kind: 'key', key: 'xfer' });
    });

    it('recognizes addresses', () => {
      expect(decodeMatchTerm('192.0.2.1')).toEqual({ kind: 'address', address: '192.0.2.1' });
      expect(decodeMatchTerm('2001:db8::1')).toEqual({ kind: 'address', address: '2001:db8::1' });
      expect(decodeMatchTerm('198.51.100.0/24')).toEqual({ kind: 'address', address: '198.51.100.0/24' });
    });

    it('treats everything else as an ACL name', () => {
      expect(decodeMatchTerm('localhost')).toEqual({ kind: 'acl', name: 'localhost' });
      expect(decodeMatchTerm('example.com')).toEqual({ kind: 'acl', name: 'example.com' });
      expect(decodeMatchTerm('"my acl"')).toEqual({ kind: 'acl', name: 'my acl' });
    });

    it('reads a quoted dotted quad as an ACL, not an address', () => {
      expect(decodeMatchTerm('"10.1.1.1"')).toEqual({ kind: 'acl', name: '10.1.1.1' });
    });

    it('decodes nested lists', () => {
      expect(decodeMatchTerm('{ a; b; }')).toEqual({
        kind: 'nested',
        terms: [
          { kind: 'acl', name: 'a' },
          { kind: 'acl', name: 'b' },
        ],
      });
    });
  });

  describe('lists', () => {
    const text = '{ 10.0.0.0/8; !bogons; key "xfer"; { a; b; }; }';
    const terms: MatchTerm[] = [
      { kind: 'address', address: '10.0.0.0/8' },
      { kind: 'acl', name: 'bogons', negated: true },
      { kind: 'key', key: 'xfer' },
      {
        kind: 'nested',
        terms: [
          { kind: 'acl', name: 'a' },
          { kind: 'acl', name: 'b' },
        ],
      },
    ];

    it('decodes every kind of term', () => {
      expect(decodeMatchList(text)).toEqual(terms);
    });

    it('encodes back to the canonical text', () => {
      expect(encodeMatchList(terms)).toBe(text);
    });

    it('encodes an empty list as empty braces', () => {
      expect(encodeMatchList([])).toBe('{ }');
      expect(decodeMatchList('{ }')).toEqual([]);
    });

    it('quotes ACL names that need it', () => {
      expect(encodeMatchTerm({ kind: 'acl', name: 'my acl', negated: true })).toBe('!"my acl"');
    });
  });

  describe('cycles', () => {
    it('refuses a list that contains itself', () => {
      const terms: MatchTerm[] = [];
      terms.push({ kind: 'nested', terms });
      expect(() => encodeMatchList(terms)).toThrow(CyclicMatchListError);
    });

    it('allows the same sublist twice side by side', () => {
      const shared: MatchTerm[] = [{ kind: 'acl', name: 'a' }];
      const terms: MatchTerm[] = [
        { kind: 'nested', terms: shared },
        { kind: 'nested', terms: shared },
      ];
      expect(encodeMatchList(terms)).toBe('{ { a; }; { a; }; }');
    });
  });
});
