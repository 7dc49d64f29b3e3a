import { describe, it, expect } from 'vitest';
import { blockStatement, simpleStatement } from '../src/cst';
import {
  decodeBool,
  decodeInt,
  decodeStringList,
  encodeStringList,
  headerClass,
  headerName,
  quoteIfNeeded,
  splitTopLevel,
  tokenize,
  unquote,
  unwrapBraces,
} from '../src/tokens';

describe('tokens', () => {
  describe('booleans', () => {
    it('reads yes and no case-insensitively', () => {
      expect(decodeBool('YES')).toBe(true);
      expect(decodeBool('no')).toBe(false);
    });

    it('leaves anything else unset', () => {
      expect(decodeBool('maybe')).toBeUndefined();
      expect(decodeBool('')).toBeUndefined();
    });
  });

  describe('integers', () => {
    it('parses the first word', () => {
      expect(decodeInt('953')).toBe(953);
      expect(decodeInt('-4 extra')).toBe(-4);
    });

    it('rejects partial numbers', () => {
      expect(decodeInt('12a')).toBeUndefined();
    });
  });

  describe('quoting', () => {
    it('removes one layer of quotes', () => {
      expect(unquote(' "a b" ')).toBe('a b');
      expect(unquote('""x""')).toBe('"x"');
      expect(unquote('"')).toBe('"');
    });

    it('quotes only names that need it', () => {
      expect(quoteIfNeeded('any')).toBe('any');
      expect(quoteIfNeeded('example.com')).toBe('"example.com"');
    });
  });

  describe('splitTopLevel', () => {
    it('keeps nested braces and quoted separators together', () => {
      expect(splitTopLevel('a; { b; c; }; "x;y"; ')).toEqual(['a', '{ b; c; }', '"x;y"']);
    });
  });

  describe('unwrapBraces', () => {
    it('strips one enclosing pair', () => {
      expect(unwrapBraces(' { a; { b; }; } ')).toBe('a; { b; };');
    });

    it('leaves two sibling groups alone', () => {
      expect(unwrapBraces('{ a; } { b; }')).toBe('{ a; } { b; }');
    });
  });

  describe('tokenize', () => {
    it('splits words, quoted strings and brace groups', () => {
      expect(tokenize('127.0.0.1 port 953 allow { localhost; }')).toEqual([
        '127.0.0.1',
        'port',
        '953',
        'allow',
        '{ localhost; }',
      ]);
    });

    it('treats semicolons as separators and skips stray braces', () => {
      expect(tokenize('a "b c";d }')).toEqual(['a', '"b c"', 'd']);
    });
  });

  describe('string lists', () => {
    it('decodes with or without braces', () => {
      expect(decodeStringList('{ "a"; b; }')).toEqual(['a', 'b']);
      expect(decodeStringList('"a"; "b"')).toEqual(['a', 'b']);
    });

    it('encodes quoted items', () => {
      expect(encodeStringList(['a', 'b'])).toBe('{ "a"; "b"; }');
      expect(encodeStringList([])).toBe('{ }');
    });
  });

  describe('headers', () => {
    it('reads a quoted name and class', () => {
      const zone = blockStatement('zone "example.com" IN', []);
      expect(headerName(zone)).toBe('example.com');
      expect(headerClass(zone)).toBe('IN');
    });

    it('falls back to bare words', () => {
      const view = blockStatement('view internal CH', []);
      expect(headerName(view)).toBe('internal');
      expect(headerClass(view)).toBe('CH');
    });

    it('has no class when none is written', () => {
      expect(headerClass(simpleStatement('zone "example.com"'))).toBeUndefined();
      expect(headerName(blockStatement('options', []))).toBe('');
    });
  });
});
