import { describe, it, expect } from 'vitest';
import type { ConfNode } from '../src/cst';
import { blockStatement, createTree, isStatement, rawFragment, render, simpleStatement } from '../src/cst';
import { decode, emptyConfig, loadConfig } from '../src/parser';
import { apply, buildLogging, buildOptions, buildZone, encode, MissingTreeError, syncKeyword } from '../src/encoder';
import { setRecursion } from '../src/accessors';
import { sampleNodes } from './fixtures';

function keywords(nodes: ConfNode[]): string[] {
  return nodes.map(node => (isStatement(node) ? node.keyword : 'raw'));
}

describe('encoder', () => {
  describe('builders', () => {
    it('renders a zone in canonical form', () => {
      const zone = buildZone({
        name: 'example.org',
        class: 'IN',
        type: 'primary',
        file: 'db.example.org',
        allowUpdate: [{ kind: 'key', key: 'ddns' }],
        other: [{ name: 'notify', raw: 'explicit' }],
      });

      expect(render([zone])).toBe(
        'zone "example.org" IN {\n' +
          '\ttype primary;\n' +
          '\tfile "db.example.org";\n' +
          '\tallow-update { key "ddns"; };\n' +
          '\tnotify explicit;\n' +
          '};\n',
      );
    });

    it('emits an empty list but not an absent one', () => {
      expect(render([buildOptions({ allowQuery: [], other: [] })])).toBe('options {\n\tallow-query { };\n};\n');
      expect(render([buildOptions({ other: [] })])).toBe('options {\n};\n');
    });

    it('renders log channels and categories', () => {
      const logging = buildLogging({
        channels: [{ name: 'audit', destination: { kind: 'syslog', facility: 'daemon' }, printTime: true }],
        categories: [{ name: 'security', channels: ['audit'] }],
      });

      expect(render([logging])).toBe(
        'logging {\n' +
          '\tchannel "audit" {\n' +
          '\t\tsyslog daemon;\n' +
          '\t\tprint-time yes;\n' +
          '\t};\n' +
          '\tcategory "security" { "audit"; };\n' +
          '};\n',
      );
    });
  });

  describe('synchronization', () => {
    it('leaves unmodeled nodes as the same objects', () => {
      const nodes = sampleNodes();
      const result = encode(decode(nodes), nodes);

      expect(result[0]).toBe(nodes[0]);
      expect(result[1]).toBe(nodes[11]);
      expect(keywords(result).slice(0, 2)).toEqual(['raw', 'statistics-channels']);
    });

    it('leaves unmodeled nodes untouched after the model is edited', () => {
      const nodes = sampleNodes();
      const stats = nodes[11];
      const config = decode(nodes);
      config.zones = [];
      setRecursion(config, true);

      const result = encode(config, nodes);

      expect(result[1]).toBe(stats);
      expect(render([result[1]])).toBe('statistics-channels { inet 127.0.0.1 port 8080; };\n');
      expect(keywords(result)).not.toContain('zone');
    });

    it('writes list-level forwarder and also-notify modifiers back unchanged', () => {
      const nodes: ConfNode[] = [
        blockStatement('options', [simpleStatement('forwarders port 853 tls "dot" { 192.0.2.53; 198.51.100.53; }')]),
        blockStatement('zone "example.org"', [simpleStatement('also-notify port 5353 { 192.0.2.9; }')]),
      ];

      expect(render(encode(decode(nodes), nodes))).toBe(
        'options {\n' +
          '\tforwarders port 853 tls "dot" { 192.0.2.53; 198.51.100.53; };\n' +
          '};\n' +
          'zone "example.org" {\n' +
          '\talso-notify port 5353 { 192.0.2.9; };\n' +
          '};\n',
      );
    });

    it('does not modify the input list', () => {
      const nodes = sampleNodes();
      const before = [...nodes];
      encode(emptyConfig(), nodes);

      expect(nodes).toEqual(before);
    });

    it('removes every view when the collection is emptied', () => {
      const nodes = sampleNodes();
      const config = decode(nodes);
      config.views = [];

      expect(keywords(encode(config, nodes))).not.toContain('view');
    });

    it('removes an absent singleton', () => {
      const nodes = sampleNodes();
      const config = decode(nodes);
      delete config.options;

      expect(keywords(encode(config, nodes))).not.toContain('options');
    });

    it('decodes its own output to the same model', () => {
      const nodes = sampleNodes();
      const first = encode(decode(nodes), nodes);

      expect(decode(first)).toEqual(decode(nodes));
    });

    it('is idempotent', () => {
      const nodes = sampleNodes();
      const first = encode(decode(nodes), nodes);
      const second = encode(decode(first), first);

      expect(render(second)).toBe(render(first));
    });
  });

  describe('placement', () => {
    const nodes = (): ConfNode[] => [
      blockStatement('options', [simpleStatement('recursion no')]),
      rawFragment('// zones\n'),
      blockStatement('zone "a.example"', [simpleStatement('type primary')]),
      rawFragment('// more\n'),
      blockStatement('zone "b.example"', [simpleStatement('type primary')]),
    ];

    it('appends rebuilt blocks by default', () => {
      const input = nodes();
      expect(keywords(encode(decode(input), input))).toEqual(['raw', 'raw', 'options', 'zone', 'zone']);
    });

    it('puts rebuilt blocks where the first old one was', () => {
      const input = nodes();
      const result = encode(decode(input), input, { placement: 'in-place' });

      expect(keywords(result)).toEqual(['options', 'raw', 'zone', 'zone', 'raw']);
    });

    it('appends keywords that had no statement yet', () => {
      const result = syncKeyword([rawFragment('\n')], 'include', [simpleStatement('include "x.conf"')], 'in-place');
      expect(keywords(result)).toEqual(['raw', 'include']);
    });
  });

  describe('apply', () => {
    it('writes into the tree the config came from', () => {
      const tree = createTree(sampleNodes());
      const config = loadConfig(tree);
      config.zones = [];

      expect(apply(config)).toBe(tree);
      expect(keywords(tree.nodes)).not.toContain('zone');
    });

    it('throws without a tree', () => {
      expect(() => apply(emptyConfig())).toThrow(MissingTreeError);
    });
  });
});
