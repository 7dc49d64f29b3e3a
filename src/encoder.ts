/**
 * named-model — Encoder
 *
 * Rebuilds the statements of every modeled keyword from the typed model
 * and splices them into a node list. Nodes of other keywords, and raw
 * fragments, are kept as the same objects in the same relative order.
 *
 * Rebuilt blocks are content-equivalent to what was decoded, not
 * byte-identical: formatting and quoting are canonical.
 */

import type { ConfNode, ConfTree, Statement } from './cst';
import type {
  Acl,
  Controls,
  HttpProfile,
  Include,
  Key,
  KeyStore,
  LogCategory,
  LogChannel,
  LogDestination,
  Logging,
  NamedConfig,
  Options,
  RawOption,
  RemoteServers,
  TlsProfile,
  TrustAnchors,
  View,
  Zone,
} from './types';
import { blockStatement, isStatement, simpleStatement } from './cst';
import { encodeControlInet, encodeControlUnix } from './controls';
import { encodeMatchList, encodeMatchTerm } from './match-list';
import { encodeRRsetOrder } from './rrset-order';
import { encodeForwarders, encodeListen, encodeRemoteServerItem, encodeRemoteServerList } from './servers';
import { linkTree, linkedTree } from './tree-link';
import { encodeBool, encodeStringList, quote, quoteIfNeeded } from './tokens';
import { encodeTrustAnchorEntry } from './trust-anchors';

export class MissingTreeError extends Error {
  constructor() {
    super('No syntax tree for this config; decode it with loadConfig() or pass a tree');
    this.name = 'MissingTreeError';
  }
}

/**
 * Where rebuilt statements go.
 * - `append`: after every other node, in keyword order
 * - `in-place`: where the first old statement of the same keyword was;
 *   keywords that had no statement are appended
 */
export type Placement = 'append' | 'in-place';

export interface EncodeOptions {
  /** Default: 'append' */
  placement?: Placement;
}

/** Top-level keywords owned by the model, in the order they are synced. */
export const MODELED_KEYWORDS = [
  'include',
  'acl',
  'key',
  'key-store',
  'remote-servers',
  'tls',
  'http',
  'controls',
  'logging',
  'options',
  'trust-anchors',
  'view',
  'zone',
] as const;

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

function line(text: string): Statement {
  return simpleStatement(text);
}

function otherLines(other: RawOption[] | undefined): Statement[] {
  return (other ?? []).map(option => line(option.raw ? `${option.name} ${option.raw}` : option.name));
}

function headWithClass(keyword: string, name: string, klass: string | undefined): string {
  const head = `${keyword} ${quote(name)}`;
  return klass ? `${head} ${klass}` : head;
}

export function buildInclude(include: Include): Statement {
  return line(`include ${quote(include.path)}`);
}

export function buildAcl(acl: Acl): Statement {
  return blockStatement(
    `acl ${quote(acl.name)}`,
    acl.elements.map(term => line(encodeMatchTerm(term))),
  );
}

export function buildKey(key: Key): Statement {
  return blockStatement(`key ${quote(key.name)}`, [
    line(`algorithm ${quoteIfNeeded(key.algorithm)}`),
    line(`secret ${quote(key.secret)}`),
    ...otherLines(key.other),
  ]);
}

export function buildKeyStore(store: KeyStore): Statement {
  const body: Statement[] = [];
  if (store.pkcs11Uri !== undefined) body.push(line(`pkcs11-uri ${quote(store.pkcs11Uri)}`));
  return blockStatement(`key-store ${quote(store.name)}`, [...body, ...otherLines(store.other)]);
}

export function buildRemoteServers(list: RemoteServers): Statement {
  let head = `remote-servers ${quote(list.name)}`;
  if (list.port !== undefined) head += ` port ${list.port}`;
  return blockStatement(head, [
    ...list.servers.map(item => line(encodeRemoteServerItem(item))),
    ...otherLines(list.other),
  ]);
}

export function buildTls(profile: TlsProfile): Statement {
  const body: Statement[] = [];
  const quoted = (keyword: string, value: string | undefined): void => {
    if (value !== undefined) body.push(line(`${keyword} ${quote(value)}`));
  };
  const flag = (keyword: string, value: boolean | undefined): void => {
    if (value !== undefined) body.push(line(`${keyword} ${encodeBool(value)}`));
  };

  quoted('ca-file', profile.caFile);
  quoted('cert-file', profile.certFile);
  quoted('key-file', profile.keyFile);
  quoted('cipher-suites', profile.cipherSuites);
  quoted('ciphers', profile.ciphers);
  quoted('dhparam-file', profile.dhparamFile);
  flag('prefer-server-ciphers', profile.preferServerCiphers);
  if (profile.protocols !== undefined) body.push(line(`protocols ${encodeStringList(profile.protocols)}`));
  quoted('remote-hostname', profile.remoteHostname);
  flag('session-tickets', profile.sessionTickets);

  return blockStatement(`tls ${quote(profile.name)}`, [...body, ...otherLines(profile.other)]);
}

export function buildHttp(profile: HttpProfile): Statement {
  const body: Statement[] = [];
  if (profile.endpoints !== undefined) body.push(line(`endpoints ${encodeStringList(profile.endpoints)}`));
  if (profile.listenerClients !== undefined) body.push(line(`listener-clients ${profile.listenerClients}`));
  if (profile.streamsPerConnection !== undefined) {
    body.push(line(`streams-per-connection ${profile.streamsPerConnection}`));
  }
  return blockStatement(`http ${quote(profile.name)}`, [...body, ...otherLines(profile.other)]);
}

export function buildControls(controls: Controls): Statement {
  return blockStatement('controls', [
    ...controls.inet.map(control => line(encodeControlInet(control))),
    ...controls.unix.map(control => line(encodeControlUnix(control))),
    ...otherLines(controls.other),
  ]);
}

function destinationLine(destination: LogDestination): Statement {
  switch (destination.kind) {
    case 'file': {
      const parts = ['file', quote(destination.path)];
      if (destination.versions !== undefined) parts.push(`versions ${destination.versions}`);
      if (destination.size !== undefined) parts.push(`size ${destination.size}`);
      if (destination.suffix !== undefined) parts.push(`suffix ${destination.suffix}`);
      return line(parts.join(' '));
    }
    case 'syslog':
      return line(destination.facility ? `syslog ${destination.facility}` : 'syslog');
    case 'stderr':
      return line('stderr');
    case 'null':
      return line('null');
  }
}

export function buildLogChannel(channel: LogChannel): Statement {
  const body: Statement[] = [];
  const flag = (keyword: string, value: boolean | undefined): void => {
    if (value !== undefined) body.push(line(`${keyword} ${encodeBool(value)}`));
  };

  if (channel.destination) body.push(destinationLine(channel.destination));
  if (channel.severity !== undefined) body.push(line(`severity ${channel.severity}`));
  if (typeof channel.printTime === 'string') body.push(line(`print-time ${channel.printTime}`));
  else flag('print-time', channel.printTime);
  flag('print-category', channel.printCategory);
  flag('print-severity', channel.printSeverity);
  flag('buffered', channel.buffered);

  return blockStatement(`channel ${quote(channel.name)}`, [...body, ...otherLines(channel.other)]);
}

export function buildLogCategory(category: LogCategory): Statement {
  return line(`category ${quote(category.name)} ${encodeStringList(category.channels)}`);
}

export function buildLogging(logging: Logging): Statement {
  return blockStatement('logging', [
    ...logging.channels.map(buildLogChannel),
    ...logging.categories.map(buildLogCategory),
    ...otherLines(logging.other),
  ]);
}

export function buildOptions(options: Options): Statement {
  const body: Statement[] = [];
  const add = (text: string): void => {
    body.push(line(text));
  };

  if (options.directory !== undefined) add(`directory ${quote(options.directory)}`);
  if (options.recursion !== undefined) add(`recursion ${encodeBool(options.recursion)}`);
  if (options.allowQuery !== undefined) add(`allow-query ${encodeMatchList(options.allowQuery)}`);
  if (options.allowTransfer !== undefined) add(`allow-transfer ${encodeMatchList(options.allowTransfer)}`);
  if (options.allowUpdate !== undefined) add(`allow-update ${encodeMatchList(options.allowUpdate)}`);
  if (options.listenOn !== undefined) add(`listen-on ${encodeListen(options.listenOn)}`);
  if (options.listenOnV6 !== undefined) add(`listen-on-v6 ${encodeListen(options.listenOnV6)}`);
  if (options.forwarders !== undefined) add(`forwarders ${encodeForwarders(options.forwarders)}`);
  if (options.forward !== undefined) add(`forward ${options.forward}`);
  if (options.dnssecValidation !== undefined) add(`dnssec-validation ${options.dnssecValidation}`);
  if (options.rrsetOrder !== undefined) add(`rrset-order ${encodeRRsetOrder(options.rrsetOrder)}`);

  return blockStatement('options', [...body, ...otherLines(options.other)]);
}

export function buildTrustAnchors(anchors: TrustAnchors): Statement {
  return blockStatement(
    'trust-anchors',
    anchors.items.map(item => line(encodeTrustAnchorEntry(item))),
  );
}

export function buildZone(zone: Zone): Statement {
  const body: Statement[] = [];
  const add = (text: string): void => {
    body.push(line(text));
  };

  if (zone.type !== undefined) add(`type ${zone.type}`);
  if (zone.file !== undefined) add(`file ${quote(zone.file)}`);
  if (zone.primaries?.kind === 'ref') add(`primaries ${quoteIfNeeded(zone.primaries.name)}`);
  if (zone.primaries?.kind === 'inline') add(`primaries ${encodeRemoteServerList(zone.primaries.servers)}`);
  if (zone.forwarders !== undefined) add(`forwarders ${encodeForwarders(zone.forwarders)}`);
  if (zone.forward !== undefined) add(`forward ${zone.forward}`);
  if (zone.allowUpdate !== undefined) add(`allow-update ${encodeMatchList(zone.allowUpdate)}`);
  if (zone.allowTransfer !== undefined) add(`allow-transfer ${encodeMatchList(zone.allowTransfer)}`);
  if (zone.alsoNotify !== undefined) add(`also-notify ${encodeRemoteServerList(zone.alsoNotify)}`);
  if (zone.dnssecPolicy !== undefined) add(`dnssec-policy ${quote(zone.dnssecPolicy)}`);

  return blockStatement(headWithClass('zone', zone.name, zone.class), [...body, ...otherLines(zone.other)]);
}

export function buildView(view: View): Statement {
  const body: Statement[] = [];
  const add = (text: string): void => {
    body.push(line(text));
  };

  if (view.matchClients !== undefined) add(`match-clients ${encodeMatchList(view.matchClients)}`);
  if (view.matchDestinations !== undefined) add(`match-destinations ${encodeMatchList(view.matchDestinations)}`);
  if (view.recursion !== undefined) add(`recursion ${encodeBool(view.recursion)}`);
  if (view.trustAnchors !== undefined) body.push(buildTrustAnchors(view.trustAnchors));
  body.push(...view.zones.map(buildZone));
  body.push(...view.includes.map(buildInclude));

  return blockStatement(headWithClass('view', view.name, view.class), [...body, ...otherLines(view.other)]);
}

// ---------------------------------------------------------------------------
// Synchronization
// ---------------------------------------------------------------------------

/**
 * Remove every statement of `keyword` and add `built` in its place
 * (`in-place`) or at the end (`append`).
 */
export function syncKeyword(
  nodes: ConfNode[],
  keyword: string,
  built: Statement[],
  placement: Placement = 'append',
): ConfNode[] {
  const kept: ConfNode[] = [];
  let anchor = -1;

  for (const node of nodes) {
    if (isStatement(node) && node.keyword === keyword) {
      if (anchor === -1) anchor = kept.length;
      continue;
    }
    kept.push(node);
  }

  if (placement === 'in-place' && anchor !== -1) {
    kept.splice(anchor, 0, ...built);
    return kept;
  }

  return [...kept, ...built];
}

function statementsFor(config: NamedConfig, keyword: (typeof MODELED_KEYWORDS)[number]): Statement[] {
  switch (keyword) {
    case 'include':
      return config.includes.map(buildInclude);
    case 'acl':
      return config.acls.map(buildAcl);
    case 'key':
      return config.keys.map(buildKey);
    case 'key-store':
      return config.keyStores.map(buildKeyStore);
    case 'remote-servers':
      return config.remoteServers.map(buildRemoteServers);
    case 'tls':
      return config.tls.map(buildTls);
    case 'http':
      return config.http.map(buildHttp);
    case 'controls':
      return config.controls ? [buildControls(config.controls)] : [];
    case 'logging':
      return config.logging ? [buildLogging(config.logging)] : [];
    case 'options':
      return config.options ? [buildOptions(config.options)] : [];
    case 'trust-anchors':
      return config.trustAnchors.map(buildTrustAnchors);
    case 'view':
      return config.views.map(buildView);
    case 'zone':
      return config.zones.map(buildZone);
  }
}

/**
 * Rebuild every modeled keyword of `nodes` from `config`.
 *
 * Returns a new list; `nodes` is not modified. An empty collection, or
 * an absent singleton, removes every statement of its keyword.
 */
export function encode(config: NamedConfig, nodes: ConfNode[], options: EncodeOptions = {}): ConfNode[] {
  const placement = options.placement ?? 'append';
  let result = nodes;

  for (const keyword of MODELED_KEYWORDS) {
    result = syncKeyword(result, keyword, statementsFor(config, keyword), placement);
  }

  return result;
}

/**
 * Encode `config` into a tree's node list. Without `tree`, the tree the
 * config was loaded from is used.
 *
 * @throws {MissingTreeError} when there is no tree to write into
 */
export function apply(config: NamedConfig, tree?: ConfTree, options: EncodeOptions = {}): ConfTree {
  const target = tree ?? linkedTree(config);
  if (!target) throw new MissingTreeError();

  target.nodes = encode(config, target.nodes, options);
  linkTree(config, target);
  return target;
}
