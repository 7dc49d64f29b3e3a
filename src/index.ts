/**
 * named-model
 *
 * A typed, editable projection of named.conf over a lossless syntax tree.
 * Modeled blocks are decoded into plain records and rebuilt from them on
 * save; everything else in the tree is left exactly as it was.
 */

import type { ConfNode, ConfTree } from './cst';
import { createTree, render } from './cst';
import type { DecodeOptions } from './parser';
import { decode, loadConfig } from './parser';
import type { NamedConfig } from './types';
import type { EncodeOptions } from './encoder';
import { encode } from './encoder';

// Re-export types
export type {
  NamedConfig,
  RawOption,
  Include,
  MatchTerm,
  AddressTerm,
  KeyTerm,
  AclTerm,
  NestedTerm,
  Acl,
  Key,
  KeyStore,
  TlsProfile,
  HttpProfile,
  Forwarder,
  RemoteServerItem,
  RemoteServers,
  Listen,
  ControlInet,
  ControlUnix,
  Controls,
  LogDestination,
  LogFileDestination,
  LogSyslogDestination,
  LogStderrDestination,
  LogNullDestination,
  LogChannel,
  LogCategory,
  Logging,
  RRsetOrder,
  Options,
  TrustAnchorItem,
  TrustAnchors,
  View,
  ZoneType,
  ZonePrimaries,
  Zone,
} from './types';
export { ZONE_TYPES } from './types';

export type { Statement, RawFragment, ConfNode, ConfTree } from './cst';
export {
  isStatement,
  blockStatement,
  simpleStatement,
  rawFragment,
  stripComments,
  statementText,
  argumentText,
  bodyText,
  render,
  createTree,
} from './cst';

export { decode, loadConfig, emptyConfig } from './parser';
export type { DecodeOptions } from './parser';
export {
  encode,
  apply,
  syncKeyword,
  MODELED_KEYWORDS,
  MissingTreeError,
  buildInclude,
  buildAcl,
  buildKey,
  buildKeyStore,
  buildRemoteServers,
  buildTls,
  buildHttp,
  buildControls,
  buildLogChannel,
  buildLogCategory,
  buildLogging,
  buildOptions,
  buildTrustAnchors,
  buildZone,
  buildView,
} from './encoder';
export type { EncodeOptions, Placement } from './encoder';

export {
  getZone,
  upsertZone,
  removeZone,
  findView,
  upsertView,
  removeView,
  setRecursion,
  upsertZoneInView,
  removeZoneInView,
  setTrustAnchorsInView,
  saveConfig,
} from './accessors';

export {
  decodeBool,
  encodeBool,
  decodeInt,
  unquote,
  quote,
  quoteIfNeeded,
  decodeStringList,
  encodeStringList,
  splitTopLevel,
  tokenize,
} from './tokens';
export { decodeMatchTerm, decodeMatchList, encodeMatchTerm, encodeMatchList, CyclicMatchListError } from './match-list';
export {
  decodeListen,
  encodeListen,
  decodeForwarder,
  encodeForwarder,
  decodeForwarders,
  encodeForwarders,
  decodeRemoteServerItem,
  encodeRemoteServerItem,
  decodeRemoteServerList,
  encodeRemoteServerList,
} from './servers';
export type { DropFn } from './servers';
export { decodeControlInet, encodeControlInet, decodeControlUnix, encodeControlUnix } from './controls';
export { decodeRRsetOrderEntry, decodeRRsetOrder, encodeRRsetOrderEntry, encodeRRsetOrder } from './rrset-order';
export { decodeTrustAnchorEntry, encodeTrustAnchorEntry, decodeTrustAnchors } from './trust-anchors';

export { createDiagnosticObserver } from './diagnostics';
export type { DiagnosticEvent, DiagnosticObserverFn, DroppedEvent, CapturedEvent, DuplicateEvent } from './diagnostics';

export {
  configFromJSON,
  ConfigValidationError,
  namedConfigSchema,
  matchTermSchema,
  viewSchema,
  zoneSchema,
  optionsSchema,
} from './schema';

/**
 * Decode a node list and encode it straight back: every modeled block in
 * canonical form, everything else untouched.
 *
 * @example
 * ```ts
 * import { normalize, simpleStatement } from 'named-model';
 *
 * normalize([simpleStatement('include "/etc/named/zones.conf"')]);
 * // 'include "/etc/named/zones.conf";\n'
 * ```
 */
export function normalize(
  nodes: ConfNode[],
  options: DecodeOptions & EncodeOptions = {},
): string {
  return render(encode(decode(nodes, options), nodes, options));
}

/**
 * Decode `nodes` into a config that can be saved straight away with
 * {@link saveConfig}, writing through an in-memory tree.
 */
export function fromNodes(nodes: ConfNode[], options?: DecodeOptions): { tree: ConfTree; config: NamedConfig } {
  const tree = createTree(nodes);
  return { tree, config: loadConfig(tree, options) };
}
