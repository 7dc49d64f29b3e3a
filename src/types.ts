/**
 * named-model — Domain Types
 *
 * A JSON-friendly projection of named.conf. Every record here is plain
 * data: absent scalars are left out, and collections inside a decoded
 * block are always present (possibly empty).
 */

/** The whole configuration, one field per modeled top-level keyword. */
export interface NamedConfig {
  includes: Include[];
  acls: Acl[];
  keys: Key[];
  keyStores: KeyStore[];
  remoteServers: RemoteServers[];
  tls: TlsProfile[];
  http: HttpProfile[];
  controls?: Controls;
  logging?: Logging;
  options?: Options;
  trustAnchors: TrustAnchors[];
  views: View[];
  zones: Zone[];
}

/**
 * A child statement kept verbatim because no field models it.
 * `raw` is everything after the keyword, braces included.
 */
export interface RawOption {
  name: string;
  raw: string;
}

/** An `include "path";` directive. */
export interface Include {
  path: string;
}

// ---------------------------------------------------------------------------
// Address match lists
// ---------------------------------------------------------------------------

/**
 * One element of an address match list.
 * `negated` may combine with any kind.
 */
export type MatchTerm = AddressTerm | KeyTerm | AclTerm | NestedTerm;

export interface AddressTerm {
  kind: 'address';
  address: string;
  negated?: boolean;
}

export interface KeyTerm {
  kind: 'key';
  key: string;
  negated?: boolean;
}

export interface AclTerm {
  kind: 'acl';
  name: string;
  negated?: boolean;
}

export interface NestedTerm {
  kind: 'nested';
  terms: MatchTerm[];
  negated?: boolean;
}

export interface Acl {
  name: string;
  elements: MatchTerm[];
}

// ---------------------------------------------------------------------------
// Keys, TLS and HTTP profiles
// ---------------------------------------------------------------------------

/** TSIG / rndc key. */
export interface Key {
  name: string;
  algorithm: string;
  secret: string;
  other?: RawOption[];
}

/** PKCS#11 key store. */
export interface KeyStore {
  name: string;
  pkcs11Uri?: string;
  other?: RawOption[];
}

export interface TlsProfile {
  name: string;
  caFile?: string;
  certFile?: string;
  keyFile?: string;
  cipherSuites?: string;
  ciphers?: string;
  dhparamFile?: string;
  preferServerCiphers?: boolean;
  protocols?: string[];
  remoteHostname?: string;
  sessionTickets?: boolean;
  other?: RawOption[];
}

/** DNS-over-HTTPS endpoint profile. */
export interface HttpProfile {
  name: string;
  endpoints?: string[];
  listenerClients?: number;
  streamsPerConnection?: number;
  other?: RawOption[];
}

// ---------------------------------------------------------------------------
// Servers
// ---------------------------------------------------------------------------

export interface Forwarder {
  address: string;
  port?: number;
  tls?: string;
}

export interface RemoteServerItem {
  address: string;
  port?: number;
  key?: string;
  tls?: string;
}

/** A reusable, named `remote-servers` list. */
export interface RemoteServers {
  name: string;
  /** Default port from the header, `remote-servers "x" port 5353 { … }`. */
  port?: number;
  servers: RemoteServerItem[];
  other?: RawOption[];
}

/** A `listen-on` / `listen-on-v6` directive. */
export interface Listen {
  port?: number;
  tls?: string;
  http?: string;
  addresses: MatchTerm[];
}

// ---------------------------------------------------------------------------
// Controls
// ---------------------------------------------------------------------------

export interface ControlInet {
  address: string;
  port?: number;
  allow: MatchTerm[];
  keys?: string[];
  readOnly?: boolean;
}

export interface ControlUnix {
  path: string;
  /** File mode; written in octal. */
  perm: number;
  owner: number;
  group: number;
  keys?: string[];
  readOnly?: boolean;
}

export interface Controls {
  inet: ControlInet[];
  unix: ControlUnix[];
  other?: RawOption[];
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export type LogDestination = LogFileDestination | LogSyslogDestination | LogStderrDestination | LogNullDestination;

export interface LogFileDestination {
  kind: 'file';
  path: string;
  versions?: number | 'unlimited';
  size?: string;
  suffix?: string;
}

export interface LogSyslogDestination {
  kind: 'syslog';
  facility?: string;
}

export interface LogStderrDestination {
  kind: 'stderr';
}

export interface LogNullDestination {
  kind: 'null';
}

export interface LogChannel {
  name: string;
  destination?: LogDestination;
  severity?: string;
  /** `yes`/`no`, or a timestamp format such as `iso8601`. */
  printTime?: boolean | string;
  printCategory?: boolean;
  printSeverity?: boolean;
  buffered?: boolean;
  other?: RawOption[];
}

/** A category and the channels it delivers to, in delivery order. */
export interface LogCategory {
  name: string;
  channels: string[];
}

export interface Logging {
  channels: LogChannel[];
  categories: LogCategory[];
  other?: RawOption[];
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RRsetOrder {
  class?: string;
  type?: string;
  name?: string;
  order: string;
}

export interface Options {
  directory?: string;
  recursion?: boolean;
  allowQuery?: MatchTerm[];
  allowTransfer?: MatchTerm[];
  allowUpdate?: MatchTerm[];
  listenOn?: Listen;
  listenOnV6?: Listen;
  forwarders?: Forwarder[];
  forward?: string;
  dnssecValidation?: string;
  rrsetOrder?: RRsetOrder[];
  /** Every option keyword without a field above, in document order. */
  other: RawOption[];
}

// ---------------------------------------------------------------------------
// Trust anchors, views and zones
// ---------------------------------------------------------------------------

/**
 * `record` is what gets written back; `kind` is derived from it on decode
 * and must agree with it.
 */
export interface TrustAnchorItem {
  name: string;
  kind: 'ds' | 'dnskey';
  /** Everything after the quoted name, e.g. `initial-ds 12345 8 2 "0123…"`. */
  record: string;
}

export interface TrustAnchors {
  items: TrustAnchorItem[];
}

export interface View {
  name: string;
  class?: string;
  matchClients?: MatchTerm[];
  matchDestinations?: MatchTerm[];
  recursion?: boolean;
  trustAnchors?: TrustAnchors;
  zones: Zone[];
  includes: Include[];
  other?: RawOption[];
}

export const ZONE_TYPES = [
  'primary',
  'secondary',
  'stub',
  'mirror',
  'redirect',
  'forward',
  'static-stub',
  'hint',
] as const;

export type ZoneType = (typeof ZONE_TYPES)[number];

/** Zone primaries: a named `remote-servers` reference or an inline list. */
export type ZonePrimaries =
  | { kind: 'ref'; name: string }
  | { kind: 'inline'; servers: RemoteServerItem[] };

export interface Zone {
  name: string;
  class?: string;
  type?: ZoneType;
  file?: string;
  primaries?: ZonePrimaries;
  forwarders?: Forwarder[];
  forward?: string;
  allowUpdate?: MatchTerm[];
  allowTransfer?: MatchTerm[];
  alsoNotify?: RemoteServerItem[];
  dnssecPolicy?: string;
  other?: RawOption[];
}
