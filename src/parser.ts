/**
 * named-model — Decoder
 *
 * Projects a named.conf syntax tree onto the typed model in one pass.
 * Each top-level statement is dispatched by keyword; keywords without a
 * decoder stay in the tree only. Inside a block, children are dispatched
 * the same way, and children no field models go to the block's `other`
 * bag (always for `options`, for the other blocks while `captureUnknown`
 * is on).
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
  LogFileDestination,
  Logging,
  NamedConfig,
  Options,
  RawOption,
  RemoteServers,
  TlsProfile,
  TrustAnchors,
  View,
  Zone,
  ZoneType,
} from './types';
import { ZONE_TYPES } from './types';
import { argumentText, bodyText, isStatement, statementText } from './cst';
import type { DiagnosticObserverFn } from './diagnostics';
import { decodeControlInet, decodeControlUnix } from './controls';
import { decodeMatchList } from './match-list';
import { decodeRRsetOrder } from './rrset-order';
import { decodeForwarders, decodeListen, decodeRemoteServerList } from './servers';
import type { DropFn } from './servers';
import { linkTree } from './tree-link';
import { decodeBool, decodeInt, decodeStringList, headerClass, headerName, tokenize, unquote, words } from './tokens';
import { decodeTrustAnchors } from './trust-anchors';

export interface DecodeOptions {
  /**
   * Keep unrecognized child statements of every block in its `other` bag.
   * When off, they are dropped (and reported) everywhere except `options`.
   * Default: true
   */
  captureUnknown?: boolean;
  /** Receives every captured, dropped or duplicate fragment. */
  onDiagnostic?: DiagnosticObserverFn;
}

/** A configuration with every collection empty and no singleton blocks. */
export function emptyConfig(): NamedConfig {
  return {
    includes: [],
    acls: [],
    keys: [],
    keyStores: [],
    remoteServers: [],
    tls: [],
    http: [],
    trustAnchors: [],
    views: [],
    zones: [],
  };
}

/**
 * Per-block decoding state: the scope label used in diagnostics and the
 * block's overflow bag.
 */
class BlockScope {
  readonly other: RawOption[] = [];

  constructor(
    private readonly decoder: Decoder,
    readonly label: string,
    private readonly alwaysCapture = false,
  ) {}

  /** Keep or drop a child statement no field models. */
  unknown(child: Statement): void {
    if (this.alwaysCapture || this.decoder.captureUnknown) {
      this.other.push({ name: child.keyword, raw: argumentText(child) });
      this.decoder.emit({ type: 'captured', scope: this.label, name: child.keyword });
    } else {
      this.dropped(statementText(child), 'unknown statement');
    }
  }

  dropped(text: string, reason: string): void {
    this.decoder.emit({ type: 'dropped', scope: this.label, text, reason });
  }

  /** A drop callback for the sub-grammar codecs. */
  dropFn(reason: string): DropFn {
    return text => this.dropped(text, reason);
  }
}

/** Set `other` on the entity when the scope kept anything. */
function attachBag(entity: { other?: RawOption[] }, scope: BlockScope): void {
  if (scope.other.length > 0) entity.other = scope.other;
}

function children(stmt: Statement): Statement[] {
  return stmt.body?.filter(isStatement) ?? [];
}

/** The value of a child statement: everything after its keyword. */
function valueOf(child: Statement): string {
  return argumentText(child);
}

/** The first word, when it is the only one. */
function singleWord(text: string): string | undefined {
  const fields = words(text);
  return fields.length === 1 ? fields[0] : undefined;
}

/** The braced part of a statement, e.g. the channel list of a category. */
function bracedPart(stmt: Statement): string {
  const text = argumentText(stmt);
  const start = text.indexOf('{');
  return start === -1 ? '' : text.slice(start);
}

function toZoneType(word: string | undefined): ZoneType | undefined {
  return ZONE_TYPES.find(type => type === word);
}

class Decoder {
  readonly captureUnknown: boolean;
  private readonly observer: DiagnosticObserverFn | undefined;

  constructor(options: DecodeOptions) {
    this.captureUnknown = options.captureUnknown ?? true;
    this.observer = options.onDiagnostic;
  }

  emit: DiagnosticObserverFn = event => {
    this.observer?.(event);
  };

  decode(nodes: ConfNode[]): NamedConfig {
    const config = emptyConfig();

    for (const node of nodes) {
      if (!isStatement(node)) continue;

      switch (node.keyword) {
        case 'include':
          config.includes.push(this.include(node));
          break;
        case 'acl':
          config.acls.push(this.acl(node));
          break;
        case 'key':
          config.keys.push(this.key(node));
          break;
        case 'key-store':
          config.keyStores.push(this.keyStore(node));
          break;
        case 'remote-servers':
          config.remoteServers.push(this.remoteServers(node));
          break;
        case 'tls':
          config.tls.push(this.tls(node));
          break;
        case 'http':
          config.http.push(this.http(node));
          break;
        case 'controls':
          if (config.controls) this.duplicate('controls');
          config.controls = this.controls(node);
          break;
        case 'logging':
          if (config.logging) this.duplicate('logging');
          config.logging = this.logging(node);
          break;
        case 'options':
          if (config.options) this.duplicate('options');
          config.options = this.options(node);
          break;
        case 'trust-anchors':
          config.trustAnchors.push(this.trustAnchors(node, new BlockScope(this, 'trust-anchors')));
          break;
        case 'view':
          config.views.push(this.view(node));
          break;
        case 'zone':
          config.zones.push(this.zone(node));
          break;
        default:
          // left in the tree
          break;
      }
    }

    return config;
  }

  private duplicate(keyword: string): void {
    this.emit({ type: 'duplicate', scope: 'config', keyword });
  }

  private include(stmt: Statement): Include {
    return { path: unquote(valueOf(stmt)) };
  }

  private acl(stmt: Statement): Acl {
    return { name: headerName(stmt), elements: decodeMatchList(bodyText(stmt)) };
  }

  private key(stmt: Statement): Key {
    const name = headerName(stmt);
    const scope = new BlockScope(this, `key "${name}"`);
    const key: Key = { name, algorithm: '', secret: '' };

    for (const child of children(stmt)) {
      switch (child.keyword) {
        case 'algorithm':
          key.algorithm = unquote(valueOf(child));
          break;
        case 'secret':
          key.secret = unquote(valueOf(child));
          break;
        default:
          scope.unknown(child);
      }
    }

    attachBag(key, scope);
    return key;
  }

  private keyStore(stmt: Statement): KeyStore {
    const name = headerName(stmt);
    const scope = new BlockScope(this, `key-store "${name}"`);
    const store: KeyStore = { name };

    for (const child of children(stmt)) {
      if (child.keyword === 'pkcs11-uri') {
        store.pkcs11Uri = unquote(valueOf(child));
      } else {
        scope.unknown(child);
      }
    }

    attachBag(store, scope);
    return store;
  }

  private remoteServers(stmt: Statement): RemoteServers {
    const name = headerName(stmt);
    const scope = new BlockScope(this, `remote-servers "${name}"`);
    const list: RemoteServers = {
      name,
      servers: decodeRemoteServerList(bodyText(stmt), scope.dropFn('unknown server option')),
    };

    // keyword and name come first
    const head = tokenize(stmt.head).slice(2);
    const unknown: string[] = [];
    for (let i = 0; i < head.length; i++) {
      const port = head[i] === 'port' ? decodeInt(head[i + 1] ?? '') : undefined;
      if (port !== undefined) {
        list.port = port;
        i++;
      } else {
        unknown.push(head[i]);
      }
    }
    if (unknown.length > 0) scope.dropped(unknown.join(' '), 'unknown header option');

    return list;
  }

  private tls(stmt: Statement): TlsProfile {
    const name = headerName(stmt);
    const scope = new BlockScope(this, `tls "${name}"`);
    const profile: TlsProfile = { name };

    for (const child of children(stmt)) {
      const value = valueOf(child);
      switch (child.keyword) {
        case 'ca-file':
          profile.caFile = unquote(value);
          break;
        case 'cert-file':
          profile.certFile = unquote(value);
          break;
        case 'key-file':
          profile.keyFile = unquote(value);
          break;
        case 'cipher-suites':
          profile.cipherSuites = unquote(value);
          break;
        case 'ciphers':
          profile.ciphers = unquote(value);
          break;
        case 'dhparam-file':
          profile.dhparamFile = unquote(value);
          break;
        case 'prefer-server-ciphers': {
          const flag = decodeBool(value);
          if (flag === undefined) scope.unknown(child);
          else profile.preferServerCiphers = flag;
          break;
        }
        case 'protocols':
          profile.protocols = decodeStringList(value);
          break;
        case 'remote-hostname':
          profile.remoteHostname = unquote(value);
          break;
        case 'session-tickets': {
          const flag = decodeBool(value);
          if (flag === undefined) scope.unknown(child);
          else profile.sessionTickets = flag;
          break;
        }
        default:
          scope.unknown(child);
      }
    }

    attachBag(profile, scope);
    return profile;
  }

  private http(stmt: Statement): HttpProfile {
    const name = headerName(stmt);
    const scope = new BlockScope(this, `http "${name}"`);
    const profile: HttpProfile = { name };

    for (const child of children(stmt)) {
      const value = valueOf(child);
      switch (child.keyword) {
        case 'endpoints':
          profile.endpoints = decodeStringList(value);
          break;
        case 'listener-clients': {
          const count = decodeInt(value);
          if (count === undefined) scope.unknown(child);
          else profile.listenerClients = count;
          break;
        }
        case 'streams-per-connection': {
          const count = decodeInt(value);
          if (count === undefined) scope.unknown(child);
          else profile.streamsPerConnection = count;
          break;
        }
        default:
          scope.unknown(child);
      }
    }

    attachBag(profile, scope);
    return profile;
  }

  private controls(stmt: Statement): Controls {
    const scope = new BlockScope(this, 'controls');
    const controls: Controls = { inet: [], unix: [] };
    const onDrop = scope.dropFn('unknown control option');

    for (const child of children(stmt)) {
      if (child.keyword === 'inet') {
        controls.inet.push(decodeControlInet(statementText(child), onDrop));
      } else if (child.keyword === 'unix') {
        controls.unix.push(decodeControlUnix(statementText(child), onDrop));
      } else {
        scope.unknown(child);
      }
    }

    attachBag(controls, scope);
    return controls;
  }

  private logging(stmt: Statement): Logging {
    const scope = new BlockScope(this, 'logging');
    const logging: Logging = { channels: [], categories: [] };

    for (const child of children(stmt)) {
      if (child.keyword === 'channel') {
        logging.channels.push(this.channel(child));
      } else if (child.keyword === 'category') {
        logging.categories.push(this.category(child));
      } else {
        scope.unknown(child);
      }
    }

    attachBag(logging, scope);
    return logging;
  }

  private channel(stmt: Statement): LogChannel {
    const name = headerName(stmt);
    const scope = new BlockScope(this, `channel "${name}"`);
    const channel: LogChannel = { name };

    for (const child of children(stmt)) {
      const value = valueOf(child);
      switch (child.keyword) {
        case 'file':
          channel.destination = this.fileDestination(value, scope);
          break;
        case 'syslog': {
          const [facility] = words(value);
          channel.destination = facility === undefined ? { kind: 'syslog' } : { kind: 'syslog', facility };
          break;
        }
        case 'stderr':
          channel.destination = { kind: 'stderr' };
          break;
        case 'null':
          channel.destination = { kind: 'null' };
          break;
        case 'severity':
          channel.severity = value;
          break;
        case 'print-time': {
          const flag = decodeBool(value);
          const format = singleWord(value);
          if (flag !== undefined) channel.printTime = flag;
          else if (format !== undefined) channel.printTime = format;
          else scope.unknown(child);
          break;
        }
        case 'print-category':
        case 'print-severity':
        case 'buffered': {
          const flag = decodeBool(value);
          if (flag === undefined) scope.unknown(child);
          else if (child.keyword === 'print-category') channel.printCategory = flag;
          else if (child.keyword === 'print-severity') channel.printSeverity = flag;
          else channel.buffered = flag;
          break;
        }
        default:
          scope.unknown(child);
      }
    }

    attachBag(channel, scope);
    return channel;
  }

  private fileDestination(value: string, scope: BlockScope): LogFileDestination {
    const [path = '', ...rest] = tokenize(value);
    const file: LogFileDestination = { kind: 'file', path: unquote(path) };

    for (let i = 0; i < rest.length; i++) {
      const next = rest[i + 1];
      if (next === undefined) {
        scope.dropped(rest[i], 'unknown file option');
        continue;
      }

      switch (rest[i]) {
        case 'versions': {
          const versions = next === 'unlimited' ? 'unlimited' : decodeInt(next);
          if (versions !== undefined) file.versions = versions;
          else scope.dropped(`versions ${next}`, 'invalid file versions');
          i++;
          break;
        }
        case 'size':
          file.size = next;
          i++;
          break;
        case 'suffix':
          file.suffix = next;
          i++;
          break;
        default:
          scope.dropped(rest[i], 'unknown file option');
      }
    }

    return file;
  }

  private category(stmt: Statement): LogCategory {
    return { name: headerName(stmt), channels: decodeStringList(bracedPart(stmt)) };
  }

  private options(stmt: Statement): Options {
    const scope = new BlockScope(this, 'options', true);
    const options: Options = { other: scope.other };

    for (const child of children(stmt)) {
      const value = valueOf(child);
      switch (child.keyword) {
        case 'directory':
          options.directory = unquote(value);
          break;
        case 'recursion': {
          const flag = decodeBool(value);
          if (flag === undefined) scope.unknown(child);
          else options.recursion = flag;
          break;
        }
        case 'allow-query':
          options.allowQuery = decodeMatchList(value);
          break;
        case 'allow-transfer':
          options.allowTransfer = decodeMatchList(value);
          break;
        case 'allow-update':
          options.allowUpdate = decodeMatchList(value);
          break;
        case 'listen-on':
          if (options.listenOn) scope.unknown(child);
          else options.listenOn = decodeListen(value, scope.dropFn('unknown listen-on option'));
          break;
        case 'listen-on-v6':
          if (options.listenOnV6) scope.unknown(child);
          else options.listenOnV6 = decodeListen(value, scope.dropFn('unknown listen-on-v6 option'));
          break;
        case 'forwarders':
          // list-level port/tls has no field
          if (value.startsWith('{')) options.forwarders = decodeForwarders(value, scope.dropFn('unknown forwarder option'));
          else scope.unknown(child);
          break;
        case 'forward': {
          const policy = singleWord(value);
          if (policy === undefined) scope.unknown(child);
          else options.forward = policy;
          break;
        }
        case 'dnssec-validation': {
          const mode = singleWord(value);
          if (mode === undefined) scope.unknown(child);
          else options.dnssecValidation = mode;
          break;
        }
        case 'rrset-order':
          options.rrsetOrder = decodeRRsetOrder(value);
          break;
        default:
          scope.unknown(child);
      }
    }

    return options;
  }

  private trustAnchors(stmt: Statement, scope: BlockScope): TrustAnchors {
    return decodeTrustAnchors(bodyText(stmt), scope.dropFn('not a DS or DNSKEY record'));
  }

  private view(stmt: Statement): View {
    const name = headerName(stmt);
    const scope = new BlockScope(this, `view "${name}"`);
    const view: View = { name, zones: [], includes: [] };

    const viewClass = headerClass(stmt);
    if (viewClass !== undefined) view.class = viewClass;

    for (const child of children(stmt)) {
      const value = valueOf(child);
      switch (child.keyword) {
        case 'match-clients':
          view.matchClients = decodeMatchList(value);
          break;
        case 'match-destinations':
          view.matchDestinations = decodeMatchList(value);
          break;
        case 'recursion': {
          const flag = decodeBool(value);
          if (flag === undefined) scope.unknown(child);
          else view.recursion = flag;
          break;
        }
        case 'trust-anchors':
          view.trustAnchors = this.trustAnchors(child, scope);
          break;
        case 'zone':
          view.zones.push(this.zone(child));
          break;
        case 'include':
          view.includes.push(this.include(child));
          break;
        default:
          scope.unknown(child);
      }
    }

    attachBag(view, scope);
    return view;
  }

  private zone(stmt: Statement): Zone {
    const name = headerName(stmt);
    const scope = new BlockScope(this, `zone "${name}"`);
    const zone: Zone = { name };

    const zoneClass = headerClass(stmt);
    if (zoneClass !== undefined) zone.class = zoneClass;

    for (const child of children(stmt)) {
      const value = valueOf(child);
      switch (child.keyword) {
        case 'type': {
          const type = toZoneType(singleWord(value));
          if (type === undefined) scope.unknown(child);
          else zone.type = type;
          break;
        }
        case 'file':
          zone.file = unquote(value);
          break;
        case 'primaries':
          if (value.startsWith('{')) {
            zone.primaries = {
              kind: 'inline',
              servers: decodeRemoteServerList(value, scope.dropFn('unknown primaries option')),
            };
          } else {
            const ref = tokenize(value);
            if (ref.length === 1) zone.primaries = { kind: 'ref', name: unquote(ref[0]) };
            else scope.unknown(child);
          }
          break;
        case 'forwarders':
          if (value.startsWith('{')) zone.forwarders = decodeForwarders(value, scope.dropFn('unknown forwarder option'));
          else scope.unknown(child);
          break;
        case 'forward': {
          const policy = singleWord(value);
          if (policy === undefined) scope.unknown(child);
          else zone.forward = policy;
          break;
        }
        case 'allow-update':
          zone.allowUpdate = decodeMatchList(value);
          break;
        case 'allow-transfer':
          zone.allowTransfer = decodeMatchList(value);
          break;
        case 'also-notify':
          if (value.startsWith('{')) {
            zone.alsoNotify = decodeRemoteServerList(value, scope.dropFn('unknown also-notify option'));
          } else {
            scope.unknown(child);
          }
          break;
        case 'dnssec-policy':
          zone.dnssecPolicy = unquote(value);
          break;
        default:
          scope.unknown(child);
      }
    }

    attachBag(zone, scope);
    return zone;
  }
}

/**
 * Decode a top-level node list into the typed model.
 *
 * Never throws: content that cannot be modeled is kept in an overflow bag
 * or dropped, and either way reported to `onDiagnostic`.
 */
export function decode(nodes: ConfNode[], options: DecodeOptions = {}): NamedConfig {
  return new Decoder(options).decode(nodes);
}

/**
 * Decode a tree and remember it, so the model can later be saved back
 * through {@link saveConfig} or {@link apply} without passing the tree.
 */
export function loadConfig(tree: ConfTree, options: DecodeOptions = {}): NamedConfig {
  const config = decode(tree.nodes, options);
  linkTree(config, tree);
  return config;
}
