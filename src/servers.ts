/**
 * named-model — Listen Clauses and Server Lists
 *
 *   listen-on port 53 tls "local-tls" { 127.0.0.1; };
 *   forwarders { 192.0.2.53 port 853 tls "dot"; 198.51.100.53; };
 *   primaries { 192.0.2.1 key "xfer-key"; };
 *
 * Keywords that a form does not know are passed to `onDrop` and skipped.
 */

import type { Forwarder, Listen, RemoteServerItem } from './types';
import { decodeMatchList, encodeMatchList } from './match-list';
import { decodeInt, quote, splitTopLevel, tokenize, unquote, unwrapBraces } from './tokens';

export type DropFn = (text: string) => void;

const ignore: DropFn = () => {};

/**
 * Decode `[port <n>] [tls <name>] [http <name>] { <match list> }`.
 * The keyword pairs may appear in any order before the list.
 */
export function decodeListen(text: string, onDrop: DropFn = ignore): Listen {
  const listen: Listen = { addresses: [] };
  const tokens = tokenize(text);

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const next = tokens[i + 1];

    if (token.startsWith('{')) {
      listen.addresses = decodeMatchList(token);
      continue;
    }

    if (next !== undefined && (token === 'port' || token === 'tls' || token === 'http')) {
      i++;
      if (token === 'port') {
        const port = decodeInt(next);
        if (port !== undefined) listen.port = port;
        else onDrop(`port ${next}`);
      } else if (token === 'tls') {
        listen.tls = unquote(next);
      } else {
        listen.http = unquote(next);
      }
      continue;
    }

    onDrop(token);
  }

  return listen;
}

/** `port 53 tls "t" http "h" { … }`, keyword pairs only when set. */
export function encodeListen(listen: Listen): string {
  const parts: string[] = [];
  if (listen.port !== undefined) parts.push(`port ${listen.port}`);
  if (listen.tls !== undefined) parts.push(`tls ${quote(listen.tls)}`);
  if (listen.http !== undefined) parts.push(`http ${quote(listen.http)}`);
  parts.push(encodeMatchList(listen.addresses));
  return parts.join(' ');
}

/** Decode one `address [port <n>] [tls <name>]` entry. */
export function decodeForwarder(text: string, onDrop: DropFn = ignore): Forwarder {
  const [address = '', ...rest] = tokenize(text);
  const forwarder: Forwarder = { address };

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    const next = rest[i + 1];

    if (token === 'port' && next !== undefined) {
      const port = decodeInt(next);
      if (port !== undefined) forwarder.port = port;
      i++;
    } else if (token === 'tls' && next !== undefined) {
      forwarder.tls = unquote(next);
      i++;
    } else {
      onDrop(token);
    }
  }

  return forwarder;
}

export function encodeForwarder(forwarder: Forwarder): string {
  let text = forwarder.address;
  if (forwarder.port !== undefined) text += ` port ${forwarder.port}`;
  if (forwarder.tls !== undefined) text += ` tls ${quote(forwarder.tls)}`;
  return text;
}

export function decodeForwarders(text: string, onDrop: DropFn = ignore): Forwarder[] {
  return splitTopLevel(unwrapBraces(text)).map(entry => decodeForwarder(entry, onDrop));
}

/** `{ 192.0.2.53 port 853; 198.51.100.53; }` */
export function encodeForwarders(forwarders: Forwarder[]): string {
  if (forwarders.length === 0) return '{ }';
  return `{ ${forwarders.map(f => `${encodeForwarder(f)};`).join(' ')} }`;
}

/** Decode one `address [port <n>] [key <name>] [tls <name>]` entry. */
export function decodeRemoteServerItem(text: string, onDrop: DropFn = ignore): RemoteServerItem {
  const [address = '', ...rest] = tokenize(text);
  const item: RemoteServerItem = { address };

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    const next = rest[i + 1];

    if (token === 'port' && next !== undefined) {
      const port = decodeInt(next);
      if (port !== undefined) item.port = port;
      i++;
    } else if (token === 'key' && next !== undefined) {
      item.key = unquote(next);
      i++;
    } else if (token === 'tls' && next !== undefined) {
      item.tls = unquote(next);
      i++;
    } else {
      onDrop(token);
    }
  }

  return item;
}

export function encodeRemoteServerItem(item: RemoteServerItem): string {
  let text = item.address;
  if (item.port !== undefined) text += ` port ${item.port}`;
  if (item.key !== undefined) text += ` key ${quote(item.key)}`;
  if (item.tls !== undefined) text += ` tls ${quote(item.tls)}`;
  return text;
}

export function decodeRemoteServerList(text: string, onDrop: DropFn = ignore): RemoteServerItem[] {
  return splitTopLevel(unwrapBraces(text)).map(entry => decodeRemoteServerItem(entry, onDrop));
}

export function encodeRemoteServerList(items: RemoteServerItem[]): string {
  if (items.length === 0) return '{ }';
  return `{ ${items.map(item => `${encodeRemoteServerItem(item)};`).join(' ')} }`;
}
