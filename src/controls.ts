/**
 * named-model — Control Channels
 *
 *   inet 127.0.0.1 port 953 allow { localhost; } keys { "rndc-key"; } read-only no;
 *   unix "/run/named/rndc.sock" perm 0600 owner 0 group 0 keys { "rndc-key"; };
 *
 * Both forms are read with a tokenizer and keyword lookahead, so a value
 * that happens to spell a keyword (an ACL called `allow`, say) stays a value.
 */

import type { ControlInet, ControlUnix } from './types';
import type { DropFn } from './servers';
import { decodeMatchList, encodeMatchList } from './match-list';
import { decodeBool, decodeInt, decodeStringList, encodeBool, encodeStringList, quote, tokenize, unquote } from './tokens';

const ignore: DropFn = () => {};

const OCTAL = /^0[0-7]*$/;

/** C-style number: a leading zero means octal. */
function decodeMode(text: string): number | undefined {
  if (OCTAL.test(text)) return Number.parseInt(text, 8);
  return decodeInt(text);
}

function encodeMode(mode: number): string {
  return `0${mode.toString(8)}`;
}

/**
 * Decode an `inet` control channel. The leading `inet` keyword is optional.
 *
 * @example
 * ```ts
 * decodeControlInet('inet 127.0.0.1 allow { allow; }').allow;
 * // [{ kind: 'acl', name: 'allow' }]
 * ```
 */
export function decodeControlInet(text: string, onDrop: DropFn = ignore): ControlInet {
  const tokens = tokenize(text);
  if (tokens[0] === 'inet') tokens.shift();

  const [address = '', ...rest] = tokens;
  const control: ControlInet = { address, allow: [] };

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    const next = rest[i + 1];

    if (next === undefined) {
      onDrop(token);
      continue;
    }

    switch (token) {
      case 'port': {
        const port = decodeInt(next);
        if (port !== undefined) control.port = port;
        else onDrop(`port ${next}`);
        i++;
        break;
      }
      case 'allow':
        control.allow = decodeMatchList(next);
        i++;
        break;
      case 'keys':
        control.keys = decodeStringList(next);
        i++;
        break;
      case 'read-only': {
        const readOnly = decodeBool(next);
        if (readOnly !== undefined) control.readOnly = readOnly;
        i++;
        break;
      }
      default:
        onDrop(token);
    }
  }

  return control;
}

/** `inet <address> [port <n>] allow { … } [keys { … }] [read-only yes|no]` */
export function encodeControlInet(control: ControlInet): string {
  let text = `inet ${control.address}`;
  if (control.port !== undefined) text += ` port ${control.port}`;
  text += ` allow ${encodeMatchList(control.allow)}`;
  if (control.keys !== undefined && control.keys.length > 0) text += ` keys ${encodeStringList(control.keys)}`;
  if (control.readOnly !== undefined) text += ` read-only ${encodeBool(control.readOnly)}`;
  return text;
}

/** Decode a `unix` control channel. The leading `unix` keyword is optional. */
export function decodeControlUnix(text: string, onDrop: DropFn = ignore): ControlUnix {
  const tokens = tokenize(text);
  if (tokens[0] === 'unix') tokens.shift();

  const [path = '', ...rest] = tokens;
  const control: ControlUnix = { path: unquote(path), perm: 0, owner: 0, group: 0 };

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    const next = rest[i + 1];

    if (next === undefined) {
      onDrop(token);
      continue;
    }

    switch (token) {
      case 'perm':
        control.perm = decodeMode(next) ?? 0;
        i++;
        break;
      case 'owner':
        control.owner = decodeInt(next) ?? 0;
        i++;
        break;
      case 'group':
        control.group = decodeInt(next) ?? 0;
        i++;
        break;
      case 'keys':
        control.keys = decodeStringList(next);
        i++;
        break;
      case 'read-only': {
        const readOnly = decodeBool(next);
        if (readOnly !== undefined) control.readOnly = readOnly;
        i++;
        break;
      }
      default:
        onDrop(token);
    }
  }

  return control;
}

/** `unix "<path>" perm <mode> owner <uid> group <gid> [keys { … }] [read-only yes|no]` */
export function encodeControlUnix(control: ControlUnix): string {
  let text = `unix ${quote(control.path)} perm ${encodeMode(control.perm)} owner ${control.owner} group ${control.group}`;
  if (control.keys !== undefined && control.keys.length > 0) text += ` keys ${encodeStringList(control.keys)}`;
  if (control.readOnly !== undefined) text += ` read-only ${encodeBool(control.readOnly)}`;
  return text;
}
