/**
 * named-model — JSON Schema
 *
 * Zod schemas for the model, for configs that arrive as JSON (an API
 * request body, a file written by another tool). Output of these schemas
 * is exactly the shape `encode()` accepts.
 */

import { z } from 'zod';

import type {
  Acl,
  Controls,
  Forwarder,
  HttpProfile,
  Include,
  Key,
  KeyStore,
  Listen,
  LogCategory,
  LogChannel,
  Logging,
  MatchTerm,
  NamedConfig,
  Options,
  RawOption,
  RemoteServerItem,
  RemoteServers,
  RRsetOrder,
  TlsProfile,
  TrustAnchors,
  View,
  Zone,
} from './types';
import { ZONE_TYPES } from './types';
import { recordKind } from './trust-anchors';

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid config: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

const port = z.number().int().min(0).max(65535);
const negated = z.boolean().optional();

export const rawOptionSchema: z.ZodType<RawOption> = z.object({
  name: z.string().min(1),
  raw: z.string(),
});

const other = z.array(rawOptionSchema).optional();

export const matchTermSchema: z.ZodType<MatchTerm> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('address'), address: z.string().min(1), negated }),
    z.object({ kind: z.literal('key'), key: z.string().min(1), negated }),
    z.object({ kind: z.literal('acl'), name: z.string().min(1), negated }),
    z.object({ kind: z.literal('nested'), terms: z.array(matchTermSchema), negated }),
  ]),
);

const matchList = z.array(matchTermSchema);

export const includeSchema: z.ZodType<Include> = z.object({ path: z.string() });

export const aclSchema: z.ZodType<Acl> = z.object({
  name: z.string().min(1),
  elements: matchList,
});

export const keySchema: z.ZodType<Key> = z.object({
  name: z.string().min(1),
  algorithm: z.string(),
  secret: z.string(),
  other,
});

export const keyStoreSchema: z.ZodType<KeyStore> = z.object({
  name: z.string().min(1),
  pkcs11Uri: z.string().optional(),
  other,
});

export const remoteServerItemSchema: z.ZodType<RemoteServerItem> = z.object({
  address: z.string().min(1),
  port: port.optional(),
  key: z.string().optional(),
  tls: z.string().optional(),
});

export const remoteServersSchema: z.ZodType<RemoteServers> = z.object({
  name: z.string().min(1),
  port: port.optional(),
  servers: z.array(remoteServerItemSchema),
  other,
});

export const tlsProfileSchema: z.ZodType<TlsProfile> = z.object({
  name: z.string().min(1),
  caFile: z.string().optional(),
  certFile: z.string().optional(),
  keyFile: z.string().optional(),
  cipherSuites: z.string().optional(),
  ciphers: z.string().optional(),
  dhparamFile: z.string().optional(),
  preferServerCiphers: z.boolean().optional(),
  protocols: z.array(z.string()).optional(),
  remoteHostname: z.string().optional(),
  sessionTickets: z.boolean().optional(),
  other,
});

export const httpProfileSchema: z.ZodType<HttpProfile> = z.object({
  name: z.string().min(1),
  endpoints: z.array(z.string()).optional(),
  listenerClients: z.number().int().optional(),
  streamsPerConnection: z.number().int().optional(),
  other,
});

export const forwarderSchema: z.ZodType<Forwarder> = z.object({
  address: z.string().min(1),
  port: port.optional(),
  tls: z.string().optional(),
});

export const listenSchema: z.ZodType<Listen> = z.object({
  port: port.optional(),
  tls: z.string().optional(),
  http: z.string().optional(),
  addresses: matchList,
});

export const controlsSchema: z.ZodType<Controls> = z.object({
  inet: z.array(
    z.object({
      address: z.string().min(1),
      port: port.optional(),
      allow: matchList,
      keys: z.array(z.string()).optional(),
      readOnly: z.boolean().optional(),
    }),
  ),
  unix: z.array(
    z.object({
      path: z.string().min(1),
      perm: z.number().int().min(0),
      owner: z.number().int(),
      group: z.number().int(),
      keys: z.array(z.string()).optional(),
      readOnly: z.boolean().optional(),
    }),
  ),
  other,
});

const logDestination = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('file'),
    path: z.string().min(1),
    versions: z.union([z.number().int().min(0), z.literal('unlimited')]).optional(),
    size: z.string().optional(),
    suffix: z.string().optional(),
  }),
  z.object({ kind: z.literal('syslog'), facility: z.string().optional() }),
  z.object({ kind: z.literal('stderr') }),
  z.object({ kind: z.literal('null') }),
]);

export const logChannelSchema: z.ZodType<LogChannel> = z.object({
  name: z.string().min(1),
  destination: logDestination.optional(),
  severity: z.string().optional(),
  printTime: z.union([z.boolean(), z.string()]).optional(),
  printCategory: z.boolean().optional(),
  printSeverity: z.boolean().optional(),
  buffered: z.boolean().optional(),
  other,
});

export const logCategorySchema: z.ZodType<LogCategory> = z.object({
  name: z.string().min(1),
  channels: z.array(z.string()),
});

export const loggingSchema: z.ZodType<Logging> = z.object({
  channels: z.array(logChannelSchema),
  categories: z.array(logCategorySchema),
  other,
});

export const rrsetOrderSchema: z.ZodType<RRsetOrder> = z.object({
  class: z.string().optional(),
  type: z.string().optional(),
  name: z.string().optional(),
  order: z.string().min(1),
});

export const optionsSchema: z.ZodType<Options, z.ZodTypeDef, unknown> = z.object({
  directory: z.string().optional(),
  recursion: z.boolean().optional(),
  allowQuery: matchList.optional(),
  allowTransfer: matchList.optional(),
  allowUpdate: matchList.optional(),
  listenOn: listenSchema.optional(),
  listenOnV6: listenSchema.optional(),
  forwarders: z.array(forwarderSchema).optional(),
  forward: z.string().optional(),
  dnssecValidation: z.string().optional(),
  rrsetOrder: z.array(rrsetOrderSchema).optional(),
  other: z.array(rawOptionSchema).default([]),
});

export const trustAnchorsSchema: z.ZodType<TrustAnchors> = z.object({
  items: z.array(
    z
      .object({
        name: z.string(),
        kind: z.enum(['ds', 'dnskey']),
        record: z.string().min(1),
      })
      .refine(item => recordKind(item.record) === item.kind, {
        message: 'kind does not match the record',
        path: ['kind'],
      }),
  ),
});

export const zoneSchema: z.ZodType<Zone> = z.object({
  name: z.string().min(1),
  class: z.string().optional(),
  type: z.enum(ZONE_TYPES).optional(),
  file: z.string().optional(),
  primaries: z
    .discriminatedUnion('kind', [
      z.object({ kind: z.literal('ref'), name: z.string().min(1) }),
      z.object({ kind: z.literal('inline'), servers: z.array(remoteServerItemSchema) }),
    ])
    .optional(),
  forwarders: z.array(forwarderSchema).optional(),
  forward: z.string().optional(),
  allowUpdate: matchList.optional(),
  allowTransfer: matchList.optional(),
  alsoNotify: z.array(remoteServerItemSchema).optional(),
  dnssecPolicy: z.string().optional(),
  other,
});

export const viewSchema: z.ZodType<View, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1),
  class: z.string().optional(),
  matchClients: matchList.optional(),
  matchDestinations: matchList.optional(),
  recursion: z.boolean().optional(),
  trustAnchors: trustAnchorsSchema.optional(),
  zones: z.array(zoneSchema).default([]),
  includes: z.array(includeSchema).default([]),
  other,
});

export const namedConfigSchema: z.ZodType<NamedConfig, z.ZodTypeDef, unknown> = z.object({
  includes: z.array(includeSchema).default([]),
  acls: z.array(aclSchema).default([]),
  keys: z.array(keySchema).default([]),
  keyStores: z.array(keyStoreSchema).default([]),
  remoteServers: z.array(remoteServersSchema).default([]),
  tls: z.array(tlsProfileSchema).default([]),
  http: z.array(httpProfileSchema).default([]),
  controls: controlsSchema.optional(),
  logging: loggingSchema.optional(),
  options: optionsSchema.optional(),
  trustAnchors: z.array(trustAnchorsSchema).default([]),
  views: z.array(viewSchema).default([]),
  zones: z.array(zoneSchema).default([]),
});

/**
 * Validate parsed JSON as a config. Missing top-level collections become
 * empty lists.
 *
 * @throws {ConfigValidationError} listing every issue as `path: message`
 */
export function configFromJSON(value: unknown): NamedConfig {
  const result = namedConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigValidationError(issues);
  }
  return result.data;
}
