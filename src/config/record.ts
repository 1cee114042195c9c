/**
 * Configuration record schema and helpers
 *
 * The same zod schema guards `.setup-current.json` on load, so a record read
 * back from disk is held to the rules the collector enforced.
 */

import { z } from 'zod';
import { REDACTED } from '../monitoring/structured-logger.js';
import type { CloudTarget, ConfigurationRecord } from '../types.js';

export const ENCRYPTION_KEY_PATTERN = /^[0-9a-fA-F]{64}$/;

const CloudTargetSchema = z.discriminatedUnion('provider', [
  z.object({ provider: z.literal('aws'), profile: z.string().min(1), region: z.string().min(1) }).strict(),
  z
    .object({
      provider: z.literal('azure'),
      subscriptionId: z.string().min(1),
      location: z.string().min(1),
      resourceGroup: z.string().min(1),
    })
    .strict(),
  z
    .object({ provider: z.literal('gcp'), projectId: z.string().min(1), region: z.string().min(1), zone: z.string().min(1) })
    .strict(),
]);

const DatabaseSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sqlite') }).strict(),
  z
    .object({
      kind: z.literal('managed'),
      instanceClass: z.string().min(1),
      storageGb: z.number().int().positive(),
      highAvailability: z.boolean(),
    })
    .strict(),
]);

const TlsSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('disabled') }).strict(),
  z
    .object({
      mode: z.literal('user-supplied'),
      domain: z.string().min(1),
      certificatePath: z.string().min(1),
      privateKeyPath: z.string().min(1),
    })
    .strict(),
  z
    .object({
      mode: z.literal('automatic'),
      domain: z.string().min(1),
      email: z.string().min(1),
      environment: z.enum(['production', 'staging']),
    })
    .strict(),
]);

const BasicAuthSchema = z.discriminatedUnion('enabled', [
  z.object({ enabled: z.literal(false) }).strict(),
  z.object({ enabled: z.literal(true), username: z.string().min(1) }).strict(),
]);

export const ConfigurationRecordSchema = z
  .object({
    target: CloudTargetSchema,
    clusterName: z.string().min(1),
    kubernetesVersion: z.string().min(1),
    sizing: z
      .object({
        nodeType: z.string().min(1),
        minCount: z.number().int().min(0),
        desiredCount: z.number().int().min(0),
        maxCount: z.number().int().min(1),
      })
      .strict(),
    namespace: z.string().min(1),
    storageSize: z.string().min(1),
    hostname: z.string(),
    timezone: z.string().min(1),
    encryptionKey: z.string().regex(ENCRYPTION_KEY_PATTERN, 'must be 64 hexadecimal characters'),
    database: DatabaseSchema,
    tls: TlsSchema,
    basicAuth: BasicAuthSchema,
  })
  .strict() satisfies z.ZodType<ConfigurationRecord>;

/**
 * Cross-field rules a single field schema cannot express
 */
export function consistencyErrors(record: ConfigurationRecord): string[] {
  const errors: string[] = [];
  const { minCount, desiredCount, maxCount } = record.sizing;

  if (!(minCount <= desiredCount && desiredCount <= maxCount)) {
    errors.push(`sizing: expected min <= desired <= max, got ${minCount}/${desiredCount}/${maxCount}`);
  }
  if (record.tls.mode !== 'disabled' && record.tls.domain !== record.hostname) {
    errors.push(`tls.domain (${record.tls.domain}) must equal hostname (${record.hostname})`);
  }
  if (record.tls.mode !== 'disabled' && record.hostname.length === 0) {
    errors.push('hostname is required when TLS is enabled');
  }
  return errors;
}

export function regionOf(target: CloudTarget): string {
  switch (target.provider) {
    case 'aws':
      return target.region;
    case 'azure':
      return target.location;
    case 'gcp':
      return target.region;
  }
}

export function identityOf(target: CloudTarget): string {
  switch (target.provider) {
    case 'aws':
      return target.profile;
    case 'azure':
      return target.subscriptionId;
    case 'gcp':
      return target.projectId;
  }
}

/**
 * Copy of the record safe for logs, history and summaries
 */
export function redactRecord(record: ConfigurationRecord): ConfigurationRecord {
  return { ...record, encryptionKey: REDACTED };
}

/**
 * Flatten to `dotted.path: value` lines in declaration order
 */
export function flattenRecord(value: unknown, prefix: string = ''): Array<[string, string]> {
  if (value === null || typeof value !== 'object') {
    return [[prefix, String(value)]];
  }
  const entries: Array<[string, string]> = [];
  for (const [key, child] of Object.entries(value)) {
    entries.push(...flattenRecord(child, prefix ? `${prefix}.${key}` : key));
  }
  return entries;
}

/**
 * Human summary shown before the user confirms the record
 */
export function summarizeRecord(record: ConfigurationRecord): string[] {
  const target = record.target;
  const lines: string[] = [`Cloud:              ${target.provider.toUpperCase()}`];

  switch (target.provider) {
    case 'aws':
      lines.push(`Profile:            ${target.profile}`, `Region:             ${target.region}`);
      break;
    case 'azure':
      lines.push(
        `Subscription:       ${target.subscriptionId}`,
        `Location:           ${target.location}`,
        `Resource group:     ${target.resourceGroup}`
      );
      break;
    case 'gcp':
      lines.push(`Project:            ${target.projectId}`, `Region / zone:      ${target.region} / ${target.zone}`);
      break;
  }

  const { sizing } = record;
  lines.push(
    `Cluster:            ${record.clusterName} (Kubernetes ${record.kubernetesVersion})`,
    `Nodes:              ${sizing.nodeType} x ${sizing.desiredCount} (min ${sizing.minCount}, max ${sizing.maxCount})`,
    `Namespace:          ${record.namespace}`,
    `Storage:            ${record.storageSize}`,
    `Hostname:           ${record.hostname || '(load balancer address)'}`,
    `Timezone:           ${record.timezone}`,
    `Encryption key:     ${REDACTED}`
  );

  const db = record.database;
  lines.push(
    db.kind === 'sqlite'
      ? 'Database:           SQLite (persistent volume)'
      : `Database:           managed PostgreSQL ${db.instanceClass}, ${db.storageGb} GB${db.highAvailability ? ', high availability' : ''}`
  );

  const tls = record.tls;
  switch (tls.mode) {
    case 'disabled':
      lines.push('TLS:                disabled');
      break;
    case 'user-supplied':
      lines.push(`TLS:                own certificate for ${tls.domain}`);
      break;
    case 'automatic':
      lines.push(`TLS:                Let's Encrypt (${tls.environment}) for ${tls.domain}, contact ${tls.email}`);
      break;
  }

  lines.push(`Basic auth:         ${record.basicAuth.enabled ? `enabled (user ${record.basicAuth.username})` : 'disabled'}`);
  return lines;
}
