/**
 * Typed Helm values
 *
 * One table maps each logical option to its chart path and value kind.
 * The same table renders `values-override.yaml` for the install and the
 * `--set` / `--set-string` arguments for later upgrades, so an option name
 * or a value of the wrong kind fails to compile instead of failing in Helm.
 * `null` removes a key from the release's values on upgrade.
 */

import { stringify } from 'yaml';
import type { ConfigurationRecord } from '../types.js';

export const SECRET_NAMES = {
  encryptionKey: 'n8n-encryption-key',
  database: 'n8n-db-credentials',
  tls: 'n8n-tls',
  basicAuth: 'n8n-basic-auth',
} as const;

export const INGRESS_CLASS = 'nginx';

type ValueKind = 'string' | 'boolean' | 'number';

interface HelmOptionSpec {
  path: readonly string[];
  kind: ValueKind;
}

export const HELM_OPTIONS = {
  timezone: { path: ['n8n', 'timezone'], kind: 'string' },
  encryptionKeySecret: { path: ['n8n', 'encryptionKeySecret'], kind: 'string' },
  protocol: { path: ['n8n', 'protocol'], kind: 'string' },
  webhookUrl: { path: ['n8n', 'webhookUrl'], kind: 'string' },
  persistenceEnabled: { path: ['persistence', 'enabled'], kind: 'boolean' },
  persistenceSize: { path: ['persistence', 'size'], kind: 'string' },
  databaseType: { path: ['database', 'type'], kind: 'string' },
  databaseSecret: { path: ['database', 'existingSecret'], kind: 'string' },
  ingressEnabled: { path: ['ingress', 'enabled'], kind: 'boolean' },
  ingressClassName: { path: ['ingress', 'className'], kind: 'string' },
  ingressHost: { path: ['ingress', 'host'], kind: 'string' },
  tlsEnabled: { path: ['ingress', 'tls', 'enabled'], kind: 'boolean' },
  tlsSecretName: { path: ['ingress', 'tls', 'secretName'], kind: 'string' },
  clusterIssuer: { path: ['ingress', 'annotations', 'cert-manager.io/cluster-issuer'], kind: 'string' },
  authType: { path: ['ingress', 'annotations', 'nginx.ingress.kubernetes.io/auth-type'], kind: 'string' },
  authSecret: { path: ['ingress', 'annotations', 'nginx.ingress.kubernetes.io/auth-secret'], kind: 'string' },
  authRealm: { path: ['ingress', 'annotations', 'nginx.ingress.kubernetes.io/auth-realm'], kind: 'string' },
} as const satisfies Record<string, HelmOptionSpec>;

interface KindValues {
  string: string;
  boolean: boolean;
  number: number;
}

export type HelmOptionName = keyof typeof HELM_OPTIONS;

export type HelmOptions = {
  [K in HelmOptionName]?: KindValues[(typeof HELM_OPTIONS)[K]['kind']] | null;
};

type ValueTree = { [key: string]: ValueTree | string | number | boolean };

function isOptionName(name: string): name is HelmOptionName {
  return Object.prototype.hasOwnProperty.call(HELM_OPTIONS, name);
}

type OptionValue = string | number | boolean | null;

function definedEntries(options: HelmOptions): Array<[HelmOptionName, OptionValue]> {
  const entries: Array<[HelmOptionName, OptionValue]> = [];
  for (const name of Object.keys(options)) {
    if (!isOptionName(name)) {
      continue;
    }
    const value = options[name];
    if (value !== undefined) {
      entries.push([name, value]);
    }
  }
  return entries;
}

function escapeKey(segment: string): string {
  return segment.replace(/\./g, '\\.');
}

function escapeSetValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/,/g, '\\,');
}

/**
 * Upgrade-time overrides: strings go through `--set-string` so Helm never
 * re-types them (a hostname of `true`, a timezone of `1`).
 */
export function toSetArgs(options: HelmOptions): string[] {
  const args: string[] = [];
  for (const [name, value] of definedEntries(options)) {
    const spec = HELM_OPTIONS[name];
    const key = spec.path.map(escapeKey).join('.');
    if (value === null) {
      args.push('--set', `${key}=null`);
    } else if (spec.kind === 'string') {
      args.push('--set-string', `${key}=${escapeSetValue(String(value))}`);
    } else {
      args.push('--set', `${key}=${String(value)}`);
    }
  }
  return args;
}

export function toValuesTree(options: HelmOptions): ValueTree {
  const tree: ValueTree = {};
  for (const [name, value] of definedEntries(options)) {
    if (value === null) {
      continue;
    }
    const path = HELM_OPTIONS[name].path;
    let node = tree;
    for (const segment of path.slice(0, -1)) {
      const next = node[segment];
      if (typeof next === 'object') {
        node = next;
      } else {
        const created: ValueTree = {};
        node[segment] = created;
        node = created;
      }
    }
    node[path[path.length - 1] ?? name] = value;
  }
  return tree;
}

/**
 * Values for the first install. TLS stays off until the endpoint is known.
 */
export function baseHelmOptions(record: ConfigurationRecord): HelmOptions {
  const options: HelmOptions = {
    timezone: record.timezone,
    encryptionKeySecret: SECRET_NAMES.encryptionKey,
    protocol: 'http',
    persistenceEnabled: true,
    persistenceSize: record.storageSize,
    databaseType: record.database.kind === 'managed' ? 'postgresdb' : 'sqlite',
    ingressEnabled: true,
    ingressClassName: INGRESS_CLASS,
    tlsEnabled: false,
  };
  if (record.database.kind === 'managed') {
    options.databaseSecret = SECRET_NAMES.database;
  }
  if (record.hostname) {
    options.ingressHost = record.hostname;
    options.webhookUrl = `http://${record.hostname}/`;
  }
  return options;
}

/**
 * TLS settings for an upgrade with `--reuse-values`. Every mode states all
 * of its keys, so switching modes leaves nothing of the previous one behind.
 */
export function tlsHelmOptions(record: ConfigurationRecord, clusterIssuer?: string): HelmOptions {
  if (record.tls.mode === 'disabled') {
    return {
      protocol: 'http',
      webhookUrl: record.hostname ? `http://${record.hostname}/` : null,
      tlsEnabled: false,
      tlsSecretName: null,
      clusterIssuer: null,
    };
  }
  const options: HelmOptions = {
    protocol: 'https',
    webhookUrl: `https://${record.tls.domain}/`,
    ingressHost: record.tls.domain,
    tlsEnabled: true,
    tlsSecretName: SECRET_NAMES.tls,
  };
  options.clusterIssuer = record.tls.mode === 'automatic' && clusterIssuer ? clusterIssuer : null;
  return options;
}

export function basicAuthHelmOptions(enabled: boolean = true): HelmOptions {
  if (!enabled) {
    return { authType: null, authSecret: null, authRealm: null };
  }
  return {
    authType: 'basic',
    authSecret: SECRET_NAMES.basicAuth,
    authRealm: 'Authentication Required',
  };
}

export function renderValuesOverride(record: ConfigurationRecord): string {
  return [
    '# Generated by launchpad from .setup-current.json. Edits are overwritten on the next run.',
    stringify(toValuesTree(baseHelmOptions(record))),
  ].join('\n');
}
