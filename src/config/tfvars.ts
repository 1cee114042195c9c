/**
 * terraform.tfvars rendering
 *
 * Plain key/value input for the infra engine. The encryption key is never
 * written here: it travels as `TF_VAR_n8n_encryption_key` and the file only
 * names the secret-store entry the engine creates from it.
 */

import type { ConfigurationRecord } from '../types.js';

export const ENCRYPTION_KEY_ENV = 'TF_VAR_n8n_encryption_key';

type HclValue = string | number | boolean | string[];

interface HclSection {
  title: string;
  entries: Array<[string, HclValue]>;
}

/**
 * Name of the secret-store entry holding the encryption key
 */
export function encryptionKeySecretName(record: ConfigurationRecord): string {
  return `${record.clusterName}-n8n-encryption-key`;
}

function hclString(value: string): string {
  // JSON string escaping is valid HCL; template sequences must be doubled
  return JSON.stringify(value)
    .replace(/\$\{/g, () => '$${')
    .replace(/%\{/g, () => '%%{');
}

function hclValue(value: HclValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(hclString).join(', ')}]`;
  }
  return typeof value === 'string' ? hclString(value) : String(value);
}

function targetSections(record: ConfigurationRecord): HclSection[] {
  const { target, sizing } = record;
  switch (target.provider) {
    case 'aws':
      return [
        { title: 'AWS', entries: [['aws_profile', target.profile], ['region', target.region]] },
        {
          title: 'EKS cluster',
          entries: [
            ['cluster_name', record.clusterName],
            ['cluster_version', record.kubernetesVersion],
            ['node_instance_types', [sizing.nodeType]],
            ['node_desired_size', sizing.desiredCount],
            ['node_min_size', sizing.minCount],
            ['node_max_size', sizing.maxCount],
          ],
        },
      ];
    case 'azure':
      return [
        {
          title: 'Azure',
          entries: [
            ['azure_subscription_id', target.subscriptionId],
            ['azure_location', target.location],
            ['resource_group_name', target.resourceGroup],
          ],
        },
        {
          title: 'AKS cluster',
          entries: [
            ['cluster_name', record.clusterName],
            ['kubernetes_version', record.kubernetesVersion],
            ['node_vm_size', sizing.nodeType],
            ['node_count', sizing.desiredCount],
            ['node_min_count', sizing.minCount],
            ['node_max_count', sizing.maxCount],
            ['enable_auto_scaling', sizing.minCount !== sizing.maxCount],
          ],
        },
      ];
    case 'gcp':
      return [
        {
          title: 'GCP',
          entries: [['gcp_project_id', target.projectId], ['gcp_region', target.region], ['gcp_zone', target.zone]],
        },
        {
          title: 'GKE cluster',
          entries: [
            ['cluster_name', record.clusterName],
            ['kubernetes_version', record.kubernetesVersion],
            ['node_machine_type', sizing.nodeType],
            ['node_count', sizing.desiredCount],
            ['min_node_count', sizing.minCount],
            ['max_node_count', sizing.maxCount],
          ],
        },
      ];
  }
}

function databaseSection(record: ConfigurationRecord): HclSection {
  const db = record.database;
  if (db.kind === 'sqlite') {
    return { title: 'Database', entries: [['database_type', 'sqlite']] };
  }

  const prefix = { aws: 'rds', azure: 'postgres', gcp: 'cloudsql' }[record.target.provider];
  const classKey = { aws: 'rds_instance_class', azure: 'postgres_sku', gcp: 'cloudsql_tier' }[record.target.provider];
  return {
    title: 'Database',
    entries: [
      ['database_type', 'postgresql'],
      [classKey, db.instanceClass],
      [`${prefix}_storage_gb`, db.storageGb],
      [`${prefix}_high_availability`, db.highAvailability],
    ],
  };
}

export function renderTfvars(record: ConfigurationRecord): string {
  const sections: HclSection[] = [
    ...targetSections(record),
    {
      title: 'Application',
      entries: [
        ['n8n_host', record.hostname],
        ['n8n_namespace', record.namespace],
        ['n8n_protocol', record.tls.mode === 'disabled' ? 'http' : 'https'],
        ['n8n_persistence_size', record.storageSize],
        ['timezone', record.timezone],
        ['n8n_encryption_key_secret_name', encryptionKeySecretName(record)],
      ],
    },
    databaseSection(record),
  ];

  const lines = [
    `# ${record.target.provider.toUpperCase()} deployment of n8n`,
    '# Generated by launchpad. Edits are overwritten on the next run.',
    `# The encryption key is passed as ${ENCRYPTION_KEY_ENV}.`,
  ];
  for (const section of sections) {
    lines.push('', `# ${section.title}`);
    const width = Math.max(...section.entries.map(([key]) => key.length));
    for (const [key, value] of section.entries) {
      lines.push(`${key.padEnd(width)} = ${hclValue(value)}`);
    }
  }
  return lines.join('\n') + '\n';
}
