// Input validation for the interactive collector.
// Each validator returns an error message, or undefined when the value is acceptable.

import { ENCRYPTION_KEY_PATTERN } from '../config/record.js';

/**
 * Validate cluster name format
 */
export function validateClusterName(val: string): string | undefined {
  if (!val || val.length < 3) {
    return 'Cluster name must be at least 3 characters';
  }
  if (val.length > 40) {
    return 'Cluster name must be at most 40 characters';
  }
  if (!/^[a-z0-9-]+$/.test(val)) {
    return 'Use lowercase letters, numbers, and hyphens only';
  }
  if (val.startsWith('-') || val.endsWith('-')) {
    return 'Cannot start or end with hyphen';
  }
  if (val.includes('--')) {
    return 'Cannot contain consecutive hyphens';
  }
  return undefined;
}

/**
 * Validate GCP project ID format
 */
export function validateGcpProjectId(val: string): string | undefined {
  if (!val || val.length < 6) {
    return 'Project ID must be at least 6 characters';
  }
  if (val.length > 30) {
    return 'Project ID must be at most 30 characters';
  }
  if (!/^[a-z][a-z0-9-]*[a-z0-9]$/.test(val)) {
    return 'Project ID must start with a letter, contain only lowercase letters, numbers, and hyphens';
  }
  return undefined;
}

export function validateAzureResourceGroup(val: string): string | undefined {
  if (!val || val.length > 90) {
    return 'Resource group name must be 1 to 90 characters';
  }
  if (!/^[-\w.()]+$/.test(val) || val.endsWith('.')) {
    return 'Use letters, numbers, underscores, hyphens, periods and parentheses; do not end with a period';
  }
  return undefined;
}

/**
 * Empty means "generate one". Anything else must be exactly 64 hex characters.
 */
export function validateEncryptionKey(val: string): string | undefined {
  if (val === '') {
    return undefined;
  }
  if (!ENCRYPTION_KEY_PATTERN.test(val)) {
    return `Encryption key must be exactly 64 hexadecimal characters (got ${val.length} characters)`;
  }
  return undefined;
}

/**
 * Fully qualified domain name: at least two labels, alphabetic TLD
 */
export function validateHostname(val: string): string | undefined {
  if (!val) {
    return 'Hostname is required';
  }
  if (val.length > 253) {
    return 'Hostname must be at most 253 characters';
  }
  const labels = val.split('.');
  if (labels.length < 2) {
    return 'Enter a fully qualified domain name, e.g. n8n.example.com';
  }
  for (const label of labels) {
    if (!/^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/i.test(label)) {
      return `Invalid domain label "${label}"`;
    }
  }
  if (!/^[a-z]{2,63}$/i.test(labels[labels.length - 1] ?? '')) {
    return 'The top-level domain must be alphabetic';
  }
  return undefined;
}

export function validateEmail(val: string): string | undefined {
  if (!/^[^\s@]+@[^\s@]+\.[^\s@]{2,}$/.test(val)) {
    return 'Enter a valid email address';
  }
  return undefined;
}

/**
 * Kubernetes DNS-1123 label
 */
export function validateNamespace(val: string): string | undefined {
  if (!/^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$/.test(val)) {
    return 'Namespace must be lowercase letters, numbers and hyphens (max 63), starting and ending with a letter or number';
  }
  return undefined;
}

export function validateStorageSize(val: string): string | undefined {
  if (!/^[1-9]\d*(Mi|Gi|Ti)$/.test(val)) {
    return 'Use a Kubernetes quantity such as 10Gi';
  }
  return undefined;
}

export function validateKubernetesVersion(val: string): string | undefined {
  if (!/^1\.\d{1,2}$/.test(val)) {
    return 'Use a minor version such as 1.31';
  }
  return undefined;
}

export function validateTimezone(val: string): string | undefined {
  if (!val) {
    return 'Timezone is required';
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: val });
    return undefined;
  } catch {
    return `Unknown timezone "${val}" (use an IANA name such as Europe/Berlin)`;
  }
}

/**
 * Parse a whole number in [min, max]
 */
export function parseCount(val: string, min: number, max: number): number | string {
  if (!/^\d+$/.test(val)) {
    return 'Enter a whole number';
  }
  const count = Number.parseInt(val, 10);
  if (count < min || count > max) {
    return `Enter a number between ${min} and ${max}`;
  }
  return count;
}

export function validateUsername(val: string): string | undefined {
  if (!/^[A-Za-z0-9._-]{1,64}$/.test(val)) {
    return 'Use 1 to 64 letters, numbers, dots, underscores or hyphens';
  }
  return undefined;
}

export function validateGcpZone(val: string, region: string): string | undefined {
  if (!new RegExp(`^${region}-[a-z]$`).test(val)) {
    return `Zone must be in ${region}, e.g. ${region}-a`;
  }
  return undefined;
}
