/**
 * Core type definitions for n8n-launchpad
 */

/**
 * Supported cloud providers
 */
export type CloudProviderName = 'aws' | 'azure' | 'gcp';

export const CLOUD_PROVIDERS: readonly CloudProviderName[] = ['aws', 'azure', 'gcp'] as const;

/**
 * Where the deployment lands. Each cloud names its identity and location differently.
 */
export type CloudTarget =
  | { provider: 'aws'; profile: string; region: string }
  | { provider: 'azure'; subscriptionId: string; location: string; resourceGroup: string }
  | { provider: 'gcp'; projectId: string; region: string; zone: string };

export interface ClusterSizing {
  nodeType: string;
  minCount: number;
  desiredCount: number;
  maxCount: number;
}

export type DatabaseConfig =
  | { kind: 'sqlite' }
  | { kind: 'managed'; instanceClass: string; storageGb: number; highAvailability: boolean };

export type TlsConfig =
  | { mode: 'disabled' }
  | { mode: 'user-supplied'; domain: string; certificatePath: string; privateKeyPath: string }
  | { mode: 'automatic'; domain: string; email: string; environment: 'production' | 'staging' };

export type TlsMode = TlsConfig['mode'];

export type BasicAuthConfig = { enabled: false } | { enabled: true; username: string };

/**
 * Complete, validated set of deployment parameters.
 *
 * Built once per run by the interactive collector (or loaded from
 * `.setup-current.json`) and treated as read-only afterwards.
 */
export interface ConfigurationRecord {
  target: CloudTarget;
  clusterName: string;
  kubernetesVersion: string;
  sizing: ClusterSizing;
  namespace: string;
  storageSize: string;
  /** Ingress hostname. Empty only when TLS is disabled (access through the load balancer address). */
  hostname: string;
  timezone: string;
  /** 64 hex characters. Never logged. */
  encryptionKey: string;
  database: DatabaseConfig;
  tls: TlsConfig;
  basicAuth: BasicAuthConfig;
}

/**
 * Outputs reported by the infra engine after apply, flattened to strings
 */
export type InfraOutputs = Record<string, string>;

/**
 * Session modes selected from the command line
 */
export type SessionMode = 'deploy' | 'skip-infra' | 'update-tls' | 'teardown' | 'list-states';

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  incomplete: 2,
  interrupted: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
