/**
 * Cloud provider contract
 *
 * Everything cloud-specific the orchestrator needs: identity discovery and
 * verification, the environment handed to the infra engine, cluster-client
 * configuration, the secret store, and managed-database deletion protection.
 */

import type { CancellationToken } from '../lib/cancellation.js';
import type { InterruptError, OrchestrationError, PreconditionError, Result } from '../lib/errors.js';
import type { CloudProviderName, CloudTarget, ClusterSizing, ConfigurationRecord, InfraOutputs } from '../types.js';

export interface IdentityChoice {
  /** Profile name, subscription id or project id */
  id: string;
  label: string;
  isDefault: boolean;
}

export interface VerifiedIdentity {
  account: string;
  detail: string;
}

export interface SecretEntry {
  name: string;
  description?: string;
}

export interface ProviderDefaults {
  clusterName: string;
  kubernetesVersion: string;
  sizing: ClusterSizing;
  databaseInstanceClass: string;
  databaseStorageGb: number;
  region: string;
}

/**
 * Context for secret-store and database calls: some clouds need values the
 * infra engine produced (Azure's vault name, the database instance id).
 */
export interface DeploymentContext {
  record: ConfigurationRecord;
  outputs: InfraOutputs;
  token?: CancellationToken;
}

export interface CloudProvider {
  readonly name: CloudProviderName;
  readonly displayName: string;
  readonly defaults: ProviderDefaults;

  /** Static region list offered by the collector */
  regions(): string[];
  /** Profiles, subscriptions or projects; empty when the CLI cannot list them */
  discoverIdentities(token?: CancellationToken): Promise<IdentityChoice[]>;
  verifyIdentity(target: CloudTarget, token?: CancellationToken): Promise<Result<VerifiedIdentity, PreconditionError | InterruptError>>;
  /** Environment for every tool invocation against this target */
  toolEnvironment(target: CloudTarget): Record<string, string>;
  configureClusterAccess(context: DeploymentContext): Promise<Result<void, OrchestrationError>>;

  writeSecret(context: DeploymentContext, name: string, value: string, description: string): Promise<Result<void, OrchestrationError>>;
  /** Entries tagged `app=n8n` whose name carries this deployment's cluster prefix */
  listSecrets(context: DeploymentContext): Promise<Result<SecretEntry[], OrchestrationError>>;
  deleteSecret(context: DeploymentContext, name: string): Promise<Result<'deleted' | 'absent', OrchestrationError>>;

  /** Resources that still carry the deployment's tag, for the report after teardown */
  listLeftoverResources(context: DeploymentContext): Promise<Result<string[], OrchestrationError>>;

  /** Detect and clear deletion protection so the infra engine can destroy the database */
  disableDatabaseProtection(context: DeploymentContext): Promise<Result<'cleared' | 'none', OrchestrationError>>;
}

export const SECRET_TAG = { key: 'app', value: 'n8n' } as const;
