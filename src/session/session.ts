import type { BackupRecord } from '../backup/manager.js';
import { CancellationToken } from '../lib/cancellation.js';
import type { PhaseResult } from '../deployment/phase-executor.js';
import type { ConfigurationRecord, InfraOutputs, SessionMode } from '../types.js';

/**
 * Run-level context, created fresh per invocation and owned by the session
 * controller. Phases read the record and fill in outputs and the endpoint;
 * nothing here outlives the process.
 */
export interface DeploymentSession {
  readonly mode: SessionMode;
  readonly record: ConfigurationRecord;
  readonly token: CancellationToken;
  outputs: InfraOutputs;
  /** Load balancer hostname or IP once endpoint discovery succeeds */
  endpoint: string | null;
  /** kubeconfig already points at the cluster */
  clusterAccess: boolean;
  backups: BackupRecord[];
  results: PhaseResult[];
}

export function createSession(
  mode: SessionMode,
  record: ConfigurationRecord,
  token: CancellationToken = new CancellationToken()
): DeploymentSession {
  return {
    mode,
    record,
    token,
    outputs: {},
    endpoint: null,
    clusterAccess: false,
    backups: [],
    results: [],
  };
}
