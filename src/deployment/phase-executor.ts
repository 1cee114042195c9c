/**
 * Phase Executor
 *
 * Runs the deploy phases strictly in order. A phase whose precondition is
 * unmet, or whose action fails, halts the pipeline; nothing after it starts.
 * Rollback is not done here: the session controller reads the report and
 * decides.
 */

import type { ResolvedSettings } from '../config/settings.js';
import { terraformDirFor } from '../config/settings.js';
import type { ConfigStore } from '../config/store.js';
import { ENCRYPTION_KEY_ENV } from '../config/tfvars.js';
import { InterruptError, err, ok, type OrchestrationError, type Result } from '../lib/errors.js';
import type { PollOptions } from '../lib/polling.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import type { Prompter } from '../lib/prompt.js';
import { printPhaseHeader } from '../lib/ui.js';
import type { StructuredLogger } from '../monitoring/structured-logger.js';
import type { CloudProvider, DeploymentContext } from '../providers/types.js';
import type { DeploymentSession } from '../session/session.js';
import type { RegionStateManager } from '../state/region-state-manager.js';
import { Helm, Kubectl, Terraform } from './tools.js';

export type PhaseName = 'infrastructure' | 'application' | 'endpoint-discovery' | 'tls-auth';

export type Precondition =
  | { status: 'ready' }
  | { status: 'skip'; reason: string }
  | { status: 'unmet'; error: OrchestrationError };

export interface PhaseFailure {
  error: OrchestrationError;
  /** Resources exist and files stay as written; the run ends incomplete, not rolled back */
  recoverable: boolean;
}

export type PhaseOutcome = Result<void, PhaseFailure>;

export interface Phase {
  readonly name: PhaseName;
  readonly title: string;
  precondition(session: DeploymentSession): Precondition;
  run(session: DeploymentSession): Promise<PhaseOutcome>;
}

export type PhaseResult =
  | { phase: PhaseName; status: 'succeeded'; durationMs: number }
  | { phase: PhaseName; status: 'failed'; error: OrchestrationError; recoverable: boolean; durationMs: number }
  | { phase: PhaseName; status: 'skipped'; reason: string };

export type FailedPhase = Extract<PhaseResult, { status: 'failed' }>;

export interface ExecutionReport {
  results: PhaseResult[];
  /** The phase that stopped the pipeline, if any */
  halted: FailedPhase | null;
}

/**
 * Everything a phase needs besides the session
 */
export interface PhaseEnvironment {
  settings: ResolvedSettings;
  runner: ProcessRunner;
  provider: CloudProvider;
  prompter: Prompter;
  logger: StructuredLogger;
  store: ConfigStore;
  states: RegionStateManager;
  /** Delay between poll attempts */
  wait?: PollOptions['wait'];
}

export function fatal(error: OrchestrationError): PhaseOutcome {
  return err({ error, recoverable: false });
}

export function recoverable(error: OrchestrationError): PhaseOutcome {
  return err({ error, recoverable: true });
}

export function succeeded(): PhaseOutcome {
  return ok(undefined);
}

export function deploymentContext(session: DeploymentSession): DeploymentContext {
  return { record: session.record, outputs: session.outputs, token: session.token };
}

export interface Toolbox {
  terraform: Terraform;
  helm: Helm;
  kubectl: Kubectl;
}

/**
 * Tool wrappers bound to the session's cloud identity. Only the infra engine
 * sees the encryption key, through its environment.
 */
export function createToolbox(env: PhaseEnvironment, session: DeploymentSession): Toolbox {
  const cloudEnv = env.provider.toolEnvironment(session.record.target);
  const base = { runner: env.runner, timeouts: env.settings.timeouts, stream: env.settings.verbose };
  return {
    terraform: new Terraform(
      { ...base, env: { ...cloudEnv, [ENCRYPTION_KEY_ENV]: session.record.encryptionKey }, stream: true },
      terraformDirFor(env.settings, session.record.target.provider)
    ),
    helm: new Helm({ ...base, env: cloudEnv }),
    kubectl: new Kubectl({ ...base, env: cloudEnv }),
  };
}

/**
 * Point kubectl at the session's cluster once per run
 */
export async function ensureClusterAccess(env: PhaseEnvironment, session: DeploymentSession): Promise<Result<void, OrchestrationError>> {
  if (session.clusterAccess) {
    return ok(undefined);
  }
  const configured = await env.provider.configureClusterAccess(deploymentContext(session));
  if (configured.ok) {
    session.clusterAccess = true;
  }
  return configured;
}

export class PhaseExecutor {
  constructor(
    private readonly phases: Phase[],
    private readonly logger: StructuredLogger,
    private readonly now: () => number = Date.now
  ) {}

  async run(session: DeploymentSession): Promise<ExecutionReport> {
    const results: PhaseResult[] = [];
    const record = (result: PhaseResult): void => {
      results.push(result);
      session.results.push(result);
    };

    for (const [index, phase] of this.phases.entries()) {
      if (session.token.isCancelled) {
        const halted: FailedPhase = {
          phase: phase.name,
          status: 'failed',
          error: new InterruptError(session.token.reason ?? undefined),
          recoverable: false,
          durationMs: 0,
        };
        record(halted);
        return { results, halted };
      }

      const precondition = phase.precondition(session);
      if (precondition.status === 'skip') {
        this.logger.info(`Skipping ${phase.title}`, { phase: phase.name, reason: precondition.reason });
        record({ phase: phase.name, status: 'skipped', reason: precondition.reason });
        continue;
      }
      if (precondition.status === 'unmet') {
        const halted: FailedPhase = { phase: phase.name, status: 'failed', error: precondition.error, recoverable: false, durationMs: 0 };
        record(halted);
        return { results, halted };
      }

      printPhaseHeader(index + 1, this.phases.length, phase.title);
      this.logger.setPhase(phase.name);
      const startedAt = this.now();
      const outcome = await phase.run(session);
      const durationMs = this.now() - startedAt;

      if (!outcome.ok) {
        this.logger.error(`${phase.title} failed`, outcome.error.error, { phase: phase.name, recoverable: outcome.error.recoverable });
        const halted: FailedPhase = {
          phase: phase.name,
          status: 'failed',
          error: outcome.error.error,
          recoverable: outcome.error.recoverable,
          durationMs,
        };
        record(halted);
        return { results, halted };
      }

      this.logger.info(`${phase.title} complete`, { phase: phase.name, durationMs });
      record({ phase: phase.name, status: 'succeeded', durationMs });
    }

    this.logger.setPhase(undefined);
    return { results, halted: null };
  }
}
