/**
 * Session Controller
 *
 * Top-level state machine for one invocation:
 *
 *   dependency gate → cloud → record (collected or loaded) → identity check
 *   → region gate → backup → persist → phases → discard | restore
 *
 * Ctrl+C only flips the session's cancellation token; whatever is running
 * returns an `InterruptError` result and the controller restores the backed
 * up files before exiting. Nothing before the backup step writes a file.
 */

import { randomUUID } from 'crypto';
import chalk from 'chalk';
import { BackupManager, type BackupRecord } from '../backup/manager.js';
import { InteractiveCollector, type CollectOutcome } from '../collector/interactive-collector.js';
import { regionOf } from '../config/record.js';
import { terraformDirFor, type ResolvedSettings } from '../config/settings.js';
import { ConfigStore, type RunOutcome } from '../config/store.js';
import { ApplicationPhase } from '../deployment/phases/application.js';
import { EndpointDiscoveryPhase, MANUAL_ENDPOINT_COMMAND } from '../deployment/phases/endpoint-discovery.js';
import { InfrastructurePhase } from '../deployment/phases/infrastructure.js';
import { TlsAuthPhase } from '../deployment/phases/tls-auth.js';
import { PhaseExecutor, type FailedPhase, type Phase, type PhaseEnvironment } from '../deployment/phase-executor.js';
import { CancellationToken } from '../lib/cancellation.js';
import { InterruptError, PreconditionError, err, ok, type OrchestrationError, type Result } from '../lib/errors.js';
import type { PollOptions } from '../lib/polling.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import type { Prompter } from '../lib/prompt.js';
import { formatErrorSafely } from '../lib/safe-error-handler.js';
import { printBanner, printFailure, printIncomplete, printSuccess } from '../lib/ui.js';
import type { StructuredLogger } from '../monitoring/structured-logger.js';
import {
  DependencyChecker,
  availableClouds,
  checkRuntime,
  evaluateChecks,
  printDependencyReport,
  toolSpecsFor,
  toolSpecsForAnyCloud,
} from '../pre-deployment/dependency-checker.js';
import { createProvider } from '../providers/index.js';
import type { CloudProvider } from '../providers/types.js';
import { resolveRegionConflict } from '../state/region-gate.js';
import { getRegionStateManager, type RegionStateManager } from '../state/region-state-manager.js';
import { TeardownExecutor, missingRecordError, type TeardownOptions } from '../teardown/executor.js';
import { CLOUD_PROVIDERS, EXIT_CODES, type CloudProviderName, type ConfigurationRecord, type ExitCode, type SessionMode } from '../types.js';
import { createSession, type DeploymentSession } from './session.js';

export interface SessionRequest {
  mode: SessionMode;
  cloud?: CloudProviderName;
}

export interface SessionDependencies {
  settings: ResolvedSettings;
  runner: ProcessRunner;
  prompter: Prompter;
  logger: StructuredLogger;
  createProvider?: (name: CloudProviderName, runner: ProcessRunner, settings: ResolvedSettings) => CloudProvider;
  /** Poll delay; tests pass a no-op */
  wait?: PollOptions['wait'];
  countdown?: TeardownOptions['countdown'];
  now?: () => Date;
  nodeVersion?: string;
  /** Register SIGINT for the duration of the run */
  handleSignals?: boolean;
}

const MODE_TITLES: Record<SessionMode, string> = {
  deploy: 'n8n DEPLOYMENT',
  'skip-infra': 'n8n DEPLOYMENT (EXISTING INFRASTRUCTURE)',
  'update-tls': 'n8n TLS UPDATE',
  teardown: 'n8n TEARDOWN',
  'list-states': 'REGION STATE SNAPSHOTS',
};

export function exitCodeFor(error: OrchestrationError, token: CancellationToken): ExitCode {
  return error.kind === 'interrupt' || token.isCancelled ? EXIT_CODES.interrupted : EXIT_CODES.failure;
}

function outcomeFor(error: OrchestrationError): RunOutcome {
  return error.kind === 'interrupt' ? 'interrupted' : 'failed';
}

export class SessionController {
  private readonly store: ConfigStore;
  private readonly backups: BackupManager;
  private readonly now: () => Date;
  readonly token = new CancellationToken();

  constructor(private readonly deps: SessionDependencies) {
    this.store = new ConfigStore(deps.settings);
    this.now = deps.now ?? (() => new Date());
    this.backups = new BackupManager(deps.settings.paths.backupDir, this.now);
  }

  private provider(name: CloudProviderName): CloudProvider {
    const factory = this.deps.createProvider ?? ((cloud, runner, settings) => createProvider(cloud, runner, settings.timeouts));
    return factory(name, this.deps.runner, this.deps.settings);
  }

  private states(cloud: CloudProviderName): RegionStateManager {
    return getRegionStateManager(terraformDirFor(this.deps.settings, cloud), { now: this.now });
  }

  async run(request: SessionRequest): Promise<ExitCode> {
    const onSignal = (): void => {
      console.log(chalk.yellow('\n⚠️  Interrupt received, stopping after the current step...'));
      this.token.cancel();
    };
    if (this.deps.handleSignals) {
      process.on('SIGINT', onSignal);
    }
    this.deps.logger.setSessionContext(randomUUID());

    try {
      printBanner(MODE_TITLES[request.mode]);
      if (request.mode === 'list-states') {
        return this.listStates(request.cloud);
      }
      return await this.execute(request);
    } finally {
      if (this.deps.handleSignals) {
        process.off('SIGINT', onSignal);
      }
    }
  }

  private fail(error: OrchestrationError, title: string = 'RUN FAILED'): ExitCode {
    this.deps.logger.error(error.message, error, { kind: error.kind });
    const lines = [formatErrorSafely(error, { verbose: this.deps.settings.verbose })];
    printFailure(title, lines);
    return exitCodeFor(error, this.token);
  }

  private async execute(request: SessionRequest): Promise<ExitCode> {
    const cloud = await this.dependencyGate(request.cloud);
    if (!cloud.ok) {
      return this.fail(cloud.error, 'PRECONDITION FAILED');
    }
    const provider = this.provider(cloud.value);

    const stored = this.store.readRecord();
    if (!stored.ok) {
      return this.fail(stored.error, 'SAVED CONFIGURATION IS INVALID');
    }
    const previous = stored.value?.configuration ?? null;

    const record = await this.resolveRecord(request.mode, provider, previous);
    if (!record.ok) {
      return this.fail(record.error, record.error.kind === 'interrupt' ? 'INTERRUPTED' : 'PRECONDITION FAILED');
    }
    if (record.value === null) {
      console.log(chalk.yellow('\nConfiguration not confirmed. Nothing was changed.'));
      return EXIT_CODES.failure;
    }

    const identity = await provider.verifyIdentity(record.value.target, this.token);
    if (!identity.ok) {
      return this.fail(identity.error, 'PRECONDITION FAILED');
    }
    this.deps.logger.info(`Authenticated as ${identity.value.account}`, { detail: identity.value.detail });

    const session = createSession(request.mode, record.value, this.token);
    const environment: PhaseEnvironment = {
      settings: this.deps.settings,
      runner: this.deps.runner,
      provider,
      prompter: this.deps.prompter,
      logger: this.deps.logger,
      store: this.store,
      states: this.states(cloud.value),
      wait: this.deps.wait,
    };

    if (request.mode === 'teardown') {
      return this.teardown(environment, session);
    }

    if (request.mode === 'deploy') {
      const region = await resolveRegionConflict(environment.states, regionOf(record.value.target), this.deps, 'deploy');
      if (!region.ok) {
        return this.fail(region.error, 'PRECONDITION FAILED');
      }
    }

    return this.deploy(environment, session);
  }

  /**
   * Runtime and tool versions. Without --cloud every cloud CLI is optional
   * and the user picks among those that are installed.
   */
  private async dependencyGate(requested: CloudProviderName | undefined): Promise<Result<CloudProviderName, OrchestrationError>> {
    const runtime = checkRuntime(this.deps.nodeVersion);
    const checker = new DependencyChecker(this.deps.runner, this.deps.settings.timeouts.identityMs);
    const results = [runtime, ...(await checker.check(requested ? toolSpecsFor(requested) : toolSpecsForAnyCloud(), this.token))];
    printDependencyReport(results);

    const interrupted = this.token.check();
    if (!interrupted.ok) {
      return interrupted;
    }
    const gate = evaluateChecks(results);
    if (!gate.ok) {
      return gate;
    }
    if (requested) {
      return ok(requested);
    }

    const clouds = availableClouds(results);
    if (clouds.length === 0) {
      return err(
        new PreconditionError(
          'No cloud CLI is installed',
          results
            .filter((result) => ['aws', 'az', 'gcloud'].includes(result.tool))
            .map((result) => `${result.tool}: ${result.installHint}`)
            .join('\n')
        )
      );
    }
    const stored = this.store.readRecord();
    const remembered = stored.ok ? stored.value?.cloudProvider : undefined;
    const choices = clouds.map((name) => ({ title: this.provider(name).displayName, value: name }));
    const picked = await this.deps.prompter.select(
      'Cloud provider',
      choices,
      Math.max(0, clouds.findIndex((name) => name === remembered))
    );
    return picked === undefined ? err(new InterruptError()) : ok(picked);
  }

  /**
   * `null` when the user declined the summary
   */
  private async resolveRecord(
    mode: SessionMode,
    provider: CloudProvider,
    previous: ConfigurationRecord | null
  ): Promise<Result<ConfigurationRecord | null, OrchestrationError>> {
    const collector = new InteractiveCollector(this.deps.prompter);
    let outcome: Result<CollectOutcome, InterruptError>;

    if (mode === 'deploy') {
      const identities = await provider.discoverIdentities(this.token);
      outcome = await collector.collect({ provider, identities, previous });
    } else {
      if (!previous) {
        return err(
          mode === 'teardown'
            ? missingRecordError()
            : new PreconditionError('No saved configuration from an earlier deploy', 'Run a full deploy first.')
        );
      }
      if (previous.target.provider !== provider.name) {
        return err(
          new PreconditionError(
            `The saved configuration is for ${previous.target.provider.toUpperCase()}, not ${provider.name.toUpperCase()}`,
            `Run with --cloud=${previous.target.provider}.`
          )
        );
      }
      if (mode !== 'update-tls') {
        return ok(previous);
      }
      outcome = await collector.collectTlsUpdate(previous);
    }

    if (!outcome.ok) {
      return outcome;
    }
    return ok(outcome.value.status === 'confirmed' ? outcome.value.record : null);
  }

  private persist(session: DeploymentSession): void {
    const { record } = session;
    session.backups = this.backups.snapshot(this.store.mutablePaths(record.target.provider));
    this.store.writeRecord(record, this.now());
    this.store.writeInfraVariables(record);
    this.store.writeValuesOverride(record);
    this.deps.logger.info('Configuration saved', { files: session.backups.length });
  }

  private phasesFor(mode: SessionMode, environment: PhaseEnvironment): Phase[] {
    const reuseExisting = mode !== 'deploy';
    const infrastructure = new InfrastructurePhase(environment, { reuseExisting });
    if (mode === 'update-tls') {
      return [infrastructure, new EndpointDiscoveryPhase(environment), new TlsAuthPhase(environment)];
    }
    return [infrastructure, new ApplicationPhase(environment), new EndpointDiscoveryPhase(environment), new TlsAuthPhase(environment)];
  }

  private rollback(records: BackupRecord[]): Result<number, OrchestrationError> {
    const restored = this.backups.restore(records);
    if (restored.ok) {
      this.backups.discard(records);
      this.deps.logger.info('Configuration files restored', { files: restored.value });
    }
    return restored;
  }

  private async deploy(environment: PhaseEnvironment, session: DeploymentSession): Promise<ExitCode> {
    const { record } = session;
    try {
      this.persist(session);
    } catch (error) {
      const restored = this.rollback(session.backups);
      throw restored.ok ? error : restored.error;
    }

    let halted: FailedPhase | null;
    try {
      const report = await new PhaseExecutor(this.phasesFor(session.mode, environment), this.deps.logger).run(session);
      halted = report.halted;
    } catch (error) {
      const restored = this.rollback(session.backups);
      this.record(session, 'failed', 'unexpected error');
      throw restored.ok ? error : restored.error;
    }

    if (halted === null) {
      this.backups.discard(session.backups);
      this.record(session, 'succeeded');
      printSuccess('DEPLOYMENT SUCCESSFUL', this.summary(session));
      return EXIT_CODES.success;
    }

    if (halted.recoverable) {
      this.backups.discard(session.backups);
      this.record(session, 'incomplete', `${halted.phase}: ${halted.error.message}`);
      printIncomplete(`DEPLOYMENT INCOMPLETE (${halted.phase})`, [
        formatErrorSafely(halted.error, { verbose: this.deps.settings.verbose }),
        ...(halted.phase === 'endpoint-discovery' ? [`Fetch the address later with: ${MANUAL_ENDPOINT_COMMAND}`] : []),
      ]);
      return EXIT_CODES.incomplete;
    }

    const restored = this.rollback(session.backups);
    this.record(session, outcomeFor(halted.error), `${halted.phase}: ${halted.error.message}`);
    const lines = [`Phase: ${halted.phase}`, formatErrorSafely(halted.error, { verbose: this.deps.settings.verbose })];
    if (restored.ok) {
      lines.push(`Configuration files restored (${restored.value}).`);
    } else {
      lines.push(formatErrorSafely(restored.error));
    }
    printFailure(halted.error.kind === 'interrupt' ? 'DEPLOYMENT INTERRUPTED' : 'DEPLOYMENT FAILED', lines);
    this.deps.logger.error(`Deployment halted in ${halted.phase}`, halted.error, { record: record.clusterName });
    if (!restored.ok) {
      return EXIT_CODES.failure;
    }
    return exitCodeFor(halted.error, this.token);
  }

  private async teardown(environment: PhaseEnvironment, session: DeploymentSession): Promise<ExitCode> {
    const result = await new TeardownExecutor(environment, { countdown: this.deps.countdown }).run(session);
    if (result.ok) {
      this.record(session, 'succeeded');
      const lines = [`Stages: ${result.value.completed.join(', ')}`];
      if (result.value.deletedSecrets.length > 0) {
        lines.push(`Deleted secrets: ${result.value.deletedSecrets.join(', ')}`);
      }
      if (result.value.keptSecrets.length > 0) {
        lines.push(`Kept secrets: ${result.value.keptSecrets.join(', ')}`);
      }
      if (result.value.leftovers.length > 0) {
        lines.push(`Still tagged: ${result.value.leftovers.length} resource(s), listed above`);
      }
      printSuccess('TEARDOWN COMPLETE', lines);
      return EXIT_CODES.success;
    }

    const { stage, error } = result.error;
    if (stage === 'confirmation') {
      this.record(session, this.token.isCancelled ? 'interrupted' : 'aborted', error.message);
      console.log(chalk.yellow(`\n${error.message}. Nothing was removed.`));
      return this.token.isCancelled ? EXIT_CODES.interrupted : EXIT_CODES.failure;
    }
    this.record(session, outcomeFor(error), `${stage}: ${error.message}`);
    if (stage === 'region') {
      return this.fail(error, 'PRECONDITION FAILED');
    }
    const code = this.fail(error, `TEARDOWN FAILED (${stage})`);
    console.log(chalk.gray('Teardown can be re-run; resources already removed are skipped.'));
    return code;
  }

  private record(session: DeploymentSession, outcome: RunOutcome, detail?: string): void {
    this.store.appendHistory({ timestamp: this.now(), mode: session.mode, outcome, record: session.record, detail });
  }

  private summary(session: DeploymentSession): string[] {
    const { record, endpoint } = session;
    const scheme = record.tls.mode === 'disabled' ? 'http' : 'https';
    const host = record.hostname || endpoint;
    const lines = [`Cluster:  ${record.clusterName} (${regionOf(record.target)})`];
    if (host) {
      lines.push(`n8n:      ${scheme}://${host}/`);
    }
    if (endpoint) {
      lines.push(`Endpoint: ${endpoint}`);
    }
    lines.push(`Config:   ${this.store.currentConfigPath}`);
    return lines;
  }

  private listStates(cloud: CloudProviderName | undefined): ExitCode {
    const clouds = cloud ? [cloud] : CLOUD_PROVIDERS;
    for (const name of clouds) {
      const states = this.states(name);
      const snapshots = states.list();
      const current = states.currentRegion();
      console.log(chalk.bold(`\n${name.toUpperCase()}`) + chalk.gray(`  ${states.workingDir}`));
      console.log(`  Current: ${current ?? chalk.gray('none')}`);
      if (snapshots.length === 0) {
        console.log(chalk.gray('  No snapshots'));
        continue;
      }
      for (const snapshot of snapshots) {
        const partial = snapshot.partial ? chalk.yellow(' (partial)') : '';
        console.log(`  ${snapshot.region.padEnd(20)} ${snapshot.timestamp.toISOString()}${partial}`);
      }
    }
    console.log();
    return EXIT_CODES.success;
  }
}
