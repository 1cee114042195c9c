/**
 * Teardown Executor
 *
 * Reverse pipeline with its own ordering: Helm releases go first (the infra
 * engine does not know about the load balancers they create), the infra
 * engine destroys the cluster and database next, and secret-store entries
 * follow because the earlier stages still authenticate with them. A last
 * stage reports cloud resources that still carry the deployment's tag.
 *
 * Every stage treats "already gone" as success, so a second run against a
 * half-removed environment finishes cleanly.
 */

import chalk from 'chalk';
import { regionOf } from '../config/record.js';
import { InterruptError, PreconditionError, err, ok, type OrchestrationError, type Result } from '../lib/errors.js';
import { sleep, type CancellationToken } from '../lib/cancellation.js';
import { pollUntil } from '../lib/polling.js';
import { startSpinner } from '../lib/ui.js';
import { resolveRegionConflict } from '../state/region-gate.js';
import { field, stringField } from '../providers/base.js';
import { SECRET_TAG } from '../providers/types.js';
import {
  createToolbox,
  deploymentContext,
  ensureClusterAccess,
  type PhaseEnvironment,
  type Toolbox,
} from '../deployment/phase-executor.js';
import { INGRESS_NGINX } from '../deployment/phases/application.js';
import { CERT_MANAGER } from '../deployment/phases/tls-auth.js';
import { SECRET_NAMES } from '../deployment/helm-values.js';
import { clusterIssuerName } from '../deployment/manifests.js';
import type { DeploymentSession } from '../session/session.js';

export type TeardownStage = 'releases' | 'cluster-resources' | 'infrastructure' | 'secret-store' | 'leftovers';

export const TEARDOWN_STAGES: readonly TeardownStage[] = ['releases', 'cluster-resources', 'infrastructure', 'secret-store', 'leftovers'];

export interface TeardownReport {
  completed: TeardownStage[];
  /** Secret-store entries removed in the last stage */
  deletedSecrets: string[];
  /** Entries the user chose to keep */
  keptSecrets: string[];
  /** Cloud resources still tagged for the deployment after the other stages */
  leftovers: string[];
}

export type TeardownFailure = { stage: TeardownStage | 'confirmation' | 'region'; error: OrchestrationError };

/**
 * Names of LoadBalancer services still present in a `kubectl get services -A -o json` list
 */
export function loadBalancerServices(list: unknown): string[] {
  const items = field(list, 'items');
  if (!Array.isArray(items)) {
    return [];
  }
  const names: string[] = [];
  for (const item of items) {
    if (stringField(field(item, 'spec'), 'type') === 'LoadBalancer') {
      const metadata = field(item, 'metadata');
      names.push(`${stringField(metadata, 'namespace') ?? 'default'}/${stringField(metadata, 'name') ?? '?'}`);
    }
  }
  return names;
}

export interface TeardownOptions {
  countdown?: (seconds: number, token: CancellationToken) => Promise<void>;
}

async function defaultCountdown(seconds: number, token: CancellationToken): Promise<void> {
  for (let remaining = seconds; remaining > 0 && !token.isCancelled; remaining--) {
    process.stdout.write(chalk.red(`\r   Starting teardown in ${remaining}s (Ctrl+C to abort) `));
    await sleep(1000, token);
  }
  if (seconds > 0) {
    process.stdout.write('\n');
  }
}

export class TeardownExecutor {
  private readonly countdown: (seconds: number, token: CancellationToken) => Promise<void>;

  constructor(
    private readonly env: PhaseEnvironment,
    options: TeardownOptions = {}
  ) {
    this.countdown = options.countdown ?? defaultCountdown;
  }

  /**
   * Two confirmations, then an abortable countdown. Nothing runs before this passes.
   */
  async confirm(session: DeploymentSession): Promise<Result<void, OrchestrationError>> {
    const { record, token } = session;
    const { prompter, provider } = this.env;

    prompter.warn(
      `This destroys the ${provider.displayName} cluster ${record.clusterName} in ${regionOf(record.target)}, ` +
        'its database and every workflow stored in n8n.'
    );
    const first = await prompter.confirm('Are you sure you want to tear down this deployment?', false);
    if (first === undefined) {
      return err(new InterruptError());
    }
    if (!first) {
      return err(new InterruptError('Teardown declined'));
    }

    const typed = await prompter.text({ message: `Type the cluster name (${record.clusterName}) to confirm` });
    if (typed === undefined) {
      return err(new InterruptError());
    }
    if (typed !== record.clusterName) {
      return err(new InterruptError(`"${typed}" does not match ${record.clusterName}; teardown cancelled`));
    }

    await this.countdown(this.env.settings.teardownCountdownSeconds, token);
    return token.check();
  }

  async run(session: DeploymentSession): Promise<Result<TeardownReport, TeardownFailure>> {
    const report: TeardownReport = { completed: [], deletedSecrets: [], keptSecrets: [], leftovers: [] };
    const tools = createToolbox(this.env, session);

    const gate = await this.confirm(session);
    if (!gate.ok) {
      return err({ stage: 'confirmation', error: gate.error });
    }

    // Destroy must run against the state of the region being torn down
    const region = await resolveRegionConflict(this.env.states, regionOf(session.record.target), this.env, 'teardown');
    if (!region.ok) {
      return err({ stage: 'region', error: region.error });
    }

    const outputs = await tools.terraform.outputs(session.token);
    if (outputs.ok) {
      session.outputs = outputs.value;
    } else if (outputs.error.kind === 'interrupt') {
      return err({ stage: 'releases', error: outputs.error });
    } else {
      this.env.logger.warn('No infrastructure outputs; continuing with the saved configuration');
    }

    const stages: Array<[TeardownStage, () => Promise<Result<void, OrchestrationError>>]> = [
      ['releases', () => this.removeReleases(tools, session)],
      ['cluster-resources', () => this.removeClusterResources(tools, session)],
      ['infrastructure', () => this.destroyInfrastructure(tools, session)],
      ['secret-store', () => this.cleanSecretStore(session, report)],
      ['leftovers', () => this.reportLeftovers(session, report)],
    ];

    for (const [stage, action] of stages) {
      const check = session.token.check();
      if (!check.ok) {
        return err({ stage, error: check.error });
      }
      console.log(chalk.bold.white(`\n▸ Teardown ${report.completed.length + 1}/${stages.length}: ${stage}`));
      const result = await action();
      if (!result.ok) {
        this.env.logger.error(`Teardown stage ${stage} failed`, result.error);
        return err({ stage, error: result.error });
      }
      report.completed.push(stage);
    }
    return ok(report);
  }

  /**
   * Cluster stages run only while the cluster still exists
   */
  private async clusterReachable(session: DeploymentSession): Promise<Result<boolean, OrchestrationError>> {
    const access = await ensureClusterAccess(this.env, session);
    if (access.ok) {
      return ok(true);
    }
    if (access.error.kind === 'interrupt') {
      return access;
    }
    this.env.prompter.warn(`Cluster ${session.record.clusterName} is not reachable; skipping cluster cleanup`);
    return ok(false);
  }

  private async removeReleases(tools: Toolbox, session: DeploymentSession): Promise<Result<void, OrchestrationError>> {
    const reachable = await this.clusterReachable(session);
    if (!reachable.ok || !reachable.value) {
      return reachable.ok ? ok(undefined) : reachable;
    }
    const { token, record } = session;
    const releases: Array<[string, string]> = [
      [this.env.settings.releaseName, record.namespace],
      [CERT_MANAGER.release, CERT_MANAGER.namespace],
      [INGRESS_NGINX.release, INGRESS_NGINX.namespace],
    ];
    for (const [release, namespace] of releases) {
      const removed = await tools.helm.uninstall(release, namespace, token);
      if (!removed.ok) {
        return removed;
      }
      this.env.logger.info(`Release ${release} ${removed.value}`, { namespace });
    }

    // Cloud load balancers are deleted asynchronously; the infra engine cannot remove the network under them
    const spinner = startSpinner('Waiting for load balancers to be released...');
    const drained = await pollUntil(
      async () => {
        const services = await tools.kubectl.getJson(['services', '--all-namespaces'], token);
        if (!services.ok) {
          return undefined;
        }
        return loadBalancerServices(services.value).length === 0 ? true : undefined;
      },
      {
        description: 'load balancers to be released',
        intervalMs: this.env.settings.timeouts.pollIntervalMs,
        timeoutMs: this.env.settings.timeouts.endpointMs,
        token,
        wait: this.env.wait,
        hint: 'Delete the remaining LoadBalancer services with kubectl, then run the teardown again.',
      }
    );
    if (!drained.ok) {
      spinner.fail('Load balancers are still present');
      return drained;
    }
    spinner.succeed('Load balancers released');
    return ok(undefined);
  }

  private async removeClusterResources(tools: Toolbox, session: DeploymentSession): Promise<Result<void, OrchestrationError>> {
    const reachable = await this.clusterReachable(session);
    if (!reachable.ok || !reachable.value) {
      return reachable.ok ? ok(undefined) : reachable;
    }
    const { token, record } = session;
    const deletions: string[][] = [
      ['pvc', '--all', '-n', record.namespace],
      ['secret', SECRET_NAMES.encryptionKey, SECRET_NAMES.database, SECRET_NAMES.tls, SECRET_NAMES.basicAuth, '-n', record.namespace],
      ['clusterissuer', clusterIssuerName('production'), clusterIssuerName('staging')],
      ['namespace', record.namespace, CERT_MANAGER.namespace, INGRESS_NGINX.namespace],
    ];
    for (const args of deletions) {
      const deleted = await tools.kubectl.delete(args, token);
      if (!deleted.ok) {
        return deleted;
      }
    }
    this.env.logger.info('Cluster resources removed', { namespace: record.namespace });
    return ok(undefined);
  }

  private async destroyInfrastructure(tools: Toolbox, session: DeploymentSession): Promise<Result<void, OrchestrationError>> {
    // Empty outputs: nothing was applied, or an earlier teardown already destroyed it
    if (Object.keys(session.outputs).length > 0) {
      const protection = await this.env.provider.disableDatabaseProtection(deploymentContext(session));
      if (!protection.ok) {
        return protection;
      }
      if (protection.value === 'cleared') {
        this.env.logger.info('Database deletion protection cleared');
      }
    }

    const destroyed = await tools.terraform.destroy(session.token);
    if (!destroyed.ok) {
      return destroyed;
    }
    const region = regionOf(session.record.target);
    const removed = this.env.states.snapshotAndClear();
    this.env.logger.info('Infrastructure destroyed', { region, finalSnapshot: removed?.path ?? null });
    return ok(undefined);
  }

  /**
   * Offer each tagged entry for deletion; the default answer keeps it
   */
  private async cleanSecretStore(session: DeploymentSession, report: TeardownReport): Promise<Result<void, OrchestrationError>> {
    const context = deploymentContext(session);
    const listed = await this.env.provider.listSecrets(context);
    if (!listed.ok) {
      return listed;
    }
    if (listed.value.length === 0) {
      this.env.prompter.note('No secret-store entries tagged app=n8n remain');
      return ok(undefined);
    }

    for (const entry of listed.value) {
      const answer = await this.env.prompter.confirm(`Delete secret-store entry ${entry.name}?`, false);
      if (answer === undefined) {
        return err(new InterruptError());
      }
      if (!answer) {
        report.keptSecrets.push(entry.name);
        continue;
      }
      const deleted = await this.env.provider.deleteSecret(context, entry.name);
      if (!deleted.ok) {
        return deleted;
      }
      report.deletedSecrets.push(entry.name);
    }
    return ok(undefined);
  }

  /**
   * Report what the other stages left behind. Only an interrupt fails this
   * stage; the user removes anything listed by hand.
   */
  private async reportLeftovers(session: DeploymentSession, report: TeardownReport): Promise<Result<void, OrchestrationError>> {
    const listed = await this.env.provider.listLeftoverResources(deploymentContext(session));
    if (!listed.ok) {
      if (listed.error.kind === 'interrupt') {
        return listed;
      }
      this.env.logger.warn('Could not list leftover resources', { reason: listed.error.message });
      this.env.prompter.warn(`Could not check for leftover resources: ${listed.error.message}`);
      return ok(undefined);
    }
    if (listed.value.length === 0) {
      this.env.prompter.note(`No resources tagged ${SECRET_TAG.key}=${SECRET_TAG.value} remain`);
      return ok(undefined);
    }
    report.leftovers.push(...listed.value);
    this.env.prompter.warn(
      `${listed.value.length} resource(s) still tagged ${SECRET_TAG.key}=${SECRET_TAG.value} in ${this.env.provider.displayName}; remove them by hand:\n` +
        listed.value.map((resource) => `  - ${resource}`).join('\n')
    );
    return ok(undefined);
  }
}

/**
 * Teardown needs the record of the deployment it removes
 */
export function missingRecordError(): PreconditionError {
  return new PreconditionError('No saved configuration to tear down', 'Teardown reads .setup-current.json from the last deploy.');
}
