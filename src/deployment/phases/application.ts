/**
 * Phase 2: namespace, secrets, ingress controller and the n8n release
 */

import { PreconditionError } from '../../lib/errors.js';
import { pollUntil } from '../../lib/polling.js';
import { startSpinner } from '../../lib/ui.js';
import { field } from '../../providers/base.js';
import type { DeploymentSession } from '../../session/session.js';
import { SECRET_NAMES } from '../helm-values.js';
import { namespaceManifest, opaqueSecret, type Manifest } from '../manifests.js';
import {
  createToolbox,
  ensureClusterAccess,
  fatal,
  succeeded,
  type Phase,
  type PhaseEnvironment,
  type PhaseOutcome,
  type Precondition,
} from '../phase-executor.js';

export const INGRESS_NGINX = {
  repoName: 'ingress-nginx',
  repoUrl: 'https://kubernetes.github.io/ingress-nginx',
  chart: 'ingress-nginx/ingress-nginx',
  release: 'ingress-nginx',
  namespace: 'ingress-nginx',
  service: 'ingress-nginx-controller',
} as const;

/**
 * Secret holding the managed database connection, in the variable names n8n reads
 */
export function databaseSecret(session: DeploymentSession): Manifest | null {
  if (session.record.database.kind !== 'managed') {
    return null;
  }
  const { outputs } = session;
  return opaqueSecret(SECRET_NAMES.database, session.record.namespace, {
    DB_POSTGRESDB_HOST: outputs.db_host ?? '',
    DB_POSTGRESDB_PORT: outputs.db_port ?? '5432',
    DB_POSTGRESDB_DATABASE: outputs.db_name ?? '',
    DB_POSTGRESDB_USER: outputs.db_username ?? '',
    DB_POSTGRESDB_PASSWORD: outputs.db_password ?? '',
  });
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}

/**
 * True when the list holds at least one deployment and every one has all
 * its replicas available
 */
export function deploymentsReady(list: unknown): boolean {
  const items = field(list, 'items');
  if (!Array.isArray(items) || items.length === 0) {
    return false;
  }
  return items.every((item) => {
    const wanted = numberOr(field(field(item, 'spec'), 'replicas'), 1);
    const available = numberOr(field(field(item, 'status'), 'availableReplicas'), 0);
    return available >= wanted;
  });
}

export class ApplicationPhase implements Phase {
  readonly name = 'application' as const;
  readonly title = 'Application';

  constructor(private readonly env: PhaseEnvironment) {}

  precondition(session: DeploymentSession): Precondition {
    if (!session.outputs.cluster_name) {
      return {
        status: 'unmet',
        error: new PreconditionError('No cluster outputs are loaded', 'The infrastructure phase must succeed first.'),
      };
    }
    return { status: 'ready' };
  }

  async run(session: DeploymentSession): Promise<PhaseOutcome> {
    const { record, token } = session;
    const { settings, logger } = this.env;
    const { helm, kubectl } = createToolbox(this.env, session);

    const access = await ensureClusterAccess(this.env, session);
    if (!access.ok) {
      return fatal(access.error);
    }

    const manifests: Manifest[] = [
      namespaceManifest(record.namespace),
      opaqueSecret(SECRET_NAMES.encryptionKey, record.namespace, { N8N_ENCRYPTION_KEY: record.encryptionKey }),
    ];
    const dbSecret = databaseSecret(session);
    if (dbSecret) {
      manifests.push(dbSecret);
    }
    for (const manifest of manifests) {
      const applied = await kubectl.apply(manifest, token);
      if (!applied.ok) {
        return fatal(applied.error);
      }
    }
    logger.info('Namespace and secrets applied', { namespace: record.namespace, secrets: manifests.length - 1 });

    const repo = await helm.addRepo(INGRESS_NGINX.repoName, INGRESS_NGINX.repoUrl, token);
    if (!repo.ok) {
      return fatal(repo.error);
    }
    const ingress = await helm.upgradeInstall(
      {
        release: INGRESS_NGINX.release,
        chart: INGRESS_NGINX.chart,
        namespace: INGRESS_NGINX.namespace,
        setArgs: ['--set', 'controller.service.type=LoadBalancer'],
      },
      token
    );
    if (!ingress.ok) {
      return fatal(ingress.error);
    }

    const release = await helm.upgradeInstall(
      {
        release: settings.releaseName,
        chart: settings.paths.chartDir,
        namespace: record.namespace,
        valuesFiles: [settings.paths.valuesOverride],
      },
      token
    );
    if (!release.ok) {
      return fatal(release.error);
    }

    const spinner = startSpinner('Waiting for n8n to become available...');
    const ready = await pollUntil(
      async () => {
        const list = await kubectl.getJson(
          ['deployments', '-n', record.namespace, '-l', `app.kubernetes.io/instance=${settings.releaseName}`],
          token
        );
        return list.ok && deploymentsReady(list.value) ? true : undefined;
      },
      {
        description: `the ${settings.releaseName} deployment to become available`,
        intervalMs: settings.timeouts.pollIntervalMs,
        timeoutMs: settings.timeouts.readinessMs,
        token,
        wait: this.env.wait,
        hint: `Inspect the pods with "kubectl get pods -n ${record.namespace}" and "kubectl describe pods -n ${record.namespace}".`,
      }
    );
    if (!ready.ok) {
      spinner.fail('n8n did not become available');
      return fatal(ready.error);
    }
    spinner.succeed('n8n is available');
    return succeeded();
  }
}
