/**
 * Phase 3: wait for the cloud load balancer in front of ingress-nginx
 *
 * A timeout here is reported, not rolled back: the load balancer usually
 * still comes up, and the user can fetch its address by hand.
 */

import chalk from 'chalk';
import { pollUntil } from '../../lib/polling.js';
import { startSpinner } from '../../lib/ui.js';
import { field, stringField } from '../../providers/base.js';
import type { DeploymentSession } from '../../session/session.js';
import {
  createToolbox,
  ensureClusterAccess,
  fatal,
  recoverable,
  succeeded,
  type Phase,
  type PhaseEnvironment,
  type PhaseOutcome,
  type Precondition,
} from '../phase-executor.js';
import { INGRESS_NGINX } from './application.js';

/**
 * Hostname (AWS) or IP (Azure, GCP) of the first load balancer ingress
 */
export function loadBalancerAddress(service: unknown): string | null {
  const ingress = field(field(field(service, 'status'), 'loadBalancer'), 'ingress');
  if (!Array.isArray(ingress)) {
    return null;
  }
  const first: unknown = ingress[0];
  return stringField(first, 'hostname') || stringField(first, 'ip') || null;
}

export const MANUAL_ENDPOINT_COMMAND =
  `kubectl get service ${INGRESS_NGINX.service} -n ${INGRESS_NGINX.namespace} ` +
  `-o jsonpath='{.status.loadBalancer.ingress[0].hostname}{.status.loadBalancer.ingress[0].ip}'`;

export class EndpointDiscoveryPhase implements Phase {
  readonly name = 'endpoint-discovery' as const;
  readonly title = 'Endpoint Discovery';

  constructor(private readonly env: PhaseEnvironment) {}

  precondition(): Precondition {
    return { status: 'ready' };
  }

  async run(session: DeploymentSession): Promise<PhaseOutcome> {
    const { token, record } = session;
    const { settings, logger } = this.env;
    const { kubectl } = createToolbox(this.env, session);

    const access = await ensureClusterAccess(this.env, session);
    if (!access.ok) {
      return fatal(access.error);
    }

    const spinner = startSpinner('Waiting for the load balancer address...');
    const address = await pollUntil(
      async () => {
        const service = await kubectl.getJson(['service', INGRESS_NGINX.service, '-n', INGRESS_NGINX.namespace], token);
        return service.ok ? (loadBalancerAddress(service.value) ?? undefined) : undefined;
      },
      {
        description: 'the load balancer address',
        intervalMs: settings.timeouts.pollIntervalMs,
        timeoutMs: settings.timeouts.endpointMs,
        token,
        wait: this.env.wait,
        hint: `The load balancer may still be provisioning. Check it with: ${MANUAL_ENDPOINT_COMMAND}`,
      }
    );

    if (!address.ok) {
      spinner.fail('No load balancer address yet');
      return address.error.kind === 'timeout' ? recoverable(address.error) : fatal(address.error);
    }

    spinner.succeed(`Load balancer: ${address.value}`);
    session.endpoint = address.value;
    logger.info('Endpoint discovered', { endpoint: address.value });

    if (record.hostname) {
      console.log(chalk.cyan(`\n   Point DNS for ${chalk.bold(record.hostname)} at ${chalk.bold(address.value)}`));
      console.log(chalk.gray(`   (a CNAME for a hostname, an A record for an IP address)\n`));
    }
    return succeeded();
  }
}
