/**
 * Phase 1: provision the network, cluster and database with the infra engine
 */

import { regionOf } from '../../config/record.js';
import { ExternalToolError, InterruptError, PreconditionError, TimeoutError, type OrchestrationError } from '../../lib/errors.js';
import { startSpinner } from '../../lib/ui.js';
import type { DeploymentSession } from '../../session/session.js';
import type { InfraOutputs } from '../../types.js';
import {
  createToolbox,
  fatal,
  succeeded,
  type Phase,
  type PhaseEnvironment,
  type PhaseOutcome,
  type Precondition,
} from '../phase-executor.js';

const DATABASE_OUTPUTS = ['db_host', 'db_port', 'db_name', 'db_username', 'db_password'] as const;

/**
 * Outputs the later phases read; a missing one means the module is out of date
 */
export function requiredOutputs(session: DeploymentSession): string[] {
  const required = ['cluster_name'];
  if (session.record.database.kind === 'managed') {
    required.push(...DATABASE_OUTPUTS);
  }
  return required;
}

export function missingOutputs(outputs: InfraOutputs, required: string[]): string[] {
  return required.filter((name) => !outputs[name]);
}

/**
 * Same error with a different remediation hint
 */
function withHint(error: OrchestrationError, hint: string): OrchestrationError {
  if (error instanceof ExternalToolError) {
    return new ExternalToolError(error.message, error.command, error.exitCode, error.output, hint);
  }
  if (error instanceof TimeoutError) {
    return new TimeoutError(error.message, error.timeoutMs, hint);
  }
  if (error instanceof InterruptError) {
    return new InterruptError(error.message, hint);
  }
  return error;
}

export interface InfrastructureOptions {
  /** Load the outputs of an earlier apply instead of applying */
  reuseExisting: boolean;
}

export class InfrastructurePhase implements Phase {
  readonly name = 'infrastructure' as const;
  readonly title: string;

  constructor(
    private readonly env: PhaseEnvironment,
    private readonly options: InfrastructureOptions
  ) {
    this.title = options.reuseExisting ? 'Infrastructure (existing)' : 'Infrastructure';
  }

  precondition(session: DeploymentSession): Precondition {
    const region = regionOf(session.record.target);
    const check = this.env.states.checkTarget(region);

    if (this.options.reuseExisting) {
      if (check.status === 'current') {
        return { status: 'ready' };
      }
      const detail = check.status === 'conflict' ? `it belongs to ${check.currentRegion}` : 'there is none';
      return {
        status: 'unmet',
        error: new PreconditionError(
          `Cannot reuse the infra state for ${region}: ${detail}`,
          'Run a full deploy first, or restore the region with --list-states to see what exists.'
        ),
      };
    }

    const gate = this.env.states.ensureTarget(region);
    return gate.ok ? { status: 'ready' } : { status: 'unmet', error: gate.error };
  }

  async run(session: DeploymentSession): Promise<PhaseOutcome> {
    const { terraform } = createToolbox(this.env, session);
    const { logger, states, prompter } = this.env;
    const region = regionOf(session.record.target);

    if (!this.options.reuseExisting) {
      states.claim(region);

      const init = await terraform.init(session.token);
      if (!init.ok) {
        return fatal(init.error);
      }

      const plan = await terraform.plan(session.token);
      if (!plan.ok) {
        return fatal(plan.error);
      }

      const proceed = await prompter.confirm(`Apply this plan to ${region}?`, true);
      if (proceed !== true) {
        terraform.discardPlan();
        return fatal(new InterruptError('Infrastructure plan was not approved'));
      }

      logger.info('Applying infrastructure', { region, cluster: session.record.clusterName });
      const apply = await terraform.apply(session.token);
      if (!apply.ok) {
        // The state now tracks whatever was created before the failure
        const partial = states.snapshotFor(region, { partial: true });
        const where = partial ? ` A copy of that state is at ${partial.path}.` : '';
        return fatal(
          withHint(
            apply.error,
            `Terraform state in ${states.workingDir} still tracks the partially created resources.${where} ` +
              'Re-run the deploy to converge, or run "terraform destroy" in that directory to remove them.'
          )
        );
      }
    }

    const spinner = startSpinner('Reading infrastructure outputs...');
    const outputs = await terraform.outputs(session.token);
    if (!outputs.ok) {
      spinner.fail('Could not read infrastructure outputs');
      return fatal(outputs.error);
    }

    const missing = missingOutputs(outputs.value, requiredOutputs(session));
    if (missing.length > 0) {
      spinner.fail('Infrastructure outputs incomplete');
      return fatal(
        new ExternalToolError(
          `The infra engine did not report: ${missing.join(', ')}`,
          'terraform output -json',
          0,
          '',
          `Check the outputs defined in ${states.workingDir}.`
        )
      );
    }
    spinner.succeed('Infrastructure outputs loaded');
    session.outputs = outputs.value;

    if (!this.options.reuseExisting) {
      const snapshot = states.snapshotFor(region);
      logger.info('Infrastructure applied', { region, snapshot: snapshot?.path ?? null });
    }
    return succeeded();
  }
}
