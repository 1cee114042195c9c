/**
 * Region gate shared by deploy and teardown
 *
 * The infra working directory holds one region's state at a time. When the
 * selected region differs, the user either switches (the current state is
 * snapshotted, the target region's newest snapshot restored) or the run
 * stops with a precondition failure.
 */

import { InterruptError, PreconditionError, err, ok, type OrchestrationError, type Result } from '../lib/errors.js';
import type { Prompter } from '../lib/prompt.js';
import type { StructuredLogger } from '../monitoring/structured-logger.js';
import type { RegionStateManager } from './region-state-manager.js';

export type RegionGatePurpose = 'deploy' | 'teardown';

export interface RegionGateDeps {
  prompter: Prompter;
  logger: StructuredLogger;
}

export async function resolveRegionConflict(
  states: RegionStateManager,
  region: string,
  deps: RegionGateDeps,
  purpose: RegionGatePurpose
): Promise<Result<void, OrchestrationError>> {
  const check = states.checkTarget(region);
  if (check.status !== 'conflict') {
    return ok(undefined);
  }
  const { prompter, logger } = deps;
  const current = check.currentRegion;

  // Destroying needs the target's own state; an empty one would destroy nothing
  if (purpose === 'teardown' && !states.list().some((snapshot) => snapshot.region === region && !snapshot.partial)) {
    return err(
      new PreconditionError(
        `The infra state in ${states.workingDir} belongs to ${current}, and no saved state of ${region} exists`,
        `Tear down ${current} with its own configuration, or restore the ${region} state file before running the teardown.`
      )
    );
  }

  prompter.warn(`The infra state in ${states.workingDir} belongs to ${current}, not ${region}.`);
  const question =
    purpose === 'teardown'
      ? `Snapshot the ${current} state and restore the latest ${region} state for teardown?`
      : `Snapshot the ${current} state and switch to ${region}?`;
  const accepted = await prompter.confirm(question, false);
  if (accepted === undefined) {
    return err(new InterruptError());
  }
  if (!accepted) {
    const gate = states.ensureTarget(region);
    return gate.ok ? ok(undefined) : gate;
  }

  const saved = states.snapshotAndClear();
  logger.info(`Saved ${current} state`, { snapshot: saved?.path ?? null });
  const restored = states.restoreFor(region);
  if (!restored.ok) {
    return restored;
  }
  prompter.note(restored.value === 'restored' ? `Restored the latest ${region} state` : `No earlier ${region} state; starting fresh`);
  return ok(undefined);
}
