import { copyFileSync, existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { PreconditionError, err, ok, type Result } from '../lib/errors.js';

export const STATE_FILE = 'terraform.tfstate';
export const REGION_MARKER_FILE = '.launchpad-region';
export const SNAPSHOT_DIR = 'state-snapshots';

const SNAPSHOT_PATTERN = /^terraform\.tfstate\.([a-z0-9-]+)\.(\d{8}T\d{9}Z)(\.partial)?$/;

export interface RegionSnapshot {
  region: string;
  timestamp: Date;
  path: string;
  /** Taken after a failed apply; describes partially created resources */
  partial: boolean;
}

export type TargetCheck =
  | { status: 'clear' }
  | { status: 'current' }
  | { status: 'conflict'; currentRegion: string };

export interface RegionStateOptions {
  now?: () => Date;
}

function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, '');
}

function parseCompactTimestamp(stamp: string): Date {
  const iso = `${stamp.slice(0, 4)}-${stamp.slice(4, 6)}-${stamp.slice(6, 8)}T${stamp.slice(9, 11)}:${stamp.slice(11, 13)}:${stamp.slice(13, 15)}.${stamp.slice(15, 18)}Z`;
  return new Date(iso);
}

function stringOutput(outputs: unknown, name: string): string | null {
  if (outputs === null || typeof outputs !== 'object' || !(name in outputs)) {
    return null;
  }
  const entry: unknown = Object.getOwnPropertyDescriptor(outputs, name)?.value;
  if (entry !== null && typeof entry === 'object' && 'value' in entry && typeof entry.value === 'string') {
    return entry.value;
  }
  return null;
}

/**
 * Region-aware guard around the infra engine's local state file
 *
 * One working directory holds one "current" state. Deploying to another
 * region requires either an empty state or an explicit snapshot-and-clear
 * followed by a restore; a non-empty state of a different region is never
 * overwritten or merged.
 *
 * @param workingDir - Infra engine working directory for one cloud
 * @returns Region state manager object
 *
 * @example
 * ```typescript
 * const states = getRegionStateManager('/project/terraform/aws');
 * const check = states.ensureTarget('eu-west-1');
 * if (!check.ok) {
 *   console.error(check.error.message);
 * }
 * ```
 */
export function getRegionStateManager(workingDir: string, options: RegionStateOptions = {}) {
  const now = options.now ?? (() => new Date());
  const statePath = join(workingDir, STATE_FILE);
  const markerPath = join(workingDir, REGION_MARKER_FILE);
  const snapshotDir = join(workingDir, SNAPSHOT_DIR);

  /**
   * True when a state file exists and tracks at least one resource.
   * A state that cannot be parsed counts as non-empty.
   */
  function hasState(): boolean {
    if (!existsSync(statePath)) {
      return false;
    }
    try {
      const state: unknown = JSON.parse(readFileSync(statePath, 'utf-8'));
      if (state === null || typeof state !== 'object' || !('resources' in state)) {
        return true;
      }
      return !Array.isArray(state.resources) || state.resources.length > 0;
    } catch {
      return true;
    }
  }

  function readMarker(): string | null {
    if (!existsSync(markerPath)) {
      return null;
    }
    const region = readFileSync(markerPath, 'utf-8').trim();
    return region.length > 0 ? region : null;
  }

  function regionFromOutputs(): string | null {
    try {
      const state: unknown = JSON.parse(readFileSync(statePath, 'utf-8'));
      if (state === null || typeof state !== 'object' || !('outputs' in state)) {
        return null;
      }
      return stringOutput(state.outputs, 'region') ?? stringOutput(state.outputs, 'location');
    } catch {
      return null;
    }
  }

  /**
   * Region the current state belongs to
   *
   * @returns `null` when there is no (non-empty) state, `'unknown'` when a
   * state exists but names no region
   */
  function currentRegion(): string | null {
    if (!hasState()) {
      return null;
    }
    return readMarker() ?? regionFromOutputs() ?? 'unknown';
  }

  function checkTarget(region: string): TargetCheck {
    const current = currentRegion();
    if (current === null) {
      return { status: 'clear' };
    }
    if (current === region) {
      return { status: 'current' };
    }
    return { status: 'conflict', currentRegion: current };
  }

  /**
   * Gate for the infrastructure phase
   */
  function ensureTarget(region: string): Result<'clear' | 'current', PreconditionError> {
    const check = checkTarget(region);
    if (check.status === 'conflict') {
      return err(
        new PreconditionError(
          `The infra state in ${workingDir} belongs to region ${check.currentRegion}, not ${region}`,
          'Snapshot and clear the current state, or restore the snapshot of the requested region, before deploying.'
        )
      );
    }
    return ok(check.status);
  }

  /**
   * Record which region the working directory's state belongs to
   */
  function claim(region: string): void {
    mkdirSync(workingDir, { recursive: true });
    writeFileSync(markerPath, `${region}\n`, 'utf-8');
  }

  /**
   * Copy the current state file into the snapshot directory
   *
   * @returns The snapshot, or `null` when there is no state file to copy
   */
  function snapshotFor(region: string, snapshotOptions: { partial?: boolean } = {}): RegionSnapshot | null {
    if (!existsSync(statePath)) {
      return null;
    }
    const timestamp = now();
    const suffix = snapshotOptions.partial ? '.partial' : '';
    const path = join(snapshotDir, `${STATE_FILE}.${region}.${compactTimestamp(timestamp)}${suffix}`);
    mkdirSync(snapshotDir, { recursive: true });
    copyFileSync(statePath, path);
    return { region, timestamp, path, partial: snapshotOptions.partial ?? false };
  }

  /**
   * Snapshot the current state under its own region, then empty the
   * working directory so another region can be deployed
   */
  function snapshotAndClear(): RegionSnapshot | null {
    const region = currentRegion();
    const snapshot = region === null ? null : snapshotFor(region);
    rmSync(statePath, { force: true });
    rmSync(`${statePath}.backup`, { force: true });
    rmSync(markerPath, { force: true });
    return snapshot;
  }

  /**
   * All snapshots, newest first
   */
  function list(): RegionSnapshot[] {
    if (!existsSync(snapshotDir)) {
      return [];
    }
    const snapshots: RegionSnapshot[] = [];
    for (const name of readdirSync(snapshotDir)) {
      const match = SNAPSHOT_PATTERN.exec(name);
      if (!match?.[1] || !match[2]) {
        continue;
      }
      snapshots.push({
        region: match[1],
        timestamp: parseCompactTimestamp(match[2]),
        path: join(snapshotDir, name),
        partial: match[3] !== undefined,
      });
    }
    return snapshots.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  /**
   * Make the newest complete snapshot of `region` the current state.
   * Refuses while a non-empty state of another region is current, and
   * leaves a state that already belongs to `region` untouched.
   */
  function restoreFor(region: string): Result<'restored' | 'not-found', PreconditionError> {
    const gate = ensureTarget(region);
    if (!gate.ok) {
      return gate;
    }
    if (gate.value === 'current') {
      return ok('restored' as const);
    }
    const newest = list().find((snapshot) => snapshot.region === region && !snapshot.partial);
    if (!newest) {
      return ok('not-found' as const);
    }
    copyFileSync(newest.path, statePath);
    claim(region);
    return ok('restored' as const);
  }

  return {
    workingDir,
    statePath,
    hasState,
    currentRegion,
    checkTarget,
    ensureTarget,
    claim,
    snapshotFor,
    snapshotAndClear,
    restoreFor,
    list,
  };
}

export type RegionStateManager = ReturnType<typeof getRegionStateManager>;
