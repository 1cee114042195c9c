/**
 * Backup Manager
 *
 * Copies every configuration file a run may overwrite before the first
 * write, and puts them back byte for byte on failure or interrupt. Files
 * that did not exist before the run are removed on restore.
 *
 * The infra engine's state file is never part of a backup set: after a
 * failed apply it describes resources that really exist.
 */

import { copyFileSync, existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, rmdirSync } from 'fs';
import { basename, dirname, join } from 'path';
import { RestoreError, err, ok, type Result, type RestoreFailure } from '../lib/errors.js';

export interface BackupRecord {
  sourcePath: string;
  /** `null` when the source did not exist at snapshot time */
  snapshotPath: string | null;
  existed: boolean;
  timestamp: string;
}

function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace('.', '');
}

export class BackupManager {
  constructor(
    private readonly backupRoot: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Must be called before any of `paths` is modified
   */
  snapshot(paths: string[]): BackupRecord[] {
    const timestamp = this.now();
    let runDir: string | null = null;

    return paths.map((sourcePath, index) => {
      if (!existsSync(sourcePath)) {
        return { sourcePath, snapshotPath: null, existed: false, timestamp: timestamp.toISOString() };
      }
      if (runDir === null) {
        mkdirSync(this.backupRoot, { recursive: true });
        runDir = mkdtempSync(join(this.backupRoot, `${compactTimestamp(timestamp)}-`));
      }
      const snapshotPath = join(runDir, `${index}-${basename(sourcePath)}`);
      copyFileSync(sourcePath, snapshotPath);
      return { sourcePath, snapshotPath, existed: true, timestamp: timestamp.toISOString() };
    });
  }

  /**
   * Restore every record. Keeps going past individual failures and reports
   * them together; any failure leaves the run in a fatal state.
   */
  restore(records: BackupRecord[]): Result<number, RestoreError> {
    const failures: RestoreFailure[] = [];

    for (const record of records) {
      try {
        if (record.existed && record.snapshotPath) {
          mkdirSync(dirname(record.sourcePath), { recursive: true });
          copyFileSync(record.snapshotPath, record.sourcePath);
        } else if (existsSync(record.sourcePath)) {
          rmSync(record.sourcePath, { force: true });
        }
      } catch (error) {
        failures.push({ path: record.sourcePath, reason: error instanceof Error ? error.message : String(error) });
      }
    }

    if (failures.length > 0) {
      return err(
        new RestoreError(`Restored ${records.length - failures.length} of ${records.length} files; the rest are left modified`, failures)
      );
    }
    return ok(records.length);
  }

  /**
   * Drop the snapshots after a confirmed success
   */
  discard(records: BackupRecord[]): void {
    const runDirs = new Set<string>();
    for (const record of records) {
      if (record.snapshotPath) {
        rmSync(record.snapshotPath, { force: true });
        runDirs.add(dirname(record.snapshotPath));
      }
    }
    for (const dir of runDirs) {
      if (existsSync(dir) && readdirSync(dir).length === 0) {
        rmdirSync(dir);
      }
    }
  }
}
