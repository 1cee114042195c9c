/**
 * Config Store
 *
 * Owns the files describing a deployment: the persisted record
 * (`.setup-current.json`), the infra variables, the Helm values override and
 * the append-only run history. Callers snapshot these paths with the backup
 * manager before calling any write method.
 */

import { appendFileSync, chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { ConfigurationError, err, ok, type Result } from '../lib/errors.js';
import { renderValuesOverride } from '../deployment/helm-values.js';
import { terraformDirFor, type ResolvedSettings } from './settings.js';
import { ConfigurationRecordSchema, consistencyErrors, flattenRecord, redactRecord } from './record.js';
import { renderTfvars } from './tfvars.js';
import type { CloudProviderName, ConfigurationRecord, SessionMode } from '../types.js';

export interface StoredConfiguration {
  timestamp: string;
  cloudProvider: CloudProviderName;
  configuration: ConfigurationRecord;
}

export type RunOutcome = 'succeeded' | 'failed' | 'incomplete' | 'interrupted' | 'aborted';

export interface HistoryEntry {
  timestamp: Date;
  mode: SessionMode;
  outcome: RunOutcome;
  record: ConfigurationRecord | null;
  /** Failing phase or reason, when there is one */
  detail?: string;
}

const HISTORY_RULE = '='.repeat(72);

export class ConfigStore {
  constructor(private readonly settings: ResolvedSettings) {}

  get currentConfigPath(): string {
    return this.settings.paths.currentConfig;
  }

  get historyPath(): string {
    return this.settings.paths.history;
  }

  tfvarsPath(cloud: CloudProviderName): string {
    return join(terraformDirFor(this.settings, cloud), 'terraform.tfvars');
  }

  get valuesOverridePath(): string {
    return this.settings.paths.valuesOverride;
  }

  /**
   * Every file a deploy run may overwrite, for the backup snapshot
   */
  mutablePaths(cloud: CloudProviderName): string[] {
    return [this.currentConfigPath, this.tfvarsPath(cloud), this.valuesOverridePath];
  }

  /**
   * Persist the full record, readable only by the current user
   */
  writeRecord(record: ConfigurationRecord, timestamp: Date = new Date()): void {
    const stored: StoredConfiguration = {
      timestamp: timestamp.toISOString(),
      cloudProvider: record.target.provider,
      configuration: record,
    };
    writeFileSync(this.currentConfigPath, JSON.stringify(stored, null, 2) + '\n', { encoding: 'utf-8', mode: 0o600 });
    // mode only applies on create
    chmodSync(this.currentConfigPath, 0o600);
  }

  /**
   * Load the previous run's record; `null` when there is none
   */
  readRecord(): Result<StoredConfiguration | null, ConfigurationError> {
    if (!existsSync(this.currentConfigPath)) {
      return ok(null);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.currentConfigPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new ConfigurationError(`Saved configuration is not valid JSON: ${reason}`, this.currentConfigPath));
    }

    if (raw === null || typeof raw !== 'object' || !('configuration' in raw) || !('timestamp' in raw)) {
      return err(new ConfigurationError('Saved configuration has no configuration block', this.currentConfigPath));
    }

    const parsed = ConfigurationRecordSchema.safeParse(raw.configuration);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      return err(new ConfigurationError('Saved configuration is invalid', this.currentConfigPath, issues));
    }

    const consistency = consistencyErrors(parsed.data);
    if (consistency.length > 0) {
      return err(new ConfigurationError('Saved configuration is inconsistent', this.currentConfigPath, consistency));
    }

    return ok({
      timestamp: String(raw.timestamp),
      cloudProvider: parsed.data.target.provider,
      configuration: parsed.data,
    });
  }

  writeInfraVariables(record: ConfigurationRecord): string {
    const path = this.tfvarsPath(record.target.provider);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, renderTfvars(record), 'utf-8');
    return path;
  }

  writeValuesOverride(record: ConfigurationRecord): string {
    mkdirSync(dirname(this.valuesOverridePath), { recursive: true });
    writeFileSync(this.valuesOverridePath, renderValuesOverride(record), 'utf-8');
    return this.valuesOverridePath;
  }

  /**
   * Append one audit block. The encryption key is written redacted.
   */
  appendHistory(entry: HistoryEntry): void {
    const lines = [
      HISTORY_RULE,
      `Timestamp: ${entry.timestamp.toISOString()}`,
      `Mode:      ${entry.mode}`,
      `Outcome:   ${entry.outcome}`,
    ];
    if (entry.detail) {
      lines.push(`Detail:    ${entry.detail}`);
    }
    if (entry.record) {
      lines.push(`Cloud:     ${entry.record.target.provider.toUpperCase()}`, 'Configuration:');
      for (const [key, value] of flattenRecord(redactRecord(entry.record))) {
        lines.push(`  ${key}: ${value}`);
      }
    }
    appendFileSync(this.historyPath, lines.join('\n') + '\n', 'utf-8');
  }
}
