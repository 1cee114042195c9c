/**
 * Project settings
 *
 * Optional `.launchpad.json` at the project root, validated with zod and
 * resolved into absolute paths and millisecond timeouts. Environment
 * variables override the file for verbosity and the log file.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { z } from 'zod';
import { ConfigurationError, err, ok, type Result } from '../lib/errors.js';
import type { CloudProviderName } from '../types.js';

export const SETTINGS_FILE = '.launchpad.json';
export const CURRENT_CONFIG_FILE = '.setup-current.json';
export const HISTORY_FILE = 'setup_history.log';

const TimeoutsSchema = z
  .object({
    identitySeconds: z.number().int().positive().default(30),
    queryMinutes: z.number().int().positive().default(5),
    provisioningMinutes: z.number().int().positive().default(45),
    readinessSeconds: z.number().int().positive().default(300),
    endpointSeconds: z.number().int().positive().default(600),
    certificateSeconds: z.number().int().positive().default(300),
  })
  .strict();

export const SettingsSchema = z
  .object({
    terraformDir: z.string().min(1).default('terraform'),
    chartDir: z.string().min(1).default('helm'),
    releaseName: z
      .string()
      .regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, 'must be a valid Helm release name')
      .default('n8n'),
    stateDir: z.string().min(1).default('.launchpad'),
    logFile: z.string().min(1).optional(),
    timeouts: TimeoutsSchema.default({}),
    pollIntervalSeconds: z.number().int().positive().default(10),
    teardownCountdownSeconds: z.number().int().min(0).default(5),
  })
  .strict();

export type ProjectSettings = z.infer<typeof SettingsSchema>;

export interface ResolvedTimeouts {
  identityMs: number;
  queryMs: number;
  provisioningMs: number;
  readinessMs: number;
  endpointMs: number;
  certificateMs: number;
  pollIntervalMs: number;
}

export interface ResolvedSettings {
  projectRoot: string;
  releaseName: string;
  verbose: boolean;
  logFile?: string;
  teardownCountdownSeconds: number;
  timeouts: ResolvedTimeouts;
  paths: {
    terraformRoot: string;
    chartDir: string;
    valuesOverride: string;
    stateDir: string;
    backupDir: string;
    currentConfig: string;
    history: string;
  };
}

/**
 * Infra engine working directory for one cloud
 */
export function terraformDirFor(settings: ResolvedSettings, cloud: CloudProviderName): string {
  return join(settings.paths.terraformRoot, cloud);
}

function resolvePath(projectRoot: string, path: string): string {
  return isAbsolute(path) ? path : join(projectRoot, path);
}

export function resolveSettings(
  projectRoot: string,
  settings: ProjectSettings,
  env: NodeJS.ProcessEnv = process.env
): ResolvedSettings {
  const stateDir = resolvePath(projectRoot, settings.stateDir);
  const chartDir = resolvePath(projectRoot, settings.chartDir);
  const logFile = env.LAUNCHPAD_LOG_FILE || settings.logFile;

  return {
    projectRoot,
    releaseName: settings.releaseName,
    verbose: env.LAUNCHPAD_VERBOSE === 'true' || env.LAUNCHPAD_VERBOSE === '1',
    logFile: logFile ? resolvePath(projectRoot, logFile) : undefined,
    teardownCountdownSeconds: settings.teardownCountdownSeconds,
    timeouts: {
      identityMs: settings.timeouts.identitySeconds * 1000,
      queryMs: settings.timeouts.queryMinutes * 60_000,
      provisioningMs: settings.timeouts.provisioningMinutes * 60_000,
      readinessMs: settings.timeouts.readinessSeconds * 1000,
      endpointMs: settings.timeouts.endpointSeconds * 1000,
      certificateMs: settings.timeouts.certificateSeconds * 1000,
      pollIntervalMs: settings.pollIntervalSeconds * 1000,
    },
    paths: {
      terraformRoot: resolvePath(projectRoot, settings.terraformDir),
      chartDir,
      valuesOverride: join(chartDir, 'values-override.yaml'),
      stateDir,
      backupDir: join(stateDir, 'backups'),
      currentConfig: join(projectRoot, CURRENT_CONFIG_FILE),
      history: join(projectRoot, HISTORY_FILE),
    },
  };
}

/**
 * Load `.launchpad.json` (defaults when absent) and resolve it
 */
export function loadSettings(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env
): Result<ResolvedSettings, ConfigurationError> {
  const settingsPath = join(projectRoot, SETTINGS_FILE);
  let raw: unknown = {};

  if (existsSync(settingsPath)) {
    try {
      raw = JSON.parse(readFileSync(settingsPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return err(new ConfigurationError(`${SETTINGS_FILE} is not valid JSON: ${reason}`, settingsPath));
    }
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return err(new ConfigurationError(`${SETTINGS_FILE} is invalid`, settingsPath, issues));
  }

  return ok(resolveSettings(projectRoot, parsed.data, env));
}
