import { readFileSync } from 'fs';
import { z } from 'zod';
import type { CancellationToken } from '../lib/cancellation.js';
import type { ResolvedTimeouts } from '../config/settings.js';
import { ExternalToolError, InterruptError, PreconditionError, TimeoutError, err, ok, type Result } from '../lib/errors.js';
import { expectSuccess, isAlreadyAbsent, type ProcessRunner, type RunResult } from '../lib/process-runner.js';
import type { CloudProviderName, CloudTarget } from '../types.js';
import type { DeploymentContext, ProviderDefaults } from './types.js';

const RegionsSchema = z.object({
  aws: z.array(z.string()),
  azure: z.array(z.string()),
  gcp: z.array(z.string()),
});

let regionCache: z.infer<typeof RegionsSchema> | null = null;

function loadRegions(): z.infer<typeof RegionsSchema> {
  if (!regionCache) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../data/regions.json', import.meta.url), 'utf-8'));
    regionCache = RegionsSchema.parse(raw);
  }
  return regionCache;
}

/**
 * Parse CLI JSON output; `undefined` when it is not JSON
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function field(value: unknown, key: string): unknown {
  if (value === null || typeof value !== 'object') {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

export function stringField(value: unknown, key: string): string | undefined {
  const found = field(value, key);
  return typeof found === 'string' ? found : undefined;
}

export function nonEmptyLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Secret-store entries of one deployment are named `<cluster>-...`; the
 * `app=n8n` tag alone also matches other deployments in the same account
 */
export function secretPrefix(context: DeploymentContext): string {
  return `${context.record.clusterName}-`;
}

export function ownSecrets<T extends { name: string }>(context: DeploymentContext, entries: T[]): T[] {
  const prefix = secretPrefix(context);
  return entries.filter((entry) => entry.name.startsWith(prefix));
}

export interface ProviderRunOptions {
  target?: CloudTarget;
  input?: string;
  timeoutMs?: number;
  token?: CancellationToken;
}

export type ToolFailure = ExternalToolError | TimeoutError | InterruptError;

/**
 * Shared plumbing for the three cloud CLIs
 */
export abstract class BaseCloudProvider {
  abstract readonly name: CloudProviderName;
  abstract readonly defaults: ProviderDefaults;

  constructor(
    protected readonly runner: ProcessRunner,
    protected readonly timeouts: ResolvedTimeouts
  ) {}

  abstract toolEnvironment(target: CloudTarget): Record<string, string>;

  regions(): string[] {
    return loadRegions()[this.name];
  }

  protected exec(command: string, args: string[], options: ProviderRunOptions = {}): Promise<RunResult> {
    return this.runner.run(command, args, {
      env: options.target ? this.toolEnvironment(options.target) : undefined,
      input: options.input,
      timeoutMs: options.timeoutMs ?? this.timeouts.queryMs,
      token: options.token,
    });
  }

  /**
   * Run and require exit 0
   */
  protected async execChecked(
    command: string,
    args: string[],
    failureMessage: string,
    options: ProviderRunOptions & { hint?: string } = {}
  ): Promise<Result<RunResult, ToolFailure>> {
    const run = await this.exec(command, args, options);
    return expectSuccess(run, failureMessage, options.hint);
  }

  /**
   * Run a delete; "already gone" counts as success
   */
  protected async execDelete(
    command: string,
    args: string[],
    failureMessage: string,
    context: DeploymentContext
  ): Promise<Result<'deleted' | 'absent', ToolFailure>> {
    const run = await this.exec(command, args, { target: context.record.target, token: context.token });
    if (isAlreadyAbsent(run)) {
      return ok('absent' as const);
    }
    const checked = expectSuccess(run, failureMessage);
    return checked.ok ? ok('deleted' as const) : checked;
  }

  /**
   * Identity checks fail as preconditions, not tool errors
   */
  protected async identityCall(
    command: string,
    args: string[],
    target: CloudTarget,
    failureMessage: string,
    hint: string,
    token?: CancellationToken
  ): Promise<Result<RunResult, PreconditionError | InterruptError>> {
    const run = await this.exec(command, args, { target, timeoutMs: this.timeouts.identityMs, token });
    if (run.cancelled) {
      return err(new InterruptError());
    }
    if (run.exitCode !== 0 || run.timedOut) {
      const reason = run.timedOut ? 'timed out' : run.stderr.trim().split('\n').pop() || `exit ${run.exitCode}`;
      return err(new PreconditionError(`${failureMessage}: ${reason}`, hint));
    }
    return ok(run);
  }
}

export function missingOutput(name: string, command: string): ExternalToolError {
  return new ExternalToolError(
    `The infra engine did not report the "${name}" output`,
    command,
    0,
    '',
    'Run "terraform output" in the cloud directory and check the module defines it.'
  );
}
