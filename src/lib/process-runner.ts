/**
 * Process Runner
 *
 * Uniform way to invoke terraform, helm, kubectl and the cloud CLIs:
 * output is streamed to the terminal while it is buffered for parsing,
 * every call has a hard timeout, and the session's cancellation token kills
 * the child on Ctrl+C.
 *
 * The runner never decides whether a failure is retryable or tolerable; it
 * only reports the exit code and output. Callers classify.
 */

import { execa, ExecaError } from 'execa';
import type { CancellationToken } from './cancellation.js';
import { ExternalToolError, InterruptError, TimeoutError, err, ok, type Result } from './errors.js';

/**
 * Default per-invocation timeouts
 */
export const DEFAULT_TIMEOUTS = {
  identity: 30_000,
  query: 5 * 60_000,
  provisioning: 45 * 60_000,
} as const;

/** Exit code reported when the executable could not be started */
export const COMMAND_NOT_FOUND = 127;

export interface RunOptions {
  cwd?: string;
  /** Merged over the parent environment */
  env?: Record<string, string | undefined>;
  timeoutMs?: number;
  /** Echo output to the terminal as it arrives */
  stream?: boolean;
  /** Written to the child's stdin. Used for secret manifests and passwords. */
  input?: string;
  token?: CancellationToken;
}

export interface RunResult {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
  durationMs: number;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<RunResult>;
}

/**
 * Render a command line for messages and logs
 */
export function describeCommand(command: string, args: string[]): string {
  return [command, ...args.map((arg) => (/[\s"']/.test(arg) ? JSON.stringify(arg) : arg))].join(' ');
}

function asText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((line) => String(line)).join('\n');
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('utf-8');
  }
  return '';
}

/**
 * execa-backed runner used outside of tests
 */
export class ExecaProcessRunner implements ProcessRunner {
  async run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    const commandLine = describeCommand(command, args);
    const startedAt = Date.now();

    if (options.token?.isCancelled) {
      return {
        command: commandLine,
        exitCode: 130,
        stdout: '',
        stderr: '',
        timedOut: false,
        cancelled: true,
        durationMs: 0,
      };
    }

    const subprocess = execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUTS.query,
      cancelSignal: options.token?.signal,
      // An empty input closes stdin so no tool can block on a prompt
      input: options.input ?? '',
      stripFinalNewline: true,
    });

    if (options.stream) {
      subprocess.stdout?.on('data', (chunk: Buffer) => process.stdout.write(chunk));
      subprocess.stderr?.on('data', (chunk: Buffer) => process.stderr.write(chunk));
    }

    try {
      const result = await subprocess;
      return {
        command: commandLine,
        exitCode: result.exitCode ?? 0,
        stdout: asText(result.stdout),
        stderr: asText(result.stderr),
        timedOut: false,
        cancelled: false,
        durationMs: Date.now() - startedAt,
      };
    } catch (error) {
      if (error instanceof ExecaError) {
        const notFound = error.code === 'ENOENT';
        return {
          command: commandLine,
          exitCode: error.exitCode ?? (notFound ? COMMAND_NOT_FOUND : 1),
          stdout: asText(error.stdout),
          stderr: asText(error.stderr) || error.shortMessage,
          timedOut: error.timedOut,
          cancelled: error.isCanceled,
          durationMs: Date.now() - startedAt,
        };
      }
      throw error;
    }
  }
}

/**
 * Turn a finished invocation into a `Result`, classifying timeouts and
 * cancellation apart from ordinary tool failures.
 */
export function expectSuccess(
  result: RunResult,
  failureMessage: string,
  hint?: string
): Result<RunResult, ExternalToolError | TimeoutError | InterruptError> {
  if (result.cancelled) {
    return err(new InterruptError(`${failureMessage}: interrupted`));
  }
  if (result.timedOut) {
    return err(
      new TimeoutError(`${failureMessage}: timed out after ${Math.round(result.durationMs / 1000)}s`, result.durationMs, hint)
    );
  }
  if (result.exitCode !== 0) {
    return err(new ExternalToolError(failureMessage, result.command, result.exitCode, lastLines(combinedOutput(result)), hint));
  }
  return ok(result);
}

export function combinedOutput(result: RunResult): string {
  return [result.stdout, result.stderr].filter((part) => part.length > 0).join('\n');
}

/**
 * Keep the tail of tool output for error reports
 */
export function lastLines(output: string, count: number = 20): string {
  const lines = output.trimEnd().split('\n');
  return lines.slice(-count).join('\n');
}

const ABSENT_PATTERNS = [
  /not found/i,
  /notfound/i,
  /does not exist/i,
  /no such/i,
  /ResourceNotFoundException/,
  /DBInstanceNotFound/,
  /release: not found/i,
  /could not find/i,
  /was not found/i,
  /NOT_FOUND/,
];

/**
 * True when a failed call only says the resource is already gone.
 * Teardown treats these as success so it can be re-run safely.
 */
export function isAlreadyAbsent(result: RunResult): boolean {
  if (result.exitCode === 0 || result.timedOut || result.cancelled) {
    return false;
  }
  const output = combinedOutput(result);
  return ABSENT_PATTERNS.some((pattern) => pattern.test(output));
}
