/**
 * Error taxonomy and result values for the orchestrator
 *
 * Phases, prompts and tool wrappers return `Result` values instead of throwing;
 * the session controller inspects the error `kind` to decide between rollback,
 * a soft stop, or a clean interrupt.
 */

export type ErrorKind =
  | 'precondition'
  | 'validation'
  | 'external-tool'
  | 'timeout'
  | 'interrupt'
  | 'configuration'
  | 'restore';

/**
 * Base class for every error the orchestrator reports to the user
 */
export abstract class OrchestrationError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly hint?: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing dependency, failed identity check, or region-state conflict.
 * Raised before anything is written.
 */
export class PreconditionError extends OrchestrationError {
  readonly kind = 'precondition' as const;
}

/**
 * Bad user input. Stays inside the collector, which re-prompts.
 */
export class ValidationError extends OrchestrationError {
  readonly kind = 'validation' as const;

  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
  }
}

/**
 * Non-zero exit (or spawn failure) from terraform, helm, kubectl or a cloud CLI
 */
export class ExternalToolError extends OrchestrationError {
  readonly kind = 'external-tool' as const;

  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly output: string,
    hint?: string
  ) {
    super(message, hint);
  }
}

/**
 * A bounded wait (readiness poll, endpoint poll, subprocess timeout) ran out
 */
export class TimeoutError extends OrchestrationError {
  readonly kind = 'timeout' as const;

  constructor(
    message: string,
    public readonly timeoutMs: number,
    hint?: string
  ) {
    super(message, hint);
  }
}

/**
 * User-initiated abort: Ctrl+C, a cancelled prompt, or a declined gate
 */
export class InterruptError extends OrchestrationError {
  readonly kind = 'interrupt' as const;

  constructor(message: string = 'Interrupted by user', hint?: string) {
    super(message, hint);
  }
}

/**
 * A settings file or persisted configuration does not parse
 */
export class ConfigurationError extends OrchestrationError {
  readonly kind = 'configuration' as const;

  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly validationErrors: string[] = []
  ) {
    super(message);
  }
}

export interface RestoreFailure {
  path: string;
  reason: string;
}

/**
 * Backup restoration left at least one file dirty. Always fatal.
 */
export class RestoreError extends OrchestrationError {
  readonly kind = 'restore' as const;

  constructor(
    message: string,
    public readonly failures: RestoreFailure[]
  ) {
    super(message, 'Restore the listed files by hand from the backup directory before re-running.');
  }
}

export type Result<T, E = OrchestrationError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Formats an error for a single terminal line
 */
export function formatError(error: unknown): string {
  if (error instanceof ExternalToolError) {
    return `${error.message} (exit ${error.exitCode}: ${error.command})`;
  }
  if (error instanceof OrchestrationError) {
    return `[${error.kind}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown caught value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
