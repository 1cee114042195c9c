/**
 * Structured Logging System
 *
 * Human-readable terminal lines plus an optional JSON-lines log file.
 * Context values under secret-looking keys are redacted before either sink.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';

/**
 * Log severity levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Structured log entry with contextual metadata
 */
export interface LogEntry {
  timestamp: string; // ISO 8601 format
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  sessionId?: string;
  phase?: string;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  minLevel?: LogLevel;
  enableConsole?: boolean;
  /** JSON-lines file; no file output when unset */
  filePath?: string;
  /** Print stack frames for errors on the terminal */
  verbose?: boolean;
  serviceName?: string;
  version?: string;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export const REDACTED = '***REDACTED***';

const SECRET_KEY_PATTERN = /(encryption.?key|password|secret|token|private.?key|credential)/i;

/**
 * Replace values under secret-looking keys, recursively
 */
export function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      result[key] = REDACTED;
    } else if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      result[key] = redactContext(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Structured logger for deployment sessions
 */
export class StructuredLogger {
  private config: Required<Omit<LoggerConfig, 'filePath'>> & { filePath?: string };
  private sessionId?: string;
  private phase?: string;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      minLevel: config.minLevel ?? 'info',
      enableConsole: config.enableConsole ?? true,
      filePath: config.filePath,
      verbose: config.verbose ?? false,
      serviceName: config.serviceName ?? 'n8n-launchpad',
      version: config.version ?? '0.0.0',
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: context ? redactContext(context) : undefined,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : undefined,
      sessionId: this.sessionId,
      phase: this.phase,
    };
  }

  /**
   * Format log entry as one JSON line
   */
  formatAsJson(entry: LogEntry): string {
    return JSON.stringify({
      ...entry,
      service: this.config.serviceName,
      version: this.config.version,
    });
  }

  /**
   * Format log entry for the terminal
   */
  formatForTerminal(entry: LogEntry): string {
    const colors: Record<LogLevel, (text: string) => string> = {
      debug: chalk.cyan,
      info: chalk.blue,
      warn: chalk.yellow,
      error: chalk.red,
      fatal: chalk.bgRed.white,
    };

    const levelIcons: Record<LogLevel, string> = {
      debug: '·',
      info: 'ℹ',
      warn: '⚠',
      error: '✗',
      fatal: '✗',
    };

    const time = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.level.toUpperCase().padEnd(5);

    let output = `${chalk.dim(`[${time}]`)} ${colors[entry.level](`${levelIcons[entry.level]} ${level}`)} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      const contextStr = Object.entries(entry.context)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(' ');
      output += chalk.dim(` (${contextStr})`);
    }

    if (entry.error) {
      output += `\n  ${chalk.red(`Error: ${entry.error.message}`)}`;
      if (this.config.verbose && entry.error.stack) {
        const stackLines = entry.error.stack.split('\n').slice(1, 4);
        output += `\n${chalk.dim(stackLines.join('\n'))}`;
      }
    }

    return output;
  }

  private output(entry: LogEntry): void {
    if (this.config.enableConsole) {
      const formatted = this.formatForTerminal(entry);
      if (entry.level === 'error' || entry.level === 'fatal') {
        console.error(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (this.config.filePath) {
      mkdirSync(dirname(this.config.filePath), { recursive: true });
      appendFileSync(this.config.filePath, this.formatAsJson(entry) + '\n', 'utf-8');
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      this.output(this.createEntry('debug', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      this.output(this.createEntry('info', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      this.output(this.createEntry('warn', message, context));
    }
  }

  /**
   * @param error - Error object (optional)
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      this.output(this.createEntry('error', message, context, error));
    }
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.shouldLog('fatal')) {
      this.output(this.createEntry('fatal', message, context, error));
    }
  }

  /**
   * Attach the session id to every following entry
   */
  setSessionContext(sessionId: string): void {
    this.sessionId = sessionId;
  }

  /**
   * Attach the running phase (or clear it with `undefined`)
   */
  setPhase(phase: string | undefined): void {
    this.phase = phase;
  }
}

/**
 * Global logger instance (singleton)
 */
let globalLogger: StructuredLogger | null = null;

/**
 * Get or create global logger instance
 *
 * @param config - Logger configuration (only used on first call)
 */
export function getLogger(config?: LoggerConfig): StructuredLogger {
  if (!globalLogger) {
    globalLogger = new StructuredLogger(config);
  }
  return globalLogger;
}

/**
 * Reset global logger (useful for testing)
 */
export function resetLogger(): void {
  globalLogger = null;
}
