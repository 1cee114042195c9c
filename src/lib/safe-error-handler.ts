/**
 * Safe Error Handler
 *
 * Last line of defence at the CLI entry point. Phases and prompts return
 * `Result` values, so anything that reaches these handlers is a bug or an
 * unexpected library failure. The user sees one formatted message and the
 * process exits 1; stack frames are only shown with `--verbose`.
 *
 * @example
 * ```typescript
 * import { installGlobalErrorHandler } from './lib/safe-error-handler.js';
 *
 * installGlobalErrorHandler({ verbose: settings.verbose, logToFile: settings.logFile });
 * ```
 */

import { appendFileSync } from 'fs';
import util from 'util';
import chalk from 'chalk';
import { ExternalToolError, OrchestrationError } from './errors.js';

const MAX_STRING_LENGTH = 20_000;
const MAX_STACK_LINES = 30;
const MAX_DEPTH = 4;

export interface FormatOptions {
  maxLength?: number;
  maxStackLines?: number;
  /** Include stack frames */
  verbose?: boolean;
  colorize?: boolean;
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.substring(0, maxLength) + '... [truncated]' : text;
}

/**
 * Format any thrown value for display. Never throws.
 */
export function formatErrorSafely(error: unknown, options: FormatOptions = {}): string {
  const maxLength = options.maxLength ?? MAX_STRING_LENGTH;
  const maxStackLines = options.maxStackLines ?? MAX_STACK_LINES;
  const colorize = options.colorize ?? true;
  const paint = (style: (text: string) => string, text: string) => (colorize ? style(text) : text);

  try {
    if (!(error instanceof Error)) {
      if (error !== null && typeof error === 'object') {
        return util.inspect(error, { depth: MAX_DEPTH, maxStringLength: maxLength, breakLength: Infinity });
      }
      return String(error);
    }

    const parts: string[] = [`${paint(chalk.red, `${error.name}:`)} ${truncate(error.message || 'No message', maxLength)}`];

    if (error instanceof ExternalToolError) {
      parts.push(paint(chalk.dim, `Command: ${error.command} (exit ${error.exitCode})`));
      if (error.output) {
        parts.push(truncate(error.output, maxLength));
      }
    }

    if (error instanceof OrchestrationError && error.hint) {
      parts.push(paint(chalk.cyan, `Hint: ${error.hint}`));
    }

    if (options.verbose && error.stack) {
      const stackLines = error.stack.split('\n').slice(1);
      const shown = stackLines.slice(0, maxStackLines);
      if (stackLines.length > maxStackLines) {
        shown.push(`... [${stackLines.length - maxStackLines} more lines]`);
      }
      parts.push(paint(chalk.dim, shown.join('\n')));
    }

    return parts.join('\n');
  } catch {
    return `[Error formatting failed: ${String(error)}]`;
  }
}

export interface GlobalHandlerOptions {
  exitOnError?: boolean;
  logToFile?: string;
  verbose?: boolean;
}

function report(title: string, error: unknown, options: GlobalHandlerOptions): void {
  console.error('\n' + chalk.red('═'.repeat(72)));
  console.error(chalk.red.bold(`${title}\n`));
  console.error(formatErrorSafely(error, { verbose: options.verbose }));
  console.error(chalk.red('═'.repeat(72)) + '\n');

  if (options.logToFile) {
    const entry = `\n[${new Date().toISOString()}] ${title}:\n${formatErrorSafely(error, { colorize: false, verbose: true })}\n`;
    try {
      appendFileSync(options.logToFile, entry);
    } catch (logError) {
      console.error(chalk.dim(`Could not write ${options.logToFile}: ${formatErrorSafely(logError, { colorize: false })}`));
    }
  }
}

/**
 * Install handlers for unhandled rejections and uncaught exceptions.
 * Call once, from the CLI entry point.
 */
export function installGlobalErrorHandler(options: GlobalHandlerOptions = {}): void {
  const exitOnError = options.exitOnError ?? true;

  process.on('unhandledRejection', (reason) => {
    report('Unexpected error (unhandled rejection)', reason, options);
    if (exitOnError) {
      process.exit(1);
    }
  });

  process.on('uncaughtException', (error) => {
    report('Unexpected error (uncaught exception)', error, options);
    if (exitOnError) {
      process.exit(1);
    }
  });
}
