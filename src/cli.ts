#!/usr/bin/env node
/**
 * launchpad CLI entry point
 * Interactive n8n deployment to EKS, AKS or GKE
 */

// Install the global error handler before anything else runs
import { installGlobalErrorHandler } from './lib/safe-error-handler.js';
installGlobalErrorHandler({
  exitOnError: true,
  verbose: process.env.LAUNCHPAD_VERBOSE === 'true' || process.argv.includes('--verbose'),
});

import chalk from 'chalk';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from './cli/args.js';
import { loadSettings } from './config/settings.js';
import { formatErrorSafely } from './lib/safe-error-handler.js';
import { ExecaProcessRunner } from './lib/process-runner.js';
import { PromptsPrompter } from './lib/prompt.js';
import { getLogger } from './monitoring/structured-logger.js';
import { SessionController } from './session/controller.js';
import { EXIT_CODES } from './types.js';

function readVersion(): string {
  const packagePath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
    if (parsed !== null && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    console.error(chalk.dim(`Could not read ${packagePath}: ${formatErrorSafely(error, { colorize: false })}`));
  }
  return 'unknown';
}

async function cli(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(chalk.red(`\n❌ ${parsed.error}`));
    console.error(chalk.gray('Run: launchpad --help\n'));
    return EXIT_CODES.failure;
  }

  const command = parsed.value;
  if (command.kind === 'help') {
    printHelpMessage();
    return EXIT_CODES.success;
  }
  if (command.kind === 'version') {
    console.log(readVersion());
    return EXIT_CODES.success;
  }

  const loaded = loadSettings(process.cwd());
  if (!loaded.ok) {
    console.error(formatErrorSafely(loaded.error));
    return EXIT_CODES.failure;
  }
  const settings = command.verbose ? { ...loaded.value, verbose: true } : loaded.value;

  const logger = getLogger({
    minLevel: settings.verbose ? 'debug' : 'info',
    filePath: settings.logFile,
    verbose: settings.verbose,
    version: readVersion(),
  });

  const controller = new SessionController({
    settings,
    runner: new ExecaProcessRunner(),
    prompter: new PromptsPrompter(),
    logger,
    handleSignals: true,
  });
  return controller.run({ mode: command.mode, cloud: command.cloud });
}

cli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red('\n❌ Fatal error:'));
    console.error(formatErrorSafely(error));
    process.exitCode = EXIT_CODES.failure;
  });

function printHelpMessage(): void {
  console.log(chalk.bold.cyan('\n' + '═'.repeat(60)));
  console.log(chalk.bold.cyan('  🚀 launchpad: n8n on EKS, AKS or GKE'));
  console.log(chalk.bold.cyan('═'.repeat(60) + '\n'));

  console.log(chalk.bold('USAGE'));
  console.log('  launchpad [mode] [options]\n');

  console.log(chalk.bold('MODES'));
  console.log(chalk.green('  (none)') + '              Collect settings, provision, deploy, expose, secure');
  console.log(chalk.green('  --skip-infra') + '        Redeploy onto existing infrastructure (alias --skip-terraform)');
  console.log(chalk.green('  --update-tls') + '        Change TLS or basic auth on a running deployment');
  console.log(chalk.green('  --teardown') + '          Remove the deployment and its infrastructure');
  console.log(chalk.green('  --list-states') + '       Show saved infra state snapshots per region\n');

  console.log(chalk.bold('OPTIONS'));
  console.log('  --cloud=aws|azure|gcp   Skip the cloud selection prompt');
  console.log('  --verbose               Debug logging and stack traces');
  console.log('  -h, --help              Show this help');
  console.log('  -v, --version           Show version\n');

  console.log(chalk.bold('EXIT CODES'));
  console.log(chalk.gray('  0 success, 1 failure, 2 incomplete (DNS or endpoint pending), 130 interrupted\n'));
}
