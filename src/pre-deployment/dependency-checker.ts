/**
 * Dependency Checker
 *
 * First gate of every run: confirms the external tools exist at a usable
 * version before anything is asked or written. Only runs version queries.
 */

import chalk from 'chalk';
import type { CancellationToken } from '../lib/cancellation.js';
import { PreconditionError, err, ok, type Result } from '../lib/errors.js';
import { COMMAND_NOT_FOUND, combinedOutput, type ProcessRunner } from '../lib/process-runner.js';
import type { CloudProviderName } from '../types.js';

export interface ToolSpec {
  name: string;
  command: string;
  versionArgs: string[];
  /** First capture group is the dotted version */
  versionPattern: RegExp;
  minimum: string;
  required: boolean;
  installHint: string;
}

export interface ToolCheckResult {
  tool: string;
  found: boolean;
  /** `null` when missing or when the output could not be parsed */
  version: string | null;
  satisfiesMinimum: boolean;
  minimum: string;
  required: boolean;
  installHint: string;
}

export const MINIMUM_NODE_VERSION = '20.0.0';

const CORE_TOOLS: ToolSpec[] = [
  {
    name: 'terraform',
    command: 'terraform',
    versionArgs: ['version'],
    versionPattern: /Terraform v(\d+\.\d+\.\d+)/,
    minimum: '1.6.0',
    required: true,
    installHint: 'https://developer.hashicorp.com/terraform/install',
  },
  {
    name: 'helm',
    command: 'helm',
    versionArgs: ['version', '--short'],
    versionPattern: /v(\d+\.\d+\.\d+)/,
    minimum: '3.0.0',
    required: true,
    installHint: 'https://helm.sh/docs/intro/install/',
  },
  {
    name: 'kubectl',
    command: 'kubectl',
    versionArgs: ['version', '--client'],
    versionPattern: /v(\d+\.\d+\.\d+)/,
    minimum: '1.20.0',
    required: true,
    installHint: 'https://kubernetes.io/docs/tasks/tools/',
  },
  {
    name: 'openssl',
    command: 'openssl',
    versionArgs: ['version'],
    versionPattern: /(?:OpenSSL|LibreSSL)\s+(\d+\.\d+\.\d+)/,
    minimum: '1.1.1',
    required: true,
    installHint: 'Install openssl from your package manager',
  },
];

const CLOUD_TOOLS: Record<CloudProviderName, ToolSpec[]> = {
  aws: [
    {
      name: 'aws',
      command: 'aws',
      versionArgs: ['--version'],
      versionPattern: /aws-cli\/(\d+\.\d+\.\d+)/,
      minimum: '2.0.0',
      required: true,
      installHint: 'https://docs.aws.amazon.com/cli/latest/userguide/getting-started-install.html',
    },
  ],
  azure: [
    {
      name: 'az',
      command: 'az',
      versionArgs: ['version', '--output', 'json'],
      versionPattern: /"azure-cli":\s*"(\d+\.\d+\.\d+)"/,
      minimum: '2.50.0',
      required: true,
      installHint: 'https://learn.microsoft.com/cli/azure/install-azure-cli',
    },
    {
      name: 'kubelogin',
      command: 'kubelogin',
      versionArgs: ['--version'],
      versionPattern: /v(\d+\.\d+\.\d+)/,
      minimum: '0.0.0',
      required: false,
      installHint: 'az aks install-cli',
    },
  ],
  gcp: [
    {
      name: 'gcloud',
      command: 'gcloud',
      versionArgs: ['version'],
      versionPattern: /Google Cloud SDK (\d+\.\d+\.\d+)/,
      minimum: '400.0.0',
      required: true,
      installHint: 'https://cloud.google.com/sdk/docs/install',
    },
    {
      name: 'gke-gcloud-auth-plugin',
      command: 'gke-gcloud-auth-plugin',
      versionArgs: ['--version'],
      versionPattern: /v?(\d+\.\d+\.\d+)/,
      minimum: '0.0.0',
      required: false,
      installHint: 'gcloud components install gke-gcloud-auth-plugin',
    },
  ],
};

/**
 * Tools needed to deploy to one cloud
 */
export function toolSpecsFor(cloud: CloudProviderName): ToolSpec[] {
  return [...CORE_TOOLS, ...CLOUD_TOOLS[cloud]];
}

/**
 * Core tools plus every cloud CLI as optional, for runs that have not
 * picked a cloud yet
 */
export function toolSpecsForAnyCloud(): ToolSpec[] {
  const cloudSpecs = Object.values(CLOUD_TOOLS).flatMap((specs) => specs.map((spec) => ({ ...spec, required: false })));
  return [...CORE_TOOLS, ...cloudSpecs];
}

/**
 * Clouds whose primary CLI was found at a usable version
 */
export function availableClouds(results: ToolCheckResult[]): CloudProviderName[] {
  const clouds: CloudProviderName[] = [];
  for (const cloud of ['aws', 'azure', 'gcp'] as const) {
    const primary = CLOUD_TOOLS[cloud][0];
    const result = results.find((candidate) => candidate.tool === primary?.name);
    if (result?.found && result.satisfiesMinimum) {
      clouds.push(cloud);
    }
  }
  return clouds;
}

/**
 * Compare dotted versions numerically; missing parts count as 0
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((part) => Number.parseInt(part, 10) || 0);
  const right = b.split('.').map((part) => Number.parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

export function parseVersion(output: string, pattern: RegExp): string | null {
  const match = pattern.exec(output);
  return match?.[1] ?? null;
}

/**
 * The interpreter itself is not queried through the runner
 */
export function checkRuntime(nodeVersion: string = process.versions.node): ToolCheckResult {
  return {
    tool: 'node',
    found: true,
    version: nodeVersion,
    satisfiesMinimum: compareVersions(nodeVersion, MINIMUM_NODE_VERSION) >= 0,
    minimum: MINIMUM_NODE_VERSION,
    required: true,
    installHint: 'https://nodejs.org/',
  };
}

export class DependencyChecker {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly timeoutMs: number
  ) {}

  async check(specs: ToolSpec[], token?: CancellationToken): Promise<ToolCheckResult[]> {
    const results: ToolCheckResult[] = [];

    for (const spec of specs) {
      const run = await this.runner.run(spec.command, spec.versionArgs, { timeoutMs: this.timeoutMs, token });
      const base = { tool: spec.name, minimum: spec.minimum, required: spec.required, installHint: spec.installHint };

      if (run.exitCode === COMMAND_NOT_FOUND || run.cancelled || run.timedOut) {
        results.push({ ...base, found: false, version: null, satisfiesMinimum: false });
        continue;
      }

      const version = parseVersion(combinedOutput(run), spec.versionPattern);
      results.push({
        ...base,
        found: true,
        version,
        // An unparseable version does not block
        satisfiesMinimum: version === null || compareVersions(version, spec.minimum) >= 0,
      });
    }

    return results;
  }
}

/**
 * Gate on the check results. Optional tools never block.
 */
export function evaluateChecks(results: ToolCheckResult[]): Result<ToolCheckResult[], PreconditionError> {
  const blocking = results.filter((result) => result.required && (!result.found || !result.satisfiesMinimum));
  if (blocking.length === 0) {
    return ok(results);
  }

  const details = blocking
    .map((result) =>
      result.found
        ? `${result.tool} ${result.version ?? 'unknown'} is older than ${result.minimum}`
        : `${result.tool} is not installed`
    )
    .join('; ');
  const hints = blocking.map((result) => `${result.tool}: ${result.installHint}`).join('\n');
  return err(new PreconditionError(`Missing or outdated dependencies: ${details}`, hints));
}

export function printDependencyReport(results: ToolCheckResult[]): void {
  console.log(chalk.bold('\nDependencies'));
  for (const result of results) {
    const version = result.version ?? 'version unknown';
    if (!result.found) {
      const marker = result.required ? chalk.red('✗') : chalk.yellow('○');
      const label = result.required ? 'not found' : 'not found (optional)';
      console.log(`  ${marker} ${result.tool} ${chalk.dim(label)}`);
    } else if (!result.satisfiesMinimum) {
      console.log(`  ${chalk.red('✗')} ${result.tool} ${version} ${chalk.dim(`(need >= ${result.minimum})`)}`);
    } else {
      console.log(`  ${chalk.green('✓')} ${result.tool} ${chalk.dim(version)}`);
    }
  }
  console.log('');
}
