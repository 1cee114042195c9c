/**
 * Thin wrappers over terraform, helm and kubectl
 *
 * Each method is one idempotent invocation returning a `Result`; retry and
 * rollback decisions stay with the phases and the session controller.
 */

import { rmSync } from 'fs';
import { join } from 'path';
import type { CancellationToken } from '../lib/cancellation.js';
import type { ResolvedTimeouts } from '../config/settings.js';
import { ExternalToolError, err, ok, type Result } from '../lib/errors.js';
import { expectSuccess, isAlreadyAbsent, type ProcessRunner, type RunResult } from '../lib/process-runner.js';
import type { InfraOutputs } from '../types.js';
import { renderManifest, type Manifest } from './manifests.js';
import type { ToolFailure } from '../providers/base.js';
import { field, parseJson } from '../providers/base.js';

export const PLAN_FILE = 'launchpad.tfplan';

export interface ToolEnvironment {
  runner: ProcessRunner;
  env: Record<string, string>;
  timeouts: ResolvedTimeouts;
  /** Echo tool output while it runs */
  stream?: boolean;
}

/**
 * Flatten `terraform output -json` to name → string
 */
export function parseTerraformOutputs(json: string): InfraOutputs | null {
  const parsed = parseJson(json);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return null;
  }
  const outputs: InfraOutputs = {};
  for (const [name, entry] of Object.entries(parsed)) {
    const value = field(entry, 'value');
    if (value === undefined || value === null) {
      continue;
    }
    outputs[name] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return outputs;
}

export class Terraform {
  constructor(
    private readonly tools: ToolEnvironment,
    private readonly workingDir: string
  ) {}

  private async run(args: string[], failureMessage: string, token?: CancellationToken, hint?: string): Promise<Result<RunResult, ToolFailure>> {
    const run = await this.tools.runner.run('terraform', args, {
      cwd: this.workingDir,
      env: { ...this.tools.env, TF_IN_AUTOMATION: '1' },
      timeoutMs: this.tools.timeouts.provisioningMs,
      stream: this.tools.stream,
      token,
    });
    return expectSuccess(run, failureMessage, hint);
  }

  init(token?: CancellationToken): Promise<Result<RunResult, ToolFailure>> {
    return this.run(['init', '-input=false', '-no-color'], 'terraform init failed', token, 'Check network access to the provider registry.');
  }

  async plan(token?: CancellationToken): Promise<Result<RunResult, ToolFailure>> {
    const planned = await this.run(['plan', '-input=false', '-no-color', `-out=${PLAN_FILE}`], 'terraform plan failed', token);
    if (!planned.ok) {
      this.discardPlan();
    }
    return planned;
  }

  /**
   * Applies the saved plan and removes it, whatever the outcome
   */
  async apply(token?: CancellationToken): Promise<Result<RunResult, ToolFailure>> {
    try {
      return await this.run(['apply', '-input=false', '-no-color', '-auto-approve', PLAN_FILE], 'terraform apply failed', token);
    } finally {
      this.discardPlan();
    }
  }

  /**
   * The saved plan holds the TF_VAR values in clear, the encryption key among them
   */
  discardPlan(): void {
    rmSync(join(this.workingDir, PLAN_FILE), { force: true });
  }

  destroy(token?: CancellationToken): Promise<Result<RunResult, ToolFailure>> {
    return this.run(['destroy', '-input=false', '-no-color', '-auto-approve'], 'terraform destroy failed', token);
  }

  async outputs(token?: CancellationToken): Promise<Result<InfraOutputs, ToolFailure>> {
    const run = await this.tools.runner.run('terraform', ['output', '-json'], {
      cwd: this.workingDir,
      env: this.tools.env,
      timeoutMs: this.tools.timeouts.queryMs,
      token,
    });
    const checked = expectSuccess(run, 'terraform output failed');
    if (!checked.ok) {
      return checked;
    }
    const outputs = parseTerraformOutputs(run.stdout);
    if (!outputs) {
      return err(new ExternalToolError('terraform output did not return JSON', run.command, 0, run.stdout.slice(0, 200)));
    }
    return ok(outputs);
  }
}

export interface ChartInstall {
  release: string;
  chart: string;
  namespace: string;
  valuesFiles?: string[];
  setArgs?: string[];
  reuseValues?: boolean;
  /** Let helm wait for resources; bounded by the readiness timeout */
  wait?: boolean;
}

export class Helm {
  constructor(private readonly tools: ToolEnvironment) {}

  private async run(args: string[], failureMessage: string, token?: CancellationToken, timeoutMs?: number): Promise<Result<RunResult, ToolFailure>> {
    const run = await this.tools.runner.run('helm', args, {
      env: this.tools.env,
      timeoutMs: timeoutMs ?? this.tools.timeouts.queryMs,
      stream: this.tools.stream,
      token,
    });
    return expectSuccess(run, failureMessage);
  }

  async addRepo(name: string, url: string, token?: CancellationToken): Promise<Result<void, ToolFailure>> {
    const added = await this.run(['repo', 'add', name, url, '--force-update'], `helm repo add ${name} failed`, token);
    if (!added.ok) {
      return added;
    }
    const updated = await this.run(['repo', 'update', name], `helm repo update ${name} failed`, token);
    return updated.ok ? ok(undefined) : updated;
  }

  /**
   * `upgrade --install`, so a re-run converges instead of failing on an existing release
   */
  upgradeInstall(install: ChartInstall, token?: CancellationToken): Promise<Result<RunResult, ToolFailure>> {
    const args = ['upgrade', '--install', install.release, install.chart, '--namespace', install.namespace, '--create-namespace'];
    for (const file of install.valuesFiles ?? []) {
      args.push('-f', file);
    }
    if (install.reuseValues) {
      args.push('--reuse-values');
    }
    args.push(...(install.setArgs ?? []));
    if (install.wait) {
      args.push('--wait', '--timeout', `${Math.round(this.tools.timeouts.readinessMs / 1000)}s`);
    }
    return this.run(args, `helm upgrade of ${install.release} failed`, token, this.tools.timeouts.provisioningMs);
  }

  async uninstall(release: string, namespace: string, token?: CancellationToken): Promise<Result<'deleted' | 'absent', ToolFailure>> {
    const run = await this.tools.runner.run('helm', ['uninstall', release, '--namespace', namespace, '--wait'], {
      env: this.tools.env,
      timeoutMs: this.tools.timeouts.provisioningMs,
      stream: this.tools.stream,
      token,
    });
    if (isAlreadyAbsent(run)) {
      return ok('absent' as const);
    }
    const checked = expectSuccess(run, `helm uninstall of ${release} failed`);
    return checked.ok ? ok('deleted' as const) : checked;
  }
}

export class Kubectl {
  constructor(private readonly tools: ToolEnvironment) {}

  private exec(args: string[], token?: CancellationToken, input?: string): Promise<RunResult> {
    return this.tools.runner.run('kubectl', args, {
      env: this.tools.env,
      timeoutMs: this.tools.timeouts.queryMs,
      input,
      token,
    });
  }

  /**
   * Apply a manifest from stdin
   */
  async apply(manifest: Manifest, token?: CancellationToken): Promise<Result<void, ToolFailure>> {
    const run = await this.exec(['apply', '-f', '-'], token, renderManifest(manifest));
    const checked = expectSuccess(run, `Applying ${manifest.kind} ${manifest.metadata.name} failed`);
    return checked.ok ? ok(undefined) : checked;
  }

  /**
   * Parsed `-o json` output; `undefined` when the object does not exist
   */
  async getJson(args: string[], token?: CancellationToken): Promise<Result<unknown, ToolFailure>> {
    const run = await this.exec(['get', ...args, '-o', 'json'], token);
    if (isAlreadyAbsent(run)) {
      return ok(undefined);
    }
    const checked = expectSuccess(run, `kubectl get ${args.join(' ')} failed`);
    return checked.ok ? ok(parseJson(run.stdout)) : checked;
  }

  async jsonpath(args: string[], path: string, token?: CancellationToken): Promise<Result<string, ToolFailure>> {
    const run = await this.exec(['get', ...args, '-o', `jsonpath=${path}`], token);
    if (isAlreadyAbsent(run)) {
      return ok('');
    }
    const checked = expectSuccess(run, `kubectl get ${args.join(' ')} failed`);
    return checked.ok ? ok(run.stdout.trim()) : checked;
  }

  /**
   * Delete, tolerating objects that are already gone
   */
  async delete(args: string[], token?: CancellationToken): Promise<Result<void, ToolFailure>> {
    const run = await this.exec(['delete', ...args, '--ignore-not-found', '--wait=true'], token);
    if (isAlreadyAbsent(run)) {
      return ok(undefined);
    }
    const checked = expectSuccess(run, `kubectl delete ${args.join(' ')} failed`);
    return checked.ok ? ok(undefined) : checked;
  }
}
