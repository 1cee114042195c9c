/**
 * Shared test utilities for n8n-launchpad
 */

import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { SettingsSchema, resolveSettings, terraformDirFor, type ResolvedSettings } from './config/settings.js';
import { ConfigStore } from './config/store.js';
import type { PhaseEnvironment } from './deployment/phase-executor.js';
import type { Choice, Prompter, TextQuestion } from './lib/prompt.js';
import { describeCommand, type ProcessRunner, type RunOptions, type RunResult } from './lib/process-runner.js';
import { StructuredLogger } from './monitoring/structured-logger.js';
import { createProvider } from './providers/index.js';
import { getRegionStateManager } from './state/region-state-manager.js';
import type { CloudProviderName, ConfigurationRecord } from './types.js';

/**
 * Create a temporary directory for testing
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'launchpad-test-'));
}

/**
 * Clean up a temporary directory
 */
export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export const TEST_ENCRYPTION_KEY = 'ab'.repeat(32);

/**
 * Settings rooted at `projectRoot` with polls short enough to time out
 * within a test: 5ms interval, 20ms deadline, no teardown countdown
 */
export function createTestSettings(projectRoot: string): ResolvedSettings {
  const settings = resolveSettings(projectRoot, SettingsSchema.parse({ teardownCountdownSeconds: 0 }), {});
  return {
    ...settings,
    timeouts: { ...settings.timeouts, readinessMs: 20, endpointMs: 20, certificateMs: 20, pollIntervalMs: 5 },
  };
}

/**
 * A complete AWS record with small, predictable values
 */
export function createTestRecord(overrides: Partial<ConfigurationRecord> = {}): ConfigurationRecord {
  return {
    target: { provider: 'aws', profile: 'test-profile', region: 'us-east-1' },
    clusterName: 'n8n-eks-cluster',
    kubernetesVersion: '1.31',
    sizing: { nodeType: 't3.medium', minCount: 1, desiredCount: 2, maxCount: 5 },
    namespace: 'n8n',
    storageSize: '10Gi',
    hostname: 'n8n.example.test',
    timezone: 'America/Bahia',
    encryptionKey: TEST_ENCRYPTION_KEY,
    database: { kind: 'sqlite' },
    tls: { mode: 'disabled' },
    basicAuth: { enabled: false },
    ...overrides,
  };
}

/**
 * Phase environment over a fake runner, with a quiet logger and real files
 * under `projectRoot`
 */
export function createTestEnvironment(
  projectRoot: string,
  runner: ProcessRunner,
  prompter: Prompter,
  cloud: CloudProviderName = 'aws'
): PhaseEnvironment {
  const settings = createTestSettings(projectRoot);
  return {
    settings,
    runner,
    provider: createProvider(cloud, runner, settings.timeouts),
    prompter,
    logger: new StructuredLogger({ enableConsole: false }),
    store: new ConfigStore(settings),
    states: getRegionStateManager(terraformDirFor(settings, cloud)),
  };
}

export interface FakeResponse {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  timedOut?: boolean;
  cancelled?: boolean;
}

export interface RecordedCall {
  command: string;
  args: string[];
  line: string;
  options: RunOptions;
}

interface FakeRule {
  match: string | RegExp;
  responses: FakeResponse[];
}

/**
 * In-process stand-in for the external tools.
 *
 * Rules match the rendered command line (string = prefix, RegExp = test) in
 * registration order. Responses are consumed in turn and the last one
 * repeats. Unmatched commands succeed with empty output.
 */
export class FakeProcessRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  private readonly rules: FakeRule[] = [];

  on(match: string | RegExp, ...responses: FakeResponse[]): this {
    this.rules.push({ match, responses: responses.length > 0 ? responses : [{}] });
    return this;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    const line = describeCommand(command, args);
    this.calls.push({ command, args, line, options });

    if (options.token?.isCancelled) {
      return { command: line, exitCode: 130, stdout: '', stderr: '', timedOut: false, cancelled: true, durationMs: 0 };
    }

    const rule = this.rules.find((candidate) =>
      typeof candidate.match === 'string' ? line.startsWith(candidate.match) : candidate.match.test(line)
    );
    let response: FakeResponse = {};
    if (rule) {
      response = rule.responses.length > 1 ? (rule.responses.shift() ?? {}) : (rule.responses[0] ?? {});
    }

    return {
      command: line,
      exitCode: response.exitCode ?? 0,
      stdout: response.stdout ?? '',
      stderr: response.stderr ?? '',
      timedOut: response.timedOut ?? false,
      cancelled: response.cancelled ?? false,
      durationMs: 1,
    };
  }

  /** Rendered command lines, in call order */
  lines(): string[] {
    return this.calls.map((call) => call.line);
  }

  /** Index of the first call whose line starts with `prefix`, or -1 */
  indexOf(prefix: string): number {
    return this.lines().findIndex((line) => line.startsWith(prefix));
  }

  ran(prefix: string): boolean {
    return this.indexOf(prefix) !== -1;
  }
}

/**
 * `''` accepts the question's default; `undefined` cancels the prompt
 */
export type ScriptedAnswer = string | boolean | undefined;

/**
 * Prompter that replays queued answers and records what was asked
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  readonly notes: string[] = [];
  readonly warnings: string[] = [];
  private readonly answers: ScriptedAnswer[];

  constructor(answers: ScriptedAnswer[] = []) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  private next(message: string): ScriptedAnswer {
    this.asked.push(message);
    if (this.answers.length === 0) {
      throw new Error(`No scripted answer for "${message}"`);
    }
    return this.answers.shift();
  }

  async text(question: TextQuestion): Promise<string | undefined> {
    const answer = this.next(question.message);
    if (answer === undefined) {
      return undefined;
    }
    if (typeof answer !== 'string') {
      throw new Error(`Expected a text answer for "${question.message}"`);
    }
    return answer === '' ? (question.initial ?? '') : answer;
  }

  async select<T>(message: string, choices: Choice<T>[], initial: number = 0): Promise<T | undefined> {
    const answer = this.next(message);
    if (answer === undefined) {
      return undefined;
    }
    if (answer === '') {
      return choices[initial]?.value;
    }
    const choice = choices.find((candidate) => candidate.value === answer || candidate.title === answer);
    if (!choice) {
      throw new Error(`Scripted answer "${String(answer)}" is not a choice for "${message}"`);
    }
    return choice.value;
  }

  async confirm(message: string, initial: boolean = false): Promise<boolean | undefined> {
    const answer = this.next(message);
    if (answer === '') {
      return initial;
    }
    if (answer !== undefined && typeof answer !== 'boolean') {
      throw new Error(`Expected a yes/no answer for "${message}"`);
    }
    return answer;
  }

  note(message: string): void {
    this.notes.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }
}
