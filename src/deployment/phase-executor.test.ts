import { describe, it, mock, beforeEach, afterEach } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  PhaseExecutor,
  fatal,
  recoverable,
  succeeded,
  type Phase,
  type PhaseName,
  type PhaseOutcome,
  type Precondition,
} from './phase-executor.js';
import { ExternalToolError, PreconditionError } from '../lib/errors.js';
import { StructuredLogger } from '../monitoring/structured-logger.js';
import { createSession, type DeploymentSession } from '../session/session.js';
import { createTestRecord } from '../test-utils.js';

class ScriptedPhase implements Phase {
  readonly title: string;
  ran = false;

  constructor(
    readonly name: PhaseName,
    private readonly outcome: PhaseOutcome = succeeded(),
    private readonly gate: Precondition = { status: 'ready' },
    private readonly onRun?: (session: DeploymentSession) => void
  ) {
    this.title = name;
  }

  precondition(): Precondition {
    return this.gate;
  }

  async run(session: DeploymentSession): Promise<PhaseOutcome> {
    this.ran = true;
    this.onRun?.(session);
    return this.outcome;
  }
}

describe('PhaseExecutor', () => {
  const logger = new StructuredLogger({ enableConsole: false });
  let session: DeploymentSession;

  beforeEach(() => {
    mock.method(console, 'log', () => {});
    session = createSession('deploy', createTestRecord());
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it('runs every phase in order', async () => {
    const order: string[] = [];
    const phases = (['infrastructure', 'application', 'endpoint-discovery', 'tls-auth'] as const).map(
      (name) => new ScriptedPhase(name, succeeded(), { status: 'ready' }, () => order.push(name))
    );
    const report = await new PhaseExecutor(phases, logger).run(session);
    assert.equal(report.halted, null);
    assert.deepEqual(order, ['infrastructure', 'application', 'endpoint-discovery', 'tls-auth']);
    assert.deepEqual(
      session.results.map((result) => result.status),
      ['succeeded', 'succeeded', 'succeeded', 'succeeded']
    );
  });

  it('records skipped phases and keeps going', async () => {
    const skipped = new ScriptedPhase('tls-auth', succeeded(), { status: 'skip', reason: 'TLS disabled' });
    const report = await new PhaseExecutor([new ScriptedPhase('infrastructure'), skipped], logger).run(session);
    assert.equal(skipped.ran, false);
    assert.equal(report.halted, null);
    assert.deepEqual(report.results[1], { phase: 'tls-auth', status: 'skipped', reason: 'TLS disabled' });
  });

  it('halts on a failed phase and starts nothing after it', async () => {
    const error = new ExternalToolError('helm upgrade of n8n failed', 'helm upgrade', 1, '');
    const after = new ScriptedPhase('endpoint-discovery');
    const report = await new PhaseExecutor(
      [new ScriptedPhase('infrastructure'), new ScriptedPhase('application', fatal(error)), after],
      logger
    ).run(session);
    assert.equal(after.ran, false);
    assert.equal(report.halted?.phase, 'application');
    assert.equal(report.halted?.error, error);
    assert.equal(report.halted?.recoverable, false);
    assert.equal(report.results.length, 2);
  });

  it('carries the recoverable flag', async () => {
    const error = new PreconditionError('DNS not confirmed');
    const report = await new PhaseExecutor([new ScriptedPhase('tls-auth', recoverable(error))], logger).run(session);
    assert.equal(report.halted?.recoverable, true);
  });

  it('halts on an unmet precondition without running the phase', async () => {
    const error = new PreconditionError('No infrastructure outputs');
    const phase = new ScriptedPhase('application', succeeded(), { status: 'unmet', error });
    const report = await new PhaseExecutor([phase], logger).run(session);
    assert.equal(phase.ran, false);
    assert.deepEqual(report.halted, { phase: 'application', status: 'failed', error, recoverable: false, durationMs: 0 });
  });

  it('starts no phase once the token is cancelled', async () => {
    const second = new ScriptedPhase('application');
    const first = new ScriptedPhase('infrastructure', succeeded(), { status: 'ready' }, (current) => current.token.cancel('Ctrl+C'));
    const report = await new PhaseExecutor([first, second], logger).run(session);
    assert.equal(second.ran, false);
    assert.equal(report.halted?.phase, 'application');
    assert.equal(report.halted?.error.kind, 'interrupt');
    assert.equal(report.halted?.error.message, 'Ctrl+C');
  });

  it('measures phase duration with the injected clock', async () => {
    let tick = 0;
    const report = await new PhaseExecutor([new ScriptedPhase('infrastructure')], logger, () => (tick += 250)).run(session);
    assert.deepEqual(report.results[0], { phase: 'infrastructure', status: 'succeeded', durationMs: 250 });
  });
});
