import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  COMMAND_NOT_FOUND,
  ExecaProcessRunner,
  combinedOutput,
  describeCommand,
  expectSuccess,
  isAlreadyAbsent,
  lastLines,
  type RunResult,
} from './process-runner.js';
import { CancellationToken } from './cancellation.js';

function result(overrides: Partial<RunResult> = {}): RunResult {
  return {
    command: 'helm status n8n',
    exitCode: 0,
    stdout: '',
    stderr: '',
    timedOut: false,
    cancelled: false,
    durationMs: 4200,
    ...overrides,
  };
}

describe('process runner helpers', () => {
  it('quotes arguments with spaces or quotes', () => {
    assert.equal(describeCommand('kubectl', ['get', 'pods', '-n', 'n8n']), 'kubectl get pods -n n8n');
    assert.equal(describeCommand('az', ['--query', 'a b']), 'az --query "a b"');
  });

  it('joins stdout and stderr, skipping empty parts', () => {
    assert.equal(combinedOutput(result({ stdout: 'out', stderr: 'err' })), 'out\nerr');
    assert.equal(combinedOutput(result({ stderr: 'err' })), 'err');
  });

  it('keeps the tail of long output', () => {
    const output = Array.from({ length: 30 }, (_, i) => `line ${i + 1}`).join('\n') + '\n';
    assert.equal(lastLines(output, 2), 'line 29\nline 30');
  });

  describe('expectSuccess', () => {
    it('passes a zero exit through', () => {
      const checked = expectSuccess(result(), 'failed');
      assert.equal(checked.ok, true);
    });

    it('classifies cancellation as an interrupt', () => {
      const checked = expectSuccess(result({ cancelled: true, exitCode: 130 }), 'helm status failed');
      assert.equal(checked.ok, false);
      if (!checked.ok) {
        assert.equal(checked.error.kind, 'interrupt');
        assert.equal(checked.error.message, 'helm status failed: interrupted');
      }
    });

    it('classifies a timeout with the elapsed seconds', () => {
      const checked = expectSuccess(result({ timedOut: true, exitCode: 1 }), 'helm status failed', 'retry later');
      assert.equal(checked.ok, false);
      if (!checked.ok) {
        assert.equal(checked.error.kind, 'timeout');
        assert.equal(checked.error.message, 'helm status failed: timed out after 4s');
        assert.equal(checked.error.hint, 'retry later');
      }
    });

    it('reports tool failures with the output tail', () => {
      const checked = expectSuccess(result({ exitCode: 2, stderr: 'Error: release not ready' }), 'helm status failed');
      assert.equal(checked.ok, false);
      if (!checked.ok && checked.error.kind === 'external-tool') {
        assert.equal(checked.error.exitCode, 2);
        assert.equal(checked.error.output, 'Error: release not ready');
        assert.equal(checked.error.command, 'helm status n8n');
      } else {
        assert.fail('expected an external-tool error');
      }
    });
  });

  describe('isAlreadyAbsent', () => {
    it('recognises not-found messages', () => {
      assert.equal(isAlreadyAbsent(result({ exitCode: 1, stderr: 'Error: uninstall: Release not loaded: n8n: release: not found' })), true);
      assert.equal(isAlreadyAbsent(result({ exitCode: 254, stderr: 'An error occurred (ResourceNotFoundException)' })), true);
    });

    it('is false for success, timeouts and other failures', () => {
      assert.equal(isAlreadyAbsent(result({ stderr: 'not found' })), false);
      assert.equal(isAlreadyAbsent(result({ exitCode: 1, timedOut: true, stderr: 'not found' })), false);
      assert.equal(isAlreadyAbsent(result({ exitCode: 1, stderr: 'connection refused' })), false);
    });
  });
});

describe('ExecaProcessRunner', () => {
  it('reports a missing executable as command-not-found', async () => {
    const run = await new ExecaProcessRunner().run('launchpad-no-such-tool', ['--version'], { timeoutMs: 5000 });
    assert.equal(run.exitCode, COMMAND_NOT_FOUND);
    assert.equal(run.cancelled, false);
  });

  it('does not start anything once the token is cancelled', async () => {
    const token = new CancellationToken();
    token.cancel();
    const run = await new ExecaProcessRunner().run('launchpad-no-such-tool', [], { token });
    assert.equal(run.cancelled, true);
    assert.equal(run.exitCode, 130);
    assert.equal(run.durationMs, 0);
  });
});
