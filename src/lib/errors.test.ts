import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  ExternalToolError,
  InterruptError,
  PreconditionError,
  RestoreError,
  TimeoutError,
  err,
  formatError,
  ok,
  toError,
} from './errors.js';

describe('errors', () => {
  it('tags each error with its kind and class name', () => {
    const error = new PreconditionError('terraform is not installed', 'Install terraform');
    assert.equal(error.kind, 'precondition');
    assert.equal(error.name, 'PreconditionError');
    assert.equal(error.hint, 'Install terraform');
    assert.ok(error instanceof Error);
  });

  it('defaults the interrupt message', () => {
    assert.equal(new InterruptError().message, 'Interrupted by user');
  });

  it('gives restore errors a fixed hint', () => {
    const error = new RestoreError('1 file could not be restored', [{ path: '/tmp/a', reason: 'EACCES' }]);
    assert.equal(error.kind, 'restore');
    assert.equal(error.failures.length, 1);
    assert.match(error.hint ?? '', /by hand/);
  });

  describe('formatError', () => {
    it('includes exit code and command for tool failures', () => {
      const error = new ExternalToolError('helm upgrade failed', 'helm upgrade --install n8n', 1, 'Error: boom');
      assert.equal(formatError(error), 'helm upgrade failed (exit 1: helm upgrade --install n8n)');
    });

    it('prefixes orchestration errors with their kind', () => {
      assert.equal(formatError(new TimeoutError('Timed out', 1000)), '[timeout] Timed out');
    });

    it('handles plain errors and non-errors', () => {
      assert.equal(formatError(new Error('plain')), 'plain');
      assert.equal(formatError(42), '42');
    });
  });

  it('builds result values', () => {
    assert.deepEqual(ok(3), { ok: true, value: 3 });
    const failure = err('nope');
    assert.equal(failure.ok, false);
    assert.equal(failure.error, 'nope');
  });

  it('wraps non-errors in toError', () => {
    const error = toError('text');
    assert.ok(error instanceof Error);
    assert.equal(error.message, 'text');
  });
});
