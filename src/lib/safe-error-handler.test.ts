import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { formatErrorSafely } from './safe-error-handler.js';
import { ExternalToolError, PreconditionError } from './errors.js';

const plain = { colorize: false };

describe('formatErrorSafely', () => {
  it('shows the command, its output and the hint of a tool failure', () => {
    const error = new ExternalToolError('Installing n8n failed', 'helm upgrade --install n8n', 1, 'Error: boom', 'Check the chart');
    assert.equal(
      formatErrorSafely(error, plain),
      'ExternalToolError: Installing n8n failed\nCommand: helm upgrade --install n8n (exit 1)\nError: boom\nHint: Check the chart'
    );
  });

  it('omits the hint line when there is none', () => {
    assert.equal(formatErrorSafely(new PreconditionError('terraform not found'), plain), 'PreconditionError: terraform not found');
  });

  it('formats values that are not errors', () => {
    assert.equal(formatErrorSafely('boom', plain), 'boom');
    assert.equal(formatErrorSafely({ code: 7 }, plain), '{ code: 7 }');
    assert.equal(formatErrorSafely(null, plain), 'null');
  });

  it('truncates long messages and fills in empty ones', () => {
    assert.equal(formatErrorSafely(new Error('x'.repeat(30)), { ...plain, maxLength: 10 }), 'Error: xxxxxxxxxx... [truncated]');
    assert.equal(formatErrorSafely(new Error(''), plain), 'Error: No message');
  });

  it('includes a bounded stack only when verbose', () => {
    const error = new Error('a');
    error.stack = 'Error: a\n    at one\n    at two\n    at three';
    assert.equal(formatErrorSafely(error, plain), 'Error: a');
    assert.equal(
      formatErrorSafely(error, { ...plain, verbose: true, maxStackLines: 2 }),
      'Error: a\n    at one\n    at two\n... [1 more lines]'
    );
  });
});
