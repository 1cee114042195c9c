import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { CancellationToken } from './cancellation.js';
import { pollUntil } from './polling.js';

/**
 * Fake clock: every wait advances time by the requested interval
 */
function fakeClock() {
  let time = 0;
  return {
    now: () => time,
    wait: async (ms: number) => {
      time += ms;
    },
  };
}

describe('pollUntil', () => {
  it('returns the first defined value', async () => {
    const clock = fakeClock();
    let attempts = 0;
    const result = await pollUntil(
      async () => {
        attempts++;
        return attempts === 3 ? 'ready' : undefined;
      },
      { description: 'thing', intervalMs: 10, timeoutMs: 1000, ...clock }
    );
    assert.deepEqual(result, { ok: true, value: 'ready' });
    assert.equal(attempts, 3);
  });

  it('times out when the next interval would pass the deadline', async () => {
    const clock = fakeClock();
    let attempts = 0;
    const result = await pollUntil(
      async () => {
        attempts++;
        return undefined;
      },
      { description: 'the load balancer', intervalMs: 10, timeoutMs: 30, hint: 'check by hand', ...clock }
    );
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.kind, 'timeout');
      assert.equal(result.error.message, 'Timed out after 0s waiting for the load balancer');
      assert.equal(result.error.hint, 'check by hand');
    }
    // Attempts at 0, 10, 20 and 30ms; only the last leaves no room for another interval
    assert.equal(attempts, 4);
  });

  it('stops with an interrupt when the token is cancelled', async () => {
    const clock = fakeClock();
    const token = new CancellationToken();
    let attempts = 0;
    const result = await pollUntil(
      async () => {
        attempts++;
        token.cancel();
        return undefined;
      },
      { description: 'thing', intervalMs: 10, timeoutMs: 1000, token, ...clock }
    );
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.kind, 'interrupt');
    }
    assert.equal(attempts, 1);
  });

  it('reports each attempt', async () => {
    const clock = fakeClock();
    const seen: number[] = [];
    await pollUntil(async () => undefined, {
      description: 'thing',
      intervalMs: 10,
      timeoutMs: 20,
      onAttempt: (attempt) => seen.push(attempt),
      ...clock,
    });
    assert.deepEqual(seen, [1, 2, 3]);
  });
});
