import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { generateEncryptionKey, generatePassword, hashPasswordApr1, htpasswdLine } from './credentials.js';
import { FakeProcessRunner } from '../test-utils.js';

describe('credentials', () => {
  it('generates 64 hex character encryption keys', () => {
    const key = generateEncryptionKey();
    assert.match(key, /^[0-9a-f]{64}$/);
    assert.notEqual(generateEncryptionKey(), key);
  });

  it('generates alphanumeric passwords of the requested length', () => {
    assert.match(generatePassword(), /^[A-Za-z0-9]{16}$/);
    assert.equal(generatePassword(24).length, 24);
  });

  it('renders htpasswd lines', () => {
    assert.equal(htpasswdLine('admin', '$apr1$salt$hash'), 'admin:$apr1$salt$hash');
  });

  describe('hashPasswordApr1', () => {
    it('passes the password on stdin and returns the hash', async () => {
      const runner = new FakeProcessRunner().on('openssl passwd', { stdout: '$apr1$abcdefgh$0123456789abcdefghijkl\n' });
      const hash = await hashPasswordApr1(runner, 'test-secret');
      assert.deepEqual(hash, { ok: true, value: '$apr1$abcdefgh$0123456789abcdefghijkl' });
      assert.deepEqual(runner.calls[0]?.args, ['passwd', '-apr1', '-stdin']);
      assert.equal(runner.calls[0]?.options.input, 'test-secret\n');
    });

    it('rejects output that is not an APR1 hash', async () => {
      const runner = new FakeProcessRunner().on('openssl passwd', { stdout: 'unknown option' });
      const hash = await hashPasswordApr1(runner, 'test-secret');
      assert.equal(hash.ok, false);
      if (!hash.ok) {
        assert.equal(hash.error.message, 'openssl returned an unexpected hash format');
      }
    });

    it('reports an openssl failure', async () => {
      const runner = new FakeProcessRunner().on('openssl passwd', { exitCode: 1, stderr: 'passwd: Unknown cipher' });
      const hash = await hashPasswordApr1(runner, 'test-secret');
      assert.equal(hash.ok, false);
      if (!hash.ok) {
        assert.equal(hash.error.kind, 'external-tool');
      }
    });
  });
});
