/**
 * Credential generation
 * Encryption keys, basic-auth passwords and their htpasswd hashes
 */

import { randomBytes, randomInt } from 'crypto';
import type { CancellationToken } from './cancellation.js';
import { ExternalToolError, InterruptError, TimeoutError, err, ok, type Result } from './errors.js';
import { expectSuccess, type ProcessRunner } from './process-runner.js';

const CHARSET_ALPHANUMERIC = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * 32 random bytes as 64 hex characters
 */
export function generateEncryptionKey(): string {
  return randomBytes(32).toString('hex');
}

/**
 * Alphanumeric password, safe to paste into a browser prompt
 */
export function generatePassword(length: number = 16): string {
  let password = '';
  for (let i = 0; i < length; i++) {
    password += CHARSET_ALPHANUMERIC.charAt(randomInt(CHARSET_ALPHANUMERIC.length));
  }
  return password;
}

/**
 * APR1 (Apache MD5) hash as used by nginx basic auth.
 * The password is passed on stdin so it never shows up in `ps`.
 */
export async function hashPasswordApr1(
  runner: ProcessRunner,
  password: string,
  options: { timeoutMs?: number; token?: CancellationToken } = {}
): Promise<Result<string, ExternalToolError | TimeoutError | InterruptError>> {
  const run = await runner.run('openssl', ['passwd', '-apr1', '-stdin'], {
    input: `${password}\n`,
    timeoutMs: options.timeoutMs,
    token: options.token,
  });
  const checked = expectSuccess(run, 'Hashing the basic-auth password failed', 'Check that openssl supports "passwd -apr1".');
  if (!checked.ok) {
    return checked;
  }

  const hash = checked.value.stdout.trim();
  if (!hash.startsWith('$apr1$')) {
    return err(new ExternalToolError('openssl returned an unexpected hash format', run.command, 0, hash.slice(0, 40)));
  }
  return ok(hash);
}

export function htpasswdLine(username: string, hash: string): string {
  return `${username}:${hash}`;
}
