import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { parseArgs } from './args.js';

describe('parseArgs', () => {
  it('defaults to a full deploy', () => {
    assert.deepEqual(parseArgs([]), { ok: true, value: { kind: 'run', mode: 'deploy', cloud: undefined, verbose: false } });
  });

  it('reads the cloud in both spellings', () => {
    assert.deepEqual(parseArgs(['--cloud=gcp', '--verbose']), {
      ok: true,
      value: { kind: 'run', mode: 'deploy', cloud: 'gcp', verbose: true },
    });
    assert.deepEqual(parseArgs(['--teardown', '--cloud', 'azure']), {
      ok: true,
      value: { kind: 'run', mode: 'teardown', cloud: 'azure', verbose: false },
    });
  });

  it('rejects an unknown cloud', () => {
    assert.deepEqual(parseArgs(['--cloud=digitalocean']), { ok: false, error: '--cloud must be one of aws, azure, gcp' });
    assert.deepEqual(parseArgs(['--cloud']), { ok: false, error: '--cloud must be one of aws, azure, gcp' });
  });

  it('maps the legacy skip flag', () => {
    const parsed = parseArgs(['--skip-terraform']);
    assert.equal(parsed.ok && parsed.value.kind === 'run' && parsed.value.mode, 'skip-infra');
  });

  it('refuses conflicting modes but tolerates a repeated one', () => {
    assert.deepEqual(parseArgs(['--teardown', '--update-tls']), { ok: false, error: '--teardown and --update-tls cannot be combined' });
    assert.equal(parseArgs(['--skip-infra', '--skip-terraform']).ok, true);
  });

  it('stops at help and version', () => {
    assert.deepEqual(parseArgs(['--teardown', '-h']), { ok: true, value: { kind: 'help' } });
    assert.deepEqual(parseArgs(['--version']), { ok: true, value: { kind: 'version' } });
  });

  it('names an unknown option', () => {
    assert.deepEqual(parseArgs(['--force']), { ok: false, error: 'Unknown option: --force' });
  });
});
