import { describe, it, mock, beforeEach, afterEach } from 'node:test';
import { strict as assert } from 'node:assert';
import { TlsAuthPhase, basicAuthSecretName, certificateReady } from './tls-auth.js';
import { createSession, type DeploymentSession } from '../../session/session.js';
import {
  FakeProcessRunner,
  ScriptedPrompter,
  cleanupTempDir,
  createTempDir,
  createTestEnvironment,
  createTestRecord,
} from '../../test-utils.js';
import type { ConfigurationRecord } from '../../types.js';

const AUTOMATIC_TLS = { mode: 'automatic', domain: 'n8n.example.test', email: 'ops@example.test', environment: 'staging' } as const;

describe('certificateReady', () => {
  it('looks for a true Ready condition', () => {
    assert.equal(certificateReady({ status: { conditions: [{ type: 'Ready', status: 'True' }] } }), true);
    assert.equal(certificateReady({ status: { conditions: [{ type: 'Ready', status: 'False' }] } }), false);
    assert.equal(certificateReady({}), false);
  });
});

describe('TlsAuthPhase', () => {
  let projectRoot: string;
  let runner: FakeProcessRunner;
  let prompter: ScriptedPrompter;

  beforeEach(() => {
    projectRoot = createTempDir();
    runner = new FakeProcessRunner();
    mock.method(console, 'log', () => {});
  });

  afterEach(() => {
    mock.restoreAll();
    cleanupTempDir(projectRoot);
  });

  function run(
    record: ConfigurationRecord,
    answers: Array<boolean | undefined> = [],
    mode: 'deploy' | 'update-tls' = 'deploy'
  ): { phase: TlsAuthPhase; session: DeploymentSession } {
    prompter = new ScriptedPrompter(answers);
    const session = createSession(mode, record);
    session.endpoint = 'lb.example.test';
    return { phase: new TlsAuthPhase(createTestEnvironment(projectRoot, runner, prompter)), session };
  }

  it('is skipped when neither TLS nor basic auth was requested', () => {
    const { phase, session } = run(createTestRecord());
    assert.equal(phase.precondition(session).status, 'skip');
  });

  it('switches TLS and basic auth off on an update that disables them', async () => {
    const { phase, session } = run(createTestRecord(), [], 'update-tls');
    assert.equal(phase.precondition(session).status, 'ready');

    const outcome = await phase.run(session);
    assert.equal(outcome.ok, true);
    assert.ok(runner.ran('kubectl delete secret n8n-basic-auth -n n8n'));
    assert.equal(runner.ran('helm repo add'), false);

    const upgrade = runner.calls.find((call) => call.line.startsWith('helm upgrade --install n8n'));
    assert.ok(upgrade?.args.includes('--reuse-values'));
    for (const setting of [
      'ingress.tls.enabled=false',
      'ingress.tls.secretName=null',
      'ingress.annotations.cert-manager\\.io/cluster-issuer=null',
      'ingress.annotations.nginx\\.ingress\\.kubernetes\\.io/auth-type=null',
    ]) {
      assert.ok(upgrade?.args.includes(setting), setting);
    }
    assert.ok(upgrade?.args.includes('n8n.protocol=http'));
  });

  it('touches nothing in the cluster when DNS is not confirmed', async () => {
    const { phase, session } = run(createTestRecord({ tls: AUTOMATIC_TLS }), [false]);

    const outcome = await phase.run(session);
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.error.recoverable, true);
      assert.equal(outcome.error.error.message, 'DNS for n8n.example.test was not confirmed; certificate setup was not started');
    }
    assert.deepEqual(prompter.asked, ['Does DNS for n8n.example.test point at lb.example.test now?']);
    assert.equal(runner.ran('helm'), false);
    assert.equal(runner.ran('kubectl'), false);
  });

  it('installs cert-manager and the issuer, then upgrades the release', async () => {
    runner.on('kubectl get certificate', { stdout: JSON.stringify({ status: { conditions: [{ type: 'Ready', status: 'True' }] } }) });
    const { phase, session } = run(createTestRecord({ tls: AUTOMATIC_TLS }), [true]);

    const outcome = await phase.run(session);
    assert.equal(outcome.ok, true);
    const helmLines = runner.lines().filter((line) => line.startsWith('helm'));
    assert.equal(helmLines[0], 'helm repo add jetstack https://charts.jetstack.io --force-update');
    assert.ok(helmLines[2]?.startsWith('helm upgrade --install cert-manager jetstack/cert-manager'));
    assert.ok(helmLines[3]?.startsWith('helm upgrade --install n8n'));
    assert.ok(helmLines[3]?.includes('--reuse-values'));
    assert.ok(helmLines[3]?.includes('ingress.annotations.cert-manager\\.io/cluster-issuer=letsencrypt-staging'));
    assert.ok(runner.indexOf('kubectl apply') < runner.indexOf('helm upgrade --install n8n'));
  });

  it('treats a certificate that is still pending as success', async () => {
    runner.on('kubectl get certificate', { stdout: JSON.stringify({ status: { conditions: [{ type: 'Ready', status: 'False' }] } }) });
    const { phase, session } = run(createTestRecord({ tls: AUTOMATIC_TLS }), [true]);
    const outcome = await phase.run(session);
    assert.equal(outcome.ok, true);
  });

  it('creates basic auth and stores the credentials in the secret store', async () => {
    runner.on('openssl passwd', { stdout: '$apr1$salt$hash\n' });
    const record = createTestRecord({ basicAuth: { enabled: true, username: 'admin' } });
    const { phase, session } = run(record);

    const outcome = await phase.run(session);
    assert.equal(outcome.ok, true);

    const htpasswd = runner.calls.find((call) => call.line === 'kubectl apply -f -');
    assert.ok(htpasswd?.options.input?.includes('admin:$apr1$salt$hash'));

    const stored = runner.calls.find((call) => call.line.startsWith('aws secretsmanager create-secret'));
    assert.ok(stored?.args.includes(basicAuthSecretName(record)));
    const payload: unknown = JSON.parse(stored?.options.input ?? '{}');
    assert.ok(payload !== null && typeof payload === 'object' && 'username' in payload && 'password' in payload);
    assert.equal(payload.username, 'admin');
    assert.equal(typeof payload.password, 'string');
    assert.equal(runner.ran('helm repo add jetstack'), false);
  });

  it('fails when the password cannot be hashed', async () => {
    runner.on('openssl passwd', { exitCode: 1, stderr: 'passwd: Unknown option or message digest: apr1' });
    const { phase, session } = run(createTestRecord({ basicAuth: { enabled: true, username: 'admin' } }));
    const outcome = await phase.run(session);
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.error.recoverable, false);
      assert.equal(outcome.error.error.message, 'Hashing the basic-auth password failed');
    }
    assert.equal(runner.ran('helm'), false);
  });
});
