import { describe, it, mock, beforeEach, afterEach } from 'node:test';
import { strict as assert } from 'node:assert';
import { ApplicationPhase, databaseSecret, deploymentsReady } from './application.js';
import { createSession, type DeploymentSession } from '../../session/session.js';
import {
  FakeProcessRunner,
  ScriptedPrompter,
  TEST_ENCRYPTION_KEY,
  cleanupTempDir,
  createTempDir,
  createTestEnvironment,
  createTestRecord,
} from '../../test-utils.js';

function deployments(...replicas: Array<[number, number]>): string {
  return JSON.stringify({
    items: replicas.map(([wanted, available]) => ({ spec: { replicas: wanted }, status: { availableReplicas: available } })),
  });
}

describe('deploymentsReady', () => {
  it('needs every deployment fully available', () => {
    assert.equal(deploymentsReady(JSON.parse(deployments([1, 1], [2, 2]))), true);
    assert.equal(deploymentsReady(JSON.parse(deployments([1, 1], [2, 1]))), false);
    assert.equal(deploymentsReady({ items: [] }), false);
    assert.equal(deploymentsReady(undefined), false);
  });
});

describe('databaseSecret', () => {
  it('maps the managed database outputs to n8n variables', () => {
    const session = createSession(
      'deploy',
      createTestRecord({ database: { kind: 'managed', instanceClass: 'db.t3.micro', storageGb: 20, highAvailability: false } })
    );
    session.outputs = { db_host: 'db.internal', db_name: 'n8n', db_username: 'n8n', db_password: 'test-secret' };
    assert.deepEqual(databaseSecret(session)?.stringData, {
      DB_POSTGRESDB_HOST: 'db.internal',
      DB_POSTGRESDB_PORT: '5432',
      DB_POSTGRESDB_DATABASE: 'n8n',
      DB_POSTGRESDB_USER: 'n8n',
      DB_POSTGRESDB_PASSWORD: 'test-secret',
    });
    assert.equal(databaseSecret(createSession('deploy', createTestRecord())), null);
  });
});

describe('ApplicationPhase', () => {
  let projectRoot: string;
  let runner: FakeProcessRunner;
  let session: DeploymentSession;

  beforeEach(() => {
    projectRoot = createTempDir();
    runner = new FakeProcessRunner();
    session = createSession('deploy', createTestRecord());
    session.outputs = { cluster_name: 'n8n-eks-cluster' };
    mock.method(console, 'log', () => {});
  });

  afterEach(() => {
    mock.restoreAll();
    cleanupTempDir(projectRoot);
  });

  function phase(): ApplicationPhase {
    return new ApplicationPhase(createTestEnvironment(projectRoot, runner, new ScriptedPrompter()));
  }

  it('needs the cluster outputs', () => {
    const gate = phase().precondition(createSession('deploy', createTestRecord()));
    assert.equal(gate.status, 'unmet');
  });

  it('applies secrets, installs both releases, and waits for readiness', async () => {
    runner.on('kubectl get deployments', { stdout: deployments([1, 1]) });

    const outcome = await phase().run(session);
    assert.equal(outcome.ok, true);
    assert.deepEqual(
      runner.lines().map((line) => line.split(' ').slice(0, 4).join(' ')),
      [
        'aws eks update-kubeconfig --region',
        'kubectl apply -f -',
        'kubectl apply -f -',
        'helm repo add ingress-nginx',
        'helm repo update ingress-nginx',
        'helm upgrade --install ingress-nginx',
        'helm upgrade --install n8n',
        'kubectl get deployments -n',
      ]
    );
    assert.equal(session.clusterAccess, true);
    assert.ok(runner.calls[2]?.options.input?.includes(TEST_ENCRYPTION_KEY));
    assert.equal(
      runner.calls.some((call) => call.args.includes(TEST_ENCRYPTION_KEY)),
      false
    );
  });

  it('fails when n8n never becomes available', async () => {
    runner.on('kubectl get deployments', { stdout: deployments([1, 0]) });

    const outcome = await phase().run(session);
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.error.recoverable, false);
      assert.equal(outcome.error.error.kind, 'timeout');
      assert.equal(outcome.error.error.message, 'Timed out after 0s waiting for the n8n deployment to become available');
    }
  });

  it('stops at the first failed release', async () => {
    runner.on('helm upgrade --install ingress-nginx', { exitCode: 1, stderr: 'Error: context deadline exceeded' });

    const outcome = await phase().run(session);
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.error.error.message, 'helm upgrade of ingress-nginx failed');
    }
    assert.equal(runner.ran('helm upgrade --install n8n'), false);
  });
});
