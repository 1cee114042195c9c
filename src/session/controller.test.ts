import { describe, it, mock, beforeEach, afterEach } from 'node:test';
import { strict as assert } from 'node:assert';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { SessionController, exitCodeFor } from './controller.js';
import { terraformDirFor, type ResolvedSettings } from '../config/settings.js';
import { ConfigStore } from '../config/store.js';
import { CancellationToken } from '../lib/cancellation.js';
import { ExternalToolError, InterruptError } from '../lib/errors.js';
import { StructuredLogger } from '../monitoring/structured-logger.js';
import { REGION_MARKER_FILE, getRegionStateManager, type RegionStateManager } from '../state/region-state-manager.js';
import {
  FakeProcessRunner,
  ScriptedPrompter,
  cleanupTempDir,
  createTempDir,
  createTestRecord,
  createTestSettings,
  type ScriptedAnswer,
} from '../test-utils.js';

const READY_DEPLOYMENTS = JSON.stringify({ items: [{ spec: { replicas: 1 }, status: { availableReplicas: 1 } }] });
const LOAD_BALANCER = JSON.stringify({ status: { loadBalancer: { ingress: [{ hostname: 'lb.example.test' }] } } });
const NO_LOAD_BALANCER = JSON.stringify({ status: { loadBalancer: {} } });

/**
 * Collector answers for a fresh AWS deploy, everything at its default
 */
function deployAnswers(proceed: boolean): ScriptedAnswer[] {
  return ['default', '', '', '', '', '', '', '', '', '', '', '', '', '', false, '', proceed];
}

function toolRunner(outputs: string = JSON.stringify({ cluster_name: { value: 'n8n-eks-cluster' } })): FakeProcessRunner {
  return new FakeProcessRunner()
    .on('terraform version', { stdout: 'Terraform v1.7.5\non linux_amd64' })
    .on('helm version', { stdout: 'v3.14.0+gc309b6f' })
    .on('kubectl version', { stdout: 'Client Version: v1.29.0' })
    .on('openssl version', { stdout: 'OpenSSL 3.0.13 30 Jan 2024' })
    .on('aws --version', { stdout: 'aws-cli/2.15.0 Python/3.11.6' })
    .on('aws sts get-caller-identity', {
      stdout: JSON.stringify({ Account: '000000000000', Arn: 'arn:aws:iam::000000000000:user/tester' }),
    })
    .on('terraform output -json', { stdout: outputs })
    .on('kubectl get deployments', { stdout: READY_DEPLOYMENTS });
}

describe('exitCodeFor', () => {
  it('maps interrupts and cancelled runs to 130', () => {
    const token = new CancellationToken();
    assert.equal(exitCodeFor(new ExternalToolError('x', 'x', 1, ''), token), 1);
    assert.equal(exitCodeFor(new InterruptError(), token), 130);
    token.cancel();
    assert.equal(exitCodeFor(new ExternalToolError('x', 'x', 1, ''), token), 130);
  });
});

describe('SessionController', () => {
  let projectRoot: string;
  let settings: ResolvedSettings;
  let runner: FakeProcessRunner;

  beforeEach(() => {
    projectRoot = createTempDir();
    settings = createTestSettings(projectRoot);
    runner = toolRunner();
    mock.method(console, 'log', () => {});
    mock.method(console, 'error', () => {});
  });

  afterEach(() => {
    mock.restoreAll();
    cleanupTempDir(projectRoot);
  });

  function controller(prompter: ScriptedPrompter): SessionController {
    return new SessionController({
      settings,
      runner,
      prompter,
      logger: new StructuredLogger({ enableConsole: false }),
      countdown: async () => {},
      now: () => new Date('2026-03-01T10:00:00.000Z'),
      nodeVersion: '20.11.1',
    });
  }

  /**
   * A non-empty AWS state in `region` as the working directory's current state
   */
  function seedState(region: string): RegionStateManager {
    const states = getRegionStateManager(terraformDirFor(settings, 'aws'));
    mkdirSync(states.workingDir, { recursive: true });
    writeFileSync(states.statePath, JSON.stringify({ version: 4, resources: [{ type: 'aws_eks_cluster', name: 'this' }] }));
    states.claim(region);
    return states;
  }

  function historyOutcomes(): string[] {
    return readFileSync(settings.paths.history, 'utf-8')
      .split('\n')
      .filter((line) => line.startsWith('Outcome:'));
  }

  it('lists region states without touching any tool', async () => {
    const code = await controller(new ScriptedPrompter()).run({ mode: 'list-states', cloud: 'aws' });
    assert.equal(code, 0);
    assert.equal(runner.calls.length, 0);
  });

  it('stops before any question when a required tool is missing', async () => {
    runner = new FakeProcessRunner().on('terraform version', { exitCode: 127 });
    const prompter = new ScriptedPrompter();
    const code = await controller(prompter).run({ mode: 'deploy', cloud: 'aws' });
    assert.equal(code, 1);
    assert.deepEqual(prompter.asked, []);
  });

  it('offers only the installed clouds and refuses a teardown without a saved record', async () => {
    runner.on(/^(az|gcloud|kubelogin|gke-gcloud-auth-plugin) /, { exitCode: 127 });
    const prompter = new ScriptedPrompter(['']);
    const code = await controller(prompter).run({ mode: 'teardown' });
    assert.equal(code, 1);
    assert.deepEqual(prompter.asked, ['Cloud provider']);
    assert.equal(runner.ran('aws sts'), false);
    assert.equal(runner.ran('terraform destroy'), false);
  });

  it('refuses a saved record for another cloud', async () => {
    new ConfigStore(settings).writeRecord(
      createTestRecord({ target: { provider: 'azure', subscriptionId: 'sub-1', location: 'westeurope', resourceGroup: 'n8n-rg' } })
    );
    const code = await controller(new ScriptedPrompter()).run({ mode: 'skip-infra', cloud: 'aws' });
    assert.equal(code, 1);
    assert.equal(runner.ran('terraform output'), false);
  });

  it('writes nothing when the summary is declined', async () => {
    const code = await controller(new ScriptedPrompter(deployAnswers(false))).run({ mode: 'deploy', cloud: 'aws' });
    assert.equal(code, 1);
    assert.equal(existsSync(settings.paths.currentConfig), false);
    assert.equal(existsSync(settings.paths.valuesOverride), false);
    assert.equal(existsSync(settings.paths.history), false);
    assert.equal(runner.ran('terraform init'), false);
  });

  it('deploys end to end and keeps the written configuration', async () => {
    runner.on('kubectl get service ingress-nginx-controller', { stdout: LOAD_BALANCER });
    const prompter = new ScriptedPrompter([...deployAnswers(true), true]);

    const code = await controller(prompter).run({ mode: 'deploy', cloud: 'aws' });
    assert.equal(code, 0);
    assert.equal(prompter.remaining, 0);

    const stored = new ConfigStore(settings).readRecord();
    assert.equal(stored.ok && stored.value?.configuration.clusterName, 'n8n-eks-cluster');
    assert.equal(existsSync(settings.paths.valuesOverride), true);
    assert.deepEqual(historyOutcomes(), ['Outcome:   succeeded']);
    assert.ok(runner.indexOf('aws sts get-caller-identity') < runner.indexOf('terraform init'));
  });

  it('ends incomplete with exit 2 when the endpoint does not appear', async () => {
    runner.on('kubectl get service ingress-nginx-controller', { stdout: NO_LOAD_BALANCER });

    const code = await controller(new ScriptedPrompter([...deployAnswers(true), true])).run({ mode: 'deploy', cloud: 'aws' });
    assert.equal(code, 2);
    assert.equal(existsSync(settings.paths.currentConfig), true);
    assert.deepEqual(historyOutcomes(), ['Outcome:   incomplete']);
  });

  it('restores the configuration files when a phase fails', async () => {
    runner.on('helm upgrade --install n8n', { exitCode: 1, stderr: 'Error: INSTALLATION FAILED' });

    const code = await controller(new ScriptedPrompter([...deployAnswers(true), true])).run({ mode: 'deploy', cloud: 'aws' });
    assert.equal(code, 1);
    assert.equal(existsSync(settings.paths.currentConfig), false);
    assert.equal(existsSync(settings.paths.valuesOverride), false);
    assert.deepEqual(historyOutcomes(), ['Outcome:   failed']);
    assert.equal(runner.ran('kubectl get service'), false);
  });

  it('exits 130 when the infrastructure plan is declined', async () => {
    const code = await controller(new ScriptedPrompter([...deployAnswers(true), false])).run({ mode: 'deploy', cloud: 'aws' });
    assert.equal(code, 130);
    assert.equal(runner.ran('terraform apply'), false);
    assert.deepEqual(historyOutcomes(), ['Outcome:   interrupted']);
  });
  it('snapshots another region\'s state and switches when the user agrees', async () => {
    runner.on('kubectl get service ingress-nginx-controller', { stdout: LOAD_BALANCER });
    const states = seedState('eu-west-1');
    const prompter = new ScriptedPrompter([...deployAnswers(true), true, true]);

    const code = await controller(prompter).run({ mode: 'deploy', cloud: 'aws' });
    assert.equal(code, 0);
    assert.ok(prompter.asked.includes('Snapshot the eu-west-1 state and switch to us-east-1?'));
    assert.ok(prompter.notes.includes('No earlier us-east-1 state; starting fresh'));
    assert.deepEqual(
      states.list().map((snapshot) => snapshot.region),
      ['eu-west-1']
    );
    assert.equal(readFileSync(join(states.workingDir, REGION_MARKER_FILE), 'utf-8'), 'us-east-1\n');
  });

  it('changes nothing when the region switch is declined', async () => {
    const states = seedState('eu-west-1');
    const prompter = new ScriptedPrompter([...deployAnswers(true), false]);

    const code = await controller(prompter).run({ mode: 'deploy', cloud: 'aws' });
    assert.equal(code, 1);
    assert.equal(prompter.remaining, 0);
    assert.equal(states.currentRegion(), 'eu-west-1');
    assert.deepEqual(states.list(), []);
    assert.equal(existsSync(settings.paths.currentConfig), false);
    assert.equal(runner.ran('terraform init'), false);
  });

  it('reuses the applied infrastructure when skipping it', async () => {
    runner.on('kubectl get service ingress-nginx-controller', { stdout: LOAD_BALANCER });
    new ConfigStore(settings).writeRecord(createTestRecord());
    seedState('us-east-1');
    const prompter = new ScriptedPrompter();

    const code = await controller(prompter).run({ mode: 'skip-infra', cloud: 'aws' });
    assert.equal(code, 0);
    assert.deepEqual(prompter.asked, []);
    assert.ok(runner.ran('terraform output -json'));
    assert.equal(runner.ran('terraform init'), false);
    assert.equal(runner.ran('terraform apply'), false);
    assert.ok(runner.ran('helm upgrade --install n8n'));
  });

  it('updates TLS and basic auth on the running release only', async () => {
    runner.on('kubectl get service ingress-nginx-controller', { stdout: LOAD_BALANCER });
    const store = new ConfigStore(settings);
    store.writeRecord(createTestRecord({ basicAuth: { enabled: true, username: 'admin' } }));
    seedState('us-east-1');
    const prompter = new ScriptedPrompter(['', '', false, true]);

    const code = await controller(prompter).run({ mode: 'update-tls', cloud: 'aws' });
    assert.equal(code, 0);
    assert.deepEqual(prompter.asked, [
      'TLS',
      'Hostname (leave empty to use the load balancer address)',
      'Protect n8n with basic auth?',
      'Proceed with this configuration?',
    ]);

    const stored = store.readRecord();
    assert.equal(stored.ok && stored.value?.configuration.basicAuth.enabled, false);
    assert.ok(runner.ran('kubectl delete secret n8n-basic-auth -n n8n'));
    const upgrades = runner.calls.filter((call) => call.line.startsWith('helm upgrade --install n8n'));
    assert.equal(upgrades.length, 1);
    assert.ok(upgrades[0]?.args.includes('--reuse-values'));
    assert.equal(runner.ran('helm repo add'), false);
    assert.equal(runner.ran('terraform init'), false);
  });

  it('restores every configuration file byte for byte and exits 130 when interrupted mid-phase', async () => {
    const store = new ConfigStore(settings);
    store.writeRecord(createTestRecord(), new Date('2025-12-24T08:00:00.000Z'));
    seedState('us-east-1');
    const originals = new Map<string, string>([
      [store.tfvarsPath('aws'), '# hand-edited\nregion = "us-east-1"\n'],
      [store.valuesOverridePath, 'n8n:\n  extraEnv: kept\n'],
    ]);
    for (const [path, content] of originals) {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, content);
    }
    originals.set(store.currentConfigPath, readFileSync(store.currentConfigPath, 'utf-8'));
    runner.on('helm upgrade --install n8n', { cancelled: true, exitCode: 130 });

    const code = await controller(new ScriptedPrompter()).run({ mode: 'skip-infra', cloud: 'aws' });
    assert.equal(code, 130);
    for (const [path, content] of originals) {
      assert.equal(readFileSync(path, 'utf-8'), content, path);
    }
    assert.deepEqual(historyOutcomes(), ['Outcome:   interrupted']);
  });

  it('tears down twice, the second run against what is already gone', async () => {
    new ConfigStore(settings).writeRecord(createTestRecord());
    runner.on('kubectl get services', { stdout: JSON.stringify({ items: [] }) });

    const first = await controller(new ScriptedPrompter([true, 'n8n-eks-cluster'])).run({ mode: 'teardown', cloud: 'aws' });
    assert.equal(first, 0);
    assert.ok(runner.ran('helm uninstall n8n'));

    runner = toolRunner('{}').on('aws eks update-kubeconfig', { exitCode: 254, stderr: 'No cluster found for name: n8n-eks-cluster.' });
    const second = await controller(new ScriptedPrompter([true, 'n8n-eks-cluster'])).run({ mode: 'teardown', cloud: 'aws' });
    assert.equal(second, 0);
    assert.equal(runner.ran('helm uninstall'), false);
    assert.ok(runner.ran('terraform destroy'));
    assert.deepEqual(historyOutcomes(), ['Outcome:   succeeded', 'Outcome:   succeeded']);
  });
});
