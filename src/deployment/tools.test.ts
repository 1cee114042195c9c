import { describe, it, beforeEach } from 'node:test';
import { strict as assert } from 'node:assert';
import { existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { Helm, Kubectl, PLAN_FILE, Terraform, parseTerraformOutputs, type ToolEnvironment } from './tools.js';
import { opaqueSecret } from './manifests.js';
import { SettingsSchema, resolveSettings } from '../config/settings.js';
import { FakeProcessRunner, cleanupTempDir, createTempDir } from '../test-utils.js';

describe('parseTerraformOutputs', () => {
  it('flattens values to strings and skips nulls', () => {
    const outputs = parseTerraformOutputs(
      JSON.stringify({
        cluster_name: { value: 'n8n-eks-cluster', type: 'string', sensitive: false },
        node_count: { value: 2, type: 'number' },
        database_endpoint: { value: null },
      })
    );
    assert.deepEqual(outputs, { cluster_name: 'n8n-eks-cluster', node_count: '2' });
  });

  it('rejects output that is not a JSON object', () => {
    assert.equal(parseTerraformOutputs('No outputs found'), null);
    assert.equal(parseTerraformOutputs('[]'), null);
  });
});

describe('tool wrappers', () => {
  let runner: FakeProcessRunner;
  let tools: ToolEnvironment;

  beforeEach(() => {
    runner = new FakeProcessRunner();
    const settings = resolveSettings('/tmp/launchpad-unused', SettingsSchema.parse({}), {});
    tools = { runner, env: { AWS_PROFILE: 'test-profile' }, timeouts: settings.timeouts };
  });

  it('plans to a file and applies exactly that plan', async () => {
    const terraform = new Terraform(tools, '/work/terraform/aws');
    await terraform.plan();
    await terraform.apply();
    assert.deepEqual(runner.lines(), [
      `terraform plan -input=false -no-color -out=${PLAN_FILE}`,
      `terraform apply -input=false -no-color -auto-approve ${PLAN_FILE}`,
    ]);
    assert.equal(runner.calls[0]?.options.cwd, '/work/terraform/aws');
    assert.equal(runner.calls[0]?.options.env?.TF_IN_AUTOMATION, '1');
    assert.equal(runner.calls[0]?.options.env?.AWS_PROFILE, 'test-profile');
    assert.equal(runner.calls[0]?.options.timeoutMs, 45 * 60_000);
  });

  it('removes the saved plan after apply, whether it succeeds or fails', async () => {
    const dir = createTempDir();
    try {
      const planPath = join(dir, PLAN_FILE);
      const terraform = new Terraform(tools, dir);

      writeFileSync(planPath, 'plan');
      assert.equal((await terraform.apply()).ok, true);
      assert.equal(existsSync(planPath), false);

      runner.on('terraform apply', { exitCode: 1, stderr: 'Error: creating EKS Node Group' });
      writeFileSync(planPath, 'plan');
      assert.equal((await terraform.apply()).ok, false);
      assert.equal(existsSync(planPath), false);

      runner.on('terraform plan', { exitCode: 1, stderr: 'Error: Invalid value for variable' });
      writeFileSync(planPath, 'partial plan');
      assert.equal((await terraform.plan()).ok, false);
      assert.equal(existsSync(planPath), false);
    } finally {
      cleanupTempDir(dir);
    }
  });

  it('reports a failed terraform call with its output', async () => {
    runner.on('terraform init', { exitCode: 1, stderr: 'Error: Failed to query available provider packages' });
    const result = await new Terraform(tools, '/work').init();
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.error.kind, 'external-tool');
      assert.equal(result.error.message, 'terraform init failed');
    }
  });

  it('reads outputs', async () => {
    runner.on('terraform output -json', { stdout: JSON.stringify({ cluster_name: { value: 'n8n' } }) });
    assert.deepEqual(await new Terraform(tools, '/work').outputs(), { ok: true, value: { cluster_name: 'n8n' } });
  });

  it('installs or upgrades a release with values files and a bounded wait', async () => {
    const helm = new Helm(tools);
    await helm.upgradeInstall({
      release: 'n8n',
      chart: '/work/helm',
      namespace: 'n8n',
      valuesFiles: ['/work/helm/values-override.yaml'],
      setArgs: ['--set', 'a=1'],
      reuseValues: true,
      wait: true,
    });
    assert.equal(
      runner.lines()[0],
      'helm upgrade --install n8n /work/helm --namespace n8n --create-namespace -f /work/helm/values-override.yaml --reuse-values --set a=1 --wait --timeout 300s'
    );
  });

  it('treats an uninstalled release as absent', async () => {
    runner.on('helm uninstall', { exitCode: 1, stderr: 'Error: uninstall: Release not loaded: n8n: release: not found' });
    assert.deepEqual(await new Helm(tools).uninstall('n8n', 'n8n'), { ok: true, value: 'absent' });
  });

  it('applies manifests through stdin', async () => {
    const secret = opaqueSecret('n8n-encryption-key', 'n8n', { N8N_ENCRYPTION_KEY: 'test-secret' });
    const applied = await new Kubectl(tools).apply(secret);
    assert.equal(applied.ok, true);
    assert.equal(runner.lines()[0], 'kubectl apply -f -');
    assert.equal(runner.calls[0]?.args.includes('test-secret'), false);
    assert.ok(runner.calls[0]?.options.input?.includes('test-secret'));
  });

  it('returns an empty jsonpath for a missing object', async () => {
    runner.on('kubectl get', { exitCode: 1, stderr: 'Error from server (NotFound): services "ingress-nginx-controller" not found' });
    assert.deepEqual(await new Kubectl(tools).jsonpath(['service', 'ingress-nginx-controller'], '{.status}'), { ok: true, value: '' });
  });

  it('deletes with ignore-not-found', async () => {
    await new Kubectl(tools).delete(['namespace', 'n8n']);
    assert.equal(runner.lines()[0], 'kubectl delete namespace n8n --ignore-not-found --wait=true');
  });
});
