/**
 * GCP: GKE, Cloud SQL and Secret Manager through gcloud
 */

import type { CancellationToken } from '../lib/cancellation.js';
import { InterruptError, PreconditionError, err, ok, type OrchestrationError, type Result } from '../lib/errors.js';
import { expectSuccess, isAlreadyAbsent } from '../lib/process-runner.js';
import type { CloudTarget } from '../types.js';
import { BaseCloudProvider, missingOutput, nonEmptyLines, ownSecrets, parseJson, stringField } from './base.js';
import {
  SECRET_TAG,
  type CloudProvider,
  type DeploymentContext,
  type IdentityChoice,
  type ProviderDefaults,
  type SecretEntry,
  type VerifiedIdentity,
} from './types.js';

export class GcpProvider extends BaseCloudProvider implements CloudProvider {
  readonly name = 'gcp' as const;
  readonly displayName = 'GCP (GKE)';
  readonly defaults: ProviderDefaults = {
    clusterName: 'n8n-gke-cluster',
    kubernetesVersion: '1.30',
    sizing: { nodeType: 'e2-medium', minCount: 1, desiredCount: 2, maxCount: 5 },
    databaseInstanceClass: 'db-f1-micro',
    databaseStorageGb: 10,
    region: 'us-central1',
  };

  toolEnvironment(target: CloudTarget): Record<string, string> {
    if (target.provider !== 'gcp') {
      return {};
    }
    return {
      CLOUDSDK_CORE_PROJECT: target.projectId,
      GOOGLE_PROJECT: target.projectId,
      USE_GKE_GCLOUD_AUTH_PLUGIN: 'True',
    };
  }

  private projectOf(context: DeploymentContext): string {
    return context.record.target.provider === 'gcp' ? context.record.target.projectId : '';
  }

  async discoverIdentities(token?: CancellationToken): Promise<IdentityChoice[]> {
    const run = await this.exec('gcloud', ['projects', 'list', '--format=json'], { timeoutMs: this.timeouts.identityMs, token });
    const projects = run.exitCode === 0 ? parseJson(run.stdout) : undefined;
    if (!Array.isArray(projects)) {
      return [];
    }
    const configured = await this.exec('gcloud', ['config', 'get-value', 'project'], { timeoutMs: this.timeouts.identityMs, token });
    const current = configured.exitCode === 0 ? configured.stdout.trim() : '';

    const choices: IdentityChoice[] = [];
    for (const project of projects) {
      const id = stringField(project, 'projectId');
      if (id) {
        choices.push({ id, label: `${stringField(project, 'name') ?? id} (${id})`, isDefault: id === current });
      }
    }
    return choices;
  }

  async verifyIdentity(target: CloudTarget, token?: CancellationToken): Promise<Result<VerifiedIdentity, PreconditionError | InterruptError>> {
    if (target.provider !== 'gcp') {
      return err(new PreconditionError(`Not a GCP target: ${target.provider}`));
    }
    const auth = await this.identityCall(
      'gcloud',
      ['auth', 'list', '--filter=status:ACTIVE', '--format=value(account)'],
      target,
      'GCP authentication check failed',
      'Run "gcloud auth login" and "gcloud auth application-default login".',
      token
    );
    if (!auth.ok) {
      return auth;
    }
    const account = nonEmptyLines(auth.value.stdout)[0];
    if (!account) {
      return err(new PreconditionError('No active gcloud account', 'Run "gcloud auth login".'));
    }

    const project = await this.identityCall(
      'gcloud',
      ['projects', 'describe', target.projectId, '--format=json'],
      target,
      `Project ${target.projectId} is not accessible`,
      `Check the project id and that ${account} has access to it.`,
      token
    );
    if (!project.ok) {
      return project;
    }
    return ok({ account, detail: stringField(parseJson(project.value.stdout), 'name') ?? target.projectId });
  }

  async configureClusterAccess(context: DeploymentContext): Promise<Result<void, OrchestrationError>> {
    const { record } = context;
    if (record.target.provider !== 'gcp') {
      return err(new PreconditionError('GCP provider used with a non-GCP record'));
    }
    const result = await this.execChecked(
      'gcloud',
      ['container', 'clusters', 'get-credentials', record.clusterName, '--zone', record.target.zone, '--project', record.target.projectId],
      `Configuring kubectl for GKE cluster ${record.clusterName} failed`,
      {
        target: record.target,
        token: context.token,
        hint: 'Install gke-gcloud-auth-plugin with "gcloud components install gke-gcloud-auth-plugin" if kubectl cannot authenticate.',
      }
    );
    return result.ok ? ok(undefined) : result;
  }

  async writeSecret(context: DeploymentContext, name: string, value: string, description: string): Promise<Result<void, OrchestrationError>> {
    const project = this.projectOf(context);
    const target = context.record.target;
    const create = await this.exec(
      'gcloud',
      ['secrets', 'create', name, '--data-file=-', `--labels=${SECRET_TAG.key}=${SECRET_TAG.value}`, '--project', project],
      { target, input: value, token: context.token }
    );
    if (create.exitCode === 0) {
      const annotate = await this.execChecked(
        'gcloud',
        ['secrets', 'update', name, `--update-annotations=description=${description}`, '--project', project],
        `Annotating ${name} failed`,
        { target, token: context.token }
      );
      return annotate.ok ? ok(undefined) : annotate;
    }
    if (!/ALREADY_EXISTS|already exists/.test(create.stderr)) {
      const failed = expectSuccess(create, `Storing ${name} in Secret Manager failed`);
      return failed.ok ? ok(undefined) : failed;
    }
    const update = await this.execChecked(
      'gcloud',
      ['secrets', 'versions', 'add', name, '--data-file=-', '--project', project],
      `Adding a version to ${name} failed`,
      { target, input: value, token: context.token }
    );
    return update.ok ? ok(undefined) : update;
  }

  async listSecrets(context: DeploymentContext): Promise<Result<SecretEntry[], OrchestrationError>> {
    const result = await this.execChecked(
      'gcloud',
      ['secrets', 'list', `--filter=labels.${SECRET_TAG.key}=${SECRET_TAG.value}`, '--format=json', '--project', this.projectOf(context)],
      'Listing Secret Manager entries failed',
      { target: context.record.target, token: context.token }
    );
    if (!result.ok) {
      return result;
    }
    const items = parseJson(result.value.stdout);
    const entries: SecretEntry[] = [];
    if (Array.isArray(items)) {
      for (const item of items) {
        // Full resource name: projects/<number>/secrets/<name>
        const name = stringField(item, 'name')?.split('/').pop();
        if (name) {
          entries.push({ name });
        }
      }
    }
    return ok(ownSecrets(context, entries));
  }

  async listLeftoverResources(context: DeploymentContext): Promise<Result<string[], OrchestrationError>> {
    const project = this.projectOf(context);
    const result = await this.execChecked(
      'gcloud',
      [
        'asset',
        'search-all-resources',
        `--scope=projects/${project}`,
        `--query=labels.${SECRET_TAG.key}=${SECRET_TAG.value}`,
        '--format=json',
      ],
      'Listing labelled resources failed',
      { target: context.record.target, token: context.token, hint: 'The Cloud Asset API must be enabled in the project.' }
    );
    if (!result.ok) {
      return result;
    }
    const items = parseJson(result.value.stdout);
    const names: string[] = [];
    if (Array.isArray(items)) {
      for (const item of items) {
        const name = stringField(item, 'name');
        if (name && stringField(item, 'assetType') !== 'secretmanager.googleapis.com/Secret') {
          names.push(name);
        }
      }
    }
    return ok(names);
  }

  deleteSecret(context: DeploymentContext, name: string): Promise<Result<'deleted' | 'absent', OrchestrationError>> {
    return this.execDelete(
      'gcloud',
      ['secrets', 'delete', name, '--quiet', '--project', this.projectOf(context)],
      `Deleting ${name} from Secret Manager failed`,
      context
    );
  }

  async disableDatabaseProtection(context: DeploymentContext): Promise<Result<'cleared' | 'none', OrchestrationError>> {
    if (context.record.database.kind !== 'managed') {
      return ok('none' as const);
    }
    const instance = context.outputs.cloudsql_instance_name;
    if (!instance) {
      return err(missingOutput('cloudsql_instance_name', 'terraform output -json'));
    }

    const target = context.record.target;
    const project = this.projectOf(context);
    const describe = await this.exec(
      'gcloud',
      ['sql', 'instances', 'describe', instance, '--project', project, '--format=value(settings.deletionProtectionEnabled)'],
      { target, token: context.token }
    );
    if (isAlreadyAbsent(describe)) {
      return ok('none' as const);
    }
    if (describe.cancelled) {
      return err(new InterruptError());
    }
    if (describe.stdout.trim() !== 'True') {
      return ok('none' as const);
    }

    const patch = await this.execChecked(
      'gcloud',
      ['sql', 'instances', 'patch', instance, '--no-deletion-protection', '--project', project, '--quiet'],
      `Clearing deletion protection on ${instance} failed`,
      { target, token: context.token }
    );
    return patch.ok ? ok('cleared' as const) : patch;
  }
}
