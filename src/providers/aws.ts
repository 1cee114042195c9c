/**
 * AWS: EKS, RDS and Secrets Manager through the aws CLI
 */

import type { CancellationToken } from '../lib/cancellation.js';
import { InterruptError, PreconditionError, err, ok, type OrchestrationError, type Result } from '../lib/errors.js';
import { expectSuccess, isAlreadyAbsent } from '../lib/process-runner.js';
import type { CloudTarget } from '../types.js';
import { BaseCloudProvider, field, missingOutput, nonEmptyLines, ownSecrets, parseJson, secretPrefix, stringField } from './base.js';
import {
  SECRET_TAG,
  type CloudProvider,
  type DeploymentContext,
  type IdentityChoice,
  type ProviderDefaults,
  type SecretEntry,
  type VerifiedIdentity,
} from './types.js';

// Read secret values from stdin instead of the argument list
const STDIN_SECRET = 'file:///dev/stdin';

export class AwsProvider extends BaseCloudProvider implements CloudProvider {
  readonly name = 'aws' as const;
  readonly displayName = 'AWS (EKS)';
  readonly defaults: ProviderDefaults = {
    clusterName: 'n8n-eks-cluster',
    kubernetesVersion: '1.31',
    sizing: { nodeType: 't3.medium', minCount: 1, desiredCount: 2, maxCount: 5 },
    databaseInstanceClass: 'db.t3.micro',
    databaseStorageGb: 20,
    region: 'us-east-1',
  };

  toolEnvironment(target: CloudTarget): Record<string, string> {
    if (target.provider !== 'aws') {
      return {};
    }
    return { AWS_PROFILE: target.profile, AWS_REGION: target.region, AWS_DEFAULT_REGION: target.region };
  }

  async discoverIdentities(token?: CancellationToken): Promise<IdentityChoice[]> {
    const run = await this.exec('aws', ['configure', 'list-profiles'], { timeoutMs: this.timeouts.identityMs, token });
    if (run.exitCode !== 0) {
      return [];
    }
    const preferred = process.env.AWS_PROFILE ?? 'default';
    return nonEmptyLines(run.stdout).map((profile) => ({
      id: profile,
      label: profile,
      isDefault: profile === preferred,
    }));
  }

  async verifyIdentity(target: CloudTarget, token?: CancellationToken): Promise<Result<VerifiedIdentity, PreconditionError | InterruptError>> {
    if (target.provider !== 'aws') {
      return err(new PreconditionError(`Not an AWS target: ${target.provider}`));
    }
    const call = await this.identityCall(
      'aws',
      ['sts', 'get-caller-identity', '--profile', target.profile, '--output', 'json'],
      target,
      `AWS authentication failed for profile ${target.profile}`,
      `Run "aws configure --profile ${target.profile}" or "aws sso login --profile ${target.profile}".`,
      token
    );
    if (!call.ok) {
      return call;
    }
    const identity = parseJson(call.value.stdout);
    return ok({
      account: stringField(identity, 'Account') ?? 'unknown',
      detail: stringField(identity, 'Arn') ?? target.profile,
    });
  }

  async configureClusterAccess(context: DeploymentContext): Promise<Result<void, OrchestrationError>> {
    const { record } = context;
    if (record.target.provider !== 'aws') {
      return err(new PreconditionError('AWS provider used with a non-AWS record'));
    }
    const result = await this.execChecked(
      'aws',
      ['eks', 'update-kubeconfig', '--region', record.target.region, '--name', record.clusterName, '--profile', record.target.profile],
      `Configuring kubectl for EKS cluster ${record.clusterName} failed`,
      { target: record.target, token: context.token, hint: 'Check that the cluster exists and your profile can describe it.' }
    );
    return result.ok ? ok(undefined) : result;
  }

  async writeSecret(context: DeploymentContext, name: string, value: string, description: string): Promise<Result<void, OrchestrationError>> {
    const target = context.record.target;
    const create = await this.exec(
      'aws',
      [
        'secretsmanager',
        'create-secret',
        '--name',
        name,
        '--description',
        description,
        '--secret-string',
        STDIN_SECRET,
        '--tags',
        `Key=${SECRET_TAG.key},Value=${SECRET_TAG.value}`,
      ],
      { target, input: value, token: context.token }
    );
    if (create.exitCode === 0) {
      return ok(undefined);
    }
    if (!/ResourceExistsException/.test(create.stderr)) {
      const failed = expectSuccess(create, `Storing ${name} in Secrets Manager failed`);
      return failed.ok ? ok(undefined) : failed;
    }
    const update = await this.execChecked(
      'aws',
      ['secretsmanager', 'put-secret-value', '--secret-id', name, '--secret-string', STDIN_SECRET],
      `Updating ${name} in Secrets Manager failed`,
      { target, input: value, token: context.token }
    );
    return update.ok ? ok(undefined) : update;
  }

  async listSecrets(context: DeploymentContext): Promise<Result<SecretEntry[], OrchestrationError>> {
    const result = await this.execChecked(
      'aws',
      [
        'secretsmanager',
        'list-secrets',
        '--filters',
        `Key=tag-key,Values=${SECRET_TAG.key}`,
        `Key=tag-value,Values=${SECRET_TAG.value}`,
        `Key=name,Values=${secretPrefix(context)}`,
        '--output',
        'json',
      ],
      'Listing Secrets Manager entries failed',
      { target: context.record.target, token: context.token }
    );
    if (!result.ok) {
      return result;
    }
    const list = field(parseJson(result.value.stdout), 'SecretList');
    const entries: SecretEntry[] = [];
    if (Array.isArray(list)) {
      for (const item of list) {
        const name = stringField(item, 'Name');
        if (name) {
          entries.push({ name, description: stringField(item, 'Description') });
        }
      }
    }
    return ok(ownSecrets(context, entries));
  }

  async listLeftoverResources(context: DeploymentContext): Promise<Result<string[], OrchestrationError>> {
    const result = await this.execChecked(
      'aws',
      ['resourcegroupstaggingapi', 'get-resources', '--tag-filters', `Key=${SECRET_TAG.key},Values=${SECRET_TAG.value}`, '--output', 'json'],
      'Listing tagged resources failed',
      { target: context.record.target, token: context.token }
    );
    if (!result.ok) {
      return result;
    }
    const mappings = field(parseJson(result.value.stdout), 'ResourceTagMappingList');
    const arns: string[] = [];
    if (Array.isArray(mappings)) {
      for (const mapping of mappings) {
        const arn = stringField(mapping, 'ResourceARN');
        // Secrets are offered for deletion in their own stage
        if (arn && !arn.includes(':secretsmanager:')) {
          arns.push(arn);
        }
      }
    }
    return ok(arns);
  }

  deleteSecret(context: DeploymentContext, name: string): Promise<Result<'deleted' | 'absent', OrchestrationError>> {
    return this.execDelete(
      'aws',
      ['secretsmanager', 'delete-secret', '--secret-id', name, '--force-delete-without-recovery'],
      `Deleting ${name} from Secrets Manager failed`,
      context
    );
  }

  async disableDatabaseProtection(context: DeploymentContext): Promise<Result<'cleared' | 'none', OrchestrationError>> {
    if (context.record.database.kind !== 'managed') {
      return ok('none' as const);
    }
    const instanceId = context.outputs.rds_instance_id;
    if (!instanceId) {
      return err(missingOutput('rds_instance_id', 'terraform output -json'));
    }

    const target = context.record.target;
    const describe = await this.exec(
      'aws',
      ['rds', 'describe-db-instances', '--db-instance-identifier', instanceId, '--query', 'DBInstances[0].DeletionProtection', '--output', 'text'],
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

    const modify = await this.execChecked(
      'aws',
      ['rds', 'modify-db-instance', '--db-instance-identifier', instanceId, '--no-deletion-protection', '--apply-immediately'],
      `Clearing deletion protection on ${instanceId} failed`,
      { target, token: context.token }
    );
    return modify.ok ? ok('cleared' as const) : modify;
  }
}
