/**
 * Azure: AKS, PostgreSQL Flexible Server and Key Vault through the az CLI
 */

import type { CancellationToken } from '../lib/cancellation.js';
import { InterruptError, PreconditionError, err, ok, type OrchestrationError, type Result } from '../lib/errors.js';
import { expectSuccess, isAlreadyAbsent } from '../lib/process-runner.js';
import type { CloudTarget } from '../types.js';
import { BaseCloudProvider, field, missingOutput, ownSecrets, parseJson, stringField } from './base.js';
import {
  SECRET_TAG,
  type CloudProvider,
  type DeploymentContext,
  type IdentityChoice,
  type ProviderDefaults,
  type SecretEntry,
  type VerifiedIdentity,
} from './types.js';

export class AzureProvider extends BaseCloudProvider implements CloudProvider {
  readonly name = 'azure' as const;
  readonly displayName = 'Azure (AKS)';
  readonly defaults: ProviderDefaults = {
    clusterName: 'n8n-aks-cluster',
    kubernetesVersion: '1.29',
    sizing: { nodeType: 'Standard_D2s_v3', minCount: 1, desiredCount: 2, maxCount: 5 },
    databaseInstanceClass: 'B_Standard_B1ms',
    databaseStorageGb: 32,
    region: 'eastus',
  };

  static readonly DEFAULT_RESOURCE_GROUP = 'n8n-rg';

  toolEnvironment(target: CloudTarget): Record<string, string> {
    if (target.provider !== 'azure') {
      return {};
    }
    return { ARM_SUBSCRIPTION_ID: target.subscriptionId, AZURE_SUBSCRIPTION_ID: target.subscriptionId };
  }

  async discoverIdentities(token?: CancellationToken): Promise<IdentityChoice[]> {
    const run = await this.exec('az', ['account', 'list', '--output', 'json'], { timeoutMs: this.timeouts.identityMs, token });
    const subscriptions = run.exitCode === 0 ? parseJson(run.stdout) : undefined;
    if (!Array.isArray(subscriptions)) {
      return [];
    }
    const choices: IdentityChoice[] = [];
    for (const subscription of subscriptions) {
      const id = stringField(subscription, 'id');
      if (id) {
        choices.push({
          id,
          label: `${stringField(subscription, 'name') ?? id} (${id})`,
          isDefault: field(subscription, 'isDefault') === true,
        });
      }
    }
    return choices;
  }

  async verifyIdentity(target: CloudTarget, token?: CancellationToken): Promise<Result<VerifiedIdentity, PreconditionError | InterruptError>> {
    if (target.provider !== 'azure') {
      return err(new PreconditionError(`Not an Azure target: ${target.provider}`));
    }
    const hint = 'Run "az login" and check that the subscription is visible in "az account list".';
    const select = await this.identityCall(
      'az',
      ['account', 'set', '--subscription', target.subscriptionId],
      target,
      `Selecting subscription ${target.subscriptionId} failed`,
      hint,
      token
    );
    if (!select.ok) {
      return select;
    }
    const show = await this.identityCall('az', ['account', 'show', '--output', 'json'], target, 'Azure authentication failed', hint, token);
    if (!show.ok) {
      return show;
    }
    const account = parseJson(show.value.stdout);
    return ok({
      account: stringField(account, 'name') ?? target.subscriptionId,
      detail: stringField(field(account, 'user'), 'name') ?? 'unknown user',
    });
  }

  async configureClusterAccess(context: DeploymentContext): Promise<Result<void, OrchestrationError>> {
    const { record } = context;
    if (record.target.provider !== 'azure') {
      return err(new PreconditionError('Azure provider used with a non-Azure record'));
    }
    const result = await this.execChecked(
      'az',
      [
        'aks',
        'get-credentials',
        '--resource-group',
        record.target.resourceGroup,
        '--name',
        record.clusterName,
        '--subscription',
        record.target.subscriptionId,
        '--overwrite-existing',
      ],
      `Configuring kubectl for AKS cluster ${record.clusterName} failed`,
      { target: record.target, token: context.token }
    );
    return result.ok ? ok(undefined) : result;
  }

  private vaultName(context: DeploymentContext): Result<string, OrchestrationError> {
    const vault = context.outputs.key_vault_name;
    return vault ? ok(vault) : err(missingOutput('key_vault_name', 'terraform output -json'));
  }

  async writeSecret(context: DeploymentContext, name: string, value: string, description: string): Promise<Result<void, OrchestrationError>> {
    const vault = this.vaultName(context);
    if (!vault.ok) {
      return vault;
    }
    // `secret set` creates a new version when the name already exists
    const result = await this.execChecked(
      'az',
      [
        'keyvault',
        'secret',
        'set',
        '--vault-name',
        vault.value,
        '--name',
        name,
        '--file',
        '/dev/stdin',
        '--encoding',
        'utf-8',
        '--description',
        description,
        '--tags',
        `${SECRET_TAG.key}=${SECRET_TAG.value}`,
        '--output',
        'none',
      ],
      `Storing ${name} in Key Vault ${vault.value} failed`,
      { target: context.record.target, input: value, token: context.token }
    );
    return result.ok ? ok(undefined) : result;
  }

  async listSecrets(context: DeploymentContext): Promise<Result<SecretEntry[], OrchestrationError>> {
    // No vault output once the infra is destroyed
    const vault = context.outputs.key_vault_name;
    if (!vault) {
      return ok([]);
    }
    const run = await this.exec(
      'az',
      ['keyvault', 'secret', 'list', '--vault-name', vault, '--query', `[?tags.${SECRET_TAG.key}=='${SECRET_TAG.value}']`, '--output', 'json'],
      { target: context.record.target, token: context.token }
    );
    // The vault goes away with the infra; nothing left to list
    if (isAlreadyAbsent(run)) {
      return ok([]);
    }
    if (run.cancelled) {
      return err(new InterruptError());
    }
    const items = parseJson(run.stdout);
    if (run.exitCode !== 0 || !Array.isArray(items)) {
      return ok([]);
    }
    const entries: SecretEntry[] = [];
    for (const item of items) {
      const name = stringField(item, 'name');
      if (name) {
        entries.push({ name, description: stringField(item, 'contentType') });
      }
    }
    return ok(ownSecrets(context, entries));
  }

  /**
   * Everything left in the deployment's resource group; a deleted group lists nothing
   */
  async listLeftoverResources(context: DeploymentContext): Promise<Result<string[], OrchestrationError>> {
    const { target } = context.record;
    if (target.provider !== 'azure') {
      return err(new PreconditionError('Azure provider used with a non-Azure record'));
    }
    const run = await this.exec('az', ['resource', 'list', '--resource-group', target.resourceGroup, '--query', '[].id', '--output', 'json'], {
      target,
      token: context.token,
    });
    if (run.cancelled) {
      return err(new InterruptError());
    }
    if (isAlreadyAbsent(run)) {
      return ok([]);
    }
    const checked = expectSuccess(run, 'Listing resource group contents failed');
    if (!checked.ok) {
      return checked;
    }
    const ids = parseJson(run.stdout);
    return ok(Array.isArray(ids) ? ids.filter((id): id is string => typeof id === 'string') : []);
  }

  async deleteSecret(context: DeploymentContext, name: string): Promise<Result<'deleted' | 'absent', OrchestrationError>> {
    const vault = this.vaultName(context);
    if (!vault.ok) {
      return vault;
    }
    return this.execDelete('az', ['keyvault', 'secret', 'delete', '--vault-name', vault.value, '--name', name], `Deleting ${name} from Key Vault failed`, context);
  }

  /**
   * Azure protects databases with management locks on the resource group
   */
  async disableDatabaseProtection(context: DeploymentContext): Promise<Result<'cleared' | 'none', OrchestrationError>> {
    const target = context.record.target;
    if (target.provider !== 'azure') {
      return err(new PreconditionError('Azure provider used with a non-Azure record'));
    }
    const listed = await this.exec('az', ['lock', 'list', '--resource-group', target.resourceGroup, '--output', 'json'], {
      target,
      token: context.token,
    });
    if (isAlreadyAbsent(listed)) {
      return ok('none' as const);
    }
    if (listed.cancelled) {
      return err(new InterruptError());
    }
    const locks = parseJson(listed.stdout);
    const lockIds = Array.isArray(locks) ? locks.map((lock) => stringField(lock, 'id')).filter((id): id is string => Boolean(id)) : [];
    if (lockIds.length === 0) {
      return ok('none' as const);
    }

    for (const id of lockIds) {
      const removed = await this.execDelete('az', ['lock', 'delete', '--ids', id], `Removing lock ${id} failed`, context);
      if (!removed.ok) {
        return removed;
      }
    }
    return ok('cleared' as const);
  }
}
