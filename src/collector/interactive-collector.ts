/**
 * Interactive Collector
 *
 * Asks for every deployment parameter in a fixed order, validates each answer
 * as it is given and repeats the question until it passes. Nothing is written
 * to disk here: a cancelled prompt returns an `InterruptError` result and the
 * caller exits without side effects.
 */

import { validateCertificatePair } from '../certificates/pem-validator.js';
import { consistencyErrors, identityOf, regionOf, summarizeRecord } from '../config/record.js';
import { generateEncryptionKey } from '../lib/credentials.js';
import { InterruptError, err, ok, type Result } from '../lib/errors.js';
import type { Choice, Prompter, TextQuestion } from '../lib/prompt.js';
import { AzureProvider } from '../providers/azure.js';
import type { CloudProvider, IdentityChoice } from '../providers/types.js';
import type { BasicAuthConfig, CloudTarget, ClusterSizing, ConfigurationRecord, DatabaseConfig, TlsConfig } from '../types.js';
import { DEFAULT_BASIC_AUTH_USER } from '../deployment/phases/tls-auth.js';
import {
  parseCount,
  validateAzureResourceGroup,
  validateClusterName,
  validateEmail,
  validateEncryptionKey,
  validateGcpProjectId,
  validateGcpZone,
  validateHostname,
  validateKubernetesVersion,
  validateNamespace,
  validateStorageSize,
  validateTimezone,
  validateUsername,
} from './validators.js';

export const MAX_NODE_COUNT = 20;
export const DEFAULT_TIMEZONE = 'UTC';
export const DEFAULT_NAMESPACE = 'n8n';
export const DEFAULT_STORAGE_SIZE = '10Gi';

export interface CollectorInputs {
  provider: CloudProvider;
  /** Profiles, subscriptions or projects the cloud CLI reported */
  identities: IdentityChoice[];
  /** Record of the previous run, offered as defaults */
  previous: ConfigurationRecord | null;
}

export type CollectOutcome = { status: 'confirmed'; record: ConfigurationRecord } | { status: 'aborted' };

type Step<T> = Promise<Result<T, InterruptError>>;

function required(label: string): (value: string) => string | undefined {
  return (value) => (value.length === 0 ? `${label} is required` : undefined);
}

const IDENTITY_LABELS = {
  aws: 'AWS profile',
  azure: 'Azure subscription',
  gcp: 'GCP project',
} as const;

export class InteractiveCollector {
  constructor(
    private readonly prompter: Prompter,
    private readonly options: { now?: Date } = {}
  ) {}

  /**
   * Re-ask until the answer passes `validate`
   */
  private async ask(question: TextQuestion, validate: (value: string) => string | undefined): Step<string> {
    for (;;) {
      const answer = await this.prompter.text(question);
      if (answer === undefined) {
        return err(new InterruptError());
      }
      const problem = validate(answer);
      if (problem === undefined) {
        return ok(answer);
      }
      this.prompter.warn(problem);
    }
  }

  private async askCount(message: string, initial: number, min: number, max: number): Step<number> {
    for (;;) {
      const answer = await this.prompter.text({ message, initial: String(initial) });
      if (answer === undefined) {
        return err(new InterruptError());
      }
      const parsed = parseCount(answer, min, max);
      if (typeof parsed === 'number') {
        return ok(parsed);
      }
      this.prompter.warn(parsed);
    }
  }

  private async choose<T>(message: string, choices: Choice<T>[], initial: number = 0): Step<T> {
    const answer = await this.prompter.select(message, choices, Math.max(0, initial));
    return answer === undefined ? err(new InterruptError()) : ok(answer);
  }

  private async yesNo(message: string, initial: boolean): Step<boolean> {
    const answer = await this.prompter.confirm(message, initial);
    return answer === undefined ? err(new InterruptError()) : ok(answer);
  }

  async collect(inputs: CollectorInputs): Step<CollectOutcome> {
    const { provider } = inputs;
    const previous = inputs.previous?.target.provider === provider.name ? inputs.previous : null;

    const target = await this.collectTarget(inputs, previous);
    if (!target.ok) {
      return target;
    }
    const cluster = await this.collectCluster(provider, previous);
    if (!cluster.ok) {
      return cluster;
    }

    const namespace = await this.ask(
      { message: 'Kubernetes namespace', initial: previous?.namespace ?? DEFAULT_NAMESPACE },
      validateNamespace
    );
    if (!namespace.ok) {
      return namespace;
    }
    const storageSize = await this.ask(
      { message: 'Persistent storage size', initial: previous?.storageSize ?? DEFAULT_STORAGE_SIZE },
      validateStorageSize
    );
    if (!storageSize.ok) {
      return storageSize;
    }
    const timezone = await this.ask({ message: 'Timezone', initial: previous?.timezone ?? DEFAULT_TIMEZONE }, validateTimezone);
    if (!timezone.ok) {
      return timezone;
    }

    const database = await this.collectDatabase(provider, previous);
    if (!database.ok) {
      return database;
    }
    const access = await this.collectAccess(previous);
    if (!access.ok) {
      return access;
    }
    const encryptionKey = await this.collectEncryptionKey(previous);
    if (!encryptionKey.ok) {
      return encryptionKey;
    }

    const record: ConfigurationRecord = {
      target: target.value,
      ...cluster.value,
      namespace: namespace.value,
      storageSize: storageSize.value,
      hostname: access.value.hostname,
      timezone: timezone.value,
      encryptionKey: encryptionKey.value,
      database: database.value,
      tls: access.value.tls,
      basicAuth: access.value.basicAuth,
    };
    return this.confirmRecord(record);
  }

  /**
   * Only the TLS and basic-auth questions, on top of the deployed record
   */
  async collectTlsUpdate(current: ConfigurationRecord): Step<CollectOutcome> {
    const access = await this.collectAccess(current);
    if (!access.ok) {
      return access;
    }
    return this.confirmRecord({ ...current, ...access.value });
  }

  private async confirmRecord(record: ConfigurationRecord): Step<CollectOutcome> {
    const problems = consistencyErrors(record);
    for (const problem of problems) {
      this.prompter.warn(problem);
    }
    if (problems.length > 0) {
      return ok({ status: 'aborted' as const });
    }

    this.prompter.note('\nConfiguration summary:');
    for (const line of summarizeRecord(record)) {
      this.prompter.note(`  ${line}`);
    }
    const proceed = await this.yesNo('Proceed with this configuration?', true);
    if (!proceed.ok) {
      return proceed;
    }
    return ok(proceed.value ? { status: 'confirmed' as const, record } : { status: 'aborted' as const });
  }

  private async collectIdentity(inputs: CollectorInputs, previous: ConfigurationRecord | null): Step<string> {
    const { provider, identities } = inputs;
    const label = IDENTITY_LABELS[provider.name];
    const validate = provider.name === 'gcp' ? validateGcpProjectId : required(label);
    const remembered = previous ? identityOf(previous.target) : undefined;

    if (identities.length > 0) {
      const choices: Choice<string | null>[] = identities.map((identity) => ({ title: identity.label, value: identity.id }));
      choices.push({ title: `Enter another ${label}`, value: null });
      const initial = identities.findIndex((identity) => (remembered ? identity.id === remembered : identity.isDefault));
      const picked = await this.choose(label, choices, initial);
      if (!picked.ok || picked.value !== null) {
        return picked.ok ? ok(picked.value ?? '') : picked;
      }
    } else {
      this.prompter.note(`No ${label}s were found; enter one by hand.`);
    }
    return this.ask({ message: label, initial: remembered }, validate);
  }

  private async collectRegion(inputs: CollectorInputs, previous: ConfigurationRecord | null): Step<string> {
    const regions = inputs.provider.regions();
    const remembered = previous ? regionOf(previous.target) : inputs.provider.defaults.region;
    const message = inputs.provider.name === 'azure' ? 'Location' : 'Region';
    return this.choose(
      message,
      regions.map((region) => ({ title: region, value: region })),
      regions.indexOf(remembered)
    );
  }

  private async collectTarget(inputs: CollectorInputs, previous: ConfigurationRecord | null): Step<CloudTarget> {
    const identity = await this.collectIdentity(inputs, previous);
    if (!identity.ok) {
      return identity;
    }
    const region = await this.collectRegion(inputs, previous);
    if (!region.ok) {
      return region;
    }

    const prior = previous?.target;
    switch (inputs.provider.name) {
      case 'aws': {
        const target: CloudTarget = { provider: 'aws', profile: identity.value, region: region.value };
        return ok(target);
      }
      case 'azure': {
        const remembered = prior?.provider === 'azure' ? prior.resourceGroup : AzureProvider.DEFAULT_RESOURCE_GROUP;
        const group = await this.ask({ message: 'Resource group', initial: remembered }, validateAzureResourceGroup);
        if (!group.ok) {
          return group;
        }
        const target: CloudTarget = { provider: 'azure', subscriptionId: identity.value, location: region.value, resourceGroup: group.value };
        return ok(target);
      }
      case 'gcp': {
        const remembered = prior?.provider === 'gcp' && prior.region === region.value ? prior.zone : `${region.value}-a`;
        const zone = await this.ask({ message: 'Zone', initial: remembered }, (value) => validateGcpZone(value, region.value));
        if (!zone.ok) {
          return zone;
        }
        const target: CloudTarget = { provider: 'gcp', projectId: identity.value, region: region.value, zone: zone.value };
        return ok(target);
      }
    }
  }

  private async collectCluster(
    provider: CloudProvider,
    previous: ConfigurationRecord | null
  ): Step<{ clusterName: string; kubernetesVersion: string; sizing: ClusterSizing }> {
    const defaults = provider.defaults;
    const clusterName = await this.ask(
      { message: 'Cluster name', initial: previous?.clusterName ?? defaults.clusterName },
      validateClusterName
    );
    if (!clusterName.ok) {
      return clusterName;
    }
    const kubernetesVersion = await this.ask(
      { message: 'Kubernetes version', initial: previous?.kubernetesVersion ?? defaults.kubernetesVersion },
      validateKubernetesVersion
    );
    if (!kubernetesVersion.ok) {
      return kubernetesVersion;
    }

    const sizingDefaults = previous?.sizing ?? defaults.sizing;
    const nodeType = await this.ask({ message: 'Node type', initial: sizingDefaults.nodeType }, required('Node type'));
    if (!nodeType.ok) {
      return nodeType;
    }
    const minCount = await this.askCount('Minimum nodes', sizingDefaults.minCount, 1, MAX_NODE_COUNT);
    if (!minCount.ok) {
      return minCount;
    }
    const desiredCount = await this.askCount(
      'Desired nodes',
      Math.max(sizingDefaults.desiredCount, minCount.value),
      minCount.value,
      MAX_NODE_COUNT
    );
    if (!desiredCount.ok) {
      return desiredCount;
    }
    const maxCount = await this.askCount(
      'Maximum nodes',
      Math.max(sizingDefaults.maxCount, desiredCount.value),
      desiredCount.value,
      MAX_NODE_COUNT
    );
    if (!maxCount.ok) {
      return maxCount;
    }

    return ok({
      clusterName: clusterName.value,
      kubernetesVersion: kubernetesVersion.value,
      sizing: { nodeType: nodeType.value, minCount: minCount.value, desiredCount: desiredCount.value, maxCount: maxCount.value },
    });
  }

  private async collectDatabase(provider: CloudProvider, previous: ConfigurationRecord | null): Step<DatabaseConfig> {
    const choices: Choice<DatabaseConfig['kind']>[] = [
      { title: 'SQLite on a persistent volume', value: 'sqlite' },
      { title: 'Managed PostgreSQL', value: 'managed' },
    ];
    const kind = await this.choose('Database', choices, previous?.database.kind === 'managed' ? 1 : 0);
    if (!kind.ok) {
      return kind;
    }
    if (kind.value === 'sqlite') {
      const sqlite: DatabaseConfig = { kind: 'sqlite' };
      return ok(sqlite);
    }

    const priorDatabase = previous?.database;
    const prior = priorDatabase?.kind === 'managed' ? priorDatabase : null;
    const instanceClass = await this.ask(
      { message: 'Database instance class', initial: prior?.instanceClass ?? provider.defaults.databaseInstanceClass },
      required('Instance class')
    );
    if (!instanceClass.ok) {
      return instanceClass;
    }
    const storageGb = await this.askCount('Database storage (GB)', prior?.storageGb ?? provider.defaults.databaseStorageGb, 10, 16_384);
    if (!storageGb.ok) {
      return storageGb;
    }
    const highAvailability = await this.yesNo('Enable high availability?', prior?.highAvailability ?? false);
    if (!highAvailability.ok) {
      return highAvailability;
    }
    const managed: DatabaseConfig = {
      kind: 'managed',
      instanceClass: instanceClass.value,
      storageGb: storageGb.value,
      highAvailability: highAvailability.value,
    };
    return ok(managed);
  }

  private async collectCertificate(domain: string, previous: TlsConfig | null): Step<{ certificatePath: string; privateKeyPath: string }> {
    for (;;) {
      const certificatePath = await this.ask(
        { message: 'Certificate file (PEM)', initial: previous?.mode === 'user-supplied' ? previous.certificatePath : undefined },
        required('Certificate path')
      );
      if (!certificatePath.ok) {
        return certificatePath;
      }
      const privateKeyPath = await this.ask(
        { message: 'Private key file (PEM)', initial: previous?.mode === 'user-supplied' ? previous.privateKeyPath : undefined },
        required('Private key path')
      );
      if (!privateKeyPath.ok) {
        return privateKeyPath;
      }

      const checked = validateCertificatePair(certificatePath.value, privateKeyPath.value, { domain, now: this.options.now });
      if (checked.ok) {
        if (checked.value.matchesDomain === false) {
          this.prompter.warn(`The certificate does not list ${domain}; browsers will reject it`);
        }
        return ok({ certificatePath: certificatePath.value, privateKeyPath: privateKeyPath.value });
      }
      this.prompter.warn(checked.error.message);
    }
  }

  private async collectTls(hostname: string, mode: TlsConfig['mode'], previous: TlsConfig | null): Step<TlsConfig> {
    let tls: TlsConfig;
    switch (mode) {
      case 'disabled':
        tls = { mode: 'disabled' };
        return ok(tls);
      case 'user-supplied': {
        const files = await this.collectCertificate(hostname, previous);
        if (!files.ok) {
          return files;
        }
        tls = { mode: 'user-supplied', domain: hostname, ...files.value };
        return ok(tls);
      }
      case 'automatic': {
        const email = await this.ask(
          { message: "Email for Let's Encrypt notices", initial: previous?.mode === 'automatic' ? previous.email : undefined },
          validateEmail
        );
        if (!email.ok) {
          return email;
        }
        const environment = await this.choose<'production' | 'staging'>(
          "Let's Encrypt environment",
          [
            { title: 'Production', value: 'production' },
            { title: 'Staging (untrusted test certificates)', value: 'staging' },
          ],
          previous?.mode === 'automatic' && previous.environment === 'staging' ? 1 : 0
        );
        if (!environment.ok) {
          return environment;
        }
        tls = { mode: 'automatic', domain: hostname, email: email.value, environment: environment.value };
        return ok(tls);
      }
    }
  }

  /**
   * TLS mode, hostname and basic auth
   */
  private async collectAccess(
    previous: ConfigurationRecord | null
  ): Step<{ hostname: string; tls: TlsConfig; basicAuth: BasicAuthConfig }> {
    const modes: Choice<TlsConfig['mode']>[] = [
      { title: 'No TLS (HTTP only)', value: 'disabled' },
      { title: 'My own certificate', value: 'user-supplied' },
      { title: "Automatic with Let's Encrypt", value: 'automatic' },
    ];
    const mode = await this.choose(
      'TLS',
      modes,
      modes.findIndex((choice) => choice.value === previous?.tls.mode)
    );
    if (!mode.ok) {
      return mode;
    }

    const hostname =
      mode.value === 'disabled'
        ? await this.ask(
            { message: 'Hostname (leave empty to use the load balancer address)', initial: previous?.hostname ?? '' },
            (value) => (value === '' ? undefined : validateHostname(value))
          )
        : await this.ask({ message: 'Hostname', initial: previous?.hostname || undefined }, validateHostname);
    if (!hostname.ok) {
      return hostname;
    }

    const tls = await this.collectTls(hostname.value, mode.value, previous?.tls ?? null);
    if (!tls.ok) {
      return tls;
    }

    const enableAuth = await this.yesNo('Protect n8n with basic auth?', previous?.basicAuth.enabled ?? false);
    if (!enableAuth.ok) {
      return enableAuth;
    }
    let basicAuth: BasicAuthConfig = { enabled: false };
    if (enableAuth.value) {
      const priorAuth = previous?.basicAuth;
      const username = await this.ask(
        { message: 'Basic auth username', initial: priorAuth?.enabled ? priorAuth.username : DEFAULT_BASIC_AUTH_USER },
        validateUsername
      );
      if (!username.ok) {
        return username;
      }
      basicAuth = { enabled: true, username: username.value };
    }

    return ok({ hostname: hostname.value, tls: tls.value, basicAuth });
  }

  /**
   * A non-empty key must be valid; only an empty answer generates one
   */
  private async collectEncryptionKey(previous: ConfigurationRecord | null): Step<string> {
    if (previous) {
      const reuse = await this.yesNo('Reuse the encryption key from the previous run? (required to read existing credentials)', true);
      if (!reuse.ok) {
        return reuse;
      }
      if (reuse.value) {
        return ok(previous.encryptionKey);
      }
    }
    const key = await this.ask(
      { message: 'Encryption key (64 hex characters, leave empty to generate one)', initial: '', mask: true },
      validateEncryptionKey
    );
    if (!key.ok) {
      return key;
    }
    if (key.value !== '') {
      return ok(key.value);
    }
    this.prompter.note('Generated a new encryption key. It is stored in the secret store, not in any file under version control.');
    return ok(generateEncryptionKey());
  }
}
