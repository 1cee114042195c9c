/**
 * Phase 4: TLS and basic auth, applied as an upgrade of the running release
 *
 * Automatic TLS asks the user to confirm DNS before cert-manager is touched,
 * so the ACME HTTP-01 challenge never races DNS propagation. A declined
 * gate ends the run incomplete; the deployment from phases 1-3 stays up.
 *
 * The upgrade reuses the release's values, so it always states both TLS and
 * basic auth in full. Under --update-tls the phase runs even when both are
 * off, which is how a previous TLS or auth setup gets switched off.
 */

import { readFileSync } from 'fs';
import { validateCertificatePair } from '../../certificates/pem-validator.js';
import { generatePassword, hashPasswordApr1, htpasswdLine } from '../../lib/credentials.js';
import { PreconditionError, err, ok, type OrchestrationError, type Result } from '../../lib/errors.js';
import { pollUntil } from '../../lib/polling.js';
import { printCredentials, startSpinner } from '../../lib/ui.js';
import { field, stringField } from '../../providers/base.js';
import type { DeploymentSession } from '../../session/session.js';
import type { ConfigurationRecord } from '../../types.js';
import { INGRESS_CLASS, SECRET_NAMES, basicAuthHelmOptions, tlsHelmOptions, toSetArgs, type HelmOptions } from '../helm-values.js';
import { clusterIssuer, clusterIssuerName, opaqueSecret, tlsSecret } from '../manifests.js';
import {
  createToolbox,
  deploymentContext,
  ensureClusterAccess,
  fatal,
  recoverable,
  succeeded,
  type Phase,
  type PhaseEnvironment,
  type PhaseOutcome,
  type Precondition,
  type Toolbox,
} from '../phase-executor.js';

export const CERT_MANAGER = {
  repoName: 'jetstack',
  repoUrl: 'https://charts.jetstack.io',
  chart: 'jetstack/cert-manager',
  release: 'cert-manager',
  namespace: 'cert-manager',
} as const;

export const DEFAULT_BASIC_AUTH_USER = 'admin';

/**
 * Secret-store entry holding the generated basic-auth credentials
 */
export function basicAuthSecretName(record: ConfigurationRecord): string {
  return `${record.clusterName}-n8n-basic-auth`;
}

/**
 * True once cert-manager reports the certificate's Ready condition
 */
export function certificateReady(certificate: unknown): boolean {
  const conditions = field(field(certificate, 'status'), 'conditions');
  if (!Array.isArray(conditions)) {
    return false;
  }
  return conditions.some((condition) => stringField(condition, 'type') === 'Ready' && stringField(condition, 'status') === 'True');
}

export class TlsAuthPhase implements Phase {
  readonly name = 'tls-auth' as const;
  readonly title = 'TLS & Authentication';

  constructor(private readonly env: PhaseEnvironment) {}

  precondition(session: DeploymentSession): Precondition {
    const { record } = session;
    if (session.mode !== 'update-tls' && record.tls.mode === 'disabled' && !record.basicAuth.enabled) {
      return { status: 'skip', reason: 'Neither TLS nor basic auth was requested' };
    }
    return { status: 'ready' };
  }

  async run(session: DeploymentSession): Promise<PhaseOutcome> {
    const { record, token } = session;
    const tools = createToolbox(this.env, session);

    const access = await ensureClusterAccess(this.env, session);
    if (!access.ok) {
      return fatal(access.error);
    }

    let options: HelmOptions = tlsHelmOptions(record);

    if (record.tls.mode === 'automatic') {
      const confirmed = await this.confirmDns(session, record.tls.domain);
      if (!confirmed.ok) {
        return confirmed.error.kind === 'interrupt' ? fatal(confirmed.error) : recoverable(confirmed.error);
      }
      const issuer = await this.installCertManager(tools, session, record.tls.email, record.tls.environment);
      if (!issuer.ok) {
        return fatal(issuer.error);
      }
      options = tlsHelmOptions(record, issuer.value);
    } else if (record.tls.mode === 'user-supplied') {
      const applied = await this.applyCertificate(tools, session, record.tls);
      if (!applied.ok) {
        return fatal(applied.error);
      }
    }

    let credentials: { username: string; password: string } | null = null;
    if (record.basicAuth.enabled) {
      const created = await this.createBasicAuth(tools, session, record.basicAuth.username);
      if (!created.ok) {
        return fatal(created.error);
      }
      credentials = created.value;
    } else if (session.mode === 'update-tls') {
      const removed = await tools.kubectl.delete(['secret', SECRET_NAMES.basicAuth, '-n', record.namespace], token);
      if (!removed.ok) {
        return fatal(removed.error);
      }
    }
    options = { ...options, ...basicAuthHelmOptions(record.basicAuth.enabled) };

    const upgrade = await tools.helm.upgradeInstall(
      {
        release: this.env.settings.releaseName,
        chart: this.env.settings.paths.chartDir,
        namespace: record.namespace,
        reuseValues: true,
        setArgs: toSetArgs(options),
      },
      token
    );
    if (!upgrade.ok) {
      return fatal(upgrade.error);
    }
    this.env.logger.info('Release upgraded', { tls: record.tls.mode, basicAuth: record.basicAuth.enabled });

    if (record.tls.mode === 'automatic') {
      const issued = await this.waitForCertificate(tools, session);
      if (!issued.ok) {
        return fatal(issued.error);
      }
    }

    if (credentials) {
      printCredentials('n8n basic auth', [
        ['Username', credentials.username],
        ['Password', credentials.password],
      ]);
    }
    return succeeded();
  }

  private async confirmDns(session: DeploymentSession, domain: string): Promise<Result<void, OrchestrationError>> {
    const target = session.endpoint ?? 'the load balancer address';
    this.env.prompter.note(`Let's Encrypt validates ${domain} over HTTP, so DNS must already resolve to ${target}.`);
    const answer = await this.env.prompter.confirm(`Does DNS for ${domain} point at ${target} now?`, false);
    if (answer === undefined) {
      const check = session.token.check();
      return check.ok ? err(new PreconditionError('DNS confirmation was cancelled')) : check;
    }
    if (!answer) {
      return err(
        new PreconditionError(
          `DNS for ${domain} was not confirmed; certificate setup was not started`,
          'Create the DNS record, wait for it to resolve, then run "launchpad --update-tls".'
        )
      );
    }
    return ok(undefined);
  }

  private async installCertManager(
    tools: Toolbox,
    session: DeploymentSession,
    email: string,
    environment: 'production' | 'staging'
  ): Promise<Result<string, OrchestrationError>> {
    const { token } = session;
    const repo = await tools.helm.addRepo(CERT_MANAGER.repoName, CERT_MANAGER.repoUrl, token);
    if (!repo.ok) {
      return repo;
    }
    const installed = await tools.helm.upgradeInstall(
      {
        release: CERT_MANAGER.release,
        chart: CERT_MANAGER.chart,
        namespace: CERT_MANAGER.namespace,
        setArgs: ['--set', 'crds.enabled=true'],
        wait: true,
      },
      token
    );
    if (!installed.ok) {
      return installed;
    }
    const applied = await tools.kubectl.apply(clusterIssuer(environment, email, INGRESS_CLASS), token);
    if (!applied.ok) {
      return applied;
    }
    return ok(clusterIssuerName(environment));
  }

  private async applyCertificate(
    tools: Toolbox,
    session: DeploymentSession,
    tls: { domain: string; certificatePath: string; privateKeyPath: string }
  ): Promise<Result<void, OrchestrationError>> {
    // The files may have changed since they were collected
    const valid = validateCertificatePair(tls.certificatePath, tls.privateKeyPath, { domain: tls.domain });
    if (!valid.ok) {
      return valid;
    }
    if (valid.value.matchesDomain === false) {
      this.env.prompter.warn(`The certificate does not list ${tls.domain}; browsers will reject it`);
    }
    const manifest = tlsSecret(
      SECRET_NAMES.tls,
      session.record.namespace,
      readFileSync(tls.certificatePath, 'utf-8'),
      readFileSync(tls.privateKeyPath, 'utf-8')
    );
    return tools.kubectl.apply(manifest, session.token);
  }

  private async createBasicAuth(
    tools: Toolbox,
    session: DeploymentSession,
    username: string
  ): Promise<Result<{ username: string; password: string }, OrchestrationError>> {
    const { record, token } = session;
    const password = generatePassword();
    const hash = await hashPasswordApr1(this.env.runner, password, { timeoutMs: this.env.settings.timeouts.queryMs, token });
    if (!hash.ok) {
      return hash;
    }

    const applied = await tools.kubectl.apply(opaqueSecret(SECRET_NAMES.basicAuth, record.namespace, { auth: htpasswdLine(username, hash.value) }), token);
    if (!applied.ok) {
      return applied;
    }

    const stored = await this.env.provider.writeSecret(
      deploymentContext(session),
      basicAuthSecretName(record),
      JSON.stringify({ username, password }),
      'n8n basic auth credentials'
    );
    if (!stored.ok) {
      return stored;
    }
    this.env.logger.info('Basic auth configured', { username, secretName: basicAuthSecretName(record) });
    return ok({ username, password });
  }

  /**
   * Bounded and non-fatal: issuance can outlast the run
   */
  private async waitForCertificate(tools: Toolbox, session: DeploymentSession): Promise<Result<void, OrchestrationError>> {
    const { record, token } = session;
    const { settings, logger } = this.env;
    const spinner = startSpinner('Waiting for the certificate to be issued...');
    const issued = await pollUntil(
      async () => {
        const certificate = await tools.kubectl.getJson(['certificate', SECRET_NAMES.tls, '-n', record.namespace], token);
        return certificate.ok && certificateReady(certificate.value) ? true : undefined;
      },
      {
        description: 'the TLS certificate',
        intervalMs: settings.timeouts.pollIntervalMs,
        timeoutMs: settings.timeouts.certificateMs,
        token,
        wait: this.env.wait,
      }
    );
    if (issued.ok) {
      spinner.succeed('Certificate issued');
      return ok(undefined);
    }
    if (issued.error.kind === 'interrupt') {
      spinner.fail('Interrupted');
      return issued;
    }
    spinner.warn('Certificate not ready yet');
    logger.warn('Certificate is still pending', { command: `kubectl describe certificate ${SECRET_NAMES.tls} -n ${record.namespace}` });
    return ok(undefined);
  }
}
