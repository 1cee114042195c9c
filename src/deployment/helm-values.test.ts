import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { parse } from 'yaml';
import {
  SECRET_NAMES,
  baseHelmOptions,
  basicAuthHelmOptions,
  renderValuesOverride,
  tlsHelmOptions,
  toSetArgs,
  toValuesTree,
} from './helm-values.js';
import { clusterIssuer, opaqueSecret, renderManifest } from './manifests.js';
import { TEST_ENCRYPTION_KEY, createTestRecord } from '../test-utils.js';

describe('helm values', () => {
  it('keeps strings as strings on upgrade', () => {
    assert.deepEqual(toSetArgs({ ingressHost: 'true', persistenceEnabled: false }), [
      '--set-string',
      'ingress.host=true',
      '--set',
      'persistence.enabled=false',
    ]);
  });

  it('escapes dots in keys and commas in values', () => {
    assert.deepEqual(toSetArgs({ clusterIssuer: 'letsencrypt-staging', authRealm: 'a,b' }), [
      '--set-string',
      'ingress.annotations.cert-manager\\.io/cluster-issuer=letsencrypt-staging',
      '--set-string',
      'ingress.annotations.nginx\\.ingress\\.kubernetes\\.io/auth-realm=a\\,b',
    ]);
  });

  it('builds a nested values tree', () => {
    assert.deepEqual(toValuesTree({ tlsEnabled: true, tlsSecretName: 'n8n-tls', ingressHost: 'n8n.example.test' }), {
      ingress: { tls: { enabled: true, secretName: 'n8n-tls' }, host: 'n8n.example.test' },
    });
  });

  it('starts over HTTP with the hostname and persistence', () => {
    const options = baseHelmOptions(createTestRecord());
    assert.equal(options.protocol, 'http');
    assert.equal(options.webhookUrl, 'http://n8n.example.test/');
    assert.equal(options.databaseType, 'sqlite');
    assert.equal(options.databaseSecret, undefined);
    assert.equal(options.tlsEnabled, false);
  });

  it('omits the host without a hostname and points managed databases at the secret', () => {
    const options = baseHelmOptions(
      createTestRecord({ hostname: '', database: { kind: 'managed', instanceClass: 'db.t3.micro', storageGb: 20, highAvailability: false } })
    );
    assert.equal(options.ingressHost, undefined);
    assert.equal(options.databaseType, 'postgresdb');
    assert.equal(options.databaseSecret, SECRET_NAMES.database);
  });

  it('switches to HTTPS with the issuer for automatic TLS', () => {
    const record = createTestRecord({
      tls: { mode: 'automatic', domain: 'n8n.example.test', email: 'ops@example.test', environment: 'production' },
    });
    assert.deepEqual(tlsHelmOptions(record, 'letsencrypt-production'), {
      protocol: 'https',
      webhookUrl: 'https://n8n.example.test/',
      ingressHost: 'n8n.example.test',
      tlsEnabled: true,
      tlsSecretName: 'n8n-tls',
      clusterIssuer: 'letsencrypt-production',
    });
  });

  it('switches TLS off explicitly and drops the issuer for a user-supplied certificate', () => {
    assert.deepEqual(tlsHelmOptions(createTestRecord()), {
      protocol: 'http',
      webhookUrl: 'http://n8n.example.test/',
      tlsEnabled: false,
      tlsSecretName: null,
      clusterIssuer: null,
    });
    const byo = createTestRecord({
      tls: { mode: 'user-supplied', domain: 'n8n.example.test', certificatePath: '/certs/n8n.crt', privateKeyPath: '/certs/n8n.key' },
    });
    assert.equal(tlsHelmOptions(byo).clusterIssuer, null);
    assert.equal(tlsHelmOptions(byo).tlsEnabled, true);
  });

  it('points basic auth at the htpasswd secret', () => {
    assert.equal(basicAuthHelmOptions().authSecret, 'n8n-basic-auth');
  });

  it('removes cleared keys on upgrade and leaves them out of the values file', () => {
    assert.deepEqual(toSetArgs(basicAuthHelmOptions(false)), [
      '--set',
      'ingress.annotations.nginx\\.ingress\\.kubernetes\\.io/auth-type=null',
      '--set',
      'ingress.annotations.nginx\\.ingress\\.kubernetes\\.io/auth-secret=null',
      '--set',
      'ingress.annotations.nginx\\.ingress\\.kubernetes\\.io/auth-realm=null',
    ]);
    assert.deepEqual(toValuesTree({ tlsEnabled: false, tlsSecretName: null }), { ingress: { tls: { enabled: false } } });
  });

  it('renders a values override without the encryption key', () => {
    const output = renderValuesOverride(createTestRecord());
    assert.equal(output.includes(TEST_ENCRYPTION_KEY), false);
    const values: unknown = parse(output);
    assert.deepEqual(values, {
      n8n: {
        timezone: 'America/Bahia',
        encryptionKeySecret: 'n8n-encryption-key',
        protocol: 'http',
        webhookUrl: 'http://n8n.example.test/',
      },
      persistence: { enabled: true, size: '10Gi' },
      database: { type: 'sqlite' },
      ingress: { enabled: true, className: 'nginx', tls: { enabled: false }, host: 'n8n.example.test' },
    });
  });
});

describe('manifests', () => {
  it('carries secret values as stringData', () => {
    const secret = opaqueSecret('n8n-encryption-key', 'n8n', { N8N_ENCRYPTION_KEY: 'test-secret' });
    assert.equal(secret.kind, 'Secret');
    assert.equal(secret.metadata.namespace, 'n8n');
    assert.deepEqual(secret.stringData, { N8N_ENCRYPTION_KEY: 'test-secret' });
    assert.deepEqual(secret.metadata.labels, { 'app.kubernetes.io/managed-by': 'launchpad' });
    const rendered: unknown = parse(renderManifest(secret));
    assert.deepEqual(rendered, secret);
  });

  it('builds an HTTP-01 cluster issuer', () => {
    const issuer = clusterIssuer('staging', 'ops@example.test', 'nginx');
    assert.equal(issuer.metadata.name, 'letsencrypt-staging');
    assert.deepEqual(issuer.spec, {
      acme: {
        server: 'https://acme-staging-v02.api.letsencrypt.org/directory',
        email: 'ops@example.test',
        privateKeySecretRef: { name: 'letsencrypt-staging-account-key' },
        solvers: [{ http01: { ingress: { ingressClassName: 'nginx' } } }],
      },
    });
  });
});
