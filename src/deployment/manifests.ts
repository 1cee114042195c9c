/**
 * Kubernetes manifests applied through `kubectl apply -f -`.
 * Secret material only ever travels in these documents, on stdin.
 */

import { stringify } from 'yaml';

export interface Manifest {
  apiVersion: string;
  kind: string;
  metadata: { name: string; namespace?: string; labels?: Record<string, string> };
  [field: string]: unknown;
}

export const MANAGED_BY_LABEL = { 'app.kubernetes.io/managed-by': 'launchpad' } as const;

export const ACME_SERVERS = {
  production: 'https://acme-v02.api.letsencrypt.org/directory',
  staging: 'https://acme-staging-v02.api.letsencrypt.org/directory',
} as const;

export function namespaceManifest(name: string): Manifest {
  return { apiVersion: 'v1', kind: 'Namespace', metadata: { name, labels: { ...MANAGED_BY_LABEL } } };
}

export function opaqueSecret(name: string, namespace: string, stringData: Record<string, string>): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    type: 'Opaque',
    metadata: { name, namespace, labels: { ...MANAGED_BY_LABEL } },
    stringData,
  };
}

export function tlsSecret(name: string, namespace: string, certificatePem: string, privateKeyPem: string): Manifest {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    type: 'kubernetes.io/tls',
    metadata: { name, namespace, labels: { ...MANAGED_BY_LABEL } },
    stringData: { 'tls.crt': certificatePem, 'tls.key': privateKeyPem },
  };
}

export function clusterIssuerName(environment: keyof typeof ACME_SERVERS): string {
  return `letsencrypt-${environment}`;
}

/**
 * ACME issuer answering HTTP-01 challenges through the nginx ingress class
 */
export function clusterIssuer(environment: keyof typeof ACME_SERVERS, email: string, ingressClass: string): Manifest {
  const name = clusterIssuerName(environment);
  return {
    apiVersion: 'cert-manager.io/v1',
    kind: 'ClusterIssuer',
    metadata: { name, labels: { ...MANAGED_BY_LABEL } },
    spec: {
      acme: {
        server: ACME_SERVERS[environment],
        email,
        privateKeySecretRef: { name: `${name}-account-key` },
        solvers: [{ http01: { ingress: { ingressClassName: ingressClass } } }],
      },
    },
  };
}

export function renderManifest(manifest: Manifest): string {
  return stringify(manifest);
}
