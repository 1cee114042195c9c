/**
 * Bring-your-own certificate validation
 *
 * A certificate/key pair is accepted only when both files are PEM, the key
 * belongs to the certificate, and the certificate is inside its validity
 * window. Checked when the user enters the paths and again right before the
 * TLS secret is created.
 */

import { X509Certificate, createPrivateKey, type KeyObject } from 'crypto';
import { existsSync, readFileSync } from 'fs';
import { ValidationError, err, ok, type Result } from '../lib/errors.js';

export interface CertificateInfo {
  subject: string;
  issuer: string;
  validFrom: Date;
  validTo: Date;
  /** Whether the certificate covers the requested domain (when one was given) */
  matchesDomain: boolean | null;
}

export interface CertificateCheckOptions {
  domain?: string;
  now?: Date;
}

const CERTIFICATE_MARKER = '-----BEGIN CERTIFICATE-----';
const PRIVATE_KEY_MARKER = /-----BEGIN (?:RSA |EC |ENCRYPTED )?PRIVATE KEY-----/;

function readPem(path: string, field: string, label: string): Result<string, ValidationError> {
  if (!existsSync(path)) {
    return err(new ValidationError(`${label} file not found: ${path}`, field));
  }
  try {
    return ok(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ValidationError(`${label} file could not be read: ${reason}`, field));
  }
}

export function parseCertificate(path: string): Result<X509Certificate, ValidationError> {
  const pem = readPem(path, 'certificatePath', 'Certificate');
  if (!pem.ok) {
    return pem;
  }
  if (!pem.value.includes(CERTIFICATE_MARKER)) {
    return err(new ValidationError(`${path} is not a PEM certificate`, 'certificatePath'));
  }
  try {
    return ok(new X509Certificate(pem.value));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ValidationError(`${path} could not be parsed as a certificate: ${reason}`, 'certificatePath'));
  }
}

export function parsePrivateKey(path: string): Result<KeyObject, ValidationError> {
  const pem = readPem(path, 'privateKeyPath', 'Private key');
  if (!pem.ok) {
    return pem;
  }
  if (!PRIVATE_KEY_MARKER.test(pem.value)) {
    return err(new ValidationError(`${path} is not a PEM private key`, 'privateKeyPath'));
  }
  try {
    return ok(createPrivateKey(pem.value));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ValidationError(`${path} could not be parsed as a private key: ${reason}`, 'privateKeyPath'));
  }
}

export function validateCertificatePair(
  certificatePath: string,
  privateKeyPath: string,
  options: CertificateCheckOptions = {}
): Result<CertificateInfo, ValidationError> {
  const certificate = parseCertificate(certificatePath);
  if (!certificate.ok) {
    return certificate;
  }
  const key = parsePrivateKey(privateKeyPath);
  if (!key.ok) {
    return key;
  }

  const cert = certificate.value;
  if (!cert.checkPrivateKey(key.value)) {
    return err(new ValidationError('The private key does not match the certificate', 'privateKeyPath'));
  }

  const now = options.now ?? new Date();
  const validFrom = new Date(cert.validFrom);
  const validTo = new Date(cert.validTo);
  if (validTo.getTime() < now.getTime()) {
    return err(new ValidationError(`The certificate expired on ${validTo.toISOString()}`, 'certificatePath'));
  }
  if (validFrom.getTime() > now.getTime()) {
    return err(new ValidationError(`The certificate is not valid before ${validFrom.toISOString()}`, 'certificatePath'));
  }

  return ok({
    subject: cert.subject,
    issuer: cert.issuer,
    validFrom,
    validTo,
    matchesDomain: options.domain ? cert.checkHost(options.domain) !== undefined : null,
  });
}
