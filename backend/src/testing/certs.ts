import forge from 'node-forge';
import { DAY_MS, HOUR_MS } from '../services/certParser.js';

export { DAY_MS, HOUR_MS };

let keys: forge.pki.rsa.KeyPair | undefined;

// One key pair per test process; 1024 bits keeps pure-JS generation fast
function keyPair(): forge.pki.rsa.KeyPair {
  if (!keys) keys = forge.pki.rsa.generateKeyPair(1024);
  return keys;
}

export interface TestCertOptions {
  commonName: string;
  organization?: string;
  notBefore?: Date;
  notAfter: Date;
  serialHex?: string;
  isCA?: boolean;
  dnsNames?: string[];
  ipAddresses?: string[];
  uris?: string[];
  keyUsage?: {
    digitalSignature?: boolean;
    keyEncipherment?: boolean;
    dataEncipherment?: boolean;
    keyAgreement?: boolean;
    keyCertSign?: boolean;
    cRLSign?: boolean;
  };
}

export function makeCertPem(opts: TestCertOptions): string {
  const { publicKey, privateKey } = keyPair();
  const cert = forge.pki.createCertificate();
  cert.publicKey = publicKey;
  cert.serialNumber = opts.serialHex ?? '01';
  cert.validity.notBefore = opts.notBefore ?? new Date(opts.notAfter.getTime() - 365 * DAY_MS);
  cert.validity.notAfter = opts.notAfter;
  const attrs = [
    ...(opts.organization ? [{ name: 'organizationName', value: opts.organization }] : []),
    { name: 'commonName', value: opts.commonName }
  ];
  cert.setSubject(attrs);
  cert.setIssuer(attrs);
  const extensions: object[] = [{ name: 'basicConstraints', cA: !!opts.isCA }];
  if (opts.keyUsage) extensions.push({ name: 'keyUsage', ...opts.keyUsage });
  const altNames = [
    ...(opts.dnsNames ?? []).map(value => ({ type: 2, value })),
    ...(opts.ipAddresses ?? []).map(ip => ({ type: 7, ip })),
    ...(opts.uris ?? []).map(value => ({ type: 6, value }))
  ];
  if (altNames.length) extensions.push({ name: 'subjectAltName', altNames });
  cert.setExtensions(extensions);
  cert.sign(privateKey, forge.md.sha256.create());
  return forge.pki.certificateToPem(cert);
}

export function makeKeyPem(): string {
  return forge.pki.privateKeyToPem(keyPair().privateKey);
}

export const CORRUPT_CERT_PEM = '-----BEGIN CERTIFICATE-----\nAAAA\n-----END CERTIFICATE-----\n';

export function daysFrom(now: Date, days: number, hours = 0): Date {
  return new Date(now.getTime() + days * DAY_MS + hours * HOUR_MS);
}
