import { X509Certificate } from 'crypto';
import forge from 'node-forge';
import { MalformedInputError, errorMessage } from '../errors.js';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export const KEY_USAGE_LABELS = [
  'Digital Signature',
  'Key Encipherment',
  'Data Encipherment',
  'Key Agreement',
  'Certificate Sign',
  'CRL Sign'
] as const;

export type KeyUsageLabel = typeof KEY_USAGE_LABELS[number];

export interface CertificateRecord {
  readonly subject: string;
  readonly issuer: string;
  readonly serialNumber: string; // decimal
  readonly notBefore: Date;
  readonly notAfter: Date;
  readonly isExpired: boolean;
  readonly daysUntilExpiry: number;
  readonly dnsNames: readonly string[];
  readonly ipAddresses: readonly string[];
  readonly keyUsage: readonly KeyUsageLabel[];
  readonly isCA: boolean;
}

// KeyUsage BIT STRING, first content octet, most significant bit first
const KEY_USAGE_BITS: ReadonlyArray<[number, KeyUsageLabel]> = [
  [0x80, 'Digital Signature'],
  [0x20, 'Key Encipherment'],
  [0x10, 'Data Encipherment'],
  [0x08, 'Key Agreement'],
  [0x04, 'Certificate Sign'],
  [0x02, 'CRL Sign']
];

const KEY_USAGE_OID = '2.5.29.15';
const SUBJECT_ALT_NAME_OID = '2.5.29.17';

export function daysUntil(notAfter: Date, now: Date): number {
  // trunc toward zero; `|| 0` folds -0
  return Math.trunc((notAfter.getTime() - now.getTime()) / DAY_MS) || 0;
}

function children(node: forge.asn1.Asn1 | undefined, what: string): forge.asn1.Asn1[] {
  if (!node || !Array.isArray(node.value)) throw new Error(`unexpected ASN.1 structure at ${what}`);
  return node.value;
}

function bytesOf(node: forge.asn1.Asn1 | undefined, what: string): string {
  if (!node || typeof node.value !== 'string') throw new Error(`unexpected ASN.1 structure at ${what}`);
  return node.value;
}

function asn1Time(node: forge.asn1.Asn1 | undefined, what: string): Date {
  const raw = bytesOf(node, what);
  if (node?.type === forge.asn1.Type.UTCTIME) return forge.asn1.utcTimeToDate(raw);
  if (node?.type === forge.asn1.Type.GENERALIZEDTIME) return forge.asn1.generalizedTimeToDate(raw);
  throw new Error(`unexpected time encoding at ${what}`);
}

interface TbsFields {
  notBefore: Date;
  notAfter: Date;
  keyUsage: KeyUsageLabel[];
  dnsNames: string[];
  ipAddresses: string[];
}

// GeneralName context tags
const SAN_DNS_TAG = 2;
const SAN_IP_TAG = 7;

function keyUsageFrom(extnValue: string): KeyUsageLabel[] {
  // BIT STRING: 03 len unused b0 [b1]
  const first = extnValue.length > 3 ? extnValue.charCodeAt(3) : 0;
  return KEY_USAGE_BITS.filter(([mask]) => first & mask).map(([, label]) => label);
}

// RFC 5952: lowercase, no leading zeros, longest run of two or more zero groups as ::
function formatIPv6(bytes: string): string {
  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) groups.push((bytes.charCodeAt(i) << 8) | bytes.charCodeAt(i + 1));
  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < groups.length;) {
    if (groups[i] !== 0) { i++; continue; }
    let j = i;
    while (j < groups.length && groups[j] === 0) j++;
    if (j - i > bestLen && j - i >= 2) { bestStart = i; bestLen = j - i; }
    i = j;
  }
  const hex = groups.map(g => g.toString(16));
  if (bestStart < 0) return hex.join(':');
  return `${hex.slice(0, bestStart).join(':')}::${hex.slice(bestStart + bestLen).join(':')}`;
}

function formatIP(bytes: string): string | undefined {
  if (bytes.length === 4) return Array.from(bytes, c => c.charCodeAt(0)).join('.');
  if (bytes.length === 16) return formatIPv6(bytes);
  return undefined;
}

function subjectAltNames(extnValue: string, into: Pick<TbsFields, 'dnsNames' | 'ipAddresses'>): void {
  const names = forge.asn1.fromDer(forge.util.createBuffer(extnValue));
  for (const name of children(names, 'subjectAltName')) {
    if (name.tagClass !== forge.asn1.Class.CONTEXT_SPECIFIC || typeof name.value !== 'string') continue;
    if (name.type === SAN_DNS_TAG) {
      into.dnsNames.push(forge.util.decodeUtf8(name.value));
    } else if (name.type === SAN_IP_TAG) {
      const ip = formatIP(name.value);
      if (ip) into.ipAddresses.push(ip);
    }
  }
}

// X509Certificate has no key usage bits, only string validity dates and a display form of the
// SANs, so read those from the TBS structure
function readTbsFields(der: Buffer): TbsFields {
  const root = forge.asn1.fromDer(forge.util.createBuffer(der.toString('binary')));
  const tbs = children(children(root, 'certificate')[0], 'tbsCertificate');
  // explicit [0] version is optional
  const offset = tbs[0]?.tagClass === forge.asn1.Class.CONTEXT_SPECIFIC && tbs[0].type === 0 ? 1 : 0;
  const validity = children(tbs[offset + 3], 'validity');
  const fields: TbsFields = {
    notBefore: asn1Time(validity[0], 'notBefore'),
    notAfter: asn1Time(validity[1], 'notAfter'),
    keyUsage: [],
    dnsNames: [],
    ipAddresses: []
  };

  const extsTagged = tbs.find(n => n.tagClass === forge.asn1.Class.CONTEXT_SPECIFIC && n.type === 3);
  if (extsTagged) {
    for (const ext of children(children(extsTagged, 'extensions')[0], 'extensions')) {
      const parts = children(ext, 'extension');
      const oid = forge.asn1.derToOid(bytesOf(parts[0], 'extnID'));
      const extnValue = bytesOf(parts[parts.length - 1], 'extnValue');
      if (oid === KEY_USAGE_OID) fields.keyUsage = keyUsageFrom(extnValue);
      else if (oid === SUBJECT_ALT_NAME_OID) subjectAltNames(extnValue, fields);
    }
  }
  return fields;
}

// "C=US\nO=Acme\nCN=api" -> "CN=api,O=Acme,C=US" (most specific RDN first)
function distinguishedName(raw: string): string {
  return raw.split('\n').filter(Boolean).reverse().join(',');
}

function recordFromDer(der: Buffer, now: Date): CertificateRecord {
  let x509: X509Certificate;
  let tbs: TbsFields;
  try {
    x509 = new X509Certificate(der);
    tbs = readTbsFields(der);
  } catch (err) {
    throw new MalformedInputError('malformed-certificate', `failed to parse certificate: ${errorMessage(err)}`, { cause: err });
  }
  return Object.freeze({
    subject: distinguishedName(x509.subject),
    issuer: distinguishedName(x509.issuer),
    serialNumber: BigInt(`0x${x509.serialNumber}`).toString(10),
    notBefore: tbs.notBefore,
    notAfter: tbs.notAfter,
    isExpired: now.getTime() > tbs.notAfter.getTime(),
    daysUntilExpiry: daysUntil(tbs.notAfter, now),
    dnsNames: tbs.dnsNames,
    ipAddresses: tbs.ipAddresses,
    keyUsage: tbs.keyUsage,
    isCA: x509.ca
  });
}

function decodePem(pem: string): forge.pem.ObjectPEM[] {
  try {
    return forge.pem.decode(pem.trim());
  } catch (err) {
    throw new MalformedInputError('not-pem', 'failed to decode PEM block', { cause: err });
  }
}

function derOf(block: forge.pem.ObjectPEM): Buffer {
  return Buffer.from(block.body, 'binary');
}

/**
 * Strict parse: the input must hold exactly one PEM block and it must be a CERTIFICATE.
 */
export function parseCertificate(pem: string, now: Date = new Date()): CertificateRecord {
  const blocks = decodePem(pem);
  const [block] = blocks;
  if (!block) throw new MalformedInputError('not-pem', 'failed to decode PEM block');
  if (block.type !== 'CERTIFICATE') {
    throw new MalformedInputError('wrong-block-type', `not a certificate, found: ${block.type}`);
  }
  if (blocks.length > 1) {
    throw new MalformedInputError('malformed-certificate', `expected a single PEM block, found ${blocks.length}`);
  }
  return recordFromDer(derOf(block), now);
}

/**
 * Lenient parse of concatenated PEM blocks. Blocks that are not certificates or
 * fail to parse are skipped; only an empty result is an error.
 */
export function parseCertificateBundle(pem: string, now: Date = new Date()): CertificateRecord[] {
  let blocks: forge.pem.ObjectPEM[] = [];
  try {
    blocks = decodePem(pem);
  } catch {
    blocks = [];
  }
  const records: CertificateRecord[] = [];
  for (const block of blocks) {
    if (block.type !== 'CERTIFICATE') continue;
    try {
      records.push(recordFromDer(derOf(block), now));
    } catch {
      continue;
    }
  }
  if (!records.length) {
    throw new MalformedInputError('no-valid-certificates', 'no valid certificates found in bundle');
  }
  return records;
}

/** Single certificate first, bundle only when the strict parse fails. */
export function parseCertificates(pem: string, now: Date = new Date()): CertificateRecord[] {
  try {
    return [parseCertificate(pem, now)];
  } catch {
    return parseCertificateBundle(pem, now);
  }
}

export function withSubjectNote(record: CertificateRecord, note: string): CertificateRecord {
  return Object.freeze({ ...record, subject: `${record.subject} (${note})` });
}
