import { parseCertificates, withSubjectNote, type CertificateRecord } from './certParser.js';
import { referencedObjects } from '../kube/volumes.js';
import type { ClusterClient, PodView } from '../kube/types.js';
import { errorMessage } from '../errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('discovery');

export type SourceType = 'secret' | 'configmap' | 'cluster-ca';

export interface CertificateSource {
  type: SourceType;
  name: string;
  namespace: string;
  key?: string; // keys that held PEM data, comma separated
  certificates: CertificateRecord[];
  error?: string;
}

export type CertificateStore = Pick<ClusterClient, 'details' | 'getSecret' | 'getConfigMap'>;

// Field-name heuristic: certificates stored under any other key are not found.
export const SECRET_CERT_KEYS = [
  'tls.crt', 'tls.cert', 'cert.pem', 'certificate.pem', 'ca.crt', 'ca.pem',
  'client.crt', 'server.crt', 'cert', 'certificate', 'ca-bundle.crt',
  'ca-bundle.pem', 'root-ca.pem', 'intermediate-ca.pem'
] as const;

export const CONFIGMAP_CERT_KEYS = [
  'ca.crt', 'ca.pem', 'ca-bundle.crt', 'ca-bundle.pem', 'root-ca.pem',
  'intermediate-ca.pem', 'tls.crt', 'tls.cert', 'cert.pem', 'certificate.pem',
  'client.crt', 'server.crt', 'cert', 'certificate'
] as const;

export const CLUSTER_CA_KEY = 'cluster-ca';
export const CLUSTER_CA_NAME = 'kubernetes-cluster-ca';

export function secretSourceKey(name: string): string {
  return `secret-${name}`;
}

export function configMapSourceKey(name: string): string {
  return `configmap-${name}`;
}

interface ScanResult {
  certificates: CertificateRecord[];
  keys: string[];
}

function scanKeys(keys: readonly string[], lookup: (key: string) => string | undefined, now: Date): ScanResult {
  const certificates: CertificateRecord[] = [];
  const found: string[] = [];
  for (const key of keys) {
    const pem = lookup(key);
    if (pem === undefined) continue;
    let parsed: CertificateRecord[];
    try {
      parsed = parseCertificates(pem, now);
    } catch (err) {
      log.debug({ key, err: errorMessage(err) }, 'no certificates under key');
      continue;
    }
    found.push(key);
    certificates.push(...parsed.map(c => withSubjectNote(c, `from ${key}`)));
  }
  return { certificates, keys: found };
}

function withKeys(source: CertificateSource, scan: ScanResult): CertificateSource {
  return scan.keys.length ? { ...source, key: scan.keys.join(','), certificates: scan.certificates } : { ...source, certificates: scan.certificates };
}

export function clusterCaSource(trustAnchorPem: string, now: Date = new Date()): CertificateSource {
  const source: CertificateSource = { type: 'cluster-ca', name: CLUSTER_CA_NAME, namespace: '', certificates: [] };
  if (!trustAnchorPem.trim()) {
    return { ...source, error: 'No cluster CA certificate available' };
  }
  try {
    const certificates = parseCertificates(trustAnchorPem, now).map(c => withSubjectNote(c, 'Kubernetes Cluster CA'));
    return { ...source, certificates };
  } catch (err) {
    log.warn({ err: errorMessage(err) }, 'cluster CA did not parse');
    return { ...source, error: 'Failed to parse cluster CA certificate' };
  }
}

export async function extractFromSecret(store: CertificateStore, namespace: string, name: string, now: Date = new Date()): Promise<CertificateSource> {
  const source: CertificateSource = { type: 'secret', name, namespace, certificates: [] };
  try {
    const secret = await store.getSecret(namespace, name);
    return withKeys(source, scanKeys(SECRET_CERT_KEYS, key => secret.data[key]?.toString('utf-8'), now));
  } catch (err) {
    log.warn({ namespace, secret: name, err: errorMessage(err) }, 'secret fetch failed');
    return { ...source, error: `Failed to get secret: ${errorMessage(err)}` };
  }
}

export async function extractFromConfigMap(store: CertificateStore, namespace: string, name: string, now: Date = new Date()): Promise<CertificateSource> {
  const source: CertificateSource = { type: 'configmap', name, namespace, certificates: [] };
  try {
    const cm = await store.getConfigMap(namespace, name);
    // plain data wins over binaryData for the same key
    const lookup = (key: string) => cm.data[key] ?? cm.binaryData[key]?.toString('utf-8');
    return withKeys(source, scanKeys(CONFIGMAP_CERT_KEYS, lookup, now));
  } catch (err) {
    log.warn({ namespace, configMap: name, err: errorMessage(err) }, 'config map fetch failed');
    return { ...source, error: `Failed to get configmap: ${errorMessage(err)}` };
  }
}

/**
 * Certificate sources reachable from a pod: the cluster CA plus every secret and
 * config map its volumes reference. Fetch failures are reported on the source.
 */
export async function discover(pod: PodView, namespace: string, store: CertificateStore, now: Date = new Date()): Promise<Record<string, CertificateSource>> {
  const sources: Record<string, CertificateSource> = {
    [CLUSTER_CA_KEY]: clusterCaSource(store.details.trustAnchorPem, now)
  };
  for (const volume of pod.volumes) {
    for (const ref of referencedObjects(volume.source)) {
      const key = ref.kind === 'secret' ? secretSourceKey(ref.name) : configMapSourceKey(ref.name);
      if (key in sources) continue;
      sources[key] = ref.kind === 'secret'
        ? await extractFromSecret(store, namespace, ref.name, now)
        : await extractFromConfigMap(store, namespace, ref.name, now);
    }
  }
  return sources;
}

export function countCertificates(sources: Record<string, CertificateSource>): number {
  return Object.values(sources).reduce((n, s) => n + s.certificates.length, 0);
}
