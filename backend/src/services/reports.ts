import { DAY_MS, HOUR_MS, type CertificateRecord } from './certParser.js';
import { clusterCaSource, countCertificates, CLUSTER_CA_KEY, type CertificateSource } from './discovery.js';
import { formatRemaining, sourceWarnings, statusSummary } from './expiry.js';
import { isCertificateMount } from '../kube/volumes.js';
import type { ContainerMount, EksDetails, PodView, PodVolume } from '../kube/types.js';
import { errorMessage } from '../errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('reports');

const longDate = new Intl.DateTimeFormat('en-US', { year: 'numeric', month: 'long', day: 'numeric', timeZone: 'UTC' });
const longWeekday = new Intl.DateTimeFormat('en-US', { weekday: 'long', year: 'numeric', month: 'long', day: 'numeric', timeZone: 'UTC' });

export interface EnhancedCertificateInfo {
  subject: string;
  issuer: string;
  serialNumber: string;
  isCA: boolean;
  isExpired: boolean;
  validityPeriod: {
    notBefore: Date;
    notAfter: Date;
    validForDays: number;
  };
  expiryInfo: {
    daysUntilExpiry: number;
    weeksUntilExpiry: number;
    monthsUntilExpiry: number;
    yearsUntilExpiry: number;
    expiresOn: string;
    expiresOnWeekday: string;
    timeRemaining: string;
  };
  dnsNames: readonly string[];
  ipAddresses: readonly string[];
  keyUsage: readonly string[];
}

export function enhancedInfo(cert: CertificateRecord, now: Date): EnhancedCertificateInfo {
  const remainingMs = cert.notAfter.getTime() - now.getTime();
  const hours = remainingMs / HOUR_MS;
  return {
    subject: cert.subject,
    issuer: cert.issuer,
    serialNumber: cert.serialNumber,
    isCA: cert.isCA,
    isExpired: cert.isExpired,
    validityPeriod: {
      notBefore: cert.notBefore,
      notAfter: cert.notAfter,
      validForDays: Math.trunc((cert.notAfter.getTime() - cert.notBefore.getTime()) / DAY_MS)
    },
    expiryInfo: {
      daysUntilExpiry: cert.daysUntilExpiry,
      weeksUntilExpiry: Math.trunc(hours / (24 * 7)) || 0,
      monthsUntilExpiry: Math.trunc(hours / (24 * 30)) || 0,
      yearsUntilExpiry: Math.trunc(hours / (24 * 365)) || 0,
      expiresOn: longDate.format(cert.notAfter),
      expiresOnWeekday: longWeekday.format(cert.notAfter),
      timeRemaining: formatRemaining(remainingMs)
    },
    dnsNames: cert.dnsNames,
    ipAddresses: cert.ipAddresses,
    keyUsage: cert.keyUsage
  };
}

export function clusterCaExpiryReport(details: EksDetails, warningDays: number, now: Date = new Date()) {
  const source = clusterCaSource(details.trustAnchorPem, now);
  const warnings = sourceWarnings({ [CLUSTER_CA_KEY]: source }, warningDays);
  const [first] = source.certificates;
  return {
    warningDays,
    analysisDate: now.toISOString(),
    certificateInfo: {
      source,
      warnings,
      totalCerts: source.certificates.length,
      enhancedInfo: first ? enhancedInfo(first, now) : null
    },
    summary: {
      certificatesAnalyzed: source.certificates.length,
      warningsFound: warnings.length,
      expiresWithinDays: warningDays,
      statusSummary: statusSummary(source.certificates, warningDays)
    }
  };
}

export function podCertificateReport(podName: string, namespace: string, sources: Record<string, CertificateSource>, warningDays: number) {
  const warnings = sourceWarnings(sources, warningDays);
  return {
    podName,
    namespace,
    warningDays,
    certificateSources: sources,
    expiryWarnings: warnings,
    summary: {
      totalSources: Object.keys(sources).length,
      totalCertificates: countCertificates(sources),
      warningsCount: warnings.length
    }
  };
}

export interface PodExpiryInfo {
  podName: string;
  certificateSources: Record<string, CertificateSource>;
  warnings: string[];
  warningCount: number;
  certificateCount: number;
}

export type PodAnalyzer = (pod: PodView) => Promise<Record<string, CertificateSource>>;

export async function namespaceExpiryReport(namespace: string, pods: PodView[], analyze: PodAnalyzer, warningDays: number) {
  const podExpiryInfo: PodExpiryInfo[] = [];
  const allWarnings: string[] = [];
  let totalCertificates = 0;
  let totalWarnings = 0;
  for (const pod of pods) {
    let sources: Record<string, CertificateSource>;
    try {
      sources = await analyze(pod);
    } catch (err) {
      log.warn({ pod: pod.name, namespace, err: errorMessage(err) }, 'skipping pod');
      continue;
    }
    const warnings = sourceWarnings(sources, warningDays);
    const certificateCount = countCertificates(sources);
    if (warnings.length || certificateCount) {
      podExpiryInfo.push({ podName: pod.name, certificateSources: sources, warnings, warningCount: warnings.length, certificateCount });
      allWarnings.push(...warnings.map(w => `Pod ${pod.name}: ${w}`));
    }
    totalCertificates += certificateCount;
    totalWarnings += warnings.length;
  }
  return {
    namespace,
    warningDays,
    summary: {
      totalPodsAnalyzed: pods.length,
      podsWithCertificates: podExpiryInfo.length,
      totalCertificates,
      totalWarnings
    },
    podExpiryInfo,
    allWarnings
  };
}

export interface PodInventoryEntry {
  name: string;
  namespace: string;
  status: string;
  node: string;
  created: Date | null;
  certificateMounts: ContainerMount[];
  volumes: PodVolume[];
}

export function podInventory(pods: PodView[]): PodInventoryEntry[] {
  return pods.map(p => ({
    name: p.name,
    namespace: p.namespace,
    status: p.phase,
    node: p.nodeName,
    created: p.createdAt,
    certificateMounts: p.mounts.filter(m => isCertificateMount(m.mountPath)),
    volumes: p.volumes
  }));
}
