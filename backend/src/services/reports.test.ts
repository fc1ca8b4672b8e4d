import { describe, it, expect } from 'vitest';
import { clusterCaExpiryReport, enhancedInfo, namespaceExpiryReport, podCertificateReport, podInventory } from './reports.js';
import { parseCertificate } from './certParser.js';
import type { CertificateSource } from './discovery.js';
import type { EksDetails, PodView } from '../kube/types.js';
import { daysFrom, makeCertPem } from '../testing/certs.js';

const NOW = new Date('2026-01-15T12:00:00Z');

function details(trustAnchorPem: string): EksDetails {
  return { clusterName: 'demo', clusterEndpoint: 'https://x.eks.amazonaws.com', trustAnchorPem, region: 'us-west-2' };
}

describe('enhancedInfo', () => {
  it('breaks the remaining time down', () => {
    const cert = parseCertificate(makeCertPem({ commonName: 'kubernetes', notAfter: daysFrom(NOW, 400, 12), isCA: true }), NOW);
    const info = enhancedInfo(cert, NOW);
    expect(info.validityPeriod.validForDays).toBe(365);
    expect(info.expiryInfo).toEqual({
      daysUntilExpiry: 400,
      weeksUntilExpiry: 57,
      monthsUntilExpiry: 13,
      yearsUntilExpiry: 1,
      expiresOn: 'February 20, 2027',
      expiresOnWeekday: 'Saturday, February 20, 2027',
      timeRemaining: '1 years, 35 days'
    });
  });

  it('keeps expired certificates negative', () => {
    const cert = parseCertificate(makeCertPem({ commonName: 'old', notAfter: daysFrom(NOW, -8) }), NOW);
    const info = enhancedInfo(cert, NOW);
    expect(info.isExpired).toBe(true);
    expect(info.expiryInfo.weeksUntilExpiry).toBe(-1);
    expect(info.expiryInfo.timeRemaining).toBe('Expired');
  });
});

describe('clusterCaExpiryReport', () => {
  it('summarises a healthy CA', () => {
    const report = clusterCaExpiryReport(details(makeCertPem({ commonName: 'kubernetes', notAfter: daysFrom(NOW, 400, 12), isCA: true })), 30, NOW);
    expect(report.analysisDate).toBe('2026-01-15T12:00:00.000Z');
    expect(report.certificateInfo.totalCerts).toBe(1);
    expect(report.certificateInfo.warnings).toEqual([]);
    expect(report.certificateInfo.enhancedInfo?.subject).toBe('CN=kubernetes (Kubernetes Cluster CA)');
    expect(report.summary).toEqual({ certificatesAnalyzed: 1, warningsFound: 0, expiresWithinDays: 30, statusSummary: 'VALID (400 days remaining)' });
  });

  it('warns with the cluster-ca prefix inside the window', () => {
    const report = clusterCaExpiryReport(details(makeCertPem({ commonName: 'kubernetes', notAfter: daysFrom(NOW, 20), isCA: true })), 30, NOW);
    expect(report.certificateInfo.warnings).toEqual([
      "[cluster-ca] Certificate 'CN=kubernetes (Kubernetes Cluster CA)' expires in 20 days (2026-02-04)"
    ]);
    expect(report.summary.statusSummary).toBe('EXPIRES SOON (20 days)');
  });

  it('reports a missing CA without failing', () => {
    const report = clusterCaExpiryReport(details(''), 30, NOW);
    expect(report.certificateInfo.enhancedInfo).toBeNull();
    expect(report.certificateInfo.source.error).toBe('No cluster CA certificate available');
    expect(report.summary.statusSummary).toBe('No certificates found');
  });
});

describe('podCertificateReport', () => {
  it('counts sources, certificates and warnings', () => {
    const soon = parseCertificate(makeCertPem({ commonName: 'web', notAfter: daysFrom(NOW, 5) }), NOW);
    const sources: Record<string, CertificateSource> = {
      'secret-web-tls': { type: 'secret', name: 'web-tls', namespace: 'apps', key: 'tls.crt', certificates: [soon] },
      'configmap-empty': { type: 'configmap', name: 'empty', namespace: 'apps', certificates: [] }
    };
    const report = podCertificateReport('web-0', 'apps', sources, 30);
    expect(report.expiryWarnings).toEqual(["[secret-web-tls] Certificate 'CN=web' expires in 5 days (2026-01-20)"]);
    expect(report.summary).toEqual({ totalSources: 2, totalCertificates: 1, warningsCount: 1 });
  });
});

describe('namespaceExpiryReport', () => {
  const pod = (name: string): PodView => ({ name, namespace: 'apps', phase: 'Running', nodeName: 'node-a', createdAt: null, volumes: [], mounts: [] });

  it('lists pods with findings and skips pods that fail', async () => {
    const expiring = parseCertificate(makeCertPem({ commonName: 'web', notAfter: daysFrom(NOW, 5) }), NOW);
    const report = await namespaceExpiryReport('apps', [pod('web'), pod('idle'), pod('broken')], async (p): Promise<Record<string, CertificateSource>> => {
      if (p.name === 'broken') throw new Error('boom');
      if (p.name === 'idle') return {};
      return { 'secret-web-tls': { type: 'secret', name: 'web-tls', namespace: 'apps', certificates: [expiring] } };
    }, 30);
    expect(report.summary).toEqual({ totalPodsAnalyzed: 3, podsWithCertificates: 1, totalCertificates: 1, totalWarnings: 1 });
    expect(report.podExpiryInfo.map(p => p.podName)).toEqual(['web']);
    expect(report.allWarnings).toEqual(["Pod web: [secret-web-tls] Certificate 'CN=web' expires in 5 days (2026-01-20)"]);
  });
});

describe('podInventory', () => {
  it('keeps only certificate-looking mounts', () => {
    const [entry] = podInventory([{
      name: 'web', namespace: 'apps', phase: 'Pending', nodeName: '', createdAt: new Date('2026-01-10T00:00:00Z'),
      volumes: [{ name: 'tls', source: { kind: 'secret', secretName: 'web-tls' } }],
      mounts: [
        { container: 'app', volumeName: 'tls', mountPath: '/etc/ssl/private', readOnly: true },
        { container: 'app', volumeName: 'data', mountPath: '/data', readOnly: false }
      ]
    }]);
    expect(entry.certificateMounts.map(m => m.mountPath)).toEqual(['/etc/ssl/private']);
    expect(entry.volumes).toHaveLength(1);
    expect(entry.status).toBe('Pending');
    expect(entry.node).toBe('');
    expect(entry.created?.toISOString()).toBe('2026-01-10T00:00:00.000Z');
  });
});
