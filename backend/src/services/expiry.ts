import { HOUR_MS, type CertificateRecord } from './certParser.js';
import type { CertificateSource } from './discovery.js';

// YYYY-MM-DD in UTC
export function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function warningsFor(certs: readonly CertificateRecord[], warningDays: number): string[] {
  const warnings: string[] = [];
  for (const cert of certs) {
    if (cert.isExpired) {
      warnings.push(`Certificate '${cert.subject}' has EXPIRED on ${formatDate(cert.notAfter)}`);
    } else if (cert.daysUntilExpiry <= warningDays) {
      warnings.push(`Certificate '${cert.subject}' expires in ${cert.daysUntilExpiry} days (${formatDate(cert.notAfter)})`);
    }
  }
  return warnings;
}

/** Warnings across every source, each prefixed with its source key. */
export function sourceWarnings(sources: Record<string, CertificateSource>, warningDays: number): string[] {
  const all: string[] = [];
  for (const [key, source] of Object.entries(sources)) {
    for (const warning of warningsFor(source.certificates, warningDays)) {
      all.push(`[${key}] ${warning}`);
    }
  }
  return all;
}

export function formatRemaining(durationMs: number): string {
  if (durationMs < 0) return 'Expired';
  const totalHours = Math.floor(durationMs / HOUR_MS);
  const days = Math.floor(totalHours / 24);
  const hours = totalHours % 24;
  if (days > 365) {
    const rem = days % 365;
    return rem > 0 ? `${Math.floor(days / 365)} years, ${rem} days` : `${Math.floor(days / 365)} years`;
  }
  if (days > 30) {
    const rem = days % 30;
    return rem > 0 ? `${Math.floor(days / 30)} months, ${rem} days` : `${Math.floor(days / 30)} months`;
  }
  if (days > 0) {
    return hours > 0 ? `${days} days, ${hours} hours` : `${days} days`;
  }
  return `${hours} hours`;
}

export function statusSummary(certs: readonly CertificateRecord[], warningDays: number): string {
  if (!certs.length) return 'No certificates found';
  const expired = certs.find(c => c.isExpired);
  if (expired) return 'EXPIRED';
  const soon = certs.find(c => c.daysUntilExpiry <= warningDays);
  if (soon) return `EXPIRES SOON (${soon.daysUntilExpiry} days)`;
  const minDays = Math.min(...certs.map(c => c.daysUntilExpiry));
  return `VALID (${minDays} days remaining)`;
}
