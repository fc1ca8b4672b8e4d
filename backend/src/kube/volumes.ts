import type { V1Volume, V1VolumeProjection } from '@kubernetes/client-node';
import type { ProjectedSource, VolumeSource } from './types.js';

const CERT_MOUNT_PREFIXES = [
  '/var/run/secrets/kubernetes.io/serviceaccount',
  '/etc/ssl',
  '/etc/certs',
  '/etc/pki',
  '/usr/share/ca-certificates',
  '/etc/ca-certificates'
];

const CERT_FILE_MARKERS = ['.crt', '.pem', '.key', '.p12', '.jks', '.truststore'];

export function isCertificateMount(mountPath: string): boolean {
  return CERT_MOUNT_PREFIXES.some(p => mountPath.startsWith(p))
    || CERT_FILE_MARKERS.some(ext => mountPath.includes(ext));
}

function projectedSource(p: V1VolumeProjection): ProjectedSource {
  if (p.secret?.name) return { kind: 'secret', name: p.secret.name };
  if (p.configMap?.name) return { kind: 'configMap', name: p.configMap.name };
  if (p.serviceAccountToken) return { kind: 'serviceAccountToken' };
  if (p.downwardAPI) return { kind: 'downwardAPI' };
  return { kind: 'other' };
}

export function classifyVolume(volume: V1Volume): VolumeSource {
  if (volume.secret) return { kind: 'secret', secretName: volume.secret.secretName ?? volume.name };
  if (volume.configMap) return { kind: 'configMap', configMapName: volume.configMap.name ?? volume.name };
  if (volume.projected) return { kind: 'projected', sources: (volume.projected.sources ?? []).map(projectedSource) };
  if (volume.emptyDir) return { kind: 'emptyDir' };
  const type = Object.entries(volume).find(([field, value]) => field !== 'name' && value !== undefined && value !== null)?.[0];
  return { kind: 'other', type: type ?? 'unknown' };
}

/** Secret and config map names a volume pulls in, directly or through a projection. */
export function referencedObjects(source: VolumeSource): Array<{ kind: 'secret' | 'configMap'; name: string }> {
  switch (source.kind) {
    case 'secret': return [{ kind: 'secret', name: source.secretName }];
    case 'configMap': return [{ kind: 'configMap', name: source.configMapName }];
    case 'projected': {
      const refs: Array<{ kind: 'secret' | 'configMap'; name: string }> = [];
      for (const s of source.sources) {
        if (s.kind === 'secret' || s.kind === 'configMap') refs.push({ kind: s.kind, name: s.name });
      }
      return refs;
    }
    default: return [];
  }
}
