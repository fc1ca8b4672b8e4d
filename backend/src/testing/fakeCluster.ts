import { ClusterUnreachableError, NotFoundError } from '../errors.js';
import type { ClusterClient, ConfigMapView, EksDetails, PodView, SecretView } from '../kube/types.js';

export interface FakeClusterObjects {
  details?: Partial<EksDetails>;
  namespaces?: string[];
  // message every cluster call fails with
  unreachable?: string;
  pods?: PodView[];
  secrets?: Record<string, Record<string, string>>;
  configMaps?: Record<string, { data?: Record<string, string>; binaryData?: Record<string, string> }>;
}

/** In-memory cluster keyed by object name; every namespace sees the same objects. */
export class FakeClusterClient implements ClusterClient {
  readonly details: EksDetails;
  readonly fetched: string[] = [];

  constructor(private readonly objects: FakeClusterObjects = {}) {
    this.details = {
      clusterName: 'demo',
      clusterEndpoint: 'https://ABCDEF.gr7.us-west-2.eks.amazonaws.com',
      trustAnchorPem: '',
      region: 'us-west-2',
      ...objects.details
    };
  }

  async testConnection(): Promise<void> {
    if (this.objects.unreachable) throw new ClusterUnreachableError(`failed to connect to Kubernetes cluster: ${this.objects.unreachable}`);
  }

  async listNamespaces(): Promise<string[]> {
    this.checkReachable();
    return this.objects.namespaces ?? ['default'];
  }

  async listPods(namespace: string): Promise<PodView[]> {
    this.checkReachable();
    return (this.objects.pods ?? []).map(p => ({ ...p, namespace }));
  }

  private checkReachable(): void {
    if (this.objects.unreachable) throw new Error(this.objects.unreachable);
  }

  async getPod(namespace: string, name: string): Promise<PodView> {
    const pod = this.objects.pods?.find(p => p.name === name);
    if (!pod) throw new NotFoundError(`pod ${namespace}/${name} not found`);
    return { ...pod, namespace };
  }

  async getSecret(namespace: string, name: string): Promise<SecretView> {
    this.fetched.push(`secret/${name}`);
    const data = this.objects.secrets?.[name];
    if (!data) throw new NotFoundError(`secret ${namespace}/${name} not found`);
    const bytes: Record<string, Buffer> = {};
    for (const [k, v] of Object.entries(data)) bytes[k] = Buffer.from(v, 'utf-8');
    return { name, data: bytes };
  }

  async getConfigMap(namespace: string, name: string): Promise<ConfigMapView> {
    this.fetched.push(`configmap/${name}`);
    const cm = this.objects.configMaps?.[name];
    if (!cm) throw new NotFoundError(`configmap ${namespace}/${name} not found`);
    const binaryData: Record<string, Buffer> = {};
    for (const [k, v] of Object.entries(cm.binaryData ?? {})) binaryData[k] = Buffer.from(v, 'utf-8');
    return { name, data: cm.data ?? {}, binaryData };
  }
}

export function podWith(name: string, volumes: PodView['volumes'], mounts: PodView['mounts'] = []): PodView {
  return { name, namespace: 'default', phase: 'Running', nodeName: 'node-a', createdAt: new Date('2026-01-01T00:00:00Z'), volumes, mounts };
}
