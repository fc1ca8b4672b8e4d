import { ApiException, CoreV1Api, KubeConfig, type V1Pod } from '@kubernetes/client-node';
import type { AppConfig } from '../config.js';
import { ClusterUnreachableError, NotFoundError, errorMessage } from '../errors.js';
import { ClusterTokenGenerator } from '../services/tokenGenerator.js';
import { loadEksDetails } from './kubeconfig.js';
import { classifyVolume } from './volumes.js';
import type { ClusterClient, ConfigMapView, EksDetails, PodView, SecretView } from './types.js';

export function podView(pod: V1Pod): PodView {
  const mounts = (pod.spec?.containers ?? []).flatMap(c => (c.volumeMounts ?? []).map(m => ({
    container: c.name,
    volumeName: m.name,
    mountPath: m.mountPath,
    readOnly: m.readOnly ?? false
  })));
  return {
    name: pod.metadata?.name ?? '',
    namespace: pod.metadata?.namespace ?? '',
    phase: pod.status?.phase ?? 'Unknown',
    nodeName: pod.spec?.nodeName ?? '',
    createdAt: pod.metadata?.creationTimestamp ?? null,
    volumes: (pod.spec?.volumes ?? []).map(v => ({ name: v.name, source: classifyVolume(v) })),
    mounts
  };
}

function decodeValues(values: Record<string, string> | undefined): Record<string, Buffer> {
  const out: Record<string, Buffer> = {};
  for (const [key, b64] of Object.entries(values ?? {})) out[key] = Buffer.from(b64, 'base64');
  return out;
}

async function notFoundAware<T>(what: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof ApiException && err.code === 404) throw new NotFoundError(`${what} not found`, { cause: err });
    throw err;
  }
}

export type CoreApi = Pick<CoreV1Api, 'listNamespace' | 'listNamespacedPod' | 'readNamespacedPod' | 'readNamespacedSecret' | 'readNamespacedConfigMap'>;

export class KubernetesClusterClient implements ClusterClient {
  constructor(readonly details: EksDetails, private readonly core: CoreApi) {}

  async testConnection(): Promise<void> {
    try {
      await this.core.listNamespace({ limit: 1 });
    } catch (err) {
      throw new ClusterUnreachableError(`failed to connect to Kubernetes cluster: ${errorMessage(err)}`, { cause: err });
    }
  }

  async listNamespaces(): Promise<string[]> {
    const list = await this.core.listNamespace();
    return list.items.map(ns => ns.metadata?.name ?? '');
  }

  async listPods(namespace: string): Promise<PodView[]> {
    const list = await this.core.listNamespacedPod({ namespace });
    return list.items.map(podView);
  }

  async getPod(namespace: string, name: string): Promise<PodView> {
    return podView(await notFoundAware(`pod ${namespace}/${name}`, () => this.core.readNamespacedPod({ name, namespace })));
  }

  async getSecret(namespace: string, name: string): Promise<SecretView> {
    const secret = await notFoundAware(`secret ${namespace}/${name}`, () => this.core.readNamespacedSecret({ name, namespace }));
    return { name, data: decodeValues(secret.data) };
  }

  async getConfigMap(namespace: string, name: string): Promise<ConfigMapView> {
    const cm = await notFoundAware(`configmap ${namespace}/${name}`, () => this.core.readNamespacedConfigMap({ name, namespace }));
    return { name, data: cm.data ?? {}, binaryData: decodeValues(cm.binaryData) };
  }
}

export type ClusterClientFactory = () => Promise<ClusterClient>;

/**
 * Reads the kubeconfig, mints a bearer token once and builds a CoreV1 client with it.
 * The token is not refreshed; build a new client when it expires.
 */
export async function createClusterClient(
  config: AppConfig,
  generator: ClusterTokenGenerator = ClusterTokenGenerator.fromConfig(config)
): Promise<KubernetesClusterClient> {
  const details = loadEksDetails(config.kubeconfigPath);
  const token = await generator.generateToken(details.clusterName, details.roleArn);
  const kc = new KubeConfig();
  kc.loadFromOptions({
    clusters: [{
      name: details.clusterName,
      server: details.clusterEndpoint,
      caData: Buffer.from(details.trustAnchorPem, 'utf-8').toString('base64'),
      skipTLSVerify: false
    }],
    users: [{ name: 'eks-token', token }],
    contexts: [{ name: 'eks', cluster: details.clusterName, user: 'eks-token' }],
    currentContext: 'eks'
  });
  return new KubernetesClusterClient(details, kc.makeApiClient(CoreV1Api));
}
