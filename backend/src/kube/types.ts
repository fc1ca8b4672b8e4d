// Read-only views of the cluster objects the certificate scan needs.

export interface EksDetails {
  readonly clusterName: string;
  readonly clusterEndpoint: string;
  readonly trustAnchorPem: string;
  readonly region: string;
  readonly roleArn?: string;
}

export type ProjectedSource =
  | { kind: 'secret'; name: string }
  | { kind: 'configMap'; name: string }
  | { kind: 'serviceAccountToken' }
  | { kind: 'downwardAPI' }
  | { kind: 'other' };

export type VolumeSource =
  | { kind: 'secret'; secretName: string }
  | { kind: 'configMap'; configMapName: string }
  | { kind: 'projected'; sources: ProjectedSource[] }
  | { kind: 'emptyDir' }
  | { kind: 'other'; type: string };

export interface PodVolume {
  name: string;
  source: VolumeSource;
}

export interface ContainerMount {
  container: string;
  volumeName: string;
  mountPath: string;
  readOnly: boolean;
}

export interface PodView {
  name: string;
  namespace: string;
  phase: string;
  nodeName: string;
  createdAt: Date | null;
  volumes: PodVolume[];
  mounts: ContainerMount[];
}

export interface SecretView {
  name: string;
  data: Record<string, Buffer>;
}

export interface ConfigMapView {
  name: string;
  data: Record<string, string>;
  binaryData: Record<string, Buffer>;
}

export interface ClusterClient {
  readonly details: EksDetails;
  // cheapest authenticated call: one namespace
  testConnection(): Promise<void>;
  listNamespaces(): Promise<string[]>;
  listPods(namespace: string): Promise<PodView[]>;
  getPod(namespace: string, name: string): Promise<PodView>;
  getSecret(namespace: string, name: string): Promise<SecretView>;
  getConfigMap(namespace: string, name: string): Promise<ConfigMapView>;
}
