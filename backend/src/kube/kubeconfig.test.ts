import { describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { KubeConfig } from '@kubernetes/client-node';
import { eksDetailsFromKubeConfig, loadEksDetails, regionFromEndpoint } from './kubeconfig.js';
import { ConfigError } from '../errors.js';

const CA_PEM = '-----BEGIN CERTIFICATE-----\nMIIB\n-----END CERTIFICATE-----\n';
const CA_DATA = Buffer.from(CA_PEM, 'utf-8').toString('base64');
const ENDPOINT = 'https://ABCDEF0123.gr7.us-west-2.eks.amazonaws.com';
const CLUSTER_ARN = 'arn:aws:eks:us-west-2:123456789012:cluster/prod';

function kubeconfig(args: string[], currentContext = CLUSTER_ARN): string {
  return `
apiVersion: v1
kind: Config
clusters:
- name: ${CLUSTER_ARN}
  cluster:
    server: ${ENDPOINT}
    certificate-authority-data: ${CA_DATA}
contexts:
- name: ${CLUSTER_ARN}
  context:
    cluster: ${CLUSTER_ARN}
    user: ${CLUSTER_ARN}
${currentContext ? `current-context: ${currentContext}` : ''}
users:
- name: ${CLUSTER_ARN}
  user:
    exec:
      apiVersion: client.authentication.k8s.io/v1beta1
      command: aws
      args: [${args.map(a => JSON.stringify(a)).join(', ')}]
`;
}

function load(yaml: string): KubeConfig {
  const kc = new KubeConfig();
  kc.loadFromString(yaml);
  return kc;
}

describe('regionFromEndpoint', () => {
  it('takes the label after eks', () => {
    expect(regionFromEndpoint(ENDPOINT)).toBe('us-west-2');
    expect(regionFromEndpoint('https://10.0.0.1:6443')).toBe('');
  });
});

describe('eksDetailsFromKubeConfig', () => {
  it('reads the cluster from an update-kubeconfig style file', () => {
    const details = eksDetailsFromKubeConfig(load(kubeconfig(['--region', 'us-west-2', 'eks', 'get-token', '--cluster-name', 'prod'])));
    expect(details).toEqual({ clusterName: 'prod', clusterEndpoint: ENDPOINT, trustAnchorPem: CA_PEM, region: 'us-west-2' });
  });

  it('prefers the exec cluster argument and picks up the role', () => {
    const details = eksDetailsFromKubeConfig(load(kubeconfig(['token', '-i', 'prod-blue', '-r', 'arn:aws:iam::123456789012:role/viewer'])));
    expect(details.clusterName).toBe('prod-blue');
    expect(details.roleArn).toBe('arn:aws:iam::123456789012:role/viewer');
  });

  it('falls back to the name inside the cluster ARN', () => {
    expect(eksDetailsFromKubeConfig(load(kubeconfig(['eks', 'get-token']))).clusterName).toBe('prod');
  });

  it('requires a current context', () => {
    expect(() => eksDetailsFromKubeConfig(load(kubeconfig([], '')))).toThrow(ConfigError);
    expect(() => eksDetailsFromKubeConfig(load(kubeconfig([], '')))).toThrow('no current context set in kubeconfig');
  });

  it('requires the current context to exist', () => {
    expect(() => eksDetailsFromKubeConfig(load(kubeconfig([], 'staging')))).toThrow('current context staging not found in kubeconfig');
  });
});

describe('loadEksDetails', () => {
  it('loads from a file on disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kubeconfig-'));
    const file = path.join(dir, 'config');
    fs.writeFileSync(file, kubeconfig(['-i', 'prod']));
    try {
      expect(loadEksDetails(file).clusterName).toBe('prod');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing file as a config error', () => {
    expect(() => loadEksDetails(path.join(os.tmpdir(), 'no-such-dir', 'config'))).toThrow(ConfigError);
  });
});
