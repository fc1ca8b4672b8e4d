import fs from 'fs';
import { KubeConfig } from '@kubernetes/client-node';
import { ConfigError, errorMessage } from '../errors.js';
import type { EksDetails } from './types.js';

function execArgs(exec: unknown): string[] {
  if (typeof exec !== 'object' || exec === null || !('args' in exec) || !Array.isArray(exec.args)) return [];
  return exec.args.filter((a: unknown): a is string => typeof a === 'string');
}

function argAfter(args: string[], flags: string[]): string | undefined {
  const i = args.findIndex(a => flags.includes(a));
  return i >= 0 && i + 1 < args.length ? args[i + 1] : undefined;
}

// https://ABC.gr7.us-west-2.eks.amazonaws.com -> us-west-2
export function regionFromEndpoint(server: string): string {
  const host = URL.canParse(server) ? new URL(server).hostname : server;
  const parts = host.split('.');
  const i = parts.indexOf('eks');
  return i >= 0 && i + 1 < parts.length ? parts[i + 1] : '';
}

// update-kubeconfig names clusters by ARN: arn:aws:eks:<region>:<account>:cluster/<name>
function clusterNameOf(entryName: string, args: string[]): string {
  const fromArgs = argAfter(args, ['--cluster-name', '--cluster-id', '-i']);
  if (fromArgs) return fromArgs;
  const arn = /^arn:aws[\w-]*:eks:[^:]*:\d*:cluster\/(.+)$/u.exec(entryName);
  return arn ? arn[1] : entryName;
}

export function eksDetailsFromKubeConfig(kc: KubeConfig): EksDetails {
  const currentContext = kc.getCurrentContext();
  if (!currentContext) throw new ConfigError('no current context set in kubeconfig');
  const context = kc.getContextObject(currentContext);
  if (!context) throw new ConfigError(`current context ${currentContext} not found in kubeconfig`);
  const cluster = kc.getCluster(context.cluster);
  if (!cluster) throw new ConfigError(`cluster ${context.cluster} not found in kubeconfig`);

  let trustAnchorPem = '';
  if (cluster.caData) {
    trustAnchorPem = Buffer.from(cluster.caData, 'base64').toString('utf-8');
  } else if (cluster.caFile) {
    try {
      trustAnchorPem = fs.readFileSync(cluster.caFile, 'utf-8');
    } catch (err) {
      throw new ConfigError(`failed to read CA file ${cluster.caFile}: ${errorMessage(err)}`, { cause: err });
    }
  }

  const user = context.user ? kc.getUser(context.user) : null;
  const args = execArgs(user?.exec);
  const roleArn = argAfter(args, ['--role-arn', '-r']);

  return {
    clusterName: clusterNameOf(context.cluster, args),
    clusterEndpoint: cluster.server,
    trustAnchorPem,
    region: regionFromEndpoint(cluster.server),
    ...(roleArn ? { roleArn } : {})
  };
}

export function loadEksDetails(kubeconfigPath: string): EksDetails {
  if (!kubeconfigPath) throw new ConfigError('kubeconfig path is empty');
  const kc = new KubeConfig();
  try {
    kc.loadFromFile(kubeconfigPath);
  } catch (err) {
    throw new ConfigError(`failed to load kubeconfig from ${kubeconfigPath}: ${errorMessage(err)}`, { cause: err });
  }
  return eksDetailsFromKubeConfig(kc);
}
