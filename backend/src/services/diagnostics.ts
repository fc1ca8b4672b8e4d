import { awsSettingsProblem, type AppConfig } from '../config.js';
import type { ClusterClientFactory } from '../kube/clusterClient.js';
import type { ClusterClient } from '../kube/types.js';
import { errorMessage } from '../errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('diagnostics');

export interface StageResult {
  status: 'passed' | 'failed';
  namespace?: string;
  count?: number;
  error?: string;
}

export type AuthCheckStatus = 'all_tests_passed' | 'some_tests_failed' | 'failed';

export interface AuthCheckReport {
  status: AuthCheckStatus;
  tests: Record<string, StageResult>;
}

export interface AwsConfigStatus {
  hasAccessKey: boolean;
  hasSecretKey: boolean;
  region: string;
  validationResult: string;
}

export function awsConfigStatus(aws: AppConfig['aws']): AwsConfigStatus {
  const problem = awsSettingsProblem(aws);
  return {
    hasAccessKey: !!aws.accessKeyId,
    hasSecretKey: !!aws.secretAccessKey,
    region: aws.region,
    validationResult: problem ? `failed: ${problem}` : 'passed'
  };
}

async function stage(name: string, run: () => Promise<Omit<StageResult, 'status'>>, context: Omit<StageResult, 'status'> = {}): Promise<StageResult> {
  try {
    return { status: 'passed', ...context, ...(await run()) };
  } catch (err) {
    log.warn({ stage: name, err: errorMessage(err) }, 'auth check stage failed');
    return { status: 'failed', ...context, error: errorMessage(err) };
  }
}

/**
 * Walks the path a request takes to the cluster: credential settings, client and
 * token, namespace list, then pod lists in the target and default namespaces.
 * Stops after the first two stages if either fails.
 */
export async function runAuthChecks(config: Pick<AppConfig, 'aws' | 'defaultNamespace'>, clusterClient: ClusterClientFactory): Promise<AuthCheckReport> {
  const tests: Record<string, StageResult> = {};

  const problem = awsSettingsProblem(config.aws);
  tests.awsConfig = problem ? { status: 'failed', error: problem } : { status: 'passed' };
  if (problem) return { status: 'failed', tests };

  let connected: ClusterClient;
  try {
    connected = await clusterClient();
    tests.clientCreation = { status: 'passed' };
  } catch (err) {
    log.warn({ stage: 'clientCreation', err: errorMessage(err) }, 'auth check stage failed');
    tests.clientCreation = { status: 'failed', error: errorMessage(err) };
    return { status: 'failed', tests };
  }

  const target = config.defaultNamespace;
  tests.listNamespaces = await stage('listNamespaces', async () => ({ count: (await connected.listNamespaces()).length }));
  tests.listPodsTargetNamespace = await stage('listPodsTargetNamespace',
    async () => ({ count: (await connected.listPods(target)).length }), { namespace: target });
  tests.listPodsDefaultNamespace = await stage('listPodsDefaultNamespace',
    async () => ({ count: (await connected.listPods('default')).length }), { namespace: 'default' });

  const allPassed = Object.values(tests).every(t => t.status === 'passed');
  return { status: allPassed ? 'all_tests_passed' : 'some_tests_failed', tests };
}
