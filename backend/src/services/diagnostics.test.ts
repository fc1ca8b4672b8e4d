import { describe, it, expect } from 'vitest';
import { awsConfigStatus, runAuthChecks } from './diagnostics.js';
import { FakeClusterClient, podWith } from '../testing/fakeCluster.js';

const CONFIG = { aws: { region: 'us-west-2' }, defaultNamespace: 'apps' };

describe('awsConfigStatus', () => {
  it('reports which halves of the key pair are set', () => {
    expect(awsConfigStatus({ accessKeyId: 'test-access-key', region: '' })).toEqual({
      hasAccessKey: true,
      hasSecretKey: false,
      region: '',
      validationResult: 'failed: AWS_SECRET_ACCESS_KEY is required when AWS_ACCESS_KEY_ID is set'
    });
  });
});

describe('runAuthChecks', () => {
  it('passes every stage against a reachable cluster', async () => {
    const client = new FakeClusterClient({ namespaces: ['default', 'apps', 'kube-system'], pods: [podWith('web-0', [])] });
    const report = await runAuthChecks(CONFIG, async () => client);
    expect(report.status).toBe('all_tests_passed');
    expect(report.tests.listNamespaces).toEqual({ status: 'passed', count: 3 });
    expect(report.tests.listPodsTargetNamespace).toEqual({ status: 'passed', namespace: 'apps', count: 1 });
  });

  it('stops when the credential settings are inconsistent', async () => {
    const report = await runAuthChecks({ ...CONFIG, aws: { secretAccessKey: 'test-secret', region: '' } }, async () => new FakeClusterClient());
    expect(report).toEqual({
      status: 'failed',
      tests: { awsConfig: { status: 'failed', error: 'AWS_ACCESS_KEY_ID is required when AWS_SECRET_ACCESS_KEY is set' } }
    });
  });

  it('stops when no client can be built', async () => {
    const report = await runAuthChecks(CONFIG, async () => { throw new Error('failed to generate EKS token'); });
    expect(report.status).toBe('failed');
    expect(report.tests.clientCreation).toEqual({ status: 'failed', error: 'failed to generate EKS token' });
    expect(Object.keys(report.tests)).toEqual(['awsConfig', 'clientCreation']);
  });

  it('keeps going when cluster calls are rejected', async () => {
    const report = await runAuthChecks(CONFIG, async () => new FakeClusterClient({ unreachable: 'Forbidden' }));
    expect(report.status).toBe('some_tests_failed');
    expect(report.tests.listNamespaces).toEqual({ status: 'failed', error: 'Forbidden' });
    expect(report.tests.listPodsDefaultNamespace).toEqual({ status: 'failed', namespace: 'default', error: 'Forbidden' });
  });
});
