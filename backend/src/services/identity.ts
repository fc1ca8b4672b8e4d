import { STSClient, AssumeRoleCommand, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { fromNodeProviderChain } from '@aws-sdk/credential-providers';
import { SignatureV4 } from '@smithy/signature-v4';
import { HttpRequest } from '@smithy/protocol-http';
import { formatUrl } from '@aws-sdk/util-format-url';
import { Sha256 } from '@aws-crypto/sha256-js';
import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from '@smithy/types';
import { hasStaticCredentials, type AwsSettings } from '../config.js';
import { CredentialError, errorMessage } from '../errors.js';

export const DEFAULT_STS_REGION = 'us-east-1';
export const CLUSTER_ID_HEADER = 'x-k8s-aws-id';
// aws-iam-authenticator presigns for 60s; the API server rejects older URLs anyway
export const PRESIGN_EXPIRES_SECONDS = 60;

export interface CallerIdentity {
  account: string;
  arn: string;
  userId: string;
}

export interface IdentityService {
  assumeRole(roleArn: string, sessionName: string): Promise<AwsCredentialIdentity>;
  getCallerIdentity(): Promise<CallerIdentity>;
}

export type IdentityServiceFactory = (credentials: AwsCredentialIdentityProvider, region: string) => IdentityService;

export class StsIdentityService implements IdentityService {
  private readonly client: STSClient;

  constructor(credentials: AwsCredentialIdentityProvider, region: string) {
    this.client = new STSClient({ credentials, region });
  }

  async assumeRole(roleArn: string, sessionName: string): Promise<AwsCredentialIdentity> {
    const out = await this.client.send(new AssumeRoleCommand({ RoleArn: roleArn, RoleSessionName: sessionName }));
    const c = out.Credentials;
    if (!c?.AccessKeyId || !c.SecretAccessKey || !c.SessionToken) {
      throw new CredentialError(`assume role ${roleArn} returned no credentials`);
    }
    return { accessKeyId: c.AccessKeyId, secretAccessKey: c.SecretAccessKey, sessionToken: c.SessionToken, expiration: c.Expiration };
  }

  async getCallerIdentity(): Promise<CallerIdentity> {
    const out = await this.client.send(new GetCallerIdentityCommand({}));
    return { account: out.Account ?? '', arn: out.Arn ?? '', userId: out.UserId ?? '' };
  }
}

export const stsIdentityService: IdentityServiceFactory = (credentials, region) => new StsIdentityService(credentials, region);

export function stsRegion(aws: AwsSettings): string {
  return aws.region || DEFAULT_STS_REGION;
}

/** Static key pair when both halves are configured, the SDK default chain otherwise. */
export function baseCredentials(aws: AwsSettings): AwsCredentialIdentityProvider {
  if (hasStaticCredentials(aws)) {
    const identity: AwsCredentialIdentity = { accessKeyId: aws.accessKeyId, secretAccessKey: aws.secretAccessKey };
    return async () => identity;
  }
  return fromNodeProviderChain();
}

export async function callerIdentity(aws: AwsSettings, factory: IdentityServiceFactory = stsIdentityService): Promise<CallerIdentity> {
  try {
    return await factory(baseCredentials(aws), stsRegion(aws)).getCallerIdentity();
  } catch (err) {
    if (err instanceof CredentialError) throw err;
    throw new CredentialError(`failed to get caller identity: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Presigned GET for sts:GetCallerIdentity with the cluster id as a signed header,
 * the request the EKS authenticator replays to learn who is calling.
 */
export async function presignCallerIdentity(credentials: AwsCredentialIdentityProvider, region: string, clusterName: string, signingDate?: Date): Promise<string> {
  const hostname = `sts.${region}.amazonaws.com`;
  const request = new HttpRequest({
    method: 'GET',
    protocol: 'https:',
    hostname,
    path: '/',
    query: { Action: 'GetCallerIdentity', Version: '2011-06-15' },
    headers: { host: hostname, [CLUSTER_ID_HEADER]: clusterName }
  });
  const signer = new SignatureV4({ credentials, region, service: 'sts', sha256: Sha256 });
  const signed = await signer.presign(request, { expiresIn: PRESIGN_EXPIRES_SECONDS, signingDate });
  return formatUrl(signed);
}
