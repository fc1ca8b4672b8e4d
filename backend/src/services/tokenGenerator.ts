import { execFile as execFileCb } from 'child_process';
import { promisify } from 'util';
import type { AwsCredentialIdentityProvider } from '@smithy/types';
import { hasStaticCredentials, type AppConfig, type AwsSettings } from '../config.js';
import { CredentialError, ExternalToolError, TokenGenerationError, errorMessage, type StrategyFailure } from '../errors.js';
import { componentLogger } from '../logger.js';
import {
  baseCredentials,
  presignCallerIdentity,
  stsIdentityService,
  stsRegion,
  type IdentityServiceFactory
} from './identity.js';

const log = componentLogger('token');
const execFile = promisify(execFileCb);

export const TOKEN_PREFIX = 'k8s-aws-v1.';
export const CLUSTER_ID_PARAM = 'X-K8s-Aws-Id';
export const ROLE_SESSION_NAME = 'eks-cert-monitor-session';

export interface TokenStrategy {
  readonly name: string;
  generate(clusterName: string, roleArn?: string): Promise<string>;
}

/** Runs a command with the given environment and resolves with its stdout. */
export interface CommandRunner {
  invoke(command: string, args: string[], env: NodeJS.ProcessEnv, timeoutMs: number): Promise<string>;
}

export const execFileRunner: CommandRunner = {
  async invoke(command, args, env, timeoutMs) {
    const { stdout } = await execFile(command, args, { env, timeout: timeoutMs, maxBuffer: 1024 * 1024 });
    return stdout;
  }
};

export function encodeToken(url: string): string {
  return TOKEN_PREFIX + Buffer.from(url, 'utf-8').toString('base64url');
}

export function appendClusterId(url: string, clusterName: string): string {
  if (url.includes(CLUSTER_ID_PARAM)) return url;
  const separator = url.includes('?') ? '&' : '?';
  return `${url}${separator}${CLUSTER_ID_PARAM}=${clusterName}`;
}

export function helperEnvironment(base: NodeJS.ProcessEnv, aws: AwsSettings): NodeJS.ProcessEnv {
  if (!hasStaticCredentials(aws)) return { ...base };
  const env: NodeJS.ProcessEnv = { ...base, AWS_ACCESS_KEY_ID: aws.accessKeyId, AWS_SECRET_ACCESS_KEY: aws.secretAccessKey };
  if (aws.region) env.AWS_REGION = aws.region;
  return env;
}

function execCredentialToken(output: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (err) {
    throw new ExternalToolError(`failed to parse token helper output: ${errorMessage(err)}`, { cause: err });
  }
  if (typeof parsed === 'object' && parsed !== null && 'status' in parsed) {
    const status: unknown = parsed.status;
    if (typeof status === 'object' && status !== null && 'token' in status && typeof status.token === 'string' && status.token) {
      return status.token;
    }
  }
  throw new ExternalToolError('token helper output is not an ExecCredential with status.token');
}

/** Runs aws-iam-authenticator (or a compatible helper) and reads its ExecCredential. */
export class ExecCredentialStrategy implements TokenStrategy {
  readonly name = 'exec-credential';

  constructor(
    private readonly config: Pick<AppConfig, 'aws' | 'tokenHelper'>,
    private readonly runner: CommandRunner = execFileRunner,
    private readonly baseEnv: NodeJS.ProcessEnv = process.env
  ) {}

  async generate(clusterName: string, roleArn?: string): Promise<string> {
    const args = ['token', '-i', clusterName];
    if (roleArn) args.push('-r', roleArn);
    const { command, timeoutMs } = this.config.tokenHelper;
    let output: string;
    try {
      output = await this.runner.invoke(command, args, helperEnvironment(this.baseEnv, this.config.aws), timeoutMs);
    } catch (err) {
      throw new ExternalToolError(`failed to execute ${command}: ${errorMessage(err)}`, { cause: err });
    }
    return execCredentialToken(output);
  }
}

/** Builds the token itself from a presigned sts:GetCallerIdentity URL. */
export class PresignedUrlStrategy implements TokenStrategy {
  readonly name = 'presigned-url';

  constructor(
    private readonly aws: AwsSettings,
    private readonly identityService: IdentityServiceFactory = stsIdentityService,
    private readonly signingDate?: () => Date
  ) {}

  async generate(clusterName: string, roleArn?: string): Promise<string> {
    const region = stsRegion(this.aws);
    let credentials: AwsCredentialIdentityProvider = baseCredentials(this.aws);

    if (roleArn) {
      log.info({ roleArn }, 'assuming role');
      try {
        const assumed = await this.identityService(credentials, region).assumeRole(roleArn, ROLE_SESSION_NAME);
        credentials = async () => assumed;
      } catch (err) {
        throw new CredentialError(`failed to assume role ${roleArn}: ${errorMessage(err)}`, { cause: err });
      }
      log.info({ roleArn }, 'assumed role');
    }

    try {
      const who = await this.identityService(credentials, region).getCallerIdentity();
      log.info({ account: who.account, arn: who.arn, userId: who.userId }, 'caller identity');
    } catch (err) {
      throw new CredentialError(`failed to get caller identity: ${errorMessage(err)}`, { cause: err });
    }

    let url: string;
    try {
      url = await presignCallerIdentity(credentials, region, clusterName, this.signingDate?.());
    } catch (err) {
      throw new CredentialError(`failed to presign GetCallerIdentity: ${errorMessage(err)}`, { cause: err });
    }
    return encodeToken(appendClusterId(url, clusterName));
  }
}

export interface TokenGeneratorDeps {
  runner?: CommandRunner;
  identityService?: IdentityServiceFactory;
  baseEnv?: NodeJS.ProcessEnv;
}

/** Tries each strategy in order; the first token wins. No retries, no caching. */
export class ClusterTokenGenerator {
  constructor(private readonly strategies: readonly TokenStrategy[]) {}

  static fromConfig(config: Pick<AppConfig, 'aws' | 'tokenHelper'>, deps: TokenGeneratorDeps = {}): ClusterTokenGenerator {
    return new ClusterTokenGenerator([
      new ExecCredentialStrategy(config, deps.runner, deps.baseEnv),
      new PresignedUrlStrategy(config.aws, deps.identityService)
    ]);
  }

  async generateToken(clusterName: string, roleArn?: string): Promise<string> {
    const failures: StrategyFailure[] = [];
    for (const strategy of this.strategies) {
      try {
        return await strategy.generate(clusterName, roleArn);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        failures.push({ strategy: strategy.name, error });
        log.warn({ strategy: strategy.name, err: error.message }, 'token strategy failed');
      }
    }
    throw new TokenGenerationError(failures);
  }
}
