import os from 'os';
import path from 'path';
import { ConfigError } from './errors.js';

export const DEFAULT_WARNING_DAYS = 30;

export interface AwsSettings {
  accessKeyId?: string;
  secretAccessKey?: string;
  region: string;
}

export interface AppConfig {
  aws: AwsSettings;
  kubeconfigPath: string;
  defaultNamespace: string;
  port: number;
  logLevel: string;
  tokenHelper: {
    command: string;
    timeoutMs: number;
  };
  warningDays: number;
}

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/u.test(raw)) return undefined;
  const n = parseInt(raw, 10);
  return n > 0 ? n : undefined;
}

// warning_days from a query string or env: anything but a positive integer falls back
export function parseWarningDays(raw: unknown, fallback = DEFAULT_WARNING_DAYS): number {
  if (typeof raw === 'number') return Number.isInteger(raw) && raw > 0 ? raw : fallback;
  if (typeof raw !== 'string') return fallback;
  return positiveInt(raw) ?? fallback;
}

export function hasStaticCredentials(aws: AwsSettings): aws is AwsSettings & { accessKeyId: string; secretAccessKey: string } {
  return !!aws.accessKeyId && !!aws.secretAccessKey;
}

// Neither half set means the default credential chain; one without the other is a mistake
export function awsSettingsProblem(aws: AwsSettings): string | undefined {
  if (aws.accessKeyId && !aws.secretAccessKey) return 'AWS_SECRET_ACCESS_KEY is required when AWS_ACCESS_KEY_ID is set';
  if (!aws.accessKeyId && aws.secretAccessKey) return 'AWS_ACCESS_KEY_ID is required when AWS_SECRET_ACCESS_KEY is set';
  return undefined;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const aws: AwsSettings = {
    accessKeyId: env.AWS_ACCESS_KEY_ID?.trim() || undefined,
    secretAccessKey: env.AWS_SECRET_ACCESS_KEY?.trim() || undefined,
    region: env.AWS_REGION || env.AWS_DEFAULT_REGION || ''
  };
  const problem = awsSettingsProblem(aws);
  if (problem) throw new ConfigError(problem);
  return {
    aws,
    kubeconfigPath: env.KUBECONFIG || path.join(os.homedir(), '.kube', 'config'),
    defaultNamespace: env.K8S_DEFAULT_NAMESPACE || 'default',
    port: positiveInt(env.PORT) ?? 8080,
    logLevel: env.LOG_LEVEL || 'info',
    tokenHelper: {
      command: env.TOKEN_HELPER_COMMAND || 'aws-iam-authenticator',
      timeoutMs: positiveInt(env.TOKEN_HELPER_TIMEOUT_MS) ?? 10_000
    },
    warningDays: parseWarningDays(env.CERT_WARNING_DAYS)
  };
}
