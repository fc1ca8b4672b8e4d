export type MalformedReason = 'not-pem' | 'wrong-block-type' | 'malformed-certificate' | 'no-valid-certificates';

export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

// Bad PEM/DER or wrong block type. Never retried.
export class MalformedInputError extends AppError {
  readonly reason: MalformedReason;

  constructor(reason: MalformedReason, message: string, options?: { cause?: unknown }) {
    super('MALFORMED_INPUT', 422, message, options);
    this.reason = reason;
  }
}

export class CredentialError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CREDENTIAL_FAILURE', 401, message, options);
  }
}

export class ExternalToolError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTERNAL_TOOL_FAILURE', 502, message, options);
  }
}

export class ClusterUnreachableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CLUSTER_UNREACHABLE', 502, message, options);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', 500, message, options);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NOT_FOUND', 404, message, options);
  }
}

export interface StrategyFailure {
  strategy: string;
  error: Error;
}

export class TokenGenerationError extends AppError {
  readonly failures: StrategyFailure[];

  constructor(failures: StrategyFailure[]) {
    const detail = failures.map(f => `${f.strategy}: ${f.error.message}`).join('; ');
    super('CREDENTIAL_FAILURE', 401, `failed to generate EKS token (${detail || 'no strategies configured'})`);
    this.failures = failures;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
