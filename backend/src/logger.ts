import pino, { type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  name: 'eks-cert-monitor',
  level: process.env.LOG_LEVEL || 'info',
  redact: ['token', 'secretAccessKey', 'sessionToken', 'credentials.secretAccessKey', 'credentials.sessionToken']
});

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
