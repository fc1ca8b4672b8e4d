import type { Request } from 'express';
import { parseWarningDays, type AppConfig } from '../config.js';
import type { ClusterClientFactory } from '../kube/clusterClient.js';
import type { CallerIdentity } from '../services/identity.js';

export interface RouteContext {
  config: AppConfig;
  clusterClient: ClusterClientFactory;
  callerIdentity: () => Promise<CallerIdentity>;
}

export function queryString(req: Request, name: string): string | undefined {
  const v = req.query[name];
  return typeof v === 'string' && v.trim() ? v.trim() : undefined;
}

export function namespaceOf(req: Request, ctx: RouteContext): string {
  return queryString(req, 'namespace') ?? ctx.config.defaultNamespace;
}

export function warningDaysOf(req: Request, ctx: RouteContext): number {
  return parseWarningDays(req.query.warning_days, ctx.config.warningDays);
}
