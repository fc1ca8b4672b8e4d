import express from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import type { AppConfig } from './config.js';
import { createClusterClient, type ClusterClientFactory } from './kube/clusterClient.js';
import { callerIdentity, type CallerIdentity } from './services/identity.js';
import { errorHandler } from './middleware/errors.js';
import { logger } from './logger.js';
import { openapiSpec } from './openapi.js';
import clusterCaRouter from './routes/clusterCa.js';
import podsRouter from './routes/pods.js';
import expiryRouter from './routes/expiry.js';
import identityRouter from './routes/identity.js';
import diagnosticsRouter from './routes/diagnostics.js';
import type { RouteContext } from './routes/context.js';

export interface AppOptions {
  config: AppConfig;
  // a fresh client (and token) per request unless a test supplies its own
  clusterClient?: ClusterClientFactory;
  callerIdentity?: () => Promise<CallerIdentity>;
}

export function createApp(opts: AppOptions): express.Express {
  const ctx: RouteContext = {
    config: opts.config,
    clusterClient: opts.clusterClient ?? (() => createClusterClient(opts.config)),
    callerIdentity: opts.callerIdentity ?? (() => callerIdentity(opts.config.aws))
  };

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/healthz', (_req: express.Request, res: express.Response) => res.json({ status: 'ok' }));
  app.get('/api/docs.json', (_req, res) => res.json(openapiSpec));
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openapiSpec, { explorer: true }));
  app.use('/api/cluster-ca', clusterCaRouter(ctx));
  app.use('/api/pods', podsRouter(ctx));
  app.use('/api/certificate-expiry', expiryRouter(ctx));
  app.use('/api/identity', identityRouter(ctx));
  app.use('/api/diagnostics', diagnosticsRouter(ctx));
  app.use(errorHandler(logger.child({ component: 'http' })));
  return app;
}
