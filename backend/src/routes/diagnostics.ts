import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errors.js';
import { errorMessage } from '../errors.js';
import { awsConfigStatus, runAuthChecks } from '../services/diagnostics.js';
import type { RouteContext } from './context.js';

export default function diagnosticsRouter(ctx: RouteContext): Router {
  const router = Router();

  // Connect once and confirm the token is accepted
  router.get('/connect', asyncHandler(async (_req: Request, res: Response) => {
    const client = await ctx.clusterClient();
    await client.testConnection();
    const { details } = client;
    res.json({
      status: 'success',
      message: 'Successfully connected to Kubernetes cluster',
      clusterName: details.clusterName,
      clusterEndpoint: details.clusterEndpoint,
      region: details.region,
      defaultNamespace: ctx.config.defaultNamespace
    });
  }));

  router.get('/debug', asyncHandler(async (_req: Request, res: Response) => {
    const awsConfig = awsConfigStatus(ctx.config.aws);
    try {
      const { details } = await ctx.clusterClient();
      res.json({
        status: 'success',
        awsConfig,
        kubeconfigDetails: {
          clusterName: details.clusterName,
          clusterEndpoint: details.clusterEndpoint,
          region: details.region,
          roleArn: details.roleArn ?? null,
          trustAnchorLength: details.trustAnchorPem.length
        }
      });
    } catch (err) {
      res.json({ status: 'success', awsConfig, clientError: `Failed to create client: ${errorMessage(err)}` });
    }
  }));

  router.get('/auth', asyncHandler(async (_req: Request, res: Response) => {
    res.json(await runAuthChecks(ctx.config, ctx.clusterClient));
  }));

  return router;
}
