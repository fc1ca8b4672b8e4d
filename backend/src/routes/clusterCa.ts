import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errors.js';
import { clusterCaExpiryReport } from '../services/reports.js';
import { warningDaysOf, type RouteContext } from './context.js';

const CA_MOUNT_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/ca.crt';

export default function clusterCaRouter(ctx: RouteContext): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const { details } = await ctx.clusterClient();
    res.json({
      status: 'success',
      message: 'Retrieved cluster CA certificate',
      caCertificate: { pemContent: details.trustAnchorPem, length: details.trustAnchorPem.length },
      source: 'kubeconfig certificate-authority-data',
      usage: `Mounted at ${CA_MOUNT_PATH} in every pod`,
      clusterInfo: { region: details.region, clusterEndpoint: details.clusterEndpoint, clusterName: details.clusterName }
    });
  }));

  router.get('/expiry', asyncHandler(async (req: Request, res: Response) => {
    const warningDays = warningDaysOf(req, ctx);
    const { details } = await ctx.clusterClient();
    res.json({
      status: 'success',
      message: 'Cluster CA certificate expiry analysis',
      ...clusterCaExpiryReport(details, warningDays),
      notes: [
        `Analysis performed with ${warningDays} day warning threshold`,
        'Use ?warning_days=N to customize the warning threshold'
      ]
    });
  }));

  return router;
}
