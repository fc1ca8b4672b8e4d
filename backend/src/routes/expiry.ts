import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errors.js';
import { discover } from '../services/discovery.js';
import { namespaceExpiryReport } from '../services/reports.js';
import { namespaceOf, warningDaysOf, type RouteContext } from './context.js';

export default function expiryRouter(ctx: RouteContext): Router {
  const router = Router();

  // GET /api/certificate-expiry?namespace=default&warning_days=30
  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const namespace = namespaceOf(req, ctx);
    const warningDays = warningDaysOf(req, ctx);
    const client = await ctx.clusterClient();
    const pods = await client.listPods(namespace);
    const report = await namespaceExpiryReport(namespace, pods, pod => discover(pod, namespace, client), warningDays);
    res.json({ status: 'success', message: `Certificate expiry analysis for namespace '${namespace}'`, ...report });
  }));

  return router;
}
