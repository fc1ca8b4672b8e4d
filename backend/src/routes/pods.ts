import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errors.js';
import { discover } from '../services/discovery.js';
import { podCertificateReport, podInventory } from '../services/reports.js';
import { namespaceOf, warningDaysOf, type RouteContext } from './context.js';

export default function podsRouter(ctx: RouteContext): Router {
  const router = Router();

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    const namespace = namespaceOf(req, ctx);
    const client = await ctx.clusterClient();
    const pods = await client.listPods(namespace);
    res.json({
      status: 'success',
      message: `Retrieved certificate information for ${pods.length} pods in namespace '${namespace}'`,
      targetNamespace: namespace,
      clusterCaInfo: { length: client.details.trustAnchorPem.length, source: 'kubeconfig certificate-authority-data' },
      pods: podInventory(pods)
    });
  }));

  router.get('/:name/certificates', asyncHandler(async (req: Request, res: Response) => {
    const namespace = namespaceOf(req, ctx);
    const warningDays = warningDaysOf(req, ctx);
    const client = await ctx.clusterClient();
    const pod = await client.getPod(namespace, req.params.name);
    const sources = await discover(pod, namespace, client);
    res.json({
      status: 'success',
      message: `Certificate analysis for pod '${pod.name}' in namespace '${namespace}'`,
      ...podCertificateReport(pod.name, namespace, sources, warningDays)
    });
  }));

  return router;
}
