import { Router, Request, Response } from 'express';
import { asyncHandler } from '../middleware/errors.js';
import type { RouteContext } from './context.js';

export default function identityRouter(ctx: RouteContext): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const identity = await ctx.callerIdentity();
    res.json({ status: 'success', identity });
  }));

  return router;
}
