import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { AppError } from '../errors.js';
import type { Logger } from '../logger.js';

// Express 4 does not catch rejected handler promises
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    if (err instanceof AppError) {
      if (err.status >= 500) log.error({ err, path: req.path }, err.message);
      else log.warn({ code: err.code, path: req.path }, err.message);
      res.status(err.status).json({ status: 'error', code: err.code, error: err.message });
      return;
    }
    log.error({ err, path: req.path }, 'unhandled error');
    res.status(500).json({ status: 'error', error: 'internal error' });
  };
}
