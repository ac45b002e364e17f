/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps `req.requestStartTime` as the request enters the pipeline. The run
 * controller reports `meta.totalTimeMs` from it, which for POST /runs is the
 * wall-clock length of the whole collection run.
 *
 * Registered first so the measurement includes body parsing and logging.
 */
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
