/**
 * Run Controller — HTTP Boundary for Collection Runs
 * Layer: Interfaces (HTTP)
 *
 * I keep this thin: validate the request, call CollectionService, send JSON.
 * POST /runs runs the collection synchronously and answers with the
 * RunResult, so a caller (cron, pipeline step) sees the outcome directly.
 * Arrow functions keep `this` bound when Express invokes them as handlers.
 */
import type { CollectionService } from '@application/services/CollectionService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { parseRequest } from '@interfaces/http/middleware/validation';
import {
  listRunsQuerySchema,
  runIdParamsSchema,
  startRunBodySchema,
} from '@interfaces/http/schemas/runSchemas';
import type { Request, Response } from 'express';

export class RunController {
  private service: CollectionService;

  constructor() {
    this.service = container.resolve<CollectionService>(TOKENS.CollectionService);
  }

  startRun = async (req: Request, res: Response): Promise<void> => {
    const overrides = parseRequest(startRunBodySchema, req.body ?? {});
    const result = await this.service.startRun(overrides);

    res.status(200).json({
      status: 'success',
      data: result,
      meta: { totalTimeMs: elapsed(req) },
    });
  };

  listRuns = async (req: Request, res: Response): Promise<void> => {
    const { limit } = parseRequest(listRunsQuerySchema, req.query);
    const runs = await this.service.listRuns(limit);

    res.status(200).json({
      status: 'success',
      data: runs,
      meta: { count: runs.length, totalTimeMs: elapsed(req) },
    });
  };

  getRun = async (req: Request, res: Response): Promise<void> => {
    const { runId } = parseRequest(runIdParamsSchema, req.params);
    const result = await this.service.getRun(runId);

    res.status(200).json({
      status: 'success',
      data: result,
    });
  };
}

function elapsed(req: Request): number | undefined {
  return req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;
}
