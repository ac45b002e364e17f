/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/v1/health  →  { status: 'ok', uptime, timestamp, runInProgress }
 *
 * Liveness only: it does not call the Fabric API, the ingestion endpoint or
 * PostgreSQL. `runInProgress` tells a caller whether POST /runs would
 * currently answer 409.
 */
import type { CollectionService } from '@application/services/CollectionService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  const service = container.resolve<CollectionService>(TOKENS.CollectionService);
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    runInProgress: service.isRunning,
  });
});

export { router as healthRoutes };
