/**
 * Run Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/runs` in app.ts:
 *
 *   POST /api/v1/runs          →  controller.startRun   (409 while a run is active)
 *   GET  /api/v1/runs?limit=20 →  controller.listRuns
 *   GET  /api/v1/runs/:runId   →  controller.getRun     (404 if unknown)
 */
import { Router } from 'express';
import { RunController } from '@interfaces/http/controllers/RunController';

const router = Router();
const controller = new RunController();

router.post('/', controller.startRun);
router.get('/', controller.listRuns);
router.get('/:runId', controller.getRun);

export { router as runRoutes };
