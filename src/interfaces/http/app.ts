/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Assembles the Express application from middleware and routes. A factory
 * rather than a singleton so integration tests can build a fresh app after
 * overriding container registrations.
 *
 * Middleware ordering (an assembly line):
 *   1. requestTimer  — Records req.requestStartTime for meta.totalTimeMs.
 *   2. helmet()      — Security headers.
 *   3. cors()        — Cross-origin access for dashboards and tooling.
 *   4. compression() — Gzips responses (run results can be large).
 *   5. express.json()— Parses JSON request bodies into req.body.
 *   6. requestLogger — Logs every request/response with timing.
 *   7. Routes        — Health and runs.
 *   8. errorHandler  — MUST be last; catches errors from all routes above.
 *
 * The `import '@core/container'` side-effect import bootstraps the DI
 * container before any route module resolves from it.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { runRoutes } from '@interfaces/http/routes/runRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Request timing (must be first)
  app.use(requestTimer);

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing (run overrides are tiny)
  app.use(express.json({ limit: '16kb' }));

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/runs', runRoutes);

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
