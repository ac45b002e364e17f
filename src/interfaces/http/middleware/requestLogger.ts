/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * Pino's HTTP plugin logs every request and response with method, URL,
 * status code and response time. It reuses the logger from core/logger.ts so
 * HTTP lines and collector lines share one format.
 *
 * Health probes are not logged: a load balancer polling every few seconds
 * would drown out the run logs. 4xx responses log at "warn", 5xx at "error".
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => req.url === '/api/v1/health',
  },
  customLogLevel: (_req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },
});
