/**
 * Express application factory with request tracing.
 *
 * Middleware is wired in order:
 * 1. Request tracing (opens the segment)
 * 2. Health check and the service's own routes
 * 3. Tracing error handler (records the exception on the segment)
 * 4. Global error handling
 *
 * @module app
 */

import express from 'express';
import type { Request, Response, NextFunction } from 'express';

import type { Logger } from './logging/index.js';
import { requestTracing, tracingErrorHandler } from './middleware/tracingMiddleware.js';
import type { RequestLifecycleHandlers } from './tracing/index.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

export interface AppDependencies {
  /** Receives the lifecycle events of every request. */
  interceptor: RequestLifecycleHandlers;

  logger: Logger;

  /** Registers the service's routes between tracing and error handling. */
  registerRoutes?: (app: express.Express) => void;
}

// ─── App Factory ─────────────────────────────────────────────────────────────

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const logger = deps.logger.child({ component: 'app' });

  app.use(requestTracing(deps.interceptor));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  deps.registerRoutes?.(app);

  app.use(tracingErrorHandler(deps.interceptor));

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error('unhandled error', err instanceof Error ? err : undefined, {
      method: req.method,
      url: req.originalUrl,
    });
    res.status(500).json({ error: 'Internal Server Error' });
  });

  return app;
}
