/**
 * Tracing Middleware
 *
 * Express-compatible adapter that turns the request pipeline into the
 * interceptor's lifecycle events:
 *
 * - begin-request when the middleware runs (its timestamp is the segment
 *   start time),
 * - end-request right before the response headers are written, so the
 *   trace header can still be returned, or when the connection closes
 *   without a response,
 * - error from the error-handling middleware.
 *
 * @module middleware/tracingMiddleware
 */

import type { RequestContext, RequestView } from '../tracing/requestContext.js';
import { createRequestContext } from '../tracing/requestContext.js';
import type { RequestLifecycleHandlers } from '../tracing/interceptor.js';

// ── Express-compatible types (avoid hard dep on @types/express) ─────────────

interface Request {
  method: string;
  url: string;
  originalUrl?: string;
  protocol?: string;
  headers: Record<string, string | string[] | undefined>;
  socket?: { remoteAddress?: string };
  tracing?: RequestContext;
}

interface Response {
  statusCode: number;
  headersSent: boolean;
  setHeader(name: string, value: string): unknown;
  writeHead(...args: unknown[]): unknown;
  once(event: 'close', listener: () => void): unknown;
}

type NextFunction = (err?: unknown) => void;
type Middleware = (req: Request, res: Response, next: NextFunction) => void;
type ErrorMiddleware = (err: unknown, req: Request, res: Response, next: NextFunction) => void;

// ── Request view ────────────────────────────────────────────────────────────

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function toRequestView(req: Request): RequestView {
  const target = req.originalUrl ?? req.url;
  const host = firstHeader(req.headers['host']);
  const protocol = req.protocol ?? 'http';
  const queryStart = target.indexOf('?');

  return {
    method: req.method,
    url: host ? `${protocol}://${host}${target}` : target,
    path: queryStart === -1 ? target : target.slice(0, queryStart),
    headers: req.headers,
    remoteAddress: req.socket?.remoteAddress,
  };
}

/**
 * Create the request's tracing context and arrange for end-request to fire
 * exactly once.
 */
function attachContext(
  req: Request,
  res: Response,
  interceptor: RequestLifecycleHandlers,
): RequestContext {
  const ctx = createRequestContext({
    request: toRequestView(req),
    response: res,
    timestamp: new Date(),
  });
  req.tracing = ctx;

  let ended = false;
  const end = (): void => {
    if (ended) return;
    ended = true;
    interceptor.onEndRequest(ctx);
  };

  const writeHead = res.writeHead;
  res.writeHead = (...args: unknown[]): unknown => {
    const [statusCode] = args;
    if (typeof statusCode === 'number') res.statusCode = statusCode;
    end();
    return writeHead.apply(res, args);
  };
  res.once('close', end);

  return ctx;
}

// ── Middleware ──────────────────────────────────────────────────────────────

/**
 * Opens a trace segment for each request. Mount before any route.
 */
export function requestTracing(interceptor: RequestLifecycleHandlers): Middleware {
  return (req: Request, res: Response, next: NextFunction): void => {
    const ctx = attachContext(req, res, interceptor);
    interceptor.onBeginRequest(ctx);
    next();
  };
}

/**
 * Records the error on the request's trace context and passes it on.
 * Mount after the routes and before the application's own error handler.
 */
export function tracingErrorHandler(interceptor: RequestLifecycleHandlers): ErrorMiddleware {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    const ctx = req.tracing ?? attachContext(req, res, interceptor);
    ctx.error = err;
    interceptor.onError(ctx);
    next(err);
  };
}
