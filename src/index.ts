/**
 * Request tracing – package entry point.
 *
 * Re-exports the tracing core, the Express adapter, configuration loading
 * and the logger.
 *
 * @module request-tracing
 */

// ─── Tracing Core ───
export * from './tracing/index.js';

// ─── Express Adapter ───
export { requestTracing, tracingErrorHandler, toRequestView } from './middleware/tracingMiddleware.js';
export { createApp, type AppDependencies } from './app.js';

// ─── Configuration ───
export { type TracingConfig, DEFAULT_SERVICE_NAME, loadTracingConfig } from './config.js';

// ─── Logging ───
export * from './logging/index.js';
