/**
 * Tracing Configuration
 *
 * Loaded from environment variables. Invalid values fall back to defaults
 * rather than failing startup.
 *
 * @module config
 */

import type { LogLevel } from './logging/index.js';
import { isLogLevel } from './logging/index.js';
import { DEFAULT_SAMPLING_RATE, clampRate } from './tracing/sampling.js';
import type { ContextMissingStrategy } from './tracing/traceContext.js';
import { isContextMissingStrategy } from './tracing/traceContext.js';

export interface TracingConfig {
  serviceName: string;
  /** When true, segments are opened and closed but nothing is recorded. */
  disabled: boolean;
  samplingRate: number;
  /** Service origin passed to the sampling strategy, e.g. `AWS::EC2::Instance`. */
  origin?: string;
  contextMissingStrategy: ContextMissingStrategy;
  logLevel: LogLevel;
}

export const DEFAULT_SERVICE_NAME = 'request-tracing';

export function loadTracingConfig(env: NodeJS.ProcessEnv = process.env): TracingConfig {
  const rawRate = parseFloat(env['TRACING_SAMPLING_RATE'] ?? String(DEFAULT_SAMPLING_RATE));
  const contextMissing = env['TRACING_CONTEXT_MISSING'] ?? 'LOG_ERROR';
  const logLevel = env['LOG_LEVEL'] ?? 'info';
  const origin = env['TRACING_ORIGIN'];
  const serviceName = (env['TRACING_SERVICE_NAME'] ?? env['SERVICE_NAME'] ?? '').trim();

  const config: TracingConfig = {
    serviceName: serviceName.length > 0 ? serviceName : DEFAULT_SERVICE_NAME,
    disabled: env['TRACING_DISABLED'] === 'true',
    samplingRate: clampRate(rawRate),
    contextMissingStrategy: isContextMissingStrategy(contextMissing) ? contextMissing : 'LOG_ERROR',
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
  if (origin !== undefined && origin.length > 0) config.origin = origin;
  return config;
}
