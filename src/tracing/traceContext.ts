/**
 * Trace Context
 *
 * Policy for what happens when code asks for the active entity of a request
 * and there is none.
 */

import type { Logger } from '../logging/index.js';
import type { Recorder } from './recorder.js';

export type ContextMissingStrategy = 'LOG_ERROR' | 'IGNORE_ERROR';

export const CONTEXT_MISSING_STRATEGIES: readonly ContextMissingStrategy[] = [
  'LOG_ERROR',
  'IGNORE_ERROR',
];

export interface TraceContext {
  readonly contextMissingStrategy: ContextMissingStrategy;
  handleEntityMissing(recorder: Recorder, error: Error, message: string): void;
}

export interface TraceContextOptions {
  /** Defaults to 'LOG_ERROR'. */
  contextMissingStrategy?: ContextMissingStrategy;
  logger: Logger;
}

export function isContextMissingStrategy(value: string): value is ContextMissingStrategy {
  return CONTEXT_MISSING_STRATEGIES.some((s) => s === value);
}

export function createTraceContext(options: TraceContextOptions): TraceContext {
  const contextMissingStrategy = options.contextMissingStrategy ?? 'LOG_ERROR';
  const logger = options.logger.child({ component: 'trace-context' });

  return {
    contextMissingStrategy,
    handleEntityMissing(recorder: Recorder, error: Error, message: string): void {
      if (contextMissingStrategy === 'IGNORE_ERROR') return;
      logger.error(message, error, { tracingDisabled: recorder.isTracingDisabled() });
    },
  };
}
