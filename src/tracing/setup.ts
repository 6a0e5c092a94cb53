/**
 * Tracing Setup
 *
 * Wires the default collaborators into a request interceptor. Components
 * passed in `overrides` replace the defaults; the naming configuration is
 * only set if it was not configured already.
 *
 * @module tracing/setup
 */

import type { TracingConfig } from '../config.js';
import type { Logger } from '../logging/index.js';
import { createLogger } from '../logging/index.js';
import type { EntityMarker } from './entityMarker.js';
import { createEntityMarker } from './entityMarker.js';
import type { RequestInterceptor } from './interceptor.js';
import { createRequestInterceptor } from './interceptor.js';
import type { Recorder, SegmentEmitter } from './recorder.js';
import { createRecorder } from './recorder.js';
import type { SamplingStrategy } from './sampling.js';
import { createFixedRateSamplingStrategy } from './sampling.js';
import type { TracingConfiguration } from './segmentNaming.js';
import { FixedSegmentNamingStrategy, createTracingConfiguration } from './segmentNaming.js';
import type { TraceContext } from './traceContext.js';
import { createTraceContext } from './traceContext.js';

export interface TracingOverrides {
  logger?: Logger;
  samplingStrategy?: SamplingStrategy;
  emitter?: SegmentEmitter;
  recorder?: Recorder;
  configuration?: TracingConfiguration;
  marker?: EntityMarker;
  traceContext?: TraceContext;
}

export interface Tracing {
  interceptor: RequestInterceptor;
  recorder: Recorder;
  configuration: TracingConfiguration;
  logger: Logger;
}

export function initializeTracing(config: TracingConfig, overrides: TracingOverrides = {}): Tracing {
  const logger =
    overrides.logger ?? createLogger({ service: config.serviceName, level: config.logLevel });

  const recorder =
    overrides.recorder ??
    createRecorder({
      samplingStrategy:
        overrides.samplingStrategy ?? createFixedRateSamplingStrategy({ rate: config.samplingRate }),
      logger,
      emitter: overrides.emitter,
      tracingDisabled: config.disabled,
      origin: config.origin,
    });

  const configuration = overrides.configuration ?? createTracingConfiguration();
  if (!configuration.isConfigured()) {
    configuration.configure(new FixedSegmentNamingStrategy(config.serviceName));
  }

  const interceptor = createRequestInterceptor({
    recorder,
    configuration,
    marker: overrides.marker ?? createEntityMarker(),
    traceContext:
      overrides.traceContext ??
      createTraceContext({ contextMissingStrategy: config.contextMissingStrategy, logger }),
    logger,
  });

  logger.info('request tracing initialized', {
    serviceName: config.serviceName,
    disabled: config.disabled,
    samplingRate: config.samplingRate,
  });

  return { interceptor, recorder, configuration, logger };
}
