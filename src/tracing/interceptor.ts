/**
 * Request Interceptor
 *
 * Binds the tracing pipeline to the three lifecycle events a host HTTP
 * server reports for each request:
 *
 * - begin-request: derive the trace header, decide sampling, open the
 *   segment and record request attributes.
 * - end-request: record the response and any exception, recover the final
 *   sampling decision, close the segment and, when the caller asked for it,
 *   return the resolved trace header.
 * - error: handled like begin-request, so a segment exists even when the
 *   host fails before begin-request fires.
 *
 * Tracing failures are logged and never reach the request.
 *
 * @module tracing/interceptor
 */

import type { Logger } from '../logging/index.js';
import { createLogger } from '../logging/index.js';
import { collectRequestAttributes, collectResponseAttributes } from './attributes.js';
import type { EntityMarker } from './entityMarker.js';
import { createEntityMarker } from './entityMarker.js';
import { toError } from './errors.js';
import type { Recorder } from './recorder.js';
import type { RequestContext, ResponseView } from './requestContext.js';
import type { SamplingResponse } from './sampling.js';
import { buildSamplingInput, createSamplingArbiter } from './samplingArbiter.js';
import type { SegmentLifecycle } from './segmentLifecycle.js';
import { createSegmentLifecycle } from './segmentLifecycle.js';
import type { TracingConfiguration } from './segmentNaming.js';
import type { TraceContext } from './traceContext.js';
import { createTraceContext } from './traceContext.js';
import type { TraceHeader } from './traceHeader.js';
import {
  TRACE_HEADER_KEY,
  deriveTraceHeader,
  isDecisionFinal,
  serializeTraceHeader,
} from './traceHeader.js';

export interface RequestLifecycleHandlers {
  onBeginRequest(ctx: RequestContext): void;
  onEndRequest(ctx: RequestContext): void;
  onError(ctx: RequestContext): void;
}

export interface RequestInterceptor extends RequestLifecycleHandlers {
  readonly lifecycle: SegmentLifecycle;
}

export interface RequestInterceptorOptions {
  recorder: Recorder;
  /** Must already hold a naming strategy. */
  configuration: TracingConfiguration;
  marker?: EntityMarker;
  traceContext?: TraceContext;
  logger?: Logger;
}

export function createRequestInterceptor(options: RequestInterceptorOptions): RequestInterceptor {
  const { recorder } = options;
  // Throws at setup time when naming was never configured.
  const namingStrategy = options.configuration.getSegmentNamingStrategy();
  const baseLogger = options.logger ?? createLogger();
  const logger = baseLogger.child({ component: 'request-interceptor' });
  const marker = options.marker ?? createEntityMarker();
  const traceContext = options.traceContext ?? createTraceContext({ logger: baseLogger });
  const arbiter = createSamplingArbiter({ strategy: recorder.samplingStrategy, logger: baseLogger });
  const lifecycle = createSegmentLifecycle({ recorder, marker, traceContext, logger: baseLogger });

  function beginRequest(ctx: RequestContext): void {
    if (ctx.segment) {
      logger.warn('request already has a segment, not opening another', {
        segmentId: ctx.segment.id,
      });
      return;
    }

    try {
      const { request } = ctx;
      const traceHeader = deriveTraceHeader(request, logger);
      const segmentName = namingStrategy.getSegmentName(request);

      let ruleName: string | null = null;
      if (!isDecisionFinal(traceHeader.sampled)) {
        const input = buildSamplingInput(request, segmentName, recorder.origin);
        ruleName = arbiter.decide(traceHeader, input).ruleName;
      }

      const samplingResponse: SamplingResponse = { ruleName, decision: traceHeader.sampled };
      const segment = lifecycle.open(ctx, { segmentName, traceHeader, samplingResponse });

      if (!recorder.isTracingDisabled()) {
        recorder.addHttpInformation(segment, 'request', collectRequestAttributes(request));
      }
    } catch (err) {
      logger.error('failed to begin request tracing', toError(err), { url: ctx.request.url });
    }
  }

  function recordOutcome(ctx: RequestContext): void {
    const segment = ctx.segment;
    if (!segment || segment.isClosed()) return;

    if (!recorder.isTracingDisabled() && ctx.response) {
      try {
        const attributes = collectResponseAttributes(ctx.response, segment, marker);
        recorder.addHttpInformation(segment, 'response', attributes);
      } catch (err) {
        logger.error('failed to record response attributes', toError(err), {
          segmentId: segment.id,
        });
      }
    }

    if (ctx.error !== undefined && ctx.error !== null) {
      try {
        recorder.addException(segment, ctx.error);
      } catch (err) {
        logger.error('failed to record request exception', toError(err), {
          segmentId: segment.id,
        });
      }
    }
  }

  function writeTraceHeader(response: ResponseView | null, traceHeader: TraceHeader): void {
    if (!response) return;
    if (response.headersSent) {
      logger.warn('response headers already sent, trace header not returned');
      return;
    }
    try {
      response.setHeader(TRACE_HEADER_KEY, serializeTraceHeader(traceHeader));
    } catch (err) {
      logger.error('failed to write trace header', toError(err));
    }
  }

  function endRequest(ctx: RequestContext): void {
    recordOutcome(ctx);

    // Fresh derivation: begin and end may run as unrelated host callbacks.
    const traceHeader = deriveTraceHeader(ctx.request, logger);
    const requested = traceHeader.sampled === 'Requested';

    lifecycle.resolveDecision(ctx, traceHeader);
    lifecycle.close(ctx);

    if (requested) writeTraceHeader(ctx.response, traceHeader);
  }

  return {
    lifecycle,
    onBeginRequest: beginRequest,
    onEndRequest: endRequest,
    onError: beginRequest,
  };
}
