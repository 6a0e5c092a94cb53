/**
 * Segment Lifecycle Controller
 *
 * Drives each request's segment through `Idle → Open → Closed`. Opening is
 * idempotent per request context, closing happens at most once, and nothing
 * that fails in between (marking, decision recovery) may prevent the close.
 *
 * @module tracing/segmentLifecycle
 */

import type { Logger } from '../logging/index.js';
import type { Entity, Segment } from './entities.js';
import { isSegment } from './entities.js';
import type { EntityMarker, MarkResult } from './entityMarker.js';
import { EntityNotAvailableError, toError } from './errors.js';
import type { Recorder } from './recorder.js';
import type { RequestContext } from './requestContext.js';
import type { SamplingResponse } from './sampling.js';
import type { TraceContext } from './traceContext.js';
import type { TraceHeader } from './traceHeader.js';
import { isDecisionFinal } from './traceHeader.js';

export type SegmentState = 'Idle' | 'Open' | 'Closed';

export interface OpenSegmentParams {
  segmentName: string;
  traceHeader: TraceHeader;
  samplingResponse: SamplingResponse;
}

export interface SegmentLifecycle {
  /** Open the request's segment, or return the one already open. */
  open(ctx: RequestContext, params: OpenSegmentParams): Segment;
  /**
   * Fold the decision the recorder actually used back into an unresolved
   * header. Failures are logged and leave the header unchanged.
   */
  resolveDecision(ctx: RequestContext, traceHeader: TraceHeader): void;
  /** Close the request's segment. Returns false when there was nothing to close. */
  close(ctx: RequestContext): boolean;
  state(ctx: RequestContext): SegmentState;
}

export interface SegmentLifecycleOptions {
  recorder: Recorder;
  marker: EntityMarker;
  traceContext: TraceContext;
  logger: Logger;
}

const ENTITY_MISSING_MESSAGE =
  'Failed to get entity since it is not available in trace context while processing request.';

export function createSegmentLifecycle(options: SegmentLifecycleOptions): SegmentLifecycle {
  const { recorder, marker, traceContext } = options;
  const logger = options.logger.child({ component: 'segment-lifecycle' });

  function state(ctx: RequestContext): SegmentState {
    if (!ctx.segment) return 'Idle';
    return ctx.segment.isClosed() ? 'Closed' : 'Open';
  }

  function open(ctx: RequestContext, params: OpenSegmentParams): Segment {
    if (ctx.segment) {
      logger.warn('segment already opened for request, ignoring', {
        segmentId: ctx.segment.id,
        state: state(ctx),
      });
      return ctx.segment;
    }

    const { segmentName, traceHeader, samplingResponse } = params;
    const segment = recorder.beginSegment(
      segmentName,
      traceHeader.rootTraceId,
      traceHeader.parentId,
      samplingResponse,
      ctx.timestamp,
    );
    ctx.segment = segment;
    ctx.traceHeader = traceHeader;

    const mark = markSegment(segment);
    if (!mark.ok) {
      logger.warn('failed to mark segment as auto-instrumented', {
        segmentId: segment.id,
        reason: mark.error.message,
      });
    }
    return segment;
  }

  /** A marker that throws is reported like one that returns a failure. */
  function markSegment(segment: Segment): MarkResult {
    try {
      return marker.addAutoInstrumentationMark(segment);
    } catch (err) {
      return { ok: false, error: toError(err) };
    }
  }

  /** The recorder's active entity, or undefined after reporting it missing. */
  function lookupEntity(segment: Segment): Entity | undefined {
    try {
      return recorder.getEntity(segment);
    } catch (err) {
      if (err instanceof EntityNotAvailableError) {
        traceContext.handleEntityMissing(recorder, err, ENTITY_MISSING_MESSAGE);
        return undefined;
      }
      throw err;
    }
  }

  function resolveDecision(ctx: RequestContext, traceHeader: TraceHeader): void {
    if (isDecisionFinal(traceHeader.sampled)) return;

    try {
      if (!ctx.segment) {
        traceContext.handleEntityMissing(
          recorder,
          new EntityNotAvailableError('no segment was opened for this request'),
          ENTITY_MISSING_MESSAGE,
        );
        return;
      }

      const entity = lookupEntity(ctx.segment);
      if (!entity) return;

      if (!isSegment(entity)) {
        logger.error(
          'failed to read the sampling decision for the response',
          new EntityNotAvailableError('active entity is not a segment'),
          { entityId: entity.id, entityType: entity.type },
        );
        return;
      }

      traceHeader.sampled = entity.sampled;
    } catch (err) {
      logger.error('sampling decision recovery failed', toError(err));
    }
  }

  function close(ctx: RequestContext): boolean {
    const segment = ctx.segment;
    if (!segment) {
      logger.warn('no segment to close for request', { url: ctx.request.url });
      return false;
    }
    if (segment.isClosed()) return false;

    try {
      recorder.endSegment(segment);
    } catch (err) {
      logger.error('failed to end segment', toError(err), { segmentId: segment.id });
    }
    return true;
  }

  return { open, resolveDecision, close, state };
}
