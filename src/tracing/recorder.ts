/**
 * Segment Recorder
 *
 * Owns segment storage for in-flight requests. Callers hold a {@link Segment}
 * handle between begin and end; the recorder tracks subsegments opened under
 * it and hands finished, sampled segments to a {@link SegmentEmitter}.
 *
 * @module tracing/recorder
 */

import type { Logger } from '../logging/index.js';
import { createLogger } from '../logging/index.js';
import type { Entity, HttpAttributes, HttpDirection, SegmentDocument } from './entities.js';
import { Segment, Subsegment } from './entities.js';
import { EntityNotAvailableError, toError } from './errors.js';
import type { SamplingResponse, SamplingStrategy } from './sampling.js';
import { createSamplingInput } from './sampling.js';
import type { SampleDecision } from './traceHeader.js';
import { isDecisionFinal } from './traceHeader.js';

export interface Recorder {
  readonly samplingStrategy: SamplingStrategy;
  /** Service origin reported to the sampling strategy (e.g. `AWS::EC2::Instance`). */
  readonly origin: string | undefined;
  beginSegment(
    name: string,
    rootTraceId: string,
    parentId: string | null,
    samplingResponse: SamplingResponse,
    startTime: Date,
  ): Segment;
  endSegment(segment: Segment): void;
  beginSubsegment(segment: Segment, name: string): Subsegment;
  endSubsegment(segment: Segment): void;
  addHttpInformation(segment: Segment, direction: HttpDirection, attributes: HttpAttributes): void;
  addException(segment: Segment, error: unknown): void;
  /**
   * The innermost open entity under the segment: the segment itself, or an
   * open subsegment. Throws {@link EntityNotAvailableError} when the segment
   * is not open.
   */
  getEntity(segment: Segment): Entity;
  isTracingDisabled(): boolean;
}

/**
 * Destination for finished segment documents.
 */
export interface SegmentEmitter {
  emit(document: SegmentDocument): void;
}

/**
 * Emitter that writes each document to the logger at debug level.
 */
export function createLoggingEmitter(logger: Logger): SegmentEmitter {
  const log = logger.child({ component: 'segment-emitter' });
  return {
    emit(document: SegmentDocument): void {
      log.debug('segment emitted', { segment: document });
    },
  };
}

export interface RecorderOptions {
  samplingStrategy: SamplingStrategy;
  logger?: Logger;
  /** Defaults to a logging emitter. */
  emitter?: SegmentEmitter;
  /** When true, segments are still tracked but never emitted. */
  tracingDisabled?: boolean;
  origin?: string;
  /** Clock used for end times. Defaults to Date.now. */
  now?: () => number;
}

interface OpenSegment {
  segment: Segment;
  subsegments: Subsegment[];
}

export function createRecorder(options: RecorderOptions): Recorder {
  const samplingStrategy = options.samplingStrategy;
  const logger = (options.logger ?? createLogger()).child({ component: 'recorder' });
  const emitter = options.emitter ?? createLoggingEmitter(logger);
  const tracingDisabled = options.tracingDisabled ?? false;
  const origin = options.origin;
  const now = options.now ?? Date.now;
  const open = new Map<string, OpenSegment>();

  function requireOpen(segment: Segment): OpenSegment {
    const state = open.get(segment.id);
    if (!state) {
      throw new EntityNotAvailableError(`segment ${segment.id} is not open`);
    }
    return state;
  }

  /** Resolve a decision the caller left open, using the segment name only. */
  function resolveDecision(name: string, response: SamplingResponse): SamplingResponse {
    if (isDecisionFinal(response.decision)) return response;
    try {
      const resolved = samplingStrategy.shouldTrace(
        createSamplingInput({ segmentName: name, serviceOrigin: origin }),
      );
      const decision: SampleDecision = isDecisionFinal(resolved.decision)
        ? resolved.decision
        : 'NotSampled';
      return { ruleName: response.ruleName ?? resolved.ruleName, decision };
    } catch (err) {
      logger.error('sampling strategy failed, segment not sampled', toError(err), {
        segmentName: name,
      });
      return { ruleName: response.ruleName, decision: 'NotSampled' };
    }
  }

  function emit(segment: Segment): void {
    if (tracingDisabled || segment.sampled !== 'Sampled') return;
    try {
      emitter.emit(segment.toDocument());
    } catch (err) {
      logger.error('failed to emit segment', toError(err), { segmentId: segment.id });
    }
  }

  return {
    samplingStrategy,
    origin,

    beginSegment(name, rootTraceId, parentId, samplingResponse, startTime) {
      const { ruleName, decision } = resolveDecision(name, samplingResponse);
      const segment = new Segment({
        name,
        traceId: rootTraceId,
        parentId,
        sampled: decision,
        ruleName,
        startTime: startTime.getTime(),
      });
      open.set(segment.id, { segment, subsegments: [] });
      logger.debug('segment started', {
        segmentId: segment.id,
        traceId: rootTraceId,
        sampled: decision,
      });
      return segment;
    },

    endSegment(segment) {
      const state = open.get(segment.id);
      if (!state) {
        logger.warn('segment already ended or unknown', { segmentId: segment.id });
        return;
      }
      const endTime = now();
      for (const sub of state.subsegments.reverse()) {
        sub.close(endTime);
      }
      segment.close(endTime);
      open.delete(segment.id);
      emit(segment);
    },

    beginSubsegment(segment, name) {
      const state = requireOpen(segment);
      const subsegment = new Subsegment(name, now());
      const parent = state.subsegments[state.subsegments.length - 1] ?? segment;
      parent.addSubsegment(subsegment);
      state.subsegments.push(subsegment);
      return subsegment;
    },

    endSubsegment(segment) {
      const state = requireOpen(segment);
      const subsegment = state.subsegments.pop();
      if (!subsegment) {
        throw new EntityNotAvailableError(`segment ${segment.id} has no open subsegment`);
      }
      subsegment.close(now());
    },

    addHttpInformation(segment, direction, attributes) {
      requireOpen(segment).segment.addHttpInformation(direction, attributes);
    },

    addException(segment, error) {
      requireOpen(segment).segment.addException(error);
    },

    getEntity(segment) {
      const state = requireOpen(segment);
      return state.subsegments[state.subsegments.length - 1] ?? state.segment;
    },

    isTracingDisabled() {
      return tracingDisabled;
    },
  };
}
