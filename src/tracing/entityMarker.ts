/**
 * Entity Marker
 *
 * Flags fault/error/throttle state from HTTP status codes and tags segments
 * created by automatic instrumentation. Marking never throws; the
 * auto-instrumentation mark reports failure as a result value.
 *
 * @module tracing/entityMarker
 */

import type { Entity } from './entities.js';
import { isSegment } from './entities.js';
import { EntityStateError } from './errors.js';

export type MarkResult = { ok: true } | { ok: false; error: Error };

export interface EntityMarker {
  markEntityFromStatus(entity: Entity, statusCode: number): void;
  addAutoInstrumentationMark(entity: Entity): MarkResult;
}

const TOO_MANY_REQUESTS = 429;

/**
 * 429 marks throttle and error, any other 4xx marks error, 5xx marks fault.
 */
export function markEntityFromStatus(entity: Entity, statusCode: number): void {
  if (statusCode >= 400 && statusCode < 500) {
    entity.markError();
    if (statusCode === TOO_MANY_REQUESTS) entity.markThrottle();
  } else if (statusCode >= 500 && statusCode < 600) {
    entity.markFault();
  }
}

export function addAutoInstrumentationMark(entity: Entity): MarkResult {
  if (!isSegment(entity)) {
    return {
      ok: false,
      error: new EntityStateError('auto-instrumentation mark requires a segment', entity.id),
    };
  }
  if (entity.isClosed()) {
    return { ok: false, error: new EntityStateError('segment already closed', entity.id) };
  }
  entity.markAutoInstrumented();
  return { ok: true };
}

export function createEntityMarker(): EntityMarker {
  return { markEntityFromStatus, addAutoInstrumentationMark };
}
