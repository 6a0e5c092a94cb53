/**
 * Trace Header Codec
 *
 * Parses and serializes the propagation header carried between services:
 *
 *   X-Amzn-Trace-Id: Root=1-5759e988-bd862e3fe1be46a994272793;Parent=53995c3f42cd8ad8;Sampled=1
 *
 * A header that cannot be parsed is never an error: the caller starts a new
 * trace instead, exactly as if no header had been sent.
 *
 * @module tracing/traceHeader
 */

import type { Logger } from '../logging/index.js';
import type { RequestView } from './requestContext.js';
import { getRequestHeader } from './requestContext.js';
import { generateRootTraceId, isValidEntityId, isValidRootTraceId } from './traceId.js';

export const TRACE_HEADER_KEY = 'X-Amzn-Trace-Id';

export type SampleDecision = 'Unknown' | 'Requested' | 'Sampled' | 'NotSampled';

export interface TraceHeader {
  rootTraceId: string;
  parentId: string | null;
  sampled: SampleDecision;
}

export type TraceHeaderParseResult = { ok: true; header: TraceHeader } | { ok: false };

const ROOT_KEY = 'Root';
const PARENT_KEY = 'Parent';
const SAMPLED_KEY = 'Sampled';

const SAMPLED_FLAGS = new Map<string, SampleDecision>([
  ['1', 'Sampled'],
  ['0', 'NotSampled'],
  ['?', 'Requested'],
]);

/** True once a decision has been made and must not be re-evaluated. */
export function isDecisionFinal(decision: SampleDecision): boolean {
  return decision === 'Sampled' || decision === 'NotSampled';
}

/**
 * Parse a raw header value. Returns `{ ok: false }` for null, empty or
 * malformed input.
 */
export function parseTraceHeader(value: string | null | undefined): TraceHeaderParseResult {
  if (value === null || value === undefined) return { ok: false };
  const trimmed = value.trim();
  if (trimmed.length === 0) return { ok: false };

  const fields = new Map<string, string>();
  for (const part of trimmed.split(';')) {
    const segment = part.trim();
    if (segment.length === 0) continue;

    const eq = segment.indexOf('=');
    if (eq <= 0) return { ok: false };

    const key = segment.slice(0, eq).trim();
    const fieldValue = segment.slice(eq + 1).trim();
    if (key !== ROOT_KEY && key !== PARENT_KEY && key !== SAMPLED_KEY) continue;
    if (fields.has(key)) return { ok: false };
    fields.set(key, fieldValue);
  }

  const rootTraceId = fields.get(ROOT_KEY);
  if (rootTraceId === undefined || !isValidRootTraceId(rootTraceId)) return { ok: false };

  const parentId = fields.get(PARENT_KEY);
  if (parentId !== undefined && !isValidEntityId(parentId)) return { ok: false };

  let sampled: SampleDecision = 'Unknown';
  const flag = fields.get(SAMPLED_KEY);
  if (flag !== undefined) {
    const decision = SAMPLED_FLAGS.get(flag);
    if (decision === undefined) return { ok: false };
    sampled = decision;
  }

  return {
    ok: true,
    header: { rootTraceId, parentId: parentId ?? null, sampled },
  };
}

function sampledFlag(decision: SampleDecision): string | null {
  switch (decision) {
    case 'Sampled':
      return '1';
    case 'NotSampled':
      return '0';
    case 'Requested':
      return '?';
    case 'Unknown':
      return null;
  }
}

/** Produce the canonical header string. */
export function serializeTraceHeader(header: TraceHeader): string {
  const parts = [`${ROOT_KEY}=${header.rootTraceId}`];
  if (header.parentId !== null) parts.push(`${PARENT_KEY}=${header.parentId}`);
  const flag = sampledFlag(header.sampled);
  if (flag !== null) parts.push(`${SAMPLED_KEY}=${flag}`);
  return parts.join(';');
}

/** A header for a request that starts a new trace. */
export function createFreshTraceHeader(nowMs?: number): TraceHeader {
  return {
    rootTraceId: generateRootTraceId(nowMs),
    parentId: null,
    sampled: 'Unknown',
  };
}

/**
 * Read the propagation header from a request, falling back to a fresh trace
 * when it is missing or invalid. Each call returns a new object.
 */
export function deriveTraceHeader(request: RequestView, logger?: Logger): TraceHeader {
  const raw = getRequestHeader(request, TRACE_HEADER_KEY);
  const result = parseTraceHeader(raw);
  if (result.ok) return result.header;

  logger?.debug('trace header missing or invalid, starting a new trace', {
    header: raw ?? null,
  });
  return createFreshTraceHeader();
}
