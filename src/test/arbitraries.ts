/**
 * Fast-check arbitraries for property-based tests of the trace header
 * codec, the logger and the request interceptor.
 *
 * @module test/arbitraries
 */

import fc from 'fast-check';
import type { LogLevel } from '../logging/index.js';
import type { SampleDecision, TraceHeader } from '../tracing/traceHeader.js';

function hexArb(length: number): fc.Arbitrary<string> {
  return fc
    .uint8Array({ minLength: Math.ceil(length / 2), maxLength: Math.ceil(length / 2) })
    .map((bytes) =>
      Array.from(bytes, (b) => b.toString(16).padStart(2, '0'))
        .join('')
        .slice(0, length),
    );
}

/** Root trace ids in `1-<8 hex>-<24 hex>` form. */
export const rootTraceIdArb: fc.Arbitrary<string> = fc
  .tuple(hexArb(8), hexArb(24))
  .map(([epoch, random]) => `1-${epoch}-${random}`);

/** 16-hex entity ids. */
export const entityIdArb: fc.Arbitrary<string> = hexArb(16);

export const resolvedDecisionArb: fc.Arbitrary<SampleDecision> = fc.constantFrom(
  'Sampled',
  'NotSampled',
);

export const anyDecisionArb: fc.Arbitrary<SampleDecision> = fc.constantFrom(
  'Unknown',
  'Requested',
  'Sampled',
  'NotSampled',
);

/** Headers whose decision has been resolved. */
export const resolvedTraceHeaderArb: fc.Arbitrary<TraceHeader> = fc.record({
  rootTraceId: rootTraceIdArb,
  parentId: fc.option(entityIdArb, { nil: null }),
  sampled: resolvedDecisionArb,
});

/**
 * Strings that cannot be a valid header: no `Root=` key at all.
 */
export const headerWithoutRootArb: fc.Arbitrary<string> = fc
  .string({ maxLength: 80 })
  .filter((s) => !s.includes('Root'));

export const logLevelArb: fc.Arbitrary<LogLevel> = fc.constantFrom(
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
);

/** HTTP status codes a handler can answer with. */
export const statusCodeArb: fc.Arbitrary<number> = fc.integer({ min: 100, max: 599 });
