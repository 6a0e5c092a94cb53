/**
 * Property-based tests for level filtering and trace context propagation.
 *
 * - An entry is emitted exactly when its level is at or above the minimum.
 * - A child logger's trace context appears on every entry it writes.
 *
 * @module logging/logger.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createLogger, type LogEntry, type LogLevel, type LogOutput } from './logger.js';
import { entityIdArb, logLevelArb, rootTraceIdArb } from '../test/arbitraries.js';

const ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function createCapture(): { entries: LogEntry[]; output: LogOutput } {
  const entries: LogEntry[] = [];
  const output: LogOutput = (entry) => entries.push(entry);
  return { entries, output };
}

function write(logger: ReturnType<typeof createLogger>, level: LogLevel, message: string): void {
  switch (level) {
    case 'debug':
      logger.debug(message);
      break;
    case 'info':
      logger.info(message);
      break;
    case 'warn':
      logger.warn(message);
      break;
    case 'error':
      logger.error(message);
      break;
    case 'fatal':
      logger.fatal(message);
      break;
  }
}

describe('Logger level filtering', () => {
  it('emits an entry exactly when its level reaches the minimum', () => {
    fc.assert(
      fc.property(logLevelArb, logLevelArb, (minLevel, level) => {
        const { entries, output } = createCapture();
        const logger = createLogger({ level: minLevel, output });

        write(logger, level, 'probe');

        const expected = ORDER.indexOf(level) >= ORDER.indexOf(minLevel) ? 1 : 0;
        expect(entries).toHaveLength(expected);
      }),
    );
  });
});

describe('Logger trace context propagation', () => {
  it('stamps every entry of a child logger with its trace and segment ids', () => {
    fc.assert(
      fc.property(
        rootTraceIdArb,
        entityIdArb,
        fc.array(logLevelArb, { minLength: 1, maxLength: 10 }),
        (traceId, segmentId, levels) => {
          const { entries, output } = createCapture();
          const logger = createLogger({ level: 'debug', output }).child({ traceId, segmentId });

          for (const level of levels) write(logger, level, 'entry');

          expect(entries).toHaveLength(levels.length);
          for (const entry of entries) {
            expect(entry.traceId).toBe(traceId);
            expect(entry.segmentId).toBe(segmentId);
          }
        },
      ),
    );
  });
});
