/**
 * In-memory collectors for tracing tests.
 *
 * Capture emitted segment documents and log entries so tests can assert on
 * them without a collector backend.
 *
 * @module test/mockCollectors
 */

import type { LogEntry, LogLevel, Logger } from '../logging/index.js';
import { createLogger } from '../logging/index.js';
import type { SegmentDocument } from '../tracing/entities.js';
import type { SegmentEmitter } from '../tracing/recorder.js';

// ─── Segment Collector ───────────────────────────────────────────────────────

export interface MockSegmentCollector extends SegmentEmitter {
  /** All documents emitted so far. */
  readonly documents: ReadonlyArray<SegmentDocument>;
  clear(): void;
}

export function createMockSegmentCollector(): MockSegmentCollector {
  const documents: SegmentDocument[] = [];
  return {
    get documents() {
      return documents;
    },
    emit(document: SegmentDocument): void {
      documents.push(document);
    },
    clear(): void {
      documents.length = 0;
    },
  };
}

// ─── Log Collector ───────────────────────────────────────────────────────────

export interface MockLogCollector {
  readonly logger: Logger;
  readonly entries: ReadonlyArray<LogEntry>;
  /** Entries at the given level, in order. */
  atLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

export function createMockLogCollector(): MockLogCollector {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    service: 'test',
    level: 'debug',
    output: (entry) => entries.push(entry),
  });

  return {
    logger,
    get entries() {
      return entries;
    },
    atLevel(level: LogLevel): LogEntry[] {
      return entries.filter((e) => e.level === level);
    },
    clear(): void {
      entries.length = 0;
    },
  };
}
