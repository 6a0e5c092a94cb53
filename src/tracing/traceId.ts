/**
 * Trace and entity identifiers.
 *
 * Root trace ids follow the `1-<epoch>-<random>` layout: a version digit,
 * 8 hex characters of epoch seconds, then 24 random hex characters.
 * Entity ids (segments and subsegments) are 16 hex characters.
 */

import { randomBytes } from 'node:crypto';

const ROOT_TRACE_ID_PATTERN = /^1-[0-9a-f]{8}-[0-9a-f]{24}$/;
const ENTITY_ID_PATTERN = /^[0-9a-f]{16}$/;

function generateHexId(byteLength: number): string {
  return randomBytes(byteLength).toString('hex');
}

/**
 * Generate a new root trace id, stamped with the given time (defaults to now).
 */
export function generateRootTraceId(nowMs: number = Date.now()): string {
  const epochHex = Math.floor(nowMs / 1000)
    .toString(16)
    .padStart(8, '0');
  return `1-${epochHex}-${generateHexId(12)}`;
}

/** Generate a 16-character hex id for a segment or subsegment. */
export function generateEntityId(): string {
  return generateHexId(8);
}

export function isValidRootTraceId(value: string): boolean {
  return ROOT_TRACE_ID_PATTERN.test(value);
}

export function isValidEntityId(value: string): boolean {
  return ENTITY_ID_PATTERN.test(value);
}
