/**
 * Segment Naming
 *
 * A naming strategy turns a request into a segment name. The strategy is
 * configured once per process; later configuration attempts are ignored.
 *
 * @module tracing/segmentNaming
 */

import { TracingConfigurationError } from './errors.js';
import type { RequestView } from './requestContext.js';

export interface SegmentNamingStrategy {
  getSegmentName(request: RequestView): string;
}

/** Longest segment name the recorder accepts; longer names are truncated. */
export const MAX_SEGMENT_NAME_LENGTH = 200;

/**
 * Names every segment after the service, regardless of the request.
 */
export class FixedSegmentNamingStrategy implements SegmentNamingStrategy {
  readonly fixedName: string;

  constructor(fixedName: string) {
    const trimmed = fixedName.trim();
    if (trimmed.length === 0) {
      throw new TracingConfigurationError('segment name must not be empty');
    }
    this.fixedName = trimmed.slice(0, MAX_SEGMENT_NAME_LENGTH);
  }

  getSegmentName(_request: RequestView): string {
    return this.fixedName;
  }
}

export interface TracingConfiguration {
  /**
   * Set the naming strategy. Throws when none is given; a second call after a
   * successful one is a no-op and returns false.
   */
  configure(strategy: SegmentNamingStrategy | null | undefined): boolean;
  isConfigured(): boolean;
  /** Throws {@link TracingConfigurationError} when not yet configured. */
  getSegmentNamingStrategy(): SegmentNamingStrategy;
}

export function createTracingConfiguration(): TracingConfiguration {
  let namingStrategy: SegmentNamingStrategy | undefined;

  return {
    configure(strategy) {
      if (!strategy) {
        throw new TracingConfigurationError('segment naming strategy is required');
      }
      if (namingStrategy) return false;
      namingStrategy = strategy;
      return true;
    },
    isConfigured() {
      return namingStrategy !== undefined;
    },
    getSegmentNamingStrategy() {
      if (!namingStrategy) {
        throw new TracingConfigurationError('segment naming strategy has not been configured');
      }
      return namingStrategy;
    },
  };
}
