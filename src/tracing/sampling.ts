/**
 * Sampling Types and Default Strategy
 *
 * The sampling strategy is an external collaborator; this module defines its
 * contract and ships a single-rule, fixed-rate strategy so the recorder works
 * without a rules engine.
 */

import type { SampleDecision } from './traceHeader.js';

export interface SamplingInput {
  readonly host?: string;
  readonly urlPath?: string;
  readonly httpMethod?: string;
  readonly segmentName?: string;
  readonly serviceOrigin?: string;
}

export interface SamplingResponse {
  /** Name of the rule that produced the decision, when a rule was evaluated. */
  ruleName: string | null;
  decision: SampleDecision;
}

export interface SamplingStrategy {
  shouldTrace(input: SamplingInput): SamplingResponse;
}

/** Build an immutable sampling input for one request. */
export function createSamplingInput(fields: SamplingInput): Readonly<SamplingInput> {
  return Object.freeze({ ...fields });
}

export interface FixedRateSamplingOptions {
  /**
   * Fraction of requests to sample, between 0.0 and 1.0.
   * Default: 0.05 (5%).
   */
  rate?: number;
  /**
   * Random number generator returning a value in [0, 1).
   * Defaults to Math.random; exposed for deterministic testing.
   */
  randomFn?: () => number;
}

export const DEFAULT_SAMPLING_RATE = 0.05;
export const DEFAULT_RULE_NAME = 'default';

/**
 * Clamp a value to the [0, 1] range.
 */
export function clampRate(rate: number): number {
  if (!Number.isFinite(rate)) return DEFAULT_SAMPLING_RATE;
  return Math.max(0, Math.min(1, rate));
}

/**
 * A strategy with one rule, `default`, that samples a fixed fraction of
 * requests regardless of host, path or method.
 */
export function createFixedRateSamplingStrategy(
  options: FixedRateSamplingOptions = {},
): SamplingStrategy & { readonly rate: number } {
  const rate = clampRate(options.rate ?? DEFAULT_SAMPLING_RATE);
  const randomFn = options.randomFn ?? Math.random;

  function shouldTrace(_input: SamplingInput): SamplingResponse {
    // Rate 0 → never sample, rate 1 → always sample (fast paths)
    let sampled: boolean;
    if (rate === 0) sampled = false;
    else if (rate === 1) sampled = true;
    else sampled = randomFn() < rate;

    return { ruleName: DEFAULT_RULE_NAME, decision: sampled ? 'Sampled' : 'NotSampled' };
  }

  return { rate, shouldTrace };
}
