import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_SAMPLING_RATE,
  clampRate,
  createFixedRateSamplingStrategy,
  createSamplingInput,
} from './sampling.js';

describe('clampRate', () => {
  it('clamps to [0, 1]', () => {
    expect(clampRate(-0.5)).toBe(0);
    expect(clampRate(1.5)).toBe(1);
    expect(clampRate(0.25)).toBe(0.25);
  });

  it('falls back to the default for non-finite values', () => {
    expect(clampRate(Number.NaN)).toBe(DEFAULT_SAMPLING_RATE);
    expect(clampRate(Number.POSITIVE_INFINITY)).toBe(DEFAULT_SAMPLING_RATE);
  });
});

describe('createSamplingInput', () => {
  it('returns a frozen copy', () => {
    const fields = { host: 'example.test', urlPath: '/orders', httpMethod: 'GET' };
    const input = createSamplingInput(fields);

    expect(input).toEqual(fields);
    expect(input).not.toBe(fields);
    expect(Object.isFrozen(input)).toBe(true);
  });
});

describe('createFixedRateSamplingStrategy', () => {
  it('defaults to a 5% rate', () => {
    expect(createFixedRateSamplingStrategy().rate).toBe(0.05);
  });

  it('samples when the random draw is below the rate', () => {
    const strategy = createFixedRateSamplingStrategy({ rate: 0.5, randomFn: () => 0.49 });
    expect(strategy.shouldTrace({})).toEqual({ ruleName: 'default', decision: 'Sampled' });
  });

  it('does not sample when the random draw reaches the rate', () => {
    const strategy = createFixedRateSamplingStrategy({ rate: 0.5, randomFn: () => 0.5 });
    expect(strategy.shouldTrace({})).toEqual({ ruleName: 'default', decision: 'NotSampled' });
  });

  it('never consults the random source at rate 0 or 1', () => {
    const randomFn = vi.fn(() => 0);
    expect(createFixedRateSamplingStrategy({ rate: 0, randomFn }).shouldTrace({}).decision).toBe(
      'NotSampled',
    );
    expect(createFixedRateSamplingStrategy({ rate: 1, randomFn }).shouldTrace({}).decision).toBe(
      'Sampled',
    );
    expect(randomFn).not.toHaveBeenCalled();
  });
});
