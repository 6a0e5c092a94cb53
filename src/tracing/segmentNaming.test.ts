import { describe, it, expect } from 'vitest';
import {
  FixedSegmentNamingStrategy,
  MAX_SEGMENT_NAME_LENGTH,
  createTracingConfiguration,
} from './segmentNaming.js';
import type { SegmentNamingStrategy } from './segmentNaming.js';
import { TracingConfigurationError } from './errors.js';
import type { RequestView } from './requestContext.js';

const request: RequestView = {
  method: 'GET',
  url: 'http://shop.test/orders',
  path: '/orders',
  headers: { host: 'shop.test' },
};

describe('FixedSegmentNamingStrategy', () => {
  it('returns the configured name for every request', () => {
    const strategy = new FixedSegmentNamingStrategy('orders-service');
    expect(strategy.getSegmentName(request)).toBe('orders-service');
    expect(strategy.getSegmentName({ ...request, path: '/other' })).toBe('orders-service');
  });

  it('trims and truncates the name', () => {
    expect(new FixedSegmentNamingStrategy('  svc  ').fixedName).toBe('svc');
    expect(new FixedSegmentNamingStrategy('x'.repeat(250)).fixedName).toHaveLength(
      MAX_SEGMENT_NAME_LENGTH,
    );
  });

  it('rejects an empty name', () => {
    expect(() => new FixedSegmentNamingStrategy('   ')).toThrow(TracingConfigurationError);
  });
});

describe('TracingConfiguration', () => {
  it('stores the first strategy and ignores later ones', () => {
    const configuration = createTracingConfiguration();
    const first = new FixedSegmentNamingStrategy('first');
    const second = new FixedSegmentNamingStrategy('second');

    expect(configuration.isConfigured()).toBe(false);
    expect(configuration.configure(first)).toBe(true);
    expect(configuration.configure(second)).toBe(false);
    expect(configuration.getSegmentNamingStrategy()).toBe(first);
  });

  it('rejects a missing strategy at setup time', () => {
    const configuration = createTracingConfiguration();
    expect(() => configuration.configure(null)).toThrow(TracingConfigurationError);
    expect(() => configuration.configure(undefined)).toThrow(TracingConfigurationError);
    expect(configuration.isConfigured()).toBe(false);
  });

  it('throws when read before being configured', () => {
    expect(() => createTracingConfiguration().getSegmentNamingStrategy()).toThrow(
      'segment naming strategy has not been configured',
    );
  });

  it('accepts any naming strategy implementation', () => {
    const byHost: SegmentNamingStrategy = {
      getSegmentName: (req) => String(req.headers['host']),
    };
    const configuration = createTracingConfiguration();
    configuration.configure(byHost);
    expect(configuration.getSegmentNamingStrategy().getSegmentName(request)).toBe('shop.test');
  });
});
