import { describe, it, expect, vi } from 'vitest';
import { buildSamplingInput, createSamplingArbiter } from './samplingArbiter.js';
import type { SamplingInput, SamplingResponse, SamplingStrategy } from './sampling.js';
import type { SampleDecision, TraceHeader } from './traceHeader.js';
import { createMockLogCollector } from '../test/mockCollectors.js';

const ROOT = '1-5759e988-bd862e3fe1be46a994272793';

function header(sampled: SampleDecision): TraceHeader {
  return { rootTraceId: ROOT, parentId: null, sampled };
}

function stubStrategy(response: SamplingResponse) {
  const shouldTrace = vi.fn((_input: SamplingInput): SamplingResponse => response);
  const strategy: SamplingStrategy = { shouldTrace };
  return { strategy, shouldTrace };
}

describe('buildSamplingInput', () => {
  it('collects host, path, method, segment name and origin', () => {
    const input = buildSamplingInput(
      {
        method: 'POST',
        url: 'http://shop.test/orders?id=1',
        path: '/orders',
        headers: { host: 'shop.test' },
      },
      'orders-service',
      'AWS::EC2::Instance',
    );

    expect(input).toEqual({
      host: 'shop.test',
      urlPath: '/orders',
      httpMethod: 'POST',
      segmentName: 'orders-service',
      serviceOrigin: 'AWS::EC2::Instance',
    });
    expect(Object.isFrozen(input)).toBe(true);
  });
});

describe('SamplingArbiter', () => {
  it.each<SampleDecision>(['Sampled', 'NotSampled'])(
    'passes an upstream %s decision through without consulting the strategy',
    (decision) => {
      const { strategy, shouldTrace } = stubStrategy({ ruleName: 'r', decision: 'Sampled' });
      const arbiter = createSamplingArbiter({ strategy, logger: createMockLogCollector().logger });
      const traceHeader = header(decision);

      expect(arbiter.decide(traceHeader, {})).toEqual({ ruleName: null, decision });
      expect(traceHeader.sampled).toBe(decision);
      expect(shouldTrace).not.toHaveBeenCalled();
    },
  );

  it.each<SampleDecision>(['Unknown', 'Requested'])(
    'asks the strategy for a %s decision and writes the result into the header',
    (decision) => {
      const { strategy, shouldTrace } = stubStrategy({ ruleName: 'default', decision: 'Sampled' });
      const arbiter = createSamplingArbiter({ strategy, logger: createMockLogCollector().logger });
      const traceHeader = header(decision);
      const input = { segmentName: 'svc' };

      expect(arbiter.decide(traceHeader, input)).toEqual({
        ruleName: 'default',
        decision: 'Sampled',
      });
      expect(traceHeader.sampled).toBe('Sampled');
      expect(shouldTrace).toHaveBeenCalledOnce();
      expect(shouldTrace).toHaveBeenCalledWith(input);
    },
  );

  it('falls back to NotSampled and logs when the strategy throws', () => {
    const logs = createMockLogCollector();
    const strategy: SamplingStrategy = {
      shouldTrace: () => {
        throw new Error('rules unavailable');
      },
    };
    const arbiter = createSamplingArbiter({ strategy, logger: logs.logger });
    const traceHeader = header('Unknown');

    expect(arbiter.decide(traceHeader, { segmentName: 'svc' })).toEqual({
      ruleName: null,
      decision: 'NotSampled',
    });
    expect(traceHeader.sampled).toBe('NotSampled');

    const errors = logs.atLevel('error');
    expect(errors).toHaveLength(1);
    expect(errors[0]!.error?.message).toBe('rules unavailable');
    expect(errors[0]!.component).toBe('sampling-arbiter');
  });

  it('falls back to NotSampled when the strategy returns no decision', () => {
    const logs = createMockLogCollector();
    const { strategy } = stubStrategy({ ruleName: 'odd', decision: 'Requested' });
    const arbiter = createSamplingArbiter({ strategy, logger: logs.logger });
    const traceHeader = header('Requested');

    expect(arbiter.decide(traceHeader, {})).toEqual({ ruleName: null, decision: 'NotSampled' });
    expect(traceHeader.sampled).toBe('NotSampled');
    expect(logs.atLevel('warn')).toHaveLength(1);
  });
});
