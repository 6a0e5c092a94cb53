/**
 * Sampling Arbiter
 *
 * Honors a decision made upstream, or asks the sampling strategy when the
 * caller left it open. The strategy's decision is written back into the
 * trace header; its rule name is only reported, never stored.
 *
 * @module tracing/samplingArbiter
 */

import type { Logger } from '../logging/index.js';
import { toError } from './errors.js';
import type { RequestView } from './requestContext.js';
import { getRequestHeader } from './requestContext.js';
import type { SamplingInput, SamplingResponse, SamplingStrategy } from './sampling.js';
import { createSamplingInput } from './sampling.js';
import type { TraceHeader } from './traceHeader.js';
import { isDecisionFinal } from './traceHeader.js';

export interface SamplingArbiter {
  decide(traceHeader: TraceHeader, input: SamplingInput): SamplingResponse;
}

export interface SamplingArbiterOptions {
  strategy: SamplingStrategy;
  logger: Logger;
}

export function buildSamplingInput(
  request: RequestView,
  segmentName: string,
  serviceOrigin: string | undefined,
): Readonly<SamplingInput> {
  return createSamplingInput({
    host: getRequestHeader(request, 'host'),
    urlPath: request.path,
    httpMethod: request.method,
    segmentName,
    serviceOrigin,
  });
}

export function createSamplingArbiter(options: SamplingArbiterOptions): SamplingArbiter {
  const { strategy } = options;
  const logger = options.logger.child({ component: 'sampling-arbiter' });

  function consultStrategy(input: SamplingInput): SamplingResponse {
    try {
      const response = strategy.shouldTrace(input);
      if (isDecisionFinal(response.decision)) return response;
      logger.warn('sampling strategy returned no decision, not sampling', {
        decision: response.decision,
        ruleName: response.ruleName,
      });
    } catch (err) {
      logger.error('sampling strategy failed, not sampling', toError(err), {
        segmentName: input.segmentName,
      });
    }
    return { ruleName: null, decision: 'NotSampled' };
  }

  return {
    decide(traceHeader, input) {
      if (isDecisionFinal(traceHeader.sampled)) {
        return { ruleName: null, decision: traceHeader.sampled };
      }
      const response = consultStrategy(input);
      traceHeader.sampled = response.decision;
      return response;
    },
  };
}
