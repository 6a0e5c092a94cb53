/**
 * Tracing Module
 *
 * Request-scoped trace segments: propagation header codec, sampling
 * arbitration, segment lifecycle and HTTP attribute collection, wired
 * together by the request interceptor.
 */

export {
  type SampleDecision,
  type TraceHeader,
  type TraceHeaderParseResult,
  TRACE_HEADER_KEY,
  createFreshTraceHeader,
  deriveTraceHeader,
  isDecisionFinal,
  parseTraceHeader,
  serializeTraceHeader,
} from './traceHeader.js';

export {
  generateEntityId,
  generateRootTraceId,
  isValidEntityId,
  isValidRootTraceId,
} from './traceId.js';

export {
  type FixedRateSamplingOptions,
  type SamplingInput,
  type SamplingResponse,
  type SamplingStrategy,
  DEFAULT_RULE_NAME,
  DEFAULT_SAMPLING_RATE,
  createFixedRateSamplingStrategy,
  createSamplingInput,
} from './sampling.js';

export {
  type SamplingArbiter,
  type SamplingArbiterOptions,
  buildSamplingInput,
  createSamplingArbiter,
} from './samplingArbiter.js';

export {
  type Entity,
  type EntityDocument,
  type ExceptionInfo,
  type HttpAttributes,
  type HttpDirection,
  type SegmentDocument,
  Segment,
  Subsegment,
  isSegment,
} from './entities.js';

export {
  type EntityMarker,
  type MarkResult,
  addAutoInstrumentationMark,
  createEntityMarker,
  markEntityFromStatus,
} from './entityMarker.js';

export {
  type ContextMissingStrategy,
  type TraceContext,
  type TraceContextOptions,
  createTraceContext,
} from './traceContext.js';

export {
  type Recorder,
  type RecorderOptions,
  type SegmentEmitter,
  createLoggingEmitter,
  createRecorder,
} from './recorder.js';

export {
  type SegmentNamingStrategy,
  type TracingConfiguration,
  FixedSegmentNamingStrategy,
  createTracingConfiguration,
} from './segmentNaming.js';

export {
  type OpenSegmentParams,
  type SegmentLifecycle,
  type SegmentState,
  createSegmentLifecycle,
} from './segmentLifecycle.js';

export {
  type ClientAddress,
  collectRequestAttributes,
  collectResponseAttributes,
  resolveClientAddress,
} from './attributes.js';

export {
  type RequestContext,
  type RequestContextInit,
  type RequestView,
  type ResponseView,
  createRequestContext,
  getRequestHeader,
} from './requestContext.js';

export {
  type RequestInterceptor,
  type RequestInterceptorOptions,
  type RequestLifecycleHandlers,
  createRequestInterceptor,
} from './interceptor.js';

export { type Tracing, type TracingOverrides, initializeTracing } from './setup.js';

export { EntityNotAvailableError, EntityStateError, TracingConfigurationError } from './errors.js';
