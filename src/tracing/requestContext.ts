/**
 * Request Context
 *
 * Host-neutral views of a request and its response, plus the per-request
 * state the interceptor threads from begin to end. A context belongs to
 * exactly one request and is discarded with it.
 *
 * @module tracing/requestContext
 */

import type { Segment } from './entities.js';
import type { TraceHeader } from './traceHeader.js';

export type HeaderValue = string | string[] | undefined;

export interface RequestView {
  method: string;
  /** Absolute URL, including scheme and host when known. */
  url: string;
  /** Path portion of the URL, without the query string. */
  path: string;
  headers: Record<string, HeaderValue>;
  /** Address of the directly connected peer. */
  remoteAddress?: string;
}

export interface ResponseView {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string): void;
}

export interface RequestContext {
  readonly request: RequestView;
  response: ResponseView | null;
  /** Request-level exception reported by the host, if any. */
  error: unknown;
  /** When the host reported the request; becomes the segment start time. */
  readonly timestamp: Date;
  segment?: Segment;
  traceHeader?: TraceHeader;
}

export interface RequestContextInit {
  request: RequestView;
  response?: ResponseView | null;
  timestamp?: Date;
}

export function createRequestContext(init: RequestContextInit): RequestContext {
  return {
    request: init.request,
    response: init.response ?? null,
    error: undefined,
    timestamp: init.timestamp ?? new Date(),
  };
}

/**
 * Case-insensitive header lookup. Repeated headers are joined with `, `.
 * Returns undefined when the header is absent.
 */
export function getRequestHeader(request: RequestView, name: string): string | undefined {
  const lower = name.toLowerCase();
  let value: HeaderValue = request.headers[lower];
  if (value === undefined) {
    for (const [key, candidate] of Object.entries(request.headers)) {
      if (key.toLowerCase() === lower) {
        value = candidate;
        break;
      }
    }
  }
  if (Array.isArray(value)) return value.join(', ');
  return value;
}
