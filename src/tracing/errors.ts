/**
 * Tracing Errors
 *
 * Setup problems are thrown immediately. Everything that can go wrong while
 * a request is in flight is logged by the interceptor instead.
 *
 * @module tracing/errors
 */

/** Invalid arguments while wiring tracing (e.g. a missing naming strategy). */
export class TracingConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TracingConfigurationError';
  }
}

/** The recorder has no open entity for the given handle. */
export class EntityNotAvailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EntityNotAvailableError';
  }
}

/** An operation was attempted on an entity in the wrong state (e.g. already closed). */
export class EntityStateError extends Error {
  constructor(
    message: string,
    public readonly entityId: string,
  ) {
    super(message);
    this.name = 'EntityStateError';
  }
}

/** Normalise an unknown thrown value into an Error for logging. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  return new Error(describeThrown(value));
}

/** Circular values and bigints fall back to String(). */
function describeThrown(value: unknown): string {
  try {
    return JSON.stringify(value) ?? stringify(value);
  } catch {
    return stringify(value);
  }
}

function stringify(value: unknown): string {
  try {
    return String(value);
  } catch {
    // null-prototype objects have no toString
    return Object.prototype.toString.call(value);
  }
}
