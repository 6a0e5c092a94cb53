/**
 * Trace Entities
 *
 * Segments record one service's handling of one request; subsegments record
 * work done inside it. Both serialize to the segment document format, with
 * times expressed in epoch seconds.
 *
 * @module tracing/entities
 */

import { EntityStateError, toError } from './errors.js';
import { generateEntityId } from './traceId.js';
import type { SampleDecision } from './traceHeader.js';

export type HttpDirection = 'request' | 'response';
export type HttpAttributes = Record<string, string | number | boolean>;

export interface ExceptionInfo {
  id: string;
  type: string;
  message: string;
  stack?: string;
}

export interface EntityDocument {
  name: string;
  id: string;
  start_time: number;
  end_time?: number;
  in_progress?: boolean;
  fault?: boolean;
  error?: boolean;
  throttle?: boolean;
  cause?: { exceptions: ExceptionInfo[] };
  subsegments?: EntityDocument[];
}

export interface SegmentDocument extends EntityDocument {
  trace_id: string;
  parent_id?: string;
  http?: Partial<Record<HttpDirection, HttpAttributes>>;
  aws: {
    xray: {
      auto_instrumentation?: boolean;
      sampling_rule_name?: string;
    };
  };
}

export abstract class BaseEntity {
  abstract readonly type: 'segment' | 'subsegment';
  readonly id: string;
  readonly name: string;
  readonly startTime: number;

  private _endTime?: number;
  private _fault = false;
  private _error = false;
  private _throttle = false;
  private readonly _exceptions: ExceptionInfo[] = [];
  private readonly _subsegments: Subsegment[] = [];

  constructor(name: string, startTime: number) {
    this.id = generateEntityId();
    this.name = name;
    this.startTime = startTime;
  }

  get endTime(): number | undefined {
    return this._endTime;
  }

  get fault(): boolean {
    return this._fault;
  }

  get error(): boolean {
    return this._error;
  }

  get throttle(): boolean {
    return this._throttle;
  }

  get exceptions(): readonly ExceptionInfo[] {
    return this._exceptions;
  }

  get subsegments(): readonly Subsegment[] {
    return this._subsegments;
  }

  isClosed(): boolean {
    return this._endTime !== undefined;
  }

  close(endTime: number = Date.now()): void {
    if (this.isClosed()) throw new EntityStateError(`${this.type} already closed`, this.id);
    this._endTime = endTime;
  }

  markFault(): void {
    this._fault = true;
  }

  markError(): void {
    this._error = true;
  }

  markThrottle(): void {
    this._throttle = true;
  }

  addException(value: unknown): void {
    const err = toError(value);
    this._exceptions.push({
      id: generateEntityId(),
      type: err.name,
      message: err.message,
      stack: err.stack,
    });
  }

  addSubsegment(subsegment: Subsegment): void {
    this._subsegments.push(subsegment);
  }

  protected baseDocument(): EntityDocument {
    const doc: EntityDocument = {
      name: this.name,
      id: this.id,
      start_time: this.startTime / 1000,
    };

    if (this._endTime === undefined) doc.in_progress = true;
    else doc.end_time = this._endTime / 1000;

    if (this._fault) doc.fault = true;
    if (this._error) doc.error = true;
    if (this._throttle) doc.throttle = true;
    if (this._exceptions.length > 0) doc.cause = { exceptions: [...this._exceptions] };
    if (this._subsegments.length > 0) {
      doc.subsegments = this._subsegments.map((s) => s.toDocument());
    }
    return doc;
  }
}

export class Subsegment extends BaseEntity {
  readonly type = 'subsegment' as const;

  toDocument(): EntityDocument {
    return this.baseDocument();
  }
}

export interface SegmentInit {
  name: string;
  traceId: string;
  parentId: string | null;
  sampled: SampleDecision;
  ruleName: string | null;
  startTime: number;
}

export class Segment extends BaseEntity {
  readonly type = 'segment' as const;
  readonly traceId: string;
  readonly parentId: string | null;
  readonly sampled: SampleDecision;
  readonly ruleName: string | null;

  private readonly _http: Partial<Record<HttpDirection, HttpAttributes>> = {};
  private _autoInstrumented = false;

  constructor(init: SegmentInit) {
    super(init.name, init.startTime);
    this.traceId = init.traceId;
    this.parentId = init.parentId;
    this.sampled = init.sampled;
    this.ruleName = init.ruleName;
  }

  get http(): Readonly<Partial<Record<HttpDirection, HttpAttributes>>> {
    return this._http;
  }

  get autoInstrumented(): boolean {
    return this._autoInstrumented;
  }

  /** Merge HTTP attributes for one direction. */
  addHttpInformation(direction: HttpDirection, attributes: HttpAttributes): void {
    this._http[direction] = { ...this._http[direction], ...attributes };
  }

  markAutoInstrumented(): void {
    this._autoInstrumented = true;
  }

  toDocument(): SegmentDocument {
    const doc: SegmentDocument = {
      ...this.baseDocument(),
      trace_id: this.traceId,
      aws: { xray: {} },
    };

    if (this.parentId !== null) doc.parent_id = this.parentId;
    if (this._http.request || this._http.response) doc.http = { ...this._http };
    if (this._autoInstrumented) doc.aws.xray.auto_instrumentation = true;
    if (this.ruleName !== null) doc.aws.xray.sampling_rule_name = this.ruleName;
    return doc;
  }
}

export type Entity = Segment | Subsegment;

export function isSegment(entity: Entity): entity is Segment {
  return entity.type === 'segment';
}
