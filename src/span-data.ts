/**
 * Copyright 2018 Google LLC
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */


import * as crypto from 'crypto';
import * as util from 'util';
import * as uuid from 'uuid';

import {Constants, SpanType} from './constants';
import {Logger} from './logger';
import {Span} from './plugin-types';
import {
  Attributes,
  AttributeValue,
  SpanKind,
  SpanStatus,
  SpanStatusCode,
  TraceSpan,
} from './trace';
import {TraceLabels} from './trace-labels';
import {traceWriter} from './trace-writer';
import * as traceUtil from './util';

const SPAN_ID_RANDOM_BYTES = 8;
const INVALID_SPAN_ID = '0'.repeat(SPAN_ID_RANDOM_BYTES * 2);

const spanIdBuffer = Buffer.alloc(SPAN_ID_RANDOM_BYTES);

export function randomSpanId(): string {
  let spanId: string;
  do {
    spanId = crypto.randomFillSync(spanIdBuffer).toString('hex');
  } while (spanId === INVALID_SPAN_ID);
  return spanId;
}

export function randomTraceId(): string {
  return uuid.v4().split('-').join('');
}

/**
 * Describes an error as the attributes of an `exception` event.
 */
export function describeError(error: unknown): Attributes {
  if (error instanceof Error) {
    const attributes: Attributes = {
      [TraceLabels.EXCEPTION_TYPE]: error.constructor.name || error.name,
      [TraceLabels.EXCEPTION_MESSAGE]: error.message,
    };
    if (error.stack) {
      attributes[TraceLabels.EXCEPTION_STACKTRACE] = error.stack;
    }
    return attributes;
  }
  return {
    [TraceLabels.EXCEPTION_TYPE]: typeof error,
    [TraceLabels.EXCEPTION_MESSAGE]: util.inspect(error),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : util.inspect(error);
}

export interface SpanDataOptions {
  name: string;
  kind: SpanKind;
  traceId: string;
  /** The ID of the remote or local parent, if there is one. */
  parentSpanId?: string;
  /** Attribute values longer than this are truncated. */
  maximumAttributeValueSize: number;
}

/**
 * Represents a real trace span. Once ended, the span is handed to the trace
 * writer and ignores any further changes.
 */
export class SpanData implements Span {
  readonly type = SpanType.ROOT;
  readonly span: TraceSpan;
  private readonly maximumAttributeValueSize: number;

  constructor(options: SpanDataOptions, private readonly logger: Logger) {
    this.span = {
      name: traceUtil.truncate(options.name, Constants.SPAN_NAME_LIMIT),
      traceId: options.traceId,
      spanId: randomSpanId(),
      kind: options.kind,
      startTime: new Date().toISOString(),
      endTime: '',
      attributes: {},
      events: [],
      status: {code: SpanStatusCode.UNSET},
    };
    if (options.parentSpanId) {
      this.span.parentSpanId = options.parentSpanId;
    }
    this.maximumAttributeValueSize = Math.min(
      options.maximumAttributeValueSize,
      Constants.ATTRIBUTE_VALUE_LIMIT
    );
  }

  getSpanContext(): traceUtil.SpanContext {
    return {
      traceId: this.span.traceId,
      spanId: this.span.spanId,
      options: Constants.TRACE_OPTIONS_TRACE_ENABLED,
    };
  }

  setAttribute(key: string, value: AttributeValue) {
    if (this.ignoreIfEnded('setAttribute')) {
      return;
    }
    const k = traceUtil.truncate(key, Constants.ATTRIBUTE_KEY_LIMIT);
    this.span.attributes[k] = this.truncateValue(value);
  }

  addEvent(name: string, attributes: Attributes = {}) {
    if (this.ignoreIfEnded('addEvent')) {
      return;
    }
    const eventAttributes: Attributes = {};
    for (const key of Object.keys(attributes)) {
      const k = traceUtil.truncate(key, Constants.ATTRIBUTE_KEY_LIMIT);
      eventAttributes[k] = this.truncateValue(attributes[key]);
    }
    this.span.events.push({
      name,
      time: new Date().toISOString(),
      attributes: eventAttributes,
    });
  }

  setStatus(status: SpanStatus) {
    if (this.ignoreIfEnded('setStatus')) {
      return;
    }
    this.span.status =
      status.message === undefined
        ? {code: status.code}
        : {code: status.code, message: status.message};
  }

  recordException(error: unknown) {
    this.addEvent(Constants.EXCEPTION_EVENT_NAME, describeError(error));
  }

  isEnded(): boolean {
    return !!this.span.endTime;
  }

  endSpan(timestamp?: Date) {
    if (this.isEnded()) {
      this.logger.warn(
        `SpanData#endSpan: Span [${this.span.name}] (${this.span.spanId}) was already ended.`
      );
      return;
    }
    timestamp = timestamp || new Date();
    this.span.endTime = timestamp.toISOString();
    if (traceWriter.exists()) {
      traceWriter.get().writeSpan(this.span);
    } else {
      this.logger.warn(
        `SpanData#endSpan: No trace writer exists; dropping span [${this.span.name}].`
      );
    }
  }

  private truncateValue(value: AttributeValue): AttributeValue {
    return typeof value === 'string'
      ? traceUtil.truncate(value, this.maximumAttributeValueSize)
      : value;
  }

  private ignoreIfEnded(method: string): boolean {
    if (this.isEnded()) {
      this.logger.debug(
        `SpanData#${method}: Span [${this.span.name}] already ended; ignoring.`
      );
      return true;
    }
    return false;
  }
}

/**
 * A virtual trace span that indicates that a real span couldn't be created
 * because the tracer was disabled. Every operation on it is a no-op.
 */
export const DISABLED_SPAN: Span = Object.freeze({
  type: SpanType.DISABLED,
  getSpanContext() {
    return null;
  },
  setAttribute() {},
  addEvent() {},
  setStatus() {},
  recordException() {},
  isEnded() {
    return false;
  },
  endSpan() {},
});
