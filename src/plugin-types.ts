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


// This file only describes public-facing interfaces.

import type {Metadata} from '@grpc/grpc-js';

import type {Func} from './cls/base';
import type {Context} from './context';
import type {SpanType} from './constants';
import type {Logger} from './logger';
import type {Attributes, AttributeValue, SpanKind, SpanStatus} from './trace';
import type {TraceAgentConfig} from './trace-api';
import type {SpanContext} from './util';

export type {Func, SpanContext};

export interface Span {
  readonly type: SpanType;

  /**
   * Gets the identifiers of this span, or null if it does not represent a
   * real span.
   */
  getSpanContext(): SpanContext | null;

  setAttribute(key: string, value: AttributeValue): void;

  addEvent(name: string, attributes?: Attributes): void;

  setStatus(status: SpanStatus): void;

  /**
   * Records an `exception` event describing the given error. Does not change
   * the span status.
   */
  recordException(error: unknown): void;

  isEnded(): boolean;

  endSpan(timestamp?: Date): void;
}

export interface SpanOptions {
  /* The name to apply to the span. */
  name: string;
  /* Defaults to SpanKind.INTERNAL. */
  kind?: SpanKind;
  /* The remote parent, if the trace was started in another process. */
  parent?: SpanContext | null;
}

export interface Tracer {
  experimentalSpanAttributesEnabled(): boolean;

  getConfig(): TraceAgentConfig;

  /**
   * Starts a span. If `options.parent` is given the span joins that trace,
   * otherwise it starts a new one. The span is not made current.
   */
  startSpan(options: SpanOptions): Span;

  getCurrentContext(): Context;

  /**
   * Runs `fn` with `context` as the current context. The previous context is
   * restored when `fn` returns or throws.
   */
  runInContext<T>(context: Context, fn: () => T): T;

  /**
   * Reads the trace context of the remote caller from inbound metadata.
   */
  extractSpanContext(metadata: Metadata): SpanContext | null;

  isRealSpan(span: Span): boolean;

  wrap<T>(fn: Func<T>): Func<T>;

  readonly logger: Logger;
}
