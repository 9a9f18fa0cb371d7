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


import {Metadata, status as Status} from '@grpc/grpc-js';

import {Context} from './context';
import {Logger} from './logger';
import {Span, Tracer} from './plugin-types';
import {RpcStatus} from './server-call';
import {DISABLED_SPAN, errorMessage} from './span-data';
import {SpanKind, SpanStatusCode} from './trace';
import {TraceLabels} from './trace-labels';
import {SpanContext} from './util';

/**
 * Starts, annotates and ends the span of a server call. Every operation
 * catches and logs its own failures, so none of them can fail the call.
 */
export class ServerTracer {
  constructor(private readonly tracer: Tracer) {}

  get logger(): Logger {
    return this.tracer.logger;
  }

  experimentalSpanAttributesEnabled(): boolean {
    return this.tracer.experimentalSpanAttributesEnabled();
  }

  /**
   * Starts a server span named after the method, as a child of the trace
   * context carried in the inbound headers if there is one. Returns the
   * current context extended with the new span; the span is not made
   * current.
   */
  startSpan(methodName: string, headers: Metadata): Context {
    let parent: SpanContext | null = null;
    try {
      parent = this.tracer.extractSpanContext(headers);
    } catch (err) {
      this.logger.warn(
        `ServerTracer#startSpan: Ignoring inbound trace context of [${methodName}]: ${errorMessage(
          err
        )}`
      );
    }
    const context = this.tracer.getCurrentContext();
    try {
      return context.withSpan(
        this.tracer.startSpan({name: methodName, kind: SpanKind.SERVER, parent})
      );
    } catch (err) {
      this.logger.error(
        `ServerTracer#startSpan: Failed to start a span for [${methodName}]: ${errorMessage(
          err
        )}`
      );
      return context;
    }
  }

  /**
   * Returns the span held by `context`, or a span that records nothing.
   */
  getSpan(context: Context): Span {
    return context.getSpan() || DISABLED_SPAN;
  }

  /**
   * Records the status a call is closed with. Does not end the span.
   */
  setStatus(context: Context, status: RpcStatus) {
    this.withSpan('setStatus', context, span => {
      span.setAttribute(TraceLabels.RPC_GRPC_STATUS_CODE, status.code);
      if (status.code !== Status.OK) {
        span.setStatus({code: SpanStatusCode.ERROR, message: status.details});
      }
    });
  }

  end(context: Context) {
    this.withSpan('end', context, span => span.endSpan());
  }

  /**
   * Records `error` on the span, marks it failed, and ends it.
   */
  endExceptionally(context: Context, error: unknown) {
    this.withSpan('endExceptionally', context, span => {
      span.recordException(error);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: errorMessage(error),
      });
      span.endSpan();
    });
  }

  /**
   * Runs `fn` with `context` current, restoring the previous context however
   * `fn` exits.
   */
  withContext<T>(context: Context, fn: () => T): T {
    return this.tracer.runInContext(context, fn);
  }

  private withSpan(
    operation: string,
    context: Context,
    fn: (span: Span) => void
  ) {
    const span = context.getSpan();
    if (!span) {
      return;
    }
    try {
      fn(span);
    } catch (err) {
      this.logger.error(`ServerTracer#${operation}: ${errorMessage(err)}`);
    }
  }
}
