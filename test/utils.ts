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


import {Metadata} from '@grpc/grpc-js';

import {Constants} from '../src/constants';
import {Context} from '../src/context';
import {Span, Tracer} from '../src/plugin-types';
import {
  RpcStatus,
  ServerCall,
  ServerCallHandler,
  ServerCallListener,
  SocketAddress,
} from '../src/server-call';
import {ServerTracer} from '../src/server-tracer';
import {serializeSpanContext, SpanContext} from '../src/util';

export const TEST_METHOD_NAME = 'test.v1.Greeter/SayHello';

// Convenience function that, when awaited, stalls for a given duration of time
export function wait(ms: number) {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function plan(done: Mocha.Done, num: number): Mocha.Done {
  return (err?: Error) => {
    if (err) {
      num = 0;
      setImmediate(done, err);
    } else {
      num--;
      if (num === 0) {
        setImmediate(done);
      } else if (num < 0) {
        throw new Error('done called too many times');
      }
    }
  };
}

/**
 * Returns metadata that carries the given span context the way a traced
 * client sends it.
 */
export function metadataWithParent(spanContext: SpanContext): Metadata {
  const metadata = new Metadata();
  metadata.set(
    Constants.TRACE_CONTEXT_GRPC_METADATA_NAME,
    serializeSpanContext(spanContext)
  );
  return metadata;
}

export interface FakeServerCallOptions {
  methodName?: string;
  /** An Error is thrown from getRemoteAddress. */
  remoteAddress?: SocketAddress | null | Error;
  /** Thrown from close, after the close is recorded. */
  closeError?: Error;
}

/**
 * A ServerCall that records what is sent on it.
 */
export class FakeServerCall implements ServerCall<string, string> {
  readonly headersSent: Metadata[] = [];
  readonly messagesSent: string[] = [];
  readonly closed: Array<{status: RpcStatus; trailers: Metadata}> = [];
  /** The span that was current when close was called. */
  spanAtClose: Span | null = null;
  cancelled = false;

  constructor(
    private readonly options: FakeServerCallOptions = {},
    private readonly tracer: Tracer | null = null
  ) {}

  getMethodName(): string {
    return this.options.methodName || TEST_METHOD_NAME;
  }

  getRemoteAddress(): SocketAddress | null {
    const address = this.options.remoteAddress;
    if (address instanceof Error) {
      throw address;
    }
    return address || null;
  }

  sendHeaders(headers: Metadata): void {
    this.headersSent.push(headers);
  }

  sendMessage(message: string): void {
    this.messagesSent.push(message);
  }

  close(status: RpcStatus, trailers: Metadata): void {
    this.closed.push({status, trailers});
    if (this.tracer) {
      this.spanAtClose = this.tracer.getCurrentContext().getSpan();
    }
    if (this.options.closeError) {
      throw this.options.closeError;
    }
  }

  isCancelled(): boolean {
    return this.cancelled;
  }
}

export type ListenerEvent =
  | 'onMessage'
  | 'onHalfClose'
  | 'onCancel'
  | 'onComplete'
  | 'onReady';

/**
 * A ServerCallListener that records the callbacks it receives, and the span
 * that was current during each of them.
 */
export class RecordingListener implements ServerCallListener<string> {
  readonly events: ListenerEvent[] = [];
  readonly messages: string[] = [];
  readonly activeSpans: Array<Span | null> = [];

  constructor(
    private readonly tracer: Tracer | null = null,
    private readonly throws: Partial<Record<ListenerEvent, Error>> = {}
  ) {}

  onMessage(message: string): void {
    this.messages.push(message);
    this.record('onMessage');
  }

  onHalfClose(): void {
    this.record('onHalfClose');
  }

  onCancel(): void {
    this.record('onCancel');
  }

  onComplete(): void {
    this.record('onComplete');
  }

  onReady(): void {
    this.record('onReady');
  }

  private record(event: ListenerEvent) {
    this.events.push(event);
    if (this.tracer) {
      this.activeSpans.push(this.tracer.getCurrentContext().getSpan());
    }
    const err = this.throws[event];
    if (err) {
      throw err;
    }
  }
}

/**
 * A ServerCallHandler that remembers the call it was started with.
 */
export class RecordingHandler implements ServerCallHandler<string, string> {
  private call: ServerCall<string, string> | null = null;
  headers: Metadata | null = null;
  /** The span that was current when startCall was called. */
  spanAtStart: Span | null = null;

  constructor(
    readonly listener: ServerCallListener<string> = new RecordingListener(),
    private readonly options: {tracer?: Tracer; startError?: Error} = {}
  ) {}

  startCall(
    call: ServerCall<string, string>,
    headers: Metadata
  ): ServerCallListener<string> {
    this.call = call;
    this.headers = headers;
    if (this.options.tracer) {
      this.spanAtStart = this.options.tracer.getCurrentContext().getSpan();
    }
    if (this.options.startError) {
      throw this.options.startError;
    }
    return this.listener;
  }

  /**
   * Returns the call handed on by the interceptor.
   */
  getCall(): ServerCall<string, string> {
    if (!this.call) {
      throw new Error('startCall was not called.');
    }
    return this.call;
  }
}

/**
 * A ServerTracer that counts how often each span is ended.
 */
export class SpyServerTracer extends ServerTracer {
  readonly ended: Context[] = [];
  readonly endedExceptionally: Array<{context: Context; error: unknown}> = [];

  end(context: Context) {
    this.ended.push(context);
    super.end(context);
  }

  endExceptionally(context: Context, error: unknown) {
    this.endedExceptionally.push({context, error});
    super.endExceptionally(context, error);
  }

  get terminations(): number {
    return this.ended.length + this.endedExceptionally.length;
  }
}
