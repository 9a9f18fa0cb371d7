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
import * as net from 'net';

import {Constants} from './constants';
import {Context} from './context';
import {Span, Tracer} from './plugin-types';
import {prepareSpan} from './rpc-helper';
import {
  ForwardingServerCall,
  ForwardingServerCallListener,
  RpcStatus,
  ServerCall,
  ServerCallHandler,
  ServerCallListener,
  ServerInterceptor,
  SocketAddress,
} from './server-call';
import {ServerTracer} from './server-tracer';
import {errorMessage} from './span-data';
import {TraceLabels} from './trace-labels';

export interface TracingInterceptorOptions {
  /**
   * Overrides the tracer's captureExperimentalSpanAttributes setting.
   */
  captureExperimentalSpanAttributes?: boolean;
}

enum CallState {
  ACTIVE,
  /** Ended by onComplete or onCancel. */
  TERMINATED,
  /** Ended because a callback or close threw. */
  FAILED,
}

/**
 * The span of one call, shared by its call and listener wrappers.
 */
export class CallSpan {
  private state = CallState.ACTIVE;
  readonly span: Span;

  constructor(
    private readonly tracer: ServerTracer,
    readonly context: Context,
    private readonly methodName: string
  ) {
    this.span = tracer.getSpan(context);
  }

  setStatus(status: RpcStatus) {
    this.tracer.setStatus(this.context, status);
  }

  /**
   * Runs `fn` in the call's scope. If it throws, the error is recorded on
   * the span, which is ended, and the error is re-thrown.
   */
  run<T>(operation: string, fn: () => T): T {
    try {
      return this.tracer.withContext(this.context, fn);
    } catch (err) {
      this.fail(operation, err);
      throw err;
    }
  }

  /**
   * Ends the span on the first terminal callback.
   */
  terminate(operation: string) {
    switch (this.state) {
      case CallState.ACTIVE:
        this.state = CallState.TERMINATED;
        this.tracer.end(this.context);
        return;
      case CallState.TERMINATED:
        this.tracer.logger.error(
          `TracingServerCallListener#${operation}: Call [${this.methodName}] already received a terminal callback; its span is not ended again.`
        );
        return;
      case CallState.FAILED:
        this.tracer.logger.debug(
          `TracingServerCallListener#${operation}: Span of call [${this.methodName}] was already ended by an exception.`
        );
        return;
    }
  }

  private fail(operation: string, err: unknown) {
    if (this.state !== CallState.ACTIVE) {
      this.tracer.logger.debug(
        `TracingServerInterceptor#${operation}: Call [${
          this.methodName
        }] threw after its span ended: ${errorMessage(err)}`
      );
      return;
    }
    this.state = CallState.FAILED;
    this.tracer.endExceptionally(this.context, err);
  }
}

/**
 * Records the status a call is closed with, then closes it in the call's
 * scope.
 */
export class TracingServerCall<Req, Res> extends ForwardingServerCall<
  Req,
  Res
> {
  constructor(
    delegate: ServerCall<Req, Res>,
    private readonly callSpan: CallSpan
  ) {
    super(delegate);
  }

  close(status: RpcStatus, trailers: Metadata): void {
    this.callSpan.setStatus(status);
    this.callSpan.run('close', () => super.close(status, trailers));
  }
}

/**
 * Runs each callback of a call in the call's scope, records inbound
 * messages, and ends the span when the call completes or is cancelled.
 */
export class TracingServerCallListener<
  Req
> extends ForwardingServerCallListener<Req> {
  private messageId = 0;

  constructor(
    delegate: ServerCallListener<Req>,
    private readonly callSpan: CallSpan,
    private readonly captureExperimentalSpanAttributes: boolean
  ) {
    super(delegate);
  }

  onMessage(message: Req): void {
    this.callSpan.span.addEvent(Constants.MESSAGE_EVENT_NAME, {
      [TraceLabels.MESSAGE_TYPE]: Constants.MESSAGE_TYPE_RECEIVED,
      [TraceLabels.MESSAGE_ID]: ++this.messageId,
    });
    this.callSpan.run('onMessage', () => super.onMessage(message));
  }

  onHalfClose(): void {
    this.callSpan.run('onHalfClose', () => super.onHalfClose());
  }

  onCancel(): void {
    this.callSpan.run('onCancel', () => super.onCancel());
    if (this.captureExperimentalSpanAttributes) {
      this.callSpan.span.setAttribute(TraceLabels.GRPC_CANCELED, true);
    }
    this.callSpan.terminate('onCancel');
  }

  onComplete(): void {
    this.callSpan.run('onComplete', () => super.onComplete());
    this.callSpan.terminate('onComplete');
  }

  onReady(): void {
    this.callSpan.run('onReady', () => super.onReady());
  }
}

/**
 * Traces each call it intercepts with one server span.
 */
export class TracingServerInterceptor implements ServerInterceptor {
  private readonly captureExperimentalSpanAttributes: boolean;

  constructor(
    private readonly tracer: ServerTracer,
    options: TracingInterceptorOptions = {}
  ) {
    this.captureExperimentalSpanAttributes =
      options.captureExperimentalSpanAttributes !== undefined
        ? options.captureExperimentalSpanAttributes
        : tracer.experimentalSpanAttributesEnabled();
  }

  interceptCall<Req, Res>(
    call: ServerCall<Req, Res>,
    headers: Metadata,
    next: ServerCallHandler<Req, Res>
  ): ServerCallListener<Req> {
    const methodName = call.getMethodName();
    const callSpan = new CallSpan(
      this.tracer,
      this.tracer.startSpan(methodName, headers),
      methodName
    );
    this.addPeerAttributes(callSpan.span, call);
    prepareSpan(callSpan.span, methodName);
    const listener = callSpan.run('interceptCall', () =>
      next.startCall(new TracingServerCall(call, callSpan), headers)
    );
    return new TracingServerCallListener(
      listener,
      callSpan,
      this.captureExperimentalSpanAttributes
    );
  }

  private addPeerAttributes<Req, Res>(span: Span, call: ServerCall<Req, Res>) {
    let address: SocketAddress | null;
    try {
      address = call.getRemoteAddress();
    } catch (err) {
      this.tracer.logger.debug(
        `TracingServerInterceptor#interceptCall: Could not read the peer address: ${errorMessage(
          err
        )}`
      );
      return;
    }
    if (!address || address.family === 'unix' || !net.isIP(address.address)) {
      return;
    }
    span.setAttribute(TraceLabels.NET_PEER_IP, address.address);
    span.setAttribute(TraceLabels.NET_PEER_PORT, address.port);
  }
}

/**
 * Creates an interceptor that traces server calls. Accepts either a tracer
 * or a ServerTracer built on one.
 */
export function newInterceptor(
  tracer: Tracer | ServerTracer,
  options?: TracingInterceptorOptions
): TracingServerInterceptor {
  const serverTracer =
    tracer instanceof ServerTracer ? tracer : new ServerTracer(tracer);
  return new TracingServerInterceptor(serverTracer, options);
}
