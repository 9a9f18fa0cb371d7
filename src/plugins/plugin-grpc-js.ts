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


import * as grpc from '@grpc/grpc-js';

import {Logger} from '../logger';
import {parsePeerAddress} from '../rpc-helper';
import {
  RpcStatus,
  ServerCall,
  ServerCallHandler,
  ServerCallListener,
  ServerInterceptor,
  SocketAddress,
} from '../server-call';
import {errorMessage} from '../span-data';

// The part of grpc.ServerInterceptingCallInterface a binding talks to
// directly.
export interface UnderlyingCall {
  getPeer(): string;
  sendStatus(status: {
    code: grpc.status;
    details: string;
    metadata: grpc.Metadata;
  }): void;
}

type Next<T> = (value: T) => void;
type StatusNext = (status: RpcStatus, trailers: grpc.Metadata) => void;

/**
 * The end of the interceptor chain. Hands each event on to @grpc/grpc-js
 * through the `next` callback it arrived with.
 */
class DownstreamListener implements ServerCallListener<unknown> {
  nextMessage: Next<unknown> | null = null;
  nextHalfClose: (() => void) | null = null;

  onMessage(message: unknown): void {
    const next = this.nextMessage;
    this.nextMessage = null;
    if (next) {
      next(message);
    }
  }

  onHalfClose(): void {
    const next = this.nextHalfClose;
    this.nextHalfClose = null;
    if (next) {
      next();
    }
  }

  // @grpc/grpc-js has no downstream counterpart for these.
  onCancel(): void {}
  onComplete(): void {}
  onReady(): void {}
}

/**
 * The call as seen by the interceptor chain. Outbound operations are handed
 * to @grpc/grpc-js through the `next` callback of the responder method that
 * started them. A status sent by an interceptor on its own, such as one that
 * rejects the call without starting the handler, goes straight to the
 * underlying call.
 */
class UpstreamCall implements ServerCall<unknown, unknown> {
  nextMetadata: Next<grpc.Metadata> | null = null;
  nextMessage: Next<unknown> | null = null;
  nextStatus: StatusNext | null = null;
  cancelled = false;
  private closed = false;

  constructor(
    private readonly methodName: string,
    private readonly underlying: UnderlyingCall,
    private readonly logger: Logger,
    private readonly onClosedDirectly: () => void
  ) {}

  getMethodName(): string {
    return this.methodName;
  }

  getRemoteAddress(): SocketAddress | null {
    return parsePeerAddress(this.underlying.getPeer());
  }

  sendHeaders(headers: grpc.Metadata): void {
    const next = this.nextMetadata;
    this.nextMetadata = null;
    if (next) {
      next(headers);
    } else {
      this.dropped('sendHeaders', 'headers the handler did not send');
    }
  }

  sendMessage(message: unknown): void {
    const next = this.nextMessage;
    this.nextMessage = null;
    if (next) {
      next(message);
    } else {
      this.dropped('sendMessage', 'a message the handler did not send');
    }
  }

  close(status: RpcStatus, trailers: grpc.Metadata): void {
    const next = this.nextStatus;
    this.nextStatus = null;
    if (next) {
      this.closed = true;
      next(status, trailers);
      return;
    }
    if (this.closed) {
      this.dropped('close', 'a second status');
      return;
    }
    this.closed = true;
    this.underlying.sendStatus({
      code: status.code,
      details: status.details || '',
      metadata: trailers,
    });
    this.onClosedDirectly();
  }

  isCancelled(): boolean {
    return this.cancelled;
  }

  private dropped(operation: string, what: string) {
    this.logger.warn(
      `UpstreamCall#${operation}: Call [${this.methodName}] dropped ${what}.`
    );
  }
}

/**
 * Drives a ServerInterceptor from the listener and responder events of one
 * @grpc/grpc-js call.
 *
 * The interceptor runs once the inbound metadata arrives. Each inbound
 * event is delivered to the listener it returned, and each outbound
 * operation goes through the call it handed on. Closing the call is followed
 * by `onComplete`, and at most one of `onComplete` and `onCancel` is
 * delivered. Once an interceptor closes the call on its own, later events
 * pass straight through. If the interceptor chain throws, the call is closed
 * with status UNKNOWN.
 */
export class CallBinding {
  private readonly upstream: UpstreamCall;
  private readonly downstream = new DownstreamListener();
  private listener: ServerCallListener<unknown> | null = null;
  private outbound: ServerCall<unknown, unknown> | null = null;
  private terminated = false;

  constructor(
    private readonly methodName: string,
    private readonly underlying: UnderlyingCall,
    private readonly interceptor: ServerInterceptor,
    private readonly logger: Logger
  ) {
    this.upstream = new UpstreamCall(methodName, underlying, logger, () =>
      this.closedDirectly()
    );
  }

  onReceiveMetadata(metadata: grpc.Metadata, next: Next<grpc.Metadata>) {
    if (this.terminated) {
      next(metadata);
      return;
    }
    const handler: ServerCallHandler<unknown, unknown> = {
      startCall: (call, headers) => {
        this.outbound = call;
        next(headers);
        return this.downstream;
      },
    };
    try {
      const listener = this.interceptor.interceptCall(
        this.upstream,
        metadata,
        handler
      );
      this.listener = listener;
      if (this.terminated) {
        // Closed before the listener was handed back.
        this.complete('onReceiveMetadata', listener);
        return;
      }
      listener.onReady();
    } catch (err) {
      this.fail('onReceiveMetadata', err);
    }
  }

  onReceiveMessage(message: unknown, next: Next<unknown>) {
    const listener = this.listener;
    if (!listener || this.terminated) {
      next(message);
      return;
    }
    this.downstream.nextMessage = next;
    try {
      listener.onMessage(message);
    } catch (err) {
      this.fail('onReceiveMessage', err);
    }
  }

  onReceiveHalfClose(next: () => void) {
    const listener = this.listener;
    if (!listener || this.terminated) {
      next();
      return;
    }
    this.downstream.nextHalfClose = next;
    try {
      listener.onHalfClose();
    } catch (err) {
      this.fail('onReceiveHalfClose', err);
    }
  }

  onCancel() {
    this.upstream.cancelled = true;
    const listener = this.listener;
    if (!listener || this.terminated) {
      return;
    }
    this.terminated = true;
    try {
      listener.onCancel();
    } catch (err) {
      this.logger.error(
        `CallBinding#onCancel: Call [${this.methodName}] threw while cancelling: ${errorMessage(
          err
        )}`
      );
    }
  }

  sendMetadata(metadata: grpc.Metadata, next: Next<grpc.Metadata>) {
    const outbound = this.outbound;
    if (!outbound || this.terminated) {
      next(metadata);
      return;
    }
    this.upstream.nextMetadata = next;
    outbound.sendHeaders(metadata);
  }

  sendMessage(message: unknown, next: Next<unknown>) {
    const outbound = this.outbound;
    if (!outbound || this.terminated) {
      next(message);
      return;
    }
    this.upstream.nextMessage = next;
    outbound.sendMessage(message);
  }

  sendStatus(status: RpcStatus, trailers: grpc.Metadata, next: StatusNext) {
    const outbound = this.outbound;
    const listener = this.listener;
    if (!outbound || !listener || this.terminated) {
      next(status, trailers);
      return;
    }
    this.upstream.nextStatus = next;
    try {
      outbound.close(status, trailers);
    } catch (err) {
      this.terminated = true;
      this.logger.error(
        `CallBinding#sendStatus: Call [${this.methodName}] threw while closing: ${errorMessage(
          err
        )}`
      );
      // The status still has to reach the client.
      this.upstream.close(status, trailers);
      return;
    }
    this.terminated = true;
    this.complete('sendStatus', listener);
  }

  private closedDirectly() {
    if (this.terminated) {
      return;
    }
    this.terminated = true;
    if (this.listener) {
      this.complete('close', this.listener);
    }
  }

  private complete(operation: string, listener: ServerCallListener<unknown>) {
    try {
      listener.onComplete();
    } catch (err) {
      this.logger.error(
        `CallBinding#${operation}: Call [${this.methodName}] threw on completion: ${errorMessage(
          err
        )}`
      );
    }
  }

  private fail(operation: string, err: unknown) {
    this.logger.error(
      `CallBinding#${operation}: Call [${this.methodName}] failed: ${errorMessage(
        err
      )}`
    );
    this.terminated = true;
    this.upstream.close(
      {code: grpc.status.UNKNOWN, details: errorMessage(err)},
      new grpc.Metadata()
    );
  }
}

function toRpcStatus(status: {code: grpc.status; details?: string}): RpcStatus {
  return status.details === undefined
    ? {code: status.code}
    : {code: status.code, details: status.details};
}

/**
 * Builds the @grpc/grpc-js responder that runs `interceptor` on one call.
 * @param path The method path, as in `/test.v1.Greeter/SayHello`.
 */
export function createResponder(
  interceptor: ServerInterceptor,
  path: string,
  call: UnderlyingCall,
  logger: Logger
): Required<grpc.Responder> {
  const binding = new CallBinding(
    path.replace(/^\//, ''),
    call,
    interceptor,
    logger
  );
  return {
    start: next =>
      next({
        onReceiveMetadata: (metadata, nextMetadata) =>
          binding.onReceiveMetadata(metadata, nextMetadata),
        onReceiveMessage: (message, nextMessage) =>
          binding.onReceiveMessage(message, nextMessage),
        onReceiveHalfClose: nextHalfClose =>
          binding.onReceiveHalfClose(nextHalfClose),
        onCancel: () => binding.onCancel(),
      }),
    sendMetadata: (metadata, next) => binding.sendMetadata(metadata, next),
    sendMessage: (message, next) => binding.sendMessage(message, next),
    sendStatus: (status, next) =>
      binding.sendStatus(
        toRpcStatus(status),
        status.metadata || new grpc.Metadata(),
        (rpcStatus, trailers) =>
          next({
            code: rpcStatus.code,
            details: rpcStatus.details || '',
            metadata: trailers,
          })
      ),
  };
}

/**
 * Adapts a ServerInterceptor to the @grpc/grpc-js server interceptor API,
 * for use as `new grpc.Server({interceptors: [...]})`.
 */
export function createGrpcServerInterceptor(
  interceptor: ServerInterceptor,
  logger: Logger = new Logger({tag: 'grpc-server-tracing'})
): grpc.ServerInterceptor {
  return (methodDescriptor, call) =>
    new grpc.ServerInterceptingCall(
      call,
      createResponder(interceptor, methodDescriptor.path, call, logger)
    );
}
