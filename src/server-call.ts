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


import type {Metadata, status} from '@grpc/grpc-js';

/**
 * The status a call is closed with.
 */
export interface RpcStatus {
  code: status;
  details?: string;
}

export interface InetSocketAddress {
  family: 'IPv4' | 'IPv6';
  address: string;
  port: number;
}

export interface UnixSocketAddress {
  family: 'unix';
  path: string;
}

export type SocketAddress = InetSocketAddress | UnixSocketAddress;

/**
 * The server side of one call. Responses flow out through it, and it is
 * closed exactly once.
 */
export interface ServerCall<Req, Res> {
  /**
   * The full method name, in the form `package.Service/Method`.
   */
  getMethodName(): string;
  /**
   * The address of the remote peer, or null if it is not known.
   */
  getRemoteAddress(): SocketAddress | null;
  sendHeaders(headers: Metadata): void;
  sendMessage(message: Res): void;
  close(status: RpcStatus, trailers: Metadata): void;
  isCancelled(): boolean;
}

/**
 * Receives the events of one call. `onMessage` fires once per inbound
 * message, `onHalfClose` once the client is done sending, and exactly one of
 * `onComplete` or `onCancel` ends the sequence.
 */
export interface ServerCallListener<Req> {
  onMessage(message: Req): void;
  onHalfClose(): void;
  onCancel(): void;
  onComplete(): void;
  onReady(): void;
}

export interface ServerCallHandler<Req, Res> {
  startCall(
    call: ServerCall<Req, Res>,
    headers: Metadata
  ): ServerCallListener<Req>;
}

export interface ServerInterceptor {
  interceptCall<Req, Res>(
    call: ServerCall<Req, Res>,
    headers: Metadata,
    next: ServerCallHandler<Req, Res>
  ): ServerCallListener<Req>;
}

/**
 * A ServerCall that forwards every operation to another one.
 */
export class ForwardingServerCall<Req, Res> implements ServerCall<Req, Res> {
  constructor(protected readonly delegate: ServerCall<Req, Res>) {}

  getMethodName(): string {
    return this.delegate.getMethodName();
  }

  getRemoteAddress(): SocketAddress | null {
    return this.delegate.getRemoteAddress();
  }

  sendHeaders(headers: Metadata): void {
    this.delegate.sendHeaders(headers);
  }

  sendMessage(message: Res): void {
    this.delegate.sendMessage(message);
  }

  close(status: RpcStatus, trailers: Metadata): void {
    this.delegate.close(status, trailers);
  }

  isCancelled(): boolean {
    return this.delegate.isCancelled();
  }
}

/**
 * A ServerCallListener that forwards every event to another one.
 */
export class ForwardingServerCallListener<Req>
  implements ServerCallListener<Req>
{
  constructor(protected readonly delegate: ServerCallListener<Req>) {}

  onMessage(message: Req): void {
    this.delegate.onMessage(message);
  }

  onHalfClose(): void {
    this.delegate.onHalfClose();
  }

  onCancel(): void {
    this.delegate.onCancel();
  }

  onComplete(): void {
    this.delegate.onComplete();
  }

  onReady(): void {
    this.delegate.onReady();
  }
}

/**
 * Wraps a handler in a chain of interceptors. The first interceptor listed
 * is the first to see each call.
 */
export function interceptHandler<Req, Res>(
  handler: ServerCallHandler<Req, Res>,
  ...interceptors: ServerInterceptor[]
): ServerCallHandler<Req, Res> {
  return interceptors.reduceRight<ServerCallHandler<Req, Res>>(
    (next, interceptor) => ({
      startCall: (call, headers) =>
        interceptor.interceptCall(call, headers, next),
    }),
    handler
  );
}
