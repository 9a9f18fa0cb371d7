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


import * as net from 'net';

import {Constants} from './constants';
import {Span} from './plugin-types';
import {SocketAddress} from './server-call';
import {TraceLabels} from './trace-labels';

export interface MethodName {
  service: string;
  method: string;
}

/**
 * Splits `package.Service/Method` (optionally with a leading slash) into
 * its service and method parts. Returns null for anything else.
 */
export function parseFullMethodName(fullMethodName: string): MethodName | null {
  const name = fullMethodName.startsWith('/')
    ? fullMethodName.slice(1)
    : fullMethodName;
  const index = name.lastIndexOf('/');
  if (index <= 0 || index === name.length - 1) {
    return null;
  }
  return {service: name.slice(0, index), method: name.slice(index + 1)};
}

/**
 * Applies the standard RPC attributes for a call to `fullMethodName`.
 */
export function prepareSpan(span: Span, fullMethodName: string) {
  span.setAttribute(TraceLabels.RPC_SYSTEM, Constants.RPC_SYSTEM_GRPC);
  const parsed = parseFullMethodName(fullMethodName);
  if (parsed) {
    span.setAttribute(TraceLabels.RPC_SERVICE, parsed.service);
    span.setAttribute(TraceLabels.RPC_METHOD, parsed.method);
  }
}

/**
 * Parses a peer string as reported by @grpc/grpc-js: `1.2.3.4:5`,
 * `::1:5`, `[::1]:5` or `unix:/path`. Returns null for `unknown` and for
 * anything without a valid IP address and port.
 */
export function parsePeerAddress(peer: string): SocketAddress | null {
  if (!peer || peer === 'unknown') {
    return null;
  }
  if (peer.startsWith('unix:')) {
    return {family: 'unix', path: peer.slice('unix:'.length)};
  }
  let host: string;
  let port: string;
  if (peer.startsWith('[')) {
    const end = peer.indexOf(']:');
    if (end < 0) {
      return null;
    }
    host = peer.slice(1, end);
    port = peer.slice(end + 2);
  } else {
    const index = peer.lastIndexOf(':');
    if (index < 0) {
      return null;
    }
    host = peer.slice(0, index);
    port = peer.slice(index + 1);
  }
  if (!/^\d{1,5}$/.test(port) || Number(port) > 65535) {
    return null;
  }
  switch (net.isIP(host)) {
    case 4:
      return {family: 'IPv4', address: host, port: Number(port)};
    case 6:
      return {family: 'IPv6', address: host, port: Number(port)};
    default:
      return null;
  }
}
