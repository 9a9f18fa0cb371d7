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


/**
 * Well-known span attribute keys.
 */
// tslint:disable-next-line:variable-name
export const TraceLabels = {
  /**
   * The IP address of the remote peer.
   */
  NET_PEER_IP: 'net.peer.ip',

  /**
   * The port of the remote peer.
   */
  NET_PEER_PORT: 'net.peer.port',

  /**
   * The remoting system; always 'grpc' for spans recorded by this library.
   */
  RPC_SYSTEM: 'rpc.system',

  /**
   * The full name of the service, including its package.
   */
  RPC_SERVICE: 'rpc.service',

  /**
   * The name of the method within its service.
   */
  RPC_METHOD: 'rpc.method',

  /**
   * The numeric status code the call was closed with.
   */
  RPC_GRPC_STATUS_CODE: 'rpc.grpc.status_code',

  /**
   * Direction of a message event.
   */
  MESSAGE_TYPE: 'message.type',

  /**
   * Sequence number of a message within its call, starting at 1.
   */
  MESSAGE_ID: 'message.id',

  /**
   * Set on cancelled calls when experimental attributes are enabled.
   */
  GRPC_CANCELED: 'grpc.canceled',

  EXCEPTION_TYPE: 'exception.type',
  EXCEPTION_MESSAGE: 'exception.message',
  EXCEPTION_STACKTRACE: 'exception.stacktrace',
};
