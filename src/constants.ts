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

/** Constant values. */
// tslint:disable-next-line:variable-name
export const Constants = {
  /** The metadata key under which trace context is stored as a binary value. */
  TRACE_CONTEXT_GRPC_METADATA_NAME: 'grpc-trace-bin',

  /** Bitmask to determine whether trace is enabled in trace options. */
  TRACE_OPTIONS_TRACE_ENABLED: 1 << 0,

  /** Maximum size of a span name in bytes. */
  SPAN_NAME_LIMIT: 127,

  /** Maximum size of an attribute key in bytes. */
  ATTRIBUTE_KEY_LIMIT: 127,

  /** Maximum size of an attribute value in bytes. */
  ATTRIBUTE_VALUE_LIMIT: 16 * 1024 - 1,

  /** Name of the event recorded for each inbound message. */
  MESSAGE_EVENT_NAME: 'message',

  /** Name of the event recorded when a call fails with an exception. */
  EXCEPTION_EVENT_NAME: 'exception',

  /** Value of the rpc.system attribute. */
  RPC_SYSTEM_GRPC: 'grpc',

  /** Value of the message.type attribute on inbound message events. */
  MESSAGE_TYPE_RECEIVED: 'RECEIVED',
};

/**
 * An enumeration of the possible "types" of spans.
 */
export enum SpanType {
  /**
   * This span object was created by a disabled tracer, and does not
   * represent a real trace span.
   */
  DISABLED = 'DISABLED',

  /**
   * This span object was created by Tracer#startSpan, and will be handed to
   * the exporter once it ends.
   */
  ROOT = 'ROOT',
}
