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

import type {Propagation} from './propagation';
import type {SpanExporter} from './trace-writer';

export type CLSMechanism = 'async-hooks' | 'none' | 'singular';

/**
 * Available configuration options. All fields are optional. See the
 * defaultConfig object defined in this file for default assigned values.
 */
export interface Config {
  /**
   * Log levels: 0=disabled, 1=error, 2=warn, 3=info, 4=debug
   * The value of GRPC_TRACE_LOGLEVEL takes precedence over this value.
   */
  logLevel?: number;

  /**
   * Whether to enable tracing or not. When disabled, interceptors created
   * from the agent still delegate every call, but record nothing.
   */
  enabled?: boolean;

  /**
   * The trace context propagation mechanism to use. The following options are
   * available:
   * - 'async-hooks' uses an implementation of CLS on top of the Node core
   *   `async_hooks` module.
   * - 'singular' allows one context to be active at a time. This option is
   *   meant for environments where it is guaranteed that only one call is
   *   being served at a time.
   * - 'none' disables CLS completely.
   */
  clsMechanism?: CLSMechanism;

  /**
   * Whether to record attributes that are not part of the stable semantic
   * conventions, such as `grpc.canceled` on cancelled calls. Read once, when
   * an interceptor is created. The value of
   * GRPC_TRACE_EXPERIMENTAL_SPAN_ATTRIBUTES takes precedence over this value.
   */
  captureExperimentalSpanAttributes?: boolean;

  /**
   * The maximum number of characters reported on an attribute value. This
   * value cannot exceed 16383.
   */
  maximumAttributeValueSize?: number;

  /**
   * The number of ended spans to buffer before they are handed to the
   * exporter.
   */
  bufferSize?: number;

  /**
   * The maximum number of seconds buffered spans wait before they are handed
   * to the exporter.
   */
  flushDelaySeconds?: number;

  /**
   * Reads the inbound trace context from call metadata. Defaults to the
   * `grpc-trace-bin` binary format.
   */
  propagation?: Propagation;

  /**
   * Receives ended spans in batches. Defaults to an exporter that writes each
   * span to the logger at debug level.
   */
  exporter?: SpanExporter;
}

/**
 * Default configuration. For fields with primitive values, any user-provided
 * value will override the corresponding default value.
 */
export const defaultConfig = {
  logLevel: 1,
  enabled: true,
  clsMechanism: 'async-hooks' as CLSMechanism,
  captureExperimentalSpanAttributes: false,
  maximumAttributeValueSize: 512,
  bufferSize: 1000,
  flushDelaySeconds: 30,
};
