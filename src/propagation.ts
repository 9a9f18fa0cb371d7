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

import {Constants} from './constants';
import {
  deserializeSpanContext,
  isValidSpanContext,
  serializeSpanContext,
  SpanContext,
} from './util';

/**
 * Reads and writes the trace context carried in call metadata.
 */
export interface Propagation {
  /**
   * Returns the span context of the remote caller, or null if the metadata
   * carries none or it is malformed.
   */
  extract(metadata: Metadata): SpanContext | null;
  inject(metadata: Metadata, spanContext: SpanContext): void;
}

/**
 * Propagates trace context as a 29-byte binary value under the
 * `grpc-trace-bin` metadata key.
 */
export class BinaryFormatPropagation implements Propagation {
  extract(metadata: Metadata): SpanContext | null {
    const values = metadata.get(Constants.TRACE_CONTEXT_GRPC_METADATA_NAME);
    if (values.length === 0) {
      return null;
    }
    const value = values[0];
    if (typeof value === 'string') {
      return null;
    }
    const spanContext = deserializeSpanContext(value);
    if (!spanContext || !isValidSpanContext(spanContext)) {
      return null;
    }
    return spanContext;
  }

  inject(metadata: Metadata, spanContext: SpanContext) {
    metadata.set(
      Constants.TRACE_CONTEXT_GRPC_METADATA_NAME,
      serializeSpanContext(spanContext)
    );
  }
}
