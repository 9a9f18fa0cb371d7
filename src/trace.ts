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


// Data model for recorded spans, as handed to a SpanExporter.

export enum SpanKind {
  SERVER = 'SERVER',
  INTERNAL = 'INTERNAL',
}

export enum SpanStatusCode {
  UNSET = 'UNSET',
  OK = 'OK',
  ERROR = 'ERROR',
}

export type AttributeValue = string | number | boolean;

export interface Attributes {
  [key: string]: AttributeValue;
}

export interface SpanEvent {
  name: string;
  time: string;
  attributes: Attributes;
}

export interface SpanStatus {
  code: SpanStatusCode;
  message?: string;
}

export interface TraceSpan {
  name: string;
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  kind: SpanKind;
  startTime: string;
  endTime: string;
  attributes: Attributes;
  events: SpanEvent[];
  status: SpanStatus;
}
