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


// This symbol must be exported (for now).
// See: https://github.com/Microsoft/TypeScript/issues/20080
export const kSingleton = Symbol();

export interface Constructor<T, ConfigType, LoggerType> {
  new (config: ConfigType, logger: LoggerType): T;
  prototype: T;
  name: string;
}

export const FORCE_NEW = Symbol('force-new');

export type Forceable<T> = T & {[FORCE_NEW]?: boolean};

export interface Component {
  enable(): void;
  disable(): void;
}

/**
 * A class that provides access to a singleton.
 * We assume that any such singleton is always constructed with two arguments:
 * An arbitrary configuration object and a logger.
 * Instances of this type should only be constructed in module scope.
 */
export class Singleton<T, ConfigType, LoggerType> {
  // Note: private[symbol] is enforced by clang-format.
  private [kSingleton]: T | null = null;

  constructor(private implementation: Constructor<T, ConfigType, LoggerType>) {}

  create(config: Forceable<ConfigType>, logger: LoggerType): T {
    if (this[kSingleton] === null || config[FORCE_NEW]) {
      const s = this[kSingleton];
      if (
        s &&
        typeof s === 'object' &&
        'disable' in s &&
        typeof s.disable === 'function'
      ) {
        s.disable();
      }
      const instance = new this.implementation(config, logger);
      this[kSingleton] = instance;
      return instance;
    } else {
      throw new Error(`${this.implementation.name} has already been created.`);
    }
  }

  get(): T {
    const s = this[kSingleton];
    if (s === null) {
      throw new Error(`${this.implementation.name} has not yet been created.`);
    }
    return s;
  }

  exists(): boolean {
    return this[kSingleton] !== null;
  }
}

/**
 * Returns the last parameter that is not null, undefined, or NaN.
 * @param defaultValue The first parameter. This must not be null/undefined/NaN.
 * @param otherValues Other parameters, which may be null/undefined/NaN.
 */
export function lastOf<T>(
  defaultValue: T,
  ...otherValues: Array<T | null | undefined>
): T {
  for (let i = otherValues.length - 1; i >= 0; i--) {
    const value = otherValues[i];
    if (
      value !== null &&
      value !== undefined &&
      (typeof value !== 'number' || !isNaN(value))
    ) {
      return value;
    }
  }
  return defaultValue;
}

/**
 * Truncates the provided `string` to be at most `length` bytes
 * after utf8 encoding and the appending of '...'.
 * We produce the result by iterating over input characters to
 * avoid truncating the string potentially producing partial unicode
 * characters at the end.
 */
export function truncate(str: string, length: number) {
  if (Buffer.byteLength(str, 'utf8') <= length) {
    return str;
  }
  str = str.slice(0, length - 3);
  while (Buffer.byteLength(str, 'utf8') > length - 3) {
    str = str.slice(0, str.length - 1);
  }
  return str + '...';
}

/**
 * The identifiers of a span as they travel between processes.
 */
export interface SpanContext {
  /** 32 lowercase hex characters. */
  traceId: string;
  /** 16 lowercase hex characters. */
  spanId: string;
  options?: number;
}

const TRACE_ID_REGEX = /^[0-9a-f]{32}$/;
const SPAN_ID_REGEX = /^[0-9a-f]{16}$/;

/**
 * Returns whether the given span context carries well-formed, non-zero
 * identifiers.
 */
export function isValidSpanContext(spanContext: SpanContext): boolean {
  return (
    TRACE_ID_REGEX.test(spanContext.traceId) &&
    SPAN_ID_REGEX.test(spanContext.spanId) &&
    !/^0+$/.test(spanContext.traceId) &&
    !/^0+$/.test(spanContext.spanId)
  );
}

/**
 * Serialize the given span context into a Buffer.
 * @param spanContext The span context to serialize.
 */
export function serializeSpanContext(spanContext: SpanContext): Buffer {
  //  0           1           2
  //  0 1 2345678901234567 8 90123456 7 8
  // -------------------------------------
  // | | |                | |        | | |
  // -------------------------------------
  //  ^ ^      ^           ^    ^     ^ ^
  //  | |      |           |    |     | `-- options value (spanContext.options)
  //  | |      |           |    |     `---- options field ID (2)
  //  | |      |           |    `---------- spanID value (spanContext.spanId)
  //  | |      |           `--------------- spanID field ID (1)
  //  | |      `--------------------------- traceID value (spanContext.traceId)
  //  | `---------------------------------- traceID field ID (0)
  //  `------------------------------------ version (0)
  const result = Buffer.alloc(29, 0);
  result.write(spanContext.traceId, 2, 16, 'hex');
  result.writeUInt8(1, 18);
  result.write(spanContext.spanId, 19, 8, 'hex');
  result.writeUInt8(2, 27);
  result.writeUInt8(spanContext.options || 0, 28);
  return result;
}

/**
 * Deseralize the given span context from binary encoding. If the input is a
 * Buffer of incorrect size or unexpected fields, then this function will return
 * null.
 * @param buffer The span context to deserialize.
 */
export function deserializeSpanContext(buffer: Buffer): SpanContext | null {
  // Length must be 29.
  if (buffer.length !== 29) {
    return null;
  }
  // Check version and field numbers.
  if (
    buffer.readUInt8(0) !== 0 ||
    buffer.readUInt8(1) !== 0 ||
    buffer.readUInt8(18) !== 1 ||
    buffer.readUInt8(27) !== 2
  ) {
    return null;
  }
  // See serializeSpanContext for byte offsets.
  return {
    traceId: buffer.subarray(2, 18).toString('hex'),
    spanId: buffer.subarray(19, 27).toString('hex'),
    options: buffer.readUInt8(28),
  };
}
