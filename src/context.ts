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


import type {Span} from './plugin-types';

/**
 * An immutable handle carrying the current span and any other entries that
 * travel with a call. Every `with*` method returns a new instance.
 */
export class Context {
  static readonly ROOT: Context = new Context(null, new Map());

  private constructor(
    private readonly span: Span | null,
    private readonly entries: ReadonlyMap<symbol, unknown>
  ) {}

  getSpan(): Span | null {
    return this.span;
  }

  withSpan(span: Span): Context {
    return new Context(span, this.entries);
  }

  getValue(key: symbol): unknown {
    return this.entries.get(key);
  }

  withValue(key: symbol, value: unknown): Context {
    const entries = new Map(this.entries);
    entries.set(key, value);
    return new Context(this.span, entries);
  }
}

/**
 * Creates a key for storing an entry in a Context. Keys are compared by
 * identity, so two keys with the same description do not collide.
 */
export function createContextKey(description: string): symbol {
  return Symbol(description);
}
