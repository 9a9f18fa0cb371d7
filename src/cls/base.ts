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

// tslint:disable-next-line:no-any
export type Func<T = void> = (...args: any[]) => T;

/**
 * Carries the current trace context of a call across the callbacks it
 * triggers, so a handler reads the span of the call it serves.
 */
export interface CLS<Context extends {}> {
  isEnabled(): boolean;

  enable(): void;

  /**
   * After this, only `enable` has a defined effect.
   */
  disable(): void;

  /**
   * Returns the context of the enclosing `runWithContext`, or the
   * implementation's default outside of one.
   */
  getContext(): Context;

  /**
   * Runs `fn` synchronously with `value` as the current context. The
   * previous context is current again once `fn` returns or throws, and
   * work `fn` schedules keeps seeing `value` where the mechanism follows
   * asynchronous calls.
   */
  runWithContext<T>(fn: Func<T>, value: Context): T;

  /**
   * Wraps `fn` so that it runs with the context current now, for callbacks
   * the mechanism would not follow on its own.
   */
  bindWithCurrentContext<T>(fn: Func<T>): Func<T>;
}
