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


import * as asyncHooks from 'async_hooks';

import {CLS, Func} from './base';

/**
 * An implementation of continuation-local storage on top of the async_hooks
 * module.
 */
export class AsyncHooksCLS<Context extends {}> implements CLS<Context> {
  /** A map of AsyncResource IDs to Context objects. */
  private contexts: {[id: number]: Context | undefined} = {};
  /** The AsyncHook that proactively populates entries in this.contexts. */
  private hook: asyncHooks.AsyncHook;
  /** Functions returned by bindWithCurrentContext. */
  private readonly bound = new WeakSet<Function>();
  /** Whether this instance is enabled. */
  private enabled = false;

  constructor(private readonly defaultContext: Context) {
    this.hook = asyncHooks.createHook({
      init: (id: number, type: string, triggerId: number) => {
        // init is called when a new AsyncResource is created. We want code
        // that runs within the scope of this new AsyncResource to see the same
        // context as its "parent" AsyncResource. The criteria for the parent
        // depends on the type of the AsyncResource. (If the parent doesn't have
        // an associated context, don't do anything.)
        if (type === 'PROMISE') {
          // Opt not to use the trigger ID for Promises, as this causes context
          // confusion in applications using async/await.
          // Instead, use the ID of the AsyncResource in whose scope we are
          // currently running.
          const currentId = asyncHooks.executionAsyncId();
          if (this.contexts[currentId] !== undefined) {
            this.contexts[id] = this.contexts[currentId];
          }
        } else {
          // Use the trigger ID for any other type. Users of the AsyncResource
          // API can specify their own trigger ID; we respect that selection.
          if (this.contexts[triggerId] !== undefined) {
            this.contexts[id] = this.contexts[triggerId];
          }
        }
      },
      destroy: (id: number) => {
        // destroy is called when the AsyncResource is no longer used, so also
        // delete its entry in the map.
        delete this.contexts[id];
      },
      promiseResolve: (id: number) => {
        // Promise async resources may not get their destroy hook entered for
        // a long time, so we listen on promiseResolve hooks as well. If this
        // event is emitted, the async scope of the Promise will not be entered
        // again, so it is generally safe to delete its entry in the map.
        delete this.contexts[id];
      },
    });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  enable(): void {
    this.contexts = {};
    this.hook.enable();
    this.enabled = true;
  }

  disable(): void {
    this.contexts = {};
    this.hook.disable();
    this.enabled = false;
  }

  getContext(): Context {
    // We don't store this.defaultContext directly in this.contexts.
    // Getting undefined when looking up this.contexts means that it wasn't
    // set, so return the default context.
    const context = this.contexts[asyncHooks.executionAsyncId()];
    return context === undefined ? this.defaultContext : context;
  }

  runWithContext<T>(fn: Func<T>, value: Context): T {
    // Run fn() so that any AsyncResource objects that are created in
    // fn will have the given context.
    const id = asyncHooks.executionAsyncId();
    const oldContext = this.contexts[id];
    this.contexts[id] = value;
    try {
      return fn();
    } finally {
      // Revert the current context to what it was before fn was called.
      if (oldContext === undefined) {
        delete this.contexts[id];
      } else {
        this.contexts[id] = oldContext;
      }
    }
  }

  bindWithCurrentContext<T>(fn: Func<T>): Func<T> {
    // Return if we have already wrapped the function.
    if (this.bound.has(fn)) {
      return fn;
    }
    // Capture the context of the current AsyncResource.
    const boundContext = this.contexts[asyncHooks.executionAsyncId()];
    // Return if there is no current context to bind.
    if (boundContext === undefined) {
      return fn;
    }
    const that = this;
    // Wrap fn so that any AsyncResource objects that are created in fn will
    // share context with that of the AsyncResource with the given ID.
    const contextWrapper = function (this: unknown, ...args: unknown[]): T {
      return that.runWithContext(() => fn.apply(this, args), boundContext);
    };
    // Explicitly inherit the original function's length, because it is
    // otherwise zero-ed out.
    Object.defineProperty(contextWrapper, 'length', {
      enumerable: false,
      configurable: true,
      writable: false,
      value: fn.length,
    });
    this.bound.add(contextWrapper);
    return contextWrapper;
  }
}
