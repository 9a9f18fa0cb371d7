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


import {AsyncHooksCLS} from './cls/async-hooks';
import {CLS, Func} from './cls/base';
import {RootContextCLS} from './cls/root';
import {SingularCLS} from './cls/singular';
import {Context} from './context';
import {Logger} from './logger';
import {Singleton} from './util';

/**
 * An enumeration of the possible mechanisms for supporting context propagation
 * through continuation-local storage.
 */
export enum TraceCLSMechanism {
  /**
   * Use the AsyncHooksCLS class to propagate context.
   */
  ASYNC_HOOKS = 'async-hooks',
  /**
   * Do not use any special mechanism to propagate context.
   * Only a single context can be current at a time.
   */
  SINGULAR = 'singular',
  /**
   * Do not write context; in other words, querying the current context will
   * always result in Context.ROOT.
   */
  NONE = 'none',
}

/**
 * Configuration options passed to the TraceCLS constructor.
 */
export interface TraceCLSConfig {
  mechanism: TraceCLSMechanism;
}

interface CLSConstructor {
  new (defaultContext: Context): CLS<Context>;
}

/**
 * An implementation of continuation-local storage for the tracer.
 * In addition to the underlying API, there is a guarantee that when an instance
 * of this class is disabled, all context-manipulation methods will either be
 * no-ops or pass-throughs.
 */
export class TraceCLS implements CLS<Context> {
  private currentCLS: CLS<Context>;
  // tslint:disable-next-line:variable-name CLSClass is a constructor.
  private CLSClass: CLSConstructor;
  private enabled = false;

  constructor(config: TraceCLSConfig, private readonly logger: Logger) {
    switch (config.mechanism) {
      case TraceCLSMechanism.ASYNC_HOOKS:
        this.CLSClass = AsyncHooksCLS;
        break;
      case TraceCLSMechanism.SINGULAR:
        this.CLSClass = SingularCLS;
        break;
      case TraceCLSMechanism.NONE:
        this.CLSClass = RootContextCLS;
        break;
      default:
        throw new Error(
          `CLS mechanism [${config.mechanism}] was not recognized.`
        );
    }
    this.logger.info(
      `TraceCLS#constructor: Created [${config.mechanism}] CLS instance.`
    );
    this.currentCLS = new RootContextCLS();
    this.currentCLS.enable();
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  enable(): void {
    if (!this.enabled) {
      this.logger.info('TraceCLS#enable: Enabling CLS.');
      this.currentCLS.disable();
      this.currentCLS = new this.CLSClass(Context.ROOT);
      this.currentCLS.enable();
    }
    this.enabled = true;
  }

  disable(): void {
    if (this.enabled && this.CLSClass !== RootContextCLS) {
      this.logger.info('TraceCLS#disable: Disabling CLS.');
      this.currentCLS.disable();
      this.currentCLS = new RootContextCLS();
      this.currentCLS.enable();
    }
    this.enabled = false;
  }

  getContext(): Context {
    return this.currentCLS.getContext();
  }

  runWithContext<T>(fn: Func<T>, value: Context): T {
    return this.currentCLS.runWithContext(fn, value);
  }

  bindWithCurrentContext<T>(fn: Func<T>): Func<T> {
    return this.currentCLS.bindWithCurrentContext(fn);
  }
}

export const cls = new Singleton(TraceCLS);
