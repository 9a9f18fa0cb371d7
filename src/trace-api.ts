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

import {cls} from './cls';
import {SpanType} from './constants';
import {Context} from './context';
import {Logger} from './logger';
import {Func, Span, SpanOptions, Tracer} from './plugin-types';
import {Propagation} from './propagation';
import {DISABLED_SPAN, randomTraceId, SpanData} from './span-data';
import {SpanKind} from './trace';
import {SpanContext} from './util';

/**
 * An interface describing configuration fields read by the TraceAgent
 * object.
 */
export interface TraceAgentConfig {
  captureExperimentalSpanAttributes: boolean;
  maximumAttributeValueSize: number;
}

/**
 * A collection of externally-instantiated objects used by TraceAgent.
 */
export interface TraceAgentComponents {
  logger: Logger;
  propagation: Propagation;
}

/**
 * TraceAgent exposes a number of methods to create trace spans and
 * propagate trace context across asynchronous boundaries.
 */
export class TraceAgent implements Tracer {
  private enabled = false;
  private config: TraceAgentConfig | null = null;
  private propagation: Propagation | null = null;
  private currentLogger: Logger = new Logger({level: false});

  /**
   * Constructs a new TraceAgent instance.
   * @param name A string identifying this TraceAgent instance in logs.
   */
  constructor(private readonly name: string) {
    this.disable(); // disable immediately
  }

  get logger(): Logger {
    return this.currentLogger;
  }

  /**
   * Enables this instance. This function is only for internal use and
   * unit tests. A separate TraceWriter instance should be initialized
   * beforehand.
   * @param config An object specifying how this instance should
   * be configured.
   * @param components An collection of externally-instantiated objects used
   * by this instance.
   * @private
   */
  enable(config: TraceAgentConfig, components: TraceAgentComponents) {
    this.config = config;
    this.currentLogger = components.logger;
    this.propagation = components.propagation;
    this.enabled = true;
  }

  /**
   * Disable this instance. Interceptors created from it keep delegating every
   * call, but record nothing.
   * @private
   */
  disable() {
    this.enabled = false;
  }

  /**
   * Returns whether the TraceAgent instance is active.
   * @private
   */
  isActive(): boolean {
    return this.enabled;
  }

  experimentalSpanAttributesEnabled(): boolean {
    return !!this.config && this.config.captureExperimentalSpanAttributes;
  }

  getConfig(): TraceAgentConfig {
    if (!this.config) {
      throw new Error('Configuration is not available.');
    }
    return this.config;
  }

  startSpan(options: SpanOptions): Span {
    if (!this.enabled || !this.config) {
      return DISABLED_SPAN;
    }
    const parent = options.parent || null;
    const span = new SpanData(
      {
        name: options.name,
        kind: options.kind || SpanKind.INTERNAL,
        traceId: parent ? parent.traceId : randomTraceId(),
        parentSpanId: parent ? parent.spanId : undefined,
        maximumAttributeValueSize: this.config.maximumAttributeValueSize,
      },
      this.currentLogger
    );
    this.currentLogger.debug(
      `TraceAgent#startSpan: [${this.name}] Started span [${options.name}]${
        parent ? ` with remote parent ${parent.spanId}` : ''
      }`
    );
    return span;
  }

  getCurrentContext(): Context {
    if (!this.enabled) {
      return Context.ROOT;
    }
    return cls.get().getContext();
  }

  runInContext<T>(context: Context, fn: () => T): T {
    if (!this.enabled) {
      return fn();
    }
    return cls.get().runWithContext(fn, context);
  }

  extractSpanContext(metadata: Metadata): SpanContext | null {
    if (!this.enabled || !this.propagation) {
      return null;
    }
    return this.propagation.extract(metadata);
  }

  isRealSpan(span: Span): boolean {
    return span.type === SpanType.ROOT;
  }

  wrap<T>(fn: Func<T>): Func<T> {
    if (!this.enabled) {
      return fn;
    }
    return cls.get().bindWithCurrentContext(fn);
  }
}
