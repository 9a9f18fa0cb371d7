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


import extend from 'extend';
import * as path from 'path';

import {TraceCLSMechanism} from './cls';
import {CLSMechanism, Config, defaultConfig} from './config';
import {Constants} from './constants';
import * as PluginTypes from './plugin-types';
import {createGrpcServerInterceptor} from './plugins/plugin-grpc-js';
import {ServerTracer} from './server-tracer';
import {TraceAgent} from './trace-api';
import {traceWriter} from './trace-writer';
import {Tracing, TopLevelConfig, tracing} from './tracing';
import {
  newInterceptor as newTracingInterceptor,
  TracingInterceptorOptions,
  TracingServerInterceptor,
} from './tracing-interceptor';
import {FORCE_NEW, Forceable, lastOf} from './util';

export type {Config, TracingInterceptorOptions};
export type {
  RpcStatus,
  ServerCall,
  ServerCallHandler,
  ServerCallListener,
  ServerInterceptor,
  SocketAddress,
} from './server-call';
export type {Propagation} from './propagation';
export type {SpanExporter} from './trace-writer';
export type {TraceSpan} from './trace';
export {PluginTypes, ServerTracer, TracingServerInterceptor};
export {
  ForwardingServerCall,
  ForwardingServerCallListener,
  interceptHandler,
} from './server-call';
export {BinaryFormatPropagation} from './propagation';
export {LoggingSpanExporter} from './trace-writer';
export {createGrpcServerInterceptor};

let traceAgent: TraceAgent | undefined;

function getAgent(): TraceAgent {
  if (!traceAgent) {
    traceAgent = new TraceAgent('grpc-server-tracing');
  }
  return traceAgent;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  switch (value && value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      return undefined;
  }
}

function getInternalClsMechanism(
  clsMechanism: CLSMechanism
): TraceCLSMechanism {
  switch (clsMechanism) {
    case 'async-hooks':
      return TraceCLSMechanism.ASYNC_HOOKS;
    case 'singular':
      return TraceCLSMechanism.SINGULAR;
    case 'none':
      return TraceCLSMechanism.NONE;
    default:
      throw new Error(
        `config.clsMechanism [${clsMechanism}] was not recognized.`
      );
  }
}

/**
 * Normalizes the user-provided configuration object by adding default values
 * and overriding with env variables when they are provided.
 * @param userConfig The user-provided configuration object. It will not
 * be modified.
 * @return A normalized configuration object.
 */
export function initConfig(userConfig: Forceable<Config>): TopLevelConfig {
  let envSetConfig: object = {};
  const configPath = process.env.GRPC_TRACE_CONFIG;
  if (configPath) {
    const loaded: unknown = require(path.resolve(configPath));
    if (loaded && typeof loaded === 'object') {
      envSetConfig = loaded;
    }
  }
  // Configuration order of precedence:
  // 1. Environment Variables
  // 2. Project Config
  // 3. Environment Variable Set Configuration File (from GRPC_TRACE_CONFIG)
  // 4. Default Config (as specified in './config')
  // The exporter and the propagation are held by reference: a deep merge
  // would hand the writer a copy of any plain-object implementation.
  const mergedConfig: typeof defaultConfig & Config = extend(
    true,
    {},
    defaultConfig,
    envSetConfig,
    userConfig
  );
  const forceNew = userConfig[FORCE_NEW];

  return {
    [FORCE_NEW]: forceNew,
    enabled: mergedConfig.enabled,
    logLevel: lastOf(
      mergedConfig.logLevel,
      Number(process.env.GRPC_TRACE_LOGLEVEL)
    ),
    clsConfig: {
      [FORCE_NEW]: forceNew,
      mechanism: getInternalClsMechanism(mergedConfig.clsMechanism),
    },
    writerConfig: {
      [FORCE_NEW]: forceNew,
      bufferSize: mergedConfig.bufferSize,
      flushDelaySeconds: mergedConfig.flushDelaySeconds,
      exporter: userConfig.exporter,
    },
    tracerConfig: {
      captureExperimentalSpanAttributes: lastOf(
        mergedConfig.captureExperimentalSpanAttributes,
        parseBoolean(process.env.GRPC_TRACE_EXPERIMENTAL_SPAN_ATTRIBUTES)
      ),
      maximumAttributeValueSize: Math.min(
        mergedConfig.maximumAttributeValueSize,
        Constants.ATTRIBUTE_VALUE_LIMIT
      ),
    },
    overrides: {
      propagation: userConfig.propagation,
    },
  };
}

/**
 * Starts tracing with the given configuration (if provided). This function
 * should only be called once.
 * @param config A configuration object.
 * @returns The tracer that interceptors created by this module use.
 *
 * @example
 * const tracer = start({logLevel: 2});
 * const server = new grpc.Server({interceptors: [grpcServerInterceptor()]});
 */
export function start(config?: Forceable<Config>): PluginTypes.Tracer {
  const normalizedConfig = initConfig(config || {});
  const agent = getAgent();
  let instance: Tracing;
  try {
    instance = tracing.create(normalizedConfig, agent);
  } catch (e) {
    // An error could be thrown if create() is called multiple times.
    // It's not a helpful error message for the end user, so make it more
    // useful here.
    throw new Error('Cannot call start on an already created agent.');
  }
  instance.enable();
  return agent;
}

/**
 * Get the previously created tracer. Before `start` is called, the tracer is
 * disabled: interceptors built on it delegate every call and record nothing.
 */
export function get(): PluginTypes.Tracer {
  return getAgent();
}

/**
 * Hands every buffered span to the exporter. The returned promise never
 * rejects.
 */
export function flush(): Promise<void> {
  return traceWriter.exists()
    ? traceWriter.get().flushBuffer()
    : Promise.resolve();
}

/**
 * Creates an interceptor that traces server calls with the given tracer,
 * or with the tracer returned by `get()`.
 */
export function newInterceptor(
  tracer: PluginTypes.Tracer | ServerTracer = get(),
  options?: TracingInterceptorOptions
): TracingServerInterceptor {
  return newTracingInterceptor(tracer, options);
}

/**
 * Creates a @grpc/grpc-js server interceptor that traces each call.
 *
 * @example
 * start();
 * const server = new grpc.Server({interceptors: [grpcServerInterceptor()]});
 */
export function grpcServerInterceptor(
  tracer: PluginTypes.Tracer | ServerTracer = get(),
  options?: TracingInterceptorOptions
) {
  return createGrpcServerInterceptor(
    newTracingInterceptor(tracer, options),
    tracer.logger
  );
}
