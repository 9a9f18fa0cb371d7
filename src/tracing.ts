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


import {cls, TraceCLSConfig} from './cls';
import {LogLevel, logLevelToName, Logger} from './logger';
import {BinaryFormatPropagation, Propagation} from './propagation';
import {errorMessage} from './span-data';
import {TraceAgent, TraceAgentConfig} from './trace-api';
import {traceWriter, TraceWriterConfig} from './trace-writer';
import {Component, Forceable, Singleton} from './util';

export type TopLevelConfig = Forceable<{
  enabled: boolean;
  logLevel: number;
  clsConfig: Forceable<TraceCLSConfig>;
  writerConfig: Forceable<TraceWriterConfig>;
  tracerConfig: TraceAgentConfig;
  overrides: {
    propagation?: Propagation;
  };
}>;

/**
 * A class that represents the tracing components of a process: the
 * continuation-local storage, the trace writer and the tracer.
 */
export class Tracing implements Component {
  /** A logger. */
  protected readonly logger: Logger;

  /**
   * Constructs a new Tracing instance.
   * @param config The configuration for this instance.
   * @param traceAgent The tracer to enable.
   */
  constructor(
    private readonly config: TopLevelConfig,
    private readonly traceAgent: TraceAgent
  ) {
    this.logger = this.createLogger(
      logLevelToName(config.enabled ? config.logLevel : 0)
    );
  }

  protected createLogger(level: LogLevel): Logger {
    return new Logger({level, tag: 'grpc-server-tracing'});
  }

  /**
   * Enables continuation-local storage, the trace writer and the tracer.
   */
  enable(): void {
    if (!this.config.enabled) {
      return;
    }

    try {
      traceWriter.create(this.config.writerConfig, this.logger);
      cls.create(this.config.clsConfig, this.logger);
    } catch (e) {
      this.logger.error(
        'Tracing#enable: Disabling tracing for the',
        `following reason: ${errorMessage(e)}`
      );
      this.disable();
      return;
    }
    traceWriter.get().initialize();
    cls.get().enable();

    const propagation =
      this.config.overrides.propagation || new BinaryFormatPropagation();
    this.traceAgent.enable(this.config.tracerConfig, {
      logger: this.logger,
      propagation,
    });

    this.logger.info('Tracing#enable: Tracing activated.');
  }

  /**
   * Disables the tracer, so interceptors stop recording, and stops the trace
   * writer after exporting what it still buffers.
   */
  disable() {
    if (this.traceAgent.isActive()) {
      this.traceAgent.disable();
    }
    if (cls.exists()) {
      cls.get().disable();
    }
    if (traceWriter.exists()) {
      void traceWriter.get().stop();
    }
  }
}

export const tracing = new Singleton(Tracing);
