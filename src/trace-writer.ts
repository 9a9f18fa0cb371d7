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


import {Logger} from './logger';
import {TraceSpan} from './trace';
import {Singleton} from './util';

/**
 * Receives ended spans in batches. A returned promise is awaited; a rejection
 * is logged and the batch dropped.
 */
export interface SpanExporter {
  export(spans: TraceSpan[]): void | Promise<void>;
}

/**
 * Writes each span to the logger at debug level.
 */
export class LoggingSpanExporter implements SpanExporter {
  constructor(private readonly logger: Logger) {}

  export(spans: TraceSpan[]) {
    for (const span of spans) {
      this.logger.debug('LoggingSpanExporter#export:', JSON.stringify(span));
    }
  }
}

export interface TraceWriterConfig {
  bufferSize: number;
  flushDelaySeconds: number;
  exporter?: SpanExporter;
}

export class SpanBuffer {
  /**
   * Buffered spans.
   */
  private spans: TraceSpan[] = [];

  /**
   * Add a new span to the buffer.
   * @param span The span to add.
   */
  add(span: TraceSpan) {
    this.spans.push(span);
  }

  getNumSpans() {
    return this.spans.length;
  }

  /**
   * Clears the buffer, returning its original contents.
   */
  drain(): TraceSpan[] {
    const result = this.spans;
    this.spans = [];
    return result;
  }
}

/**
 * A class that hands ended spans to an exporter in the background.
 */
export class TraceWriter {
  /** Spans to be exported */
  protected buffer = new SpanBuffer();
  /** Whether the trace writer is active */
  isActive = true;
  private readonly exporter: SpanExporter;
  private flushTimer: NodeJS.Timeout | null = null;

  /**
   * Constructs a new TraceWriter instance.
   * @param config A config object containing buffering limits and the
   *   exporter to hand spans to.
   * @param logger The agent's logger object.
   */
  constructor(
    private readonly config: TraceWriterConfig,
    private readonly logger: Logger
  ) {
    this.exporter = config.exporter || new LoggingSpanExporter(logger);
  }

  initialize(): void {
    this.scheduleFlush();
  }

  /**
   * Stops periodic flushing and exports whatever is still buffered.
   */
  stop(): Promise<void> {
    this.isActive = false;
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    return this.flushBuffer();
  }

  /**
   * Queues an ended span to be exported.
   *
   * @param span The span to be queued.
   */
  writeSpan(span: TraceSpan) {
    this.buffer.add(span);
    this.logger.info(
      `TraceWriter#writeSpan: number of buffered spans = ${this.buffer.getNumSpans()}`
    );
    // Flush the buffer if it's full.
    if (this.buffer.getNumSpans() >= this.config.bufferSize) {
      this.logger.info('TraceWriter#writeSpan: Span buffer full, flushing.');
      setImmediate(() => void this.flushBuffer());
    }
  }

  /**
   * Flushes the buffer of spans at a regular interval controlled by the
   * flushDelaySeconds property of this TraceWriter's config.
   */
  private scheduleFlush() {
    if (!this.isActive) {
      return;
    }
    // Do it again after delay. The timer doesn't keep the process alive.
    this.flushTimer = setTimeout(() => {
      this.logger.info('TraceWriter#scheduleFlush: Performing periodic flush.');
      void this.flushBuffer();
      this.scheduleFlush();
    }, this.config.flushDelaySeconds * 1000);
    this.flushTimer.unref();
  }

  /**
   * Hands the buffered spans to the exporter. The returned promise never
   * rejects.
   */
  async flushBuffer(): Promise<void> {
    const spans = this.buffer.drain();
    if (spans.length === 0) {
      return;
    }
    this.logger.debug(
      `TraceWriter#flushBuffer: Exporting ${spans.length} span(s).`
    );
    try {
      await this.exporter.export(spans);
    } catch (err) {
      this.logger.error(
        `TraceWriter#flushBuffer: Failed to export ${spans.length} span(s): ${err}`
      );
    }
  }
}

export const traceWriter = new Singleton(TraceWriter);
