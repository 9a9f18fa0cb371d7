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


import * as assert from 'assert';
import {afterEach, before, describe, it} from 'mocha';

import {SpanType} from '../src/constants';
import {
  describeError,
  DISABLED_SPAN,
  randomSpanId,
  randomTraceId,
  SpanData,
  SpanDataOptions,
} from '../src/span-data';
import {SpanKind, SpanStatusCode} from '../src/trace';

import {TestLogger} from './logger';
import * as traceTestModule from './trace';

describe('SpanData', () => {
  let logger: TestLogger;

  before(() => {
    traceTestModule.start();
  });

  afterEach(() => {
    traceTestModule.clearTraceData();
  });

  function createSpan(options: Partial<SpanDataOptions> = {}) {
    logger = new TestLogger();
    return new SpanData(
      Object.assign(
        {
          name: 'test-span',
          kind: SpanKind.SERVER,
          traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
          maximumAttributeValueSize: 16,
        },
        options
      ),
      logger
    );
  }

  it('creates a TraceSpan structure with expected fields', () => {
    const spanData = createSpan({parentSpanId: '00f067aa0ba902b7'});
    assert.strictEqual(spanData.type, SpanType.ROOT);
    assert.strictEqual(spanData.span.name, 'test-span');
    assert.strictEqual(spanData.span.kind, SpanKind.SERVER);
    assert.strictEqual(spanData.span.parentSpanId, '00f067aa0ba902b7');
    assert.ok(/^[0-9a-f]{16}$/.test(spanData.span.spanId));
    assert.deepStrictEqual(spanData.span.status, {code: SpanStatusCode.UNSET});
    assert.strictEqual(spanData.span.endTime, '');
  });

  it('omits the parent of a root span', () => {
    assert.ok(!('parentSpanId' in createSpan().span));
  });

  it('creates spans with unique span IDs', () => {
    const spanIds = new Set<string>();
    for (let i = 0; i < 5; i++) {
      spanIds.add(createSpan().span.spanId);
    }
    assert.strictEqual(spanIds.size, 5);
  });

  it('exposes its span context', () => {
    const spanData = createSpan();
    assert.deepStrictEqual(spanData.getSpanContext(), {
      traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
      spanId: spanData.span.spanId,
      options: 1,
    });
  });

  it('truncates the span name', () => {
    const spanData = createSpan({name: 'a'.repeat(200)});
    assert.strictEqual(spanData.span.name, `${'a'.repeat(124)}...`);
  });

  it('truncates attribute keys and string values', () => {
    const spanData = createSpan();
    spanData.setAttribute('k'.repeat(130), 'v'.repeat(20));
    spanData.setAttribute('count', 123456789012345);
    assert.deepStrictEqual(spanData.span.attributes, {
      [`${'k'.repeat(124)}...`]: `${'v'.repeat(13)}...`,
      count: 123456789012345,
    });
  });

  it('caps the maximum attribute value size', () => {
    const spanData = createSpan({maximumAttributeValueSize: 20000});
    spanData.setAttribute('key', 'v'.repeat(17000));
    assert.strictEqual(
      spanData.span.attributes['key'],
      `${'v'.repeat(16380)}...`
    );
  });

  it('truncates event attribute values', () => {
    const spanData = createSpan();
    spanData.addEvent('message', {'message.id': 1, text: 'x'.repeat(40)});
    assert.strictEqual(spanData.span.events.length, 1);
    assert.strictEqual(spanData.span.events[0].name, 'message');
    assert.deepStrictEqual(spanData.span.events[0].attributes, {
      'message.id': 1,
      text: `${'x'.repeat(13)}...`,
    });
  });

  it('replaces the status', () => {
    const spanData = createSpan();
    spanData.setStatus({code: SpanStatusCode.ERROR, message: 'failed'});
    assert.deepStrictEqual(spanData.span.status, {
      code: SpanStatusCode.ERROR,
      message: 'failed',
    });
    spanData.setStatus({code: SpanStatusCode.OK});
    assert.deepStrictEqual(spanData.span.status, {code: SpanStatusCode.OK});
  });

  it('records an exception event', () => {
    const spanData = createSpan({maximumAttributeValueSize: 512});
    spanData.recordException(new TypeError('bad input'));
    const [event] = spanData.span.events;
    assert.strictEqual(event.name, 'exception');
    assert.strictEqual(event.attributes['exception.type'], 'TypeError');
    assert.strictEqual(event.attributes['exception.message'], 'bad input');
  });

  describe('endSpan', () => {
    it('writes the span to the trace writer once', () => {
      const spanData = createSpan();
      spanData.endSpan();
      assert.ok(spanData.isEnded());
      assert.strictEqual(traceTestModule.getOneSpan(), spanData.span);
    });

    it('uses the given end time', () => {
      const spanData = createSpan();
      spanData.endSpan(new Date(Date.UTC(2020, 0, 1)));
      assert.strictEqual(spanData.span.endTime, '2020-01-01T00:00:00.000Z');
    });

    it('warns and does nothing when ended twice', () => {
      const spanData = createSpan();
      spanData.endSpan();
      const endTime = spanData.span.endTime;
      spanData.endSpan();
      assert.strictEqual(traceTestModule.getSpans().length, 1);
      assert.strictEqual(spanData.span.endTime, endTime);
      assert.strictEqual(logger.getNumLogsWith('warn', 'was already ended'), 1);
    });

    it('ignores changes after the span has ended', () => {
      const spanData = createSpan();
      spanData.endSpan();
      spanData.setAttribute('late', 'value');
      spanData.addEvent('late');
      spanData.setStatus({code: SpanStatusCode.ERROR});
      spanData.recordException(new Error('late'));
      assert.deepStrictEqual(spanData.span.attributes, {});
      assert.deepStrictEqual(spanData.span.events, []);
      assert.deepStrictEqual(spanData.span.status, {
        code: SpanStatusCode.UNSET,
      });
      assert.strictEqual(logger.getNumLogsWith('debug', 'already ended'), 4);
    });
  });
});

describe('DISABLED_SPAN', () => {
  it('records nothing', () => {
    assert.strictEqual(DISABLED_SPAN.type, SpanType.DISABLED);
    assert.strictEqual(DISABLED_SPAN.getSpanContext(), null);
    DISABLED_SPAN.setAttribute('key', 'value');
    DISABLED_SPAN.endSpan();
    assert.strictEqual(DISABLED_SPAN.isEnded(), false);
  });
});

describe('describeError', () => {
  it('describes an Error by its class, message and stack', () => {
    class QuotaError extends Error {}
    const error = new QuotaError('quota exceeded');
    assert.deepStrictEqual(describeError(error), {
      'exception.type': 'QuotaError',
      'exception.message': 'quota exceeded',
      'exception.stacktrace': error.stack,
    });
  });

  it('describes a thrown string', () => {
    assert.deepStrictEqual(describeError('oops'), {
      'exception.type': 'string',
      'exception.message': "'oops'",
    });
  });

  it('describes a thrown object', () => {
    assert.deepStrictEqual(describeError({code: 7}), {
      'exception.type': 'object',
      'exception.message': '{ code: 7 }',
    });
  });
});

describe('random identifiers', () => {
  it('generates 32 hex character trace IDs', () => {
    assert.ok(/^[0-9a-f]{32}$/.test(randomTraceId()));
  });

  it('generates non-zero 16 hex character span IDs', () => {
    const spanId = randomSpanId();
    assert.ok(/^[0-9a-f]{16}$/.test(spanId));
    assert.notStrictEqual(spanId, '0000000000000000');
  });
});
