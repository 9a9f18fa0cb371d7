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
import {describe, it} from 'mocha';

import {Constants} from '../src/constants';
import {Logger} from '../src/logger';
import * as util from '../src/util';

import {TestLogger} from './logger';

describe('Singleton', () => {
  const logger = new TestLogger();
  class MyClass {
    disabled = false;
    constructor(
      public config: {},
      public logger: Logger
    ) {}
    disable() {
      this.disabled = true;
    }
  }

  describe('create', () => {
    it('creates an instance of the given class', () => {
      const createResult = new util.Singleton(MyClass).create({}, logger);
      assert.ok(createResult instanceof MyClass);
    });

    it('passes arguments to the underlying constructor', () => {
      const config = {};
      const createResult = new util.Singleton(MyClass).create(config, logger);
      assert.strictEqual(createResult.logger, logger);
      assert.strictEqual(createResult.config, config);
    });

    it('throws when used more than once, by default', () => {
      const singleton = new util.Singleton(MyClass);
      singleton.create({}, logger);
      assert.throws(
        () => singleton.create({}, logger),
        /^Error: MyClass has already been created\.$/
      );
    });

    it('creates a new instance when [FORCE_NEW] is true in the config', () => {
      const singleton = new util.Singleton(MyClass);
      const createResult1 = singleton.create({}, logger);
      const createResult2 = singleton.create({[util.FORCE_NEW]: true}, logger);
      assert.notStrictEqual(createResult1, createResult2);
    });

    it('disables the replaced instance', () => {
      const singleton = new util.Singleton(MyClass);
      const createResult1 = singleton.create({}, logger);
      singleton.create({[util.FORCE_NEW]: true}, logger);
      assert.strictEqual(createResult1.disabled, true);
    });
  });

  describe('get', () => {
    it('throws if create was not called first', () => {
      assert.throws(
        () => new util.Singleton(MyClass).get(),
        /^Error: MyClass has not yet been created\.$/
      );
    });

    it('returns the same value returned by create function', () => {
      const singleton = new util.Singleton(MyClass);
      const createResult = singleton.create({}, logger);
      assert.strictEqual(singleton.get(), createResult);
      assert.ok(singleton.exists());
    });

    it('does not return a stale value', () => {
      const singleton = new util.Singleton(MyClass);
      singleton.create({}, logger);
      const createResult = singleton.create({[util.FORCE_NEW]: true}, logger);
      assert.strictEqual(singleton.get(), createResult);
    });
  });
});

describe('util.lastOf', () => {
  it('should return the last non-null/undefined/NaN parameter', () => {
    const {lastOf} = util;
    assert.strictEqual(lastOf<number>(1), 1);
    assert.strictEqual(lastOf<number>(1, 2, null), 2);
    assert.strictEqual(lastOf<number>(1, null, 2), 2);
    assert.strictEqual(lastOf<number>(1, 2, undefined), 2);
    assert.strictEqual(lastOf<number>(1, 2, NaN), 2);
    assert.strictEqual(lastOf<number>(1, 0), 0);
    assert.strictEqual(lastOf<number | string>(1, ''), '');
  });
});

describe('util.truncate', () => {
  it('should truncate strings longer than size', () => {
    assert.strictEqual(util.truncate('abcdefghijklmno', 5), 'ab...');
  });

  it('should not truncate strings shorter than size', () => {
    assert.strictEqual(util.truncate('abcdefghijklmno', 50), 'abcdefghijklmno');
  });

  it('should not split multi-byte characters', () => {
    const longName = new Array(120).join('☃');
    assert.strictEqual(
      util.truncate(longName, Constants.SPAN_NAME_LIMIT),
      `${new Array(42).join('☃')}...`
    );
  });
});

describe('span context', () => {
  const spanContext = {
    traceId: '4bf92f3577b34da6a3ce929d0e0e4736',
    spanId: '00f067aa0ba902b7',
    options: 1,
  };

  describe('isValidSpanContext', () => {
    it('accepts lowercase hex identifiers', () => {
      assert.ok(util.isValidSpanContext(spanContext));
    });

    const invalid = [
      {traceId: '4BF92F3577B34DA6A3CE929D0E0E4736', spanId: '00f067aa0ba902b7'},
      {traceId: '4bf92f3577b34da6', spanId: '00f067aa0ba902b7'},
      {traceId: '00000000000000000000000000000000', spanId: '00f067aa0ba902b7'},
      {traceId: '4bf92f3577b34da6a3ce929d0e0e4736', spanId: '0000000000000000'},
      {traceId: '4bf92f3577b34da6a3ce929d0e0e4736', spanId: 'zzf067aa0ba902b7'},
    ];
    for (const input of invalid) {
      it(`rejects ${input.traceId}/${input.spanId}`, () => {
        assert.ok(!util.isValidSpanContext(input));
      });
    }
  });

  describe('serializeSpanContext', () => {
    it('writes the binary layout', () => {
      const buffer = util.serializeSpanContext(spanContext);
      assert.strictEqual(
        buffer.toString('hex'),
        '0000' +
          '4bf92f3577b34da6a3ce929d0e0e4736' +
          '01' +
          '00f067aa0ba902b7' +
          '02' +
          '01'
      );
    });

    it('writes zero options when none are given', () => {
      const buffer = util.serializeSpanContext({
        traceId: spanContext.traceId,
        spanId: spanContext.spanId,
      });
      assert.strictEqual(buffer.readUInt8(28), 0);
    });
  });

  describe('deserializeSpanContext', () => {
    it('reads what serializeSpanContext writes', () => {
      assert.deepStrictEqual(
        util.deserializeSpanContext(util.serializeSpanContext(spanContext)),
        spanContext
      );
    });

    it('returns null for a buffer of the wrong size', () => {
      assert.strictEqual(util.deserializeSpanContext(Buffer.alloc(28)), null);
      assert.strictEqual(util.deserializeSpanContext(Buffer.alloc(30)), null);
    });

    for (const offset of [0, 1, 18, 27]) {
      it(`returns null when byte ${offset} is unexpected`, () => {
        const buffer = util.serializeSpanContext(spanContext);
        buffer.writeUInt8(7, offset);
        assert.strictEqual(util.deserializeSpanContext(buffer), null);
      });
    }
  });
});
