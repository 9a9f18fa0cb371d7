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

import {Context, createContextKey} from '../src/context';
import {DISABLED_SPAN} from '../src/span-data';

describe('Context', () => {
  it('holds no span at the root', () => {
    assert.strictEqual(Context.ROOT.getSpan(), null);
  });

  it('returns a new context from withSpan', () => {
    const context = Context.ROOT.withSpan(DISABLED_SPAN);
    assert.notStrictEqual(context, Context.ROOT);
    assert.strictEqual(context.getSpan(), DISABLED_SPAN);
    assert.strictEqual(Context.ROOT.getSpan(), null);
  });

  it('returns a new context from withValue', () => {
    const key = createContextKey('tenant');
    const context = Context.ROOT.withValue(key, 'acme');
    assert.strictEqual(context.getValue(key), 'acme');
    assert.strictEqual(Context.ROOT.getValue(key), undefined);
  });

  it('keeps values when the span changes', () => {
    const key = createContextKey('tenant');
    const context = Context.ROOT.withValue(key, 'acme').withSpan(DISABLED_SPAN);
    assert.strictEqual(context.getValue(key), 'acme');
    assert.strictEqual(context.getSpan(), DISABLED_SPAN);
  });

  it('keeps the span when a value is added', () => {
    const key = createContextKey('tenant');
    const context = Context.ROOT.withSpan(DISABLED_SPAN).withValue(key, 1);
    assert.strictEqual(context.getSpan(), DISABLED_SPAN);
  });

  it('does not confuse keys with the same description', () => {
    const first = createContextKey('tenant');
    const second = createContextKey('tenant');
    const context = Context.ROOT.withValue(first, 'acme');
    assert.strictEqual(context.getValue(second), undefined);
  });
});
