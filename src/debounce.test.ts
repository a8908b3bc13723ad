import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Debouncer } from './debounce.js';
import { FakeClock } from './test-utils.js';

test('single item flushes after delay', async () => {
  const clock = new FakeClock();
  const debouncer = new Debouncer<string>(50, clock);
  const flushed: string[][] = [];

  debouncer.debounce('key1', 'hello', (items) => { flushed.push(items); });

  await clock.advance(49);
  assert.strictEqual(flushed.length, 0);
  await clock.advance(1);
  assert.deepStrictEqual(flushed, [['hello']]);
  assert.strictEqual(debouncer.has('key1'), false);
});

test('timer restarts on each new item and flushes everything together', async () => {
  const clock = new FakeClock();
  const debouncer = new Debouncer<string>(60, clock);
  const flushed: string[][] = [];
  const flush = (items: string[]) => { flushed.push(items); };

  debouncer.debounce('key1', 'first', flush);
  await clock.advance(40);
  debouncer.debounce('key1', 'second', flush);
  await clock.advance(40);
  // 80ms since the first item, 40ms since the last
  assert.strictEqual(flushed.length, 0);
  await clock.advance(20);
  assert.deepStrictEqual(flushed, [['first', 'second']]);
});

test('different keys are independent', async () => {
  const clock = new FakeClock();
  const debouncer = new Debouncer<string>(50, clock);
  const flushed: { key: string; items: string[] }[] = [];

  debouncer.debounce('a', 'a1', (items) => { flushed.push({ key: 'a', items }); });
  await clock.advance(30);
  debouncer.debounce('b', 'b1', (items) => { flushed.push({ key: 'b', items }); });
  await clock.advance(20);

  assert.deepStrictEqual(flushed, [{ key: 'a', items: ['a1'] }]);
  await clock.advance(30);
  assert.deepStrictEqual(flushed[1], { key: 'b', items: ['b1'] });
});

test('has() returns true for pending key', () => {
  const debouncer = new Debouncer<string>(1000, new FakeClock());
  assert.strictEqual(debouncer.has('key1'), false);
  debouncer.debounce('key1', 'item', () => {});
  assert.strictEqual(debouncer.has('key1'), true);
});

test('cancelAll() drops pending flushes', async () => {
  const clock = new FakeClock();
  const debouncer = new Debouncer<string>(50, clock);
  const flushed: string[][] = [];

  debouncer.debounce('key1', 'item', (items) => { flushed.push(items); });
  debouncer.cancelAll();
  await clock.advance(100);

  assert.strictEqual(flushed.length, 0);
  assert.strictEqual(debouncer.has('key1'), false);
  assert.strictEqual(clock.pendingCount, 0);
});
