import assert from 'node:assert/strict';
import { test } from 'node:test';
import { AsyncEvent, delay, untilAborted } from '../src/utils/async.js';
import { BoundedQueue } from '../src/utils/bounded-queue.js';

test('BoundedQueue keeps the newest entries and returns the evicted one', () => {
  const queue = new BoundedQueue<number>(3);
  assert.equal(queue.push(1), undefined);
  queue.push(2);
  queue.push(3);
  assert.equal(queue.push(4), 1);
  assert.deepEqual(queue.toArray(), [2, 3, 4]);
  assert.equal(queue.shift(), 2);
  assert.equal(queue.clear(), 2);
  assert.equal(queue.isEmpty(), true);
});

test('BoundedQueue rejects a non-positive capacity', () => {
  assert.throws(() => new BoundedQueue(0), RangeError);
});

test('AsyncEvent wakes waiters when set', async () => {
  const event = new AsyncEvent();
  const waiting = event.wait(1000);
  event.set();
  assert.equal(await waiting, true);
  assert.equal(await event.wait(0), true);

  event.clear();
  assert.equal(event.isSet(), false);
});

test('AsyncEvent wait times out with false', async () => {
  const event = new AsyncEvent();
  const started = Date.now();
  assert.equal(await event.wait(30), false);
  assert.ok(Date.now() - started >= 25);
});

test('delay returns early on abort', async () => {
  const controller = new AbortController();
  const started = Date.now();
  const sleeping = delay(5000, controller.signal);
  controller.abort();
  await sleeping;
  assert.ok(Date.now() - started < 1000);
});

test('untilAborted settles with the promise or the signal', async () => {
  const controller = new AbortController();
  await untilAborted(Promise.resolve(), controller.signal);

  const never = new Promise<void>(() => undefined);
  const waiting = untilAborted(never, controller.signal);
  controller.abort();
  await waiting;

  await assert.rejects(untilAborted(Promise.reject(new Error('closed')), new AbortController().signal), /closed/);
});
