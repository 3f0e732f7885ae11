/**
 * AsyncQueue Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AsyncQueue, QueueClosedError } from '../src/lib/concurrency/async-queue.js';

describe('AsyncQueue', () => {
  it('should deliver items in FIFO order', async () => {
    const queue = new AsyncQueue<number>();
    queue.put(1);
    queue.put(2);
    queue.put(3);

    assert.deepStrictEqual(await queue.get(10), { status: 'item', item: 1 });
    assert.deepStrictEqual(await queue.get(10), { status: 'item', item: 2 });
    assert.deepStrictEqual(await queue.get(10), { status: 'item', item: 3 });
    assert.strictEqual(queue.size, 0);
  });

  it('should hand a put item to a waiting getter', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.get(1000);
    queue.put('x');

    assert.deepStrictEqual(await pending, { status: 'item', item: 'x' });
    assert.strictEqual(queue.size, 0);
  });

  it('should time out when nothing arrives', async () => {
    const queue = new AsyncQueue<string>();
    assert.deepStrictEqual(await queue.get(10), { status: 'timeout' });
  });

  it('should treat an aborted signal as a timeout', async () => {
    const queue = new AsyncQueue<string>();
    const controller = new AbortController();
    const pending = queue.get(10_000, controller.signal);
    controller.abort();

    assert.deepStrictEqual(await pending, { status: 'timeout' });

    // The abandoned waiter must not swallow later items
    queue.put('later');
    assert.strictEqual(queue.tryGet(), 'later');
  });

  it('should wake a waiting getter on close', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.get(10_000);
    queue.close();

    assert.deepStrictEqual(await pending, { status: 'closed' });
    assert.strictEqual(queue.closed, true);
  });

  it('should reject put after close', () => {
    const queue = new AsyncQueue<string>();
    queue.close();
    assert.throws(() => queue.put('late'), QueueClosedError);
  });

  it('should still return buffered items after close', async () => {
    const queue = new AsyncQueue<string>();
    queue.put('kept');
    queue.close();

    assert.deepStrictEqual(await queue.get(10), { status: 'item', item: 'kept' });
    assert.deepStrictEqual(await queue.get(10), { status: 'closed' });
  });

  it('should drain everything buffered', () => {
    const queue = new AsyncQueue<number>();
    queue.put(1);
    queue.put(2);
    assert.strictEqual(queue.tryGet(), 1);
    queue.put(3);

    assert.deepStrictEqual(queue.drain(), [2, 3]);
    assert.strictEqual(queue.size, 0);
    assert.strictEqual(queue.tryGet(), undefined);
  });
});
