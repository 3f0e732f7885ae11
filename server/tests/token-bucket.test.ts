/**
 * TokenBucket Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { TokenBucket } from '../src/services/rate-limit/token-bucket.js';

const T0 = 1_700_000_000_000;

describe('TokenBucket', () => {
  it('should start full', () => {
    const bucket = TokenBucket.full(10, 1, T0);
    assert.strictEqual(bucket.tokens, 10);
    assert.strictEqual(bucket.utilization, 0);
  });

  it('should consume tokens and report utilization', () => {
    const bucket = TokenBucket.full(10, 1, T0);
    assert.strictEqual(bucket.tryConsume(3, T0), true);
    assert.strictEqual(bucket.tokens, 7);
    assert.strictEqual(bucket.utilization, 0.3);
  });

  it('should leave tokens untouched on denial', () => {
    const bucket = TokenBucket.full(2, 1, T0);
    assert.strictEqual(bucket.tryConsume(2, T0), true);
    assert.strictEqual(bucket.tryConsume(1, T0), false);
    assert.strictEqual(bucket.tokens, 0);
  });

  it('should refill from elapsed time and cap at capacity', () => {
    const bucket = TokenBucket.full(10, 1, T0);
    bucket.tryConsume(10, T0);

    bucket.refill(T0 + 3000);
    assert.strictEqual(bucket.tokens, 3);

    bucket.refill(T0 + 1_000_000);
    assert.strictEqual(bucket.tokens, 10);
  });

  it('should always admit a zero cost without changing tokens', () => {
    const bucket = TokenBucket.full(1, 1, T0);
    bucket.tryConsume(1, T0);
    assert.strictEqual(bucket.tryConsume(0, T0), true);
    assert.strictEqual(bucket.tokens, 0);
  });

  it('should reject a negative cost', () => {
    const bucket = TokenBucket.full(1, 1, T0);
    assert.throws(() => bucket.tryConsume(-1, T0), RangeError);
  });

  it('should report time until the next whole token', () => {
    const bucket = TokenBucket.full(5, 1, T0);
    assert.strictEqual(bucket.timeUntilNextToken(T0), 0);

    bucket.tryConsume(5, T0);
    assert.strictEqual(bucket.timeUntilNextToken(T0), 1);
    assert.strictEqual(bucket.timeUntilNextToken(T0 + 500), 0.5);
  });

  it('should credit added headroom when growing', () => {
    const bucket = TokenBucket.full(10, 1, T0);
    bucket.tryConsume(4, T0);
    bucket.resize(15);

    assert.strictEqual(bucket.capacity, 15);
    assert.strictEqual(bucket.tokens, 11);
  });

  it('should clamp tokens when shrinking', () => {
    const full = TokenBucket.full(10, 1, T0);
    full.resize(4);
    assert.strictEqual(full.tokens, 4);

    const partial = TokenBucket.full(10, 1, T0);
    partial.tryConsume(4, T0);
    partial.resize(8);
    assert.strictEqual(partial.tokens, 6);
  });

  it('should not rewind when the clock steps backwards', () => {
    const bucket = TokenBucket.full(10, 1, T0);
    bucket.tryConsume(10, T0);
    bucket.refill(T0 - 5000);

    assert.strictEqual(bucket.tokens, 0);
    assert.strictEqual(bucket.lastRefill, T0);
  });

  it('should refill to capacity on reset', () => {
    const bucket = TokenBucket.full(3, 1, T0);
    bucket.tryConsume(3, T0);
    bucket.reset(T0 + 10);

    assert.deepStrictEqual(bucket.snapshot(), { capacity: 3, tokens: 3, refillRate: 1, lastRefill: T0 + 10 });
  });
});
