import * as assert from 'assert';

import { RateLimiter } from '../../src/services/RateLimiter';
import { recordingSleep, silentLogger } from '../helpers';

suite('RateLimiter', () => {
  test('wait is a no-op before any failure', async () => {
    const timer = recordingSleep();
    const limiter = new RateLimiter(silentLogger, {}, { sleep: timer.sleep, random: () => 0 });

    assert.strictEqual(await limiter.wait(), 0);
    assert.deepStrictEqual(timer.delays, []);
  });

  test('a Retry-After hint is used for exactly one wait', async () => {
    const timer = recordingSleep();
    const limiter = new RateLimiter(silentLogger, {}, { sleep: timer.sleep, random: () => 0 });

    limiter.failure(5);
    assert.strictEqual(await limiter.wait(), 5000);
    assert.strictEqual(await limiter.wait(), 1000);
    assert.deepStrictEqual(timer.delays, [5000, 1000]);
  });

  test('failures without a hint grow the delay up to the cap', async () => {
    const timer = recordingSleep();
    const limiter = new RateLimiter(
      silentLogger,
      { initialDelayMs: 1000, maxDelayMs: 3000, jitterMs: 500 },
      { sleep: timer.sleep, random: () => 0.5 },
    );

    limiter.failure();
    assert.strictEqual(await limiter.wait(), 2250);
    limiter.failure();
    limiter.failure();
    assert.strictEqual(limiter.state.currentDelayMs, 3000);
    assert.strictEqual(await limiter.wait(), 3250);
  });

  test('a zero hint falls back to exponential growth', () => {
    const limiter = new RateLimiter(silentLogger);
    limiter.failure(0);
    assert.deepStrictEqual(limiter.state, {
      currentDelayMs: 2000,
      consecutiveFailures: 1,
      adaptiveOverrideMs: undefined,
    });
  });

  test('success resets the delay and the failure counter', async () => {
    const timer = recordingSleep();
    const limiter = new RateLimiter(silentLogger, {}, { sleep: timer.sleep });

    limiter.failure();
    limiter.failure();
    limiter.success();

    assert.strictEqual(limiter.state.currentDelayMs, 1000);
    assert.strictEqual(limiter.state.consecutiveFailures, 0);
    assert.strictEqual(await limiter.wait(), 0);
  });

  test('shouldRetry tracks the retry budget', () => {
    const limiter = new RateLimiter(silentLogger, { maxRetries: 2 });
    assert.strictEqual(limiter.shouldRetry(), true);
    limiter.failure(1);
    assert.strictEqual(limiter.shouldRetry(), true);
    limiter.failure(1);
    assert.strictEqual(limiter.shouldRetry(), false);
  });
});
