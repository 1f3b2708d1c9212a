import { sleep as defaultSleep, type SleepFn } from '../utils/delay';
import { ServiceLogger } from '../utils/logger';

export interface RateLimiterOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitterMs: number;
  maxRetries: number;
}

export interface RateLimiterState {
  currentDelayMs: number;
  consecutiveFailures: number;
  adaptiveOverrideMs?: number;
}

const DEFAULT_OPTIONS: RateLimiterOptions = {
  initialDelayMs: 1_000,
  maxDelayMs: 60_000,
  factor: 2,
  jitterMs: 500,
  maxRetries: 5,
};

/**
 * Adaptive pacing between provider calls. A server-supplied `Retry-After`
 * hint applies to exactly one `wait()`; otherwise the delay grows
 * geometrically on each failure.
 */
export class RateLimiter {
  private readonly options: RateLimiterOptions;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private currentDelayMs: number;
  private consecutiveFailures = 0;
  private adaptiveOverrideMs: number | undefined;

  constructor(
    private readonly logger: ServiceLogger,
    options: Partial<RateLimiterOptions> = {},
    dependencies: { sleep?: SleepFn; random?: () => number } = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.sleep = dependencies.sleep ?? defaultSleep;
    this.random = dependencies.random ?? Math.random;
    this.currentDelayMs = this.options.initialDelayMs;
  }

  get state(): RateLimiterState {
    return {
      currentDelayMs: this.currentDelayMs,
      consecutiveFailures: this.consecutiveFailures,
      adaptiveOverrideMs: this.adaptiveOverrideMs,
    };
  }

  async wait(signal?: AbortSignal): Promise<number> {
    if (this.consecutiveFailures === 0) {
      return 0;
    }

    let delayMs: number;
    if (this.adaptiveOverrideMs !== undefined) {
      delayMs = this.adaptiveOverrideMs;
      this.adaptiveOverrideMs = undefined;
    } else {
      delayMs = this.currentDelayMs + this.random() * this.options.jitterMs;
    }

    this.logger.info(`Rate limit hit. Waiting for ${(delayMs / 1000).toFixed(2)} seconds.`);
    await this.sleep(delayMs, signal);
    return delayMs;
  }

  success(): void {
    this.currentDelayMs = this.options.initialDelayMs;
    this.consecutiveFailures = 0;
  }

  failure(retryAfterSeconds?: number): void {
    if (retryAfterSeconds !== undefined && retryAfterSeconds > 0) {
      this.adaptiveOverrideMs = retryAfterSeconds * 1000;
    } else {
      this.currentDelayMs = Math.min(this.currentDelayMs * this.options.factor, this.options.maxDelayMs);
    }
    this.consecutiveFailures += 1;
  }

  shouldRetry(): boolean {
    return this.consecutiveFailures < this.options.maxRetries;
  }
}
