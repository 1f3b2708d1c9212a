import type { TranslationErrorCode } from '../types/translation';
import { sleep as defaultSleep, isAbortError, type SleepFn } from '../utils/delay';
import { ServiceLogger } from '../utils/logger';
import { failure, type Result } from '../utils/result';
import { TranslationError } from './TranslationError';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  jitterRangeMs: number;
  minimumDelayMs: number;
  retryableCodes: ReadonlySet<TranslationErrorCode>;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  maxAttempts: 4,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 30_000,
  jitterRangeMs: 500,
  minimumDelayMs: 100,
  retryableCodes: new Set<TranslationErrorCode>([
    'timeout',
    'connection',
    'tls',
    'network',
    'http',
    'rateLimited',
  ]),
});

export interface RetryAttemptInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: TranslationError;
}

export interface RetryOptions {
  operationName?: string;
  config?: Partial<RetryConfig>;
  signal?: AbortSignal;
  onRetry?: (message: string, info: RetryAttemptInfo) => void;
  /** Returning false stops retrying an otherwise retryable failure. */
  shouldRetry?: (error: TranslationError, attempt: number) => boolean;
}

export interface RetryServiceDependencies {
  sleep?: SleepFn;
  random?: () => number;
}

export class RetryService {
  private readonly config: RetryConfig;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(
    private readonly logger: ServiceLogger,
    config: Partial<RetryConfig> = {},
    dependencies: RetryServiceDependencies = {},
  ) {
    this.config = resolveRetryConfig({ ...DEFAULT_RETRY_CONFIG, ...config });
    this.sleep = dependencies.sleep ?? defaultSleep;
    this.random = dependencies.random ?? Math.random;
  }

  async executeWithRetry<T>(
    operation: (attempt: number) => Promise<Result<T, TranslationError>>,
    options: RetryOptions = {},
  ): Promise<Result<T, TranslationError>> {
    const config = options.config ? resolveRetryConfig({ ...this.config, ...options.config }) : this.config;
    const operationName = options.operationName ?? 'operation';

    for (let attempt = 1; ; attempt += 1) {
      if (options.signal?.aborted) {
        return failure<TranslationError, T>(TranslationError.cancelled());
      }

      const result = await this.invoke(operation, attempt);
      if (result.isSuccess()) {
        if (attempt > 1) {
          this.logger.info(`${operationName} succeeded after ${attempt} attempts.`);
        }
        return result;
      }

      const error = result.error;
      if (!config.retryableCodes.has(error.code) || options.shouldRetry?.(error, attempt) === false) {
        return result;
      }

      if (attempt >= config.maxAttempts) {
        this.logger.warn(`${operationName} gave up after ${attempt} attempts.`, { code: error.code });
        return failure<TranslationError, T>(TranslationError.maxRetriesExceeded(attempt, operationName, error));
      }

      const delayMs = this.calculateDelay(attempt, config);
      const message = `Error in ${operationName}. Retrying in ${(delayMs / 1000).toFixed(1)}s (attempt ${attempt}/${config.maxAttempts})`;
      this.logger.debug(message, { code: error.code, error: error.message });
      options.onRetry?.(message, { attempt, maxAttempts: config.maxAttempts, delayMs, error });

      try {
        await this.sleep(delayMs, options.signal);
      } catch (sleepError) {
        if (isAbortError(sleepError)) {
          return failure<TranslationError, T>(TranslationError.cancelled());
        }
        throw sleepError;
      }
    }
  }

  calculateDelay(attempt: number, config: RetryConfig = this.config): number {
    const exponential = Math.min(
      config.initialDelayMs * config.backoffMultiplier ** (attempt - 1),
      config.maxDelayMs,
    );
    const jitter = (this.random() * 2 - 1) * config.jitterRangeMs;
    return Math.max(config.minimumDelayMs, exponential + jitter);
  }

  private async invoke<T>(
    operation: (attempt: number) => Promise<Result<T, TranslationError>>,
    attempt: number,
  ): Promise<Result<T, TranslationError>> {
    try {
      return await operation(attempt);
    } catch (error) {
      this.logger.error('Retry operation threw instead of returning a result.', error);
      return failure<TranslationError, T>(
        TranslationError.unexpected(error instanceof Error ? error.message : String(error)),
      );
    }
  }
}

function resolveRetryConfig(config: RetryConfig): RetryConfig {
  return { ...config, maxAttempts: Math.max(1, Math.floor(config.maxAttempts)) };
}
