import type {
  BacktranslationResult,
  TranslateOptions,
  TranslationMemoryStats,
  TranslationRequest,
} from '../types/translation';
import { createRequestDeduplicator, type RequestDeduplicator } from '../utils/deduplicator';
import { isAbortError } from '../utils/delay';
import { ServiceLogger } from '../utils/logger';
import { failure, success, type Result } from '../utils/result';
import type { TranslationProvider } from './providers/types';
import { RateLimiter } from './RateLimiter';
import { RetryService, type RetryConfig } from './RetryService';
import { TranslationError } from './TranslationError';
import { TranslationMemory } from './TranslationMemory';

export interface TranslationServiceOptions {
  fuzzyEnabled?: boolean;
  retry?: Partial<RetryConfig>;
}

export interface BacktranslateOptions extends TranslateOptions {
  sourceLang?: string;
  intermediateLang?: string;
}

/**
 * Single entry point for translations: memory first, then one provider call
 * under the retry policy and rate limiter. Identical requests in flight share
 * one provider execution, which runs until the last of them aborts.
 */
export class TranslationService {
  private readonly inFlight: RequestDeduplicator<Result<string, TranslationError>> =
    createRequestDeduplicator<Result<string, TranslationError>>();
  private readonly fuzzyEnabled: boolean;

  constructor(
    private readonly logger: ServiceLogger,
    private readonly provider: TranslationProvider,
    private readonly memory: TranslationMemory,
    private readonly retry: RetryService,
    private readonly rateLimiter: RateLimiter,
    private readonly options: TranslationServiceOptions = {},
  ) {
    this.fuzzyEnabled = options.fuzzyEnabled ?? true;
  }

  get providerId(): string {
    return this.provider.id;
  }

  async translate(
    text: string,
    sourceLang: string,
    targetLang: string,
    options: TranslateOptions = {},
  ): Promise<Result<string, TranslationError>> {
    if (!text.trim()) {
      return success<string, TranslationError>('');
    }

    const cached = this.memory.lookup(text, targetLang);
    if (cached !== undefined) {
      this.logger.event('translation.cacheHit', { sourceLang, targetLang, textLength: text.length });
      return success<string, TranslationError>(cached);
    }

    if (this.fuzzyEnabled) {
      const match = this.memory.fuzzyLookup(text, targetLang);
      if (match) {
        this.logger.event('translation.fuzzyHit', {
          sourceLang,
          targetLang,
          textLength: text.length,
          score: Number(match.score.toFixed(3)),
        });
        return success<string, TranslationError>(match.translation);
      }
    }

    const key = [this.provider.id, sourceLang, targetLang, text].join('\u0000');
    return this.inFlight.run(
      key,
      (signal) => this.execute({ text, sourceLang, targetLang }, { ...options, signal }),
      {
        signal: options.signal,
        onAbort: () => failure<TranslationError, string>(TranslationError.cancelled()),
      },
    );
  }

  async backtranslate(
    text: string,
    options: BacktranslateOptions = {},
  ): Promise<Result<BacktranslationResult, TranslationError>> {
    const sourceLang = options.sourceLang ?? 'en';
    const intermediateLang = options.intermediateLang ?? 'ja';

    options.onStatus?.(`Translating ${sourceLang} -> ${intermediateLang}...`);
    const forward = await this.translate(text, sourceLang, intermediateLang, options);
    if (forward.isFailure()) {
      return failure<TranslationError, BacktranslationResult>(forward.error);
    }

    options.onStatus?.(`Translating ${intermediateLang} -> ${sourceLang}...`);
    const back = await this.translate(forward.value, intermediateLang, sourceLang, options);

    return back.map((final) => ({
      original: text,
      intermediate: forward.value,
      final,
      sourceLang,
      intermediateLang,
    }));
  }

  stats(): TranslationMemoryStats {
    return this.memory.stats();
  }

  clearMemory(): Promise<void> {
    return this.memory.clear();
  }

  private async execute(
    request: TranslationRequest,
    options: TranslateOptions,
  ): Promise<Result<string, TranslationError>> {
    const started = Date.now();
    const pair = `${request.sourceLang}->${request.targetLang}`;

    const result = await this.retry.executeWithRetry(
      (attempt) => this.attempt(request, attempt, options.signal),
      {
        operationName: `translation ${pair}`,
        config: this.options.retry,
        signal: options.signal,
        onRetry: (message) => options.onStatus?.(message),
        shouldRetry: (error) => error.code !== 'rateLimited' || this.rateLimiter.shouldRetry(),
      },
    );

    if (result.isFailure()) {
      this.logger.event('translation.failed', {
        provider: this.provider.id,
        pair,
        textLength: request.text.length,
        code: result.error.code,
        error: result.error.message,
      });
      return result;
    }

    await this.memory.store(request.text, request.targetLang, result.value);
    this.logger.event('translation.completed', {
      provider: this.provider.id,
      pair,
      textLength: request.text.length,
      durationMs: Date.now() - started,
    });
    return result;
  }

  private async attempt(
    request: TranslationRequest,
    attempt: number,
    signal: AbortSignal | undefined,
  ): Promise<Result<string, TranslationError>> {
    try {
      await this.rateLimiter.wait(signal);
    } catch (error) {
      if (isAbortError(error)) {
        return failure<TranslationError, string>(TranslationError.cancelled());
      }
      throw error;
    }

    const outcome = await this.provider.translate(request, signal);

    if (outcome.isSuccess()) {
      this.rateLimiter.success();
      return outcome;
    }

    const error = outcome.error;
    if (error.code === 'rateLimited') {
      this.rateLimiter.failure(error.retryAfterSeconds);
    }
    this.logger.event('translation.attemptFailed', {
      provider: this.provider.id,
      pair: `${request.sourceLang}->${request.targetLang}`,
      textLength: request.text.length,
      attempt,
      code: error.code,
      error: error.message,
    });
    return outcome;
  }
}
