import { TranslationError } from '../services/TranslationError';
import type { TranslationRequest } from '../types/translation';
import { failure, success, type Result } from '../utils/result';
import type { ModelManager } from './ModelManager';

export interface TranslationBackend {
  readonly name: string;
  translate(request: TranslationRequest): Promise<Result<string, TranslationError>>;
}

/** Deterministic stand-in used by tests and demos: `[en->ja] text`. */
export class FixtureBackend implements TranslationBackend {
  readonly name = 'fixture';

  async translate(request: TranslationRequest): Promise<Result<string, TranslationError>> {
    return success<string, TranslationError>(`[${request.sourceLang}->${request.targetLang}] ${request.text}`.trim());
  }
}

export class UnavailableBackend implements TranslationBackend {
  readonly name = 'unavailable';

  constructor(private readonly reason: string) {}

  async translate(): Promise<Result<string, TranslationError>> {
    return failure<TranslationError, string>(TranslationError.modelUnavailable(this.reason));
  }
}

export async function selectBackend(env: NodeJS.ProcessEnv, models: ModelManager): Promise<TranslationBackend> {
  if (env.TF_LOCAL_FIXTURE === '1') {
    return new FixtureBackend();
  }

  const verified = await models.verify();
  // No neural inference engine ships with this package; installed models only change the reason.
  return new UnavailableBackend(
    verified.ok ? 'No inference engine available for the installed models' : 'Local models not installed',
  );
}
