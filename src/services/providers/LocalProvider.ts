import { isSupportedPair } from '../../local/directions';
import type { TranslationRequest } from '../../types/translation';
import { failure, type Result } from '../../utils/result';
import type { LocalServiceClient } from '../LocalServiceClient';
import { TranslationError } from '../TranslationError';
import type { TranslationProvider } from './types';

export class LocalProvider implements TranslationProvider {
  readonly id = 'local' as const;

  constructor(private readonly client: LocalServiceClient) {}

  async translate(request: TranslationRequest, signal?: AbortSignal): Promise<Result<string, TranslationError>> {
    if (request.text.trim() && !isSupportedPair(request.sourceLang, request.targetLang)) {
      return failure<TranslationError, string>(
        TranslationError.userError(
          `Local provider supports only en<->ja (got ${request.sourceLang}->${request.targetLang}).`,
        ),
      );
    }
    return this.client.translate(request, signal);
  }
}
