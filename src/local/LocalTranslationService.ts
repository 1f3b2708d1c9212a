import type {
  BacktranslateWireResponse,
  HealthResponse,
  ModelsRemoveResult,
  ModelsStatus,
  ModelsVerifyResult,
  TranslateWireResponse,
} from '../messaging/channel';
import { TranslationError } from '../services/TranslationError';
import type { TranslationRequest } from '../types/translation';
import { ServiceLogger } from '../utils/logger';
import { failure, type Result } from '../utils/result';
import type { TranslationBackend } from './backends';
import { isSupportedPair, SUPPORTED_DIRECTIONS } from './directions';
import type { ModelInstallSpec, ModelManager } from './ModelManager';

export class LocalTranslationService {
  constructor(
    private readonly backend: TranslationBackend,
    private readonly models: ModelManager,
    private readonly logger: ServiceLogger,
  ) {}

  async translate(request: TranslationRequest): Promise<Result<TranslateWireResponse, TranslationError>> {
    if (!request.text.trim()) {
      return failure<TranslationError, TranslateWireResponse>(TranslationError.userError('Text is empty'));
    }
    if (!isSupportedPair(request.sourceLang, request.targetLang)) {
      return failure<TranslationError, TranslateWireResponse>(TranslationError.userError('Unsupported language pair'));
    }

    const result = await this.backend.translate(request);
    result.onFailure((error) =>
      this.logger.warn('Local translation failed.', { code: error.code, backend: this.backend.name }),
    );

    return result.map((translated) => ({
      translated_text: translated,
      source_lang: request.sourceLang,
      target_lang: request.targetLang,
      backend: this.backend.name,
    }));
  }

  async backtranslate(
    text: string,
    sourceLang: string,
    intermediateLang: string,
    targetLang: string,
  ): Promise<Result<BacktranslateWireResponse, TranslationError>> {
    const first = await this.translate({ text, sourceLang, targetLang: intermediateLang });
    if (first.isFailure()) {
      return failure<TranslationError, BacktranslateWireResponse>(first.error);
    }

    const intermediate = first.value.translated_text;
    const second = await this.translate({ text: intermediate, sourceLang: intermediateLang, targetLang });

    return second.map((final) => ({
      original_text: text,
      intermediate_text: intermediate,
      final_text: final.translated_text,
      source_lang: sourceLang,
      intermediate_lang: intermediateLang,
      target_lang: targetLang,
      backend: this.backend.name,
    }));
  }

  async health(): Promise<HealthResponse> {
    return {
      status: 'ok',
      backend: this.backend.name,
      pairs: SUPPORTED_DIRECTIONS.map((pair): [string, string] => [pair.source, pair.target]).sort(),
      models: await this.models.status(),
    };
  }

  modelsStatus(): Promise<ModelsStatus> {
    return this.models.status();
  }

  modelsVerify(): Promise<ModelsVerifyResult> {
    return this.models.verify();
  }

  modelsRemove(): Promise<ModelsRemoveResult> {
    return this.models.remove();
  }

  modelsInstall(spec: ModelInstallSpec): Promise<Result<ModelsVerifyResult, TranslationError>> {
    return this.models.install(spec);
  }
}
