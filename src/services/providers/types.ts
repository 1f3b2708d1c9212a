import type { ProviderKind, TranslationRequest } from '../../types/translation';
import type { FetchFn } from '../../utils/http';
import type { Result } from '../../utils/result';
import type { LocalServiceClient } from '../LocalServiceClient';
import type { TranslationError } from '../TranslationError';

export interface TranslationProvider {
  readonly id: ProviderKind;
  translate(request: TranslationRequest, signal?: AbortSignal): Promise<Result<string, TranslationError>>;
}

export interface GoogleUnofficialProviderConfig {
  kind: 'googleUnofficial';
  timeoutMs?: number;
  endpoint?: string;
  fetch?: FetchFn;
}

export interface LocalProviderConfig {
  kind: 'local';
  client: LocalServiceClient;
}

export type ProviderConfig = GoogleUnofficialProviderConfig | LocalProviderConfig;
