import { ServiceLogger } from '../../utils/logger';
import { GoogleUnofficialProvider } from './GoogleUnofficialProvider';
import { LocalProvider } from './LocalProvider';
import type { ProviderConfig, TranslationProvider } from './types';

export function createProvider(config: ProviderConfig, logger: ServiceLogger): TranslationProvider {
  switch (config.kind) {
    case 'googleUnofficial':
      return new GoogleUnofficialProvider(logger.child({ provider: config.kind }), config);
    case 'local':
      return new LocalProvider(config.client);
  }
}

export { GoogleUnofficialProvider } from './GoogleUnofficialProvider';
export { LocalProvider } from './LocalProvider';
export { DEFAULT_PROVIDER, normalizeProviderId } from './providerId';
export type { GoogleUnofficialProviderConfig, LocalProviderConfig, ProviderConfig, TranslationProvider } from './types';
