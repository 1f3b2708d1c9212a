import { LocalServiceClient, type LocalServiceClientDependencies } from './services/LocalServiceClient';
import { createProvider } from './services/providers';
import type { TranslationProvider } from './services/providers/types';
import { RateLimiter } from './services/RateLimiter';
import { RetryService } from './services/RetryService';
import { TranslationMemory } from './services/TranslationMemory';
import { TranslationMemoryStore } from './services/TranslationMemoryStore';
import { TranslationService } from './services/TranslationService';
import type { ServiceConfiguration } from './types/config';
import type { FetchFn } from './utils/http';
import { ServiceLogger } from './utils/logger';

export interface TranslationRuntime {
  configuration: ServiceConfiguration;
  service: TranslationService;
  memory: TranslationMemory;
  provider: TranslationProvider;
  localClient?: LocalServiceClient;
  dispose(): Promise<void>;
}

export interface RuntimeDependencies {
  fetch?: FetchFn;
  local?: LocalServiceClientDependencies;
}

/** Wires every service once for the lifetime of the process. */
export async function createTranslationRuntime(
  configuration: ServiceConfiguration,
  logger: ServiceLogger,
  dependencies: RuntimeDependencies = {},
): Promise<TranslationRuntime> {
  const memory = await TranslationMemory.open(
    logger.child({ component: 'memory' }),
    {
      maxEntries: configuration.memory.maxEntries,
      fuzzyThreshold: configuration.memory.fuzzyThreshold,
    },
    new TranslationMemoryStore(configuration.memory.filePath, logger),
  );

  const localClient =
    configuration.provider === 'local'
      ? new LocalServiceClient(logger.child({ component: 'localService' }), configuration.local, {
          fetch: dependencies.fetch,
          ...dependencies.local,
        })
      : undefined;

  const provider = localClient
    ? createProvider({ kind: 'local', client: localClient }, logger)
    : createProvider(
        { kind: 'googleUnofficial', timeoutMs: configuration.remote.timeoutMs, fetch: dependencies.fetch },
        logger,
      );

  const service = new TranslationService(
    logger.child({ component: 'translation' }),
    provider,
    memory,
    new RetryService(logger.child({ component: 'retry' })),
    new RateLimiter(logger.child({ component: 'rateLimiter' })),
    { fuzzyEnabled: configuration.memory.fuzzyEnabled },
  );

  return {
    configuration,
    service,
    memory,
    provider,
    localClient,
    async dispose() {
      await memory.flush();
      localClient?.dispose();
    },
  };
}
