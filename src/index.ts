export { createTranslationRuntime, type RuntimeDependencies, type TranslationRuntime } from './container';
export { describeError, localize } from './i18n/localize';
export { ModelManager, type ModelInstallSpec } from './local/ModelManager';
export { LocalServiceClient, type LocalServiceState } from './services/LocalServiceClient';
export { ChildProcessLauncher, type LaunchedProcess, type ProcessLauncher } from './services/ProcessLauncher';
export * from './services/providers';
export { RateLimiter, type RateLimiterOptions } from './services/RateLimiter';
export { DEFAULT_RETRY_CONFIG, RetryService, type RetryConfig, type RetryOptions } from './services/RetryService';
export { TranslationError, type TranslationErrorDetail } from './services/TranslationError';
export { TranslationMemory } from './services/TranslationMemory';
export { TranslationMemoryStore } from './services/TranslationMemoryStore';
export { TranslationService } from './services/TranslationService';
export type * from './types/config';
export type * from './types/translation';
export { getServiceConfiguration } from './utils/config';
export { ServiceLogger } from './utils/logger';
export * from './utils/result';
