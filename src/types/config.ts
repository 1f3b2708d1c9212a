import type { ProviderKind } from './translation';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LocalServiceConfig {
  baseUrl: string;
  timeoutMs: number;
  startupTimeoutMs: number;
  healthTimeoutMs: number;
  healthPollIntervalMs: number;
  autoStart: boolean;
  modelDir?: string;
}

export interface MemoryConfiguration {
  filePath: string;
  maxEntries: number;
  fuzzyThreshold: number;
  fuzzyEnabled: boolean;
}

export interface RemoteConfiguration {
  timeoutMs: number;
}

export interface ServiceConfiguration {
  provider: ProviderKind;
  logLevel: LogLevel;
  dataRoot: string;
  memory: MemoryConfiguration;
  remote: RemoteConfiguration;
  local: LocalServiceConfig;
}

/** Caller-supplied defaults; environment variables win over every field here. */
export interface ConfigurationOverrides {
  provider?: string;
  logLevel?: LogLevel;
  dataRoot?: string;
  memory?: Partial<MemoryConfiguration>;
  remote?: Partial<RemoteConfiguration>;
  local?: Partial<LocalServiceConfig>;
}
