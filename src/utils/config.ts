import { z } from 'zod';

import { TranslationError } from '../services/TranslationError';
import { normalizeProviderId } from '../services/providers/providerId';
import type { ConfigurationOverrides, LogLevel, ServiceConfiguration } from '../types/config';
import { failure, success, type Result } from './result';
import { defaultModelDir, expandHome, memoryFilePath, resolveDataRoot } from './paths';

export const DEFAULT_LOCAL_URL = 'http://127.0.0.1:5055';

const DISABLED_FLAGS = new Set(['0', 'false', 'no', 'off']);

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schema convention
const ServiceConfigurationSchema = z.object({
  provider: z.enum(['googleUnofficial', 'local']),
  logLevel: LogLevelSchema,
  dataRoot: z.string().min(1),
  memory: z.object({
    filePath: z.string().min(1),
    maxEntries: z.number().int().positive(),
    fuzzyThreshold: z.number().min(0).max(1),
    fuzzyEnabled: z.boolean(),
  }),
  remote: z.object({
    timeoutMs: z.number().int().positive(),
  }),
  local: z.object({
    baseUrl: z.string().url(),
    timeoutMs: z.number().int().positive(),
    startupTimeoutMs: z.number().int().positive(),
    healthTimeoutMs: z.number().int().positive(),
    healthPollIntervalMs: z.number().int().positive(),
    autoStart: z.boolean(),
    modelDir: z.string().min(1).optional(),
  }),
});

/**
 * Resolves the runtime configuration once. Environment values take precedence
 * over `overrides`, which take precedence over built-in defaults.
 */
export function getServiceConfiguration(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigurationOverrides = {},
  fallbackRoot: string = process.cwd(),
): Result<ServiceConfiguration, TranslationError> {
  const dataRoot = env.TF_APP_HOME?.trim()
    ? resolveDataRoot(env, fallbackRoot)
    : overrides.dataRoot ?? resolveDataRoot(env, fallbackRoot);

  const logLevel = LogLevelSchema.safeParse(env.TF_LOG_LEVEL?.trim().toLowerCase());
  const timeoutSeconds = parseSeconds(env.TF_LOCAL_TIMEOUT_SECONDS);
  const envModelDir = env.TF_LOCAL_MODEL_DIR?.trim();

  const candidate = {
    provider: normalizeProviderId(env.TF_PROVIDER ?? overrides.provider),
    logLevel: logLevel.success ? logLevel.data : overrides.logLevel ?? 'info',
    dataRoot,
    memory: {
      filePath: overrides.memory?.filePath ?? memoryFilePath(dataRoot),
      maxEntries: overrides.memory?.maxEntries ?? 1000,
      fuzzyThreshold: overrides.memory?.fuzzyThreshold ?? 0.8,
      fuzzyEnabled: overrides.memory?.fuzzyEnabled ?? true,
    },
    remote: {
      timeoutMs: overrides.remote?.timeoutMs ?? 10_000,
    },
    local: {
      baseUrl: (env.TF_LOCAL_URL?.trim() || overrides.local?.baseUrl || DEFAULT_LOCAL_URL).replace(/\/+$/, ''),
      timeoutMs: timeoutSeconds !== undefined ? timeoutSeconds * 1000 : overrides.local?.timeoutMs ?? 5_000,
      startupTimeoutMs: overrides.local?.startupTimeoutMs ?? 8_000,
      healthTimeoutMs: overrides.local?.healthTimeoutMs ?? 1_000,
      healthPollIntervalMs: overrides.local?.healthPollIntervalMs ?? 200,
      autoStart: parseFlag(env.TF_LOCAL_AUTOSTART) ?? overrides.local?.autoStart ?? true,
      modelDir: envModelDir ? expandHome(envModelDir) : overrides.local?.modelDir ?? defaultModelDir(),
    },
  };

  const parsed = ServiceConfigurationSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue ? issue.path.join('.') : 'configuration';
    return failure<TranslationError, ServiceConfiguration>(
      TranslationError.configError(`Invalid ${path}: ${issue?.message ?? 'unknown problem'}`),
    );
  }

  return success<ServiceConfiguration, TranslationError>(parsed.data);
}

export function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return !DISABLED_FLAGS.has(value.trim().toLowerCase());
}

function parseSeconds(value: string | undefined): number | undefined {
  const trimmed = value?.trim();
  return trimmed && /^\d+$/.test(trimmed) ? Number(trimmed) : undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return LogLevelSchema.safeParse(value).success;
}
