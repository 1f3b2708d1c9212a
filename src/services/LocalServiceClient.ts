import type { z } from 'zod';

import {
  BacktranslateResponseSchema,
  ErrorEnvelopeSchema,
  HealthSchema,
  ModelsRemoveSchema,
  ModelsStatusSchema,
  ModelsVerifySchema,
  TranslateResponseSchema,
  type BacktranslateWireResponse,
  type HealthResponse,
  type ModelInstallRequest,
  type ModelsRemoveResult,
  type ModelsStatus,
  type ModelsVerifyResult,
} from '../messaging/channel';
import { isSupportedPair } from '../local/directions';
import type { LocalServiceConfig } from '../types/config';
import type { BacktranslationResult, TranslationRequest } from '../types/translation';
import { sleep as defaultSleep, isAbortError, type SleepFn } from '../utils/delay';
import { withRequestTimeout, type FetchFn } from '../utils/http';
import { ServiceLogger } from '../utils/logger';
import { failure, success, type Result } from '../utils/result';
import {
  ChildProcessLauncher,
  defaultDaemonCommand,
  type LaunchCommand,
  type LaunchedProcess,
  type ProcessLauncher,
} from './ProcessLauncher';
import { fromWireError, TranslationError } from './TranslationError';

export type LocalServiceState = 'notStarted' | 'starting' | 'healthy' | 'unhealthy' | 'crashed';

export interface LocalServiceClientDependencies {
  fetch?: FetchFn;
  launcher?: ProcessLauncher;
  command?: (env: NodeJS.ProcessEnv) => LaunchCommand;
  sleep?: SleepFn;
  now?: () => number;
  env?: NodeJS.ProcessEnv;
}

type WireSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Talks to the offline translation daemon and supervises its process. Every
 * public call makes sure the daemon answers `/health` first, starting it when
 * auto-start is on.
 */
export class LocalServiceClient {
  private currentState: LocalServiceState = 'notStarted';
  private child: LaunchedProcess | undefined;
  private startup: Promise<Result<void, TranslationError>> | undefined;
  private readonly fetchFn: FetchFn;
  private readonly launcher: ProcessLauncher;
  private readonly buildCommand: (env: NodeJS.ProcessEnv) => LaunchCommand;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly logger: ServiceLogger,
    readonly config: Readonly<LocalServiceConfig>,
    dependencies: LocalServiceClientDependencies = {},
  ) {
    this.fetchFn = dependencies.fetch ?? fetch;
    this.launcher = dependencies.launcher ?? new ChildProcessLauncher(logger);
    this.buildCommand = dependencies.command ?? defaultDaemonCommand;
    this.sleep = dependencies.sleep ?? defaultSleep;
    this.now = dependencies.now ?? Date.now;
    this.env = dependencies.env ?? process.env;
  }

  get state(): LocalServiceState {
    return this.currentState;
  }

  async ensureRunning(signal?: AbortSignal): Promise<Result<void, TranslationError>> {
    if (await this.isHealthy(signal)) {
      this.currentState = 'healthy';
      return success<void, TranslationError>(undefined);
    }

    if (signal?.aborted) {
      return failure<TranslationError, void>(TranslationError.cancelled());
    }

    if (this.startup) {
      return this.startup;
    }

    if (this.currentState === 'healthy') {
      this.currentState = 'unhealthy';
    }

    if (!this.config.autoStart) {
      return failure<TranslationError, void>(TranslationError.serviceUnavailable('Local provider is not running.'));
    }

    this.startup = this.start(signal).finally(() => {
      this.startup = undefined;
    });
    return this.startup;
  }

  async translate(request: TranslationRequest, signal?: AbortSignal): Promise<Result<string, TranslationError>> {
    if (!request.text.trim()) {
      return success<string, TranslationError>('');
    }
    if (!isSupportedPair(request.sourceLang, request.targetLang)) {
      return failure<TranslationError, string>(TranslationError.userError('Local provider supports only en<->ja.'));
    }

    const response = await this.call(
      'POST',
      '/translate',
      TranslateResponseSchema,
      { text: request.text, source_lang: request.sourceLang, target_lang: request.targetLang },
      signal,
    );

    return response.flatMap((payload) => {
      const translated = payload.translated_text.trim();
      return translated
        ? success<string, TranslationError>(translated)
        : failure<TranslationError, string>(TranslationError.noTranslation('Local provider returned no text'));
    });
  }

  async backtranslate(
    text: string,
    sourceLang = 'en',
    intermediateLang = 'ja',
    signal?: AbortSignal,
  ): Promise<Result<BacktranslationResult, TranslationError>> {
    const response = await this.call(
      'POST',
      '/backtranslate',
      BacktranslateResponseSchema,
      { text, source_lang: sourceLang, intermediate_lang: intermediateLang, target_lang: sourceLang },
      signal,
    );
    return response.map((payload: BacktranslateWireResponse) => ({
      original: payload.original_text,
      intermediate: payload.intermediate_text,
      final: payload.final_text,
      sourceLang: payload.source_lang,
      intermediateLang: payload.intermediate_lang,
    }));
  }

  health(signal?: AbortSignal): Promise<Result<HealthResponse, TranslationError>> {
    return this.call('GET', '/health', HealthSchema, undefined, signal);
  }

  modelsStatus(signal?: AbortSignal): Promise<Result<ModelsStatus, TranslationError>> {
    return this.call('GET', '/models', ModelsStatusSchema, undefined, signal);
  }

  modelsVerify(signal?: AbortSignal): Promise<Result<ModelsVerifyResult, TranslationError>> {
    return this.call('POST', '/models/verify', ModelsVerifySchema, {}, signal);
  }

  modelsRemove(signal?: AbortSignal): Promise<Result<ModelsRemoveResult, TranslationError>> {
    return this.call('POST', '/models/remove', ModelsRemoveSchema, {}, signal);
  }

  modelsInstall(
    request: { enJaUrl: string; jaEnUrl: string; enJaSha256?: string; jaEnSha256?: string },
    signal?: AbortSignal,
  ): Promise<Result<ModelsVerifyResult, TranslationError>> {
    const body: ModelInstallRequest = {
      en_ja_url: request.enJaUrl,
      ja_en_url: request.jaEnUrl,
      en_ja_sha256: request.enJaSha256 ?? null,
      ja_en_sha256: request.jaEnSha256 ?? null,
    };
    return this.call('POST', '/models/install', ModelsVerifySchema, body, signal);
  }

  /** Installs a bundled preset; without a name the daemon picks its default. */
  modelsInstallPreset(preset?: string, signal?: AbortSignal): Promise<Result<ModelsVerifyResult, TranslationError>> {
    const body: ModelInstallRequest = preset ? { preset } : {};
    return this.call('POST', '/models/install', ModelsVerifySchema, body, signal);
  }

  /** Stops a daemon this client spawned. A daemon started elsewhere is left alone. */
  dispose(): void {
    if (this.child?.isAlive()) {
      this.logger.info('Stopping local service process.', { pid: this.child.pid });
      this.child.kill();
    }
    this.child = undefined;
  }

  private async start(signal?: AbortSignal): Promise<Result<void, TranslationError>> {
    this.currentState = 'starting';

    let child = this.child;
    if (!child || !child.isAlive()) {
      const launched = this.spawnDaemon();
      if (launched.isFailure()) {
        this.currentState = 'crashed';
        return failure<TranslationError, void>(launched.error);
      }
      child = launched.value;
    }

    const deadline = this.now() + this.config.startupTimeoutMs;
    while (this.now() < deadline) {
      if (signal?.aborted) {
        return failure<TranslationError, void>(TranslationError.cancelled());
      }
      if (await this.isHealthy(signal)) {
        this.currentState = 'healthy';
        this.logger.event('localService.healthy', { baseUrl: this.config.baseUrl, pid: child.pid });
        return success<void, TranslationError>(undefined);
      }
      if (!child.isAlive()) {
        break;
      }
      try {
        await this.sleep(this.config.healthPollIntervalMs, signal);
      } catch (error) {
        if (isAbortError(error)) {
          return failure<TranslationError, void>(TranslationError.cancelled());
        }
        throw error;
      }
    }

    this.currentState = child.isAlive() ? 'unhealthy' : 'crashed';
    this.logger.event('localService.startFailed', {
      baseUrl: this.config.baseUrl,
      state: this.currentState,
      startupTimeoutMs: this.config.startupTimeoutMs,
    });
    return failure<TranslationError, void>(TranslationError.serviceUnavailable('Local provider failed to start.'));
  }

  private spawnDaemon(): Result<LaunchedProcess, TranslationError> {
    const env: NodeJS.ProcessEnv = { ...this.env, TF_LOCAL_LOG_SYNC: '1' };
    if (this.config.modelDir) {
      env.TF_LOCAL_MODEL_DIR = this.config.modelDir;
    }
    const listen = listenAddress(this.config.baseUrl);
    if (listen) {
      env.TF_LOCAL_HOST = listen.host;
      env.TF_LOCAL_PORT = listen.port;
    }

    try {
      const child = this.launcher.launch(this.buildCommand(env));
      child.onExit((code, exitSignal) => {
        this.currentState = 'crashed';
        this.logger.warn('Local service process exited.', { pid: child.pid, code, signal: exitSignal });
      });
      this.child = child;
      this.logger.event('localService.spawned', { pid: child.pid, modelDir: this.config.modelDir });
      return success<LaunchedProcess, TranslationError>(child);
    } catch (error) {
      this.logger.error('Failed to start local provider.', error);
      this.logger.event('localService.startFailed', { baseUrl: this.config.baseUrl, state: 'crashed' });
      return failure<TranslationError, LaunchedProcess>(
        TranslationError.serviceUnavailable('Local provider failed to start.'),
      );
    }
  }

  private async isHealthy(signal?: AbortSignal): Promise<boolean> {
    const probe = await withRequestTimeout(this.config.healthTimeoutMs, signal, async (requestSignal) => {
      const response = await this.fetchFn(`${this.config.baseUrl}/health`, { method: 'GET', signal: requestSignal });
      await response.arrayBuffer();
      return success<boolean, TranslationError>(response.status === 200);
    });
    return probe.getOrElse(() => false);
  }

  private async call<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: WireSchema<T>,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<Result<T, TranslationError>> {
    const ensured = await this.ensureRunning(signal);
    if (ensured.isFailure()) {
      return failure<TranslationError, T>(ensured.error);
    }

    return withRequestTimeout(
      this.config.timeoutMs,
      signal,
      async (requestSignal) => {
        const response = await this.fetchFn(`${this.config.baseUrl}${path}`, {
          method,
          headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: requestSignal,
        });
        return parseResponse(response.status, await response.text(), schema);
      },
      'Local provider request',
    );
  }
}

function parseResponse<T>(status: number, text: string, schema: WireSchema<T>): Result<T, TranslationError> {
  let payload: unknown;
  let validJson = true;
  try {
    payload = JSON.parse(text);
  } catch {
    validJson = false;
  }

  if (status >= 400) {
    const envelope = validJson ? ErrorEnvelopeSchema.safeParse(payload) : undefined;
    if (envelope?.success) {
      return failure<TranslationError, T>(
        fromWireError(envelope.data.error.code, envelope.data.error.message, status),
      );
    }
    return failure<TranslationError, T>(TranslationError.http(status, text));
  }

  if (!validJson) {
    return failure<TranslationError, T>(TranslationError.invalidResponse('Invalid JSON from local provider'));
  }

  const parsed = schema.safeParse(payload);
  return parsed.success
    ? success<T, TranslationError>(parsed.data)
    : failure<TranslationError, T>(TranslationError.invalidResponse('Invalid local provider response'));
}

function listenAddress(baseUrl: string): { host: string; port: string } | undefined {
  try {
    const url = new URL(baseUrl);
    const port = url.port || (url.protocol === 'https:' ? '443' : '80');
    return { host: url.hostname, port };
  } catch {
    return undefined;
  }
}
