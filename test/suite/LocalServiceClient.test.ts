import * as assert from 'assert';

import { LocalServiceClient } from '../../src/services/LocalServiceClient';
import type { LaunchCommand, LaunchedProcess, ProcessLauncher } from '../../src/services/ProcessLauncher';
import type { LocalServiceConfig } from '../../src/types/config';
import type { FetchFn } from '../../src/utils/http';
import { jsonResponse, recordingSleep, requestUrl, silentLogger } from '../helpers';

const BASE_URL = 'http://127.0.0.1:5999';

const config: LocalServiceConfig = {
  baseUrl: BASE_URL,
  timeoutMs: 1_000,
  startupTimeoutMs: 5_000,
  healthTimeoutMs: 200,
  healthPollIntervalMs: 10,
  autoStart: true,
  modelDir: '/models/test',
};

const modelsStatus = {
  model_dir: '/models/test',
  en_ja: { installed: true, reason: 'ok' },
  ja_en: { installed: false, reason: 'missing ct2/' },
};

class FakeProcess implements LaunchedProcess {
  alive = true;
  private listeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = [];

  constructor(readonly pid: number) {}

  isAlive(): boolean {
    return this.alive;
  }

  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.listeners.push(listener);
  }

  kill(): void {
    this.exit(null, 'SIGTERM');
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.alive = false;
    for (const listener of this.listeners) {
      listener(code, signal);
    }
  }
}

class CountingLauncher implements ProcessLauncher {
  readonly commands: LaunchCommand[] = [];
  readonly processes: FakeProcess[] = [];

  constructor(private readonly onLaunch: (process: FakeProcess) => void = () => undefined) {}

  launch(command: LaunchCommand): LaunchedProcess {
    this.commands.push(command);
    const child = new FakeProcess(1000 + this.processes.length);
    this.processes.push(child);
    this.onLaunch(child);
    return child;
  }
}

interface FakeDaemon {
  healthy: boolean;
  fetch: FetchFn;
  calls: string[];
}

function fakeDaemon(routes: Record<string, () => Response> = {}): FakeDaemon {
  const daemon: FakeDaemon = {
    healthy: false,
    calls: [],
    fetch: async (input, init) => {
      const path = requestUrl(input).slice(BASE_URL.length);
      const method = init?.method ?? 'GET';
      daemon.calls.push(`${method} ${path}`);
      if (!daemon.healthy) {
        throw new TypeError('fetch failed', {
          cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }),
        });
      }
      if (path === '/health') {
        return jsonResponse({ status: 'ok', backend: 'fixture', pairs: [['en', 'ja'], ['ja', 'en']], models: modelsStatus });
      }
      const route = routes[`${method} ${path}`];
      return route ? route() : jsonResponse({ error: { code: 'not_found', message: 'Unknown route' } }, 404);
    },
  };
  return daemon;
}

function client(
  daemon: FakeDaemon,
  launcher: ProcessLauncher,
  overrides: Partial<LocalServiceConfig> = {},
): LocalServiceClient {
  let now = 0;
  return new LocalServiceClient(silentLogger, { ...config, ...overrides }, {
    fetch: daemon.fetch,
    launcher,
    command: (env) => ({ command: 'daemon', args: ['serve'], env }),
    sleep: recordingSleep().sleep,
    now: () => {
      now += 100;
      return now;
    },
    env: { PATH: '/usr/bin' },
  });
}

suite('LocalServiceClient', () => {
  test('a healthy daemon is used without spawning', async () => {
    const daemon = fakeDaemon();
    daemon.healthy = true;
    const launcher = new CountingLauncher();
    const subject = client(daemon, launcher);

    const first = await subject.ensureRunning();
    const second = await subject.ensureRunning();

    assert.ok(first.isSuccess());
    assert.ok(second.isSuccess());
    assert.strictEqual(launcher.processes.length, 0);
    assert.strictEqual(subject.state, 'healthy');
  });

  test('starts the daemon once and reuses it afterwards', async () => {
    const daemon = fakeDaemon();
    const launcher = new CountingLauncher(() => {
      daemon.healthy = true;
    });
    const subject = client(daemon, launcher);

    const first = await subject.ensureRunning();
    const second = await subject.ensureRunning();

    assert.ok(first.isSuccess());
    assert.ok(second.isSuccess());
    assert.strictEqual(launcher.processes.length, 1);
    assert.strictEqual(subject.state, 'healthy');
  });

  test('concurrent callers share a single start-up', async () => {
    const daemon = fakeDaemon();
    const launcher = new CountingLauncher(() => {
      daemon.healthy = true;
    });
    const subject = client(daemon, launcher);

    const results = await Promise.all([subject.ensureRunning(), subject.ensureRunning(), subject.ensureRunning()]);

    assert.ok(results.every((result) => result.isSuccess()));
    assert.strictEqual(launcher.processes.length, 1);
  });

  test('passes the model directory and unbuffered hint to the child', async () => {
    const daemon = fakeDaemon();
    const launcher = new CountingLauncher(() => {
      daemon.healthy = true;
    });

    await client(daemon, launcher).ensureRunning();

    const env = launcher.commands[0].env;
    assert.strictEqual(env.TF_LOCAL_MODEL_DIR, '/models/test');
    assert.strictEqual(env.TF_LOCAL_LOG_SYNC, '1');
    assert.strictEqual(env.TF_LOCAL_HOST, '127.0.0.1');
    assert.strictEqual(env.TF_LOCAL_PORT, '5999');
    assert.strictEqual(env.PATH, '/usr/bin');
  });

  test('reports not running when auto-start is off', async () => {
    const launcher = new CountingLauncher();
    const subject = client(fakeDaemon(), launcher, { autoStart: false });

    const result = await subject.ensureRunning();

    assert.ok(result.isFailure());
    assert.strictEqual(result.error.code, 'serviceUnavailable');
    assert.strictEqual(result.error.message, 'Local provider is not running.');
    assert.strictEqual(launcher.processes.length, 0);
  });

  test('gives up when the daemon never becomes healthy', async () => {
    const launcher = new CountingLauncher();
    const subject = client(fakeDaemon(), launcher, { startupTimeoutMs: 1_000 });

    const result = await subject.ensureRunning();

    assert.ok(result.isFailure());
    assert.strictEqual(result.error.message, 'Local provider failed to start.');
    assert.strictEqual(subject.state, 'unhealthy');
  });

  test('a child that exits during start-up ends the wait early', async () => {
    const daemon = fakeDaemon();
    const launcher = new CountingLauncher((child) => child.exit(1));
    const subject = client(daemon, launcher);

    const result = await subject.ensureRunning();

    assert.ok(result.isFailure());
    assert.strictEqual(result.error.code, 'serviceUnavailable');
    assert.strictEqual(subject.state, 'crashed');
    assert.strictEqual(daemon.calls.filter((call) => call === 'GET /health').length, 2);
  });

  test('operations short-circuit when the daemon cannot start', async () => {
    const daemon = fakeDaemon();
    const subject = client(daemon, new CountingLauncher(), { autoStart: false });

    const result = await subject.modelsStatus();

    assert.ok(result.isFailure());
    assert.strictEqual(result.error.code, 'serviceUnavailable');
    assert.deepStrictEqual(daemon.calls, ['GET /health']);
  });

  test('translate posts the request and trims the answer', async () => {
    let body = '';
    const daemon = fakeDaemon({
      'POST /translate': () =>
        jsonResponse({ translated_text: ' [en->ja] Hello ', source_lang: 'en', target_lang: 'ja', backend: 'fixture' }),
    });
    daemon.healthy = true;
    const inspecting: FetchFn = async (input, init) => {
      if (typeof init?.body === 'string') {
        body = init.body;
      }
      return daemon.fetch(input, init);
    };
    const subject = new LocalServiceClient(silentLogger, config, { fetch: inspecting, launcher: new CountingLauncher() });

    const result = await subject.translate({ text: 'Hello', sourceLang: 'en', targetLang: 'ja' });

    assert.strictEqual(result.getOrNull(), '[en->ja] Hello');
    assert.deepStrictEqual(JSON.parse(body), { text: 'Hello', source_lang: 'en', target_lang: 'ja' });
  });

  test('unsupported pairs fail without touching the daemon', async () => {
    const daemon = fakeDaemon();
    const subject = client(daemon, new CountingLauncher());

    const result = await subject.translate({ text: 'Hola', sourceLang: 'es', targetLang: 'ja' });

    assert.ok(result.isFailure());
    assert.strictEqual(result.error.code, 'userError');
    assert.deepStrictEqual(daemon.calls, []);
  });

  test('error envelopes map back to typed errors', async () => {
    const daemon = fakeDaemon({
      'POST /translate': () =>
        jsonResponse({ error: { code: 'model_unavailable', message: 'Local models not installed', retryable: false } }, 503),
    });
    daemon.healthy = true;
    const subject = client(daemon, new CountingLauncher());

    const result = await subject.translate({ text: 'Hello', sourceLang: 'en', targetLang: 'ja' });

    assert.ok(result.isFailure());
    assert.strictEqual(result.error.code, 'modelUnavailable');
    assert.strictEqual(result.error.message, 'Local provider error (model_unavailable): Local models not installed');
  });

  test('a payload with the wrong shape is an invalid response', async () => {
    const daemon = fakeDaemon({ 'POST /models/verify': () => jsonResponse({ ok: 'yes' }) });
    daemon.healthy = true;
    const subject = client(daemon, new CountingLauncher());

    const result = await subject.modelsVerify();

    assert.ok(result.isFailure());
    assert.strictEqual(result.error.code, 'invalidResponse');
  });

  test('models status and backtranslate decode the daemon payloads', async () => {
    const daemon = fakeDaemon({
      'GET /models': () => jsonResponse(modelsStatus),
      'POST /backtranslate': () =>
        jsonResponse({
          original_text: 'Hi',
          intermediate_text: '[en->ja] Hi',
          final_text: '[ja->en] [en->ja] Hi',
          source_lang: 'en',
          intermediate_lang: 'ja',
          target_lang: 'en',
          backend: 'fixture',
        }),
    });
    daemon.healthy = true;
    const subject = client(daemon, new CountingLauncher());

    const status = await subject.modelsStatus();
    const round = await subject.backtranslate('Hi');

    assert.deepStrictEqual(status.getOrNull(), modelsStatus);
    assert.deepStrictEqual(round.getOrNull(), {
      original: 'Hi',
      intermediate: '[en->ja] Hi',
      final: '[ja->en] [en->ja] Hi',
      sourceLang: 'en',
      intermediateLang: 'ja',
    });
  });

  test('dispose stops a spawned daemon', async () => {
    const daemon = fakeDaemon();
    const launcher = new CountingLauncher(() => {
      daemon.healthy = true;
    });
    const subject = client(daemon, launcher);
    await subject.ensureRunning();

    subject.dispose();

    assert.strictEqual(launcher.processes[0].alive, false);
  });
});
