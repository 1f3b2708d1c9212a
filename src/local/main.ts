#!/usr/bin/env node
import { resolve } from 'path';
import { parseArgs } from 'util';

import { TranslationError, toWireCode } from '../services/TranslationError';
import { isLogLevel } from '../utils/config';
import { ServiceLogger } from '../utils/logger';
import { defaultModelDir, expandHome } from '../utils/paths';
import type { Result } from '../utils/result';
import { selectBackend } from './backends';
import { LocalTranslationService } from './LocalTranslationService';
import { ModelManager } from './ModelManager';
import { createLocalServer, DEFAULT_HOST, DEFAULT_PORT, listen } from './server';

const USAGE = `Usage: roundtrip-local <command> [options]

Commands:
  serve [--host HOST] [--port PORT]
  health
  models-status
  models-verify
  models-remove
  models-install [--preset NAME | --en-ja-url URL --ja-en-url URL] [--en-ja-sha256 HEX] [--ja-en-sha256 HEX]
  translate [--source en] [--target ja] [--text TEXT]
  backtranslate [--source en] [--intermediate ja] [--target en] [--text TEXT]

Text is read from stdin when --text is omitted.`;

export async function buildLocalService(
  env: NodeJS.ProcessEnv,
  logger: ServiceLogger,
): Promise<LocalTranslationService> {
  const override = env.TF_LOCAL_MODEL_DIR?.trim();
  const modelDir = override ? resolve(expandHome(override)) : defaultModelDir();
  const presetDir = env.TF_LOCAL_MODEL_PACKS?.trim();
  const models = new ModelManager(modelDir, logger.child({ component: 'models' }), {
    presetDir: presetDir ? resolve(expandHome(presetDir)) : undefined,
  });
  const backend = await selectBackend(env, models);
  logger.info(`Local service using ${backend.name} backend; models at ${modelDir}.`);
  return new LocalTranslationService(backend, models, logger);
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === '--help' || command === '-h') {
    process.stdout.write(`${USAGE}\n`);
    return command ? 0 : 1;
  }

  const { values } = parseArgs({
    args: rest,
    options: {
      host: { type: 'string' },
      port: { type: 'string' },
      preset: { type: 'string' },
      'en-ja-url': { type: 'string' },
      'ja-en-url': { type: 'string' },
      'en-ja-sha256': { type: 'string' },
      'ja-en-sha256': { type: 'string' },
      source: { type: 'string' },
      intermediate: { type: 'string' },
      target: { type: 'string' },
      text: { type: 'string' },
    },
    strict: true,
  });

  const level = env.TF_LOG_LEVEL?.trim().toLowerCase() ?? 'info';
  const logger = ServiceLogger.create({
    name: 'roundtrip-local',
    level: isLogLevel(level) ? level : 'info',
    sync: env.TF_LOCAL_LOG_SYNC === '1',
  });
  const service = await buildLocalService(env, logger);

  switch (command) {
    case 'serve': {
      const host = values.host ?? env.TF_LOCAL_HOST ?? DEFAULT_HOST;
      const port = Number(values.port ?? env.TF_LOCAL_PORT ?? DEFAULT_PORT);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        process.stderr.write(`Invalid port: ${values.port ?? env.TF_LOCAL_PORT}\n`);
        return 2;
      }
      const server = createLocalServer(service, logger);
      const address = await listen(server, host, port);
      logger.info(`Local service listening on http://${address.host}:${address.port}.`);
      await new Promise<void>((done) => {
        const stop = (): void => {
          server.close(() => done());
        };
        process.once('SIGTERM', stop);
        process.once('SIGINT', stop);
      });
      logger.info('Local service stopped.');
      return 0;
    }
    case 'health':
      return printJson(await service.health());
    case 'models-status':
      return printJson(await service.modelsStatus());
    case 'models-verify':
      return printJson(await service.modelsVerify());
    case 'models-remove':
      return printJson(await service.modelsRemove());
    case 'models-install': {
      if (!values.preset && (!values['en-ja-url'] || !values['ja-en-url'])) {
        process.stderr.write('models-install requires --preset or both --en-ja-url and --ja-en-url\n');
        return 2;
      }
      return printResult(
        await service.modelsInstall({
          preset: values.preset,
          enJaUrl: values['en-ja-url'],
          jaEnUrl: values['ja-en-url'],
          enJaSha256: values['en-ja-sha256'],
          jaEnSha256: values['ja-en-sha256'],
        }),
      );
    }
    case 'translate': {
      const text = values.text ?? (await readStdin());
      return printResult(
        await service.translate({ text, sourceLang: values.source ?? 'en', targetLang: values.target ?? 'ja' }),
      );
    }
    case 'backtranslate': {
      const text = values.text ?? (await readStdin());
      return printResult(
        await service.backtranslate(text, values.source ?? 'en', values.intermediate ?? 'ja', values.target ?? 'en'),
      );
    }
    default:
      process.stderr.write(`Unknown command: ${command}\n${USAGE}\n`);
      return 2;
  }
}

function printJson(payload: unknown): number {
  process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
  return 0;
}

function printResult<T>(result: Result<T, TranslationError>): number {
  return result.fold(printJson, (error) => {
    process.stderr.write(`${JSON.stringify({ error: { code: toWireCode(error), message: error.message } }, null, 2)}\n`);
    return 1;
  });
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    },
  );
}
