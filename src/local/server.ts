import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http';
import type { z } from 'zod';

import {
  BacktranslateRequestSchema,
  ModelInstallRequestSchema,
  TranslateRequestSchema,
  type ErrorEnvelope,
} from '../messaging/channel';
import {
  isRetryableWireCode,
  toWireCode,
  TranslationError,
  wireStatusFor,
  type WireErrorCode,
} from '../services/TranslationError';
import { ServiceLogger } from '../utils/logger';
import type { Result } from '../utils/result';
import type { LocalTranslationService } from './LocalTranslationService';
import { DEFAULT_PRESET } from './ModelManager';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 5055;

const MAX_BODY_BYTES = 1024 * 1024;

class InvalidJsonError extends Error {}

type Reply = { status: number; payload: unknown };

export function createLocalServer(service: LocalTranslationService, logger: ServiceLogger): Server {
  return createServer((request, response) => {
    handle(service, logger, request)
      .catch((error: unknown): Reply => {
        logger.error('Local service request failed.', error);
        return errorReply('server_error', error instanceof Error ? error.message : String(error));
      })
      .then((reply) => writeJson(response, reply))
      .catch((error: unknown) => logger.error('Failed to write local service response.', error));
  });
}

export function listen(server: Server, host: string, port: number): Promise<{ host: string; port: number }> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      resolve({ host, port: typeof address === 'object' && address ? address.port : port });
    });
  });
}

async function handle(service: LocalTranslationService, logger: ServiceLogger, request: IncomingMessage): Promise<Reply> {
  const method = request.method ?? 'GET';
  const path = (request.url ?? '/').split('?')[0];
  logger.debug(`${method} ${path}`);

  if (method === 'GET') {
    if (path === '/health') {
      return ok(await service.health());
    }
    if (path === '/models') {
      return ok(await service.modelsStatus());
    }
    return errorReply('not_found', 'Unknown route');
  }

  if (method !== 'POST') {
    return errorReply('not_found', 'Unknown route');
  }

  let body: Record<string, unknown>;
  try {
    body = await readJsonBody(request);
  } catch (error) {
    if (error instanceof InvalidJsonError) {
      return errorReply('invalid_json', 'Invalid JSON body');
    }
    if (error instanceof TranslationError) {
      return failureReply(error);
    }
    throw error;
  }

  switch (path) {
    case '/translate': {
      const parsed = validate(TranslateRequestSchema, body);
      if (parsed instanceof TranslationError) {
        return failureReply(parsed);
      }
      return fromResult(
        await service.translate({
          text: parsed.text,
          sourceLang: parsed.source_lang,
          targetLang: parsed.target_lang,
        }),
      );
    }
    case '/backtranslate': {
      const parsed = validate(BacktranslateRequestSchema, body);
      if (parsed instanceof TranslationError) {
        return failureReply(parsed);
      }
      return fromResult(
        await service.backtranslate(parsed.text, parsed.source_lang, parsed.intermediate_lang, parsed.target_lang),
      );
    }
    case '/models/verify':
      return ok(await service.modelsVerify());
    case '/models/remove':
      return ok(await service.modelsRemove());
    case '/models/install': {
      const parsed = validate(ModelInstallRequestSchema, body);
      if (parsed instanceof TranslationError) {
        return failureReply(parsed);
      }
      const preset = parsed.preset || (Object.keys(body).length === 0 ? DEFAULT_PRESET : undefined);
      return fromResult(
        await service.modelsInstall({
          preset,
          enJaUrl: parsed.en_ja_url,
          jaEnUrl: parsed.ja_en_url,
          enJaSha256: parsed.en_ja_sha256,
          jaEnSha256: parsed.ja_en_sha256,
        }),
      );
    }
    default:
      return errorReply('not_found', 'Unknown route');
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T | TranslationError {
  const parsed = schema.safeParse(body);
  if (parsed.success) {
    return parsed.data;
  }
  const issue = parsed.error.issues[0];
  return TranslationError.userError(issue ? `Invalid ${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid body');
}

async function readJsonBody(request: IncomingMessage): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  let size = 0;
  // Oversized bodies are drained so the client still reads the error reply.
  for await (const chunk of request) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size <= MAX_BODY_BYTES) {
      chunks.push(buffer);
    }
  }
  if (size > MAX_BODY_BYTES) {
    throw TranslationError.userError('Request body too large');
  }

  const raw = Buffer.concat(chunks).toString('utf8');
  if (!raw.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new InvalidJsonError('Invalid JSON body');
  }
  if (!isRecord(parsed)) {
    throw new InvalidJsonError('JSON body must be an object');
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromResult<T>(result: Result<T, TranslationError>): Reply {
  return result.fold(ok, failureReply);
}

function ok(payload: unknown): Reply {
  return { status: 200, payload };
}

function failureReply(error: TranslationError): Reply {
  return errorReply(toWireCode(error), error.message);
}

function errorReply(code: WireErrorCode, message: string): Reply {
  const envelope: ErrorEnvelope = {
    error: { code, message, retryable: isRetryableWireCode(code) },
  };
  return { status: wireStatusFor(code), payload: envelope };
}

function writeJson(response: ServerResponse, reply: Reply): void {
  const body = JSON.stringify(reply.payload);
  response.writeHead(reply.status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  response.end(body);
}
