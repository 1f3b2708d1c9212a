import { TranslationError } from '../services/TranslationError';
import { failure, type Result } from './result';

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'ENETUNREACH', 'EPIPE']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT']);

/**
 * Runs `request` under a per-request deadline. The caller's signal is
 * forwarded; its abort is reported as `cancelled`, the deadline as `timeout`.
 */
export async function withRequestTimeout<T>(
  timeoutMs: number,
  callerSignal: AbortSignal | undefined,
  request: (signal: AbortSignal) => Promise<Result<T, TranslationError>>,
  label = 'Request',
): Promise<Result<T, TranslationError>> {
  if (callerSignal?.aborted) {
    return failure<TranslationError, T>(TranslationError.cancelled());
  }

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  callerSignal?.addEventListener('abort', forwardAbort, { once: true });
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await request(controller.signal);
  } catch (error) {
    return failure<TranslationError, T>(classifyRequestError(error, callerSignal?.aborted ?? false, label));
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener('abort', forwardAbort);
  }
}

export function classifyRequestError(error: unknown, cancelled: boolean, label = 'Request'): TranslationError {
  if (error instanceof TranslationError) {
    return error;
  }
  if (cancelled) {
    return TranslationError.cancelled();
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return TranslationError.timeout(`${label} timed out`);
  }

  const code = errorCode(error);
  const detail = error instanceof Error ? error.message : String(error);
  if (code && TIMEOUT_CODES.has(code)) {
    return TranslationError.timeout(`${label} timed out`);
  }
  if (code && CONNECTION_CODES.has(code)) {
    return TranslationError.connection(`${label} could not connect (${code})`);
  }
  if (code && (code.startsWith('CERT_') || code.startsWith('ERR_TLS_') || code.includes('SSL') || code.includes('SELF_SIGNED'))) {
    return TranslationError.tls(`${label} TLS failure (${code})`);
  }
  return TranslationError.network(`${label} network error: ${code ? `${detail} (${code})` : detail}`);
}

function errorCode(error: unknown, depth = 0): string | undefined {
  if (!(error instanceof Error) || depth > 4) {
    return undefined;
  }
  const own = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return own ?? errorCode(error.cause, depth + 1);
}

/** Parses `Retry-After` as delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}
