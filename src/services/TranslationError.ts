import type { TranslationErrorCode } from '../types/translation';

export type TranslationErrorDetail =
  | { code: 'timeout' }
  | { code: 'connection' }
  | { code: 'tls' }
  | { code: 'network' }
  | { code: 'http'; status: number; body: string }
  | { code: 'rateLimited'; retryAfterSeconds?: number }
  | { code: 'blocked' }
  | { code: 'invalidResponse' }
  | { code: 'noTranslation' }
  | { code: 'modelUnavailable' }
  | { code: 'userError' }
  | { code: 'configError' }
  | { code: 'serviceUnavailable' }
  | { code: 'checksumMismatch'; direction: string }
  | { code: 'maxRetriesExceeded'; attempts: number; lastCause: TranslationError }
  | { code: 'cancelled' }
  | { code: 'unexpected' };

/** Codes the local service puts in its `{"error": {...}}` envelope. */
export type WireErrorCode =
  | 'user_error'
  | 'config_error'
  | 'invalid_response'
  | 'network_error'
  | 'model_unavailable'
  | 'invalid_json'
  | 'not_found'
  | 'server_error';

const NETWORK_CODES: ReadonlySet<TranslationErrorCode> = new Set<TranslationErrorCode>([
  'timeout',
  'connection',
  'tls',
  'network',
]);

export class TranslationError extends Error {
  constructor(
    readonly detail: TranslationErrorDetail,
    message: string,
  ) {
    super(message);
    this.name = 'TranslationError';
  }

  get code(): TranslationErrorCode {
    return this.detail.code;
  }

  get isNetworkError(): boolean {
    return NETWORK_CODES.has(this.detail.code);
  }

  get retryAfterSeconds(): number | undefined {
    return this.detail.code === 'rateLimited' ? this.detail.retryAfterSeconds : undefined;
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = { ...this.detail, message: this.message };
    if (this.detail.code === 'maxRetriesExceeded') {
      json.lastCause = this.detail.lastCause.toJSON();
    }
    return json;
  }

  static timeout(message = 'Request timed out'): TranslationError {
    return new TranslationError({ code: 'timeout' }, message);
  }

  static connection(message = 'Failed to connect to translation service'): TranslationError {
    return new TranslationError({ code: 'connection' }, message);
  }

  static tls(message: string): TranslationError {
    return new TranslationError({ code: 'tls' }, message);
  }

  static network(message: string): TranslationError {
    return new TranslationError({ code: 'network' }, message);
  }

  static http(status: number, body: string): TranslationError {
    const snippet = body.slice(0, 200);
    const message = snippet ? `HTTP ${status}: ${snippet}` : `HTTP ${status}`;
    return new TranslationError({ code: 'http', status, body: snippet }, message);
  }

  static rateLimited(retryAfterSeconds?: number): TranslationError {
    return new TranslationError({ code: 'rateLimited', retryAfterSeconds }, 'Provider rate limited');
  }

  static blocked(message = 'Provider blocked or captcha detected'): TranslationError {
    return new TranslationError({ code: 'blocked' }, message);
  }

  static invalidResponse(message: string): TranslationError {
    return new TranslationError({ code: 'invalidResponse' }, message);
  }

  static noTranslation(message = 'No translation found in response'): TranslationError {
    return new TranslationError({ code: 'noTranslation' }, message);
  }

  static modelUnavailable(message: string): TranslationError {
    return new TranslationError({ code: 'modelUnavailable' }, message);
  }

  static userError(message: string): TranslationError {
    return new TranslationError({ code: 'userError' }, message);
  }

  static configError(message: string): TranslationError {
    return new TranslationError({ code: 'configError' }, message);
  }

  static serviceUnavailable(message: string): TranslationError {
    return new TranslationError({ code: 'serviceUnavailable' }, message);
  }

  static checksumMismatch(direction: string): TranslationError {
    return new TranslationError({ code: 'checksumMismatch', direction }, `${direction} checksum mismatch`);
  }

  static maxRetriesExceeded(attempts: number, operationName: string, lastCause: TranslationError): TranslationError {
    return new TranslationError(
      { code: 'maxRetriesExceeded', attempts, lastCause },
      `Maximum retry attempts (${attempts}) exceeded for ${operationName}: ${lastCause.message}`,
    );
  }

  static cancelled(message = 'Operation cancelled'): TranslationError {
    return new TranslationError({ code: 'cancelled' }, message);
  }

  static unexpected(message: string): TranslationError {
    return new TranslationError({ code: 'unexpected' }, message);
  }
}

export function toWireCode(error: TranslationError): WireErrorCode {
  switch (error.code) {
    case 'userError':
      return 'user_error';
    case 'configError':
      return 'config_error';
    case 'invalidResponse':
    case 'noTranslation':
    case 'checksumMismatch':
      return 'invalid_response';
    case 'timeout':
    case 'connection':
    case 'tls':
    case 'network':
      return 'network_error';
    case 'modelUnavailable':
      return 'model_unavailable';
    default:
      return 'server_error';
  }
}

export function wireStatusFor(code: string): number {
  switch (code) {
    case 'user_error':
    case 'config_error':
    case 'invalid_json':
      return 400;
    case 'not_found':
      return 404;
    case 'invalid_response':
      return 502;
    case 'network_error':
    case 'model_unavailable':
      return 503;
    default:
      return 500;
  }
}

export function isRetryableWireCode(code: WireErrorCode): boolean {
  return code === 'network_error';
}

/** Rebuilds a typed error from a local service error envelope. */
export function fromWireError(code: string, message: string, status: number): TranslationError {
  const text = `Local provider error (${code}): ${message}`;
  switch (code) {
    case 'user_error':
    case 'invalid_json':
      return TranslationError.userError(text);
    case 'config_error':
      return TranslationError.configError(text);
    case 'invalid_response':
      return TranslationError.invalidResponse(text);
    case 'network_error':
      return TranslationError.network(text);
    case 'model_unavailable':
      return TranslationError.modelUnavailable(text);
    default:
      return new TranslationError({ code: 'http', status, body: message.slice(0, 200) }, text);
  }
}
