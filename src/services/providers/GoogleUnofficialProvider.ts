import type { TranslationRequest } from '../../types/translation';
import { parseRetryAfter, withRequestTimeout, type FetchFn } from '../../utils/http';
import { ServiceLogger } from '../../utils/logger';
import { failure, success, type Result } from '../../utils/result';
import { TranslationError } from '../TranslationError';
import type { GoogleUnofficialProviderConfig, TranslationProvider } from './types';

export const UNOFFICIAL_ENDPOINT = 'https://translate.googleapis.com/translate_a/single';

const DEFAULT_TIMEOUT_MS = 10_000;
const BLOCK_MARKERS = ['<html', 'captcha'];

export function buildUnofficialUrl(
  text: string,
  sourceLang: string,
  targetLang: string,
  endpoint: string = UNOFFICIAL_ENDPOINT,
): string {
  const params = new URLSearchParams({
    client: 'gtx',
    sl: sourceLang,
    tl: targetLang,
    dt: 't',
    q: text,
  });
  return `${endpoint}?${params.toString()}`;
}

/**
 * Reads the segment array the endpoint returns: `[[["translated", "source", ...], ...], ...]`.
 */
export function parseUnofficialResponse(body: string): Result<string, TranslationError> {
  if (!body.trim()) {
    return failure<TranslationError, string>(TranslationError.invalidResponse('Empty response body'));
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return failure<TranslationError, string>(TranslationError.invalidResponse('Response is not valid JSON'));
  }

  if (!Array.isArray(data) || data.length === 0 || !Array.isArray(data[0])) {
    return failure<TranslationError, string>(TranslationError.invalidResponse('Unexpected response structure'));
  }

  const segments: unknown[] = data[0];
  let output = '';
  for (const segment of segments) {
    if (Array.isArray(segment) && typeof segment[0] === 'string') {
      output += segment[0];
    }
  }

  const trimmed = output.trim();
  return trimmed
    ? success<string, TranslationError>(trimmed)
    : failure<TranslationError, string>(TranslationError.noTranslation());
}

export function looksBlocked(body: string): boolean {
  const lowered = body.toLowerCase();
  return BLOCK_MARKERS.some((marker) => lowered.includes(marker));
}

export class GoogleUnofficialProvider implements TranslationProvider {
  readonly id = 'googleUnofficial' as const;
  private readonly timeoutMs: number;
  private readonly endpoint: string;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly logger: ServiceLogger,
    config: Omit<GoogleUnofficialProviderConfig, 'kind'> = {},
  ) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.endpoint = config.endpoint ?? UNOFFICIAL_ENDPOINT;
    this.fetchFn = config.fetch ?? fetch;
  }

  async translate(request: TranslationRequest, signal?: AbortSignal): Promise<Result<string, TranslationError>> {
    if (!request.text.trim()) {
      return success<string, TranslationError>('');
    }

    const url = buildUnofficialUrl(request.text, request.sourceLang, request.targetLang, this.endpoint);

    return withRequestTimeout(
      this.timeoutMs,
      signal,
      async (requestSignal) => {
        const response = await this.fetchFn(url, {
          method: 'GET',
          headers: { Accept: 'application/json,text/plain,*/*' },
          signal: requestSignal,
        });
        const body = await response.text();
        return this.classify(response, body);
      },
      'Translation request',
    );
  }

  private classify(response: Response, body: string): Result<string, TranslationError> {
    if (response.status === 429) {
      const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
      this.logger.warn('Unofficial endpoint rate limited the request.', { retryAfter });
      return failure<TranslationError, string>(TranslationError.rateLimited(retryAfter));
    }

    if (response.status === 403 || looksBlocked(body)) {
      this.logger.warn('Unofficial endpoint blocked the request.', { status: response.status });
      return failure<TranslationError, string>(TranslationError.blocked());
    }

    if (!response.ok) {
      return failure<TranslationError, string>(TranslationError.http(response.status, body));
    }

    return parseUnofficialResponse(body);
  }
}
