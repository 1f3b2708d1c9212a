import type { TranslationErrorCode } from '../types/translation';
import type { TranslationError } from '../services/TranslationError';

const messages = {
  'error.timeout': 'The translation service took too long to respond. Please try again.',
  'error.connection': 'Could not reach the translation service. Check your connection.',
  'error.tls': 'A secure connection to the translation service could not be established.',
  'error.network': 'A network problem interrupted the translation.',
  'error.http': 'The translation service returned an error ({0}).',
  'error.rateLimited': 'Too many requests, please wait a moment and try again.',
  'error.blocked': 'The translation service blocked the request. Try again later or switch providers.',
  'error.invalidResponse': 'The translation service sent a response that could not be read.',
  'error.noTranslation': 'No translation was returned for this text.',
  'error.modelUnavailable': 'Offline models are not installed. Install them with "roundtrip models install".',
  'error.userError': 'The request could not be processed: {0}',
  'error.configError': 'The configuration is invalid: {0}',
  'error.serviceUnavailable': 'The offline translation service is not available.',
  'error.checksumMismatch': 'A downloaded model archive failed verification ({0}).',
  'error.maxRetriesExceeded': 'Translation failed after {0} attempts.',
  'error.cancelled': 'Translation was cancelled.',
  'error.unexpected': 'Something went wrong while translating.',
  'command.translate.usage': 'Usage: roundtrip translate --source <lang> --target <lang> [--text TEXT]',
  'command.models.usage': 'Usage: roundtrip models <status|verify|install|remove>',
  'command.models.installUsage': 'models install needs --preset or both --en-ja-url and --ja-en-url.',
  'command.memory.usage': 'Usage: roundtrip memory <stats|clear>',
  'command.memory.cleared': 'Translation memory cleared.',
  'command.models.removed': 'Removed models from {0}.',
  'command.models.localOnly': 'Model management needs the local provider (set TF_PROVIDER=local).',
} as const;

export type MessageKey = keyof typeof messages;

export function localize(key: MessageKey, ...args: Array<string | number>): string {
  return messages[key].replace(/\{(\d+)\}/g, (match, index: string) => {
    const value = args[Number(index)];
    return value === undefined ? match : String(value);
  });
}

function errorKey(code: TranslationErrorCode): MessageKey {
  return `error.${code}`;
}

/** Short, non-technical text for showing an error to a person. */
export function describeError(error: TranslationError): string {
  const detail = error.detail;
  switch (detail.code) {
    case 'http':
      return localize('error.http', detail.status);
    case 'checksumMismatch':
      return localize('error.checksumMismatch', detail.direction);
    case 'maxRetriesExceeded':
      return `${localize('error.maxRetriesExceeded', detail.attempts)} ${describeError(detail.lastCause)}`;
    case 'userError':
    case 'configError':
      return localize(errorKey(detail.code), error.message);
    default:
      return localize(errorKey(detail.code));
  }
}
