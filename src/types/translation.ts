export type TranslationErrorCode =
  | 'timeout'
  | 'connection'
  | 'tls'
  | 'network'
  | 'http'
  | 'rateLimited'
  | 'blocked'
  | 'invalidResponse'
  | 'noTranslation'
  | 'modelUnavailable'
  | 'userError'
  | 'configError'
  | 'serviceUnavailable'
  | 'checksumMismatch'
  | 'maxRetriesExceeded'
  | 'cancelled'
  | 'unexpected';

export type ProviderKind = 'googleUnofficial' | 'local';

export interface TranslationRequest {
  text: string;
  sourceLang: string;
  targetLang: string;
}

export interface LanguagePair {
  source: string;
  target: string;
}

export interface BacktranslationResult {
  original: string;
  intermediate: string;
  final: string;
  sourceLang: string;
  intermediateLang: string;
}

export interface FuzzyMatch {
  translation: string;
  score: number;
}

export interface TranslationMemoryStats {
  hits: number;
  misses: number;
  fuzzyHits: number;
  totalLookups: number;
  totalLookupTimeMs: number;
  hitRate: number;
  averageLookupMs: number;
  size: number;
  maxEntries: number;
}

export type StatusCallback = (message: string) => void;

export interface TranslateOptions {
  signal?: AbortSignal;
  onStatus?: StatusCallback;
}
