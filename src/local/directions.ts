import type { LanguagePair } from '../types/translation';

export const SUPPORTED_DIRECTIONS: readonly LanguagePair[] = [
  { source: 'en', target: 'ja' },
  { source: 'ja', target: 'en' },
];

export function isSupportedPair(source: string, target: string): boolean {
  return SUPPORTED_DIRECTIONS.some((pair) => pair.source === source && pair.target === target);
}

/** Directory and wire name of a direction, e.g. `en-ja`. */
export function directionName(pair: LanguagePair): string {
  return `${pair.source}-${pair.target}`;
}
