import type { ProviderKind } from '../../types/translation';

export const DEFAULT_PROVIDER: ProviderKind = 'googleUnofficial';

const ALIASES: ReadonlyMap<string, ProviderKind> = new Map<string, ProviderKind>([
  ['', 'googleUnofficial'],
  ['googleunofficial', 'googleUnofficial'],
  ['google_unofficial', 'googleUnofficial'],
  ['google_unofficial_free', 'googleUnofficial'],
  ['unofficial', 'googleUnofficial'],
  ['google_free', 'googleUnofficial'],
  ['googletranslate', 'googleUnofficial'],
  ['local', 'local'],
  ['offline', 'local'],
]);

/** Resolves a free-form provider id once; unknown ids fall back to the default provider. */
export function normalizeProviderId(value: string | undefined | null): ProviderKind {
  return ALIASES.get((value ?? '').trim().toLowerCase()) ?? DEFAULT_PROVIDER;
}
