import { setTimeout as wait } from 'timers/promises';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`; rejects with an AbortError when `signal` fires first. */
export const sleep: SleepFn = async (ms, signal) => {
  await wait(Math.max(0, ms), undefined, { signal });
};

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
