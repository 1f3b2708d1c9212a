export interface DeduplicatedCall<T> {
  signal?: AbortSignal;
  /** Value handed to a caller that aborts while the shared request keeps running. */
  onAbort: () => T;
}

export interface RequestDeduplicator<T> {
  run(key: string, factory: (signal: AbortSignal) => Promise<T>, call: DeduplicatedCall<T>): Promise<T>;
  readonly size: number;
}

interface InFlight<T> {
  promise: Promise<T>;
  controller: AbortController;
  waiters: number;
}

/**
 * Callers asking for the same key while a request is pending share its
 * promise. A caller that aborts leaves on its own; the shared request is
 * aborted only once every caller has left.
 */
export function createRequestDeduplicator<T>(): RequestDeduplicator<T> {
  const inFlight = new Map<string, InFlight<T>>();

  const forget = (key: string, entry: InFlight<T>): void => {
    if (inFlight.get(key) === entry) {
      inFlight.delete(key);
    }
  };

  const start = (key: string, factory: (signal: AbortSignal) => Promise<T>): InFlight<T> => {
    const controller = new AbortController();
    const entry: InFlight<T> = {
      controller,
      waiters: 0,
      promise: factory(controller.signal).finally(() => forget(key, entry)),
    };
    inFlight.set(key, entry);
    return entry;
  };

  return {
    run(key, factory, call) {
      const signal = call.signal;
      if (signal?.aborted) {
        return Promise.resolve(call.onAbort());
      }

      const entry = inFlight.get(key) ?? start(key, factory);
      entry.waiters += 1;
      if (!signal) {
        return entry.promise;
      }

      return new Promise<T>((resolve, reject) => {
        const leave = (): void => {
          entry.waiters -= 1;
          if (entry.waiters === 0) {
            forget(key, entry);
            entry.controller.abort();
          }
          resolve(call.onAbort());
        };
        signal.addEventListener('abort', leave, { once: true });
        entry.promise.then(
          (value) => {
            signal.removeEventListener('abort', leave);
            resolve(value);
          },
          (error: unknown) => {
            signal.removeEventListener('abort', leave);
            reject(error);
          },
        );
      });
    },
    get size() {
      return inFlight.size;
    },
  };
}
