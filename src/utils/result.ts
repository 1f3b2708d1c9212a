/**
 * Success/failure container used for every expected failure path, so the
 * retry loop and the orchestrator can inspect outcomes instead of catching.
 */
export type Result<T, E> = Success<T, E> | Failure<T, E>;

interface ResultMethods<T, E> {
  isSuccess(): this is Success<T, E>;
  isFailure(): this is Failure<T, E>;
  map<U>(transform: (value: T) => U): Result<U, E>;
  mapError<F>(transform: (error: E) => F): Result<T, F>;
  flatMap<U>(transform: (value: T) => Result<U, E>): Result<U, E>;
  getOrElse(fallback: () => T): T;
  getOrNull(): T | null;
  fold<R>(onSuccess: (value: T) => R, onFailure: (error: E) => R): R;
  onSuccess(action: (value: T) => void): Result<T, E>;
  onFailure(action: (error: E) => void): Result<T, E>;
}

export class Success<T, E> implements ResultMethods<T, E> {
  readonly kind = 'success' as const;

  constructor(readonly value: T) {}

  isSuccess(): this is Success<T, E> {
    return true;
  }

  isFailure(): this is Failure<T, E> {
    return false;
  }

  map<U>(transform: (value: T) => U): Result<U, E> {
    return new Success<U, E>(transform(this.value));
  }

  mapError<F>(_transform: (error: E) => F): Result<T, F> {
    return new Success<T, F>(this.value);
  }

  flatMap<U>(transform: (value: T) => Result<U, E>): Result<U, E> {
    return transform(this.value);
  }

  getOrElse(_fallback: () => T): T {
    return this.value;
  }

  getOrNull(): T | null {
    return this.value;
  }

  fold<R>(onSuccess: (value: T) => R, _onFailure: (error: E) => R): R {
    return onSuccess(this.value);
  }

  onSuccess(action: (value: T) => void): Result<T, E> {
    observe(() => action(this.value));
    return this;
  }

  onFailure(_action: (error: E) => void): Result<T, E> {
    return this;
  }

  toString(): string {
    return `Success(${String(this.value)})`;
  }
}

export class Failure<T, E> implements ResultMethods<T, E> {
  readonly kind = 'failure' as const;

  constructor(readonly error: E) {}

  isSuccess(): this is Success<T, E> {
    return false;
  }

  isFailure(): this is Failure<T, E> {
    return true;
  }

  map<U>(_transform: (value: T) => U): Result<U, E> {
    return new Failure<U, E>(this.error);
  }

  mapError<F>(transform: (error: E) => F): Result<T, F> {
    return new Failure<T, F>(transform(this.error));
  }

  flatMap<U>(_transform: (value: T) => Result<U, E>): Result<U, E> {
    return new Failure<U, E>(this.error);
  }

  getOrElse(fallback: () => T): T {
    return fallback();
  }

  getOrNull(): T | null {
    return null;
  }

  fold<R>(_onSuccess: (value: T) => R, onFailure: (error: E) => R): R {
    return onFailure(this.error);
  }

  onSuccess(_action: (value: T) => void): Result<T, E> {
    return this;
  }

  onFailure(action: (error: E) => void): Result<T, E> {
    observe(() => action(this.error));
    return this;
  }

  toString(): string {
    return `Failure(${String(this.error)})`;
  }
}

// Observers are best effort: whatever they throw, the variant stays the same.
function observe(action: () => void): void {
  try {
    action();
  } catch {
    return;
  }
}

export function success<T, E = never>(value: T): Result<T, E> {
  return new Success<T, E>(value);
}

export function failure<E, T = never>(error: E): Result<T, E> {
  return new Failure<T, E>(error);
}

export function fromNullable<T, E>(value: T | null | undefined, error: E): Result<T, E> {
  return value === null || value === undefined ? failure<E, T>(error) : success<T, E>(value);
}

export function sequence<T, E>(results: readonly Result<T, E>[]): Result<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (result.isFailure()) {
      return failure<E, T[]>(result.error);
    }
    values.push(result.value);
  }
  return success<T[], E>(values);
}

export function recover<T, E>(result: Result<T, E>, recovery: (error: E) => T): Result<T, E> {
  return result.isSuccess() ? result : success<T, E>(recovery(result.error));
}
