/**
 * Result type for expected failures
 *
 * Conversion, consumption and parsing report failures as values so the
 * caller decides what to do with them. Only registration mistakes throw.
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.ok === false;
}

/**
 * Transform the value of a success; failures pass through
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return isOk(result) ? ok(fn(result.value)) : result;
}

/**
 * Transform the error of a failure; successes pass through
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return isErr(result) ? err(fn(result.error)) : result;
}

export function andThen<T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> {
  return isOk(result) ? fn(result.value) : result;
}

/**
 * Apply `fn` to every item in order, stopping at the first failure.
 * Nothing is returned from a run that fails part-way.
 */
export function collect<I, T, E>(items: readonly I[], fn: (item: I) => Result<T, E>): Result<T[], E> {
  const values: T[] = [];
  for (const item of items) {
    const result = fn(item);
    if (isErr(result)) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
}
