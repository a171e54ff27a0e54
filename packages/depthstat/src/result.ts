/**
 * Result helpers.
 * Expected failures (bad grids, misaligned series, empty groups) are values,
 * never exceptions.
 */

import type { Result } from './types.ts';

// =============================================================================
// Constructors
// =============================================================================

export const ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

export const err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});

// =============================================================================
// Guards
// =============================================================================

export const isOk = <T, E>(result: Result<T, E>): result is { ok: true; value: T } =>
  result.ok;

export const isErr = <T, E>(result: Result<T, E>): result is { ok: false; error: E } =>
  !result.ok;

// =============================================================================
// Extractors
// =============================================================================

const describeError = (error: unknown): string => {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const code = 'code' in error ? `${String(error.code)}: ` : '';
    return `${code}${String(error.message)}`;
  }
  return JSON.stringify(error);
};

export const unwrap = <T, E>(result: Result<T, E>): T => {
  if (result.ok) return result.value;
  throw new Error(`Attempted to unwrap an error result: ${describeError(result.error)}`);
};

export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T =>
  result.ok ? result.value : defaultValue;

// =============================================================================
// Transformers
// =============================================================================

export const map = <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  result.ok ? ok(fn(result.value)) : result;

export const mapErr = <T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> =>
  result.ok ? result : err(fn(result.error));

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> =>
  result.ok ? fn(result.value) : result;

// =============================================================================
// Combinators
// =============================================================================

/** First error wins; otherwise every value in input order. */
export const all = <T, E>(results: readonly Result<T, E>[]): Result<readonly T[], E> => {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) return result;
    values.push(result.value);
  }
  return ok(values);
};

// =============================================================================
// Pattern Matching
// =============================================================================

export const match = <T, E, U>(
  result: Result<T, E>,
  handlers: {
    readonly ok: (value: T) => U;
    readonly err: (error: E) => U;
  }
): U =>
  result.ok ? handlers.ok(result.value) : handlers.err(result.error);
