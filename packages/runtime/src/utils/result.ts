/**
 * Result type for functional error handling
 * Failures are returned up the call chain instead of thrown
 */

import type { PowerCycleError } from '@pdu-cycle/core';

/**
 * Success result
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Error result
 */
export interface Err<E = PowerCycleError> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Result type - Either Ok or Err
 */
export type Result<T, E = PowerCycleError> = Ok<T> | Err<E>;

/**
 * Create a success result
 */
export const ok = <T>(value: T): Ok<T> => ({
  ok: true,
  value
});

/**
 * Create an error result
 */
export const err = <E = PowerCycleError>(error: E): Err<E> => ({
  ok: false,
  error
});

/**
 * Async try/catch wrapper that returns Result
 */
export const tryCatchAsync = async <T, E>(
  fn: () => Promise<T>,
  errorMapper: (error: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return ok(await fn());
  } catch (error) {
    return err(errorMapper(error));
  }
};
