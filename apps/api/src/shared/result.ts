/**
 * Explicit success/failure values for stages that degrade instead of throwing
 */

export type Success<T> = {
  success: true;
  value: T;
};

export type Failure<E> = {
  success: false;
  error: E;
};

export type Result<T, E> = Success<T> | Failure<E>;

export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

export function fail<E>(error: E): Failure<E> {
  return { success: false, error };
}
