/**
 * Result type for patch application
 *
 * Applying a delta never throws: it either yields the reconstructed value
 * or reports every error found, without a partial value.
 */

/**
 * Success result
 */
export interface Success<T> {
  success: true;
  value: T;
  warnings: string[];
}

/**
 * Failure result
 */
export interface Failure<E = Error> {
  success: false;
  errors: E[];
  warnings: string[];
}

/**
 * Result type representing success or failure
 */
export type Result<T, E = Error> = Success<T> | Failure<E>;

/**
 * Create a success result
 *
 * @param value The success value
 * @param warnings Optional warnings
 */
export function ok<T>(value: T, warnings: string[] = []): Success<T> {
  return { success: true, value, warnings };
}

/**
 * Create a failure result
 *
 * @param errors The errors
 * @param warnings Optional warnings
 */
export function err<E = Error>(errors: E[], warnings: string[] = []): Failure<E> {
  return { success: false, errors, warnings };
}

/**
 * Create a failure result from a single error
 */
export function errSingle<E = Error>(error: E, warnings: string[] = []): Failure<E> {
  return { success: false, errors: [error], warnings };
}

/**
 * Check if result is success
 */
export function isOk<T, E>(result: Result<T, E>): result is Success<T> {
  return result.success;
}

/**
 * Check if result is failure
 */
export function isErr<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.success;
}

/**
 * Map a success value to a new value
 *
 * @param result Input result
 * @param fn Mapping function
 * @returns Mapped result
 */
export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  if (result.success) {
    return ok(fn(result.value), result.warnings);
  }
  return result;
}

/**
 * Unwrap a result, throwing if it's an error
 *
 * @param result Result to unwrap
 * @returns The success value
 * @throws If result is an error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.value;
  }
  const messages = result.errors.map((e) => (e instanceof Error ? e.message : String(e)));
  throw new Error(`Unwrap failed: ${messages.join(", ")}`);
}

/**
 * Unwrap a result or return a default value
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.success ? result.value : defaultValue;
}
