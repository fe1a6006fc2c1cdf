import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

/**
 * Type guard for checking if a value is an Error instance with a message
 */
export function isErrorWithMessage(error: unknown): error is Error & { message: string } {
  return error instanceof Error && typeof error.message === 'string';
}

/**
 * Extract error message from unknown error value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return defaultMessage || String(error);
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an unknown error with context message
 * Returns a Result.err with contextualized error
 */
export function wrapError<T = never>(error: unknown, context: string): Result<T, Error> {
  const message = getErrorMessage(error);
  return err(new Error(`${context}: ${message}`));
}

/**
 * Exhaustiveness check for discriminated unions
 */
export function assertNever(value: never, message = 'Unexpected value'): never {
  throw new Error(`${message}: ${JSON.stringify(value)}`);
}
