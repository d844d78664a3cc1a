import { type Result, err, ok } from 'neverthrow';

import { DomainError } from './domain-errors.js';

/**
 * Runs code that signals domain failures by throwing and captures them as a Result.
 * Anything thrown that is not a DomainError is a bug and propagates.
 */
export function domainCatch<T>(block: () => T): Result<T, DomainError> {
  try {
    return ok(block());
  } catch (error) {
    if (error instanceof DomainError) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Unwraps a Result at an edge that prefers exceptions.
 * @throws the contained error
 */
export function unwrapOrThrow<T, E extends Error>(result: Result<T, E>): T {
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}
