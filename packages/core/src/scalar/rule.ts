import { type Result, err, ok } from 'neverthrow';

import { ValidationError } from '../errors/domain-errors.js';
import type { ErrorMessage } from '../types.js';

export type Predicate<T> = (value: T) => boolean;
export type MessageFn<T> = (rejected: T) => ErrorMessage;

/**
 * A single coded validation check.
 *
 * Predicates must be pure: the same value always gets the same verdict.
 * Instances are frozen on creation.
 */
export class Rule<T> {
  static create<T>(code: number, predicate: Predicate<T>, message: MessageFn<T>): Rule<T> {
    if (!Number.isSafeInteger(code) || code < 0) {
      throw new RangeError(`Rule code must be a non-negative integer, received: ${code}`);
    }
    return new Rule(code, predicate, message);
  }

  private constructor(
    readonly code: number,
    private readonly predicate: Predicate<T>,
    private readonly message: MessageFn<T>
  ) {
    Object.freeze(this);
  }

  test(value: T): boolean {
    return this.predicate(value);
  }

  apply(value: T): Result<void, ValidationError> {
    if (this.predicate(value)) {
      return ok();
    }
    return err(new ValidationError(this.code, this.message(value), value));
  }
}
