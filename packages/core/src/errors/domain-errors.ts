/**
 * Base class for all domain errors.
 *
 * Domain operations never throw for a rejected value; they return
 * Result<T, DomainError> and leave the choice to throw to the caller.
 */
export abstract class DomainError extends Error {
  public readonly code: number;
  public readonly details: Record<string, unknown> | undefined;

  constructor(message: string, code: number, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where error was created (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      code: this.code,
      details: this.details,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Renders an error code as five zero-padded digits, e.g. 1001 -> "01001".
 */
export function formatErrorCode(code: number): string {
  return String(code).padStart(5, '0');
}

/**
 * Raised when a value fails a validation rule during construction or a write.
 *
 * `code` identifies the violated rule and is stable for lookups; `reason` is
 * free text and may quote the rejected value.
 */
export class ValidationError extends DomainError {
  public readonly reason: string;

  constructor(code: number, reason: string, value?: unknown) {
    super(`${formatErrorCode(code)}: ${reason}`, code, { reason, value });
    this.reason = reason;
  }
}
