import { type Result, err, ok } from 'neverthrow';

import type { ValidationError } from '../errors/domain-errors.js';
import { identity, type Normalizer } from '../normalize/normalizers.js';

import { type MessageFn, type Predicate, Rule } from './rule.js';

/**
 * Fixed configuration of a scalar: one normalizer and rules in evaluation order.
 */
export interface ScalarConfig<T> {
  readonly normalize: Normalizer<T>;
  readonly rules: readonly Rule<T>[];
}

/**
 * Collects the normalizer and rules for a scalar, then builds it.
 *
 * Each built scalar takes its own snapshot of the configuration, so
 * changing the builder afterwards never touches scalars already built.
 */
export class ScalarBuilder<T> {
  private normalizer: Normalizer<T> = identity;
  private readonly rules: Rule<T>[] = [];

  /** Sets the normalizer; the last call wins. */
  normalizeWith(normalize: Normalizer<T>): this {
    this.normalizer = normalize;
    return this;
  }

  /** Appends a rule. Rules run in the order they are added. */
  rule(code: number, predicate: Predicate<T>, message: MessageFn<T>): this {
    this.rules.push(Rule.create(code, predicate, message));
    return this;
  }

  build(initialValue: T): Result<ValidatedScalar<T>, ValidationError> {
    return ValidatedScalar.fromConfig(initialValue, {
      normalize: this.normalizer,
      rules: this.rules,
    });
  }
}

function normalizeAndValidate<T>(raw: T, config: ScalarConfig<T>): Result<T, ValidationError> {
  const value = config.normalize(raw);
  for (const rule of config.rules) {
    const outcome = rule.apply(value);
    if (outcome.isErr()) {
      return err(outcome.error);
    }
  }
  return ok(value);
}

/**
 * A typed value holder that is always normalized and always satisfies its rules.
 *
 * Every write, construction included, normalizes once and then runs every rule
 * in registration order, stopping at the first failure. A rejected write leaves
 * the stored value untouched. Reads never re-validate.
 *
 * Not synchronized: callers serialize writes.
 */
export class ValidatedScalar<T> {
  static builder<T>(): ScalarBuilder<T> {
    return new ScalarBuilder<T>();
  }

  /**
   * Configures a builder through a callback and builds in one step.
   *
   * @example
   * ```typescript
   * const name = ValidatedScalar.of<string>('  ACME  ', (b) => {
   *   b.normalizeWith((s) => s.trim()).rule(1000, (s) => s.length > 0, () => 'Name cannot be blank');
   * });
   * ```
   */
  static of<T>(initialValue: T, configure: (builder: ScalarBuilder<T>) => void): Result<ValidatedScalar<T>, ValidationError> {
    const builder = ValidatedScalar.builder<T>();
    configure(builder);
    return builder.build(initialValue);
  }

  static fromConfig<T>(initialValue: T, config: ScalarConfig<T>): Result<ValidatedScalar<T>, ValidationError> {
    const fixed: ScalarConfig<T> = { normalize: config.normalize, rules: Object.freeze([...config.rules]) };
    return normalizeAndValidate(initialValue, fixed).map((value) => new ValidatedScalar(value, fixed));
  }

  private constructor(
    private current: T,
    private readonly config: ScalarConfig<T>
  ) {}

  get value(): T {
    return this.current;
  }

  get ruleCodes(): readonly number[] {
    return this.config.rules.map((rule) => rule.code);
  }

  get(): T {
    return this.current;
  }

  /**
   * Normalizes and validates a candidate without storing it.
   */
  check(candidate: T): Result<T, ValidationError> {
    return normalizeAndValidate(candidate, this.config);
  }

  /**
   * Stores the normalized value if every rule accepts it.
   * @returns the value now stored
   */
  set(newValue: T): Result<T, ValidationError> {
    return this.check(newValue).map((value) => {
      this.current = value;
      return value;
    });
  }

  /**
   * Validated write that reports what it replaced.
   * @returns the previous value
   */
  replace(newValue: T): Result<T, ValidationError> {
    const previous = this.current;
    return this.set(newValue).map(() => previous);
  }
}
