import type { Predicate } from './rule.js';
import { type ScalarBuilder, ValidatedScalar } from './validated-scalar.js';

export function stringScalar(): ScalarBuilder<string> {
  return ValidatedScalar.builder<string>();
}

export function nonEmpty(): Predicate<string> {
  return (value) => value.length > 0;
}

/**
 * Inclusive length bounds, counted in UTF-16 code units.
 */
export function lengthRange(min: number, max: number): Predicate<string> {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min < 0 || min > max) {
    throw new RangeError(`Invalid length range: ${min}..${max}`);
  }
  return (value) => value.length >= min && value.length <= max;
}

export function matches(pattern: RegExp): Predicate<string> {
  // Stateless copy: a global or sticky regex would carry lastIndex between calls
  const stateless = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return (value) => stateless.test(value);
}
