import { describe, expect, it, vi } from 'vitest';

import { ValidationError } from '../../errors/domain-errors.js';
import { Rule } from '../rule.js';

describe('Rule', () => {
  const positive = Rule.create<number>(
    2000,
    (n) => n > 0,
    (n) => `Expected a positive number, received ${n}`
  );

  it('should accept a value that satisfies the predicate', () => {
    const result = positive.apply(3);

    expect(result.isOk()).toBe(true);
  });

  it('should reject with the rule code and a message built from the value', () => {
    const result = positive.apply(-2);

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe(2000);
    expect(error.reason).toBe('Expected a positive number, received -2');
    expect(error.message).toBe('02000: Expected a positive number, received -2');
  });

  it('should only build the message on failure', () => {
    const message = vi.fn((s: string) => `bad: ${s}`);
    const rule = Rule.create<string>(1, (s) => s !== 'x', message);

    rule.apply('ok');
    expect(message).not.toHaveBeenCalled();

    rule.apply('x');
    expect(message).toHaveBeenCalledWith('x');
  });

  it('should give the same verdict for the same value', () => {
    expect(positive.apply(0).isErr()).toBe(true);
    expect(positive.apply(0).isErr()).toBe(true);
    expect(positive.test(1)).toBe(true);
    expect(positive.test(0)).toBe(false);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(positive)).toBe(true);
    expect(positive.code).toBe(2000);
  });

  it('should refuse negative or fractional codes', () => {
    expect(() => Rule.create<string>(-1, () => true, () => '')).toThrow(RangeError);
    expect(() => Rule.create<string>(1.5, () => true, () => '')).toThrow(
      'Rule code must be a non-negative integer, received: 1.5'
    );
  });
});
