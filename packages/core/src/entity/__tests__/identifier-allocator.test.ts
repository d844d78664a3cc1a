import { describe, expect, it } from 'vitest';

import { IdentifierAllocator, defaultIdentifierAllocator } from '../identifier-allocator.js';

describe('IdentifierAllocator', () => {
  it('should start at 1 and increase by one', () => {
    const ids = new IdentifierAllocator();

    expect(ids.next()).toBe(1);
    expect(ids.next()).toBe(2);
    expect(ids.next()).toBe(3);
  });

  it('should honour a custom start', () => {
    const ids = new IdentifierAllocator(100);

    expect(ids.peek()).toBe(100);
    expect(ids.next()).toBe(100);
    expect(ids.peek()).toBe(101);
  });

  it('should not advance on peek', () => {
    const ids = new IdentifierAllocator();

    ids.peek();
    ids.peek();

    expect(ids.next()).toBe(1);
  });

  it('should reject a start below 1', () => {
    expect(() => new IdentifierAllocator(0)).toThrow(RangeError);
    expect(() => new IdentifierAllocator(2.5)).toThrow('Identifier start must be a positive integer, received: 2.5');
  });

  it('should keep separate allocators independent', () => {
    const a = new IdentifierAllocator();
    const b = new IdentifierAllocator();

    a.next();
    a.next();

    expect(b.next()).toBe(1);
  });

  it('should expose a monotonic process-wide default', () => {
    const first = defaultIdentifierAllocator.next();
    const second = defaultIdentifierAllocator.next();

    expect(second).toBe(first + 1);
  });
});
