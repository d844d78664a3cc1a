import type { Id } from '../types.js';

/**
 * Hands out increasing integer identifiers, starting at 1 unless told otherwise.
 *
 * Unique within one process run only. The increment is not atomic; mutating
 * calls are expected to be serialized by whoever owns the allocator.
 */
export class IdentifierAllocator {
  private nextId: Id;

  constructor(start: Id = 1) {
    if (!Number.isSafeInteger(start) || start < 1) {
      throw new RangeError(`Identifier start must be a positive integer, received: ${start}`);
    }
    this.nextId = start;
  }

  next(): Id {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  /** The identifier the next call to `next()` will return. */
  peek(): Id {
    return this.nextId;
  }
}

/**
 * Process-wide allocator used when an entity is not given one. Single writer.
 */
export const defaultIdentifierAllocator = new IdentifierAllocator();
