export type { ErrorMessage, Id, Name } from './types.js';

// Errors
export * from './errors/index.js';

// Validated scalars
export { Rule, type MessageFn, type Predicate } from './scalar/rule.js';
export { ScalarBuilder, ValidatedScalar, type ScalarConfig } from './scalar/validated-scalar.js';
export { lengthRange, matches, nonEmpty, stringScalar } from './scalar/string-rules.js';
export { identity, normalizeSpace, type Normalizer } from './normalize/normalizers.js';

// Entities
export type { Entity } from './entity/entity.js';
export { IdentifierAllocator, defaultIdentifierAllocator } from './entity/identifier-allocator.js';
