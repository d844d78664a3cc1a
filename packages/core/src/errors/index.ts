export * from './domain-errors.js';
export * from './result.js';
