/**
 * @liftwise/optional - Option type and lifting combinators
 */

// re-export everything for full access
export * from './array-utils.mjs';
export * from './capabilities.mjs';
export * from './composition.mjs';
export * from './do.mjs';
export * from './errors.mjs';
export * from './fold.mjs';
export * from './lift.mjs';
export * from './nullable.mjs';
export * from './operators.mjs';
export * from './option.mjs';
