/**
 * @liftwise/examples - consumers of @liftwise/optional
 */

export * from "./config.mjs";
export * from "./demo.mjs";
export * from "./heap.mjs";
export * from "./roots.mjs";
