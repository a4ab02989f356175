/**
 * @simplecas/symbolic
 *
 * Symbolic arithmetic expressions as explicit trees.
 *
 * @example
 * ```typescript
 * import { makeVariable, add, mul, commute, render } from "@simplecas/symbolic";
 *
 * const x = makeVariable("x");
 * const expr = add(mul(2, x), 1);
 *
 * render(expr);   // "((2 × x) + 1)"
 * commute(expr);
 * render(expr);   // "(1 + (2 × x))"
 * ```
 */

// Core types
export * from "./types.js";
export * from "./expression.js";
export * from "./errors.js";

// Builders
export * from "./builders.js";

// Rendering
export * from "./render/text.js";

// Rewrites
export { commute } from "./mutation.js";

// Evaluation
export * from "./eval.js";

// Folding
export * from "./simplify/fold.js";
