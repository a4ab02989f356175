/**
 * Constant Folding
 *
 * Computes the value a `Constant op Constant` node would fold to. Nothing
 * here rewrites the tree; a caller folds a node by installing
 * `makeConstant(value)` with `replaceChild`.
 */

import type { CompoundExpression } from "../expression.js";
import { DomainError } from "../errors.js";
import { applyOperator } from "../eval.js";

/**
 * The folded value of `node`, or `undefined` when it cannot fold: a child is
 * not a Constant, the divisor is zero, or the result would be negative or
 * beyond the safe integer range.
 */
export function foldValue(node: CompoundExpression): number | undefined {
  const { left, right } = node;
  if (left.kind !== "constant" || right.kind !== "constant") {
    return undefined;
  }
  try {
    const value = applyOperator(node.operator, left.value, right.value);
    return value >= 0 ? value : undefined;
  } catch (error) {
    if (error instanceof DomainError) return undefined;
    throw error;
  }
}
