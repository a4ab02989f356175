/**
 * In-place Rewrites
 *
 * Compound nodes own their children through two slots. These functions
 * reassign the slots of a single node; they never rebuild the tree.
 */

import { createLogger } from "@simplecas/core";
import { CapabilityError } from "./errors.js";
import { containsNode, type CompoundExpression, type Expression } from "./expression.js";
import type { Side } from "./types.js";

const log = createLogger("symbolic");

function assertCompound(
  node: Expression,
  operation: string,
): asserts node is CompoundExpression {
  if (node.kind !== "compound") {
    throw new CapabilityError(`${operation} is not defined on a ${node.kind} node`);
  }
}

/**
 * Transform `A op B` into `B op A` by swapping the two children of `node`.
 *
 * Only the receiver changes; descendants keep their own order. The operator
 * is not checked for commutativity, so `commute` on `a - b` yields `b - a`.
 *
 * @example
 * ```typescript
 * const expr = add(mul(2, x), z);   // ((2 × x) + z)
 * commute(expr);                     // (z + (2 × x))
 * ```
 */
export function commute(node: CompoundExpression): void {
  assertCompound(node, "commute");
  const { left, right } = node;
  node.left = right;
  node.right = left;
  log.debug("commuted compound node");
}

/**
 * Put `replacement` into the `side` slot of `parent` and return the child
 * it displaced. This is the hook for rewrites that swap a subtree for a
 * different node, such as specializing a variable into a constant.
 *
 * @throws CapabilityError if `replacement` is `parent` or contains it, or
 *   already sits somewhere under `parent`
 */
export function replaceChild(
  parent: CompoundExpression,
  side: Side,
  replacement: Expression,
): Expression {
  assertCompound(parent, "replaceChild");
  if (containsNode(replacement, parent)) {
    throw new CapabilityError("replacement would create a cycle");
  }
  if (containsNode(parent, replacement)) {
    throw new CapabilityError("replacement already belongs to this tree");
  }
  const displaced = parent[side];
  parent[side] = replacement;
  log.debug(`replaced ${side} child`);
  return displaced;
}
