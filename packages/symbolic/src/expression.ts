/**
 * Expression Tree
 *
 * Every expression is one of three node kinds:
 *
 * 1. Constant: a non-negative integer leaf
 * 2. Variable: a named leaf
 * 3. CompoundExpression: an operator with a left and a right child
 *
 * Leaves are immutable. A compound node keeps its operator for life, but
 * its child slots can be reassigned in place (see `commute` and
 * `replaceChild`), so the tree can be rewritten without being rebuilt.
 *
 * @example
 * ```typescript
 * const a = makeVariable("a");
 * const expr = add(a, 1);       // CompoundExpression
 * render(expr);                 // "(a + 1)"
 * ```
 */

import type { Operator } from "./types.js";

// ============================================================================
// AST Node Types
// ============================================================================

/**
 * A non-negative integer constant.
 */
export interface Constant {
  readonly kind: "constant";
  readonly value: number;
}

/**
 * A symbolic variable. Two variables with the same name are still
 * distinct nodes.
 */
export interface Variable {
  readonly kind: "variable";
  readonly name: string;
}

/**
 * A binary operation node. It exclusively owns both children.
 */
export interface CompoundExpression {
  readonly kind: "compound";
  readonly operator: Operator;
  left: Expression;
  right: Expression;
}

export type Expression = Constant | Variable | CompoundExpression;

/**
 * Anything an operator accepts: a raw integer literal or a node.
 */
export type Operand = number | Expression;

/**
 * What an operator returns: a raw integer when both operands were raw
 * integers, otherwise a new compound node.
 */
export type OperatorResult = number | CompoundExpression;

// ============================================================================
// Type Guards
// ============================================================================

export function isConstant(expr: Expression): expr is Constant {
  return expr.kind === "constant";
}

export function isVariable(expr: Expression): expr is Variable {
  return expr.kind === "variable";
}

export function isCompound(expr: Expression): expr is CompoundExpression {
  return expr.kind === "compound";
}

export function isExpression(operand: Operand): operand is Expression {
  return typeof operand !== "number";
}

/**
 * True for `A + B` and `A - B`.
 */
export function isAdditive(expr: CompoundExpression): boolean {
  return expr.operator === "add" || expr.operator === "sub";
}

/**
 * True for `A × B` and `A ÷ B`.
 */
export function isMultiplicative(expr: CompoundExpression): boolean {
  return expr.operator === "mul" || expr.operator === "div";
}

// ============================================================================
// Structural Queries
// ============================================================================

/**
 * Compare two trees by shape, operators, constant values and variable
 * names. Node identity is not considered.
 */
export function expressionsEqual(a: Expression, b: Expression): boolean {
  switch (a.kind) {
    case "constant":
      return b.kind === "constant" && a.value === b.value;
    case "variable":
      return b.kind === "variable" && a.name === b.name;
    case "compound":
      return (
        b.kind === "compound" &&
        a.operator === b.operator &&
        expressionsEqual(a.left, b.left) &&
        expressionsEqual(a.right, b.right)
      );
  }
}

/**
 * Whether `node` (by identity) occurs anywhere in `expr`, `expr` included.
 */
export function containsNode(expr: Expression, node: Expression): boolean {
  if (expr === node) return true;
  if (expr.kind !== "compound") return false;
  return containsNode(expr.left, node) || containsNode(expr.right, node);
}

export function nodeCount(expr: Expression): number {
  if (expr.kind !== "compound") return 1;
  return 1 + nodeCount(expr.left) + nodeCount(expr.right);
}

/**
 * Height of the tree; a leaf has depth 0.
 */
export function depth(expr: Expression): number {
  if (expr.kind !== "compound") return 0;
  return 1 + Math.max(depth(expr.left), depth(expr.right));
}
