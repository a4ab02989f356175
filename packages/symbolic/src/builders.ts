/**
 * Expression Builders
 *
 * Factory functions for leaves, and the four binary operators. Every
 * operator accepts raw integers as well as nodes:
 *
 * - `(number, number)`: plain integer arithmetic, no node is built
 * - one raw integer: it becomes a fresh Constant on its own side
 * - two nodes: combined directly
 *
 * @example
 * ```typescript
 * const a = makeVariable("a");
 * render(add(a, mul(1, 2)));               // "(a + 2)"
 * render(add(a, mul(makeConstant(1), 2))); // "(a + (1 × 2))"
 * ```
 */

import { config, createLogger } from "@simplecas/core";
import { DomainError } from "./errors.js";
import { applyOperator } from "./eval.js";
import type {
  CompoundExpression,
  Constant,
  Expression,
  Operand,
  OperatorResult,
  Variable,
} from "./expression.js";
import { OPERATOR_SYMBOLS, type Operator } from "./types.js";

const log = createLogger("symbolic");

function reject(error: DomainError): never {
  log.debug(`rejected: ${error.message}`);
  throw error;
}

// ============================================================================
// Constants and Variables
// ============================================================================

/**
 * Create a constant.
 *
 * @throws DomainError if `value` is not a non-negative safe integer
 */
export function makeConstant(value: number): Constant {
  if (!Number.isSafeInteger(value)) {
    reject(new DomainError("non-integer constant"));
  }
  if (value < 0) {
    reject(new DomainError("negative constant"));
  }
  return { kind: "constant", value };
}

/**
 * Create a variable. The name is stored verbatim.
 *
 * @throws DomainError if `name` is empty, or is not a single ASCII letter
 *   while `symbolic.singleLetterVariables` is on
 */
export function makeVariable(name: string): Variable {
  if (name.length === 0) {
    reject(new DomainError("empty variable name"));
  }
  if (config.get("symbolic").singleLetterVariables && !/^[A-Za-z]$/.test(name)) {
    reject(
      new DomainError("invalid variable name", "variable name must be a single ASCII letter"),
    );
  }
  return { kind: "variable", name };
}

// ============================================================================
// Coercion
// ============================================================================

function toExpr(operand: Operand): Expression {
  return typeof operand === "number" ? makeConstant(operand) : operand;
}

function checkLiteral(value: number): number {
  if (!Number.isSafeInteger(value)) {
    reject(new DomainError("non-integer literal"));
  }
  return value;
}

/**
 * Apply `operator` to two operands.
 *
 * Two raw integers are evaluated immediately and the result stays a raw
 * integer; the arithmetic is exact and a result outside the safe integer
 * range is rejected. Otherwise a new compound node is built, keeping each operand on
 * its side. A raw `0` divisor is rejected on both paths.
 */
export function combine(operator: Operator, left: Operand, right: Operand): OperatorResult {
  if (typeof left === "number" && typeof right === "number") {
    try {
      return applyOperator(operator, checkLiteral(left), checkLiteral(right));
    } catch (error) {
      if (error instanceof DomainError) reject(error);
      throw error;
    }
  }

  if (operator === "div" && right === 0) {
    reject(new DomainError("division by zero"));
  }

  const node: CompoundExpression = {
    kind: "compound",
    operator,
    left: toExpr(left),
    right: toExpr(right),
  };
  log.debug(`built compound node ${OPERATOR_SYMBOLS[operator]}`);
  return node;
}

// ============================================================================
// Binary Operations
// ============================================================================

/**
 * Addition: a + b
 */
export function add(left: number, right: number): number;
export function add(left: Expression, right: Operand): CompoundExpression;
export function add(left: Operand, right: Expression): CompoundExpression;
export function add(left: Operand, right: Operand): OperatorResult;
export function add(left: Operand, right: Operand): OperatorResult {
  return combine("add", left, right);
}

/**
 * Subtraction: a - b
 *
 * Two raw integers may produce a negative raw integer; it is only rejected
 * if it later becomes a Constant.
 */
export function sub(left: number, right: number): number;
export function sub(left: Expression, right: Operand): CompoundExpression;
export function sub(left: Operand, right: Expression): CompoundExpression;
export function sub(left: Operand, right: Operand): OperatorResult;
export function sub(left: Operand, right: Operand): OperatorResult {
  return combine("sub", left, right);
}

/**
 * Multiplication: a × b
 */
export function mul(left: number, right: number): number;
export function mul(left: Expression, right: Operand): CompoundExpression;
export function mul(left: Operand, right: Expression): CompoundExpression;
export function mul(left: Operand, right: Operand): OperatorResult;
export function mul(left: Operand, right: Operand): OperatorResult {
  return combine("mul", left, right);
}

/**
 * Division: a ÷ b
 *
 * Raw integers use floor division.
 */
export function div(left: number, right: number): number;
export function div(left: Expression, right: Operand): CompoundExpression;
export function div(left: Operand, right: Expression): CompoundExpression;
export function div(left: Operand, right: Operand): OperatorResult;
export function div(left: Operand, right: Operand): OperatorResult {
  return combine("div", left, right);
}
