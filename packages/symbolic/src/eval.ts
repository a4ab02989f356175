/**
 * Integer Arithmetic
 *
 * The single place where operators are evaluated on plain integers. Used by
 * the all-literal path of the builders and by constant folding.
 */

import { DomainError } from "./errors.js";
import type { Operator } from "./types.js";

const MAX = BigInt(Number.MAX_SAFE_INTEGER);
const MIN = BigInt(Number.MIN_SAFE_INTEGER);

function floorDiv(a: bigint, b: bigint): bigint {
  const quotient = a / b;
  // bigint division truncates toward zero
  return a % b !== 0n && a < 0n !== b < 0n ? quotient - 1n : quotient;
}

function exact(operator: Operator, a: bigint, b: bigint): bigint {
  switch (operator) {
    case "add":
      return a + b;
    case "sub":
      return a - b;
    case "mul":
      return a * b;
    case "div":
      return floorDiv(a, b);
  }
}

/**
 * Evaluate `a op b` on safe integers. Division floors. The arithmetic is
 * exact; a result outside the safe integer range is rejected.
 *
 * @throws DomainError on division by zero or integer overflow
 */
export function applyOperator(operator: Operator, a: number, b: number): number {
  if (operator === "div" && b === 0) {
    throw new DomainError("division by zero");
  }
  const result = exact(operator, BigInt(a), BigInt(b));
  if (result > MAX || result < MIN) {
    throw new DomainError("integer overflow");
  }
  return Number(result);
}
