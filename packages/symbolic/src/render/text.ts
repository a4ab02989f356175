/**
 * Plain Text Renderer
 *
 * Prints an expression fully parenthesized: every compound node is wrapped
 * in parentheses, with no precedence-based elision.
 *
 * @example
 * ```typescript
 * const x = makeVariable("x");
 * render(add(mul(2, x), 1)); // "((2 × x) + 1)"
 * ```
 */

import type { Expression } from "../expression.js";
import { OPERATOR_SYMBOLS } from "../types.js";

export function render(expr: Expression): string {
  switch (expr.kind) {
    case "constant":
      return String(expr.value);

    case "variable":
      return expr.name;

    case "compound":
      return `(${render(expr.left)} ${OPERATOR_SYMBOLS[expr.operator]} ${render(expr.right)})`;
  }
}
