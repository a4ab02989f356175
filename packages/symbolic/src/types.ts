/**
 * Binary operators supported in the expression tree.
 */
export type Operator = "add" | "sub" | "mul" | "div";

/**
 * Symbols used when printing an operator.
 */
export type OperatorSymbol = "+" | "-" | "×" | "÷";

export const OPERATOR_SYMBOLS: Readonly<Record<Operator, OperatorSymbol>> = {
  add: "+",
  sub: "-",
  mul: "×",
  div: "÷",
};

/**
 * A slot of a compound node that can hold a child.
 */
export type Side = "left" | "right";
