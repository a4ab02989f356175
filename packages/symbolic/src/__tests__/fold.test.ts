import { describe, expect, it } from "vitest";
import { add, div, makeConstant, makeVariable, mul, sub } from "../builders.js";
import { DomainError } from "../errors.js";
import { applyOperator } from "../eval.js";
import { isCompound } from "../expression.js";
import { replaceChild } from "../mutation.js";
import { render } from "../render/text.js";
import { foldValue } from "../simplify/fold.js";

describe("applyOperator", () => {
  it("evaluates integer arithmetic", () => {
    expect(applyOperator("add", 2, 3)).toBe(5);
    expect(applyOperator("sub", 2, 3)).toBe(-1);
    expect(applyOperator("mul", 6, 7)).toBe(42);
    expect(applyOperator("div", 9, 4)).toBe(2);
    expect(applyOperator("div", -9, 4)).toBe(-3);
  });

  it("throws on division by zero", () => {
    expect(() => applyOperator("div", 1, 0)).toThrow(DomainError);
  });

  it("floors toward negative infinity", () => {
    expect(applyOperator("div", 7, -2)).toBe(-4);
    expect(applyOperator("div", -8, 4)).toBe(-2);
  });

  it("throws when the result leaves the safe integer range", () => {
    expect(() => applyOperator("mul", Number.MAX_SAFE_INTEGER, 3)).toThrow("integer overflow");
  });
});

describe("foldValue", () => {
  const two = () => makeConstant(2);

  it("folds two constants", () => {
    expect(foldValue(add(two(), 3))).toBe(5);
    expect(foldValue(mul(two(), 3))).toBe(6);
    expect(foldValue(div(makeConstant(7), 2))).toBe(3);
    expect(foldValue(sub(makeConstant(3), 3))).toBe(0);
  });

  it("does not fold a negative difference", () => {
    expect(foldValue(sub(two(), 3))).toBeUndefined();
  });

  it("does not fold division by a zero constant", () => {
    expect(foldValue(div(makeConstant(7), makeConstant(0)))).toBeUndefined();
  });

  it("does not fold past the safe integer range", () => {
    expect(foldValue(mul(makeConstant(Number.MAX_SAFE_INTEGER), makeConstant(3)))).toBeUndefined();
    expect(foldValue(add(makeConstant(Number.MAX_SAFE_INTEGER), 0))).toBe(Number.MAX_SAFE_INTEGER);
  });

  it("does not fold when a child is not a constant", () => {
    const x = makeVariable("x");
    expect(foldValue(add(x, 1))).toBeUndefined();
    expect(foldValue(add(add(two(), 1), 1))).toBeUndefined();
  });

  it("folds a subtree in place through replaceChild", () => {
    const expr = add(makeVariable("x"), mul(two(), 3));
    const inner = expr.right;
    if (!isCompound(inner)) throw new Error("expected a compound child");

    const value = foldValue(inner);
    expect(value).toBe(6);
    if (value !== undefined) replaceChild(expr, "right", makeConstant(value));
    expect(render(expr)).toBe("(x + 6)");
  });
});
