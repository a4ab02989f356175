import { describe, expect, expectTypeOf, it } from "vitest";
import { add, combine, div, makeConstant, makeVariable, mul, sub } from "../builders.js";
import { DomainError } from "../errors.js";
import type { CompoundExpression, OperatorResult } from "../expression.js";
import { render } from "../render/text.js";

describe("operators", () => {
  const a = makeVariable("a");
  const x = makeVariable("x");

  describe("two raw integers", () => {
    it("evaluates without building a node", () => {
      expect(add(2, 3)).toBe(5);
      expect(sub(2, 3)).toBe(-1);
      expect(mul(4, 5)).toBe(20);
      expect(div(7, 2)).toBe(3);
    });

    it("floors division", () => {
      expect(div(sub(0, 7), 2)).toBe(-4);
      expect(div(7, -2)).toBe(-4);
      expect(div(6, 3)).toBe(2);
    });

    it("rejects division by zero", () => {
      expect(() => div(4, 0)).toThrow(DomainError);
      expect(() => div(4, 0)).toThrow("division by zero");
    });

    it("rejects literals that are not integers", () => {
      expect(() => add(1.5, 2)).toThrow("non-integer literal");
    });

    it("checks literals before the divisor", () => {
      expect(() => div(1.5, 0)).toThrow("non-integer literal");
    });

    it("computes exactly up to the safe integer limit", () => {
      expect(add(Number.MAX_SAFE_INTEGER - 1, 1)).toBe(Number.MAX_SAFE_INTEGER);
      expect(div(Number.MAX_SAFE_INTEGER, 3)).toBe(3002399751580330);
      expect(sub(Number.MIN_SAFE_INTEGER + 1, 1)).toBe(Number.MIN_SAFE_INTEGER);
    });

    it("rejects results beyond the safe integer range", () => {
      expect(() => mul(3 ** 17, 3 ** 17)).toThrow("integer overflow");
      expect(() => add(Number.MAX_SAFE_INTEGER, 2)).toThrow(DomainError);
      expect(() => sub(Number.MIN_SAFE_INTEGER, 1)).toThrow("integer overflow");
    });

    it("types the result as a number", () => {
      expectTypeOf(mul(1, 2)).toEqualTypeOf<number>();
    });
  });

  describe("one raw integer", () => {
    it("coerces the literal into a constant on its own side", () => {
      const right = add(a, 10);
      expect(right.left).toBe(a);
      expect(right.right).toEqual({ kind: "constant", value: 10 });
      expect(render(right)).toBe("(a + 10)");

      const left = sub(10, a);
      expect(left.left).toEqual({ kind: "constant", value: 10 });
      expect(left.right).toBe(a);
      expect(render(left)).toBe("(10 - a)");
    });

    it("validates the coerced constant", () => {
      expect(() => add(x, -1)).toThrow("negative constant");
      expect(() => mul(1.5, x)).toThrow("non-integer constant");
    });

    it("rejects a negative result of the literal path once it is coerced", () => {
      const negative = sub(1, 3);
      expect(negative).toBe(-2);
      expect(() => sub(x, negative)).toThrow("negative constant");
    });

    it("rejects a raw zero divisor immediately", () => {
      expect(() => div(x, 0)).toThrow("division by zero");
    });

    it("allows a raw zero dividend", () => {
      expect(render(div(0, x))).toBe("(0 ÷ x)");
    });

    it("types the result as a compound node", () => {
      expectTypeOf(add(a, 1)).toEqualTypeOf<CompoundExpression>();
      expectTypeOf(mul(2, a)).toEqualTypeOf<CompoundExpression>();
    });
  });

  describe("two nodes", () => {
    it("combines them in order", () => {
      const one = makeConstant(1);
      const expr = add(x, one);
      expect(expr).toEqual({ kind: "compound", operator: "add", left: x, right: one });
      expect(expr.left).toBe(x);
      expect(expr.right).toBe(one);
      expect(render(expr)).toBe("(x + 1)");
    });

    it("does not inspect an explicit zero divisor", () => {
      expect(render(div(x, makeConstant(0)))).toBe("(x ÷ 0)");
    });
  });

  describe("evaluation order", () => {
    it("keeps a chain that touches a node first", () => {
      expect(render(add(add(a, 1), 2))).toBe("((a + 1) + 2)");
    });

    it("collapses an all-literal sub-expression computed first", () => {
      expect(render(add(a, mul(1, 2)))).toBe("(a + 2)");
    });

    it("preserves the sub-expression when one side is a constant node", () => {
      expect(render(add(a, mul(makeConstant(1), 2)))).toBe("(a + (1 × 2))");
    });
  });

  describe("combine", () => {
    it("dispatches on a runtime operator", () => {
      const result: OperatorResult = combine("mul", 3, x);
      expect(typeof result).toBe("object");
      expect(combine("sub", 9, 4)).toBe(5);
    });
  });
});
