import { describe, it, expect } from "vitest";
import { applyInfix, applyPrefix } from "./operators.js";
import { NumberValue, StringValue, TRUE, FALSE, NULL, type RuntimeValue } from "../object/object.js";
import { ArithmeticError, ValueTypeError } from "../errors/errors.js";

const MAX = 1000;
const num = (n: number): NumberValue => new NumberValue(n);
const str = (s: string): StringValue => new StringValue(s);

function show(value: RuntimeValue): string {
  return value.inspect();
}

describe("operators", () => {
  describe("numbers", () => {
    it("should do arithmetic", () => {
      expect(show(applyInfix("+", num(2), num(3), MAX))).toBe("5");
      expect(show(applyInfix("-", num(2), num(3), MAX))).toBe("-1");
      expect(show(applyInfix("*", num(2), num(3), MAX))).toBe("6");
      expect(show(applyInfix("/", num(3), num(2), MAX))).toBe("1.5");
      expect(show(applyInfix("^", num(2), num(10), MAX))).toBe("1024");
      expect(show(applyInfix("^", num(4), num(0.5), MAX))).toBe("2");
    });

    it("should compare", () => {
      expect(applyInfix(">", num(2), num(1), MAX)).toBe(TRUE);
      expect(applyInfix("<", num(2), num(1), MAX)).toBe(FALSE);
      expect(applyInfix("<", num(1), num(1), MAX)).toBe(FALSE);
    });

    it("should reject division by exactly zero", () => {
      expect(() => applyInfix("/", num(1), num(0), MAX)).toThrow(ArithmeticError);
      expect(() => applyInfix("/", num(1), num(-0), MAX)).toThrow("division by zero");
      expect(show(applyInfix("/", num(1), num(1e-300), MAX))).toBe("1e+300");
    });
  });

  describe("strings", () => {
    it("should concatenate", () => {
      expect(show(applyInfix("+", str("ab"), str("cd"), MAX))).toBe('"abcd"');
      expect(show(applyInfix("+", str("n="), num(1.5), MAX))).toBe('"n=1.5"');
      expect(show(applyInfix("+", num(7), str("x"), MAX))).toBe('"7x"');
    });

    it("should repeat in either order", () => {
      expect(show(applyInfix("*", str("ab"), num(3), MAX))).toBe('"ababab"');
      expect(show(applyInfix("*", num(2), str("xy"), MAX))).toBe('"xyxy"');
      expect(show(applyInfix("*", str("ab"), num(2.9), MAX))).toBe('"abab"');
      expect(show(applyInfix("*", str("ab"), num(0), MAX))).toBe('""');
    });

    it("should reject bad repeat counts", () => {
      expect(() => applyInfix("*", str("ab"), num(-1), MAX)).toThrow(
        "string repeat count must be a non-negative finite number, got -1"
      );
      expect(() => applyInfix("*", str("ab"), num(Infinity), MAX)).toThrow(ValueTypeError);
      expect(() => applyInfix("*", str("ab"), num(NaN), MAX)).toThrow(ValueTypeError);
    });

    it("should bound the repeat result", () => {
      expect(() => applyInfix("*", str("ab"), num(3), 5)).toThrow("string repeat result exceeds 5 characters");
      expect(show(applyInfix("*", str("ab"), num(3), 6))).toBe('"ababab"');
    });
  });

  describe("unsupported pairs", () => {
    it("should name both operand types", () => {
      expect(() => applyInfix("-", str("a"), str("b"), MAX)).toThrow(
        "unsupported operand types for -: String and String"
      );
      expect(() => applyInfix("+", TRUE, num(1), MAX)).toThrow("unsupported operand types for +: Bool and Number");
      expect(() => applyInfix("*", str("a"), str("b"), MAX)).toThrow(ValueTypeError);
      expect(() => applyInfix(">", str("a"), str("b"), MAX)).toThrow(ValueTypeError);
      expect(() => applyInfix("/", NULL, num(1), MAX)).toThrow("unsupported operand types for /: Null and Number");
    });
  });

  describe("signs", () => {
    it("should negate numbers", () => {
      expect(show(applyPrefix("-", num(5), MAX))).toBe("-5");
      expect(show(applyPrefix("+", num(5), MAX))).toBe("5");
    });

    it("should follow the repeat rules for strings", () => {
      expect(show(applyPrefix("+", str("ab"), MAX))).toBe('"ab"');
      expect(() => applyPrefix("-", str("ab"), MAX)).toThrow(
        "string repeat count must be a non-negative finite number, got -1"
      );
    });

    it("should reject booleans", () => {
      expect(() => applyPrefix("-", TRUE, MAX)).toThrow("unsupported operand types for *: Bool and Number");
    });
  });
});
