import { describe, it, expect } from "vitest";
import { NameError, ValueTypeError, IndexRangeError, ScriptError, isScriptError } from "./errors.js";
import { newPosition } from "../token/token.js";

describe("script errors", () => {
  const here = newPosition(14, 2, 4, "demo.ks");

  it("should format the position into the message", () => {
    const err = new NameError("undefined variable 'x'", here);
    expect(err.message).toBe("undefined variable 'x' at line 3, column 5");
    expect(err.detail).toBe("undefined variable 'x'");
    expect(err.position).toBe(here);
  });

  it("should locate errors raised without a position", () => {
    const err = new ValueTypeError("bad operand");
    expect(err.message).toBe("bad operand");
    expect(err.locate(here)).toBe(err);
    expect(err.message).toBe("bad operand at line 3, column 5");
  });

  it("should keep the first position", () => {
    const err = new NameError("dup", here).locate(newPosition(0, 0, 0, "demo.ks"));
    expect(err.position?.line).toBe(2);
  });

  it("should expose kinds and names", () => {
    const err = new IndexRangeError("out of range");
    expect(err.kind).toBe("RangeError");
    expect(err.name).toBe("IndexRangeError");
    expect(new ValueTypeError("t").kind).toBe("TypeError");
    expect(err).toBeInstanceOf(ScriptError);
    expect(err).toBeInstanceOf(Error);
  });

  it("should narrow unknown values", () => {
    expect(isScriptError(new NameError("n"))).toBe(true);
    expect(isScriptError(new Error("plain"))).toBe(false);
    expect(isScriptError("text")).toBe(false);
  });
});
