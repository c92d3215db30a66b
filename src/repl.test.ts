import { describe, it, expect } from "vitest";
import { isComplete, withTerminator, describeVariables } from "./repl.js";
import { Interpreter } from "./interpreter/interpreter.js";

describe("REPL helpers", () => {
  describe("isComplete", () => {
    it("should accept balanced input", () => {
      expect(isComplete("let x = 1;")).toBe(true);
      expect(isComplete("if x > 1 { print(x); };")).toBe(true);
      expect(isComplete("")).toBe(true);
    });

    it("should wait for open brackets", () => {
      expect(isComplete("if x > 1 {")).toBe(false);
      expect(isComplete("print(1,")).toBe(false);
    });

    it("should wait for open strings", () => {
      expect(isComplete('print("a')).toBe(false);
      expect(isComplete("print('{')")).toBe(true);
      expect(isComplete(`'it"s'`)).toBe(true);
    });

    it("should hand unbalanced closers to the parser", () => {
      expect(isComplete("}")).toBe(true);
    });
  });

  describe("withTerminator", () => {
    it("should add a missing semicolon", () => {
      expect(withTerminator("1 + 2")).toBe("1 + 2;");
      expect(withTerminator("if true { print(1); }\n")).toBe("if true { print(1); };");
    });

    it("should leave terminated input alone", () => {
      expect(withTerminator("x;  ")).toBe("x;");
    });
  });

  describe("describeVariables", () => {
    it("should list root bindings", () => {
      const interp = new Interpreter({ output: () => {} });
      interp.run('let a = 1; let b = "two"; if true { let c = 3; };');
      expect(describeVariables(interp)).toEqual(["a = 1", 'b = "two"']);
    });
  });
});
