import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Interpreter } from "../interpreter/interpreter.js";
import { byteSubstring, parseDecimal } from "./builtins.js";
import { NULL, TRUE, FALSE, ValueType } from "../object/object.js";
import { IndexRangeError } from "../errors/errors.js";
import type { InterpreterConfig } from "../config.js";

function setup(config: InterpreterConfig = {}): { interp: Interpreter; lines: string[] } {
  const lines: string[] = [];
  const interp = new Interpreter({ output: (line) => lines.push(line), ...config });
  return { interp, lines };
}

describe("builtins", () => {
  it("should register the standard set", () => {
    expect(setup().interp.functions.names()).toEqual([
      "print",
      "read",
      "random",
      "toNumber",
      "toString",
      "substring",
      "writeFile",
      "readFile",
      "deleteFile",
      "exists",
    ]);
  });

  describe("print", () => {
    it("should write display forms", () => {
      const { interp, lines } = setup();
      const result = interp.run('print(1.5); print("raw text"); print(2 > 1); print(print(0));');
      expect(lines).toEqual(["1.5", "raw text", "true", "0", "null"]);
      expect(result).toBe(NULL);
    });
  });

  describe("read", () => {
    it("should return input lines without terminators", () => {
      const queue: (string | null)[] = ["first\r", "second\n", null];
      const { interp } = setup({ input: () => queue.shift() ?? null });
      expect(interp.run("read();").inspect()).toBe('"first"');
      expect(interp.run("read();").inspect()).toBe('"second"');
      expect(interp.run("read();").inspect()).toBe('""');
    });

    it("should feed scripts", () => {
      const { interp, lines } = setup({ input: () => "21" });
      interp.run('let n = toNumber(read()); print("double: " + n * 2);');
      expect(lines).toEqual(["double: 42"]);
    });
  });

  describe("random", () => {
    it("should use the configured source", () => {
      const { interp } = setup({ random: () => 0.25 });
      expect(interp.run("random() * 4;").inspect()).toBe("1");
    });

    it("should default to a value in [0, 1)", () => {
      const value = setup().interp.run("random();");
      expect(value.type).toBe(ValueType.Number);
      if (value.type === ValueType.Number) {
        expect(value.value).toBeGreaterThanOrEqual(0);
        expect(value.value).toBeLessThan(1);
      }
    });
  });

  describe("toNumber", () => {
    it("should parse decimal literals", () => {
      const { interp } = setup();
      expect(interp.run('toNumber("3.5");').inspect()).toBe("3.5");
      expect(interp.run('toNumber("abc");')).toBe(NULL);
    });

    it("should accept signs, fractions and exponents", () => {
      expect(parseDecimal("-1e3")).toBe(-1000);
      expect(parseDecimal("+2.5E-1")).toBe(0.25);
      expect(parseDecimal(".5")).toBe(0.5);
      expect(parseDecimal("1.")).toBe(1);
      expect(parseDecimal("007")).toBe(7);
    });

    it("should reject everything else", () => {
      expect(parseDecimal("")).toBeNull();
      expect(parseDecimal(" 1")).toBeNull();
      expect(parseDecimal("1e")).toBeNull();
      expect(parseDecimal("0x10")).toBeNull();
      expect(parseDecimal("Infinity")).toBeNull();
      expect(parseDecimal(".")).toBeNull();
    });
  });

  describe("toString", () => {
    it("should format numbers", () => {
      const { interp } = setup();
      expect(interp.run("toString(2.5);").inspect()).toBe('"2.5"');
      expect(interp.run("toString(10 / 4) + \"!\";").inspect()).toBe('"2.5!"');
      expect(interp.run("toString(-3);").inspect()).toBe('"-3"');
    });

    it("should keep the sign of negative zero", () => {
      const { interp } = setup();
      expect(interp.run("toString(-0);").inspect()).toBe('"-0"');
      expect(interp.run("toString(0 * -1) + \"|\";").inspect()).toBe('"-0|"');
      expect(interp.run("toString(0);").inspect()).toBe('"0"');
    });
  });

  describe("substring", () => {
    it("should take inclusive ranges", () => {
      const { interp } = setup();
      expect(interp.run('substring("hello", 1, 3);').inspect()).toBe('"ell"');
      expect(interp.run('substring("hello", 0, 4);').inspect()).toBe('"hello"');
      expect(interp.run('substring("hello", 2, 1);').inspect()).toBe('""');
    });

    it("should index by UTF-8 bytes", () => {
      expect(byteSubstring("héllo", 0, 2)).toBe("hé");
      expect(byteSubstring("héllo", 3, 5)).toBe("llo");
    });

    it("should allow an empty range at the end", () => {
      expect(byteSubstring("abc", 3, 2)).toBe("");
    });

    it("should reject out-of-range indices", () => {
      expect(() => byteSubstring("hello", 0, 5)).toThrow(IndexRangeError);
      expect(() => byteSubstring("hello", 0, 5)).toThrow("substring() range 0..5 is out of bounds for length 5");
      expect(() => byteSubstring("hello", 3, 1)).toThrow("substring() range 3..1 is out of bounds for length 5");
      expect(() => setup().interp.run('substring("hello", -1, 2);')).toThrow(
        "substring() range -1..2 is out of bounds for length 5 at line 1, column 1"
      );
    });

    it("should reject fractional indices", () => {
      expect(() => byteSubstring("hello", 1.5, 2)).toThrow("substring() indices must be integers, got 1.5 and 2");
    });

    it("should carry the RangeError kind", () => {
      const result = setup().interp.tryRun('substring("ab", 0, 9);');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("RangeError");
      }
    });
  });

  describe("files", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "kestrel-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should write then read a file", () => {
      const { interp } = setup({ cwd: dir });
      const result = interp.run('writeFile("t.txt", "hi"); readFile("t.txt");');
      expect(result.inspect()).toBe('"hi"');
      expect(fs.readFileSync(path.join(dir, "t.txt"), "utf8")).toBe("hi");
    });

    it("should report existence and deletion", () => {
      const { interp } = setup({ cwd: dir });
      expect(interp.run('exists("a.txt");')).toBe(FALSE);
      expect(interp.run('writeFile("a.txt", "x");')).toBe(TRUE);
      expect(interp.run('exists("a.txt");')).toBe(TRUE);
      expect(interp.run('deleteFile("a.txt");')).toBe(TRUE);
      expect(interp.run('exists("a.txt");')).toBe(FALSE);
      expect(interp.run('deleteFile("a.txt");')).toBe(FALSE);
    });

    it("should return null for unreadable files", () => {
      const { interp } = setup({ cwd: dir });
      expect(interp.run('readFile("missing.txt");')).toBe(NULL);
    });

    it("should fail to write into a missing directory", () => {
      const { interp } = setup({ cwd: dir });
      expect(interp.run('writeFile("no/such/dir.txt", "x");')).toBe(FALSE);
    });

    it("should resolve absolute paths as given", () => {
      const target = path.join(dir, "abs.txt");
      fs.writeFileSync(target, "absolute");
      const { interp } = setup({ cwd: os.tmpdir() });
      expect(interp.run(`readFile("${target}");`).inspect()).toBe('"absolute"');
    });
  });
});
