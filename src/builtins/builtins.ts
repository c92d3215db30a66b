/**
 * Built-in functions for Kestrel.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { NULL, TRUE, FALSE, toBool, formatNumber, NumberValue, StringValue, type RuntimeValue } from "../object/object.js";
import { IndexRangeError } from "../errors/errors.js";
import { FunctionRegistry, ParamKind, type Arguments, type NativeFunction } from "./registry.js";
import type { ResolvedConfig } from "../config.js";

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Define a function that takes exactly one argument per declared kind.
 */
function fixed(name: string, params: ParamKind[], call: (args: Arguments) => RuntimeValue): NativeFunction {
  return { name, arity: { kind: "exact", count: params.length }, params, call };
}

/**
 * Parse a decimal literal with optional sign, fraction and exponent.
 */
export function parseDecimal(text: string): number | null {
  if (!DECIMAL_LITERAL.test(text)) {
    return null;
  }
  return Number(text);
}

/**
 * Slice a string by inclusive UTF-8 byte offsets.
 */
export function byteSubstring(text: string, start: number, end: number): string {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new IndexRangeError(`substring() indices must be integers, got ${start} and ${end}`);
  }
  const bytes = Buffer.from(text, "utf8");
  if (start < 0 || start > bytes.length || end < start - 1 || end >= bytes.length) {
    throw new IndexRangeError(`substring() range ${start}..${end} is out of bounds for length ${bytes.length}`);
  }
  return bytes.subarray(start, end + 1).toString("utf8");
}

/**
 * Register the standard built-ins against the given host configuration.
 */
export function loadBuiltins(registry: FunctionRegistry, config: ResolvedConfig): void {
  const resolvePath = (p: string): string => path.resolve(config.cwd, p);

  // print - write the display form of any value
  registry.register(
    fixed("print", [ParamKind.Any], (args) => {
      config.output(args.asAny(0).display());
      return NULL;
    })
  );

  // read - one line of input, "" at end of input
  registry.register(
    fixed("read", [], () => {
      const line = config.input();
      if (line === null) {
        return new StringValue("");
      }
      return new StringValue(line.replace(/\r?\n?$/, ""));
    })
  );

  // random - uniform in [0, 1)
  registry.register(fixed("random", [], () => new NumberValue(config.random())));

  // toNumber - parse a decimal literal, null on failure
  registry.register(
    fixed("toNumber", [ParamKind.String], (args) => {
      const n = parseDecimal(args.asString(0));
      return n === null ? NULL : new NumberValue(n);
    })
  );

  // toString - number to text
  registry.register(fixed("toString", [ParamKind.Number], (args) => new StringValue(formatNumber(args.asNumber(0)))));

  // substring - inclusive byte range
  registry.register(
    fixed("substring", [ParamKind.String, ParamKind.Number, ParamKind.Number], (args) => {
      return new StringValue(byteSubstring(args.asString(0), args.asNumber(1), args.asNumber(2)));
    })
  );

  // writeFile - replace a file's contents
  registry.register(
    fixed("writeFile", [ParamKind.String, ParamKind.String], (args) => {
      try {
        fs.writeFileSync(resolvePath(args.asString(0)), args.asString(1), "utf8");
        return TRUE;
      } catch {
        return FALSE;
      }
    })
  );

  // readFile - whole file as text, null if unreadable
  registry.register(
    fixed("readFile", [ParamKind.String], (args) => {
      try {
        return new StringValue(fs.readFileSync(resolvePath(args.asString(0)), "utf8"));
      } catch {
        return NULL;
      }
    })
  );

  // deleteFile - remove a file
  registry.register(
    fixed("deleteFile", [ParamKind.String], (args) => {
      try {
        fs.unlinkSync(resolvePath(args.asString(0)));
        return TRUE;
      } catch {
        return FALSE;
      }
    })
  );

  // exists - whether a path exists
  registry.register(fixed("exists", [ParamKind.String], (args) => toBool(fs.existsSync(resolvePath(args.asString(0))))));
}
