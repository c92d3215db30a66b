/**
 * Interpreter configuration and host I/O defaults.
 */

import * as fs from "node:fs";
import type { NativeFunction } from "./builtins/registry.js";

/**
 * Interpreter configuration options. Every field is optional.
 */
export interface InterpreterConfig {
  /** Receives each line written by `print`. */
  output?: (line: string) => void;
  /** Supplies a line to `read`; null at end of input. */
  input?: () => string | null;
  /** Source of uniform numbers in [0, 1) for `random`. */
  random?: () => number;
  /** Base directory for the file built-ins. */
  cwd?: string;
  /** Longest string the repeat operator may produce. */
  maxStringLength?: number;
  /** Load the built-in functions. */
  builtins?: boolean;
  /** Extra native functions registered at construction. */
  functions?: NativeFunction[];
}

export type ResolvedConfig = Required<InterpreterConfig>;

export const DEFAULT_MAX_STRING_LENGTH = 1 << 24;

const STDIN_RETRY_MS = 10;
const STDIN_WAIT = new Int32Array(new SharedArrayBuffer(4));

/**
 * Read one line from standard input, blocking. The line terminator is
 * not included. Returns null when input is exhausted before any byte.
 */
export function readStdinLine(): string | null {
  const bytes: number[] = [];
  const buffer = Buffer.alloc(1);
  for (;;) {
    let read: number;
    try {
      read = fs.readSync(0, buffer, 0, 1, null);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EAGAIN") {
        // Non-blocking stdin has no data yet; sleep briefly before retrying.
        Atomics.wait(STDIN_WAIT, 0, 0, STDIN_RETRY_MS);
        continue;
      }
      if (err instanceof Error && "code" in err && err.code === "EOF") {
        read = 0;
      } else {
        throw err;
      }
    }
    if (read === 0) {
      return bytes.length === 0 ? null : Buffer.from(bytes).toString("utf8");
    }
    if (buffer[0] === 0x0a) {
      return Buffer.from(bytes).toString("utf8");
    }
    bytes.push(buffer[0]);
  }
}

/**
 * Fill in defaults for every option the caller left out.
 */
export function resolveConfig(config: InterpreterConfig = {}): ResolvedConfig {
  const maxStringLength = config.maxStringLength ?? DEFAULT_MAX_STRING_LENGTH;
  if (!Number.isInteger(maxStringLength) || maxStringLength < 0) {
    throw new Error(`maxStringLength must be a non-negative integer, got ${maxStringLength}`);
  }
  return {
    output: config.output ?? ((line) => console.log(line)),
    input: config.input ?? readStdinLine,
    random: config.random ?? Math.random,
    cwd: config.cwd ?? process.cwd(),
    maxStringLength,
    builtins: config.builtins ?? true,
    functions: config.functions ?? [],
  };
}
