/**
 * Kestrel Runner - Execute Kestrel scripts from files.
 */

import * as fs from "fs";
import * as path from "path";
import { Interpreter } from "./interpreter/interpreter.js";
import { tokenize } from "./lexer/lexer.js";
import { TokenKind, type Token } from "./token/token.js";
import type { RuntimeValue } from "./object/object.js";

/**
 * Read a script file, failing with a readable message if it is missing.
 */
export function readScript(filepath: string): { source: string; filename: string } {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${filepath}`);
  }
  return { source: fs.readFileSync(resolved, "utf-8"), filename: resolved };
}

/**
 * Run a Kestrel script file.
 */
export function runFile(filepath: string, interpreter: Interpreter = new Interpreter()): RuntimeValue {
  const { source, filename } = readScript(filepath);
  return runCode(source, filename, interpreter);
}

/**
 * Run Kestrel code and return the value of its last statement.
 */
export function runCode(
  code: string,
  filename: string = "<input>",
  interpreter: Interpreter = new Interpreter()
): RuntimeValue {
  return interpreter.run(code, filename);
}

/**
 * Render one token as `KIND literal`. Punctuation and EOF print the
 * kind alone.
 */
export function formatToken(tok: Token): string {
  if (tok.kind === TokenKind.EOF || tok.literal === tok.kind) {
    return tok.kind;
  }
  const literal = tok.kind === TokenKind.STRING ? JSON.stringify(tok.literal) : tok.literal;
  return `${tok.kind} ${literal}`;
}

/**
 * Tokenize source and render one token per line.
 */
export function formatTokens(code: string, filename?: string): string[] {
  return tokenize(code, filename).map(formatToken);
}
