/**
 * Kestrel - A tiny embeddable scripting language for TypeScript/JavaScript.
 *
 * @packageDocumentation
 */

// Token exports
export { TokenKind, newToken, newPosition, formatPosition, lookupIdentifier } from "./token/token.js";
export type { Token, Position } from "./token/token.js";

// Error exports
export {
  ScriptError,
  LexerError,
  ParserError,
  NameError,
  ArityError,
  ValueTypeError,
  ArithmeticError,
  IndexRangeError,
  isScriptError,
} from "./errors/errors.js";
export type { ErrorKind } from "./errors/errors.js";

// Lexer exports
export { Lexer, tokenize } from "./lexer/lexer.js";

// AST exports
export * from "./ast/nodes.js";

// Parser exports
export { Parser, parse, parseTokens, fromTokens } from "./parser/parser.js";
export type { TokenSource } from "./parser/parser.js";
export { Precedence, getPrecedence } from "./parser/precedence.js";

// Value exports
export * from "./object/index.js";

// Environment exports
export { Environment } from "./env/environment.js";

// Function registry exports
export { FunctionRegistry, Arguments, ParamKind } from "./builtins/registry.js";
export type { NativeFunction, Arity } from "./builtins/registry.js";
export { loadBuiltins } from "./builtins/builtins.js";

// Interpreter exports
export { Interpreter } from "./interpreter/interpreter.js";
export { applyInfix, applyPrefix } from "./interpreter/operators.js";
export { resolveConfig, DEFAULT_MAX_STRING_LENGTH } from "./config.js";
export type { InterpreterConfig, ResolvedConfig } from "./config.js";
export { ok, err, isOk, isErr } from "./result.js";
export type { Result, Ok, Err } from "./result.js";

// Runner exports
export { runFile, runCode, formatTokens } from "./runner.js";

// REPL export
export { startRepl } from "./repl.js";

export { VERSION } from "./version.js";
