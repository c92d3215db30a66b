/**
 * Kestrel tree-walking interpreter.
 */

import { parse } from "../parser/parser.js";
import * as ast from "../ast/nodes.js";
import { Environment } from "../env/environment.js";
import { FunctionRegistry, type NativeFunction } from "../builtins/registry.js";
import { loadBuiltins } from "../builtins/builtins.js";
import { NULL, NumberValue, StringValue, ValueType, toBool, typeName, type RuntimeValue } from "../object/object.js";
import { ScriptError, ValueTypeError, isScriptError } from "../errors/errors.js";
import { resolveConfig, type InterpreterConfig, type ResolvedConfig } from "../config.js";
import { applyInfix, applyPrefix } from "./operators.js";
import { ok, err, type Result } from "../result.js";
import type { Position } from "../token/token.js";

/**
 * Position reported for a runtime failure inside a node. Operator
 * failures point at the operator, everything else at the node start.
 */
function failurePosition(node: ast.Stmt): Position {
  if (node instanceof ast.InfixExpr) {
    return node.opPos;
  }
  return node.pos();
}

/**
 * Evaluates programs against one environment and function registry.
 * Top-level declarations persist across calls to `run`.
 */
export class Interpreter {
  private readonly config: ResolvedConfig;
  private readonly env: Environment = new Environment();
  private readonly registry: FunctionRegistry = new FunctionRegistry();

  constructor(config: InterpreterConfig = {}) {
    this.config = resolveConfig(config);
    if (this.config.builtins) {
      loadBuiltins(this.registry, this.config);
    }
    for (const fn of this.config.functions) {
      this.registry.register(fn);
    }
  }

  /** Variable storage. */
  get globals(): Environment {
    return this.env;
  }

  /** Native function table. */
  get functions(): FunctionRegistry {
    return this.registry;
  }

  /**
   * Expose a host function to scripts.
   */
  register(fn: NativeFunction): void {
    this.registry.register(fn);
  }

  /**
   * Parse and evaluate source code. Returns the value of the last
   * top-level statement, or null for an empty program.
   */
  run(source: string, file?: string): RuntimeValue {
    return this.execute(parse(source, file));
  }

  /**
   * Like `run`, but script failures are returned instead of thrown.
   */
  tryRun(source: string, file?: string): Result<RuntimeValue, ScriptError> {
    try {
      return ok(this.run(source, file));
    } catch (e) {
      if (isScriptError(e)) {
        return err(e);
      }
      throw e;
    }
  }

  /**
   * Evaluate an already parsed program.
   */
  execute(program: ast.Program): RuntimeValue {
    let result: RuntimeValue = NULL;
    for (const stmt of program.stmts) {
      result = this.evaluate(stmt);
    }
    return result;
  }

  private evaluate(node: ast.Stmt): RuntimeValue {
    try {
      return this.dispatch(node);
    } catch (e) {
      if (isScriptError(e)) {
        e.locate(failurePosition(node));
      }
      throw e;
    }
  }

  private dispatch(node: ast.Stmt): RuntimeValue {
    if (node instanceof ast.NumberLit) {
      return new NumberValue(node.value);
    }
    if (node instanceof ast.StringLit) {
      return new StringValue(node.value);
    }
    if (node instanceof ast.BoolLit) {
      return toBool(node.value);
    }
    if (node instanceof ast.Ident) {
      return this.env.resolve(node.name);
    }
    if (node instanceof ast.PrefixExpr) {
      return applyPrefix(node.op, this.evaluate(node.right), this.config.maxStringLength);
    }
    if (node instanceof ast.InfixExpr) {
      const left = this.evaluate(node.left);
      const right = this.evaluate(node.right);
      return applyInfix(node.op, left, right, this.config.maxStringLength);
    }
    if (node instanceof ast.CallExpr) {
      const args = node.args.map((arg) => this.evaluate(arg));
      return this.registry.call(node.name, args);
    }
    if (node instanceof ast.VarStmt) {
      this.env.declare(node.name.name, this.evaluate(node.value));
      return NULL;
    }
    if (node instanceof ast.AssignStmt) {
      this.env.assign(node.name.name, this.evaluate(node.value));
      return NULL;
    }
    if (node instanceof ast.IfStmt) {
      return this.evalIf(node);
    }
    const unhandled: never = node;
    throw new Error(`unknown node: ${String(unhandled)}`);
  }

  private evalIf(node: ast.IfStmt): RuntimeValue {
    const condition = this.evaluate(node.condition);
    if (condition.type !== ValueType.Bool) {
      throw new ValueTypeError(`if condition must be Bool, got ${typeName(condition)}`, node.condition.pos());
    }
    if (!condition.value) {
      return NULL;
    }

    this.env.enterScope();
    try {
      for (const stmt of node.body.stmts) {
        this.evaluate(stmt);
      }
    } finally {
      this.env.exitScope();
    }
    return NULL;
  }
}
