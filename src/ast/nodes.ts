/**
 * AST node types for the Kestrel parser.
 */

import type { Position } from "../token/token.js";

/**
 * Base interface for all AST nodes.
 */
export interface Node {
  /** Start position in source */
  pos(): Position;
  /** Source-like rendering */
  toString(): string;
}

export type PrefixOperator = "+" | "-";

export type InfixOperator = "+" | "-" | "*" | "/" | "^" | ">" | "<";

/**
 * Nodes that produce a value.
 */
export type Expr = NumberLit | BoolLit | StringLit | Ident | CallExpr | PrefixExpr | InfixExpr;

/**
 * Anything that may appear in a statement list.
 */
export type Stmt = Expr | VarStmt | AssignStmt | IfStmt;

// ============================================================================
// Literal Expressions
// ============================================================================

/**
 * Number literal. All numbers are floating point.
 */
export class NumberLit implements Node {
  constructor(
    public readonly position: Position,
    public readonly literal: string,
    public readonly value: number
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.literal;
  }
}

/**
 * Boolean literal.
 */
export class BoolLit implements Node {
  constructor(
    public readonly position: Position,
    public readonly value: boolean
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.value ? "true" : "false";
  }
}

/**
 * String literal.
 */
export class StringLit implements Node {
  constructor(
    public readonly position: Position,
    public readonly value: string
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    // Strings have no escapes, so pick the quote the value lacks.
    return this.value.includes('"') ? `'${this.value}'` : `"${this.value}"`;
  }
}

// ============================================================================
// Identifier
// ============================================================================

/**
 * Identifier (variable reference).
 */
export class Ident implements Node {
  constructor(
    public readonly position: Position,
    public readonly name: string
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.name;
  }
}

// ============================================================================
// Operator Expressions
// ============================================================================

/**
 * Unary sign applied to a primary expression.
 */
export class PrefixExpr implements Node {
  constructor(
    public readonly opPos: Position,
    public readonly op: PrefixOperator,
    public readonly right: Expr
  ) {}

  pos(): Position {
    return this.opPos;
  }
  toString(): string {
    return `(${this.op}${this.right.toString()})`;
  }
}

/**
 * Binary operator expression.
 */
export class InfixExpr implements Node {
  constructor(
    public readonly left: Expr,
    public readonly opPos: Position,
    public readonly op: InfixOperator,
    public readonly right: Expr
  ) {}

  pos(): Position {
    return this.left.pos();
  }
  toString(): string {
    return `(${this.left.toString()} ${this.op} ${this.right.toString()})`;
  }
}

// ============================================================================
// Calls
// ============================================================================

/**
 * Call of a registered native function by name.
 */
export class CallExpr implements Node {
  constructor(
    public readonly func: Ident,
    public readonly args: Expr[]
  ) {}

  get name(): string {
    return this.func.name;
  }

  pos(): Position {
    return this.func.pos();
  }
  toString(): string {
    return `${this.func.name}(${this.args.map((a) => a.toString()).join(", ")})`;
  }
}

// ============================================================================
// Statements
// ============================================================================

/**
 * Brace-delimited statement list.
 */
export class Block implements Node {
  constructor(
    public readonly lbrace: Position,
    public readonly stmts: Stmt[]
  ) {}

  pos(): Position {
    return this.lbrace;
  }
  toString(): string {
    if (this.stmts.length === 0) {
      return "{ }";
    }
    return `{ ${this.stmts.map((s) => `${s.toString()};`).join(" ")} }`;
  }
}

/**
 * Variable declaration (let x = value).
 */
export class VarStmt implements Node {
  constructor(
    public readonly letPos: Position,
    public readonly name: Ident,
    public readonly value: Expr
  ) {}

  pos(): Position {
    return this.letPos;
  }
  toString(): string {
    return `let ${this.name.name} = ${this.value.toString()}`;
  }
}

/**
 * Assignment to an existing variable (x = value).
 */
export class AssignStmt implements Node {
  constructor(
    public readonly name: Ident,
    public readonly opPos: Position,
    public readonly value: Expr
  ) {}

  pos(): Position {
    return this.name.pos();
  }
  toString(): string {
    return `${this.name.name} = ${this.value.toString()}`;
  }
}

/**
 * Single-branch conditional (if cond { ... }).
 */
export class IfStmt implements Node {
  constructor(
    public readonly ifPos: Position,
    public readonly condition: Expr,
    public readonly body: Block
  ) {}

  pos(): Position {
    return this.ifPos;
  }
  toString(): string {
    return `if ${this.condition.toString()} ${this.body.toString()}`;
  }
}

/**
 * Root node of the AST.
 */
export class Program implements Node {
  constructor(public readonly stmts: Stmt[]) {}

  pos(): Position {
    if (this.stmts.length > 0) {
      return this.stmts[0].pos();
    }
    return { char: 0, line: 0, column: 0, file: "" };
  }
  toString(): string {
    return this.stmts.map((s) => `${s.toString()};`).join("\n");
  }
}
