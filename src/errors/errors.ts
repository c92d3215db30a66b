/**
 * Error taxonomy shared by every stage of the pipeline.
 *
 * Each class maps to one `kind`. Hosts can switch on `kind` or use
 * `instanceof`; both stay stable across releases.
 */

import { formatPosition, type Position } from "../token/token.js";

export type ErrorKind =
  | "LexError"
  | "ParseError"
  | "NameError"
  | "ArityError"
  | "TypeError"
  | "ArithmeticError"
  | "RangeError";

/**
 * Base class for all script failures.
 */
export abstract class ScriptError extends Error {
  abstract readonly kind: ErrorKind;
  private location: Position | undefined;

  constructor(
    public readonly detail: string,
    position?: Position
  ) {
    super(position ? `${detail} at ${formatPosition(position)}` : detail);
    this.location = position;
  }

  /** Source position of the failure, when known. */
  get position(): Position | undefined {
    return this.location;
  }

  /**
   * Attach a position if the error does not carry one yet.
   */
  locate(position: Position): this {
    if (this.location === undefined) {
      this.location = position;
      this.message = `${this.detail} at ${formatPosition(position)}`;
    }
    return this;
  }
}

export class LexerError extends ScriptError {
  readonly kind = "LexError";

  constructor(message: string, position: Position) {
    super(message, position);
    this.name = "LexerError";
  }
}

export class ParserError extends ScriptError {
  readonly kind = "ParseError";

  constructor(message: string, position: Position) {
    super(message, position);
    this.name = "ParserError";
  }
}

export class NameError extends ScriptError {
  readonly kind = "NameError";

  constructor(message: string, position?: Position) {
    super(message, position);
    this.name = "NameError";
  }
}

export class ArityError extends ScriptError {
  readonly kind = "ArityError";

  constructor(message: string, position?: Position) {
    super(message, position);
    this.name = "ArityError";
  }
}

/**
 * Operand or argument of the wrong runtime type. Named apart from the
 * global `TypeError`; its kind is still `"TypeError"`.
 */
export class ValueTypeError extends ScriptError {
  readonly kind = "TypeError";

  constructor(message: string, position?: Position) {
    super(message, position);
    this.name = "ValueTypeError";
  }
}

export class ArithmeticError extends ScriptError {
  readonly kind = "ArithmeticError";

  constructor(message: string, position?: Position) {
    super(message, position);
    this.name = "ArithmeticError";
  }
}

export class IndexRangeError extends ScriptError {
  readonly kind = "RangeError";

  constructor(message: string, position?: Position) {
    super(message, position);
    this.name = "IndexRangeError";
  }
}

/**
 * Narrow an unknown thrown value to a ScriptError.
 */
export function isScriptError(err: unknown): err is ScriptError {
  return err instanceof ScriptError;
}
