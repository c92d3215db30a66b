/**
 * Binding power of each operator level.
 * Higher numbers = higher precedence (binds tighter).
 */

import { TokenKind } from "../token/token.js";

export const enum Precedence {
  LOWEST = 1,
  LESSGREATER = 2, // > <
  SUM = 3, // + -
  PRODUCT = 4, // * /
  POWER = 5, // ^ (left-associative)
  PREFIX = 6, // -X +X
}

/**
 * Get the precedence for a token type.
 */
export function getPrecedence(kind: TokenKind): Precedence {
  switch (kind) {
    case TokenKind.LT:
    case TokenKind.GT:
      return Precedence.LESSGREATER;
    case TokenKind.PLUS:
    case TokenKind.MINUS:
      return Precedence.SUM;
    case TokenKind.ASTERISK:
    case TokenKind.SLASH:
      return Precedence.PRODUCT;
    case TokenKind.CARET:
      return Precedence.POWER;
    default:
      return Precedence.LOWEST;
  }
}
