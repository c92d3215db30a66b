/**
 * Token types for the Kestrel lexer.
 */
export const enum TokenKind {
  // Literals
  NUMBER = "NUMBER",
  STRING = "STRING",
  BOOL = "BOOL",
  IDENT = "IDENT",

  // Operators
  PLUS = "+",
  MINUS = "-",
  ASTERISK = "*",
  SLASH = "/",
  CARET = "^",

  // Comparison
  NOT_EQ = "!=",
  LT = "<",
  GT = ">",
  BANG = "!",

  // Assignment
  ASSIGN = "=",

  // Punctuation
  LPAREN = "(",
  RPAREN = ")",
  LBRACKET = "[",
  RBRACKET = "]",
  LBRACE = "{",
  RBRACE = "}",
  COMMA = ",",
  SEMICOLON = ";",

  // Special
  EOF = "EOF",
}

/**
 * Words the lexer classifies as something other than a plain identifier.
 * `let` and `if` stay identifiers; the parser recognizes them by text.
 */
const literalWords: Map<string, TokenKind> = new Map([
  ["true", TokenKind.BOOL],
  ["false", TokenKind.BOOL],
]);

/**
 * Look up an identifier to see if it spells a boolean literal.
 */
export function lookupIdentifier(ident: string): TokenKind {
  return literalWords.get(ident) ?? TokenKind.IDENT;
}

/**
 * Position in source code.
 */
export interface Position {
  /** Character offset within the source */
  char: number;
  /** 0-indexed line number */
  line: number;
  /** 0-indexed column number */
  column: number;
  /** Filename */
  file: string;
}

/**
 * Create a new Position.
 */
export function newPosition(char: number, line: number, column: number, file: string): Position {
  return { char, line, column, file };
}

/**
 * Human-readable `line L, column C` (1-indexed).
 */
export function formatPosition(p: Position): string {
  return `line ${p.line + 1}, column ${p.column + 1}`;
}

/**
 * A token produced by the lexer.
 */
export interface Token {
  kind: TokenKind;
  literal: string;
  start: Position;
  end: Position;
}

/**
 * Create a new Token.
 */
export function newToken(kind: TokenKind, literal: string, start: Position, end: Position): Token {
  return { kind, literal, start, end };
}
