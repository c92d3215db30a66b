/**
 * Character classes used by the lexer. Every predicate takes a single
 * character; the lexer passes "\0" at end of input, which matches nothing.
 */

/**
 * Check if a character is whitespace (space, tab, newline, CR, ...).
 */
export function isWhitespace(ch: string): boolean {
  return /^\s$/.test(ch);
}

/**
 * Check if a character is a letter. Identifiers are letters only.
 */
export function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

/**
 * Check if a character is a digit.
 */
export function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

export function isDecimalPoint(ch: string): boolean {
  return ch === ".";
}

/**
 * Check if a character opens (and therefore closes) a string literal.
 */
export function isQuote(ch: string): boolean {
  return ch === '"' || ch === "'";
}

const operatorChars = new Set(["+", "-", "*", "/", "^", "=", "!", "<", ">"]);
const punctuationChars = new Set(["(", ")", "{", "}", "[", "]", ";", ","]);

export function isOperator(ch: string): boolean {
  return operatorChars.has(ch);
}

export function isPunctuation(ch: string): boolean {
  return punctuationChars.has(ch);
}
