import { Token, TokenKind, Position, newPosition, newToken, lookupIdentifier } from "../token/token.js";
import { LexerError } from "../errors/errors.js";
import {
  isDecimalPoint,
  isDigit,
  isLetter,
  isOperator,
  isPunctuation,
  isQuote,
  isWhitespace,
} from "./chars.js";

const singleCharTokens: Map<string, TokenKind> = new Map([
  ["+", TokenKind.PLUS],
  ["-", TokenKind.MINUS],
  ["*", TokenKind.ASTERISK],
  ["/", TokenKind.SLASH],
  ["^", TokenKind.CARET],
  ["=", TokenKind.ASSIGN],
  ["!", TokenKind.BANG],
  ["<", TokenKind.LT],
  [">", TokenKind.GT],
  ["(", TokenKind.LPAREN],
  [")", TokenKind.RPAREN],
  ["[", TokenKind.LBRACKET],
  ["]", TokenKind.RBRACKET],
  ["{", TokenKind.LBRACE],
  ["}", TokenKind.RBRACE],
  [",", TokenKind.COMMA],
  [";", TokenKind.SEMICOLON],
]);

/**
 * Lexer tokenizes Kestrel source code.
 */
export class Lexer {
  private characters: string[];
  private position: number = -1;
  private nextPosition: number = 0;
  private ch: string = "";
  private line: number = 0;
  private column: number = -1;
  private file: string;
  private tokenStartPosition: Position;

  constructor(input: string, file: string = "<input>") {
    this.characters = [...input];
    this.file = file;
    this.tokenStartPosition = this.currentPosition();
    this.readChar();
  }

  private currentPosition(): Position {
    return newPosition(this.position, this.line, this.column, this.file);
  }

  /**
   * Read the next character. Line tracking happens when a newline is
   * stepped over, so the newline itself belongs to the line it ends.
   */
  private readChar(): void {
    if (this.ch === "\n") {
      this.line++;
      this.column = -1;
    }
    if (this.nextPosition >= this.characters.length) {
      this.ch = "\0";
    } else {
      this.ch = this.characters[this.nextPosition];
    }
    this.position = this.nextPosition;
    this.nextPosition++;
    this.column++;
  }

  private peekChar(): string {
    if (this.nextPosition >= this.characters.length) {
      return "\0";
    }
    return this.characters[this.nextPosition];
  }

  private atEnd(): boolean {
    return this.position >= this.characters.length;
  }

  private skipWhitespace(): void {
    while (!this.atEnd() && isWhitespace(this.ch)) {
      this.readChar();
    }
  }

  private startToken(): void {
    this.tokenStartPosition = this.currentPosition();
  }

  private makeToken(kind: TokenKind, literal: string): Token {
    return newToken(kind, literal, this.tokenStartPosition, this.currentPosition());
  }

  private sliceFrom(start: number): string {
    return this.characters.slice(start, this.position).join("");
  }

  /**
   * Get the next token. Returns EOF forever once the input is exhausted.
   */
  nextToken(): Token {
    this.skipWhitespace();
    this.startToken();

    if (this.atEnd()) {
      return this.makeToken(TokenKind.EOF, "");
    }

    if (isQuote(this.ch)) {
      return this.readString(this.ch);
    }

    if (isDigit(this.ch) || (isDecimalPoint(this.ch) && isDigit(this.peekChar()))) {
      return this.readNumber();
    }

    if (isLetter(this.ch)) {
      return this.readIdentifier();
    }

    if (isOperator(this.ch) || isPunctuation(this.ch)) {
      return this.readOperator();
    }

    throw new LexerError(`unexpected character '${this.ch}'`, this.tokenStartPosition);
  }

  /**
   * Read an identifier or boolean literal.
   */
  private readIdentifier(): Token {
    const start = this.position;
    while (isLetter(this.ch)) {
      this.readChar();
    }
    const literal = this.sliceFrom(start);
    return this.makeToken(lookupIdentifier(literal), literal);
  }

  /**
   * Read a number literal: digits with at most one decimal point.
   */
  private readNumber(): Token {
    const start = this.position;
    let points = 0;
    while (isDigit(this.ch) || isDecimalPoint(this.ch)) {
      if (isDecimalPoint(this.ch)) {
        points++;
      }
      this.readChar();
    }
    const literal = this.sliceFrom(start);
    if (points > 1) {
      throw new LexerError(`malformed number '${literal}'`, this.tokenStartPosition);
    }
    return this.makeToken(TokenKind.NUMBER, literal);
  }

  /**
   * Read a quoted string literal. The text is taken verbatim.
   */
  private readString(quote: string): Token {
    const chars: string[] = [];
    this.readChar(); // consume opening quote

    while (this.ch !== quote) {
      if (this.atEnd()) {
        throw new LexerError("unterminated string literal", this.tokenStartPosition);
      }
      chars.push(this.ch);
      this.readChar();
    }

    this.readChar(); // consume closing quote
    return this.makeToken(TokenKind.STRING, chars.join(""));
  }

  /**
   * Read an operator or punctuation token.
   */
  private readOperator(): Token {
    const ch = this.ch;

    if (ch === "!" && this.peekChar() === "=") {
      this.readChar();
      this.readChar();
      return this.makeToken(TokenKind.NOT_EQ, "!=");
    }

    const kind = singleCharTokens.get(ch);
    if (kind === undefined) {
      throw new LexerError(`unexpected character '${ch}'`, this.tokenStartPosition);
    }
    this.readChar();
    return this.makeToken(kind, ch);
  }
}

/**
 * Tokenize an input string into an array of tokens ending with EOF.
 */
export function tokenize(input: string, file?: string): Token[] {
  const lexer = new Lexer(input, file);
  const tokens: Token[] = [];
  let tok: Token;
  do {
    tok = lexer.nextToken();
    tokens.push(tok);
  } while (tok.kind !== TokenKind.EOF);
  return tokens;
}
