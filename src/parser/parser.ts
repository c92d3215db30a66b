/**
 * Recursive-descent parser for Kestrel, driven by a binding-power table.
 */

import { Lexer } from "../lexer/lexer.js";
import { Token, TokenKind, Position, newToken } from "../token/token.js";
import { ParserError } from "../errors/errors.js";
import { Precedence, getPrecedence } from "./precedence.js";
import * as ast from "../ast/nodes.js";

/**
 * Anything that hands out tokens one at a time, ending in EOF.
 */
export interface TokenSource {
  nextToken(): Token;
}

type PrefixParseFn = () => ast.Expr;
type InfixParseFn = (left: ast.Expr) => ast.Expr;

/** Words with statement meaning; they cannot name a variable. */
const RESERVED = new Set(["let", "if"]);

const infixOperators: Map<TokenKind, ast.InfixOperator> = new Map([
  [TokenKind.PLUS, "+"],
  [TokenKind.MINUS, "-"],
  [TokenKind.ASTERISK, "*"],
  [TokenKind.SLASH, "/"],
  [TokenKind.CARET, "^"],
  [TokenKind.GT, ">"],
  [TokenKind.LT, "<"],
]);

function describeToken(tok: Token): string {
  return tok.kind === TokenKind.EOF ? "end of input" : `'${tok.literal}'`;
}

/**
 * Parser for Kestrel source code. The first error aborts parsing.
 */
export class Parser {
  private source: TokenSource;
  private curToken: Token;
  private peekToken: Token;
  private maxDepth = 500;
  private depth = 0;

  private prefixParseFns: Map<TokenKind, PrefixParseFn> = new Map();
  private infixParseFns: Map<TokenKind, InfixParseFn> = new Map();

  constructor(source: TokenSource) {
    this.source = source;
    this.curToken = this.source.nextToken();
    this.peekToken = this.source.nextToken();

    this.registerPrefix(TokenKind.IDENT, () => this.parseIdent());
    this.registerPrefix(TokenKind.NUMBER, () => this.parseNumber());
    this.registerPrefix(TokenKind.STRING, () => this.parseString());
    this.registerPrefix(TokenKind.BOOL, () => this.parseBool());
    this.registerPrefix(TokenKind.MINUS, () => this.parsePrefix());
    this.registerPrefix(TokenKind.PLUS, () => this.parsePrefix());
    this.registerPrefix(TokenKind.LPAREN, () => this.parseGrouped());

    for (const kind of infixOperators.keys()) {
      this.registerInfix(kind, (left) => this.parseInfix(left));
    }
  }

  private registerPrefix(kind: TokenKind, fn: PrefixParseFn): void {
    this.prefixParseFns.set(kind, fn);
  }

  private registerInfix(kind: TokenKind, fn: InfixParseFn): void {
    this.infixParseFns.set(kind, fn);
  }

  private nextToken(): void {
    this.curToken = this.peekToken;
    this.peekToken = this.source.nextToken();
  }

  private curTokenIs(kind: TokenKind): boolean {
    return this.curToken.kind === kind;
  }

  private peekTokenIs(kind: TokenKind): boolean {
    return this.peekToken.kind === kind;
  }

  /**
   * Consume the current token if it has the given kind, otherwise fail.
   */
  private expect(kind: TokenKind): Position {
    if (!this.curTokenIs(kind)) {
      throw new ParserError(`expected '${kind}', got ${describeToken(this.curToken)}`, this.curToken.start);
    }
    const pos = this.curToken.start;
    this.nextToken();
    return pos;
  }

  private curPrecedence(): Precedence {
    return getPrecedence(this.curToken.kind);
  }

  /**
   * Parse the entire program.
   */
  parse(): ast.Program {
    const stmts = this.parseStatements(TokenKind.EOF);
    return new ast.Program(stmts);
  }

  // =========================================================================
  // Statement Parsing
  // =========================================================================

  /**
   * Parse `;`-terminated statements until the given closing token.
   */
  private parseStatements(until: TokenKind): ast.Stmt[] {
    const stmts: ast.Stmt[] = [];
    while (!this.curTokenIs(until)) {
      if (this.curTokenIs(TokenKind.EOF)) {
        throw new ParserError(`expected '${until}', got end of input`, this.curToken.start);
      }
      stmts.push(this.parseStatement());
      this.expect(TokenKind.SEMICOLON);
    }
    return stmts;
  }

  private parseStatement(): ast.Stmt {
    if (this.curTokenIs(TokenKind.IDENT)) {
      switch (this.curToken.literal) {
        case "let":
          return this.parseLet();
        case "if":
          return this.parseIf();
      }
      if (this.peekTokenIs(TokenKind.ASSIGN)) {
        return this.parseAssignment();
      }
    }
    return this.parseExpression(Precedence.LOWEST);
  }

  /**
   * Read a variable name: an identifier that is not a reserved word.
   */
  private parseBindingName(): ast.Ident {
    if (!this.curTokenIs(TokenKind.IDENT)) {
      throw new ParserError(`expected identifier, got ${describeToken(this.curToken)}`, this.curToken.start);
    }
    if (RESERVED.has(this.curToken.literal)) {
      throw new ParserError(`'${this.curToken.literal}' is a reserved word`, this.curToken.start);
    }
    const name = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();
    return name;
  }

  private parseLet(): ast.VarStmt {
    const letPos = this.curToken.start;
    this.nextToken(); // consume 'let'

    const name = this.parseBindingName();
    this.expect(TokenKind.ASSIGN);
    const value = this.parseExpression(Precedence.LOWEST);
    return new ast.VarStmt(letPos, name, value);
  }

  private parseAssignment(): ast.AssignStmt {
    const name = this.parseBindingName();
    const opPos = this.expect(TokenKind.ASSIGN);
    const value = this.parseExpression(Precedence.LOWEST);
    return new ast.AssignStmt(name, opPos, value);
  }

  private parseIf(): ast.IfStmt {
    const ifPos = this.curToken.start;
    this.nextToken(); // consume 'if'

    const condition = this.parseExpression(Precedence.LOWEST);
    const body = this.parseBlock();
    return new ast.IfStmt(ifPos, condition, body);
  }

  private parseBlock(): ast.Block {
    const entryDepth = this.depth;
    this.descend();
    const lbrace = this.expect(TokenKind.LBRACE);
    const stmts = this.parseStatements(TokenKind.RBRACE);
    this.nextToken(); // consume '}'
    this.depth = entryDepth;
    return new ast.Block(lbrace, stmts);
  }

  // =========================================================================
  // Expression Parsing
  // =========================================================================

  /**
   * Count one level of tree depth against `maxDepth`. Parentheses, signs,
   * blocks and each operator folded into a chain all count.
   */
  private descend(): void {
    this.depth++;
    if (this.depth > this.maxDepth) {
      throw new ParserError("maximum nesting depth exceeded", this.curToken.start);
    }
  }

  private parseExpression(precedence: Precedence): ast.Expr {
    const entryDepth = this.depth;
    this.descend();

    const prefixFn = this.prefixParseFns.get(this.curToken.kind);
    if (!prefixFn) {
      throw new ParserError(`unexpected token ${describeToken(this.curToken)}`, this.curToken.start);
    }

    let left = prefixFn();

    while (precedence < this.curPrecedence()) {
      const infixFn = this.infixParseFns.get(this.curToken.kind);
      if (!infixFn) {
        break;
      }
      this.descend();
      left = infixFn(left);
    }

    this.depth = entryDepth;
    return left;
  }

  // =========================================================================
  // Literal Parsing
  // =========================================================================

  private parseIdent(): ast.Expr {
    const ident = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();

    if (this.curTokenIs(TokenKind.LPAREN)) {
      return this.parseCall(ident);
    }
    return ident;
  }

  private parseNumber(): ast.NumberLit {
    const literal = this.curToken.literal;
    const node = new ast.NumberLit(this.curToken.start, literal, parseFloat(literal));
    this.nextToken();
    return node;
  }

  private parseString(): ast.StringLit {
    const node = new ast.StringLit(this.curToken.start, this.curToken.literal);
    this.nextToken();
    return node;
  }

  private parseBool(): ast.BoolLit {
    const node = new ast.BoolLit(this.curToken.start, this.curToken.literal === "true");
    this.nextToken();
    return node;
  }

  // =========================================================================
  // Operator Parsing
  // =========================================================================

  private parsePrefix(): ast.PrefixExpr {
    const opPos = this.curToken.start;
    const op: ast.PrefixOperator = this.curTokenIs(TokenKind.MINUS) ? "-" : "+";
    this.nextToken();

    // The sign binds to a single primary: -2 ^ 2 is (-2) ^ 2.
    const right = this.parseExpression(Precedence.PREFIX);
    return new ast.PrefixExpr(opPos, op, right);
  }

  private parseInfix(left: ast.Expr): ast.InfixExpr {
    const opPos = this.curToken.start;
    const op = infixOperators.get(this.curToken.kind);
    if (op === undefined) {
      throw new ParserError(`unexpected token ${describeToken(this.curToken)}`, opPos);
    }
    const precedence = this.curPrecedence();
    this.nextToken();

    const right = this.parseExpression(precedence);
    return new ast.InfixExpr(left, opPos, op, right);
  }

  private parseGrouped(): ast.Expr {
    this.nextToken(); // consume '('
    const expr = this.parseExpression(Precedence.LOWEST);
    this.expect(TokenKind.RPAREN);
    return expr;
  }

  // =========================================================================
  // Calls
  // =========================================================================

  /**
   * Parse call arguments. Arguments sit at sum level, so a comparison
   * has to be parenthesized to be passed.
   */
  private parseCall(func: ast.Ident): ast.CallExpr {
    this.nextToken(); // consume '('

    const args: ast.Expr[] = [];
    while (!this.curTokenIs(TokenKind.RPAREN)) {
      args.push(this.parseExpression(Precedence.LESSGREATER));
      if (this.curTokenIs(TokenKind.RPAREN)) {
        break;
      }
      this.expect(TokenKind.COMMA);
    }
    this.nextToken(); // consume ')'

    return new ast.CallExpr(func, args);
  }
}

/**
 * Replay a token array as a token source. EOF is synthesized if missing.
 */
export function fromTokens(tokens: Token[]): TokenSource {
  let index = 0;
  return {
    nextToken(): Token {
      if (index < tokens.length) {
        return tokens[index++];
      }
      const last = tokens[tokens.length - 1];
      if (last !== undefined && last.kind === TokenKind.EOF) {
        return last;
      }
      const pos: Position = last?.end ?? { char: 0, line: 0, column: 0, file: "<input>" };
      return newToken(TokenKind.EOF, "", pos, pos);
    },
  };
}

/**
 * Parse source code into an AST.
 */
export function parse(source: string, filename?: string): ast.Program {
  const lexer = new Lexer(source, filename);
  const parser = new Parser(lexer);
  return parser.parse();
}

/**
 * Parse an already tokenized program.
 */
export function parseTokens(tokens: Token[]): ast.Program {
  return new Parser(fromTokens(tokens)).parse();
}
