// interpreter/src/parser.ts
//
// minipy Parser
// -------------
// Recursive-descent parser from the token stream of ./lexer to the AST
// of ./ast. Function definitions may appear anywhere at top level and
// are hoisted into Program.defs; everything else becomes the top-level
// block.
//
// Precedence, loosest first:
//   |   or   and   not   comparisons (non-associative)   + -   * / // %   unary -   [ ]

import {
  BinaryOperator,
  Expr,
  FunctionDef,
  Program,
  SourceLoc,
  Stmt,
  emptyBlock,
} from './ast';
import { Token, TokenKind, tokenize } from './lexer';
import { MiniPySyntaxError } from './errors';

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

export interface ParseResult {
  program: Program | null;
  hasErrors: boolean;
  errors: ParseError[];
}

const COMPARISON_OPS: Partial<Record<TokenKind, BinaryOperator>> = {
  [TokenKind.EQ]: '==',
  [TokenKind.NEQ]: '!=',
  [TokenKind.LT]: '<',
  [TokenKind.LTE]: '<=',
  [TokenKind.GT]: '>',
  [TokenKind.GTE]: '>=',
};

const ADDITIVE_OPS: Partial<Record<TokenKind, BinaryOperator>> = {
  [TokenKind.PLUS]: '+',
  [TokenKind.MINUS]: '-',
};

const MULTIPLICATIVE_OPS: Partial<Record<TokenKind, BinaryOperator>> = {
  [TokenKind.STAR]: '*',
  [TokenKind.SLASH]: '/',
  [TokenKind.PERCENT]: '%',
};

export class Parser {
  private readonly tokens: Token[];
  private idx = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  public parseProgram(): Program {
    const defs: FunctionDef[] = [];
    const body: Stmt[] = [];
    const start = this.current();

    this.skipNewlines();
    while (!this.check(TokenKind.EOF)) {
      if (this.check(TokenKind.KW_DEF)) {
        defs.push(this.parseFunctionDef());
      } else {
        body.push(this.parseStatement());
      }
      this.skipNewlines();
    }

    return { defs, body: { type: 'block', body, loc: locOf(start) } };
  }

  /* =========================================================
     Declarations and statements
     ========================================================= */

  private parseFunctionDef(): FunctionDef {
    const defTok = this.expect(TokenKind.KW_DEF, "expected 'def'");
    const name = this.expectIdentifier('expected function name after def');
    this.expect(TokenKind.LPAREN, "expected '(' after function name");
    const params: string[] = [];
    if (!this.check(TokenKind.RPAREN)) {
      do {
        const paramTok = this.current();
        const param = this.expectIdentifier('expected parameter name');
        if (params.includes(param)) {
          throw this.errorAt(paramTok, `duplicate parameter '${param}' in function definition`);
        }
        params.push(param);
      } while (this.match(TokenKind.COMMA));
    }
    this.expect(TokenKind.RPAREN, "expected ')' after parameters");
    this.expect(TokenKind.COLON, "expected ':' after function signature");
    const body = this.parseSuite();
    return { name, params, body, loc: locOf(defTok) };
  }

  private parseStatement(): Stmt {
    const tok = this.current();
    switch (tok.kind) {
      case TokenKind.KW_DEF:
        throw this.errorAt(tok, 'function definitions are only allowed at top level');
      case TokenKind.KW_IF:
        this.advance();
        return this.parseIfRest(tok);
      case TokenKind.KW_FOR:
        this.advance();
        return this.parseForRest(tok);
      default: {
        const stmt = this.parseSimpleStatement();
        this.expectEndOfLine();
        return stmt;
      }
    }
  }

  private parseIfRest(ifTok: Token): Stmt {
    const condition = this.parseExpression();
    this.expect(TokenKind.COLON, "expected ':' after if condition");
    const consequence = this.parseSuite();

    let alternative: Stmt = emptyBlock();
    const next = this.current();
    if (this.match(TokenKind.KW_ELIF)) {
      alternative = this.parseIfRest(next);
    } else if (this.match(TokenKind.KW_ELSE)) {
      this.expect(TokenKind.COLON, "expected ':' after else");
      alternative = this.parseSuite();
    }
    return { type: 'if_statement', condition, consequence, alternative, loc: locOf(ifTok) };
  }

  private parseForRest(forTok: Token): Stmt {
    const variable = this.expectIdentifier('expected loop variable after for');
    this.expect(TokenKind.KW_IN, "expected 'in' after loop variable");
    const iterable = this.parseExpression();
    this.expect(TokenKind.COLON, "expected ':' after for clause");
    const body = this.parseSuite();
    return { type: 'for_statement', variable, iterable, body, loc: locOf(forTok) };
  }

  /**
   * suite := simple NEWLINE | NEWLINE INDENT stmt+ DEDENT
   */
  private parseSuite(): Stmt {
    const start = this.current();
    if (!this.match(TokenKind.NEWLINE)) {
      const stmt = this.parseSimpleStatement();
      this.expectEndOfLine();
      return { type: 'block', body: [stmt], loc: locOf(start) };
    }
    this.expect(TokenKind.INDENT, 'expected an indented block');
    const body: Stmt[] = [];
    while (!this.check(TokenKind.DEDENT) && !this.check(TokenKind.EOF)) {
      body.push(this.parseStatement());
    }
    this.expect(TokenKind.DEDENT, 'expected end of indented block');
    return { type: 'block', body, loc: locOf(start) };
  }

  private parseSimpleStatement(): Stmt {
    const tok = this.current();

    if (this.match(TokenKind.KW_RETURN)) {
      return { type: 'return_statement', value: this.parseExpression(), loc: locOf(tok) };
    }

    if (this.match(TokenKind.KW_PRINT)) {
      this.expect(TokenKind.LPAREN, "expected '(' after print");
      const value = this.parseExpression();
      this.expect(TokenKind.RPAREN, "expected ')' after print argument");
      return { type: 'print_statement', value, loc: locOf(tok) };
    }

    const expr = this.parseExpression();
    if (!this.check(TokenKind.ASSIGN)) {
      return { type: 'expression_statement', expression: expr, loc: locOf(tok) };
    }

    const assignTok = this.advance();
    const value = this.parseExpression();
    if (expr.type === 'identifier') {
      return { type: 'assignment_statement', target: expr.name, value, loc: locOf(tok) };
    }
    if (expr.type === 'index_expression') {
      return { type: 'index_assignment_statement', object: expr.object, index: expr.index, value, loc: locOf(tok) };
    }
    throw this.errorAt(assignTok, 'cannot assign to expression');
  }

  /* =========================================================
     Expressions
     ========================================================= */

  public parseExpression(): Expr {
    let expr = this.parseOr();
    while (this.check(TokenKind.PIPE)) {
      const pipeTok = this.advance();
      const callee = this.expectIdentifier("expected function name after '|'");
      expr = { type: 'pipe_expression', input: expr, callee, loc: locOf(pipeTok) };
    }
    return expr;
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.check(TokenKind.KW_OR)) {
      const opTok = this.advance();
      const right = this.parseAnd();
      left = { type: 'binary_expression', operator: 'or', left, right, loc: locOf(opTok) };
    }
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseNot();
    while (this.check(TokenKind.KW_AND)) {
      const opTok = this.advance();
      const right = this.parseNot();
      left = { type: 'binary_expression', operator: 'and', left, right, loc: locOf(opTok) };
    }
    return left;
  }

  private parseNot(): Expr {
    if (this.check(TokenKind.KW_NOT)) {
      const opTok = this.advance();
      return { type: 'unary_expression', operator: 'not', operand: this.parseNot(), loc: locOf(opTok) };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const left = this.parseBinary(ADDITIVE_OPS, () => this.parseTerm());
    const op = COMPARISON_OPS[this.current().kind];
    if (op === undefined) return left;
    const opTok = this.advance();
    const right = this.parseBinary(ADDITIVE_OPS, () => this.parseTerm());
    if (COMPARISON_OPS[this.current().kind] !== undefined) {
      throw this.errorAt(this.current(), 'comparison operators cannot be chained');
    }
    return { type: 'binary_expression', operator: op, left, right, loc: locOf(opTok) };
  }

  private parseTerm(): Expr {
    return this.parseBinary(MULTIPLICATIVE_OPS, () => this.parseUnary());
  }

  /**
   * Left-associative binary level over the given operator table.
   */
  private parseBinary(ops: Partial<Record<TokenKind, BinaryOperator>>, operand: () => Expr): Expr {
    let left = operand();
    for (;;) {
      const op = ops[this.current().kind];
      if (op === undefined) return left;
      const opTok = this.advance();
      const right = operand();
      left = { type: 'binary_expression', operator: op, left, right, loc: locOf(opTok) };
    }
  }

  private parseUnary(): Expr {
    if (this.check(TokenKind.MINUS)) {
      const opTok = this.advance();
      return { type: 'unary_expression', operator: '-', operand: this.parseUnary(), loc: locOf(opTok) };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();
    while (this.check(TokenKind.LBRACKET)) {
      const open = this.advance();
      const index = this.parseExpression();
      this.expect(TokenKind.RBRACKET, "expected ']' after index");
      expr = { type: 'index_expression', object: expr, index, loc: locOf(open) };
    }
    return expr;
  }

  private parsePrimary(): Expr {
    const tok = this.advance();
    const loc = locOf(tok);

    switch (tok.kind) {
      case TokenKind.INT:
        return { type: 'int_literal', value: Number(tok.value), loc };
      case TokenKind.STRING:
        return { type: 'string_literal', value: String(tok.value), loc };
      case TokenKind.TRUE:
        return { type: 'bool_literal', value: true, loc };
      case TokenKind.FALSE:
        return { type: 'bool_literal', value: false, loc };
      case TokenKind.NONE:
        return { type: 'none_literal', loc };
      case TokenKind.IDENTIFIER:
        if (this.match(TokenKind.LPAREN)) {
          const args = this.parseExpressionList(TokenKind.RPAREN, "expected ')' after arguments");
          return { type: 'call_expression', callee: tok.lexeme, args, loc };
        }
        return { type: 'identifier', name: tok.lexeme, loc };
      case TokenKind.LBRACKET: {
        const elements = this.parseExpressionList(TokenKind.RBRACKET, "expected ']' after list elements");
        return { type: 'list_expression', elements, loc };
      }
      case TokenKind.LPAREN: {
        const inner = this.parseExpression();
        this.expect(TokenKind.RPAREN, "expected ')' after expression");
        return inner;
      }
      default:
        throw this.errorAt(tok, describeUnexpected(tok));
    }
  }

  private parseExpressionList(close: TokenKind, message: string): Expr[] {
    const items: Expr[] = [];
    if (!this.check(close)) {
      do {
        items.push(this.parseExpression());
      } while (this.match(TokenKind.COMMA));
    }
    this.expect(close, message);
    return items;
  }

  /* =========================================================
     Token helpers
     ========================================================= */

  private current(): Token {
    return this.tokens[Math.min(this.idx, this.tokens.length - 1)];
  }

  private advance(): Token {
    const tok = this.current();
    if (this.idx < this.tokens.length - 1) this.idx++;
    return tok;
  }

  private check(kind: TokenKind): boolean {
    return this.current().kind === kind;
  }

  private match(kind: TokenKind): boolean {
    if (!this.check(kind)) return false;
    this.advance();
    return true;
  }

  private expect(kind: TokenKind, message: string): Token {
    if (!this.check(kind)) throw this.errorAt(this.current(), message);
    return this.advance();
  }

  private expectIdentifier(message: string): string {
    return this.expect(TokenKind.IDENTIFIER, message).lexeme;
  }

  private expectEndOfLine(): void {
    if (this.check(TokenKind.EOF) || this.check(TokenKind.DEDENT)) return;
    this.expect(TokenKind.NEWLINE, `unexpected ${describeToken(this.current())} at end of statement`);
  }

  private skipNewlines(): void {
    while (this.match(TokenKind.NEWLINE)) {
      // blank logical lines between declarations
    }
  }

  private errorAt(tok: Token, message: string): MiniPySyntaxError {
    return new MiniPySyntaxError(message, tok.line, tok.column);
  }
}

function locOf(tok: Token): SourceLoc {
  return { line: tok.line, column: tok.column };
}

function describeToken(tok: Token): string {
  switch (tok.kind) {
    case TokenKind.EOF: return 'end of input';
    case TokenKind.NEWLINE: return 'end of line';
    case TokenKind.INDENT: return 'indent';
    case TokenKind.DEDENT: return 'dedent';
    default: return `'${tok.lexeme}'`;
  }
}

function describeUnexpected(tok: Token): string {
  return `unexpected ${describeToken(tok)}`;
}

/**
 * Parse minipy source into a Program, throwing MiniPySyntaxError on the
 * first lexical or grammatical error.
 */
export function parseProgram(source: string): Program {
  return new Parser(tokenize(source)).parseProgram();
}

/**
 * Parse minipy source, reporting errors instead of throwing.
 */
export function parse(source: string): ParseResult {
  try {
    return { program: parseProgram(source), hasErrors: false, errors: [] };
  } catch (e) {
    if (e instanceof MiniPySyntaxError) {
      return {
        program: null,
        hasErrors: true,
        errors: [{ message: e.detail, line: e.line, column: e.column }],
      };
    }
    throw e;
  }
}

/**
 * Parse a single expression (used by the REPL's `:type`).
 */
export function parseExpression(source: string): Expr {
  const program = parseProgram(source);
  const stmts = program.body.type === 'block' ? program.body.body : [program.body];
  const [only] = stmts;
  if (program.defs.length > 0 || stmts.length !== 1 || only.type !== 'expression_statement') {
    throw new MiniPySyntaxError('expected a single expression', 1, 0);
  }
  return only.expression;
}
