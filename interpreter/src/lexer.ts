// interpreter/src/lexer.ts
//
// minipy Lexer
// ------------
// Converts source text into a token stream. Indentation is significant:
// a deeper indent opens a block (INDENT), a return to an enclosing level
// closes one or more (DEDENT).
//
// Notes:
// - `#` starts a comment running to the end of the line.
// - Blank and comment-only lines never produce NEWLINE/INDENT/DEDENT.
// - Inside ( ) and [ ] newlines and indentation are ignored.
// - Tabs advance the indentation column to the next multiple of 8.

import { INT_MAX } from './values';
import { MiniPySyntaxError } from './errors';

/* =========================================================
   Token Kinds
   ========================================================= */

export enum TokenKind {
  EOF = 'EOF',
  NEWLINE = 'NEWLINE',
  INDENT = 'INDENT',
  DEDENT = 'DEDENT',

  IDENTIFIER = 'IDENTIFIER',
  INT = 'INT',
  STRING = 'STRING',

  KW_DEF = 'KW_DEF',
  KW_IF = 'KW_IF',
  KW_ELIF = 'KW_ELIF',
  KW_ELSE = 'KW_ELSE',
  KW_FOR = 'KW_FOR',
  KW_IN = 'KW_IN',
  KW_RETURN = 'KW_RETURN',
  KW_PRINT = 'KW_PRINT',
  KW_AND = 'KW_AND',
  KW_OR = 'KW_OR',
  KW_NOT = 'KW_NOT',
  TRUE = 'TRUE',
  FALSE = 'FALSE',
  NONE = 'NONE',

  PLUS = 'PLUS',
  MINUS = 'MINUS',
  STAR = 'STAR',
  SLASH = 'SLASH',
  PERCENT = 'PERCENT',
  EQ = 'EQ',
  NEQ = 'NEQ',
  LT = 'LT',
  LTE = 'LTE',
  GT = 'GT',
  GTE = 'GTE',
  ASSIGN = 'ASSIGN',
  PIPE = 'PIPE',

  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  LBRACKET = 'LBRACKET',
  RBRACKET = 'RBRACKET',
  COMMA = 'COMMA',
  COLON = 'COLON',
}

export interface Token {
  kind: TokenKind;
  lexeme: string;
  /** Decoded value for INT and STRING tokens */
  value?: number | string;
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

const KEYWORDS: Record<string, TokenKind> = {
  def: TokenKind.KW_DEF,
  if: TokenKind.KW_IF,
  elif: TokenKind.KW_ELIF,
  else: TokenKind.KW_ELSE,
  for: TokenKind.KW_FOR,
  in: TokenKind.KW_IN,
  return: TokenKind.KW_RETURN,
  print: TokenKind.KW_PRINT,
  and: TokenKind.KW_AND,
  or: TokenKind.KW_OR,
  not: TokenKind.KW_NOT,
  True: TokenKind.TRUE,
  False: TokenKind.FALSE,
  None: TokenKind.NONE,
};

// Longest operators first.
const OPERATORS: Array<[string, TokenKind]> = [
  ['//', TokenKind.SLASH],
  ['==', TokenKind.EQ],
  ['!=', TokenKind.NEQ],
  ['<=', TokenKind.LTE],
  ['>=', TokenKind.GTE],
  ['+', TokenKind.PLUS],
  ['-', TokenKind.MINUS],
  ['*', TokenKind.STAR],
  ['/', TokenKind.SLASH],
  ['%', TokenKind.PERCENT],
  ['<', TokenKind.LT],
  ['>', TokenKind.GT],
  ['=', TokenKind.ASSIGN],
  ['|', TokenKind.PIPE],
  ['(', TokenKind.LPAREN],
  [')', TokenKind.RPAREN],
  ['[', TokenKind.LBRACKET],
  [']', TokenKind.RBRACKET],
  [',', TokenKind.COMMA],
  [':', TokenKind.COLON],
];

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  '\\': '\\',
  '"': '"',
  "'": "'",
};

/* =========================================================
   Core Lexer
   ========================================================= */

export class Lexer {
  private readonly src: string;

  private i = 0;
  private line = 1;
  private col = 0;

  private tokens: Token[] = [];
  private indents: number[] = [0];
  private depth = 0; // open ( and [
  private atLineStart = true;

  constructor(source: string) {
    this.src = source;
  }

  public lex(): Token[] {
    while (!this.isEOF()) {
      if (this.atLineStart && this.depth === 0) {
        if (this.lexIndentation()) continue;
      }

      const c = this.peek();

      if (c === '\n') {
        this.lexNewline();
        continue;
      }
      if (c === '\r' || c === ' ' || c === '\t') {
        this.advance();
        continue;
      }
      if (c === '#') {
        this.skipComment();
        continue;
      }
      if (c === '"' || c === "'") {
        this.lexString(c);
        continue;
      }
      if (isDigit(c)) {
        this.lexNumber();
        continue;
      }
      if (isIdentStart(c)) {
        this.lexIdentifierOrKeyword();
        continue;
      }
      if (this.lexOperator()) continue;

      throw this.error(`unexpected character '${c}'`);
    }

    if (!this.atLineStart) {
      this.emit(TokenKind.NEWLINE, '');
    }
    while (this.indents.length > 1) {
      this.indents.pop();
      this.emit(TokenKind.DEDENT, '');
    }
    this.emit(TokenKind.EOF, '');
    return this.tokens;
  }

  /* =========================================================
     Basics
     ========================================================= */

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private peek(ahead = 0): string {
    const idx = this.i + ahead;
    if (idx >= this.src.length) return '\0';
    return this.src[idx];
  }

  private advance(): string {
    const c = this.peek();
    this.i++;
    if (c === '\n') {
      this.line++;
      this.col = 0;
    } else {
      this.col++;
    }
    return c;
  }

  private emit(kind: TokenKind, lexeme: string, value?: number | string, line = this.line, column = this.col): void {
    this.tokens.push({ kind, lexeme, value, line, column });
  }

  private error(message: string, line = this.line, column = this.col): MiniPySyntaxError {
    return new MiniPySyntaxError(message, line, column);
  }

  /* =========================================================
     Layout
     ========================================================= */

  /**
   * Measure the indentation of a new logical line and emit INDENT or
   * DEDENT tokens. Returns true when the line turned out to be blank
   * (or comment-only) and was consumed entirely.
   */
  private lexIndentation(): boolean {
    let width = 0;
    while (this.peek() === ' ' || this.peek() === '\t' || this.peek() === '\r') {
      const c = this.advance();
      if (c === ' ') width++;
      else if (c === '\t') width = (Math.floor(width / 8) + 1) * 8;
    }

    const c = this.peek();
    if (c === '#') {
      this.skipComment();
    }
    if (this.peek() === '\n') {
      this.advance();
      return true;
    }
    if (this.isEOF()) return true;

    this.atLineStart = false;
    const current = this.indents[this.indents.length - 1];
    if (width > current) {
      this.indents.push(width);
      this.emit(TokenKind.INDENT, '');
    } else if (width < current) {
      while (width < this.indents[this.indents.length - 1]) {
        this.indents.pop();
        this.emit(TokenKind.DEDENT, '');
      }
      if (width !== this.indents[this.indents.length - 1]) {
        throw this.error('unindent does not match any outer indentation level');
      }
    }
    return false;
  }

  private lexNewline(): void {
    const line = this.line;
    const column = this.col;
    this.advance();
    if (this.depth > 0) return;
    this.emit(TokenKind.NEWLINE, '\n', undefined, line, column);
    this.atLineStart = true;
  }

  private skipComment(): void {
    while (!this.isEOF() && this.peek() !== '\n') this.advance();
  }

  /* =========================================================
     Literals and words
     ========================================================= */

  private lexString(quote: string): void {
    const line = this.line;
    const column = this.col;
    const start = this.i;
    this.advance();
    let value = '';
    while (true) {
      if (this.isEOF() || this.peek() === '\n') {
        throw this.error('unterminated string literal', line, column);
      }
      const c = this.advance();
      if (c === quote) break;
      if (c === '\\') {
        const e = this.advance();
        const decoded = ESCAPES[e];
        if (decoded === undefined) {
          throw this.error(`invalid escape sequence '\\${e}'`);
        }
        value += decoded;
        continue;
      }
      value += c;
    }
    this.emit(TokenKind.STRING, this.src.slice(start, this.i), value, line, column);
  }

  private lexNumber(): void {
    const line = this.line;
    const column = this.col;
    const start = this.i;
    while (isDigit(this.peek())) this.advance();
    if (isIdentStart(this.peek())) {
      throw this.error(`invalid decimal literal`, line, column);
    }
    const raw = this.src.slice(start, this.i);
    const value = Number(raw);
    if (value > INT_MAX) {
      throw this.error(`integer literal ${raw} is out of range`, line, column);
    }
    this.emit(TokenKind.INT, raw, value, line, column);
  }

  private lexIdentifierOrKeyword(): void {
    const line = this.line;
    const column = this.col;
    const start = this.i;
    while (isIdentPart(this.peek())) this.advance();
    const word = this.src.slice(start, this.i);
    const keyword = Object.prototype.hasOwnProperty.call(KEYWORDS, word) ? KEYWORDS[word] : undefined;
    if (keyword !== undefined) {
      this.emit(keyword, word, undefined, line, column);
    } else {
      this.emit(TokenKind.IDENTIFIER, word, word, line, column);
    }
  }

  private lexOperator(): boolean {
    for (const [text, kind] of OPERATORS) {
      if (this.src.startsWith(text, this.i)) {
        const line = this.line;
        const column = this.col;
        for (let k = 0; k < text.length; k++) this.advance();
        if (kind === TokenKind.LPAREN || kind === TokenKind.LBRACKET) this.depth++;
        if ((kind === TokenKind.RPAREN || kind === TokenKind.RBRACKET) && this.depth > 0) this.depth--;
        this.emit(kind, text, undefined, line, column);
        return true;
      }
    }
    return false;
  }
}

/* =========================================================
   Helpers
   ========================================================= */

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isIdentStart(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
}

function isIdentPart(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}

/**
 * Tokenize minipy source text.
 */
export function tokenize(source: string): Token[] {
  return new Lexer(source).lex();
}
