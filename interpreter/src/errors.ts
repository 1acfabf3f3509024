/**
 * Runtime error types for the minipy interpreter.
 */

import type { MiniPyValue } from './values';
import type { SourceLoc } from './ast';

function formatLoc(line?: number, column?: number): string {
  return line !== undefined ? ` [line ${line}, col ${column ?? 0}]` : '';
}

export class MiniPyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MiniPyError';
  }
}

export class MiniPyRuntimeError extends MiniPyError {
  public readonly line: number | undefined;
  public readonly column: number | undefined;

  constructor(message: string, line?: number, column?: number, kind = 'RuntimeError') {
    super(`${kind}${formatLoc(line, column)}: ${message}`);
    this.name = 'MiniPyRuntimeError';
    this.line = line;
    this.column = column;
  }
}

export class MiniPyTypeError extends MiniPyError {
  constructor(message: string, line?: number, column?: number) {
    super(`TypeError${formatLoc(line, column)}: ${message}`);
    this.name = 'MiniPyTypeError';
  }
}

export class MiniPyNameError extends MiniPyError {
  public readonly identifier: string;

  constructor(name: string, line?: number, column?: number, what: 'variable' | 'function' = 'variable') {
    super(`NameError${formatLoc(line, column)}: undefined ${what} '${name}'`);
    this.name = 'MiniPyNameError';
    this.identifier = name;
  }
}

export class MiniPyArityError extends MiniPyError {
  constructor(callee: string, expected: number, received: number, line?: number, column?: number) {
    const plural = expected === 1 ? '' : 's';
    const verb = received === 1 ? 'was' : 'were';
    super(`ArityError${formatLoc(line, column)}: ${callee}() takes ${expected} argument${plural} but ${received} ${verb} given`);
    this.name = 'MiniPyArityError';
  }
}

export class MiniPyIndexError extends MiniPyError {
  constructor(index: number, length: number, line?: number, column?: number) {
    super(`IndexError${formatLoc(line, column)}: index ${index} out of range for list of length ${length}`);
    this.name = 'MiniPyIndexError';
  }
}

export class MiniPyDivisionError extends MiniPyRuntimeError {
  constructor(line?: number, column?: number) {
    super('integer division or modulo by zero', line, column, 'DivisionError');
    this.name = 'MiniPyDivisionError';
  }
}

/**
 * Raised in place of the host's stack overflow when calls (or printing
 * and comparing a list that contains itself) nest too deeply.
 */
export class MiniPyRecursionError extends MiniPyRuntimeError {
  constructor(line?: number, column?: number) {
    super('maximum recursion depth exceeded', line, column);
    this.name = 'MiniPyRecursionError';
  }
}

export function isStackOverflow(e: unknown): e is RangeError {
  return e instanceof RangeError && /call stack/i.test(e.message);
}

export class MiniPyValueError extends MiniPyError {
  constructor(message: string, line?: number, column?: number) {
    super(`ValueError${formatLoc(line, column)}: ${message}`);
    this.name = 'MiniPyValueError';
  }
}

export class MiniPySyntaxError extends MiniPyError {
  public readonly line: number;
  public readonly column: number;
  public readonly detail: string;

  constructor(message: string, line: number, column: number) {
    super(`SyntaxError${formatLoc(line, column)}: ${message}`);
    this.name = 'MiniPySyntaxError';
    this.line = line;
    this.column = column;
    this.detail = message;
  }
}

/**
 * Signal thrown to implement return statements.
 * This is NOT an error -- it's a control flow mechanism.
 */
export class ReturnSignal {
  public readonly value: MiniPyValue;
  /** Position of the `return` statement, for the top-level error */
  public readonly loc: SourceLoc | undefined;

  constructor(value: MiniPyValue, loc?: SourceLoc) {
    this.value = value;
    this.loc = loc;
  }
}
