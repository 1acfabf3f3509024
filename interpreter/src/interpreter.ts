/**
 * Tree-walking interpreter for the minipy language.
 *
 * Expressions reduce to values through `evalNode`; statements run for
 * effect through `execStatement`. The two meet only at function calls,
 * where the callee body is executed and its `ReturnSignal` caught.
 */

import { Environment } from './environment';
import {
  BinaryOperator,
  Expr,
  FunctionDef,
  Program,
  SourceLoc,
  Stmt,
  UnaryOperator,
  pipeArguments,
} from './ast';
import {
  MiniPyValue,
  mkInt,
  mkString,
  mkBool,
  mkNone,
  mkList,
  isTruthy,
  valueToString,
  valuesEqual,
  compareValues,
  typeName,
} from './values';
import {
  MiniPyRuntimeError,
  MiniPyTypeError,
  MiniPyNameError,
  MiniPyArityError,
  MiniPyIndexError,
  MiniPyDivisionError,
  MiniPyRecursionError,
  ReturnSignal,
  isStackOverflow,
} from './errors';
import { FunctionTable } from './functions';
import { BUILTINS } from './builtins';

/**
 * How a callee's environment is initialised.
 *  - `parameters`: only the bound parameters are visible
 *  - `caller`: a copy of the caller's bindings, then the parameters
 */
export type CallScope = 'parameters' | 'caller';

export interface InterpreterOptions {
  callScope?: CallScope;
  /** Evaluate both operands of `or` before combining them. */
  eagerOr?: boolean;
  /** Receives program output; one call per `print`. */
  write?: (text: string) => void;
}

export class Interpreter {
  private readonly functions = new FunctionTable();
  private readonly callScope: CallScope;
  private readonly eagerOr: boolean;
  private readonly write: (text: string) => void;

  constructor(options: InterpreterOptions = {}) {
    this.callScope = options.callScope ?? 'parameters';
    this.eagerOr = options.eagerOr ?? false;
    this.write = options.write ?? ((text) => { process.stdout.write(text); });
  }

  /**
   * Register the program's functions, then execute its top-level
   * statement. A fresh environment is used unless one is given (the
   * REPL keeps its own between inputs).
   */
  run(program: Program, env: Environment = new Environment()): Environment {
    this.functions.registerAll(program.defs);
    try {
      this.execStatement(program.body, env);
    } catch (e) {
      if (e instanceof ReturnSignal) {
        throw new MiniPyRuntimeError("'return' outside function", e.loc?.line, e.loc?.column);
      }
      if (isStackOverflow(e)) throw new MiniPyRecursionError();
      throw e;
    }
    return env;
  }

  getFunctions(): FunctionTable {
    return this.functions;
  }

  // ==================================================================
  // Statements
  // ==================================================================

  execStatement(node: Stmt, env: Environment): void {
    switch (node.type) {
      case 'expression_statement':
        this.evalNode(node.expression, env);
        return;
      case 'print_statement':
        this.write(valueToString(this.evalNode(node.value, env)) + '\n');
        return;
      case 'block':
        for (const stmt of node.body) this.execStatement(stmt, env);
        return;
      case 'if_statement':
        if (isTruthy(this.evalNode(node.condition, env))) {
          this.execStatement(node.consequence, env);
        } else {
          this.execStatement(node.alternative, env);
        }
        return;
      case 'assignment_statement':
        env.set(node.target, this.evalNode(node.value, env));
        return;
      case 'index_assignment_statement':
        this.execIndexAssignment(node.object, node.index, node.value, env, node.loc);
        return;
      case 'return_statement':
        throw new ReturnSignal(this.evalNode(node.value, env), node.loc);
      case 'for_statement':
        this.execFor(node.variable, node.iterable, node.body, env);
        return;
    }
  }

  private execFor(variable: string, iterableNode: Expr, body: Stmt, env: Environment): void {
    const iterable = this.evalNode(iterableNode, env);
    if (iterable.kind !== 'list') {
      throw new MiniPyTypeError(
        `'${typeName(iterable)}' object is not iterable`,
        iterableNode.loc?.line,
        iterableNode.loc?.column,
      );
    }
    // Elements are fixed when the loop starts.
    const elements = [...iterable.elements];
    for (const element of elements) {
      env.set(variable, element);
      this.execStatement(body, env);
    }
  }

  private execIndexAssignment(
    objectNode: Expr,
    indexNode: Expr,
    valueNode: Expr,
    env: Environment,
    loc?: SourceLoc,
  ): void {
    const obj = this.evalNode(objectNode, env);
    const idx = this.evalNode(indexNode, env);
    const value = this.evalNode(valueNode, env);
    const elements = this.checkedList(obj, objectNode, 'does not support item assignment');
    elements[this.checkedIndex(idx, elements.length, indexNode, loc)] = value;
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  /**
   * Main dispatch: evaluate any expression node.
   */
  evalNode(node: Expr, env: Environment): MiniPyValue {
    switch (node.type) {
      case 'none_literal':
        return mkNone();
      case 'bool_literal':
        return mkBool(node.value);
      case 'int_literal':
        return mkInt(node.value);
      case 'string_literal':
        return mkString(node.value);
      case 'identifier':
        if (!env.has(node.name)) {
          throw new MiniPyNameError(node.name, node.loc?.line, node.loc?.column);
        }
        return env.get(node.name);
      case 'binary_expression':
        return this.evalBinaryExpression(node.operator, node.left, node.right, env, node.loc);
      case 'unary_expression':
        return this.evalUnaryExpression(node.operator, node.operand, env, node.loc);
      case 'call_expression':
        return this.callFunction(node.callee, node.args, env, node.loc);
      case 'pipe_expression':
        return this.callFunction(node.callee, pipeArguments(node.input), env, node.loc);
      case 'list_expression':
        return mkList(node.elements.map((e) => this.evalNode(e, env)));
      case 'index_expression':
        return this.evalIndexExpression(node.object, node.index, env, node.loc);
    }
  }

  private evalBinaryExpression(
    op: BinaryOperator,
    leftNode: Expr,
    rightNode: Expr,
    env: Environment,
    loc?: SourceLoc,
  ): MiniPyValue {
    if (op === 'and') {
      const left = this.expectBool(this.evalNode(leftNode, env), op, loc);
      if (!left) return mkBool(false);
      return mkBool(this.expectBool(this.evalNode(rightNode, env), op, loc));
    }
    if (op === 'or') {
      if (this.eagerOr) {
        const left = this.evalNode(leftNode, env);
        const right = this.evalNode(rightNode, env);
        const l = this.expectBool(left, op, loc);
        const r = this.expectBool(right, op, loc);
        return mkBool(l || r);
      }
      const left = this.expectBool(this.evalNode(leftNode, env), op, loc);
      if (left) return mkBool(true);
      return mkBool(this.expectBool(this.evalNode(rightNode, env), op, loc));
    }

    const left = this.evalNode(leftNode, env);
    const right = this.evalNode(rightNode, env);

    switch (op) {
      case '+':
        return this.evalAdd(left, right, loc);
      case '-':
        return this.evalArith(op, left, right, (a, b) => a - b, loc);
      case '*':
        return this.evalArith(op, left, right, Math.imul, loc);
      case '/':
        return this.evalArith(op, left, right, (a, b) => {
          if (b === 0) throw new MiniPyDivisionError(loc?.line, loc?.column);
          return Math.trunc(a / b);
        }, loc);
      case '%':
        return this.evalArith(op, left, right, (a, b) => {
          if (b === 0) throw new MiniPyDivisionError(loc?.line, loc?.column);
          return a % b;
        }, loc);
      case '==': return mkBool(valuesEqual(left, right));
      case '!=': return mkBool(!valuesEqual(left, right));
      case '<': return mkBool(compareValues(left, right) < 0);
      case '<=': return mkBool(compareValues(left, right) <= 0);
      case '>': return mkBool(compareValues(left, right) > 0);
      case '>=': return mkBool(compareValues(left, right) >= 0);
    }
  }

  private evalAdd(left: MiniPyValue, right: MiniPyValue, loc?: SourceLoc): MiniPyValue {
    if (left.kind === 'string' && right.kind === 'string') {
      return mkString(left.value + right.value);
    }
    if (left.kind === 'list' && right.kind === 'list') {
      return mkList([...left.elements, ...right.elements]);
    }
    return this.evalArith('+', left, right, (a, b) => a + b, loc);
  }

  private evalArith(
    op: string,
    left: MiniPyValue,
    right: MiniPyValue,
    fn: (a: number, b: number) => number,
    loc?: SourceLoc,
  ): MiniPyValue {
    if (left.kind !== 'int' || right.kind !== 'int') {
      throw new MiniPyTypeError(
        `unsupported operand type(s) for ${op}: '${typeName(left)}' and '${typeName(right)}'`,
        loc?.line,
        loc?.column,
      );
    }
    return mkInt(fn(left.value, right.value));
  }

  private evalUnaryExpression(
    op: UnaryOperator,
    operandNode: Expr,
    env: Environment,
    loc?: SourceLoc,
  ): MiniPyValue {
    const operand = this.evalNode(operandNode, env);
    if (op === 'not') {
      return mkBool(!this.expectBool(operand, op, loc));
    }
    if (operand.kind !== 'int') {
      throw new MiniPyTypeError(`bad operand type for unary -: '${typeName(operand)}'`, loc?.line, loc?.column);
    }
    return mkInt(-operand.value);
  }

  private evalIndexExpression(objectNode: Expr, indexNode: Expr, env: Environment, loc?: SourceLoc): MiniPyValue {
    const obj = this.evalNode(objectNode, env);
    const idx = this.evalNode(indexNode, env);
    const elements = this.checkedList(obj, objectNode, 'is not subscriptable');
    return elements[this.checkedIndex(idx, elements.length, indexNode, loc)];
  }

  // ==================================================================
  // Calls
  // ==================================================================

  private callFunction(name: string, argNodes: Expr[], env: Environment, loc?: SourceLoc): MiniPyValue {
    const builtin = BUILTINS.get(name);
    if (builtin !== undefined) {
      if (builtin.arity !== argNodes.length) {
        throw new MiniPyArityError(name, builtin.arity, argNodes.length, loc?.line, loc?.column);
      }
      return builtin.fn(argNodes.map((a) => this.evalNode(a, env)), loc);
    }

    const fn = this.functions.lookup(name, loc);
    if (fn.params.length !== argNodes.length) {
      throw new MiniPyArityError(name, fn.params.length, argNodes.length, loc?.line, loc?.column);
    }
    const callEnv = this.callScope === 'caller' ? env.copy() : new Environment();
    fn.params.forEach((param, i) => {
      callEnv.set(param, this.evalNode(argNodes[i], env));
    });
    return this.invoke(fn, callEnv, loc);
  }

  private invoke(fn: FunctionDef, callEnv: Environment, loc?: SourceLoc): MiniPyValue {
    try {
      this.execStatement(fn.body, callEnv);
    } catch (e) {
      if (e instanceof ReturnSignal) return e.value;
      if (isStackOverflow(e)) throw new MiniPyRecursionError(loc?.line, loc?.column);
      throw e;
    }
    return mkNone();
  }

  // ==================================================================
  // Helpers
  // ==================================================================

  private expectBool(v: MiniPyValue, op: string, loc?: SourceLoc): boolean {
    if (v.kind !== 'bool') {
      throw new MiniPyTypeError(`operand of '${op}' must be bool, not '${typeName(v)}'`, loc?.line, loc?.column);
    }
    return v.value;
  }

  private checkedList(obj: MiniPyValue, node: Expr, what: string): MiniPyValue[] {
    if (obj.kind !== 'list') {
      throw new MiniPyTypeError(`'${typeName(obj)}' object ${what}`, node.loc?.line, node.loc?.column);
    }
    return obj.elements;
  }

  private checkedIndex(idx: MiniPyValue, length: number, node: Expr, loc?: SourceLoc): number {
    if (idx.kind !== 'int') {
      throw new MiniPyTypeError(
        `list indices must be integers, not '${typeName(idx)}'`,
        node.loc?.line,
        node.loc?.column,
      );
    }
    if (idx.value < 0 || idx.value >= length) {
      throw new MiniPyIndexError(idx.value, length, loc?.line, loc?.column);
    }
    return idx.value;
  }
}
