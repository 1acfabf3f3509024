/**
 * Built-in functions for the minipy interpreter.
 *
 * Builtins are resolved before the user function table, so a program
 * cannot redefine them.
 */

import { SourceLoc } from './ast';
import { MiniPyValue, mkInt, mkList, typeName } from './values';
import { MiniPyArityError, MiniPyTypeError, MiniPyValueError } from './errors';

export type BuiltinFn = (args: MiniPyValue[], loc?: SourceLoc) => MiniPyValue;

export interface Builtin {
  name: string;
  arity: number;
  fn: BuiltinFn;
}

function checkArity(name: string, arity: number, args: MiniPyValue[], loc?: SourceLoc): void {
  if (args.length !== arity) {
    throw new MiniPyArityError(name, arity, args.length, loc?.line, loc?.column);
  }
}

const len: Builtin = {
  name: 'len',
  arity: 1,
  fn: (args, loc) => {
    checkArity('len', 1, args, loc);
    const [list] = args;
    if (list.kind !== 'list') {
      throw new MiniPyTypeError(`object of type '${typeName(list)}' has no len()`, loc?.line, loc?.column);
    }
    return mkInt(list.elements.length);
  },
};

const range: Builtin = {
  name: 'range',
  arity: 1,
  fn: (args, loc) => {
    checkArity('range', 1, args, loc);
    const [n] = args;
    if (n.kind !== 'int') {
      throw new MiniPyTypeError(`range() argument must be int, not ${typeName(n)}`, loc?.line, loc?.column);
    }
    if (n.value < 0) {
      throw new MiniPyValueError(`range() argument must be non-negative, got ${n.value}`, loc?.line, loc?.column);
    }
    return mkList(Array.from({ length: n.value }, (_, i) => mkInt(i)));
  },
};

export const BUILTINS: ReadonlyMap<string, Builtin> = new Map(
  [len, range].map((b): [string, Builtin] => [b.name, b]),
);

export function isBuiltin(name: string): boolean {
  return BUILTINS.has(name);
}
