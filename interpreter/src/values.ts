/**
 * Runtime value representations for the minipy interpreter.
 */

export type MiniPyValue =
  | { kind: 'none' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'list'; elements: MiniPyValue[] };

export type ValueKind = MiniPyValue['kind'];

export const INT_MIN = -2147483648;
export const INT_MAX = 2147483647;

// ---- Value constructors ----

/**
 * Integers are 32-bit two's complement; anything outside wraps.
 */
export function mkInt(value: number): MiniPyValue {
  return { kind: 'int', value: value | 0 };
}

export function mkString(value: string): MiniPyValue {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): MiniPyValue {
  return { kind: 'bool', value };
}

export function mkNone(): MiniPyValue {
  return { kind: 'none' };
}

/**
 * Build a list value. The element array is sealed: slots can be
 * overwritten but the length is fixed for the life of the list.
 */
export function mkList(elements: MiniPyValue[]): MiniPyValue {
  return { kind: 'list', elements: Object.seal(elements) };
}

// ---- Value utilities ----

export function isTruthy(v: MiniPyValue): boolean {
  switch (v.kind) {
    case 'none': return false;
    case 'bool': return v.value;
    case 'int': return v.value !== 0;
    case 'string': return v.value.length > 0;
    case 'list': return v.elements.length > 0;
  }
}

export function valueToString(v: MiniPyValue): string {
  switch (v.kind) {
    case 'none': return 'None';
    case 'bool': return v.value ? 'True' : 'False';
    case 'int': return String(v.value);
    case 'string': return v.value;
    case 'list': return `[${v.elements.map(valueToString).join(', ')}]`;
  }
}

/**
 * The name a value's type goes by in error messages.
 */
export function typeName(v: MiniPyValue): string {
  switch (v.kind) {
    case 'none': return 'NoneType';
    case 'bool': return 'bool';
    case 'int': return 'int';
    case 'string': return 'str';
    case 'list': return 'list';
  }
}

export function valuesEqual(a: MiniPyValue, b: MiniPyValue): boolean {
  return compareValues(a, b) === 0;
}

const KIND_RANK: Record<ValueKind, number> = {
  none: 0,
  bool: 1,
  int: 2,
  string: 3,
  list: 4,
};

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/**
 * Total order over all values. Mismatched kinds order by kind rank;
 * lists order by length first, then element by element.
 */
export function compareValues(a: MiniPyValue, b: MiniPyValue): number {
  if (a.kind === 'none' && b.kind === 'none') return 0;
  if (a.kind === 'bool' && b.kind === 'bool') return sign(Number(a.value) - Number(b.value));
  if (a.kind === 'int' && b.kind === 'int') return sign(a.value - b.value);
  if (a.kind === 'string' && b.kind === 'string') {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  if (a.kind === 'list' && b.kind === 'list') {
    if (a.elements.length !== b.elements.length) {
      return sign(a.elements.length - b.elements.length);
    }
    for (let i = 0; i < a.elements.length; i++) {
      const c = compareValues(a.elements[i], b.elements[i]);
      if (c !== 0) return c;
    }
    return 0;
  }
  return sign(KIND_RANK[a.kind] - KIND_RANK[b.kind]);
}
