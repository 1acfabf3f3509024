/**
 * End-to-end tests: source text through the parser and the interpreter,
 * with program output captured through the `write` option.
 */

import { parseProgram } from '../src/parser';
import { Interpreter, InterpreterOptions } from '../src/interpreter';
import { Environment } from '../src/environment';
import { mkInt, mkList } from '../src/values';
import {
  MiniPyArityError,
  MiniPyDivisionError,
  MiniPyIndexError,
  MiniPyNameError,
  MiniPyRecursionError,
  MiniPyRuntimeError,
  MiniPyTypeError,
  MiniPyValueError,
} from '../src/errors';

function run(source: string, options: InterpreterOptions = {}): string {
  let output = '';
  const interpreter = new Interpreter({ ...options, write: (text) => { output += text; } });
  interpreter.run(parseProgram(source));
  return output;
}

function lines(...values: string[]): string {
  return values.map((v) => v + '\n').join('');
}

describe('Arithmetic', () => {
  test('integer operators', () => {
    expect(run('print(2 + 3 * 4)\nprint((2 + 3) * 4)\nprint(10 - 15)')).toBe(lines('14', '25', '-5'));
  });

  test('division and modulo truncate toward zero', () => {
    expect(run('print(7 / 2)\nprint(-7 / 2)\nprint(7 // -2)\nprint(-7 % 2)\nprint(7 % -2)')).toBe(
      lines('3', '-3', '-3', '-1', '1'),
    );
  });

  test('division or modulo by zero', () => {
    expect(() => run('print(1 / 0)')).toThrow(MiniPyDivisionError);
    expect(() => run('print(1 % 0)')).toThrow('DivisionError [line 1, col 8]: integer division or modulo by zero');
  });

  test('results wrap to 32 bits', () => {
    expect(run('print(2147483647 + 1)\nprint(65536 * 65536)\nprint(-2147483647 - 2)')).toBe(
      lines('-2147483648', '0', '2147483647'),
    );
  });

  test('unary minus', () => {
    expect(run('x = 5\nprint(-x)\nprint(--x)')).toBe(lines('-5', '5'));
    expect(() => run('print(-"a")')).toThrow("TypeError [line 1, col 6]: bad operand type for unary -: 'str'");
  });

  test('mixed operand types are a TypeError', () => {
    expect(() => run('print(1 + "a")')).toThrow(MiniPyTypeError);
    expect(() => run('print(1 + "a")')).toThrow("unsupported operand type(s) for +: 'int' and 'str'");
    expect(() => run('print(True * 2)')).toThrow("unsupported operand type(s) for *: 'bool' and 'int'");
  });
});

describe('Strings and lists', () => {
  test('string concatenation', () => {
    expect(run('print("foo" + "bar")')).toBe(lines('foobar'));
  });

  test('list concatenation makes a new list', () => {
    const source = [
      'a = [1, 2]',
      'b = [3]',
      'c = a + b',
      'c[0] = 9',
      'print(c)',
      'print(a)',
      'print(len(c) == len(a) + len(b))',
    ].join('\n');
    expect(run(source)).toBe(lines('[9, 2, 3]', '[1, 2]', 'True'));
  });

  test('lists print strings raw', () => {
    expect(run('print(["a", 1, [True, None]])')).toBe(lines('[a, 1, [True, None]]'));
  });

  test('range and len', () => {
    expect(run('r = range(5)\nprint(len(r))\nprint(r[3])\nprint(range(0))')).toBe(lines('5', '3', '[]'));
  });

  test('range with a negative argument', () => {
    expect(() => run('print(range(-2))')).toThrow(MiniPyValueError);
  });

  test('indexing errors', () => {
    expect(() => run('print([1, 2][5])')).toThrow(MiniPyIndexError);
    expect(() => run('print([1, 2][5])')).toThrow('IndexError [line 1, col 12]: index 5 out of range for list of length 2');
    expect(() => run('print([1, 2][-1])')).toThrow(MiniPyIndexError);
    expect(() => run('print([1]["0"])')).toThrow("TypeError [line 1, col 10]: list indices must be integers, not 'str'");
    expect(() => run('x = 3\nprint(x[0])')).toThrow("TypeError [line 2, col 6]: 'int' object is not subscriptable");
  });

  test('index assignment on a non-list', () => {
    expect(() => run('s = "ab"\ns[0] = "c"')).toThrow("'str' object does not support item assignment");
  });

  test('len of a non-list', () => {
    expect(() => run('print(len("abc"))')).toThrow("object of type 'str' has no len()");
  });
});

describe('Comparison and logic', () => {
  test('equality is structural', () => {
    expect(run('print([1, [2]] == [1, [2]])\nprint(1 == "1")\nprint(None != None)')).toBe(
      lines('True', 'False', 'False'),
    );
  });

  test('ordering', () => {
    expect(run('print(1 < 2)\nprint("b" <= "a")\nprint([9] < [1, 1])\nprint([1, 3] > [1, 2])')).toBe(
      lines('True', 'False', 'True', 'True'),
    );
  });

  test('and / or / not', () => {
    expect(run('print(True and False)\nprint(False or True)\nprint(not False)')).toBe(
      lines('False', 'True', 'True'),
    );
  });

  test('and / or short-circuit', () => {
    expect(run('print(False and undefinedVar)\nprint(True or undefinedVar)')).toBe(lines('False', 'True'));
  });

  test('logical operators require bool operands', () => {
    expect(() => run('print(1 and True)')).toThrow("TypeError [line 1, col 8]: operand of 'and' must be bool, not 'int'");
    expect(() => run('print(True and 1)')).toThrow("operand of 'and' must be bool, not 'int'");
    expect(() => run('print(not 0)')).toThrow("operand of 'not' must be bool, not 'int'");
  });

  test('eagerOr evaluates both operands', () => {
    expect(() => run('print(True or undefinedVar)', { eagerOr: true })).toThrow(MiniPyNameError);
    expect(() => run('print(True or 1)', { eagerOr: true })).toThrow("operand of 'or' must be bool, not 'int'");
    expect(run('print(False or True)', { eagerOr: true })).toBe(lines('True'));
  });

  test('default or does not check a skipped right operand', () => {
    expect(run('print(True or 1)')).toBe(lines('True'));
  });
});

describe('Statements', () => {
  test('truthiness selects the branch', () => {
    const source = [
      'for v in [[], [0], 0, "", "a", None]:',
      '    if v:',
      '        print("yes")',
      '    else:',
      '        print("no")',
    ].join('\n');
    expect(run(source)).toBe(lines('no', 'yes', 'no', 'no', 'yes', 'no'));
  });

  test('elif chains', () => {
    const source = [
      'for n in range(3):',
      '    if n == 0:',
      '        print("zero")',
      '    elif n == 1:',
      '        print("one")',
      '    else:',
      '        print("many")',
    ].join('\n');
    expect(run(source)).toBe(lines('zero', 'one', 'many'));
  });

  test('reassignment replaces the binding', () => {
    expect(run('x = 1\nx = "two"\nprint(x)')).toBe(lines('two'));
  });

  test('for prints every element', () => {
    expect(run('for e in [2, 3, 5, 7]:\n    print(e)')).toBe(lines('2', '3', '5', '7'));
  });

  test('for iterates over a snapshot of the list', () => {
    const source = [
      'xs = [1, 2, 3]',
      'for x in xs:',
      '    xs[2] = 100',
      '    print(x)',
      'print(xs)',
    ].join('\n');
    expect(run(source)).toBe(lines('1', '2', '3', '[1, 2, 100]'));
  });

  test('loop variable stays bound after the loop', () => {
    expect(run('for i in range(3):\n    x = i\nprint(i)')).toBe(lines('2'));
  });

  test('for over a non-list', () => {
    expect(() => run('for c in "abc":\n    print(c)')).toThrow("TypeError [line 1, col 9]: 'str' object is not iterable");
  });

  test('undefined variable', () => {
    expect(() => run('print(undefinedVar)')).toThrow(MiniPyNameError);
    expect(() => run('print(undefinedVar)')).toThrow("NameError [line 1, col 6]: undefined variable 'undefinedVar'");
  });

  test('return outside a function', () => {
    expect(() => run('return 1')).toThrow(MiniPyRuntimeError);
    expect(() => run('return 1')).toThrow("RuntimeError [line 1, col 0]: 'return' outside function");
    expect(() => run('if True:\n    return 2')).toThrow("RuntimeError [line 2, col 4]: 'return' outside function");
  });

  test('output written before an error stays written', () => {
    let output = '';
    const interpreter = new Interpreter({ write: (text) => { output += text; } });
    expect(() => interpreter.run(parseProgram('print(1)\nprint(1 / 0)\nprint(2)'))).toThrow(MiniPyDivisionError);
    expect(output).toBe('1\n');
  });

  test('print writes once per statement', () => {
    const writes: string[] = [];
    new Interpreter({ write: (text) => writes.push(text) }).run(parseProgram('print([1, 2])\nprint("x")'));
    expect(writes).toEqual(['[1, 2]\n', 'x\n']);
  });
});

describe('Functions', () => {
  test('call and return', () => {
    expect(run('def f(x):\n    return x + 1\nprint(f(41))')).toBe(lines('42'));
  });

  test('falling off the end returns None', () => {
    expect(run('def f():\n    x = 1\nprint(f())')).toBe(lines('None'));
  });

  test('return exits nested loops', () => {
    const source = [
      'def find(xs, target):',
      '    for i in range(len(xs)):',
      '        if xs[i] == target:',
      '            return i',
      '    return -1',
      'print(find([4, 5, 6], 6))',
      'print(find([4, 5, 6], 7))',
    ].join('\n');
    expect(run(source)).toBe(lines('2', '-1'));
  });

  test('recursion', () => {
    const source = [
      'def fact(n):',
      '    if n <= 1:',
      '        return 1',
      '    return n * fact(n - 1)',
      'print(fact(10))',
    ].join('\n');
    expect(run(source)).toBe(lines('3628800'));
  });

  test('callee writes through a list parameter are seen by the caller', () => {
    const source = [
      'def poke(L):',
      '    L[0] = 9',
      'xs = [1, 2]',
      'poke(xs)',
      'print(xs)',
    ].join('\n');
    expect(run(source)).toBe(lines('[9, 2]'));
  });

  test('rebinding a parameter does not affect the caller', () => {
    const source = [
      'def rebind(x):',
      '    x = 5',
      'x = 1',
      'rebind(x)',
      'print(x)',
    ].join('\n');
    expect(run(source)).toBe(lines('1'));
  });

  test('functions may be defined after their first use', () => {
    expect(run('print(twice(4))\ndef twice(n):\n    return n * 2')).toBe(lines('8'));
  });

  test('the later of two definitions wins', () => {
    expect(run('def f():\n    return 1\ndef f():\n    return 2\nprint(f())')).toBe(lines('2'));
  });

  test('builtins take precedence over user functions', () => {
    expect(run('def len(x):\n    return 99\nprint(len([1]))')).toBe(lines('1'));
  });

  test('undefined function', () => {
    expect(() => run('nope(1)')).toThrow("NameError [line 1, col 0]: undefined function 'nope'");
  });

  test('arity is checked before arguments are evaluated', () => {
    expect(() => run('def f(a, b):\n    return a\nf(1 / 0)')).toThrow(MiniPyArityError);
    expect(() => run('def f(a, b):\n    return a\nf(1)')).toThrow('ArityError [line 3, col 0]: f() takes 2 arguments but 1 was given');
  });

  test('builtin arity is checked before arguments are evaluated', () => {
    expect(() => run('len(1 / 0, 2)')).toThrow(MiniPyArityError);
    expect(() => run('len(1 / 0, 2)')).toThrow('ArityError [line 1, col 0]: len() takes 1 argument but 2 were given');
    expect(() => run('print([1 / 0, 2] | range)')).toThrow('range() takes 1 argument but 2 were given');
  });

  test('unbounded recursion raises a runtime error', () => {
    let output = '';
    const interpreter = new Interpreter({ write: (text) => { output += text; } });
    const program = parseProgram('def down(n):\n    return down(n + 1)\nprint("start")\nprint(down(0))');
    expect(() => interpreter.run(program)).toThrow(MiniPyRecursionError);
    expect(() => interpreter.run(program)).toThrow('maximum recursion depth exceeded');
    expect(output).toBe('start\nstart\n');
  });

  test('printing a list that contains itself raises a runtime error', () => {
    expect(() => run('xs = [0]\nxs[0] = xs\nprint(xs)')).toThrow(MiniPyRecursionError);
  });

  test('arguments are evaluated left to right in the caller', () => {
    const source = [
      'def show(x):',
      '    print(x)',
      '    return x',
      'def pair(a, b):',
      '    return [a, b]',
      'print(pair(show(1), show(2)))',
    ].join('\n');
    expect(run(source)).toBe(lines('1', '2', '[1, 2]'));
  });

  test('callees only see their parameters by default', () => {
    const source = [
      'def peek():',
      '    return secret',
      'secret = 7',
      'print(peek())',
    ].join('\n');
    expect(() => run(source)).toThrow("undefined variable 'secret'");
  });

  test("caller scope copies the caller's bindings", () => {
    const source = [
      'def peek():',
      '    secret = secret + 1',
      '    return secret',
      'secret = 7',
      'print(peek())',
      'print(secret)',
    ].join('\n');
    expect(run(source, { callScope: 'caller' })).toBe(lines('8', '7'));
  });
});

describe('Pipes', () => {
  const defs = [
    'def sum(a, b):',
    '    return a + b',
    'def double(x):',
    '    return x * 2',
    '',
  ].join('\n');

  test('a list display spreads into arguments', () => {
    expect(run(defs + 'print([1, 2] | sum | double)')).toBe(lines('6'));
  });

  test('a non-display input is a single argument', () => {
    expect(run(defs + 'xs = [1, 2, 3]\nprint(xs | len)\nprint(5 | double)')).toBe(lines('3', '10'));
  });

  test('a list-valued variable is not spread', () => {
    expect(() => run(defs + 'xs = [1, 2]\nprint(xs | sum)')).toThrow('sum() takes 2 arguments but 1 was given');
  });
});

describe('Interpreter.run', () => {
  test('uses a supplied environment and returns it', () => {
    const env = new Environment([['xs', mkList([mkInt(1)])]]);
    const interpreter = new Interpreter({ write: () => undefined });
    const result = interpreter.run(parseProgram('n = len(xs)'), env);
    expect(result).toBe(env);
    expect(env.get('n')).toEqual(mkInt(1));
  });

  test('keeps registered functions across runs', () => {
    let output = '';
    const interpreter = new Interpreter({ write: (text) => { output += text; } });
    interpreter.run(parseProgram('def inc(n):\n    return n + 1'));
    interpreter.run(parseProgram('print(inc(1))'));
    expect(output).toBe('2\n');
    expect(interpreter.getFunctions().names()).toEqual(['inc']);
  });
});
