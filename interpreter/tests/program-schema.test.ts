import { loadProgram, serializeProgram } from '../src/program-schema';
import { parseProgram } from '../src/parser';
import { Interpreter } from '../src/interpreter';
import { MiniPySyntaxError } from '../src/errors';

describe('Program interchange', () => {
  test('a parsed program survives serialization', () => {
    const program = parseProgram('def f(a):\n    return [a, a]\nprint(f(3) | len)\n');
    expect(loadProgram(JSON.parse(serializeProgram(program)))).toEqual(program);
  });

  test('programs without source locations are accepted and run', () => {
    const program = loadProgram({
      defs: [],
      body: {
        type: 'block',
        body: [
          { type: 'assignment_statement', target: 'x', value: { type: 'int_literal', value: 20 } },
          {
            type: 'print_statement',
            value: {
              type: 'binary_expression',
              operator: '+',
              left: { type: 'identifier', name: 'x' },
              right: { type: 'int_literal', value: 22 },
            },
          },
        ],
      },
    });
    let output = '';
    new Interpreter({ write: (text) => { output += text; } }).run(program);
    expect(output).toBe('42\n');
  });

  test('rejects an unknown node type', () => {
    expect(() => loadProgram({ defs: [], body: { type: 'while_statement' } })).toThrow(MiniPySyntaxError);
  });

  test('rejects an unknown operator', () => {
    const json = {
      defs: [],
      body: {
        type: 'expression_statement',
        expression: {
          type: 'binary_expression',
          operator: '**',
          left: { type: 'int_literal', value: 1 },
          right: { type: 'int_literal', value: 2 },
        },
      },
    };
    expect(() => loadProgram(json)).toThrow('invalid program: body.expression.operator: unknown binary operator');
  });

  test('rejects integers outside 32 bits', () => {
    const json = {
      defs: [],
      body: { type: 'print_statement', value: { type: 'int_literal', value: 2 ** 31 } },
    };
    expect(() => loadProgram(json)).toThrow('invalid program: body.value.value:');
  });

  test('rejects malformed identifiers', () => {
    const json = {
      defs: [{ name: 'bad name', params: [], body: { type: 'block', body: [] } }],
      body: { type: 'block', body: [] },
    };
    expect(() => loadProgram(json)).toThrow('invalid program: defs.0.name: not a valid identifier');
  });

  test('reports a missing root field', () => {
    expect(() => loadProgram({ defs: [] })).toThrow('invalid program: body:');
  });
});
