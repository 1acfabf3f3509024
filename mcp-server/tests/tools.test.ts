import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  findProjectRoot,
  grammarPath,
  handleExecute,
  handleParse,
  handleValidate,
  listExamples,
  readResource,
  toolResult,
} from '../src/tools';

describe('minipy_validate', () => {
  test('valid code', () => {
    expect(handleValidate({ code: 'print(1)\n' })).toEqual({
      valid: true,
      parseErrors: [],
      lintErrors: [],
      lintWarnings: [],
    });
  });

  test('syntax errors', () => {
    expect(handleValidate({ code: 'print(1' })).toEqual({
      valid: false,
      parseErrors: [{ line: 1, column: 7, message: "expected ')' after print argument" }],
      lintErrors: [],
      lintWarnings: [],
    });
  });

  test('lint errors invalidate, warnings do not', () => {
    const result = handleValidate({ code: 'x = 1\nprint(f())\n' });
    expect(result.valid).toBe(false);
    expect(result.lintErrors).toEqual([
      { rule: 'undefined-function', line: 2, column: 6, message: "Function 'f' is not defined" },
    ]);
    expect(result.lintWarnings).toEqual([
      { rule: 'unused-vars', line: 1, column: 0, message: "Variable 'x' is assigned but never used" },
    ]);
  });
});

describe('minipy_parse', () => {
  test('returns the AST', () => {
    const result = handleParse({ code: 'x = 1' });
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.ast?.body).toEqual({
      type: 'block',
      body: [
        {
          type: 'assignment_statement',
          target: 'x',
          value: { type: 'int_literal', value: 1, loc: { line: 1, column: 4 } },
          loc: { line: 1, column: 0 },
        },
      ],
      loc: { line: 1, column: 0 },
    });
  });

  test('reports errors with a null AST', () => {
    const result = handleParse({ code: 'x = ]' });
    expect(result).toEqual({
      valid: false,
      ast: null,
      errors: [{ line: 1, column: 4, message: "unexpected ']'" }],
    });
  });
});

describe('minipy_execute', () => {
  test('captures printed output', () => {
    expect(handleExecute({ code: 'for i in range(3):\n    print(i * i)\n' })).toEqual({
      success: true,
      output: '0\n1\n4\n',
    });
  });

  test('runtime errors keep the output so far', () => {
    expect(handleExecute({ code: 'print("a")\nprint([1][3])\n' })).toEqual({
      success: false,
      output: 'a\n',
      error: 'IndexError [line 2, col 9]: index 3 out of range for list of length 1',
    });
  });

  test('unbounded recursion is reported as a failed run', () => {
    const result = handleExecute({ code: 'def down(n):\n    return down(n + 1)\nprint("start")\nprint(down(0))\n' });
    expect(result.success).toBe(false);
    expect(result.output).toBe('start\n');
    expect(result.error).toMatch(/maximum recursion depth exceeded$/);
  });

  test('parse errors are reported without running', () => {
    const result = handleExecute({ code: 'print(' });
    expect(result.success).toBe(false);
    expect(result.output).toBe('');
    expect(result.parseErrors).toHaveLength(1);
  });

  test('honours interpreter options', () => {
    const code = 'def f():\n    return g\ng = 4\nprint(f())\n';
    expect(handleExecute({ code, callScope: 'caller' })).toEqual({ success: true, output: '4\n' });
    expect(handleExecute({ code: 'print(True or 1)', eagerOr: true }).error).toBe(
      "TypeError [line 1, col 11]: operand of 'or' must be bool, not 'int'",
    );
  });
});

describe('toolResult', () => {
  test('wraps a value as pretty-printed JSON text', () => {
    expect(toolResult({ ok: true })).toEqual({
      content: [{ type: 'text', text: '{\n  "ok": true\n}' }],
    });
  });
});

describe('resources', () => {
  const repoRoot = path.resolve(__dirname, '../..');

  test('the project root is found from the sources', () => {
    expect(findProjectRoot()).toBe(repoRoot);
  });

  test('the project root is found from a compiled layout', () => {
    const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'minipy-root-'));
    try {
      fs.writeFileSync(path.join(tmp, 'package.json'), JSON.stringify({ name: 'x', workspaces: ['mcp-server'] }));
      const compiled = path.join(tmp, 'dist', 'mcp-server', 'src');
      fs.mkdirSync(compiled, { recursive: true });
      fs.writeFileSync(path.join(tmp, 'dist', 'package.json'), JSON.stringify({ name: 'not-a-root' }));
      expect(findProjectRoot(compiled)).toBe(tmp);
    } finally {
      fs.rmSync(tmp, { recursive: true, force: true });
    }
  });

  test('the grammar resource is read from docs/', () => {
    expect(readResource(grammarPath(repoRoot), repoRoot).startsWith('(* minipy grammar')).toBe(true);
  });

  test('example programs are listed by name', () => {
    expect(listExamples(repoRoot).map((e) => e.name)).toEqual(['bubble-sort', 'fibonacci', 'fizzbuzz', 'pipes']);
  });

  test('a missing resource names its expected path', () => {
    expect(readResource(path.join(repoRoot, 'docs', 'nope.ebnf'), repoRoot)).toBe(
      `(resource not found -- expected at ${path.join('docs', 'nope.ebnf')})`,
    );
  });
});
