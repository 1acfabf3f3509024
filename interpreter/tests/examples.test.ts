import * as fs from 'fs';
import * as path from 'path';
import { parseProgram } from '../src/parser';
import { Interpreter } from '../src/interpreter';

const examplesDir = path.resolve(__dirname, '../../examples');

function runExample(name: string): string {
  let output = '';
  const source = fs.readFileSync(path.join(examplesDir, `${name}.py`), 'utf-8');
  new Interpreter({ write: (text) => { output += text; } }).run(parseProgram(source));
  return output;
}

describe('Example programs', () => {
  test('fibonacci', () => {
    expect(runExample('fibonacci')).toBe('[0, 1, 1, 2, 3, 5, 8, 13, 21, 34, 55, 89]\n');
  });

  test('pipes', () => {
    expect(runExample('pipes')).toBe('6\nhello, world\n5\n');
  });

  test('bubble-sort', () => {
    expect(runExample('bubble-sort')).toBe('[1, 2, 3, 5, 8, 9]\n');
  });

  test('fizzbuzz', () => {
    expect(runExample('fizzbuzz').split('\n')).toEqual([
      '1', '2', 'Fizz', '4', 'Buzz', 'Fizz', '7', '8', 'Fizz', 'Buzz', '11', 'Fizz', '13', '14', 'FizzBuzz', '',
    ]);
  });
});
