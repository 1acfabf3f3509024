/**
 * minipy REPL — Interactive read-eval-print loop.
 *
 * Usage: minipy repl
 *
 * Features:
 *   - Persistent state across inputs (functions and top-level variables)
 *   - Multi-line input: unclosed brackets, or a line ending in ':' which
 *     continues until a blank line
 *   - Special commands: :help, :quit, :env, :type, :reset
 *   - Errors are printed and the loop continues
 *   - A lone expression prints its value (unless None)
 */

import * as readline from 'readline';
import { parseExpression, parseProgram } from './parser';
import { Interpreter, InterpreterOptions } from './interpreter';
import { Environment } from './environment';
import { MiniPyError, MiniPyRecursionError, isStackOverflow } from './errors';
import { MiniPyValue, typeName, valueToString } from './values';
import { Expr, Program } from './ast';

const VERSION = '0.1.0';

/**
 * State carried between REPL inputs.
 */
export class ReplSession {
  private interpreter: Interpreter;
  private env = new Environment();

  constructor(private readonly options: InterpreterOptions = {}) {
    this.interpreter = new Interpreter(options);
  }

  /**
   * Run one complete input. Returns the value of a lone expression, or
   * null when the input was statements or definitions.
   */
  evaluate(source: string): MiniPyValue | null {
    const program = parseProgram(source);
    const expr = loneExpression(program);
    if (expr !== null) {
      try {
        return this.interpreter.evalNode(expr, this.env);
      } catch (e) {
        if (isStackOverflow(e)) throw new MiniPyRecursionError(expr.loc?.line, expr.loc?.column);
        throw e;
      }
    }
    this.interpreter.run(program, this.env);
    return null;
  }

  typeOf(source: string): string {
    return typeName(this.interpreter.evalNode(parseExpression(source), this.env));
  }

  bindings(): [string, MiniPyValue][] {
    return this.env.entries();
  }

  functionNames(): string[] {
    return this.interpreter.getFunctions().names();
  }

  reset(): void {
    this.interpreter = new Interpreter(this.options);
    this.env = new Environment();
  }
}

function loneExpression(program: Program): Expr | null {
  if (program.defs.length > 0 || program.body.type !== 'block' || program.body.body.length !== 1) {
    return null;
  }
  const [stmt] = program.body.body;
  return stmt.type === 'expression_statement' ? stmt.expression : null;
}

/**
 * Start the minipy REPL.
 */
export function startRepl(options: InterpreterOptions = {}): void {
  const session = new ReplSession(options);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'minipy> ',
    terminal: true,
  });

  console.log(`minipy REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  let buffer = '';
  let blockMode = false;

  rl.prompt();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();
    const continuing = buffer !== '';

    // Handle special commands (only when not in multi-line mode)
    if (!continuing && trimmed.startsWith(':')) {
      handleCommand(trimmed, session, rl);
      rl.prompt();
      return;
    }

    if (continuing && blockMode && trimmed === '') {
      blockMode = false;
    } else {
      buffer += (buffer ? '\n' : '') + line;
      if (endsWithColon(line)) blockMode = true;
      if (blockMode || hasUnclosedDelimiters(buffer)) {
        rl.setPrompt('  ... ');
        rl.prompt();
        return;
      }
    }

    const input = buffer;
    buffer = '';
    rl.setPrompt('minipy> ');

    if (input.trim() === '') {
      rl.prompt();
      return;
    }

    try {
      const value = session.evaluate(input + '\n');
      if (value !== null) printResult(value);
    } catch (e) {
      if (e instanceof MiniPyError) {
        console.error(`  ${e.message}`);
      } else if (e instanceof Error) {
        console.error(`  Error: ${e.message}`);
      } else {
        console.error(`  Unknown error: ${String(e)}`);
      }
    }

    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
    process.exit(0);
  });
}

function endsWithColon(line: string): boolean {
  return stripComment(line).trimEnd().endsWith(':');
}

function stripComment(line: string): string {
  let quote = '';
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = '';
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '#') {
      return line.slice(0, i);
    }
  }
  return line;
}

/**
 * Check whether the input has unclosed ( or [.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let parens = 0;
  let brackets = 0;

  for (const rawLine of input.split('\n')) {
    const line = stripComment(rawLine);
    let quote = '';
    for (let i = 0; i < line.length; i++) {
      const ch = line[i];
      if (quote) {
        if (ch === '\\') i++;
        else if (ch === quote) quote = '';
        continue;
      }
      switch (ch) {
        case '"':
        case "'":
          quote = ch;
          break;
        case '(': parens++; break;
        case ')': parens--; break;
        case '[': brackets++; break;
        case ']': brackets--; break;
      }
    }
  }

  return parens > 0 || brackets > 0;
}

/**
 * Handle a REPL special command.
 */
function handleCommand(cmd: string, session: ReplSession, rl: readline.Interface): void {
  const parts = cmd.split(/\s+/);
  const command = parts[0];

  switch (command) {
    case ':help':
    case ':h':
      console.log('');
      console.log('REPL Commands:');
      console.log('  :help, :h       Show this help message');
      console.log('  :quit, :q       Exit the REPL');
      console.log('  :env            Show variables and functions');
      console.log('  :type <expr>    Show the runtime type of an expression');
      console.log('  :reset          Reset the interpreter state');
      console.log('');
      console.log('Tips:');
      console.log("  - A line ending in ':' starts a block; finish it with a blank line");
      console.log('  - The value of a lone expression is printed automatically');
      console.log('  - Variables and functions persist between inputs');
      console.log('');
      break;

    case ':quit':
    case ':q':
    case ':exit':
      rl.close();
      break;

    case ':env':
      printEnvironment(session);
      break;

    case ':type': {
      const expr = parts.slice(1).join(' ').trim();
      if (!expr) {
        console.log('Usage: :type <expression>');
        break;
      }
      try {
        console.log(session.typeOf(expr));
      } catch (e) {
        console.error(`  ${e instanceof Error ? e.message : String(e)}`);
      }
      break;
    }

    case ':reset':
      session.reset();
      console.log('Interpreter state reset.');
      break;

    default:
      console.log(`Unknown command: ${command}. Type :help for available commands.`);
      break;
  }
}

function printResult(value: MiniPyValue): void {
  if (value.kind === 'none') return;
  console.log(`=> ${valueToString(value)}`);
}

function printEnvironment(session: ReplSession): void {
  const vars = session.bindings();
  const fns = session.functionNames();
  if (vars.length === 0 && fns.length === 0) {
    console.log('  (nothing defined)');
    return;
  }

  console.log('');
  for (const name of fns) {
    console.log(`  def ${name}`);
  }
  for (const [name, value] of vars) {
    const preview = valueToString(value);
    const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
    console.log(`  ${name}: ${typeName(value)} = ${truncated}`);
  }
  console.log('');
}
