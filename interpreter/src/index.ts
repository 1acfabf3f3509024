#!/usr/bin/env node
/**
 * minipy interpreter CLI entry point.
 *
 * Usage: minipy <file.py>
 *        minipy run <file.py>
 *        minipy --eval "<code>"
 *        minipy check <file.py> [...]
 *        minipy ast <file.py>
 *        minipy exec-ast <file.json>
 *        minipy lint <file.py> [...]
 *        minipy repl
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse, parseProgram } from './parser';
import { Interpreter, InterpreterOptions } from './interpreter';
import { MiniPyError } from './errors';
import { loadProgram, serializeProgram } from './program-schema';
import { Program } from './ast';
import { startRepl } from './repl';
import { lintMain } from '../../linter/src/index';

class CliError extends Error {}

/**
 * Run the CLI and return its exit code.
 */
export function main(argv: string[]): number {
  const { options, args } = extractInterpreterOptions(argv);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  try {
    switch (args[0]) {
      case 'check':
        return runCheck(args.slice(1));
      case 'ast':
        return runAst(args.slice(1));
      case 'exec-ast':
        return runProgram(loadProgramFile(requireArg(args, 'exec-ast requires a JSON file argument')), options);
      case 'lint':
        return lintMain(args.slice(1));
      case 'repl':
        startRepl(options);
        return 0; // REPL runs its own event loop
      case '--eval':
      case '-e':
        return runProgram(parseProgram(requireArg(args, '--eval requires a code argument')), options);
      case 'run':
        return runProgram(parseProgram(readFile(requireArg(args, 'run requires a file argument'))), options);
      default:
        // `minipy <file.py>` (shorthand)
        return runProgram(parseProgram(readFile(args[0])), options);
    }
  } catch (e) {
    if (e instanceof MiniPyError || e instanceof CliError) {
      console.error(e instanceof CliError ? `Error: ${e.message}` : e.message);
      return 1;
    }
    throw e;
  }
}

function extractInterpreterOptions(argv: string[]): { options: InterpreterOptions; args: string[] } {
  const options: InterpreterOptions = {};
  const args: string[] = [];
  for (const arg of argv) {
    if (arg === '--caller-scope') options.callScope = 'caller';
    else if (arg === '--eager-or') options.eagerOr = true;
    else args.push(arg);
  }
  return { options, args };
}

function requireArg(args: string[], message: string): string {
  if (args.length < 2) throw new CliError(message);
  return args[1];
}

function runProgram(program: Program, options: InterpreterOptions): number {
  new Interpreter(options).run(program);
  return 0;
}

/**
 * Parse one or more files and report syntax errors.
 * Returns 0 if all files are clean, 1 if any have errors.
 */
function runCheck(files: string[]): number {
  if (files.length === 0) {
    throw new CliError('check requires at least one file argument');
  }

  let hasAnyErrors = false;
  for (const file of files) {
    const result = parse(readFile(file));
    if (result.hasErrors) {
      hasAnyErrors = true;
      const count = result.errors.length;
      console.log(`✗ ${file} — ${count} syntax error${count === 1 ? '' : 's'}`);
      for (const err of result.errors) {
        console.log(`  Line ${err.line}, Col ${err.column}: ${err.message}`);
      }
    } else {
      console.log(`✓ ${file} — no errors`);
    }
  }
  return hasAnyErrors ? 1 : 0;
}

function runAst(args: string[]): number {
  if (args.length === 0) {
    throw new CliError('ast requires a file argument');
  }
  console.log(serializeProgram(parseProgram(readFile(args[0]))));
  return 0;
}

function loadProgramFile(file: string): Program {
  let json: unknown;
  try {
    json = JSON.parse(readFile(file));
  } catch (e) {
    if (e instanceof SyntaxError) throw new CliError(`${file} is not valid JSON: ${e.message}`);
    throw e;
  }
  return loadProgram(json);
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    throw new CliError(`File not found: ${resolved}`);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(): void {
  console.log('minipy v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  minipy <file.py>                   Run a minipy file');
  console.log('  minipy run <file.py>               Run a minipy file');
  console.log('  minipy --eval "<code>"             Evaluate inline code');
  console.log('  minipy check <file.py> [...]       Check files for syntax errors');
  console.log('  minipy ast <file.py>               Print the parsed program as JSON');
  console.log('  minipy exec-ast <file.json>        Validate and run a JSON program');
  console.log('  minipy lint <file.py> [...]        Lint minipy files');
  console.log('  minipy repl                        Start interactive REPL');
  console.log('  minipy --help                      Show this help');
  console.log('');
  console.log('Options:');
  console.log("  --caller-scope   Functions start with a copy of their caller's variables");
  console.log("  --eager-or       Always evaluate both operands of 'or'");
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
