/**
 * Tool handlers for the minipy MCP server.
 *
 * Each handler takes the validated tool arguments and returns a plain
 * result object; `toolResult` wraps it as MCP text content.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parse } from '../../interpreter/src/parser';
import { Interpreter, CallScope } from '../../interpreter/src/interpreter';
import { MiniPyError } from '../../interpreter/src/errors';
import { Program } from '../../interpreter/src/ast';
import { createDefaultLinter } from '../../linter/src/linter';

export interface Location {
  line: number;
  column: number;
  message: string;
}

export interface ValidateResult {
  valid: boolean;
  parseErrors: Location[];
  lintErrors: (Location & { rule: string })[];
  lintWarnings: (Location & { rule: string })[];
}

export interface ParseResultPayload {
  valid: boolean;
  ast: Program | null;
  errors: Location[];
}

export interface ExecuteResult {
  success: boolean;
  output: string;
  error?: string;
  parseErrors?: Location[];
}

export interface ExecuteArgs {
  code: string;
  callScope?: CallScope;
  eagerOr?: boolean;
}

export function handleValidate(args: { code: string }): ValidateResult {
  const result = parse(args.code);
  const parseErrors = result.errors.map(toLocation);
  if (result.program === null) {
    return { valid: false, parseErrors, lintErrors: [], lintWarnings: [] };
  }

  const diagnostics = createDefaultLinter().lintProgram(result.program);
  const toEntry = (d: { rule: string; line: number; column: number; message: string }) => ({
    rule: d.rule,
    line: d.line,
    column: d.column,
    message: d.message,
  });
  const lintErrors = diagnostics.filter((d) => d.severity === 'error').map(toEntry);
  const lintWarnings = diagnostics.filter((d) => d.severity !== 'error').map(toEntry);

  return { valid: lintErrors.length === 0, parseErrors, lintErrors, lintWarnings };
}

export function handleParse(args: { code: string }): ParseResultPayload {
  const result = parse(args.code);
  return {
    valid: !result.hasErrors,
    ast: result.program,
    errors: result.errors.map(toLocation),
  };
}

export function handleExecute(args: ExecuteArgs): ExecuteResult {
  const result = parse(args.code);
  if (result.program === null) {
    return {
      success: false,
      output: '',
      error: 'Parse error',
      parseErrors: result.errors.map(toLocation),
    };
  }

  const chunks: string[] = [];
  const interpreter = new Interpreter({
    callScope: args.callScope,
    eagerOr: args.eagerOr,
    write: (text) => chunks.push(text),
  });

  try {
    interpreter.run(result.program);
    return { success: true, output: chunks.join('') };
  } catch (e) {
    if (e instanceof MiniPyError) {
      return { success: false, output: chunks.join(''), error: e.message };
    }
    throw e;
  }
}

/**
 * Wrap a handler result as MCP tool output.
 */
export function toolResult(value: unknown): { content: { type: 'text'; text: string }[] } {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  };
}

function toLocation(err: { line: number; column: number; message: string }): Location {
  return { line: err.line, column: err.column, message: err.message };
}

// -- Resources ---------------------------------------------------------------

const workspaceManifest = z.object({ workspaces: z.array(z.string()) });

/**
 * Find the repository root: the nearest directory above `start` whose
 * package.json declares workspaces. Works from the sources and from
 * the compiled tree under dist/.
 */
export function findProjectRoot(start: string = __dirname): string {
  let dir = path.resolve(start);
  for (;;) {
    const manifest = path.join(dir, 'package.json');
    if (fs.existsSync(manifest) && isWorkspaceRoot(fs.readFileSync(manifest, 'utf-8'))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No workspace package.json found above ${start}`);
    }
    dir = parent;
  }
}

function isWorkspaceRoot(text: string): boolean {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    if (e instanceof SyntaxError) return false;
    throw e;
  }
  return workspaceManifest.safeParse(json).success;
}

export function grammarPath(root: string): string {
  return path.join(root, 'docs', 'grammar.ebnf');
}

export interface ExampleFile {
  name: string;
  path: string;
}

/**
 * The `.py` programs under examples/, sorted by name.
 */
export function listExamples(root: string): ExampleFile[] {
  const dir = path.join(root, 'examples');
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.py'))
    .sort()
    .map((f) => ({ name: f.replace(/\.py$/, ''), path: path.join(dir, f) }));
}

export function readResource(filePath: string, root: string): string {
  if (!fs.existsSync(filePath)) {
    return `(resource not found -- expected at ${path.relative(root, filePath)})`;
  }
  return fs.readFileSync(filePath, 'utf-8');
}
