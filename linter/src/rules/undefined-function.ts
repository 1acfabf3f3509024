/**
 * Lint rule: undefined-function
 *
 * Flags calls and pipes whose callee is neither a builtin nor defined
 * anywhere in the program.
 */

import { Expr, Program, walkStatement } from '../../../interpreter/src/ast';
import { isBuiltin } from '../../../interpreter/src/builtins';
import { Diagnostic, LintRule, diagnosticAt } from '../diagnostics';

/**
 * Every call site in the program, function bodies first.
 */
export function collectCalls(program: Program): Extract<Expr, { callee: string }>[] {
  const calls: Extract<Expr, { callee: string }>[] = [];
  const visit = (e: Expr): void => {
    if (e.type === 'call_expression' || e.type === 'pipe_expression') calls.push(e);
  };
  for (const def of program.defs) walkStatement(def.body, { expression: visit });
  walkStatement(program.body, { expression: visit });
  return calls;
}

export const undefinedFunctionRule: LintRule = {
  name: 'undefined-function',
  description: 'Calls to functions that are never defined',
  severity: 'error',

  run(program: Program): Diagnostic[] {
    const defined = new Set(program.defs.map((d) => d.name));
    return collectCalls(program)
      .filter((call) => !isBuiltin(call.callee) && !defined.has(call.callee))
      .map((call) => diagnosticAt(undefinedFunctionRule, `Function '${call.callee}' is not defined`, call.loc));
  },
};
