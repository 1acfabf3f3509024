/**
 * Lint rule: arity-mismatch
 *
 * Flags calls (including pipes, whose list-display input spreads into
 * arguments) passing the wrong number of arguments.
 */

import { Program, pipeArguments } from '../../../interpreter/src/ast';
import { BUILTINS } from '../../../interpreter/src/builtins';
import { Diagnostic, LintRule, diagnosticAt } from '../diagnostics';
import { collectCalls } from './undefined-function';

export const arityMismatchRule: LintRule = {
  name: 'arity-mismatch',
  description: 'Calls with the wrong number of arguments',
  severity: 'error',

  run(program: Program): Diagnostic[] {
    // Later definitions replace earlier ones at run time.
    const arities = new Map<string, number>();
    for (const def of program.defs) arities.set(def.name, def.params.length);
    for (const builtin of BUILTINS.values()) arities.set(builtin.name, builtin.arity);

    const diagnostics: Diagnostic[] = [];
    for (const call of collectCalls(program)) {
      const expected = arities.get(call.callee);
      if (expected === undefined) continue;
      const given = call.type === 'pipe_expression' ? pipeArguments(call.input).length : call.args.length;
      if (given !== expected) {
        diagnostics.push(diagnosticAt(
          arityMismatchRule,
          `'${call.callee}' expects ${expected} argument${expected === 1 ? '' : 's'} but ${given} ${given === 1 ? 'is' : 'are'} passed`,
          call.loc,
        ));
      }
    }
    return diagnostics;
  },
};
