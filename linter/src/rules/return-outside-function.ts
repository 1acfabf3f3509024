/**
 * Lint rule: return-outside-function
 */

import { Program, walkStatement } from '../../../interpreter/src/ast';
import { Diagnostic, LintRule, diagnosticAt } from '../diagnostics';

export const returnOutsideFunctionRule: LintRule = {
  name: 'return-outside-function',
  description: "'return' in top-level code",
  severity: 'error',

  run(program: Program): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    walkStatement(program.body, {
      statement: (s) => {
        if (s.type === 'return_statement') {
          diagnostics.push(diagnosticAt(returnOutsideFunctionRule, "'return' outside function", s.loc));
        }
      },
    });
    return diagnostics;
  },
};
