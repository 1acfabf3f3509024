/**
 * Lint rule: duplicate-function
 *
 * A later definition silently replaces an earlier one with the same
 * name; each redefinition is reported.
 */

import { Program } from '../../../interpreter/src/ast';
import { isBuiltin } from '../../../interpreter/src/builtins';
import { Diagnostic, LintRule, diagnosticAt } from '../diagnostics';

export const duplicateFunctionRule: LintRule = {
  name: 'duplicate-function',
  description: 'Functions defined more than once, or shadowed by a builtin',
  severity: 'warning',

  run(program: Program): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    const seen = new Map<string, number>();
    for (const def of program.defs) {
      if (isBuiltin(def.name)) {
        diagnostics.push(diagnosticAt(
          duplicateFunctionRule,
          `Function '${def.name}' is shadowed by the builtin of the same name and is never called`,
          def.loc,
        ));
        continue;
      }
      const firstLine = seen.get(def.name);
      if (firstLine !== undefined) {
        diagnostics.push(diagnosticAt(
          duplicateFunctionRule,
          `Function '${def.name}' redefines the definition on line ${firstLine}`,
          def.loc,
        ));
      } else {
        seen.set(def.name, def.loc?.line ?? 0);
      }
    }
    return diagnostics;
  },
};
