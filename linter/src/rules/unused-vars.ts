/**
 * Lint rule: unused-vars
 *
 * Detects variables (assignment targets, loop variables and function
 * parameters) that are never read in the activation that binds them.
 * Names starting with `_` are ignored.
 */

import { Program, SourceLoc, Stmt, walkStatement } from '../../../interpreter/src/ast';
import { Diagnostic, LintRule, diagnosticAt } from '../diagnostics';

interface VarDecl {
  name: string;
  kind: 'variable' | 'parameter';
  loc?: SourceLoc;
}

/**
 * Collect all identifiers read in a statement subtree.
 */
function collectUsedIdentifiers(body: Stmt): Set<string> {
  const used = new Set<string>();
  walkStatement(body, {
    expression: (e) => {
      if (e.type === 'identifier') used.add(e.name);
    },
  });
  return used;
}

/**
 * Collect bindings in source order, first binding of each name only.
 */
function collectDeclarations(body: Stmt, decls: VarDecl[]): void {
  const seen = new Set(decls.map((d) => d.name));
  walkStatement(body, {
    statement: (s) => {
      let name: string | undefined;
      if (s.type === 'assignment_statement') name = s.target;
      else if (s.type === 'for_statement') name = s.variable;
      if (name !== undefined && !seen.has(name)) {
        seen.add(name);
        decls.push({ name, kind: 'variable', loc: s.loc });
      }
    },
  });
}

function checkActivation(decls: VarDecl[], body: Stmt, diagnostics: Diagnostic[]): void {
  collectDeclarations(body, decls);
  const used = collectUsedIdentifiers(body);
  for (const decl of decls) {
    if (decl.name.startsWith('_') || used.has(decl.name)) continue;
    const message = decl.kind === 'parameter'
      ? `Parameter '${decl.name}' is never used`
      : `Variable '${decl.name}' is assigned but never used`;
    diagnostics.push(diagnosticAt(unusedVarsRule, message, decl.loc));
  }
}

export const unusedVarsRule: LintRule = {
  name: 'unused-vars',
  description: 'Variables and parameters that are never read',
  severity: 'warning',

  run(program: Program): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];
    for (const def of program.defs) {
      const params = def.params.map((name): VarDecl => ({ name, kind: 'parameter', loc: def.loc }));
      checkActivation(params, def.body, diagnostics);
    }
    checkActivation([], program.body, diagnostics);
    return diagnostics;
  },
};
