/**
 * minipy linter engine.
 *
 * Parses the source, runs a set of lint rules over the program and
 * collects diagnostics (warnings and errors).
 */

import { parse } from '../../interpreter/src/parser';
import { Program } from '../../interpreter/src/ast';
import { Diagnostic, LintRule } from './diagnostics';
import { unusedVarsRule } from './rules/unused-vars';
import { undefinedFunctionRule } from './rules/undefined-function';
import { arityMismatchRule } from './rules/arity-mismatch';
import { returnOutsideFunctionRule } from './rules/return-outside-function';
import { duplicateFunctionRule } from './rules/duplicate-function';

export { diagnosticAt, formatDiagnostic } from './diagnostics';
export type { Diagnostic, LintRule, Severity } from './diagnostics';

export interface LintOptions {
  /** Only run these rules (if specified) */
  enabledRules?: string[];
  /** Skip these rules */
  disabledRules?: string[];
}

/**
 * The main linter class. Register rules, then lint source code.
 */
export class Linter {
  private rules: LintRule[] = [];

  addRule(rule: LintRule): void {
    this.rules.push(rule);
  }

  /**
   * Lint minipy source code. Returns diagnostics sorted by position.
   * A syntax error yields a single `syntax` diagnostic.
   */
  lint(source: string, options?: LintOptions): Diagnostic[] {
    const result = parse(source);
    if (result.program === null) {
      return result.errors.map((err): Diagnostic => ({
        rule: 'syntax',
        severity: 'error',
        message: err.message,
        line: err.line,
        column: err.column,
      }));
    }
    return this.lintProgram(result.program, options);
  }

  lintProgram(program: Program, options?: LintOptions): Diagnostic[] {
    const enabledRules = options?.enabledRules;
    const disabledRules = new Set(options?.disabledRules ?? []);

    const diagnostics: Diagnostic[] = [];
    for (const rule of this.rules) {
      if (disabledRules.has(rule.name)) continue;
      if (enabledRules && enabledRules.length > 0 && !enabledRules.includes(rule.name)) continue;
      diagnostics.push(...rule.run(program));
    }

    diagnostics.sort((a, b) => a.line - b.line || a.column - b.column);
    return diagnostics;
  }

  getRuleNames(): string[] {
    return this.rules.map((r) => r.name);
  }

  getRules(): readonly LintRule[] {
    return this.rules;
  }
}

/**
 * Create a linter with all built-in rules registered.
 */
export function createDefaultLinter(): Linter {
  const linter = new Linter();
  linter.addRule(unusedVarsRule);
  linter.addRule(undefinedFunctionRule);
  linter.addRule(arityMismatchRule);
  linter.addRule(returnOutsideFunctionRule);
  linter.addRule(duplicateFunctionRule);
  return linter;
}
