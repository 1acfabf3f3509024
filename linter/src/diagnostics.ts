/**
 * Diagnostic and rule types for the minipy linter.
 */

import type { Program, SourceLoc } from '../../interpreter/src/ast';

export type Severity = 'error' | 'warning';

export interface Diagnostic {
  rule: string;
  severity: Severity;
  message: string;
  /** 1-based line number */
  line: number;
  /** 0-based column */
  column: number;
}

/**
 * A lint rule receives the parsed program and reports diagnostics.
 */
export interface LintRule {
  /** Unique rule identifier (e.g., "unused-vars") */
  name: string;
  description: string;
  severity: Severity;
  run(program: Program): Diagnostic[];
}

/**
 * Build a diagnostic positioned at an AST location (line 0 when the
 * node has none).
 */
export function diagnosticAt(rule: LintRule, message: string, loc?: SourceLoc): Diagnostic {
  return {
    rule: rule.name,
    severity: rule.severity,
    message,
    line: loc?.line ?? 0,
    column: loc?.column ?? 0,
  };
}

/**
 * Format a diagnostic for terminal output.
 */
export function formatDiagnostic(d: Diagnostic, filename?: string): string {
  const loc = filename
    ? `${filename}:${d.line}:${d.column}`
    : `${d.line}:${d.column}`;
  const tag = d.severity === 'error' ? 'error' : 'warn';
  return `  ${loc}  ${tag}  ${d.message}  (${d.rule})`;
}
