/**
 * Abstract syntax tree for minipy programs.
 *
 * Node `type` tags follow the `*_expression` / `*_statement` naming of
 * the grammar. Every node may carry the source position it came from;
 * programs loaded from JSON may omit it.
 */

export interface SourceLoc {
  /** 1-based line */
  line: number;
  /** 0-based column */
  column: number;
}

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '%'
  | '==' | '!=' | '<' | '<=' | '>' | '>='
  | 'and' | 'or';

export type UnaryOperator = '-' | 'not';

export const BINARY_OPERATORS: readonly BinaryOperator[] = [
  '+', '-', '*', '/', '%', '==', '!=', '<', '<=', '>', '>=', 'and', 'or',
];

export const UNARY_OPERATORS: readonly UnaryOperator[] = ['-', 'not'];

// ---- Expressions ----

export type Expr =
  | { type: 'none_literal'; loc?: SourceLoc }
  | { type: 'bool_literal'; value: boolean; loc?: SourceLoc }
  | { type: 'int_literal'; value: number; loc?: SourceLoc }
  | { type: 'string_literal'; value: string; loc?: SourceLoc }
  | { type: 'identifier'; name: string; loc?: SourceLoc }
  | { type: 'binary_expression'; operator: BinaryOperator; left: Expr; right: Expr; loc?: SourceLoc }
  | { type: 'unary_expression'; operator: UnaryOperator; operand: Expr; loc?: SourceLoc }
  | { type: 'call_expression'; callee: string; args: Expr[]; loc?: SourceLoc }
  | { type: 'list_expression'; elements: Expr[]; loc?: SourceLoc }
  | { type: 'index_expression'; object: Expr; index: Expr; loc?: SourceLoc }
  | { type: 'pipe_expression'; input: Expr; callee: string; loc?: SourceLoc };

// ---- Statements ----

export type Stmt =
  | { type: 'expression_statement'; expression: Expr; loc?: SourceLoc }
  | { type: 'print_statement'; value: Expr; loc?: SourceLoc }
  | { type: 'block'; body: Stmt[]; loc?: SourceLoc }
  | { type: 'if_statement'; condition: Expr; consequence: Stmt; alternative: Stmt; loc?: SourceLoc }
  | { type: 'assignment_statement'; target: string; value: Expr; loc?: SourceLoc }
  | { type: 'index_assignment_statement'; object: Expr; index: Expr; value: Expr; loc?: SourceLoc }
  | { type: 'return_statement'; value: Expr; loc?: SourceLoc }
  | { type: 'for_statement'; variable: string; iterable: Expr; body: Stmt; loc?: SourceLoc };

// ---- Declarations ----

export interface FunctionDef {
  name: string;
  params: string[];
  body: Stmt;
  loc?: SourceLoc;
}

/**
 * A parsed program: the function definitions (in source order) and the
 * top-level statement run after they are registered.
 */
export interface Program {
  defs: FunctionDef[];
  body: Stmt;
}

// ---- Helpers ----

export function emptyBlock(loc?: SourceLoc): Stmt {
  return { type: 'block', body: [], loc };
}

/**
 * The argument expressions a pipe passes to its callee: a list display
 * on the left spreads into separate arguments, anything else is one.
 */
export function pipeArguments(input: Expr): Expr[] {
  return input.type === 'list_expression' ? input.elements : [input];
}

/**
 * Visit every expression directly contained in a statement (not in
 * nested statements).
 */
export function statementExpressions(stmt: Stmt): Expr[] {
  switch (stmt.type) {
    case 'expression_statement': return [stmt.expression];
    case 'print_statement':
    case 'return_statement':
    case 'assignment_statement':
      return [stmt.value];
    case 'index_assignment_statement': return [stmt.object, stmt.index, stmt.value];
    case 'if_statement': return [stmt.condition];
    case 'for_statement': return [stmt.iterable];
    case 'block': return [];
  }
}

/**
 * Nested statements of a compound statement.
 */
export function childStatements(stmt: Stmt): Stmt[] {
  switch (stmt.type) {
    case 'block': return stmt.body;
    case 'if_statement': return [stmt.consequence, stmt.alternative];
    case 'for_statement': return [stmt.body];
    default: return [];
  }
}

/**
 * Direct sub-expressions of an expression.
 */
export function childExpressions(expr: Expr): Expr[] {
  switch (expr.type) {
    case 'binary_expression': return [expr.left, expr.right];
    case 'unary_expression': return [expr.operand];
    case 'call_expression': return expr.args;
    case 'list_expression': return expr.elements;
    case 'index_expression': return [expr.object, expr.index];
    case 'pipe_expression': return [expr.input];
    default: return [];
  }
}

/**
 * Depth-first walk over all statements and expressions under `stmt`.
 */
export function walkStatement(
  stmt: Stmt,
  visitors: { statement?: (s: Stmt) => void; expression?: (e: Expr) => void },
): void {
  visitors.statement?.(stmt);
  for (const e of statementExpressions(stmt)) walkExpression(e, visitors.expression);
  for (const child of childStatements(stmt)) walkStatement(child, visitors);
}

export function walkExpression(expr: Expr, visitor?: (e: Expr) => void): void {
  visitor?.(expr);
  for (const child of childExpressions(expr)) walkExpression(child, visitor);
}
