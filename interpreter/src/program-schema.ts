/**
 * JSON interchange for parsed programs.
 *
 * Another front end can hand the interpreter a program as JSON; it is
 * validated here against the AST shape before anything runs.
 */

import { z } from 'zod';
import {
  BINARY_OPERATORS,
  BinaryOperator,
  Expr,
  FunctionDef,
  Program,
  Stmt,
  UNARY_OPERATORS,
  UnaryOperator,
} from './ast';
import { INT_MAX, INT_MIN } from './values';
import { MiniPySyntaxError } from './errors';

const locSchema = z.object({
  line: z.number().int().positive(),
  column: z.number().int().nonnegative(),
});

const identifierName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'not a valid identifier');

const binaryOperatorSchema = z.custom<BinaryOperator>(
  (v) => BINARY_OPERATORS.some((op) => op === v),
  { message: 'unknown binary operator' },
);

const unaryOperatorSchema = z.custom<UnaryOperator>(
  (v) => UNARY_OPERATORS.some((op) => op === v),
  { message: 'unknown unary operator' },
);

export const exprSchema: z.ZodType<Expr> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('none_literal'), loc: locSchema.optional() }),
    z.object({ type: z.literal('bool_literal'), value: z.boolean(), loc: locSchema.optional() }),
    z.object({
      type: z.literal('int_literal'),
      value: z.number().int().min(INT_MIN).max(INT_MAX),
      loc: locSchema.optional(),
    }),
    z.object({ type: z.literal('string_literal'), value: z.string(), loc: locSchema.optional() }),
    z.object({ type: z.literal('identifier'), name: identifierName, loc: locSchema.optional() }),
    z.object({
      type: z.literal('binary_expression'),
      operator: binaryOperatorSchema,
      left: exprSchema,
      right: exprSchema,
      loc: locSchema.optional(),
    }),
    z.object({
      type: z.literal('unary_expression'),
      operator: unaryOperatorSchema,
      operand: exprSchema,
      loc: locSchema.optional(),
    }),
    z.object({
      type: z.literal('call_expression'),
      callee: identifierName,
      args: z.array(exprSchema),
      loc: locSchema.optional(),
    }),
    z.object({ type: z.literal('list_expression'), elements: z.array(exprSchema), loc: locSchema.optional() }),
    z.object({
      type: z.literal('index_expression'),
      object: exprSchema,
      index: exprSchema,
      loc: locSchema.optional(),
    }),
    z.object({
      type: z.literal('pipe_expression'),
      input: exprSchema,
      callee: identifierName,
      loc: locSchema.optional(),
    }),
  ]),
);

export const stmtSchema: z.ZodType<Stmt> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('expression_statement'), expression: exprSchema, loc: locSchema.optional() }),
    z.object({ type: z.literal('print_statement'), value: exprSchema, loc: locSchema.optional() }),
    z.object({ type: z.literal('block'), body: z.array(stmtSchema), loc: locSchema.optional() }),
    z.object({
      type: z.literal('if_statement'),
      condition: exprSchema,
      consequence: stmtSchema,
      alternative: stmtSchema,
      loc: locSchema.optional(),
    }),
    z.object({
      type: z.literal('assignment_statement'),
      target: identifierName,
      value: exprSchema,
      loc: locSchema.optional(),
    }),
    z.object({
      type: z.literal('index_assignment_statement'),
      object: exprSchema,
      index: exprSchema,
      value: exprSchema,
      loc: locSchema.optional(),
    }),
    z.object({ type: z.literal('return_statement'), value: exprSchema, loc: locSchema.optional() }),
    z.object({
      type: z.literal('for_statement'),
      variable: identifierName,
      iterable: exprSchema,
      body: stmtSchema,
      loc: locSchema.optional(),
    }),
  ]),
);

export const functionDefSchema: z.ZodType<FunctionDef> = z.object({
  name: identifierName,
  params: z.array(identifierName),
  body: stmtSchema,
  loc: locSchema.optional(),
});

export const programSchema: z.ZodType<Program> = z.object({
  defs: z.array(functionDefSchema),
  body: stmtSchema,
});

/**
 * Validate an externally produced program.
 */
export function loadProgram(json: unknown): Program {
  const result = programSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new MiniPySyntaxError(`invalid program: ${issues}`, 1, 0);
  }
  return result.data;
}

export function serializeProgram(program: Program): string {
  return JSON.stringify(program, null, 2);
}
