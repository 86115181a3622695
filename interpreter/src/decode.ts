/**
 * Decoding of JSON-shaped syntax trees.
 *
 * A parser running outside this process hands trees over as plain JSON.
 * These schemas check the shape once at that boundary; the evaluator
 * itself trusts the tree it is given.
 */

import { z } from 'zod';
import type {
  Node,
  Program,
  BlockStatement,
  Statement,
  Expression,
} from './ast';
import { SyntaxTreeDecodeError } from './errors';

const MIN_INT64 = -(2n ** 63n);
const MAX_INT64 = 2n ** 63n - 1n;

// Numbers past 2^53 were rounded by JSON.parse, so those must arrive as strings.
const int64Schema = z
  .union([z.number().int().safe(), z.string().regex(/^-?\d+$/, 'expected a decimal integer')])
  .transform(v => BigInt(v))
  .refine(v => v >= MIN_INT64 && v <= MAX_INT64, 'integer literal out of 64-bit range');

// Declared ahead of the node schemas because the node grammar is recursive.
const expressionSchema: z.ZodType<Expression, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('type', [
    identifierSchema,
    integerLiteralSchema,
    booleanLiteralSchema,
    prefixExpressionSchema,
    infixExpressionSchema,
    ifExpressionSchema,
  ]),
);

const statementSchema: z.ZodType<Statement, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion('type', [
    expressionStatementSchema,
    letStatementSchema,
    returnStatementSchema,
  ]),
);

const blockSchema: z.ZodType<BlockStatement, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    type: z.literal('block'),
    statements: z.array(statementSchema),
  }),
);

const programSchema: z.ZodType<Program, z.ZodTypeDef, unknown> = z.object({
  type: z.literal('program'),
  statements: z.array(statementSchema),
});

// ---- Expressions ----

const identifierSchema = z.object({
  type: z.literal('identifier'),
  value: z.string().min(1),
});

const integerLiteralSchema = z.object({
  type: z.literal('integer_literal'),
  value: int64Schema,
});

const booleanLiteralSchema = z.object({
  type: z.literal('boolean_literal'),
  value: z.boolean(),
});

const prefixExpressionSchema = z.object({
  type: z.literal('prefix_expression'),
  operator: z.string().min(1),
  right: expressionSchema,
});

const infixExpressionSchema = z.object({
  type: z.literal('infix_expression'),
  left: expressionSchema,
  operator: z.string().min(1),
  right: expressionSchema,
});

const ifExpressionSchema = z.object({
  type: z.literal('if_expression'),
  condition: expressionSchema,
  consequence: blockSchema,
  alternative: blockSchema.nullish().transform(v => v ?? null),
});

// ---- Statements ----

const expressionStatementSchema = z.object({
  type: z.literal('expression_statement'),
  expression: expressionSchema,
});

const letStatementSchema = z.object({
  type: z.literal('let_statement'),
  name: identifierSchema,
  value: expressionSchema,
});

const returnStatementSchema = z.object({
  type: z.literal('return_statement'),
  returnValue: expressionSchema,
});

const nodeSchema: z.ZodType<Node, z.ZodTypeDef, unknown> = z.union([
  programSchema,
  blockSchema,
  statementSchema,
  expressionSchema,
]);

function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new SyntaxTreeDecodeError(
      result.error.issues.map(issue => ({
        path: issue.path.length > 0 ? issue.path.join('.') : '<root>',
        message: issue.message,
      })),
    );
  }
  return result.data;
}

/**
 * Validate a JSON-shaped program and convert it to a syntax tree.
 * Integer literal values may be numbers or decimal strings.
 */
export function decodeProgram(input: unknown): Program {
  return decodeWith(programSchema, input);
}

export function decodeNode(input: unknown): Node {
  return decodeWith(nodeSchema, input);
}
