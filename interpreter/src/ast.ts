/**
 * Syntax tree node types for the Monkey evaluator.
 *
 * Trees are produced outside this package (by a parser, or by
 * `decodeProgram` from JSON) and are never mutated once built.
 */

// ---- Operators ----

export const Operator = {
  BANG: '!',
  MINUS: '-',
  PLUS: '+',
  ASTERISK: '*',
  SLASH: '/',
  LT: '<',
  GT: '>',
  EQ: '==',
  NOT_EQ: '!=',
} as const;

// ---- Statement node types ----

export type StatementType =
  | 'let_statement'
  | 'return_statement'
  | 'expression_statement';

// ---- Expression node types ----

export type ExpressionType =
  | 'identifier'
  | 'integer_literal'
  | 'boolean_literal'
  | 'prefix_expression'
  | 'infix_expression'
  | 'if_expression';

export type NodeType = 'program' | 'block' | StatementType | ExpressionType;

// ---- Nodes ----

export interface Program {
  readonly type: 'program';
  readonly statements: readonly Statement[];
}

export interface BlockStatement {
  readonly type: 'block';
  readonly statements: readonly Statement[];
}

export interface ExpressionStatement {
  readonly type: 'expression_statement';
  readonly expression: Expression;
}

export interface LetStatement {
  readonly type: 'let_statement';
  readonly name: Identifier;
  readonly value: Expression;
}

export interface ReturnStatement {
  readonly type: 'return_statement';
  readonly returnValue: Expression;
}

export interface Identifier {
  readonly type: 'identifier';
  readonly value: string;
}

export interface IntegerLiteral {
  readonly type: 'integer_literal';
  /** Signed 64-bit value. */
  readonly value: bigint;
}

export interface BooleanLiteral {
  readonly type: 'boolean_literal';
  readonly value: boolean;
}

export interface PrefixExpression {
  readonly type: 'prefix_expression';
  readonly operator: string;
  readonly right: Expression;
}

export interface InfixExpression {
  readonly type: 'infix_expression';
  readonly left: Expression;
  readonly operator: string;
  readonly right: Expression;
}

export interface IfExpression {
  readonly type: 'if_expression';
  readonly condition: Expression;
  readonly consequence: BlockStatement;
  readonly alternative: BlockStatement | null;
}

export type Statement = ExpressionStatement | LetStatement | ReturnStatement;

export type Expression =
  | Identifier
  | IntegerLiteral
  | BooleanLiteral
  | PrefixExpression
  | InfixExpression
  | IfExpression;

export type Node = Program | BlockStatement | Statement | Expression;

// ---- Constructors ----

export function program(...statements: Statement[]): Program {
  return { type: 'program', statements };
}

export function block(...statements: Statement[]): BlockStatement {
  return { type: 'block', statements };
}

export function expressionStatement(expression: Expression): ExpressionStatement {
  return { type: 'expression_statement', expression };
}

export function letStatement(name: string, value: Expression): LetStatement {
  return { type: 'let_statement', name: identifier(name), value };
}

export function returnStatement(returnValue: Expression): ReturnStatement {
  return { type: 'return_statement', returnValue };
}

export function identifier(value: string): Identifier {
  return { type: 'identifier', value };
}

export function integerLiteral(value: bigint | number): IntegerLiteral {
  return { type: 'integer_literal', value: BigInt(value) };
}

export function booleanLiteral(value: boolean): BooleanLiteral {
  return { type: 'boolean_literal', value };
}

export function prefixExpression(operator: string, right: Expression): PrefixExpression {
  return { type: 'prefix_expression', operator, right };
}

export function infixExpression(left: Expression, operator: string, right: Expression): InfixExpression {
  return { type: 'infix_expression', left, operator, right };
}

export function ifExpression(
  condition: Expression,
  consequence: BlockStatement,
  alternative: BlockStatement | null = null,
): IfExpression {
  return { type: 'if_expression', condition, consequence, alternative };
}
