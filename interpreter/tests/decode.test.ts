/**
 * Tests for decoding JSON-shaped syntax trees.
 */

import { decodeProgram, decodeNode } from '../src/decode';
import { DecodeIssue, SyntaxTreeDecodeError } from '../src/errors';
import { Environment } from '../src/environment';
import { evaluate } from '../src/evaluator';
import { mkInteger } from '../src/values';
import {
  program,
  block,
  expressionStatement,
  letStatement,
  identifier,
  integerLiteral,
  booleanLiteral,
  infixExpression,
  ifExpression,
} from '../src/ast';

/** Helper: decode a program that must fail and return its issues. */
function decodeIssues(input: unknown): DecodeIssue[] {
  try {
    decodeProgram(input);
  } catch (e) {
    if (e instanceof SyntaxTreeDecodeError) return e.issues;
    throw e;
  }
  throw new Error('expected decoding to fail');
}

const int = (value: number | string) => ({ type: 'integer_literal', value });
const exprStmt = (expression: unknown) => ({ type: 'expression_statement', expression });

describe('decodeProgram', () => {
  test('decodes lets and infix expressions', () => {
    const decoded = decodeProgram({
      type: 'program',
      statements: [
        { type: 'let_statement', name: { type: 'identifier', value: 'x' }, value: int(5) },
        exprStmt({ type: 'infix_expression', left: { type: 'identifier', value: 'x' }, operator: '*', right: int('2') }),
      ],
    });
    expect(decoded).toEqual(program(
      letStatement('x', integerLiteral(5)),
      expressionStatement(infixExpression(identifier('x'), '*', integerLiteral(2))),
    ));
    expect(evaluate(decoded, new Environment())).toEqual(mkInteger(10n));
  });

  test('a missing or null alternative decodes to null', () => {
    const consequence = { type: 'block', statements: [exprStmt(int(1))] };
    const expected = program(expressionStatement(
      ifExpression(booleanLiteral(true), block(expressionStatement(integerLiteral(1)))),
    ));
    const condition = { type: 'boolean_literal', value: true };

    expect(decodeProgram({
      type: 'program',
      statements: [exprStmt({ type: 'if_expression', condition, consequence })],
    })).toEqual(expected);
    expect(decodeProgram({
      type: 'program',
      statements: [exprStmt({ type: 'if_expression', condition, consequence, alternative: null })],
    })).toEqual(expected);
  });

  test('integer strings cover the full 64-bit range', () => {
    const decoded = decodeProgram({ type: 'program', statements: [exprStmt(int('-9223372036854775808'))] });
    expect(decoded).toEqual(program(expressionStatement(integerLiteral(-(2n ** 63n)))));
  });

  test('rejects integers outside 64 bits', () => {
    const issues = decodeIssues({ type: 'program', statements: [exprStmt(int('9223372036854775808'))] });
    expect(issues).toEqual([
      { path: 'statements.0.expression.value', message: 'integer literal out of 64-bit range' },
    ]);
  });

  test('rejects non-integer numbers', () => {
    const issues = decodeIssues({ type: 'program', statements: [exprStmt(int(1.5))] });
    expect(issues.map(i => i.path)).toEqual(['statements.0.expression.value']);
  });

  test('rejects numbers past the safe integer range', () => {
    const issues = decodeIssues({ type: 'program', statements: [exprStmt(int(2 ** 60))] });
    expect(issues.map(i => i.path)).toEqual(['statements.0.expression.value']);
  });

  test('accepts the same value as a decimal string', () => {
    const decoded = decodeProgram({ type: 'program', statements: [exprStmt(int('1152921504606846976'))] });
    expect(decoded).toEqual(program(expressionStatement(integerLiteral(2n ** 60n))));
  });

  test('rejects unknown node kinds', () => {
    const issues = decodeIssues({ type: 'program', statements: [{ type: 'while_statement' }] });
    expect(issues.map(i => i.path)).toEqual(['statements.0.type']);
  });

  test('reports missing fields', () => {
    expect(decodeIssues({ type: 'program' })).toEqual([{ path: 'statements', message: 'Required' }]);
  });

  test('reports a non-object at the root', () => {
    expect(decodeIssues(42)).toEqual([{ path: '<root>', message: 'Expected object, received number' }]);
  });

  test('throws SyntaxTreeDecodeError', () => {
    expect(() => decodeProgram(null)).toThrow(SyntaxTreeDecodeError);
  });
});

describe('decodeNode', () => {
  test('decodes a bare expression', () => {
    expect(decodeNode({ type: 'boolean_literal', value: false })).toEqual(booleanLiteral(false));
  });

  test('decodes a block', () => {
    expect(decodeNode({ type: 'block', statements: [] })).toEqual(block());
  });

  test('rejects anything that is not a node', () => {
    expect(() => decodeNode({ type: 'boolean_literal', value: 'yes' })).toThrow(SyntaxTreeDecodeError);
  });
});
