/**
 * Error values and host faults for the Monkey evaluator.
 *
 * Language errors are `ErrorObject` values returned through evaluation.
 * Faults are thrown and end evaluation outright.
 */

import { MonkeyObject, ErrorObject, mkError, typeOf } from './values';

// ---- Language errors ----

/**
 * The message always cites `+`, whatever the operator.
 */
export function typeMismatchError(left: MonkeyObject, right: MonkeyObject): ErrorObject {
  return mkError(`type mismatch: ${typeOf(left)} + ${typeOf(right)}`);
}

export function unknownPrefixOperatorError(operator: string, right: MonkeyObject): ErrorObject {
  return mkError(`unknown operator: ${operator}${typeOf(right)}`);
}

export function unknownInfixOperatorError(
  left: MonkeyObject,
  operator: string,
  right: MonkeyObject,
): ErrorObject {
  return mkError(`unknown operator: ${typeOf(left)} ${operator} ${typeOf(right)}`);
}

export function identifierNotFoundError(name: string): ErrorObject {
  return mkError(`identifier not found: ${name}`);
}

// ---- Faults ----

export class MonkeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MonkeyError';
  }
}

export class DivisionByZeroError extends MonkeyError {
  public readonly dividend: bigint;

  constructor(dividend: bigint) {
    super(`division by zero: ${dividend} / 0`);
    this.name = 'DivisionByZeroError';
    this.dividend = dividend;
  }
}

export interface DecodeIssue {
  path: string;
  message: string;
}

export class SyntaxTreeDecodeError extends MonkeyError {
  public readonly issues: DecodeIssue[];

  constructor(issues: DecodeIssue[]) {
    super(`invalid syntax tree:\n${issues.map(i => `  ${i.path}: ${i.message}`).join('\n')}`);
    this.name = 'SyntaxTreeDecodeError';
    this.issues = issues;
  }
}
