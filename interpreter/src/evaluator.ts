/**
 * Tree-walking evaluator for the Monkey language.
 *
 * Evaluates a syntax tree by recursively visiting nodes. Language errors
 * are returned as `ERROR` objects, and every step checks a sub-result for
 * one before going on, so an error stops evaluation where it surfaces.
 */

import { Environment } from './environment';
import {
  Node,
  Statement,
  IfExpression,
  Operator,
} from './ast';
import {
  MonkeyObject,
  IntegerObject,
  TRUE,
  FALSE,
  NULL,
  mkInteger,
  mkReturnValue,
  nativeBoolToBooleanObject,
  isError,
} from './values';
import {
  DivisionByZeroError,
  typeMismatchError,
  unknownPrefixOperatorError,
  unknownInfixOperatorError,
  identifierNotFoundError,
} from './errors';

export class Evaluator {
  /**
   * Main dispatch: evaluate any node. Statements that produce no value
   * (`let`) and node kinds outside the tree grammar give `undefined`.
   */
  evaluate(node: Node, env: Environment): MonkeyObject | undefined {
    switch (node.type) {
      // ---- Sequences ----
      case 'program':
        return this.evalProgram(node.statements, env);
      case 'block':
        return this.evalBlock(node.statements, env);

      // ---- Statements ----
      case 'expression_statement':
        return this.evaluate(node.expression, env);
      case 'let_statement': {
        const value = this.evaluate(node.value, env);
        if (isError(value)) return value;
        env.set(node.name.value, value);
        return undefined;
      }
      case 'return_statement': {
        // A value-less return still stops the enclosing sequence.
        const value = this.evaluate(node.returnValue, env);
        if (isError(value)) return value;
        return mkReturnValue(value);
      }

      // ---- Literals ----
      case 'integer_literal':
        return mkInteger(node.value);
      case 'boolean_literal':
        return nativeBoolToBooleanObject(node.value);

      // ---- Expressions ----
      case 'identifier':
        return env.has(node.value) ? env.get(node.value) : identifierNotFoundError(node.value);
      case 'prefix_expression': {
        const right = this.evaluate(node.right, env);
        if (right === undefined) return undefined;
        if (isError(right)) return right;
        return this.evalPrefixExpression(node.operator, right);
      }
      case 'infix_expression': {
        const left = this.evaluate(node.left, env);
        if (left === undefined) return undefined;
        if (isError(left)) return left;
        const right = this.evaluate(node.right, env);
        if (right === undefined) return undefined;
        if (isError(right)) return right;
        return this.evalInfixExpression(node.operator, left, right);
      }
      case 'if_expression':
        return this.evalIfExpression(node, env);

      default:
        return undefined;
    }
  }

  // ==================================================================
  // Program & Blocks
  // ==================================================================

  private evalProgram(statements: readonly Statement[], env: Environment): MonkeyObject | undefined {
    let result: MonkeyObject | undefined;
    for (const statement of statements) {
      result = this.evaluate(statement, env);
      if (result === undefined) continue;
      if (result.kind === 'RETURN_VALUE') return result.value;
      if (result.kind === 'ERROR') return result;
    }
    return result;
  }

  /**
   * Unlike a program, a block hands a return value up still wrapped,
   * so the enclosing program can stop too.
   */
  private evalBlock(statements: readonly Statement[], env: Environment): MonkeyObject | undefined {
    let result: MonkeyObject | undefined;
    for (const statement of statements) {
      result = this.evaluate(statement, env);
      if (result !== undefined && (result.kind === 'RETURN_VALUE' || result.kind === 'ERROR')) {
        return result;
      }
    }
    return result;
  }

  // ==================================================================
  // Conditionals
  // ==================================================================

  private evalIfExpression(node: IfExpression, env: Environment): MonkeyObject | undefined {
    const condition = this.evaluate(node.condition, env);

    if (isTruthy(condition)) {
      return this.evaluate(node.consequence, env);
    } else if (node.alternative !== null) {
      return this.evaluate(node.alternative, env);
    }

    return NULL;
  }

  // ==================================================================
  // Operators
  // ==================================================================

  private evalPrefixExpression(operator: string, right: MonkeyObject): MonkeyObject {
    switch (operator) {
      case Operator.BANG:
        return this.evalBangOperator(right);
      case Operator.MINUS:
        if (right.kind !== 'INTEGER') return unknownPrefixOperatorError(Operator.MINUS, right);
        return mkInteger(-right.value);
      default:
        return unknownPrefixOperatorError(operator, right);
    }
  }

  private evalBangOperator(right: MonkeyObject): MonkeyObject {
    switch (right) {
      case TRUE: return FALSE;
      case FALSE: return TRUE;
      case NULL: return TRUE;
      default: return FALSE;
    }
  }

  private evalInfixExpression(operator: string, left: MonkeyObject, right: MonkeyObject): MonkeyObject {
    if (left.kind !== right.kind) {
      return typeMismatchError(left, right);
    }
    if (left.kind === 'INTEGER' && right.kind === 'INTEGER') {
      return this.evalIntegerInfixExpression(operator, left, right);
    }
    // Booleans and null are singletons, so identity is equality.
    if (operator === Operator.EQ) {
      return nativeBoolToBooleanObject(left === right);
    }
    if (operator === Operator.NOT_EQ) {
      return nativeBoolToBooleanObject(left !== right);
    }
    return unknownInfixOperatorError(left, operator, right);
  }

  private evalIntegerInfixExpression(
    operator: string,
    left: IntegerObject,
    right: IntegerObject,
  ): MonkeyObject {
    const a = left.value;
    const b = right.value;

    switch (operator) {
      // Arithmetic wraps at 64 bits
      case Operator.PLUS:
        return mkInteger(a + b);
      case Operator.MINUS:
        return mkInteger(a - b);
      case Operator.ASTERISK:
        return mkInteger(a * b);
      case Operator.SLASH:
        if (b === 0n) throw new DivisionByZeroError(a);
        // bigint division truncates toward zero
        return mkInteger(a / b);

      // Comparison
      case Operator.LT:
        return nativeBoolToBooleanObject(a < b);
      case Operator.GT:
        return nativeBoolToBooleanObject(a > b);
      case Operator.EQ:
        return nativeBoolToBooleanObject(a === b);
      case Operator.NOT_EQ:
        return nativeBoolToBooleanObject(a !== b);

      default:
        return unknownInfixOperatorError(left, operator, right);
    }
  }
}

/**
 * Only `NULL` and `FALSE` are falsy. Zero is truthy.
 */
export function isTruthy(obj: MonkeyObject | undefined): boolean {
  switch (obj) {
    case NULL: return false;
    case FALSE: return false;
    case TRUE: return true;
    default: return true;
  }
}

const defaultEvaluator = new Evaluator();

export function evaluate(node: Node, env: Environment): MonkeyObject | undefined {
  return defaultEvaluator.evaluate(node, env);
}
