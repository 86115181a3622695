/**
 * Runtime value representations for the Monkey evaluator.
 *
 * Booleans and null are canonical singletons: `TRUE`, `FALSE` and `NULL`
 * are the only instances of their kind, so identity comparison against
 * them is value comparison.
 */

export type ObjectType = 'INTEGER' | 'BOOLEAN' | 'NULL' | 'RETURN_VALUE' | 'ERROR';

export interface IntegerObject {
  readonly kind: 'INTEGER';
  readonly value: bigint;
}

export interface BooleanObject {
  readonly kind: 'BOOLEAN';
  readonly value: boolean;
}

export interface NullObject {
  readonly kind: 'NULL';
}

export interface ReturnValueObject {
  readonly kind: 'RETURN_VALUE';
  /** `undefined` when the returned expression produced no value. */
  readonly value: MonkeyObject | undefined;
}

export interface ErrorObject {
  readonly kind: 'ERROR';
  readonly message: string;
}

export type MonkeyObject =
  | IntegerObject
  | BooleanObject
  | NullObject
  | ReturnValueObject
  | ErrorObject;

// ---- Canonical singletons ----

export const TRUE: BooleanObject = Object.freeze({ kind: 'BOOLEAN', value: true });
export const FALSE: BooleanObject = Object.freeze({ kind: 'BOOLEAN', value: false });
export const NULL: NullObject = Object.freeze({ kind: 'NULL' });

// ---- Value constructors ----

/**
 * Integers are signed 64-bit; results outside that range wrap.
 */
export function mkInteger(value: bigint): IntegerObject {
  return { kind: 'INTEGER', value: BigInt.asIntN(64, value) };
}

export function nativeBoolToBooleanObject(input: boolean): BooleanObject {
  return input ? TRUE : FALSE;
}

export function mkReturnValue(value: MonkeyObject | undefined): ReturnValueObject {
  return { kind: 'RETURN_VALUE', value };
}

export function mkError(message: string): ErrorObject {
  return { kind: 'ERROR', message };
}

// ---- Value utilities ----

export function typeOf(obj: MonkeyObject): ObjectType {
  return obj.kind;
}

export function isError(obj: MonkeyObject | undefined): obj is ErrorObject {
  return obj !== undefined && obj.kind === 'ERROR';
}

export function isReturnValue(obj: MonkeyObject | undefined): obj is ReturnValueObject {
  return obj !== undefined && obj.kind === 'RETURN_VALUE';
}
