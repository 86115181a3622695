/**
 * Monkey evaluation core.
 *
 * Usage:
 *   const env = new Environment();
 *   const result = evaluate(decodeProgram(json), env);
 */

export * from './ast';
export * from './values';
export * from './errors';
export { Environment } from './environment';
export { Evaluator, evaluate, isTruthy } from './evaluator';
export { decodeProgram, decodeNode } from './decode';
