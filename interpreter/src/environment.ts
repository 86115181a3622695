/**
 * Variable bindings for the Monkey evaluator.
 *
 * Evaluation runs against a single environment. The parent link is there
 * for nested scopes; lookups fall through to it, bindings never do.
 *
 * A name may be bound to no value (a `let` of an expression that produced
 * none), so `has` and not `get` decides whether a name is bound.
 */

import { MonkeyObject } from './values';

export class Environment {
  private store: Map<string, MonkeyObject | undefined>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.store = new Map();
    this.parent = parent;
  }

  /**
   * Look up a binding. `undefined` when the name is unbound here and in
   * every parent, or when it is bound to no value.
   */
  get(name: string): MonkeyObject | undefined {
    if (this.store.has(name)) {
      return this.store.get(name);
    }
    if (this.parent !== null) {
      return this.parent.get(name);
    }
    return undefined;
  }

  has(name: string): boolean {
    if (this.store.has(name)) return true;
    if (this.parent !== null) return this.parent.has(name);
    return false;
  }

  /**
   * Create or overwrite a binding in this scope.
   */
  set(name: string, value: MonkeyObject | undefined): MonkeyObject | undefined {
    this.store.set(name, value);
    return value;
  }

  child(): Environment {
    return new Environment(this);
  }
}
