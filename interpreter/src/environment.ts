/**
 * Local variable bindings for the Strata interpreter.
 *
 * Each environment holds a map of bindings and a reference to its
 * parent scope. Assignment updates the nearest scope that already
 * binds the name, otherwise it binds in the current scope.
 */

import { StrataValue } from './values';
import { StrataNameError } from './errors';
import type { SourceLocation } from './location';

export class Environment {
  private vars: Map<string, StrataValue>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.vars = new Map();
    this.parent = parent;
  }

  /**
   * Look up a variable by name, traversing the parent chain.
   */
  get(name: string, location?: SourceLocation): StrataValue {
    const value = this.vars.get(name);
    if (value !== undefined) {
      return value;
    }
    if (this.parent !== null) {
      return this.parent.get(name, location);
    }
    throw new StrataNameError(`undefined local variable '${name}'`, name, location);
  }

  /**
   * Check if a variable is bound in this environment or any parent.
   */
  has(name: string): boolean {
    if (this.vars.has(name)) return true;
    if (this.parent !== null) return this.parent.has(name);
    return false;
  }

  assign(name: string, value: StrataValue): void {
    const owner = this.lookupOwner(name);
    (owner ?? this).vars.set(name, value);
  }

  /**
   * Names bound directly in this scope, in binding order.
   */
  localNames(): string[] {
    return [...this.vars.keys()];
  }

  /**
   * Create a child scope.
   */
  child(): Environment {
    return new Environment(this);
  }

  private lookupOwner(name: string): Environment | null {
    if (this.vars.has(name)) return this;
    if (this.parent !== null) return this.parent.lookupOwner(name);
    return null;
  }
}
