/**
 * Classes and modules: the defining scopes that member-introducing
 * constructs (def, undef, alias) act on.
 */

import type { ExecutionContext } from './context';
import type { Node } from './nodes';
import type { SourceLocation } from './location';
import { StrataFrozenError, StrataNameError } from './errors';

export interface MethodEntry {
  name: string;
  params: readonly string[];
  body: Node | null;
  /** The scope the method was defined in; its body runs with this scope open. */
  owner: RuntimeModule;
}

/**
 * An undefined slot hides the name here and in every superclass.
 */
type MethodSlot =
  | { kind: 'defined'; method: MethodEntry }
  | { kind: 'undefined' };

/** Undefining these leaves objects without their identity primitives. */
const DANGEROUS_UNDEFS = new Set(['__id__', '__send__', 'object_id']);

export class RuntimeModule {
  readonly name: string;
  readonly isClass: boolean;
  readonly superclass: RuntimeModule | null;
  private methods = new Map<string, MethodSlot>();
  private frozen = false;

  constructor(name: string, isClass: boolean, superclass: RuntimeModule | null = null) {
    this.name = name;
    this.isClass = isClass;
    this.superclass = superclass;
  }

  /** `class 'Foo'` or `module 'Foo'`, as used in messages. */
  describe(): string {
    return `${this.isClass ? 'class' : 'module'} '${this.name}'`;
  }

  defineMethod(name: string, params: readonly string[], body: Node | null, location?: SourceLocation): MethodEntry {
    this.checkFrozen(location);
    const method: MethodEntry = { name, params, body, owner: this };
    this.methods.set(name, { kind: 'defined', method });
    return method;
  }

  /**
   * Resolve a method through this scope and its superclass chain.
   */
  findMethod(name: string): MethodEntry | null {
    const slot = this.methods.get(name);
    if (slot !== undefined) {
      return slot.kind === 'defined' ? slot.method : null;
    }
    return this.superclass !== null ? this.superclass.findMethod(name) : null;
  }

  /**
   * Names of methods defined directly in this scope, in definition order.
   */
  ownMethodNames(): string[] {
    const names: string[] = [];
    for (const [name, slot] of this.methods) {
      if (slot.kind === 'defined') names.push(name);
    }
    return names;
  }

  isUndefined(name: string): boolean {
    return this.methods.get(name)?.kind === 'undefined';
  }

  undef(context: ExecutionContext, name: string, location?: SourceLocation): void {
    this.checkFrozen(location);
    if (DANGEROUS_UNDEFS.has(name)) {
      context.warn(`undefining '${name}' may cause serious problems`, location);
    }
    if (this.findMethod(name) === null) {
      throw new StrataNameError(`undefined method '${name}' for ${this.describe()}`, name, location);
    }
    this.methods.set(name, { kind: 'undefined' });
  }

  alias(newName: string, oldName: string, location?: SourceLocation): void {
    this.checkFrozen(location);
    const method = this.findMethod(oldName);
    if (method === null) {
      throw new StrataNameError(`undefined method '${oldName}' for ${this.describe()}`, oldName, location);
    }
    this.methods.set(newName, { kind: 'defined', method: { ...method, name: newName } });
  }

  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  private checkFrozen(location?: SourceLocation): void {
    if (this.frozen) {
      throw new StrataFrozenError(`can't modify frozen ${this.describe()}`, location);
    }
  }
}
