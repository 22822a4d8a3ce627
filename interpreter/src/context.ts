/**
 * Execution context for one evaluation walk.
 *
 * Nodes hold no evaluation state; everything that changes while a tree
 * runs lives here: local bindings, the stack of open defining scopes,
 * constants, and the call depth.
 */

import { Environment } from './environment';
import { RuntimeModule } from './runtime-module';
import { StrataRuntimeError, StrataTypeError } from './errors';
import { DEFAULT_OPTIONS, InterpreterOptions } from './options';
import { describeLocation, SourceLocation } from './location';

export type WarningSink = (message: string) => void;

const consoleSink: WarningSink = (message) => console.warn(message);

export class ExecutionContext {
  readonly options: InterpreterOptions;
  private env: Environment;
  private scopes: RuntimeModule[] = [];
  private constants = new Map<string, RuntimeModule>();
  private callDepth = 0;
  private warningSink: WarningSink;

  constructor(options: InterpreterOptions = DEFAULT_OPTIONS, warningSink: WarningSink = consoleSink) {
    this.options = options;
    this.env = new Environment();
    this.warningSink = warningSink;
  }

  // ---- Local bindings ----

  get environment(): Environment {
    return this.env;
  }

  withEnvironment<T>(env: Environment, body: () => T): T {
    const saved = this.env;
    this.env = env;
    try {
      return body();
    } finally {
      this.env = saved;
    }
  }

  // ---- Defining scopes ----

  /**
   * The innermost class or module being defined, or null at top level.
   */
  currentScope(): RuntimeModule | null {
    return this.scopes.length > 0 ? this.scopes[this.scopes.length - 1] : null;
  }

  withScope<T>(scope: RuntimeModule, body: () => T): T {
    this.scopes.push(scope);
    try {
      return body();
    } finally {
      this.scopes.pop();
    }
  }

  lookupConstant(name: string): RuntimeModule | null {
    return this.constants.get(name) ?? null;
  }

  /**
   * Return the class or module named `name`, creating it on first use.
   * Reopening a constant as the other sort of scope is a type error.
   */
  openModule(name: string, isClass: boolean, location?: SourceLocation): RuntimeModule {
    const existing = this.constants.get(name);
    if (existing !== undefined) {
      if (existing.isClass !== isClass) {
        throw new StrataTypeError(`'${name}' is not a ${isClass ? 'class' : 'module'}`, location);
      }
      return existing;
    }
    const created = new RuntimeModule(name, isClass);
    this.constants.set(name, created);
    return created;
  }

  // ---- Calls ----

  enterCall<T>(location: SourceLocation, body: () => T): T {
    if (this.callDepth >= this.options.maxCallDepth) {
      throw new StrataRuntimeError('stack level too deep', location);
    }
    this.callDepth++;
    try {
      return body();
    } finally {
      this.callDepth--;
    }
  }

  get depth(): number {
    return this.callDepth;
  }

  // ---- Warnings ----

  warn(message: string, location?: SourceLocation): void {
    if (!this.options.warnings) return;
    const prefix = location !== undefined ? `${describeLocation(location)}: ` : '';
    this.warningSink(`${prefix}warning: ${message}`);
  }
}
