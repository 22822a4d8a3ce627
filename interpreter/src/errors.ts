/**
 * Error and signal types for the Strata interpreter.
 *
 * Three families:
 *   - internal errors: a malformed tree or misuse of the node API
 *   - runtime errors: language-level failures a program can rescue
 *   - jump signals: non-local control transfer (break, next, return)
 */

import type { SourceLocation } from './location';
import type { StrataValue } from './values';

export class StrataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StrataError';
  }
}

// ---- Internal errors ----

export class StrataInternalError extends StrataError {
  constructor(message: string) {
    super(message);
    this.name = 'StrataInternalError';
  }
}

export class StrataUnsupportedOperationError extends StrataInternalError {
  constructor(operation: string) {
    super(`'${operation}' is not supported on a node sequence`);
    this.name = 'StrataUnsupportedOperationError';
  }
}

export class StrataIndexError extends StrataInternalError {
  constructor(message: string) {
    super(message);
    this.name = 'StrataIndexError';
  }
}

export class StrataConfigError extends StrataError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid interpreter options: ${issues.join('; ')}`);
    this.name = 'StrataConfigError';
    this.issues = issues;
  }
}

// ---- Runtime errors ----

function formatLoc(location: SourceLocation | undefined): string {
  return location !== undefined ? ` [${location.file}:${location.startLine}]` : '';
}

export class StrataRuntimeError extends StrataError {
  /** The message without its label and location prefix. */
  public readonly detail: string;
  public readonly location: SourceLocation | undefined;

  constructor(message: string, location?: SourceLocation, label = 'RuntimeError') {
    super(`${label}${formatLoc(location)}: ${message}`);
    this.name = 'StrataRuntimeError';
    this.detail = message;
    this.location = location;
  }
}

export class StrataTypeError extends StrataRuntimeError {
  constructor(message: string, location?: SourceLocation) {
    super(message, location, 'TypeError');
    this.name = 'StrataTypeError';
  }
}

export class StrataNameError extends StrataRuntimeError {
  public readonly missingName: string;

  constructor(message: string, missingName: string, location?: SourceLocation, label = 'NameError') {
    super(message, location, label);
    this.name = 'StrataNameError';
    this.missingName = missingName;
  }
}

export class StrataNoMethodError extends StrataNameError {
  constructor(message: string, missingName: string, location?: SourceLocation) {
    super(message, missingName, location, 'NoMethodError');
    this.name = 'StrataNoMethodError';
  }
}

export class StrataArgumentError extends StrataRuntimeError {
  constructor(given: number, expected: number, location?: SourceLocation) {
    super(`wrong number of arguments (given ${given}, expected ${expected})`, location, 'ArgumentError');
    this.name = 'StrataArgumentError';
  }
}

export class StrataFrozenError extends StrataRuntimeError {
  constructor(message: string, location?: SourceLocation) {
    super(message, location, 'FrozenError');
    this.name = 'StrataFrozenError';
  }
}

export class StrataLocalJumpError extends StrataRuntimeError {
  constructor(keyword: string, location?: SourceLocation) {
    super(`unexpected ${keyword}`, location, 'LocalJumpError');
    this.name = 'StrataLocalJumpError';
  }
}

// ---- Jump signals ----

/**
 * Base of the non-local control transfers.
 * These are NOT errors; the definedness probe swallows exactly this family.
 */
export abstract class JumpSignal {
  abstract readonly keyword: 'break' | 'next' | 'return';
  public readonly value: StrataValue;
  /** Where the jump was raised. */
  public readonly location: SourceLocation | undefined;

  constructor(value: StrataValue, location?: SourceLocation) {
    this.value = value;
    this.location = location;
  }
}

export class BreakSignal extends JumpSignal {
  readonly keyword = 'break';
}

export class NextSignal extends JumpSignal {
  readonly keyword = 'next';
}

export class ReturnSignal extends JumpSignal {
  readonly keyword = 'return';
}
