/**
 * Runtime value representations for the Strata interpreter.
 *
 * Covers literals, symbols and lists.
 */

export type StrataValue =
  | { kind: 'nil' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'symbol'; name: string }
  | { kind: 'list'; elements: StrataValue[] };

// ---- Value constructors ----

const NIL: StrataValue = Object.freeze({ kind: 'nil' });

export function mkNil(): StrataValue {
  return NIL;
}

export function mkBool(value: boolean): StrataValue {
  return { kind: 'bool', value };
}

export function mkInt(value: number): StrataValue {
  return { kind: 'int', value };
}

export function mkFloat(value: number): StrataValue {
  return { kind: 'float', value };
}

export function mkString(value: string): StrataValue {
  return { kind: 'string', value };
}

export function mkSymbol(name: string): StrataValue {
  return { kind: 'symbol', name };
}

export function mkList(elements: StrataValue[]): StrataValue {
  return { kind: 'list', elements };
}

// ---- Value utilities ----

/**
 * Only nil and false are falsy.
 */
export function isTruthy(v: StrataValue): boolean {
  switch (v.kind) {
    case 'nil': return false;
    case 'bool': return v.value;
    default: return true;
  }
}

export function valueToString(v: StrataValue): string {
  switch (v.kind) {
    case 'nil': return '';
    case 'bool': return String(v.value);
    case 'int': return String(v.value);
    case 'float': {
      const s = String(v.value);
      return Number.isInteger(v.value) ? s + '.0' : s;
    }
    case 'string': return v.value;
    case 'symbol': return v.name;
    case 'list': return `[${v.elements.map(inspect).join(', ')}]`;
  }
}

/**
 * Developer-facing rendering, used in error messages and list contents.
 */
export function inspect(v: StrataValue): string {
  switch (v.kind) {
    case 'nil': return 'nil';
    case 'string': return JSON.stringify(v.value);
    case 'symbol': return `:${v.name}`;
    default: return valueToString(v);
  }
}
