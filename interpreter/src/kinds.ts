/**
 * The closed set of syntax node kinds.
 *
 * Callers use the kind for fast type tests; passes that must handle every
 * kind switch over it exhaustively (see `visitor.ts`).
 */

export const NODE_KINDS = [
  // Literals
  'Nil',
  'True',
  'False',
  'Int',
  'Float',
  'Str',
  'DStr',
  'Symbol',
  'DSymbol',
  'Literal',
  'Array',

  // Variables
  'LocalVar',
  'LocalAsgn',
  'MultipleAsgn',

  // Statements
  'Block',
  'Newline',
  'While',
  'Break',
  'Next',
  'Return',
  'Defined',

  // Definitions
  'Args',
  'Def',
  'Call',
  'Class',
  'Module',
  'Undef',
  'Alias',
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

const KIND_SET: ReadonlySet<string> = new Set(NODE_KINDS);

/** Structural placeholders with no surface syntax of their own. */
const INVISIBLE_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>(['Newline']);

export function isNodeKind(value: string): value is NodeKind {
  return KIND_SET.has(value);
}

export function isInvisibleKind(kind: NodeKind): boolean {
  return INVISIBLE_KINDS.has(kind);
}
