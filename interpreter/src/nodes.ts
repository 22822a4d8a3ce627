/**
 * Syntax tree node variants.
 *
 * Every node carries a `kind` discriminant and a source location. The
 * `Node` union is closed: passes switch over `kind` and the compiler checks
 * that every variant is handled. Child arrays are frozen on construction;
 * the location is the only thing a pass may rewrite afterwards.
 */

import type { NodeKind } from './kinds';
import type { SourceLocation } from './location';
import { StrataInternalError } from './errors';

interface NodeBase<K extends NodeKind> {
  readonly kind: K;
  location: SourceLocation;
}

// ---- Literals ----

export type NilNode = NodeBase<'Nil'>;
export type TrueNode = NodeBase<'True'>;
export type FalseNode = NodeBase<'False'>;

export interface IntNode extends NodeBase<'Int'> {
  readonly value: number;
}

export interface FloatNode extends NodeBase<'Float'> {
  readonly value: number;
}

export interface StrNode extends NodeBase<'Str'> {
  readonly value: string;
}

/** Interpolated string: parts are concatenated by their string form. */
export interface DStrNode extends NodeBase<'DStr'> {
  readonly parts: readonly Node[];
}

export interface SymbolNode extends NodeBase<'Symbol'> {
  readonly name: string;
}

export interface DSymbolNode extends NodeBase<'DSymbol'> {
  readonly parts: readonly Node[];
}

/** A bare method name, as written after `undef` or `alias`. */
export interface LiteralNode extends NodeBase<'Literal'> {
  readonly name: string;
}

export interface ArrayNode extends NodeBase<'Array'> {
  readonly elements: readonly Node[];
}

// ---- Variables ----

export interface LocalVarNode extends NodeBase<'LocalVar'> {
  readonly name: string;
}

/** `value` is null when the node is only a destructuring target. */
export interface LocalAsgnNode extends NodeBase<'LocalAsgn'> {
  readonly name: string;
  readonly value: Node | null;
}

export interface MultipleAsgnNode extends NodeBase<'MultipleAsgn'> {
  readonly targets: readonly Node[];
  readonly rest: Node | null;
  readonly value: Node | null;
}

// ---- Statements ----

export interface BlockNode extends NodeBase<'Block'> {
  readonly statements: readonly Node[];
}

export interface NewlineNode extends NodeBase<'Newline'> {
  readonly statement: Node;
}

export interface WhileNode extends NodeBase<'While'> {
  readonly condition: Node;
  readonly body: Node;
}

export interface BreakNode extends NodeBase<'Break'> {
  readonly value: Node | null;
}

export interface NextNode extends NodeBase<'Next'> {
  readonly value: Node | null;
}

export interface ReturnNode extends NodeBase<'Return'> {
  readonly value: Node | null;
}

export interface DefinedNode extends NodeBase<'Defined'> {
  readonly expression: Node;
}

// ---- Definitions ----

export interface ArgsNode extends NodeBase<'Args'> {
  readonly params: readonly string[];
}

export interface DefNode extends NodeBase<'Def'> {
  readonly name: string;
  readonly args: ArgsNode;
  readonly body: Node | null;
}

export interface CallNode extends NodeBase<'Call'> {
  readonly name: string;
  readonly args: readonly Node[];
}

export interface ClassNode extends NodeBase<'Class'> {
  readonly name: string;
  readonly body: Node | null;
}

export interface ModuleNode extends NodeBase<'Module'> {
  readonly name: string;
  readonly body: Node | null;
}

export interface UndefNode extends NodeBase<'Undef'> {
  readonly name: Node;
}

export interface AliasNode extends NodeBase<'Alias'> {
  readonly newName: Node;
  readonly oldName: Node;
}

export type Node =
  | NilNode
  | TrueNode
  | FalseNode
  | IntNode
  | FloatNode
  | StrNode
  | DStrNode
  | SymbolNode
  | DSymbolNode
  | LiteralNode
  | ArrayNode
  | LocalVarNode
  | LocalAsgnNode
  | MultipleAsgnNode
  | BlockNode
  | NewlineNode
  | WhileNode
  | BreakNode
  | NextNode
  | ReturnNode
  | DefinedNode
  | ArgsNode
  | DefNode
  | CallNode
  | ClassNode
  | ModuleNode
  | UndefNode
  | AliasNode;

// ---- Constructors ----

function located(location: SourceLocation): SourceLocation {
  // Parsers must position every node; a missing location is a construction bug.
  if (!location) {
    throw new StrataInternalError('Node constructed without a source location');
  }
  return location;
}

function frozen<T>(items: readonly T[]): readonly T[] {
  return Object.freeze([...items]);
}

export function mkNil(location: SourceLocation): NilNode {
  return { kind: 'Nil', location: located(location) };
}

export function mkTrue(location: SourceLocation): TrueNode {
  return { kind: 'True', location: located(location) };
}

export function mkFalse(location: SourceLocation): FalseNode {
  return { kind: 'False', location: located(location) };
}

export function mkIntNode(location: SourceLocation, value: number): IntNode {
  if (!Number.isInteger(value)) {
    throw new StrataInternalError(`Int node requires an integer, got ${value}`);
  }
  return { kind: 'Int', location: located(location), value };
}

export function mkFloatNode(location: SourceLocation, value: number): FloatNode {
  return { kind: 'Float', location: located(location), value };
}

export function mkStr(location: SourceLocation, value: string): StrNode {
  return { kind: 'Str', location: located(location), value };
}

export function mkDStr(location: SourceLocation, parts: readonly Node[]): DStrNode {
  return { kind: 'DStr', location: located(location), parts: frozen(parts) };
}

export function mkSymbolNode(location: SourceLocation, name: string): SymbolNode {
  return { kind: 'Symbol', location: located(location), name };
}

export function mkDSymbol(location: SourceLocation, parts: readonly Node[]): DSymbolNode {
  return { kind: 'DSymbol', location: located(location), parts: frozen(parts) };
}

export function mkLiteral(location: SourceLocation, name: string): LiteralNode {
  return { kind: 'Literal', location: located(location), name };
}

export function mkArray(location: SourceLocation, elements: readonly Node[]): ArrayNode {
  return { kind: 'Array', location: located(location), elements: frozen(elements) };
}

export function mkLocalVar(location: SourceLocation, name: string): LocalVarNode {
  return { kind: 'LocalVar', location: located(location), name };
}

export function mkLocalAsgn(location: SourceLocation, name: string, value: Node | null = null): LocalAsgnNode {
  return { kind: 'LocalAsgn', location: located(location), name, value };
}

export function mkMultipleAsgn(
  location: SourceLocation,
  targets: readonly Node[],
  value: Node | null = null,
  rest: Node | null = null,
): MultipleAsgnNode {
  return { kind: 'MultipleAsgn', location: located(location), targets: frozen(targets), rest, value };
}

export function mkBlock(location: SourceLocation, statements: readonly Node[]): BlockNode {
  return { kind: 'Block', location: located(location), statements: frozen(statements) };
}

export function mkNewline(location: SourceLocation, statement: Node): NewlineNode {
  return { kind: 'Newline', location: located(location), statement };
}

export function mkWhile(location: SourceLocation, condition: Node, body: Node): WhileNode {
  return { kind: 'While', location: located(location), condition, body };
}

export function mkBreak(location: SourceLocation, value: Node | null = null): BreakNode {
  return { kind: 'Break', location: located(location), value };
}

export function mkNext(location: SourceLocation, value: Node | null = null): NextNode {
  return { kind: 'Next', location: located(location), value };
}

export function mkReturn(location: SourceLocation, value: Node | null = null): ReturnNode {
  return { kind: 'Return', location: located(location), value };
}

export function mkDefined(location: SourceLocation, expression: Node): DefinedNode {
  return { kind: 'Defined', location: located(location), expression };
}

export function mkArgs(location: SourceLocation, params: readonly string[] = []): ArgsNode {
  return { kind: 'Args', location: located(location), params: frozen(params) };
}

export function mkDef(location: SourceLocation, name: string, args: ArgsNode, body: Node | null = null): DefNode {
  return { kind: 'Def', location: located(location), name, args, body };
}

export function mkCall(location: SourceLocation, name: string, args: readonly Node[] = []): CallNode {
  return { kind: 'Call', location: located(location), name, args: frozen(args) };
}

export function mkClass(location: SourceLocation, name: string, body: Node | null = null): ClassNode {
  return { kind: 'Class', location: located(location), name, body };
}

export function mkModule(location: SourceLocation, name: string, body: Node | null = null): ModuleNode {
  return { kind: 'Module', location: located(location), name, body };
}

export function mkUndef(location: SourceLocation, name: Node): UndefNode {
  return { kind: 'Undef', location: located(location), name };
}

export function mkAlias(location: SourceLocation, newName: Node, oldName: Node): AliasNode {
  return { kind: 'Alias', location: located(location), newName, oldName };
}

// ---- Node helpers ----

/**
 * Reposition a node. The only mutation a constructed node allows;
 * callers must not run it concurrently with evaluation of the same tree.
 */
export function setLocation(node: Node, location: SourceLocation): void {
  node.location = located(location);
}

/**
 * The name attribute of named kinds, or null.
 */
export function nameOf(node: Node): string | null {
  switch (node.kind) {
    case 'Symbol':
    case 'Literal':
    case 'LocalVar':
    case 'LocalAsgn':
    case 'Def':
    case 'Call':
    case 'Class':
    case 'Module':
      return node.name;
    default:
      return null;
  }
}

/**
 * Whether the node is the nil literal, which evaluates to nil with no side effects.
 */
export function isNilLiteral(node: Node): boolean {
  return node.kind === 'Nil';
}

/**
 * The method name a name node spells out without evaluation, or null
 * when the name is computed at run time.
 */
export function staticMethodName(node: Node): string | null {
  if (node.kind === 'Literal' || node.kind === 'Symbol') return node.name;
  return null;
}

export function unreachable(node: never): never {
  throw new StrataInternalError(`Unhandled node: ${JSON.stringify(node)}`);
}
