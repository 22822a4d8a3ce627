/**
 * Visitor dispatch and generic tree walking.
 */

import * as ast from './nodes';
import { childList } from './children';

// A pass that handles every node kind. Adding a kind breaks every
// implementation until it gets a visit method.
export interface NodeVisitor<R> {
  visitNil(node: ast.NilNode): R;
  visitTrue(node: ast.TrueNode): R;
  visitFalse(node: ast.FalseNode): R;
  visitInt(node: ast.IntNode): R;
  visitFloat(node: ast.FloatNode): R;
  visitStr(node: ast.StrNode): R;
  visitDStr(node: ast.DStrNode): R;
  visitSymbol(node: ast.SymbolNode): R;
  visitDSymbol(node: ast.DSymbolNode): R;
  visitLiteral(node: ast.LiteralNode): R;
  visitArray(node: ast.ArrayNode): R;
  visitLocalVar(node: ast.LocalVarNode): R;
  visitLocalAsgn(node: ast.LocalAsgnNode): R;
  visitMultipleAsgn(node: ast.MultipleAsgnNode): R;
  visitBlock(node: ast.BlockNode): R;
  visitNewline(node: ast.NewlineNode): R;
  visitWhile(node: ast.WhileNode): R;
  visitBreak(node: ast.BreakNode): R;
  visitNext(node: ast.NextNode): R;
  visitReturn(node: ast.ReturnNode): R;
  visitDefined(node: ast.DefinedNode): R;
  visitArgs(node: ast.ArgsNode): R;
  visitDef(node: ast.DefNode): R;
  visitCall(node: ast.CallNode): R;
  visitClass(node: ast.ClassNode): R;
  visitModule(node: ast.ModuleNode): R;
  visitUndef(node: ast.UndefNode): R;
  visitAlias(node: ast.AliasNode): R;
}

// Calls exactly one visit method, the one for the node's own kind, and
// returns its result unchanged.
export function dispatch<R>(node: ast.Node, visitor: NodeVisitor<R>): R {
  switch (node.kind) {
    case 'Nil': return visitor.visitNil(node);
    case 'True': return visitor.visitTrue(node);
    case 'False': return visitor.visitFalse(node);
    case 'Int': return visitor.visitInt(node);
    case 'Float': return visitor.visitFloat(node);
    case 'Str': return visitor.visitStr(node);
    case 'DStr': return visitor.visitDStr(node);
    case 'Symbol': return visitor.visitSymbol(node);
    case 'DSymbol': return visitor.visitDSymbol(node);
    case 'Literal': return visitor.visitLiteral(node);
    case 'Array': return visitor.visitArray(node);
    case 'LocalVar': return visitor.visitLocalVar(node);
    case 'LocalAsgn': return visitor.visitLocalAsgn(node);
    case 'MultipleAsgn': return visitor.visitMultipleAsgn(node);
    case 'Block': return visitor.visitBlock(node);
    case 'Newline': return visitor.visitNewline(node);
    case 'While': return visitor.visitWhile(node);
    case 'Break': return visitor.visitBreak(node);
    case 'Next': return visitor.visitNext(node);
    case 'Return': return visitor.visitReturn(node);
    case 'Defined': return visitor.visitDefined(node);
    case 'Args': return visitor.visitArgs(node);
    case 'Def': return visitor.visitDef(node);
    case 'Call': return visitor.visitCall(node);
    case 'Class': return visitor.visitClass(node);
    case 'Module': return visitor.visitModule(node);
    case 'Undef': return visitor.visitUndef(node);
    case 'Alias': return visitor.visitAlias(node);
    default: return ast.unreachable(node);
  }
}

// Returning false from `enter` skips the node's children.
export type WalkCallback = (node: ast.Node, ancestors: readonly ast.Node[]) => boolean | void;

// Depth-first, pre-order, children in source order.
export function walk(root: ast.Node, enter: WalkCallback): void {
  const ancestors: ast.Node[] = [];
  const visit = (node: ast.Node): void => {
    if (enter(node, ancestors) === false) return;
    ancestors.push(node);
    for (const child of childList(node)) {
      visit(child);
    }
    ancestors.pop();
  };
  visit(root);
}

// A full visitor whose every method defers to `fallback`. Spread it and
// override the kinds a pass cares about.
export function fallbackVisitor<R>(fallback: (node: ast.Node) => R): NodeVisitor<R> {
  return {
    visitNil: fallback,
    visitTrue: fallback,
    visitFalse: fallback,
    visitInt: fallback,
    visitFloat: fallback,
    visitStr: fallback,
    visitDStr: fallback,
    visitSymbol: fallback,
    visitDSymbol: fallback,
    visitLiteral: fallback,
    visitArray: fallback,
    visitLocalVar: fallback,
    visitLocalAsgn: fallback,
    visitMultipleAsgn: fallback,
    visitBlock: fallback,
    visitNewline: fallback,
    visitWhile: fallback,
    visitBreak: fallback,
    visitNext: fallback,
    visitReturn: fallback,
    visitDefined: fallback,
    visitArgs: fallback,
    visitDef: fallback,
    visitCall: fallback,
    visitClass: fallback,
    visitModule: fallback,
    visitUndef: fallback,
    visitAlias: fallback,
  };
}
