/**
 * Tests for visitor dispatch and tree walking.
 */

import { mkLocation } from '../src/location';
import { NODE_KINDS } from '../src/kinds';
import * as ast from '../src/nodes';
import { NodeVisitor, dispatch, fallbackVisitor, walk } from '../src/visitor';

const loc = (line: number) => mkLocation('test.st', line);

/** One node of every kind. */
function samples(): ast.Node[] {
  const l = loc(1);
  const name = ast.mkLiteral(l, 'foo');
  return [
    ast.mkNil(l),
    ast.mkTrue(l),
    ast.mkFalse(l),
    ast.mkIntNode(l, 1),
    ast.mkFloatNode(l, 1.5),
    ast.mkStr(l, 's'),
    ast.mkDStr(l, [ast.mkStr(l, 'a')]),
    ast.mkSymbolNode(l, 'sym'),
    ast.mkDSymbol(l, []),
    name,
    ast.mkArray(l, []),
    ast.mkLocalVar(l, 'x'),
    ast.mkLocalAsgn(l, 'x', ast.mkNil(l)),
    ast.mkMultipleAsgn(l, [ast.mkLocalAsgn(l, 'a')]),
    ast.mkBlock(l, []),
    ast.mkNewline(l, ast.mkNil(l)),
    ast.mkWhile(l, ast.mkFalse(l), ast.mkNil(l)),
    ast.mkBreak(l),
    ast.mkNext(l),
    ast.mkReturn(l),
    ast.mkDefined(l, ast.mkNil(l)),
    ast.mkArgs(l, ['a']),
    ast.mkDef(l, 'f', ast.mkArgs(l)),
    ast.mkCall(l, 'f'),
    ast.mkClass(l, 'Foo'),
    ast.mkModule(l, 'Bar'),
    ast.mkUndef(l, name),
    ast.mkAlias(l, ast.mkLiteral(l, 'b'), name),
  ];
}

/** A visitor that records which method saw which node. */
function recorder(calls: Array<[string, ast.Node]>): NodeVisitor<string> {
  const record = (kind: string) => (node: ast.Node): string => {
    calls.push([kind, node]);
    return kind;
  };
  return {
    visitNil: record('Nil'),
    visitTrue: record('True'),
    visitFalse: record('False'),
    visitInt: record('Int'),
    visitFloat: record('Float'),
    visitStr: record('Str'),
    visitDStr: record('DStr'),
    visitSymbol: record('Symbol'),
    visitDSymbol: record('DSymbol'),
    visitLiteral: record('Literal'),
    visitArray: record('Array'),
    visitLocalVar: record('LocalVar'),
    visitLocalAsgn: record('LocalAsgn'),
    visitMultipleAsgn: record('MultipleAsgn'),
    visitBlock: record('Block'),
    visitNewline: record('Newline'),
    visitWhile: record('While'),
    visitBreak: record('Break'),
    visitNext: record('Next'),
    visitReturn: record('Return'),
    visitDefined: record('Defined'),
    visitArgs: record('Args'),
    visitDef: record('Def'),
    visitCall: record('Call'),
    visitClass: record('Class'),
    visitModule: record('Module'),
    visitUndef: record('Undef'),
    visitAlias: record('Alias'),
  };
}

describe('dispatch', () => {
  test('samples cover every kind', () => {
    expect(new Set(samples().map((n) => n.kind))).toEqual(new Set(NODE_KINDS));
  });

  test.each(samples().map((n) => [n.kind, n] as const))('%s calls exactly its own method', (kind, node) => {
    const calls: Array<[string, ast.Node]> = [];
    expect(dispatch(node, recorder(calls))).toBe(kind);
    expect(calls).toHaveLength(1);
    expect(calls[0][0]).toBe(kind);
    expect(calls[0][1]).toBe(node);
  });

  test('fallback visitors can be partially overridden', () => {
    const visitor: NodeVisitor<string> = {
      ...fallbackVisitor<string>((node) => `other:${node.kind}`),
      visitUndef: (node) => `undef:${ast.staticMethodName(node.name)}`,
    };
    const undef = ast.mkUndef(loc(1), ast.mkLiteral(loc(1), 'foo'));
    expect(dispatch(undef, visitor)).toBe('undef:foo');
    expect(dispatch(ast.mkNil(loc(1)), visitor)).toBe('other:Nil');
  });
});

describe('walk', () => {
  const tree = ast.mkBlock(loc(1), [
    ast.mkLocalAsgn(loc(1), 'x', ast.mkIntNode(loc(1), 1)),
    ast.mkCall(loc(2), 'foo', [ast.mkLocalVar(loc(2), 'x')]),
  ]);

  test('visits depth-first in source order', () => {
    const kinds: string[] = [];
    walk(tree, (node) => {
      kinds.push(node.kind);
    });
    expect(kinds).toEqual(['Block', 'LocalAsgn', 'Int', 'Call', 'LocalVar']);
  });

  test('returning false skips children', () => {
    const kinds: string[] = [];
    walk(tree, (node) => {
      kinds.push(node.kind);
      return node.kind !== 'LocalAsgn';
    });
    expect(kinds).toEqual(['Block', 'LocalAsgn', 'Call', 'LocalVar']);
  });

  test('passes the ancestor chain', () => {
    const chains: string[] = [];
    walk(tree, (node, ancestors) => {
      if (node.kind === 'LocalVar') chains.push(ancestors.map((a) => a.kind).join('>'));
    });
    expect(chains).toEqual(['Block>Call']);
  });
});
