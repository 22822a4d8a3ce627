/**
 * Tests for syntax tree construction, child access and debug strings.
 */

import { mkLocation, describeLocation, SourceLocation } from '../src/location';
import { NODE_KINDS, isNodeKind, isInvisibleKind } from '../src/kinds';
import {
  Node,
  mkAlias,
  mkArgs,
  mkArray,
  mkBlock,
  mkCall,
  mkDStr,
  mkDef,
  mkIntNode,
  mkLiteral,
  mkLocalAsgn,
  mkLocalVar,
  mkMultipleAsgn,
  mkNewline,
  mkNil,
  mkStr,
  mkSymbolNode,
  mkUndef,
  mkWhile,
  mkTrue,
  isNilLiteral,
  nameOf,
  setLocation,
  staticMethodName,
} from '../src/nodes';
import { childList, childrenOf } from '../src/children';
import { toDebugString } from '../src/debug';
import { StrataInternalError } from '../src/errors';

const loc = (line: number) => mkLocation('test.st', line);

// ==================================================================
// Locations and kinds
// ==================================================================

describe('Locations', () => {
  test('mkLocation builds a frozen location', () => {
    const l = mkLocation('a.st', 4);
    expect(l).toEqual({ file: 'a.st', startLine: 4 });
    expect(Object.isFrozen(l)).toBe(true);
    expect(describeLocation(l)).toBe('a.st:4');
  });

  test('rejects invalid positions', () => {
    expect(() => mkLocation('', 1)).toThrow(StrataInternalError);
    expect(() => mkLocation('a.st', -1)).toThrow(StrataInternalError);
    expect(() => mkLocation('a.st', 1.5)).toThrow(StrataInternalError);
  });

  test('nodes cannot be built without a location', () => {
    const missing: SourceLocation = JSON.parse('null');
    expect(() => mkNil(missing)).toThrow('Node constructed without a source location');
  });
});

describe('Kinds', () => {
  test('the kind set is closed', () => {
    expect(NODE_KINDS).toHaveLength(28);
    expect(isNodeKind('Undef')).toBe(true);
    expect(isNodeKind('Foo')).toBe(false);
  });

  test('only newline wrappers are invisible', () => {
    expect(NODE_KINDS.filter(isInvisibleKind)).toEqual(['Newline']);
  });
});

// ==================================================================
// Construction
// ==================================================================

describe('Construction', () => {
  test('Int nodes require integers', () => {
    expect(mkIntNode(loc(1), 3).value).toBe(3);
    expect(() => mkIntNode(loc(1), 1.5)).toThrow(StrataInternalError);
  });

  test('child arrays are copied and frozen', () => {
    const a = mkStr(loc(1), 'a');
    const parts: Node[] = [a];
    const dstr = mkDStr(loc(1), parts);
    parts.push(mkStr(loc(1), 'b'));
    expect(childList(dstr)).toEqual([a]);
    expect(Object.isFrozen(dstr.parts)).toBe(true);
  });

  test('setLocation only moves the node', () => {
    const name = mkLiteral(loc(1), 'foo');
    const undef = mkUndef(loc(1), name);
    setLocation(undef, loc(9));
    expect(undef.location).toEqual({ file: 'test.st', startLine: 9 });
    expect(undef.kind).toBe('Undef');
    expect(childList(undef)[0]).toBe(name);
  });

  test('nameOf and helpers', () => {
    expect(nameOf(mkLiteral(loc(1), 'foo'))).toBe('foo');
    expect(nameOf(mkCall(loc(1), 'bar'))).toBe('bar');
    expect(nameOf(mkStr(loc(1), 'baz'))).toBeNull();
    expect(isNilLiteral(mkNil(loc(1)))).toBe(true);
    expect(isNilLiteral(mkStr(loc(1), ''))).toBe(false);
    expect(staticMethodName(mkSymbolNode(loc(1), 'x'))).toBe('x');
    expect(staticMethodName(mkLocalVar(loc(1), 'x'))).toBeNull();
  });
});

// ==================================================================
// Children
// ==================================================================

describe('Children', () => {
  test('leaves have no children', () => {
    expect(childrenOf(mkNil(loc(1)))).toEqual({ kind: 'empty' });
    expect(childList(mkLiteral(loc(1), 'foo'))).toEqual([]);
    expect(childList(mkArgs(loc(1), ['a']))).toEqual([]);
  });

  test('undef has its name as the single child', () => {
    const name = mkLiteral(loc(1), 'foo');
    const node = mkUndef(loc(1), name);
    expect(childrenOf(node)).toEqual({ kind: 'single', node: name });
  });

  test('optional children are omitted when absent', () => {
    expect(childList(mkLocalAsgn(loc(1), 'x'))).toEqual([]);
    const value = mkIntNode(loc(1), 1);
    expect(childList(mkLocalAsgn(loc(1), 'x', value))).toEqual([value]);
  });

  test('children are listed in source order', () => {
    const a = mkLocalAsgn(loc(1), 'a');
    const rest = mkLocalAsgn(loc(1), 'r');
    const value = mkArray(loc(1), []);
    expect(childList(mkMultipleAsgn(loc(1), [a], value, rest))).toEqual([a, rest, value]);

    const args = mkArgs(loc(1));
    const body = mkNil(loc(2));
    expect(childList(mkDef(loc(1), 'f', args, body))).toEqual([args, body]);

    const cond = mkTrue(loc(1));
    expect(childList(mkWhile(loc(1), cond, body))).toEqual([cond, body]);

    const newName = mkLiteral(loc(1), 'b');
    const oldName = mkLiteral(loc(1), 'a');
    expect(childList(mkAlias(loc(1), newName, oldName))).toEqual([newName, oldName]);
  });

  test('repeated queries return the same nodes', () => {
    const a = mkLocalAsgn(loc(1), 'a');
    const value = mkArray(loc(1), []);
    const node = mkMultipleAsgn(loc(1), [a], value);
    const first = childList(node);
    const second = childList(node);
    expect(first).toHaveLength(second.length);
    first.forEach((child, i) => expect(child).toBe(second[i]));
    expect(Object.isFrozen(first)).toBe(true);
  });
});

// ==================================================================
// Debug strings
// ==================================================================

describe('toDebugString', () => {
  test('leaves', () => {
    expect(toDebugString(mkNil(loc(3)))).toBe('(Nil 3)');
    expect(toDebugString(mkSymbolNode(loc(2), 'x'))).toBe('(Symbol:x 2)');
  });

  test('undef shows its name child', () => {
    const node = mkUndef(loc(5), mkLiteral(loc(5), 'foo'));
    expect(toDebugString(node)).toBe('(Undef 5, (Literal:foo 5))');
  });

  test('invisible nodes render as empty', () => {
    expect(toDebugString(mkNewline(loc(1), mkCall(loc(1), 'foo')))).toBe('');
    const block = mkBlock(loc(1), [mkNewline(loc(2), mkNil(loc(2))), mkNil(loc(3))]);
    expect(toDebugString(block)).toBe('(Block 1, , (Nil 3))');
  });

  test('nested definitions', () => {
    const def = mkDef(loc(1), 'greet', mkArgs(loc(1), ['a']), mkBlock(loc(2), [mkLocalVar(loc(2), 'a')]));
    expect(toDebugString(def)).toBe('(Def:greet 1, (Args 1), (Block 2, (LocalVar:a 2)))');
  });
});
