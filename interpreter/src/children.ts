/**
 * Child access for syntax tree nodes.
 *
 * `childrenOf` reports the shape (none, exactly one, or an ordered list)
 * and `childList` flattens any shape into a read-only array, so generic
 * tree walkers treat a lone child and a statement list the same way.
 */

import { Node, unreachable } from './nodes';

export type Children =
  | { kind: 'empty' }
  | { kind: 'single'; node: Node }
  | { kind: 'many'; nodes: readonly Node[] };

const EMPTY: Children = Object.freeze({ kind: 'empty' });
const EMPTY_NODES: readonly Node[] = Object.freeze([]);

function optional(node: Node | null): Children {
  return node === null ? EMPTY : { kind: 'single', node };
}

function many(...groups: ReadonlyArray<Node | null | readonly Node[]>): Children {
  const nodes: Node[] = [];
  for (const group of groups) {
    if (group === null) continue;
    if ('kind' in group) nodes.push(group);
    else nodes.push(...group);
  }
  return { kind: 'many', nodes: Object.freeze(nodes) };
}

/**
 * Direct sub-nodes of a node in source order.
 */
export function childrenOf(node: Node): Children {
  switch (node.kind) {
    case 'Nil':
    case 'True':
    case 'False':
    case 'Int':
    case 'Float':
    case 'Str':
    case 'Symbol':
    case 'Literal':
    case 'LocalVar':
    case 'Args':
      return EMPTY;
    case 'DStr':
    case 'DSymbol':
      return { kind: 'many', nodes: node.parts };
    case 'Array':
      return { kind: 'many', nodes: node.elements };
    case 'Block':
      return { kind: 'many', nodes: node.statements };
    case 'Call':
      return { kind: 'many', nodes: node.args };
    case 'LocalAsgn':
    case 'Break':
    case 'Next':
    case 'Return':
      return optional(node.value);
    case 'Class':
    case 'Module':
      return optional(node.body);
    case 'MultipleAsgn':
      return many(node.targets, node.rest, node.value);
    case 'Newline':
      return { kind: 'single', node: node.statement };
    case 'Undef':
      return { kind: 'single', node: node.name };
    case 'Defined':
      return { kind: 'single', node: node.expression };
    case 'Def':
      return many(node.args, node.body);
    case 'Alias':
      return many(node.newName, node.oldName);
    case 'While':
      return many(node.condition, node.body);
    default:
      return unreachable(node);
  }
}

/**
 * Direct sub-nodes as a frozen array; empty for leaves.
 */
export function childList(node: Node): readonly Node[] {
  const children = childrenOf(node);
  switch (children.kind) {
    case 'empty': return EMPTY_NODES;
    case 'single': return Object.freeze([children.node]);
    case 'many': return children.nodes;
  }
}
