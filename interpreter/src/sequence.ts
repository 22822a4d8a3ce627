/**
 * Read-only sequence views over syntax tree nodes.
 *
 * A consumer that expects "a sequence of statements" can be handed a
 * single expression through `sequenceOf`: the view holds exactly that
 * node. Membership is by identity, and every mutator is rejected.
 */

import { Node } from './nodes';
import { StrataIndexError, StrataUnsupportedOperationError } from './errors';

export class NodeSequence implements Iterable<Node> {
  private readonly items: readonly Node[];

  constructor(items: readonly Node[]) {
    this.items = Object.freeze([...items]);
  }

  size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  get(index: number): Node {
    const node = Number.isInteger(index) ? this.items[index] : undefined;
    if (node === undefined) {
      throw new StrataIndexError(`Index: ${index}, Size: ${this.items.length}`);
    }
    return node;
  }

  contains(candidate: unknown): boolean {
    return this.indexOf(candidate) !== -1;
  }

  /**
   * True when `candidates` is non-empty, no longer than this view, and
   * every candidate is an element. A singleton view therefore accepts
   * only a one-element collection holding its node.
   */
  containsAll(candidates: Iterable<unknown>): boolean {
    const list = [...candidates];
    if (list.length === 0 || list.length > this.items.length) return false;
    return list.every((candidate) => this.contains(candidate));
  }

  indexOf(candidate: unknown): number {
    return this.items.findIndex((node) => node === candidate);
  }

  lastIndexOf(candidate: unknown): number {
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (this.items[i] === candidate) return i;
    }
    return -1;
  }

  /**
   * The half-open range [from, to). Empty ranges share `EMPTY_SEQUENCE`;
   * the full range is this view.
   */
  subList(from: number, to: number): NodeSequence {
    const size = this.items.length;
    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || to > size || from > to) {
      throw new StrataIndexError(`From: ${from}, To: ${to}, Size: ${size}`);
    }
    if (from === to) return EMPTY_SEQUENCE;
    if (from === 0 && to === size) return this;
    return new NodeSequence(this.items.slice(from, to));
  }

  toArray(): Node[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<Node> {
    return this.items[Symbol.iterator]();
  }

  // ---- Rejected mutators ----

  add(_node: Node): never {
    throw new StrataUnsupportedOperationError('add');
  }

  insert(_index: number, _node: Node): never {
    throw new StrataUnsupportedOperationError('insert');
  }

  remove(_node: Node): never {
    throw new StrataUnsupportedOperationError('remove');
  }

  removeAt(_index: number): never {
    throw new StrataUnsupportedOperationError('removeAt');
  }

  set(_index: number, _node: Node): never {
    throw new StrataUnsupportedOperationError('set');
  }

  clear(): never {
    throw new StrataUnsupportedOperationError('clear');
  }

  addAll(_nodes: Iterable<Node>): never {
    throw new StrataUnsupportedOperationError('addAll');
  }

  retainAll(_nodes: Iterable<Node>): never {
    throw new StrataUnsupportedOperationError('retainAll');
  }

  removeAll(_nodes: Iterable<Node>): never {
    throw new StrataUnsupportedOperationError('removeAll');
  }
}

export const EMPTY_SEQUENCE = new NodeSequence([]);

/**
 * A node presented as the one-element sequence containing itself.
 */
export function sequenceOf(node: Node): NodeSequence {
  return new NodeSequence([node]);
}

/**
 * A block's statements, or any other node as a single statement.
 */
export function statementsOf(node: Node): NodeSequence {
  if (node.kind === 'Block') {
    return node.statements.length === 0 ? EMPTY_SEQUENCE : new NodeSequence(node.statements);
  }
  return sequenceOf(node);
}
