/**
 * Debug rendering of syntax trees.
 */

import { Node, nameOf } from './nodes';
import { childList } from './children';
import { isInvisibleKind } from './kinds';

/**
 * Render a node as `(Kind[:name] line, child, ...)`. Invisible nodes
 * render as the empty string, children and all.
 */
export function toDebugString(node: Node): string {
  if (isInvisibleKind(node.kind)) return '';

  let out = `(${node.kind}`;
  const name = nameOf(node);
  if (name !== null) {
    out += `:${name}`;
  }
  out += ` ${node.location.startLine}`;
  for (const child of childList(node)) {
    out += `, ${toDebugString(child)}`;
  }
  return out + ')';
}
