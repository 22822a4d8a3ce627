import type { Interpreter } from './interpreter';
import type { ExecutionContext } from './context';
import type { ArrayNode, Node } from './nodes';
import { StrataValue, mkList, valueToString } from './values';

/**
 * Concatenate the string form of each interpolated part, left to right.
 */
export function evaluateInterpolation(interp: Interpreter, parts: readonly Node[], ctx: ExecutionContext): string {
  let out = '';
  for (const part of parts) {
    out += valueToString(interp.evaluate(part, ctx));
  }
  return out;
}

export function evaluateArray(interp: Interpreter, node: ArrayNode, ctx: ExecutionContext): StrataValue {
  return mkList(node.elements.map((element) => interp.evaluate(element, ctx)));
}
