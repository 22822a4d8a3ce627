/**
 * Local variables and destructuring assignment.
 */

import type { Interpreter } from './interpreter';
import type { ExecutionContext } from './context';
import type { LocalAsgnNode, MultipleAsgnNode } from './nodes';
import { StrataValue, mkList, mkNil } from './values';
import { StrataArgumentError, StrataInternalError } from './errors';

export function evaluateLocalAsgn(interp: Interpreter, node: LocalAsgnNode, ctx: ExecutionContext): StrataValue {
  if (node.value === null) {
    throw new StrataInternalError(`Assignment to '${node.name}' has no value to evaluate`);
  }
  return assignLocal(node, ctx, interp.evaluate(node.value, ctx));
}

export function assignLocal(node: LocalAsgnNode, ctx: ExecutionContext, value: StrataValue): StrataValue {
  ctx.environment.assign(node.name, value);
  return value;
}

/**
 * `a, b = expr` never checks arity: missing values become nil and
 * surplus values are dropped unless there is a rest target.
 */
export function evaluateMultipleAsgn(interp: Interpreter, node: MultipleAsgnNode, ctx: ExecutionContext): StrataValue {
  if (node.value === null) {
    throw new StrataInternalError('Destructuring assignment has no value to evaluate');
  }
  const value = interp.evaluate(node.value, ctx);
  assignMultiple(interp, node, ctx, value, false);
  return value;
}

export function assignMultiple(
  interp: Interpreter,
  node: MultipleAsgnNode,
  ctx: ExecutionContext,
  value: StrataValue,
  checkArity: boolean,
): StrataValue {
  const elements = value.kind === 'list' ? value.elements : [value];
  const count = node.targets.length;

  if (checkArity && node.rest === null && elements.length !== count) {
    throw new StrataArgumentError(elements.length, count, node.location);
  }

  node.targets.forEach((target, i) => {
    interp.assign(target, ctx, i < elements.length ? elements[i] : mkNil(), false);
  });
  if (node.rest !== null) {
    interp.assign(node.rest, ctx, mkList(elements.slice(count)), false);
  }
  return value;
}
