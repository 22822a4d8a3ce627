import type { Interpreter } from './interpreter';
import type { ExecutionContext } from './context';
import type { BlockNode, BreakNode, NextNode, ReturnNode, WhileNode } from './nodes';
import { StrataValue, isTruthy, mkNil } from './values';
import { BreakSignal, NextSignal, ReturnSignal } from './errors';

export function evaluateBlock(interp: Interpreter, node: BlockNode, ctx: ExecutionContext): StrataValue {
  let result = mkNil();
  for (const statement of node.statements) {
    result = interp.evaluate(statement, ctx);
  }
  return result;
}

export function evaluateWhile(interp: Interpreter, node: WhileNode, ctx: ExecutionContext): StrataValue {
  while (true) {
    const cond = interp.evaluate(node.condition, ctx);
    if (!isTruthy(cond)) break;
    try {
      interp.evaluate(node.body, ctx);
    } catch (e) {
      if (e instanceof BreakSignal) return e.value;
      if (e instanceof NextSignal) continue;
      throw e;
    }
  }

  return mkNil();
}

export function evaluateJump(
  interp: Interpreter,
  node: BreakNode | NextNode | ReturnNode,
  ctx: ExecutionContext,
): never {
  const value = node.value !== null ? interp.evaluate(node.value, ctx) : mkNil();
  if (node.kind === 'Break') throw new BreakSignal(value, node.location);
  if (node.kind === 'Next') throw new NextSignal(value, node.location);
  throw new ReturnSignal(value, node.location);
}
