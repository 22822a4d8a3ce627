/**
 * Method definition, invocation, undef and alias.
 */

import type { Interpreter } from './interpreter';
import type { ExecutionContext } from './context';
import type { MethodEntry } from './runtime-module';
import { AliasNode, CallNode, DefNode, Node, UndefNode, staticMethodName } from './nodes';
import { Environment } from './environment';
import { StrataValue, inspect, mkNil, mkSymbol } from './values';
import {
  ReturnSignal,
  StrataArgumentError,
  StrataNoMethodError,
  StrataTypeError,
} from './errors';

/**
 * The method name a name node denotes. Static names are read directly;
 * interpolated ones are evaluated and must produce a symbol or string.
 */
export function resolveMethodName(interp: Interpreter, node: Node, ctx: ExecutionContext): string {
  const name = staticMethodName(node);
  if (name !== null) return name;

  const value = interp.evaluate(node, ctx);
  if (value.kind === 'symbol') return value.name;
  if (value.kind === 'string') return value.value;
  throw new StrataTypeError(`${inspect(value)} is not a symbol nor a string`, node.location);
}

export function evaluateDef(node: DefNode, ctx: ExecutionContext): StrataValue {
  const scope = ctx.currentScope();
  if (scope === null) {
    throw new StrataTypeError(`No class to add method '${node.name}' to`, node.location);
  }
  scope.defineMethod(node.name, node.args.params, node.body, node.location);
  return mkSymbol(node.name);
}

export function evaluateUndef(interp: Interpreter, node: UndefNode, ctx: ExecutionContext): StrataValue {
  const scope = ctx.currentScope();
  if (scope === null) {
    const name = staticMethodName(node.name);
    throw new StrataTypeError(
      name !== null ? `No class to undef method '${name}'.` : 'No class to undef method.',
      node.location,
    );
  }

  scope.undef(ctx, resolveMethodName(interp, node.name, ctx), node.location);
  return mkNil();
}

export function evaluateAlias(interp: Interpreter, node: AliasNode, ctx: ExecutionContext): StrataValue {
  const scope = ctx.currentScope();
  if (scope === null) {
    throw new StrataTypeError('No class to make alias', node.location);
  }

  const newName = resolveMethodName(interp, node.newName, ctx);
  const oldName = resolveMethodName(interp, node.oldName, ctx);
  scope.alias(newName, oldName, node.location);
  return mkNil();
}

export function evaluateCall(interp: Interpreter, node: CallNode, ctx: ExecutionContext): StrataValue {
  const scope = ctx.currentScope();
  const method = scope !== null ? scope.findMethod(node.name) : null;
  if (method === null) {
    const receiver = scope !== null ? scope.describe() : 'main';
    throw new StrataNoMethodError(`undefined method '${node.name}' for ${receiver}`, node.name, node.location);
  }

  const args = node.args.map((arg) => interp.evaluate(arg, ctx));
  if (args.length !== method.params.length) {
    throw new StrataArgumentError(args.length, method.params.length, node.location);
  }

  const env = new Environment();
  method.params.forEach((param, i) => env.assign(param, args[i]));

  return ctx.enterCall(node.location, () =>
    ctx.withScope(method.owner, () =>
      ctx.withEnvironment(env, () => invokeBody(interp, method, ctx)),
    ),
  );
}

function invokeBody(interp: Interpreter, method: MethodEntry, ctx: ExecutionContext): StrataValue {
  if (method.body === null) return mkNil();
  try {
    return interp.evaluate(method.body, ctx);
  } catch (e) {
    if (e instanceof ReturnSignal) return e.value;
    throw e;
  }
}
