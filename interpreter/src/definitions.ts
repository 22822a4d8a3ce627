import type { Interpreter } from './interpreter';
import type { ExecutionContext } from './context';
import type { ClassNode, ModuleNode } from './nodes';
import { Environment } from './environment';
import { StrataValue, mkNil } from './values';

/**
 * Open (or reopen) a class or module and run its body with it as the
 * defining scope. The body gets its own local variables.
 */
export function evaluateScopeBody(interp: Interpreter, node: ClassNode | ModuleNode, ctx: ExecutionContext): StrataValue {
  const scope = ctx.openModule(node.name, node.kind === 'Class', node.location);
  const body = node.body;
  if (body === null) return mkNil();

  return ctx.withScope(scope, () =>
    ctx.withEnvironment(new Environment(), () => interp.evaluate(body, ctx)),
  );
}
