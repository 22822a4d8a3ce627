/**
 * Strata syntax tree core.
 *
 * Trees are built with the `mk*` node constructors, evaluated by an
 * Interpreter against an ExecutionContext, and inspected by passes that
 * implement NodeVisitor.
 */

export * from './location';
export * from './kinds';
export * from './nodes';
export * from './children';
export * from './sequence';
export * from './visitor';
export * from './debug';
export * from './errors';
export {
  StrataValue,
  mkBool,
  mkFloat,
  mkInt,
  mkList,
  mkString,
  mkSymbol,
  isTruthy,
  inspect,
  valueToString,
} from './values';
export { mkNil as mkNilValue } from './values';
export { Environment } from './environment';
export { RuntimeModule, MethodEntry } from './runtime-module';
export { ExecutionContext, WarningSink } from './context';
export * from './options';
export { Interpreter, DefinitionKind, EvalOutcome } from './interpreter';
export { resolveMethodName } from './methods';
