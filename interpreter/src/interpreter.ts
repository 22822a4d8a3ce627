/**
 * Tree-walking interpreter for Strata syntax trees.
 *
 * The interpreter itself is stateless: every call takes the
 * ExecutionContext that carries bindings, open scopes and call depth,
 * so one tree may be evaluated by several contexts at once.
 */

import { Node, unreachable } from './nodes';
import { ExecutionContext, WarningSink } from './context';
import { InterpreterOptions, InterpreterOptionsInput, resolveOptions } from './options';
import {
  StrataValue,
  mkNil,
  mkBool,
  mkInt,
  mkFloat,
  mkString,
  mkSymbol,
} from './values';
import {
  JumpSignal,
  ReturnSignal,
  StrataInternalError,
  StrataLocalJumpError,
} from './errors';
import { evaluateArray, evaluateInterpolation } from './literals';
import { assignLocal, assignMultiple, evaluateLocalAsgn, evaluateMultipleAsgn } from './variables';
import { evaluateBlock, evaluateJump, evaluateWhile } from './control-flow';
import { evaluateScopeBody } from './definitions';
import { evaluateAlias, evaluateCall, evaluateDef, evaluateUndef } from './methods';

/**
 * What a definedness probe reports for an expression that would succeed.
 */
export type DefinitionKind = 'expression';

/**
 * Result of evaluating a node without letting jump signals escape.
 * Any other failure is thrown, not represented here.
 */
export type EvalOutcome =
  | { kind: 'value'; value: StrataValue }
  | { kind: 'jump'; signal: JumpSignal };

export class Interpreter {
  readonly options: InterpreterOptions;

  constructor(options: InterpreterOptionsInput = {}) {
    this.options = resolveOptions(options);
  }

  createContext(warningSink?: WarningSink): ExecutionContext {
    return new ExecutionContext(this.options, warningSink);
  }

  /**
   * Evaluate a whole tree. A top-level return yields its value; a break or
   * next with no loop to receive it is a LocalJumpError.
   */
  run(root: Node, context: ExecutionContext = this.createContext()): StrataValue {
    try {
      return this.evaluate(root, context);
    } catch (e) {
      if (e instanceof ReturnSignal) return e.value;
      if (e instanceof JumpSignal) {
        throw new StrataLocalJumpError(e.keyword, e.location ?? root.location);
      }
      throw e;
    }
  }

  /**
   * Main dispatch: evaluate any node.
   */
  evaluate(node: Node, ctx: ExecutionContext): StrataValue {
    switch (node.kind) {
      // ---- Literals ----
      case 'Nil':
        return mkNil();
      case 'True':
        return mkBool(true);
      case 'False':
        return mkBool(false);
      case 'Int':
        return mkInt(node.value);
      case 'Float':
        return mkFloat(node.value);
      case 'Str':
        return mkString(node.value);
      case 'Symbol':
        return mkSymbol(node.name);
      case 'DStr':
        return mkString(evaluateInterpolation(this, node.parts, ctx));
      case 'DSymbol':
        return mkSymbol(evaluateInterpolation(this, node.parts, ctx));
      case 'Array':
        return evaluateArray(this, node, ctx);

      // ---- Variables ----
      case 'LocalVar':
        return ctx.environment.get(node.name, node.location);
      case 'LocalAsgn':
        return evaluateLocalAsgn(this, node, ctx);
      case 'MultipleAsgn':
        return evaluateMultipleAsgn(this, node, ctx);

      // ---- Statements ----
      case 'Block':
        return evaluateBlock(this, node, ctx);
      case 'Newline':
        return this.evaluate(node.statement, ctx);
      case 'While':
        return evaluateWhile(this, node, ctx);
      case 'Break':
      case 'Next':
      case 'Return':
        return evaluateJump(this, node, ctx);
      case 'Defined': {
        const kind = this.definitionCheck(node.expression, ctx);
        return kind !== null ? mkString(kind) : mkNil();
      }

      // ---- Definitions ----
      case 'Def':
        return evaluateDef(node, ctx);
      case 'Call':
        return evaluateCall(this, node, ctx);
      case 'Class':
      case 'Module':
        return evaluateScopeBody(this, node, ctx);
      case 'Undef':
        return evaluateUndef(this, node, ctx);
      case 'Alias':
        return evaluateAlias(this, node, ctx);

      // ---- Structural only ----
      case 'Literal':
      case 'Args':
        throw new StrataInternalError(`Invalid node for evaluation: ${node.kind}`);

      default:
        return unreachable(node);
    }
  }

  /**
   * Bind `value` to an assignment target. `checkArity` makes destructuring
   * strict about the number of values.
   */
  assign(node: Node, ctx: ExecutionContext, value: StrataValue, checkArity: boolean): StrataValue {
    switch (node.kind) {
      case 'LocalAsgn':
        return assignLocal(node, ctx, value);
      case 'MultipleAsgn':
        return assignMultiple(this, node, ctx, value, checkArity);
      default:
        throw new StrataInternalError(`Invalid assignment target: ${node.kind}`);
    }
  }

  /**
   * Report whether `node` is defined without surfacing its value.
   *
   * Every kind is evaluated through `probe`, so runtime conditions are
   * detected exactly as normal evaluation would detect them. A jump signal
   * means "not defined"; any other failure propagates unchanged. The
   * probe's side effects are kept.
   */
  definitionCheck(node: Node, ctx: ExecutionContext): DefinitionKind | null {
    const outcome = this.probe(node, ctx);
    return outcome.kind === 'value' ? 'expression' : null;
  }

  probe(node: Node, ctx: ExecutionContext): EvalOutcome {
    try {
      return { kind: 'value', value: this.evaluate(node, ctx) };
    } catch (e) {
      if (e instanceof JumpSignal) return { kind: 'jump', signal: e };
      throw e;
    }
  }
}
