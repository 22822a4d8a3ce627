/**
 * Lint rule: unreachable-code
 *
 * Statements after a break, next or return in the same block never run.
 * Reported once per block, at the first unreachable statement.
 */

import { LintRule, RuleFinding } from '../linter';
import type { Node } from '../../../interpreter/src/nodes';
import { NodeVisitor, dispatch, fallbackVisitor, walk } from '../../../interpreter/src/visitor';

/** The jump keyword a statement ends in, looking through newline wrappers. */
const jumpKeyword: NodeVisitor<string | null> = {
  ...fallbackVisitor<string | null>(() => null),
  visitBreak: () => 'break',
  visitNext: () => 'next',
  visitReturn: () => 'return',
  visitNewline: (node) => dispatch(node.statement, jumpKeyword),
};

export const unreachableCodeRule: LintRule = {
  name: 'unreachable-code',
  description: 'Warn on statements that follow a break, next or return',
  severity: 'warning',

  run(root: Node): RuleFinding[] {
    const findings: RuleFinding[] = [];

    walk(root, (node) => {
      if (node.kind !== 'Block') return;
      const statements = node.statements;
      for (let i = 0; i < statements.length - 1; i++) {
        const keyword = dispatch(statements[i], jumpKeyword);
        if (keyword === null) continue;
        const next = statements[i + 1];
        findings.push({
          message: `unreachable statement after ${keyword}`,
          file: next.location.file,
          line: next.location.startLine,
        });
        break;
      }
    });

    return findings;
  },
};
