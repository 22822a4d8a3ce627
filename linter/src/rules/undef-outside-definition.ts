/**
 * Lint rule: undef-outside-definition
 *
 * `undef` and `alias` act on the class or module being defined. At top
 * level there is none, so the statement always fails at run time.
 */

import { LintRule, RuleFinding } from '../linter';
import { Node, staticMethodName } from '../../../interpreter/src/nodes';
import { walk } from '../../../interpreter/src/visitor';

function isDefiningScope(node: Node): boolean {
  return node.kind === 'Class' || node.kind === 'Module';
}

export const undefOutsideDefinitionRule: LintRule = {
  name: 'undef-outside-definition',
  description: 'Warn on undef or alias with no enclosing class or module body',
  severity: 'warning',

  run(root: Node): RuleFinding[] {
    const findings: RuleFinding[] = [];

    walk(root, (node, ancestors) => {
      if (node.kind !== 'Undef' && node.kind !== 'Alias') return;
      if (ancestors.some(isDefiningScope)) return;

      const keyword = node.kind === 'Undef' ? 'undef' : 'alias';
      const name = staticMethodName(node.kind === 'Undef' ? node.name : node.newName);
      const subject = name !== null ? `${keyword} '${name}'` : keyword;
      findings.push({
        message: `${subject} outside a class or module body`,
        file: node.location.file,
        line: node.location.startLine,
      });
    });

    return findings;
  },
};
