/**
 * Static checks over Strata syntax trees.
 *
 * Each rule walks the tree it is given and returns findings; the linter
 * picks which rules run, applies severity overrides and orders the
 * result by line.
 */

import type { Node } from '../../interpreter/src/nodes';
import { undefOutsideDefinitionRule } from './rules/undef-outside-definition';
import { unreachableCodeRule } from './rules/unreachable-code';

export type Severity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  rule: string;
  severity: Severity;
  message: string;
  file: string;
  line: number;
}

/** What a rule reports; the linter adds the rule name and severity. */
export type RuleFinding = Pick<Diagnostic, 'message' | 'file' | 'line'>;

export interface LintRule {
  /** Identifier used in options and output, e.g. "unreachable-code". */
  name: string;
  description: string;
  /** Severity the rule reports with unless overridden. */
  severity: Severity;
  run(root: Node): RuleFinding[];
}

export interface LintOptions {
  /** Only these rules run. Empty or absent means all of them. */
  enabledRules?: string[];
  disabledRules?: string[];
  /** Per-rule severity, replacing what the rule reports. */
  severities?: Record<string, Severity>;
}

export class Linter {
  private readonly registered: LintRule[] = [];

  addRule(rule: LintRule): void {
    this.registered.push(rule);
  }

  getRuleNames(): string[] {
    return this.registered.map((rule) => rule.name);
  }

  lint(root: Node, options: LintOptions = {}): Diagnostic[] {
    const severities = options.severities ?? {};
    const found: Diagnostic[] = [];

    for (const rule of this.selectRules(options)) {
      found.push(...this.runRule(rule, root, severities[rule.name] ?? rule.severity));
    }

    // Stable sort: findings on one line keep rule registration order.
    return found.sort((a, b) => a.line - b.line);
  }

  private selectRules(options: LintOptions): LintRule[] {
    const only = new Set(options.enabledRules ?? []);
    const skip = new Set(options.disabledRules ?? []);
    return this.registered.filter(
      (rule) => !skip.has(rule.name) && (only.size === 0 || only.has(rule.name)),
    );
  }

  private runRule(rule: LintRule, root: Node, severity: Severity): Diagnostic[] {
    try {
      return rule.run(root).map((finding) => ({ rule: rule.name, severity, ...finding }));
    } catch (e) {
      return [{
        rule: rule.name,
        severity: 'error',
        message: `Rule failed internally: ${e instanceof Error ? e.message : String(e)}`,
        file: root.location.file,
        line: 0,
      }];
    }
  }
}

const SEVERITY_TAGS: Record<Severity, string> = {
  error: 'error',
  warning: 'warn',
  info: 'info',
};

/** One diagnostic as a terminal line. */
export function formatDiagnostic(d: Diagnostic): string {
  return `  ${d.file}:${d.line}  ${SEVERITY_TAGS[d.severity]}  ${d.message}  (${d.rule})`;
}

export function createDefaultLinter(): Linter {
  const linter = new Linter();
  linter.addRule(undefOutsideDefinitionRule);
  linter.addRule(unreachableCodeRule);
  return linter;
}
