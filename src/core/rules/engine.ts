/**
 * RuleEngine: runs every enabled rule over the classified graph.
 * Rules are independent; the result is their union in rule order.
 */
import type { Deadline } from '../deadline.js';
import { effectiveSeverity, isRuleEnabled } from '../config/policy.js';
import { getAllRules } from './registry.js';
import type { Rule, RuleContext, Violation } from './types.js';

export class RuleEngine {
  private readonly rules: readonly Rule[];

  /**
   * @param rules - Rules to run, in evaluation order (default: all registered)
   */
  constructor(rules?: readonly Rule[]) {
    this.rules = rules ?? getAllRules();
  }

  /**
   * Evaluate all enabled rules.
   * @throws DeadlineError when the deadline expires between rules
   */
  evaluate(context: RuleContext, deadline?: Deadline): Violation[] {
    const violations: Violation[] = [];

    for (const rule of this.rules) {
      deadline?.check('evaluation');
      if (!isRuleEnabled(context.policy, rule.id)) continue;

      const severity = effectiveSeverity(context.policy, rule.id, rule.defaultSeverity);
      violations.push(...rule.evaluate(context, severity));
    }

    return violations;
  }
}
