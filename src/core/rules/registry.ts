/**
 * Rule registry: maps rule ids to their implementations.
 */
import type { Rule, RuleId } from './types.js';
import { RULE_IDS } from './types.js';

import { LayerDirectionRule } from './layer-direction.js';
import { IoIsolationRule } from './io-isolation.js';
import { ModuleBoundaryRule } from './module-boundary.js';
import { ErrorHandlingRule } from './error-handling.js';
import { CircularDependencyRule } from './circular-dependency.js';
import { ParseFailureRule } from './parse-failure.js';
import { UnclassifiedModuleRule } from './unclassified-module.js';
import { AmbiguousImportRule } from './ambiguous-import.js';

/**
 * Registry of all rules. Rules hold no state, so one instance each is shared.
 */
const ruleRegistry = new Map<RuleId, Rule>();

ruleRegistry.set('layer-direction', new LayerDirectionRule());
ruleRegistry.set('io-isolation', new IoIsolationRule());
ruleRegistry.set('module-boundary', new ModuleBoundaryRule());
ruleRegistry.set('error-handling', new ErrorHandlingRule());
ruleRegistry.set('circular-dependency', new CircularDependencyRule());
// Diagnostics
ruleRegistry.set('parse-failure', new ParseFailureRule());
ruleRegistry.set('unclassified-module', new UnclassifiedModuleRule());
ruleRegistry.set('ambiguous-import', new AmbiguousImportRule());

/**
 * Get the rule for an id.
 */
export function getRule(id: RuleId): Rule | undefined {
  return ruleRegistry.get(id);
}

/**
 * Every registered rule, in registration order.
 */
export function getAllRules(): Rule[] {
  return RULE_IDS.flatMap((id) => {
    const rule = ruleRegistry.get(id);
    return rule ? [rule] : [];
  });
}
