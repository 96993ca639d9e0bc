/**
 * Dependency direction: a layer may only import the layers it lists in `can_import`.
 */
import type { Severity } from '../config/schema.js';
import type { AnalysisPolicy } from '../config/policy.js';
import type { DependencyEdge } from '../graph/types.js';
import { isDependencyAllowed } from '../layers/classifier.js';
import type { ClassifiedModule } from '../layers/types.js';
import { BaseRule, lineAt } from './base.js';
import type { DirectionViolation, RuleContext } from './types.js';

export class LayerDirectionRule extends BaseRule {
  readonly id = 'layer-direction';
  readonly category = 'direction';
  readonly defaultSeverity: Severity = 'error';
  readonly description = 'Imports must follow the allowed layer dependencies';

  evaluate({ graph, policy }: RuleContext, severity: Severity): DirectionViolation[] {
    const violations: DirectionViolation[] = [];

    for (const edge of graph.edges) {
      const from = graph.modules[edge.from];
      const to = graph.modules[edge.to];
      if (!from?.layer || !to?.layer) continue;
      if (isDependencyAllowed(policy.layerPolicy, from.layer, to.layer)) continue;

      const typeOnly = isTypeOnlyCoupling(edge, to, policy);
      const allowed = [...(policy.layerPolicy.allowedTargets.get(from.layer) ?? [])];

      violations.push({
        ...this.base(
          from,
          typeOnly && severity === 'error' ? 'warning' : severity,
          lineAt(edge.line),
          `Layer '${from.layer}' cannot import from '${to.layer}': ${from.path} → ${to.path}` +
            (typeOnly ? ' (type-only coupling)' : ''),
          allowed.length > 0 ? allowed.join(', ') : undefined
        ),
        category: 'direction',
        target: to.path,
        sourceLayer: from.layer,
        targetLayer: to.layer,
        typeOnly,
      });
    }

    return violations;
  }

  protected override getFixHint(allowed?: string): string {
    return allowed
      ? `Depend on a contract instead (allowed layers: ${allowed})`
      : 'This layer may not depend on other layers; move the shared types into it';
  }
}

/**
 * `import type`, or a target that only declares data/contract types and
 * makes no more than the configured number of calls.
 */
export function isTypeOnlyCoupling(edge: DependencyEdge, target: ClassifiedModule, policy: AnalysisPolicy): boolean {
  if (edge.typeOnly) return true;
  return isContractModule(target, policy);
}

export function isContractModule(module: ClassifiedModule, policy: AnalysisPolicy): boolean {
  const { exports, callCount } = module.facts;
  if (exports.length === 0) return false;
  if (callCount > policy.typeOnly.maxCallSites) return false;
  return exports.every((symbol) => policy.typeOnly.declarationKinds.has(symbol.kind));
}
