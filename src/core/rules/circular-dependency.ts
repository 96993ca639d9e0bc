/**
 * Circular dependencies: every member of a cycle group is reported at its
 * import of the next member.
 */
import type { Severity } from '../config/schema.js';
import { isCycleEdgeAllowed } from '../graph/builder.js';
import { ErrorCodes, InvariantError } from '../../utils/errors.js';
import { BaseRule, lineAt } from './base.js';
import type { CycleViolation, RuleContext } from './types.js';

export class CircularDependencyRule extends BaseRule {
  readonly id = 'circular-dependency';
  readonly category = 'cycle';
  readonly defaultSeverity: Severity = 'error';
  readonly description = 'Modules must not depend on each other in a cycle';

  evaluate({ graph, policy }: RuleContext, severity: Severity): CycleViolation[] {
    const violations: CycleViolation[] = [];

    for (const group of graph.cycles) {
      const inGroup = new Set(group);
      const members = group.map((i) => graph.modules[i]?.path ?? '');

      for (const index of group) {
        const module = graph.modules[index];
        // outgoing is sorted by target, so this is the lowest-path member imported
        const edge = (graph.outgoing[index] ?? [])
          .map((e) => graph.edges[e])
          .find((e) => e !== undefined && inGroup.has(e.to) && !isCycleEdgeAllowed(graph.modules, e, policy.cycleAllowList));
        const target = edge ? graph.modules[edge.to] : undefined;

        if (!module || !edge || !target) {
          throw new InvariantError(ErrorCodes.UNEXPECTED, `Cycle member ${index} has no edge inside its cycle group`, {
            module: index,
            group: [...group],
          });
        }

        violations.push({
          ...this.base(
            module,
            severity,
            lineAt(edge.line),
            `Circular dependency: ${module.path} → ${target.path} (cycle of ${group.length} modules)`,
            members.join(', ')
          ),
          category: 'cycle',
          target: target.path,
          members,
        });
      }
    }

    return violations;
  }

  protected override getFixHint(members?: string): string {
    return `Break the cycle between ${members ?? 'these modules'} by extracting the shared part into a module both can import`;
  }
}
