/**
 * Module boundary: another feature's files are reachable only through its
 * public API file.
 */
import * as path from 'node:path';
import type { Severity } from '../config/schema.js';
import type { BoundaryPolicy } from '../config/policy.js';
import { BaseRule, lineAt } from './base.js';
import type { BoundaryViolation, RuleContext } from './types.js';

export class ModuleBoundaryRule extends BaseRule {
  readonly id = 'module-boundary';
  readonly category = 'boundary';
  readonly defaultSeverity: Severity = 'error';
  readonly description = 'Features may only be imported through their public API';

  evaluate({ graph, policy }: RuleContext, severity: Severity): BoundaryViolation[] {
    const violations: BoundaryViolation[] = [];

    for (const edge of graph.edges) {
      const from = graph.modules[edge.from];
      const to = graph.modules[edge.to];
      if (!from || !to || to.feature === null || from.feature === to.feature) continue;
      if (isPublicApi(to.path, to.feature, policy.boundaries)) continue;

      violations.push({
        ...this.base(
          from,
          severity,
          lineAt(edge.line),
          `'${to.path}' is internal to feature '${to.feature}'`,
          to.feature
        ),
        category: 'boundary',
        target: to.path,
        feature: to.feature,
      });
    }

    return violations;
  }

  protected override getFixHint(feature?: string): string {
    return `Import from the public API of '${feature ?? 'the feature'}' or export the symbol there`;
  }
}

/**
 * Whether a file is its feature's public entry point.
 */
export function isPublicApi(filePath: string, feature: string, boundaries: BoundaryPolicy): boolean {
  const relative = path.posix.relative(feature, filePath);
  const pattern = boundaries.overrides.get(feature) ?? boundaries.publicApi;
  return pattern.match(relative);
}
