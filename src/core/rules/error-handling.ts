/**
 * Error-handling shape: an error handler must recover, log or rethrow.
 */
import type { Severity } from '../config/schema.js';
import { BaseRule, siteRange } from './base.js';
import type { ErrorShapeViolation, RuleContext } from './types.js';

export class ErrorHandlingRule extends BaseRule {
  readonly id = 'error-handling';
  readonly category = 'error-shape';
  readonly defaultSeverity: Severity = 'error';
  readonly description = 'Error handlers must not be empty';

  evaluate({ graph }: RuleContext, severity: Severity): ErrorShapeViolation[] {
    return graph.modules.flatMap((module) =>
      module.facts.emptyHandlerSites.map((site): ErrorShapeViolation => ({
        ...this.base(
          module,
          severity,
          siteRange(site),
          `Empty error handler '${site.callee}' silently discards the error`,
          site.callee
        ),
        category: 'error-shape',
        construct: site.callee,
      }))
    );
  }

  protected override getFixHint(construct?: string): string {
    return construct === 'if err != nil'
      ? 'Return or wrap the error'
      : 'Log or rethrow the error';
  }
}
