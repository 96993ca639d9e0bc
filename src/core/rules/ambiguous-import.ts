/**
 * Imports that resolve to more than one file are treated as external and
 * reported instead of guessed.
 */
import type { Severity } from '../config/schema.js';
import { BaseRule, lineAt } from './base.js';
import type { ResolutionViolation, RuleContext } from './types.js';

export class AmbiguousImportRule extends BaseRule {
  readonly id = 'ambiguous-import';
  readonly category = 'resolution';
  readonly defaultSeverity: Severity = 'warning';
  readonly description = 'Import specifiers that match several files';

  evaluate({ graph }: RuleContext, severity: Severity): ResolutionViolation[] {
    return graph.modules.flatMap((module) =>
      module.externals
        .filter((imp) => imp.resolution === 'ambiguous')
        .map((imp): ResolutionViolation => ({
          ...this.base(
            module,
            severity,
            lineAt(imp.line),
            `Import '${imp.rawSpecifier}' is ambiguous: ${imp.candidates.join(', ')}`
          ),
          category: 'resolution',
          specifier: imp.rawSpecifier,
          candidates: [...imp.candidates],
        }))
    );
  }

  protected override getFixHint(): string {
    return 'Use a specifier that names one file';
  }
}
