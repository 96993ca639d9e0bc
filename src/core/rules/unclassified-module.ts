/**
 * Modules matching no layer pattern. They keep their edges but are exempt
 * from direction checks.
 */
import type { Severity } from '../config/schema.js';
import { BaseRule } from './base.js';
import type { ConfigGapViolation, RuleContext } from './types.js';

export class UnclassifiedModuleRule extends BaseRule {
  readonly id = 'unclassified-module';
  readonly category = 'config-gap';
  readonly defaultSeverity: Severity = 'warning';
  readonly description = 'Modules outside every configured layer';

  evaluate({ graph }: RuleContext, severity: Severity): ConfigGapViolation[] {
    return graph.modules
      .filter((module) => module.layer === null)
      .map((module): ConfigGapViolation => ({
        ...this.base(module, severity, null, 'Module matches no layer pattern and is exempt from direction checks'),
        category: 'config-gap',
      }));
  }

  protected override getFixHint(): string {
    return 'Add a layer pattern covering this path, or ignore it with files.ignore';
  }
}
