/**
 * Parse failures: one record per file whose facts are incomplete.
 */
import type { Severity } from '../config/schema.js';
import { BaseRule, lineAt } from './base.js';
import type { ParseFailureViolation, RuleContext } from './types.js';

export class ParseFailureRule extends BaseRule {
  readonly id = 'parse-failure';
  readonly category = 'parse-failure';
  readonly defaultSeverity: Severity = 'warning';
  readonly description = 'Files that could not be parsed completely';

  evaluate({ graph }: RuleContext, severity: Severity): ParseFailureViolation[] {
    return graph.modules
      .filter((module) => !module.facts.parseOk)
      .map((module): ParseFailureViolation => {
        const errors = module.facts.parseErrors;
        const line = firstErrorLine(errors);
        return {
          ...this.base(
            module,
            severity,
            line === null ? null : lineAt(line),
            `Could not parse file completely: ${errors[0] ?? 'unknown error'}`
          ),
          category: 'parse-failure',
          errors: [...errors],
        };
      });
  }

  protected override getFixHint(): string {
    return 'Fix the syntax error or exclude the file with files.ignore';
  }
}

function firstErrorLine(errors: readonly string[]): number | null {
  const match = errors[0]?.match(/^line (\d+):/);
  if (!match?.[1]) return null;
  const line = Number.parseInt(match[1], 10);
  return line >= 1 ? line : null;
}
