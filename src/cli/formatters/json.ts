/**
 * JSON output formatter for machine consumption.
 */
import type { AnalysisOutcome } from '../../core/analyzer.js';
import type { ReportSummary } from '../../core/report/types.js';
import type { Violation } from '../../core/rules/types.js';
import type { IFormatter, FormatOptions } from './types.js';

export class JsonFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  formatOutcome(outcome: AnalysisOutcome): string {
    switch (outcome.status) {
      case 'clean':
      case 'violations-found': {
        const violations = this.errorsOnly
          ? outcome.report.violations.filter((v) => v.severity === 'error')
          : outcome.report.violations;
        return JSON.stringify(
          {
            status: outcome.status,
            elapsed_ms: outcome.elapsedMs,
            summary: this.transformSummary(outcome.report.summary),
            violations: violations.map((v) => this.transformViolation(v)),
          },
          null,
          2
        );
      }
      case 'timeout':
        return JSON.stringify({ status: 'timeout', phase: outcome.phase, elapsed_ms: outcome.elapsedMs }, null, 2);
      case 'config-error':
      case 'internal-error':
        return JSON.stringify({ status: outcome.status, error: outcome.error.toJSON() }, null, 2);
    }
  }

  private transformViolation(v: Violation): Record<string, unknown> {
    const { ruleId, fixHint, lineRange, ...rest } = v;
    return {
      rule: ruleId,
      ...rest,
      line_range: lineRange,
      fix_hint: fixHint,
    };
  }

  private transformSummary(summary: ReportSummary): Record<string, unknown> {
    return {
      total: summary.total,
      files_analyzed: summary.filesAnalyzed,
      by_severity: Object.fromEntries(summary.bySeverity),
      by_rule: Object.fromEntries(summary.byRule),
      by_category: Object.fromEntries(summary.byCategory),
    };
  }
}
