/**
 * Shared helpers for rule implementations.
 */
import type { Severity } from '../config/schema.js';
import type { CallSite } from '../ingest/types.js';
import type { ClassifiedModule } from '../layers/types.js';
import type { LineRange, Rule, RuleContext, RuleId, Violation, ViolationCategory } from './types.js';

/**
 * Base class for rules.
 * Provides location helpers and the common violation fields.
 */
export abstract class BaseRule implements Rule {
  abstract readonly id: RuleId;
  abstract readonly category: ViolationCategory;
  abstract readonly defaultSeverity: Severity;
  abstract readonly description: string;

  abstract evaluate(context: RuleContext, severity: Severity): Violation[];

  /**
   * Fields every violation carries.
   */
  protected base(
    module: ClassifiedModule,
    severity: Severity,
    lineRange: LineRange | null,
    message: string,
    hintInput?: string
  ): { ruleId: RuleId; severity: Severity; path: string; lineRange: LineRange | null; message: string; fixHint: string } {
    return {
      ruleId: this.id,
      severity,
      path: module.path,
      lineRange,
      message,
      fixHint: this.getFixHint(hintInput),
    };
  }

  /**
   * Get a suggested fix for the violation.
   * Override in subclasses for specific hints.
   */
  protected getFixHint(_actual?: string): string {
    return `Fix the ${this.id} violation`;
  }
}

/**
 * Single-line range at column 1.
 */
export function lineAt(line: number): LineRange {
  return { start: line, end: line, column: 1 };
}

export function siteRange(site: CallSite): LineRange {
  return { start: site.line, end: Math.max(site.line, site.endLine), column: site.column };
}
