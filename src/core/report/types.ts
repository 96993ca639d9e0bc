/**
 * Report types.
 */
import type { Severity } from '../config/schema.js';
import type { RuleId, Violation, ViolationCategory } from '../rules/types.js';

export interface ReportSummary {
  readonly total: number;
  /** Every known key is present, in declaration order */
  readonly byRule: ReadonlyMap<RuleId, number>;
  readonly bySeverity: ReadonlyMap<Severity, number>;
  readonly byCategory: ReadonlyMap<ViolationCategory, number>;
  /** Files that went through ingestion */
  readonly filesAnalyzed: number;
}

/**
 * Deduplicated, sorted violations plus counts.
 */
export interface Report {
  readonly violations: readonly Violation[];
  readonly summary: ReportSummary;
}
