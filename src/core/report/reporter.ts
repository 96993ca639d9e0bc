/**
 * ViolationReporter: validates, deduplicates and sorts rule output.
 */
import { SeveritySchema, type Severity } from '../config/schema.js';
import {
  RULE_IDS,
  VIOLATION_CATEGORIES,
  type LineRange,
  type RuleId,
  type Violation,
  type ViolationCategory,
} from '../rules/types.js';
import { ErrorCodes, InvariantError } from '../../utils/errors.js';
import type { Report } from './types.js';

const SEVERITY_RANK: Record<Severity, number> = { error: 3, warning: 2, info: 1 };

export interface ReportOptions {
  readonly filesAnalyzed: number;
}

/**
 * Build the report. The result is independent of input order.
 * @throws InvariantError for a malformed violation
 */
export function createReport(violations: readonly Violation[], options: ReportOptions): Report {
  violations.forEach(assertViolationValid);

  const sorted = [...violations].sort(compareViolations);
  const seen = new Set<string>();
  const unique: Violation[] = [];
  for (const violation of sorted) {
    const key = dedupeKey(violation);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(Object.freeze(violation));
  }

  const byRule = countBy<RuleId>(RULE_IDS, unique, (v) => v.ruleId);
  const bySeverity = countBy<Severity>(SeveritySchema.options, unique, (v) => v.severity);
  const byCategory = countBy<ViolationCategory>(VIOLATION_CATEGORIES, unique, (v) => v.category);

  return {
    violations: unique,
    summary: {
      total: unique.length,
      byRule,
      bySeverity,
      byCategory,
      filesAnalyzed: options.filesAnalyzed,
    },
  };
}

/**
 * Severity descending, path ascending, lineRange ascending (null first),
 * then rule id and message.
 */
export function compareViolations(a: Violation, b: Violation): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    compareStrings(a.path, b.path) ||
    compareRanges(a.lineRange, b.lineRange) ||
    compareStrings(a.ruleId, b.ruleId) ||
    compareStrings(a.message, b.message)
  );
}

function compareRanges(a: LineRange | null, b: LineRange | null): number {
  if (a === null || b === null) return a === b ? 0 : a === null ? -1 : 1;
  return a.start - b.start || a.end - b.end || a.column - b.column;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function dedupeKey(v: Violation): string {
  const range = v.lineRange ? `${v.lineRange.start}:${v.lineRange.end}:${v.lineRange.column}` : '-';
  return `${v.ruleId}\u0000${v.path}\u0000${range}`;
}

/**
 * @throws InvariantError
 */
export function assertViolationValid(v: Violation): void {
  const fail = (reason: string): never => {
    throw new InvariantError(ErrorCodes.MALFORMED_VIOLATION, `Rule '${String(v.ruleId)}' produced a malformed violation: ${reason}`, {
      violation: v,
    });
  };

  if (!RULE_IDS.includes(v.ruleId)) fail(`unknown rule id '${String(v.ruleId)}'`);
  if (!VIOLATION_CATEGORIES.includes(v.category)) fail(`unknown category '${String(v.category)}'`);
  if (!SeveritySchema.safeParse(v.severity).success) fail(`invalid severity '${String(v.severity)}'`);
  if (typeof v.path !== 'string' || v.path === '') fail('empty path');
  if (v.lineRange !== null) {
    const { start, end, column } = v.lineRange;
    const positive = (n: number): boolean => Number.isInteger(n) && n >= 1;
    if (!positive(start) || !positive(end) || !positive(column) || end < start) {
      fail(`invalid line range ${start}-${end}:${column}`);
    }
  }
}

function countBy<K extends string>(
  keys: readonly K[],
  items: readonly Violation[],
  keyOf: (v: Violation) => K
): Map<K, number> {
  const counts = new Map<K, number>(keys.map((k) => [k, 0]));
  for (const item of items) {
    const key = keyOf(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}
