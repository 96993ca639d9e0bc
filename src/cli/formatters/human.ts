/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { AnalysisOutcome } from '../../core/analyzer.js';
import type { Severity } from '../../core/config/schema.js';
import { comparePaths } from '../../core/graph/builder.js';
import type { Report } from '../../core/report/types.js';
import type { Violation } from '../../core/rules/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim';

const SEVERITY_COLOR: Record<Severity, Color> = { error: 'red', warning: 'yellow', info: 'blue' };

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      errorsOnly: options.errorsOnly ?? false,
    };
  }

  formatOutcome(outcome: AnalysisOutcome): string {
    switch (outcome.status) {
      case 'clean':
      case 'violations-found':
        return this.formatReport(outcome.report);
      case 'timeout':
        return this.colorize(`✗ TIMEOUT: deadline exceeded during ${outcome.phase} after ${outcome.elapsedMs}ms`, 'red');
      case 'config-error':
        return [
          this.colorize(`✗ CONFIG ERROR [${outcome.error.code}]: ${outcome.error.message}`, 'red'),
          ...this.formatKey(outcome.error.details),
        ].join('\n');
      case 'internal-error':
        return [
          this.colorize(`✗ INTERNAL ERROR [${outcome.error.code}]: ${outcome.error.message}`, 'red'),
          this.colorize(JSON.stringify(outcome.error.details ?? {}, null, 2), 'dim'),
        ].join('\n');
    }
  }

  formatReport(report: Report): string {
    const lines: string[] = [];
    const shown = (this.options.errorsOnly
      ? report.violations.filter((v) => v.severity === 'error')
      : [...report.violations]
    ).sort((a, b) => comparePaths(a.path, b.path));

    let currentPath: string | null = null;
    for (const violation of shown) {
      if (violation.path !== currentPath) {
        if (currentPath !== null) lines.push('');
        lines.push(chalkBold(violation.path, this.options.colors));
        currentPath = violation.path;
      }
      lines.push(...this.formatViolation(violation));
    }

    if (shown.length > 0) lines.push('');
    lines.push(this.formatSummary(report));
    return lines.join('\n');
  }

  private formatViolation(violation: Violation): string[] {
    const location = violation.lineRange
      ? `${violation.lineRange.start}:${violation.lineRange.column}`
      : '-';
    const severity = this.colorize(violation.severity.padEnd(7), SEVERITY_COLOR[violation.severity]);
    const lines = [`  ${location.padEnd(8)} ${severity} ${violation.message}  ${this.colorize(violation.ruleId, 'dim')}`];

    if (this.options.verbose && violation.fixHint) {
      lines.push(`           ${this.colorize(`Fix: ${violation.fixHint}`, 'cyan')}`);
    }
    return lines;
  }

  private formatSummary(report: Report): string {
    const { summary } = report;
    const lines: string[] = [];

    lines.push('═'.repeat(60));
    if (summary.total === 0) {
      lines.push(this.colorize(`✓ No violations in ${summary.filesAnalyzed} file(s)`, 'green'));
      return lines.join('\n');
    }

    const errors = this.colorize(`${summary.bySeverity.get('error') ?? 0} errors`, 'red');
    const warnings = this.colorize(`${summary.bySeverity.get('warning') ?? 0} warnings`, 'yellow');
    const infos = this.colorize(`${summary.bySeverity.get('info') ?? 0} infos`, 'blue');
    lines.push(`SUMMARY: ${errors}, ${warnings}, ${infos}`);
    lines.push(`Total files: ${summary.filesAnalyzed}`);

    if (this.options.verbose) {
      for (const [rule, count] of summary.byRule) {
        if (count > 0) lines.push(`  ${rule}: ${count}`);
      }
    }

    return lines.join('\n');
  }

  private formatKey(details: Record<string, unknown> | undefined): string[] {
    const key = details?.key;
    return typeof key === 'string' && key !== '' ? [`   Key: ${key}`] : [];
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}

function chalkBold(text: string, colors: boolean): string {
  return colors ? chalk.bold(text) : text;
}
