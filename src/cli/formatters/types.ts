/**
 * Formatter type definitions.
 */
import type { AnalysisOutcome } from '../../core/analyzer.js';

export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Show fix hints and summary breakdowns */
  verbose: boolean;
  /** Only show errors, hide warnings and infos (counts are unchanged) */
  errorsOnly: boolean;
}

export interface IFormatter {
  formatOutcome(outcome: AnalysisOutcome): string;
}
