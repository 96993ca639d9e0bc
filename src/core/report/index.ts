export { assertViolationValid, compareViolations, createReport } from './reporter.js';
export type { ReportOptions } from './reporter.js';
export type { Report, ReportSummary } from './types.js';
