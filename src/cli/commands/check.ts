/**
 * `strata check`: analyze a directory and report architecture violations.
 */
import { Command, InvalidArgumentError, Option } from 'commander';
import { analyze, type AnalysisOutcome } from '../../core/analyzer.js';
import { logger } from '../../utils/logger.js';
import { HumanFormatter, JsonFormatter, type IFormatter, type OutputFormat } from '../formatters/index.js';

export interface CheckOptions {
  config?: string;
  format: OutputFormat;
  deadline?: number;
  concurrency?: number;
  strict?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  errorsOnly?: boolean;
  color?: boolean;
}

/**
 * Exit codes per run status.
 */
export const EXIT_CODES = {
  ok: 0,
  violations: 1,
  configError: 2,
  timeout: 3,
  internalError: 4,
} as const;

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Analyze a source tree against the configured architecture')
    .argument('[root]', 'Directory to analyze', '.')
    .option('--config <path>', 'Path to config file, relative to the root')
    .addOption(new Option('--format <format>', 'Output format').choices(['human', 'json']).default('human'))
    .option('--deadline <ms>', 'Abort the run after this many milliseconds', parsePositiveInt)
    .option('--concurrency <n>', 'Files ingested in parallel', parsePositiveInt)
    .option('--strict', 'Fail on warnings as well as errors')
    .option('--errors-only', 'Only show errors in output (still runs all rules)')
    .option('--quiet', 'Suppress non-essential output')
    .option('--verbose', 'Show fix hints and debug timings')
    .option('--no-color', 'Disable colored output')
    .action(async (root: string, options: CheckOptions) => {
      process.exitCode = await runCheck(root, options, (text) => process.stdout.write(`${text}\n`));
    });
}

/**
 * Run the analysis, print the outcome and return the exit code.
 */
export async function runCheck(root: string, options: CheckOptions, write: (text: string) => void): Promise<number> {
  if (options.quiet) logger.setLevel('error');
  else if (options.verbose) logger.setLevel('debug');

  if (!options.quiet && options.format !== 'json') {
    logger.info(`Analyzing ${root}...`);
  }

  const outcome = await analyze({
    root,
    configPath: options.config,
    deadlineMs: options.deadline,
    concurrency: options.concurrency,
  });

  write(createFormatter(options).formatOutcome(outcome));
  return getExitCode(outcome, options.strict ?? false);
}

/**
 * Map a run outcome to a process exit code.
 * @param strict - Warnings and infos fail the run too
 */
export function getExitCode(outcome: AnalysisOutcome, strict: boolean): number {
  switch (outcome.status) {
    case 'clean':
      return EXIT_CODES.ok;
    case 'violations-found': {
      const failing = outcome.report.violations.some((v) => strict || v.severity === 'error');
      return failing ? EXIT_CODES.violations : EXIT_CODES.ok;
    }
    case 'config-error':
      return EXIT_CODES.configError;
    case 'timeout':
      return EXIT_CODES.timeout;
    case 'internal-error':
      return EXIT_CODES.internalError;
  }
}

function createFormatter(options: CheckOptions): IFormatter {
  const formatOptions = {
    colors: options.color !== false,
    verbose: options.verbose ?? false,
    errorsOnly: options.errorsOnly ?? false,
  };
  return options.format === 'json' ? new JsonFormatter(formatOptions) : new HumanFormatter(formatOptions);
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}
