/**
 * Analysis pipeline: discovery → parallel ingestion → barrier → graph →
 * classification → rules → report.
 *
 * The pipeline never throws. Every outcome, including failures, is a value
 * of AnalysisOutcome.
 */
import * as path from 'node:path';
import { loadConfig } from './config/loader.js';
import { compilePolicy, type AnalysisPolicy } from './config/policy.js';
import type { Config } from './config/schema.js';
import { Deadline, type AnalysisPhase, type Clock } from './deadline.js';
import { buildModuleGraph, comparePaths } from './graph/builder.js';
import type { GoModule } from './graph/resolver.js';
import { SourceIngestor } from './ingest/ingestor.js';
import { defaultConcurrency, runPool } from './ingest/pool.js';
import type { FileFacts } from './ingest/types.js';
import { classifyGraph } from './layers/classifier.js';
import { createReport } from './report/reporter.js';
import type { Report } from './report/types.js';
import { RuleEngine } from './rules/engine.js';
import type { Rule } from './rules/types.js';
import { createParserRegistry } from '../parsers/register.js';
import type { ParserRegistry } from '../parsers/parser-registry.js';
import {
  ConfigError,
  DeadlineError,
  ErrorCodes,
  InvariantError,
  StrataError,
  SystemError,
} from '../utils/errors.js';
import { globFiles, isDirectory, readFile } from '../utils/file-system.js';
import { createIgnoreFilter, IGNORE_FILENAME, loadIgnoreFile, type IgnoreFilter } from '../utils/ignore-filter.js';
import { logger, type Logger } from '../utils/logger.js';

export type AnalysisStatus = 'clean' | 'violations-found' | 'timeout' | 'config-error' | 'internal-error';

export type AnalysisOutcome =
  | { readonly status: 'clean' | 'violations-found'; readonly report: Report; readonly elapsedMs: number }
  | { readonly status: 'timeout'; readonly phase: AnalysisPhase; readonly elapsedMs: number }
  | { readonly status: 'config-error'; readonly error: ConfigError }
  | { readonly status: 'internal-error'; readonly error: StrataError };

export interface AnalyzeOptions {
  /** Directory to analyze */
  readonly root: string;
  /** Config file relative to the root (default: .strata/config.yaml) */
  readonly configPath?: string;
  /** In-memory config; skips loading the config file */
  readonly config?: Config;
  /** Wall-clock budget for the whole run */
  readonly deadlineMs?: number;
  /** Overrides `ingest.concurrency` */
  readonly concurrency?: number;
  readonly clock?: Clock;
  /** Rules to evaluate, in order (default: all registered) */
  readonly rules?: readonly Rule[];
  /** Parser registry (default: TypeScript/JavaScript, Python, Go); never disposed by the run */
  readonly parsers?: ParserRegistry;
}

/**
 * Analyze a directory.
 */
export async function analyze(options: AnalyzeOptions): Promise<AnalysisOutcome> {
  const log = logger.child('analyzer');
  const deadline = new Deadline(options.deadlineMs, options.clock);
  const root = path.resolve(options.root);
  // A caller-supplied registry stays usable after the run
  const ownsParsers = options.parsers === undefined;
  const parsers = options.parsers ?? createParserRegistry();

  try {
    const config = options.config ?? (await loadConfig(root, options.configPath));
    const policy = compilePolicy(config);
    const report = await runPipeline(root, policy, parsers, deadline, options, log);
    return {
      status: report.violations.length === 0 ? 'clean' : 'violations-found',
      report,
      elapsedMs: deadline.elapsedMs(),
    };
  } catch (error) {
    return toFailureOutcome(error, deadline);
  } finally {
    if (ownsParsers) parsers.disposeAll();
  }
}

async function runPipeline(
  root: string,
  policy: AnalysisPolicy,
  parsers: ParserRegistry,
  deadline: Deadline,
  options: AnalyzeOptions,
  log: Logger
): Promise<Report> {
  if (!(await isDirectory(root))) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Analysis root is not a directory: ${root}`, {
      key: 'root',
      path: root,
    });
  }

  const ignoreFilter = await buildIgnoreFilter(root, policy);
  const files = await discoverFiles(root, policy, ignoreFilter, parsers);
  const goModules = await discoverGoModules(root, ignoreFilter);
  log.debug(`Discovered ${files.length} files`, { goModules: goModules.length });

  const ingestor = new SourceIngestor(parsers, policy.io.deny);
  const concurrency = options.concurrency ?? policy.concurrency ?? defaultConcurrency();
  const facts: FileFacts[] = await runPool(
    files,
    concurrency,
    (file) => ingestor.ingestFile(root, file),
    deadline
  );
  log.debug(`Ingested ${facts.length} files`, { elapsedMs: deadline.elapsedMs(), concurrency });

  deadline.check('evaluation');
  const graph = classifyGraph(buildModuleGraph(facts, { policy, goModules }), policy.layerPolicy);
  log.debug('Built module graph', {
    modules: graph.modules.length,
    edges: graph.edges.length,
    cycles: graph.cycles.length,
  });

  deadline.check('evaluation');
  const violations = new RuleEngine(options.rules).evaluate({ graph, policy }, deadline);
  deadline.check('evaluation');

  const report = createReport(violations, { filesAnalyzed: files.length });
  log.debug(`Evaluated rules: ${report.summary.total} violations`, { elapsedMs: deadline.elapsedMs() });
  return report;
}

async function buildIgnoreFilter(root: string, policy: AnalysisPolicy): Promise<IgnoreFilter> {
  try {
    return createIgnoreFilter([...policy.files.ignore, ...(await loadIgnoreFile(root))]);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, error.message, { key: IGNORE_FILENAME, ...error.details });
    }
    throw error;
  }
}

/**
 * Root-relative paths of every supported, non-ignored file, sorted by path.
 */
export async function discoverFiles(
  root: string,
  policy: AnalysisPolicy,
  ignoreFilter: IgnoreFilter,
  parsers: ParserRegistry
): Promise<string[]> {
  const found = await globFiles(policy.files.include, {
    cwd: root,
    ignore: crawlExclusions(policy.files.ignore),
  });
  return [...new Set(ignoreFilter.filter(found))]
    .filter((file) => parsers.isSupported(file))
    .sort(comparePaths);
}

/**
 * Plain directory patterns ('node_modules/') are also handed to the crawler
 * so it never descends into them. The ignore filter stays authoritative.
 */
function crawlExclusions(patterns: readonly string[]): string[] {
  return patterns.filter((p) => /^[\w.-]+\/$/.test(p)).map((p) => `**/${p}**`);
}

/**
 * Go modules declared by go.mod files under the root.
 */
export async function discoverGoModules(root: string, ignoreFilter: IgnoreFilter): Promise<GoModule[]> {
  const found = await globFiles('**/go.mod', { cwd: root, ignore: ['**/node_modules/**'] });
  const modules: GoModule[] = [];

  for (const relative of found) {
    if (ignoreFilter.ignores(relative)) continue;
    const modulePath = parseGoModulePath(await readFile(path.join(root, relative)));
    if (modulePath) modules.push({ modulePath, dir: path.posix.dirname(relative) });
  }

  return modules.sort((a, b) => comparePaths(a.dir, b.dir));
}

/**
 * Module path from a go.mod `module` directive.
 */
export function parseGoModulePath(content: string): string | null {
  const match = content.match(/^\s*module\s+("?)([^\s"]+)\1\s*(?:\/\/.*)?$/m);
  return match?.[2] ?? null;
}

function toFailureOutcome(error: unknown, deadline: Deadline): AnalysisOutcome {
  if (error instanceof DeadlineError) {
    return { status: 'timeout', phase: error.phase, elapsedMs: deadline.elapsedMs() };
  }
  if (error instanceof ConfigError) {
    return { status: 'config-error', error };
  }
  if (error instanceof StrataError) {
    return { status: 'internal-error', error };
  }
  const message = error instanceof Error ? error.message : String(error);
  return {
    status: 'internal-error',
    error: new InvariantError(ErrorCodes.UNEXPECTED, `Unexpected failure: ${message}`, {
      stack: error instanceof Error ? error.stack : undefined,
    }),
  };
}
