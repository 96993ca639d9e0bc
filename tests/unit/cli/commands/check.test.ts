/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CommanderError } from 'commander';
import { createCheckCommand, EXIT_CODES, getExitCode, runCheck } from '../../../../src/cli/commands/check.js';
import { analyze, type AnalysisOutcome } from '../../../../src/core/analyzer.js';
import { createReport } from '../../../../src/core/report/reporter.js';
import type { Violation } from '../../../../src/core/rules/types.js';
import { ConfigError, ErrorCodes } from '../../../../src/utils/errors.js';
import { logger } from '../../../../src/utils/logger.js';

vi.mock('../../../../src/core/analyzer.js', () => ({
  analyze: vi.fn(),
}));

function warning(): Violation {
  return {
    ruleId: 'unclassified-module',
    category: 'config-gap',
    severity: 'warning',
    path: 'lib/util.ts',
    lineRange: null,
    message: 'Module matches no layer pattern',
  };
}

function error(): Violation {
  return {
    ruleId: 'error-handling',
    category: 'error-shape',
    severity: 'error',
    path: 'src/a.ts',
    lineRange: { start: 1, end: 1, column: 1 },
    message: 'Empty error handler',
    construct: 'catch',
  };
}

function found(violations: Violation[]): AnalysisOutcome {
  return { status: 'violations-found', report: createReport(violations, { filesAnalyzed: 2 }), elapsedMs: 1 };
}

describe('getExitCode', () => {
  it('should return 0 for a clean run', () => {
    expect(getExitCode({ status: 'clean', report: createReport([], { filesAnalyzed: 1 }), elapsedMs: 1 }, true)).toBe(0);
  });

  it('should fail on errors', () => {
    expect(getExitCode(found([error(), warning()]), false)).toBe(EXIT_CODES.violations);
  });

  it('should pass with only warnings unless strict', () => {
    expect(getExitCode(found([warning()]), false)).toBe(EXIT_CODES.ok);
    expect(getExitCode(found([warning()]), true)).toBe(EXIT_CODES.violations);
  });

  it('should map failures to distinct codes', () => {
    const configError = new ConfigError(ErrorCodes.CONFIG_SCHEMA, 'bad');

    expect(getExitCode({ status: 'config-error', error: configError }, false)).toBe(2);
    expect(getExitCode({ status: 'timeout', phase: 'ingestion', elapsedMs: 5 }, false)).toBe(3);
    expect(getExitCode({ status: 'internal-error', error: configError }, false)).toBe(4);
  });
});

describe('runCheck', () => {
  const mockedAnalyze = vi.mocked(analyze);

  beforeEach(() => {
    mockedAnalyze.mockReset();
    mockedAnalyze.mockResolvedValue(found([error()]));
  });

  afterEach(() => {
    logger.setLevel('info');
  });

  it('should pass CLI options through to the analyzer', async () => {
    await runCheck('project', { format: 'json', config: 'cfg.yaml', deadline: 500, concurrency: 2 }, () => undefined);

    expect(mockedAnalyze).toHaveBeenCalledWith({
      root: 'project',
      configPath: 'cfg.yaml',
      deadlineMs: 500,
      concurrency: 2,
    });
  });

  it('should write the formatted outcome and return the exit code', async () => {
    const written: string[] = [];

    const code = await runCheck('project', { format: 'json' }, (text) => written.push(text));

    expect(code).toBe(1);
    expect(written).toHaveLength(1);
    expect(JSON.parse(written[0] ?? '')).toMatchObject({ status: 'violations-found', summary: { total: 1 } });
  });

  it('should honor --strict', async () => {
    mockedAnalyze.mockResolvedValue(found([warning()]));

    expect(await runCheck('project', { format: 'json' }, () => undefined)).toBe(0);
    expect(await runCheck('project', { format: 'json', strict: true }, () => undefined)).toBe(1);
  });

  it('should silence the logger with --quiet', async () => {
    await runCheck('project', { format: 'human', quiet: true, color: false }, () => undefined);

    expect(logger.getLevel()).toBe('error');
  });

  it('should enable debug logging with --verbose', async () => {
    await runCheck('project', { format: 'json', verbose: true }, () => undefined);

    expect(logger.getLevel()).toBe('debug');
  });
});

describe('createCheckCommand', () => {
  const mockedAnalyze = vi.mocked(analyze);

  beforeEach(() => {
    mockedAnalyze.mockReset();
    mockedAnalyze.mockResolvedValue({ status: 'timeout', phase: 'evaluation', elapsedMs: 9 });
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    logger.setLevel('info');
  });

  it('should have the right name and arguments', () => {
    const command = createCheckCommand();

    expect(command.name()).toBe('check');
    expect(command.registeredArguments.map((a) => a.name())).toEqual(['root']);
  });

  it('should parse options and set the exit code', async () => {
    const command = createCheckCommand();

    await command.parseAsync(['src-tree', '--format', 'json', '--deadline', '250', '--quiet'], { from: 'user' });

    expect(mockedAnalyze).toHaveBeenCalledWith({
      root: 'src-tree',
      configPath: undefined,
      deadlineMs: 250,
      concurrency: undefined,
    });
    expect(process.exitCode).toBe(3);
  });

  it('should default the root to the current directory', async () => {
    await createCheckCommand().parseAsync(['--quiet'], { from: 'user' });

    expect(mockedAnalyze).toHaveBeenCalledWith(expect.objectContaining({ root: '.' }));
  });

  it('should reject a malformed deadline', async () => {
    const command = createCheckCommand().exitOverride().configureOutput({ writeErr: () => undefined });

    await expect(command.parseAsync(['--deadline', 'soon'], { from: 'user' })).rejects.toBeInstanceOf(CommanderError);
    expect(mockedAnalyze).not.toHaveBeenCalled();
  });
});
