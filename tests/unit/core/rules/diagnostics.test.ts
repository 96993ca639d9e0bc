import { describe, it, expect } from 'vitest';
import { AmbiguousImportRule } from '../../../../src/core/rules/ambiguous-import.js';
import { ParseFailureRule } from '../../../../src/core/rules/parse-failure.js';
import { UnclassifiedModuleRule } from '../../../../src/core/rules/unclassified-module.js';
import { makeContext, makeFacts, makeImport } from '../../../helpers/fixtures.js';

describe('ParseFailureRule', () => {
  const rule = new ParseFailureRule();

  it('should report files that failed to parse at the first error line', () => {
    const context = makeContext([
      makeFacts('src/domain/x.ts', { parseOk: false, parseErrors: ['line 7: bad token', 'line 9: worse'] }),
      makeFacts('src/domain/y.ts'),
    ]);

    expect(rule.evaluate(context, 'warning')).toEqual([
      {
        ruleId: 'parse-failure',
        severity: 'warning',
        path: 'src/domain/x.ts',
        lineRange: { start: 7, end: 7, column: 1 },
        message: 'Could not parse file completely: line 7: bad token',
        fixHint: 'Fix the syntax error or exclude the file with files.ignore',
        category: 'parse-failure',
        errors: ['line 7: bad token', 'line 9: worse'],
      },
    ]);
  });

  it('should have no location when the error carries no line', () => {
    const context = makeContext([
      makeFacts('src/blob.ts', { parseOk: false, parseErrors: ['binary content (NUL byte)'] }),
    ]);

    expect(rule.evaluate(context, 'warning')[0]?.lineRange).toBeNull();
  });
});

describe('UnclassifiedModuleRule', () => {
  const rule = new UnclassifiedModuleRule();

  it('should report modules outside every layer', () => {
    const context = makeContext([makeFacts('lib/util.ts'), makeFacts('src/domain/a.ts')]);

    expect(rule.evaluate(context, 'warning')).toEqual([
      {
        ruleId: 'unclassified-module',
        severity: 'warning',
        path: 'lib/util.ts',
        lineRange: null,
        message: 'Module matches no layer pattern and is exempt from direction checks',
        fixHint: 'Add a layer pattern covering this path, or ignore it with files.ignore',
        category: 'config-gap',
      },
    ]);
  });
});

describe('AmbiguousImportRule', () => {
  const rule = new AmbiguousImportRule();

  it('should report imports matching several files', () => {
    const context = makeContext([
      makeFacts('src/a.ts', { imports: [makeImport('./b.js', 3), makeImport('lodash', 4)] }),
      makeFacts('src/b.ts'),
      makeFacts('src/b.tsx'),
    ]);

    expect(rule.evaluate(context, 'warning')).toEqual([
      {
        ruleId: 'ambiguous-import',
        severity: 'warning',
        path: 'src/a.ts',
        lineRange: { start: 3, end: 3, column: 1 },
        message: "Import './b.js' is ambiguous: src/b.ts, src/b.tsx",
        fixHint: 'Use a specifier that names one file',
        category: 'resolution',
        specifier: './b.js',
        candidates: ['src/b.ts', 'src/b.tsx'],
      },
    ]);
  });
});
