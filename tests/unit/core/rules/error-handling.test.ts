import { describe, it, expect } from 'vitest';
import { ErrorHandlingRule } from '../../../../src/core/rules/error-handling.js';
import { makeContext, makeFacts, makeSite } from '../../../helpers/fixtures.js';

describe('ErrorHandlingRule', () => {
  const rule = new ErrorHandlingRule();

  it('should report empty catch blocks', () => {
    const context = makeContext([
      makeFacts('src/domain/load.ts', { emptyHandlerSites: [makeSite('catch', 12, { column: 5, endLine: 13 })] }),
    ]);

    expect(rule.evaluate(context, 'error')).toEqual([
      {
        ruleId: 'error-handling',
        severity: 'error',
        path: 'src/domain/load.ts',
        lineRange: { start: 12, end: 13, column: 5 },
        message: "Empty error handler 'catch' silently discards the error",
        fixHint: 'Log or rethrow the error',
        category: 'error-shape',
        construct: 'catch',
      },
    ]);
  });

  it('should give Go-specific advice for empty err checks', () => {
    const context = makeContext([
      makeFacts('cmd/main.go', { emptyHandlerSites: [makeSite('if err != nil', 8, { column: 2, endLine: 9 })] }),
    ]);

    expect(rule.evaluate(context, 'error')).toMatchObject([
      { path: 'cmd/main.go', construct: 'if err != nil', fixHint: 'Return or wrap the error' },
    ]);
  });

  it('should check modules in every layer', () => {
    const context = makeContext([
      makeFacts('src/infra/a.ts', { emptyHandlerSites: [makeSite('.catch', 1)] }),
      makeFacts('scripts/b.py', { emptyHandlerSites: [makeSite('except', 2)] }),
    ]);

    expect(rule.evaluate(context, 'warning').map((v) => [v.path, v.severity])).toEqual([
      ['scripts/b.py', 'warning'],
      ['src/infra/a.ts', 'warning'],
    ]);
  });
});
