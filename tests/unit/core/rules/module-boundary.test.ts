import { describe, it, expect } from 'vitest';
import { isPublicApi, ModuleBoundaryRule } from '../../../../src/core/rules/module-boundary.js';
import { makeContext, makeFacts, makeImport, makePolicy } from '../../../helpers/fixtures.js';

describe('ModuleBoundaryRule', () => {
  const rule = new ModuleBoundaryRule();

  it('should report imports of another feature internals', () => {
    const context = makeContext([
      makeFacts('features/billing/invoice.ts', { imports: [makeImport('../users/internal/repo.js', 6)] }),
      makeFacts('features/users/internal/repo.ts'),
    ]);

    expect(rule.evaluate(context, 'error')).toEqual([
      {
        ruleId: 'module-boundary',
        severity: 'error',
        path: 'features/billing/invoice.ts',
        lineRange: { start: 6, end: 6, column: 1 },
        message: "'features/users/internal/repo.ts' is internal to feature 'features/users'",
        fixHint: "Import from the public API of 'features/users' or export the symbol there",
        category: 'boundary',
        target: 'features/users/internal/repo.ts',
        feature: 'features/users',
      },
    ]);
  });

  it('should allow imports through the public API', () => {
    const context = makeContext([
      makeFacts('features/billing/invoice.ts', { imports: [makeImport('../users/index.js')] }),
      makeFacts('features/users/index.ts'),
    ]);

    expect(rule.evaluate(context, 'error')).toEqual([]);
  });

  it('should allow imports inside one feature', () => {
    const context = makeContext([
      makeFacts('features/users/index.ts', { imports: [makeImport('./internal/repo.js')] }),
      makeFacts('features/users/internal/repo.ts'),
    ]);

    expect(rule.evaluate(context, 'error')).toEqual([]);
  });

  it('should apply to importers outside any feature', () => {
    const context = makeContext([
      makeFacts('src/app.ts', { imports: [makeImport('./features/users/internal/repo.js')] }),
      makeFacts('src/features/users/internal/repo.ts'),
    ]);

    expect(rule.evaluate(context, 'error')).toMatchObject([{ path: 'src/app.ts', feature: 'src/features/users' }]);
  });

  it('should use a per-feature public API override', () => {
    const context = makeContext(
      [
        makeFacts('features/billing/invoice.ts', {
          imports: [makeImport('../users/api.js', 1), makeImport('../users/index.js', 2)],
        }),
        makeFacts('features/users/api.ts'),
        makeFacts('features/users/index.ts'),
      ],
      { boundaries: { public_api_overrides: { 'features/users': 'api.ts' } } }
    );

    expect(rule.evaluate(context, 'error').map((v) => v.target)).toEqual(['features/users/index.ts']);
  });
});

describe('isPublicApi', () => {
  const { boundaries } = makePolicy();

  it('should match the entry file relative to the feature directory', () => {
    expect(isPublicApi('features/users/index.ts', 'features/users', boundaries)).toBe(true);
    expect(isPublicApi('features/users/sub/index.ts', 'features/users', boundaries)).toBe(false);
  });
});
