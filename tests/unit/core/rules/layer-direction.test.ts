import { describe, it, expect } from 'vitest';
import { isContractModule, LayerDirectionRule } from '../../../../src/core/rules/layer-direction.js';
import { makeContext, makeExport, makeFacts, makeImport, moduleAt } from '../../../helpers/fixtures.js';

describe('LayerDirectionRule', () => {
  const rule = new LayerDirectionRule();

  it('should report a business module importing infrastructure', () => {
    const context = makeContext([
      makeFacts('src/domain/order.ts', { imports: [makeImport('../infra/db.js', 3)] }),
      makeFacts('src/infra/db.ts'),
    ]);

    expect(rule.evaluate(context, 'error')).toEqual([
      {
        ruleId: 'layer-direction',
        severity: 'error',
        path: 'src/domain/order.ts',
        lineRange: { start: 3, end: 3, column: 1 },
        message: "Layer 'business' cannot import from 'infrastructure': src/domain/order.ts → src/infra/db.ts",
        fixHint: 'Depend on a contract instead (allowed layers: contracts)',
        category: 'direction',
        target: 'src/infra/db.ts',
        sourceLayer: 'business',
        targetLayer: 'infrastructure',
        typeOnly: false,
      },
    ]);
  });

  it('should allow listed and same-layer dependencies', () => {
    const context = makeContext([
      makeFacts('src/domain/order.ts', { imports: [makeImport('../contracts/order.js'), makeImport('./price.js')] }),
      makeFacts('src/domain/price.ts'),
      makeFacts('src/contracts/order.ts'),
    ]);

    expect(rule.evaluate(context, 'error')).toEqual([]);
  });

  it('should skip edges touching unclassified modules', () => {
    const context = makeContext([
      makeFacts('src/domain/order.ts', { imports: [makeImport('../../lib/util.js')] }),
      makeFacts('lib/util.ts', { imports: [makeImport('../src/infra/db.js')] }),
      makeFacts('src/infra/db.ts'),
    ]);

    expect(rule.evaluate(context, 'error')).toEqual([]);
  });

  it('should downgrade type-only imports to warnings', () => {
    const context = makeContext([
      makeFacts('src/domain/order.ts', { imports: [makeImport('../infra/db.js', 1, { typeOnly: true })] }),
      makeFacts('src/infra/db.ts'),
    ]);

    const [violation] = rule.evaluate(context, 'error');

    expect(violation).toMatchObject({ severity: 'warning', typeOnly: true });
    expect(violation?.message).toBe(
      "Layer 'business' cannot import from 'infrastructure': src/domain/order.ts → src/infra/db.ts (type-only coupling)"
    );
  });

  it('should keep error severity when a type import is followed by a value import', () => {
    const context = makeContext([
      makeFacts('src/domain/order.ts', {
        imports: [
          makeImport('../infra/db.js', 1, { typeOnly: true }),
          makeImport('../infra/db.js', 2),
        ],
      }),
      makeFacts('src/infra/db.ts'),
    ]);

    expect(rule.evaluate(context, 'error')).toMatchObject([
      {
        severity: 'error',
        typeOnly: false,
        lineRange: { start: 1, end: 1, column: 1 },
        message: "Layer 'business' cannot import from 'infrastructure': src/domain/order.ts → src/infra/db.ts",
      },
    ]);
  });

  it('should treat targets declaring only types as type-only coupling', () => {
    const context = makeContext([
      makeFacts('src/domain/order.ts', { imports: [makeImport('../infra/types.js')] }),
      makeFacts('src/infra/types.ts', { exports: [makeExport('Row', 'interface')], callCount: 0 }),
    ]);

    expect(rule.evaluate(context, 'error')).toMatchObject([{ severity: 'warning', typeOnly: true }]);
  });

  it('should not downgrade a configured non-error severity', () => {
    const context = makeContext([
      makeFacts('src/domain/order.ts', { imports: [makeImport('../infra/db.js', 1, { typeOnly: true })] }),
      makeFacts('src/infra/db.ts'),
    ]);

    expect(rule.evaluate(context, 'info')).toMatchObject([{ severity: 'info', typeOnly: true }]);
  });

  it('should suggest moving types into a layer that may import nothing', () => {
    const context = makeContext([
      makeFacts('src/contracts/order.ts', { imports: [makeImport('../domain/order.js')] }),
      makeFacts('src/domain/order.ts'),
    ]);

    expect(rule.evaluate(context, 'error')[0]?.fixHint).toBe(
      'This layer may not depend on other layers; move the shared types into it'
    );
  });
});

describe('isContractModule', () => {
  const typesOnly = makeFacts('src/infra/types.ts', {
    exports: [makeExport('Row', 'interface'), makeExport('Status', 'enum')],
    callCount: 0,
  });

  it('should accept modules exporting only declaration kinds', () => {
    const context = makeContext([typesOnly]);

    expect(isContractModule(moduleAt(context, 'src/infra/types.ts'), context.policy)).toBe(true);
  });

  it('should reject modules making more calls than allowed', () => {
    const context = makeContext([{ ...typesOnly, callCount: 2 }]);

    expect(isContractModule(moduleAt(context, 'src/infra/types.ts'), context.policy)).toBe(false);
  });

  it('should honor a raised call-site threshold', () => {
    const context = makeContext([{ ...typesOnly, callCount: 2 }], { type_only: { max_call_sites: 2 } });

    expect(isContractModule(moduleAt(context, 'src/infra/types.ts'), context.policy)).toBe(true);
  });

  it('should reject modules without exports or with functions', () => {
    const empty = makeContext([{ ...typesOnly, exports: [] }]);
    const withFunction = makeContext([makeFacts('src/infra/db.ts', { callCount: 0 })]);

    expect(isContractModule(moduleAt(empty, 'src/infra/types.ts'), empty.policy)).toBe(false);
    expect(isContractModule(moduleAt(withFunction, 'src/infra/db.ts'), withFunction.policy)).toBe(false);
  });
});
