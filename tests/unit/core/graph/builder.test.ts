import { describe, it, expect } from 'vitest';
import {
  assertEdgesValid,
  buildModuleGraph,
  comparePaths,
  findFeature,
} from '../../../../src/core/graph/builder.js';
import { ErrorCodes, InvariantError } from '../../../../src/utils/errors.js';
import { makeFacts, makeImport, makePolicy } from '../../../helpers/fixtures.js';

function build(facts: ReturnType<typeof makeFacts>[], config: unknown = {}) {
  return buildModuleGraph(facts, { policy: makePolicy(config) });
}

describe('buildModuleGraph', () => {
  it('should place modules in path order', () => {
    const graph = build([makeFacts('src/c.ts'), makeFacts('src/a.ts'), makeFacts('src/b.ts')]);

    expect(graph.modules.map((m) => [m.index, m.path])).toEqual([[0, 'src/a.ts'], [1, 'src/b.ts'], [2, 'src/c.ts']]);
    expect(graph.indexByPath.get('src/c.ts')).toBe(2);
  });

  it('should create one edge per module pair at the first import', () => {
    const graph = build([
      makeFacts('src/a.ts', { imports: [makeImport('./b.js', 2), makeImport('./b.js', 5)] }),
      makeFacts('src/b.ts'),
    ]);

    expect(graph.edges).toEqual([
      { from: 0, to: 1, kind: 'internal', line: 2, typeOnly: false, specifier: './b.js' },
    ]);
  });

  it('should clear typeOnly when a later import of the same module is a value import', () => {
    const graph = build([
      makeFacts('src/a.ts', { imports: [makeImport('./b.js', 2, { typeOnly: true }), makeImport('./b.js', 5)] }),
      makeFacts('src/b.ts'),
    ]);

    expect(graph.edges).toEqual([
      { from: 0, to: 1, kind: 'internal', line: 2, typeOnly: false, specifier: './b.js' },
    ]);
    expect(Object.isFrozen(graph.edges[0])).toBe(true);
  });

  it('should keep typeOnly when every import of the module is type-only', () => {
    const graph = build([
      makeFacts('src/a.ts', {
        imports: [makeImport('./b.js', 2, { typeOnly: true }), makeImport('./b.js', 5, { typeOnly: true })],
      }),
      makeFacts('src/b.ts'),
    ]);

    expect(graph.edges.map((e) => [e.line, e.typeOnly])).toEqual([[2, true]]);
  });

  it('should drop self imports', () => {
    const graph = build([makeFacts('src/a.ts', { imports: [makeImport('./a.js')] })]);

    expect(graph.edges).toEqual([]);
  });

  it('should keep external and ambiguous imports on the module', () => {
    const graph = build([
      makeFacts('src/a.ts', { imports: [makeImport('lodash'), makeImport('./b.js'), makeImport('./c.js')] }),
      makeFacts('src/b.ts'),
      makeFacts('src/c.ts'),
      makeFacts('src/c.tsx'),
    ]);

    expect(graph.modules[0]?.externals.map((i) => [i.rawSpecifier, i.resolution])).toEqual([
      ['lodash', 'external'],
      ['./c.js', 'ambiguous'],
    ]);
  });

  it('should label edges crossing feature directories as direct', () => {
    const graph = build([
      makeFacts('features/billing/a.ts', {
        imports: [makeImport('./b.js'), makeImport('../users/index.js')],
      }),
      makeFacts('features/billing/b.ts'),
      makeFacts('features/users/index.ts'),
    ]);

    expect(graph.modules.map((m) => m.feature)).toEqual(['features/billing', 'features/billing', 'features/users']);
    expect(graph.edges.map((e) => [e.to, e.kind])).toEqual([[1, 'internal'], [2, 'direct']]);
  });

  it('should sort outgoing edges by target index', () => {
    const graph = build([
      makeFacts('src/z.ts', { imports: [makeImport('./c.js'), makeImport('./a.js')] }),
      makeFacts('src/a.ts'),
      makeFacts('src/c.ts'),
    ]);

    expect(graph.edges.map((e) => e.to)).toEqual([1, 0]);
    expect(graph.outgoing[2]).toEqual([1, 0]);
  });

  it('should find circular dependency groups', () => {
    const graph = build([
      makeFacts('src/a.ts', { imports: [makeImport('./b.js')] }),
      makeFacts('src/b.ts', { imports: [makeImport('./c.js')] }),
      makeFacts('src/c.ts', { imports: [makeImport('./a.js')] }),
      makeFacts('src/d.ts', { imports: [makeImport('./a.js')] }),
    ]);

    expect(graph.cycles).toEqual([[0, 1, 2]]);
  });

  it('should ignore allow-listed edges when finding cycles', () => {
    const graph = build(
      [
        makeFacts('src/a.ts', { imports: [makeImport('./b.js')] }),
        makeFacts('src/b.ts', { imports: [makeImport('./a.js')] }),
      ],
      { cycles: { allow: [['src/a.ts', 'src/b.ts']] } }
    );

    expect(graph.edges).toHaveLength(2);
    expect(graph.cycles).toEqual([]);
  });

  it('should reject a file ingested twice', () => {
    expect(() => build([makeFacts('src/a.ts'), makeFacts('src/a.ts')])).toThrow(InvariantError);
  });
});

describe('assertEdgesValid', () => {
  const edge = { kind: 'internal' as const, line: 1, typeOnly: false, specifier: './x' };

  it('should reject dangling edges', () => {
    expect(() => assertEdgesValid(2, [{ ...edge, from: 0, to: 2 }])).toThrow(
      expect.objectContaining({ code: ErrorCodes.DANGLING_EDGE })
    );
  });

  it('should reject self edges', () => {
    expect(() => assertEdgesValid(2, [{ ...edge, from: 1, to: 1 }])).toThrow(
      expect.objectContaining({ code: ErrorCodes.SELF_EDGE })
    );
  });

  it('should accept edges inside the graph', () => {
    expect(() => assertEdgesValid(2, [{ ...edge, from: 0, to: 1 }])).not.toThrow();
  });
});

describe('findFeature', () => {
  const { featureDirs } = makePolicy().boundaries;

  it('should return the outermost matching directory', () => {
    expect(findFeature('src/features/billing/api/x.ts', featureDirs)).toBe('src/features/billing');
  });

  it('should return null outside feature directories', () => {
    expect(findFeature('features/readme.ts', featureDirs)).toBeNull();
    expect(findFeature('src/domain/x.ts', featureDirs)).toBeNull();
  });
});

describe('comparePaths', () => {
  it('should compare by code unit, not locale', () => {
    expect(['b.ts', 'a.ts', 'B.ts'].sort(comparePaths)).toEqual(['B.ts', 'a.ts', 'b.ts']);
  });
});
