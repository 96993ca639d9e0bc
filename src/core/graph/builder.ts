/**
 * ModuleGraphBuilder: FileFacts → index-based module graph with cycle groups.
 * Runs once, after every file has been ingested.
 */
import type { Minimatch } from 'minimatch';
import type { AnalysisPolicy } from '../config/policy.js';
import type { FileFacts } from '../ingest/types.js';
import { ErrorCodes, InvariantError } from '../../utils/errors.js';
import { ImportResolver, type GoModule } from './resolver.js';
import { findStronglyConnectedComponents } from './scc.js';
import type { DependencyEdge, Module, ModuleGraph, ResolvedImport } from './types.js';

export interface GraphBuildOptions {
  readonly policy: AnalysisPolicy;
  readonly goModules?: readonly GoModule[];
}

/**
 * Build the module graph.
 * @throws InvariantError when the input or the produced edges are inconsistent
 */
export function buildModuleGraph(facts: readonly FileFacts[], options: GraphBuildOptions): ModuleGraph {
  const { policy } = options;
  const sorted = [...facts].sort((a, b) => comparePaths(a.path, b.path));

  const indexByPath = new Map<string, number>();
  sorted.forEach((f, i) => {
    if (indexByPath.has(f.path)) {
      throw new InvariantError(ErrorCodes.UNEXPECTED, `File ingested twice: ${f.path}`, { path: f.path });
    }
    indexByPath.set(f.path, i);
  });

  const resolver = new ImportResolver(
    sorted.map((f) => f.path),
    policy.resolve,
    options.goModules ?? []
  );

  const modules: Module[] = sorted.map((f, index) => {
    const imports = f.imports.map((ref) => resolver.resolve(f.path, f.language, ref));
    return Object.freeze({
      index,
      path: f.path,
      feature: findFeature(f.path, policy.boundaries.featureDirs),
      facts: f,
      imports,
      externals: imports.filter((imp) => imp.resolution !== 'internal'),
    });
  });

  const edges = collectEdges(modules, indexByPath);
  assertEdgesValid(modules.length, edges);

  const outgoing: number[][] = modules.map(() => []);
  edges.forEach((edge, i) => outgoing[edge.from]?.push(i));
  for (const list of outgoing) {
    list.sort((a, b) => (edges[a]?.to ?? 0) - (edges[b]?.to ?? 0));
  }

  return {
    modules,
    edges,
    outgoing,
    indexByPath,
    cycles: findCycleGroups(modules, edges, outgoing, policy.cycleAllowList),
  };
}

/**
 * One edge per (from, to) pair. The first import creating it sets the line;
 * the edge is type-only only when every import reaching the target is.
 * Self-imports produce no edge.
 */
function collectEdges(modules: readonly Module[], indexByPath: ReadonlyMap<string, number>): DependencyEdge[] {
  const edges: DependencyEdge[] = [];

  for (const module of modules) {
    const edgeByTarget = new Map<number, number>();
    for (const imp of module.imports) {
      if (imp.resolution !== 'internal') continue;
      for (const target of imp.targets) {
        const to = indexByPath.get(target);
        if (to === undefined || to === module.index) continue;

        const existing = edgeByTarget.get(to);
        const edge = existing === undefined ? undefined : edges[existing];
        if (existing !== undefined && edge) {
          if (edge.typeOnly && !imp.typeOnly) edges[existing] = Object.freeze({ ...edge, typeOnly: false });
          continue;
        }

        edgeByTarget.set(to, edges.length);
        edges.push(createEdge(module, modules[to], imp));
      }
    }
  }

  return edges;
}

function createEdge(from: Module, to: Module | undefined, imp: ResolvedImport): DependencyEdge {
  if (!to) {
    throw new InvariantError(ErrorCodes.DANGLING_EDGE, `Edge from ${from.path} has no target module`, {
      from: from.path,
      specifier: imp.rawSpecifier,
    });
  }
  return Object.freeze({
    from: from.index,
    to: to.index,
    kind: from.feature === to.feature ? 'internal' : 'direct',
    line: imp.line,
    typeOnly: imp.typeOnly,
    specifier: imp.rawSpecifier,
  });
}

/**
 * Every edge endpoint must be a module index, and no edge may point at its source.
 * @throws InvariantError
 */
export function assertEdgesValid(moduleCount: number, edges: readonly DependencyEdge[]): void {
  for (const edge of edges) {
    const valid = (i: number): boolean => Number.isInteger(i) && i >= 0 && i < moduleCount;
    if (!valid(edge.from) || !valid(edge.to)) {
      throw new InvariantError(
        ErrorCodes.DANGLING_EDGE,
        `Edge ${edge.from} → ${edge.to} references a module outside the graph (${moduleCount} modules)`,
        { from: edge.from, to: edge.to, moduleCount }
      );
    }
    if (edge.from === edge.to) {
      throw new InvariantError(ErrorCodes.SELF_EDGE, `Module ${edge.from} has an edge to itself`, {
        module: edge.from,
      });
    }
  }
}

/**
 * SCCs with more than one member, ignoring edges between allow-listed pairs.
 */
function findCycleGroups(
  modules: readonly Module[],
  edges: readonly DependencyEdge[],
  outgoing: readonly (readonly number[])[],
  allowList: AnalysisPolicy['cycleAllowList']
): number[][] {
  const adjacency = outgoing.map((list) =>
    list.flatMap((i) => {
      const edge = edges[i];
      return edge && !isCycleEdgeAllowed(modules, edge, allowList) ? [edge.to] : [];
    })
  );

  // Arena order is path order, so numeric sorting sorts by path
  return findStronglyConnectedComponents(adjacency)
    .filter((component) => component.length > 1)
    .map((component) => [...component].sort((a, b) => a - b))
    .sort((a, b) => (a[0] ?? 0) - (b[0] ?? 0));
}

/**
 * Whether an edge connects an allow-listed pair, in either direction.
 */
export function isCycleEdgeAllowed(
  modules: readonly Module[],
  edge: DependencyEdge,
  allowList: AnalysisPolicy['cycleAllowList']
): boolean {
  const from = modules[edge.from]?.path ?? '';
  const to = modules[edge.to]?.path ?? '';
  return allowList.some(([a, b]) => (a.match(from) && b.match(to)) || (b.match(from) && a.match(to)));
}

/**
 * Outermost directory of the path that matches a feature glob.
 */
export function findFeature(filePath: string, featureDirs: readonly Minimatch[]): string | null {
  const segments = filePath.split('/').slice(0, -1);
  for (let depth = 1; depth <= segments.length; depth++) {
    const dir = segments.slice(0, depth).join('/');
    if (featureDirs.some((m) => m.match(dir))) return dir;
  }
  return null;
}

/**
 * Byte-wise comparison, independent of locale.
 */
export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
