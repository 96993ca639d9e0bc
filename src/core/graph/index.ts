export { buildModuleGraph, assertEdgesValid, comparePaths, findFeature, isCycleEdgeAllowed } from './builder.js';
export type { GraphBuildOptions } from './builder.js';
export { ImportResolver } from './resolver.js';
export type { GoModule } from './resolver.js';
export { findStronglyConnectedComponents } from './scc.js';
export type {
  DependencyEdge,
  EdgeKind,
  Module,
  ModuleGraph,
  ResolutionKind,
  ResolvedImport,
} from './types.js';
