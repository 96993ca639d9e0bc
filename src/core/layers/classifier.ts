/**
 * LayerClassifier: assigns each module to the first layer whose pattern matches.
 *
 * Example config:
 * ```yaml
 * layers:
 *   - name: contracts
 *     paths: ["src/contracts/**"]
 *     can_import: []
 *   - name: business
 *     paths: ["src/business/**"]
 *     exclude: ["src/business/**\/fixtures/**"]
 *     can_import: [contracts]
 * ```
 */
import type { LayerPolicy } from '../config/policy.js';
import type { ModuleGraph } from '../graph/types.js';
import type { ClassifiedGraph, ClassifiedModule } from './types.js';

/**
 * Layer for a root-relative path, or null when no pattern matches.
 * First matching entry in configured order wins.
 */
export function classifyPath(filePath: string, policy: LayerPolicy): string | null {
  for (const entry of policy.entries) {
    if (!entry.matcher.match(filePath)) continue;
    if (entry.exclude.some((m) => m.match(filePath))) continue;
    return entry.layer;
  }
  return null;
}

/**
 * Label every module of the graph.
 */
export function classifyGraph(graph: ModuleGraph, policy: LayerPolicy): ClassifiedGraph {
  const modules: ClassifiedModule[] = graph.modules.map((module) =>
    Object.freeze({ ...module, layer: classifyPath(module.path, policy) })
  );
  return { ...graph, modules };
}

/**
 * Whether `from` may depend on `to`. Same-layer dependencies are always allowed.
 */
export function isDependencyAllowed(policy: LayerPolicy, from: string, to: string): boolean {
  if (from === to) return true;
  return policy.allowedTargets.get(from)?.has(to) ?? false;
}
