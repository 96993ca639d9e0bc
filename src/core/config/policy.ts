/**
 * Compiles a validated Config into the immutable AnalysisPolicy the core runs on.
 * Every configuration error surfaces here, before any source file is touched.
 */
import { Minimatch } from 'minimatch';
import type { Config, RuleSetting, Severity, SymbolKindSetting } from './schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { compileDenyList, type CompiledDenyList } from '../ingest/call-patterns.js';
import type { DenyFamily } from '../ingest/types.js';
import { RULE_IDS, type RuleId } from '../rules/types.js';

/**
 * One `{pattern, layer}` entry, in configured priority order.
 */
export interface LayerPatternEntry {
  readonly layer: string;
  readonly pattern: string;
  readonly matcher: Minimatch;
  readonly exclude: readonly Minimatch[];
}

/**
 * Ordered layer patterns plus the allowed-dependency relation.
 */
export interface LayerPolicy {
  readonly layers: readonly string[];
  readonly entries: readonly LayerPatternEntry[];
  /** Layer → layers it may depend on (same-layer edges are always allowed) */
  readonly allowedTargets: ReadonlyMap<string, ReadonlySet<string>>;
}

export interface AliasEntry {
  readonly prefix: string;
  readonly target: string;
}

export interface ResolvePolicy {
  /** Longest prefix first */
  readonly aliases: readonly AliasEntry[];
  readonly roots: readonly string[];
}

export interface BoundaryPolicy {
  readonly featureDirs: readonly Minimatch[];
  readonly publicApi: Minimatch;
  readonly overrides: ReadonlyMap<string, Minimatch>;
}

export interface AnalysisPolicy {
  readonly files: { readonly include: readonly string[]; readonly ignore: readonly string[] };
  readonly layerPolicy: LayerPolicy;
  readonly resolve: ResolvePolicy;
  readonly io: {
    readonly pureLayers: ReadonlySet<string>;
    readonly deny: Readonly<Record<DenyFamily, CompiledDenyList>>;
  };
  readonly boundaries: BoundaryPolicy;
  readonly cycleAllowList: ReadonlyArray<readonly [Minimatch, Minimatch]>;
  readonly typeOnly: {
    readonly declarationKinds: ReadonlySet<SymbolKindSetting>;
    readonly maxCallSites: number;
  };
  readonly rules: ReadonlyMap<RuleId, RuleSetting>;
  readonly concurrency?: number;
}

/**
 * Compile a glob, rejecting patterns that can never match a root-relative path.
 */
export function compileGlob(pattern: string, key: string): Minimatch {
  const reject = (reason: string): never => {
    throw new ConfigError(
      ErrorCodes.INVALID_GLOB,
      `Invalid glob pattern '${pattern}' at ${key}: ${reason}`,
      { key, pattern }
    );
  };

  if (pattern.trim() === '') reject('pattern is empty');
  if (pattern.startsWith('/')) reject('patterns are matched against root-relative paths and cannot be absolute');
  if (pattern.split('/').includes('..')) reject("'..' segments escape the analyzed root");

  const matcher = new Minimatch(pattern, { dot: true });
  if (matcher.makeRe() === false) reject('pattern does not compile');
  return matcher;
}

/**
 * Build and validate the layer policy.
 */
export function compileLayerPolicy(config: Config): LayerPolicy {
  const names = new Map<string, number>();

  config.layers.forEach((layer, i) => {
    if (names.has(layer.name)) {
      throw new ConfigError(
        ErrorCodes.DUPLICATE_LAYER,
        `Layer '${layer.name}' is defined more than once (layers[${names.get(layer.name)}] and layers[${i}])`,
        { key: `layers[${i}].name`, layer: layer.name }
      );
    }
    names.set(layer.name, i);
  });

  const entries: LayerPatternEntry[] = [];
  const allowedTargets = new Map<string, Set<string>>();

  config.layers.forEach((layer, i) => {
    const exclude = layer.exclude.map((p, j) => compileGlob(p, `layers[${i}].exclude[${j}]`));
    layer.paths.forEach((pattern, j) => {
      entries.push({
        layer: layer.name,
        pattern,
        matcher: compileGlob(pattern, `layers[${i}].paths[${j}]`),
        exclude,
      });
    });

    const targets = new Set<string>();
    layer.can_import.forEach((target, j) => {
      if (!names.has(target)) {
        throw new ConfigError(
          ErrorCodes.UNKNOWN_LAYER,
          `Layer '${layer.name}' allows unknown layer '${target}'`,
          { key: `layers[${i}].can_import[${j}]`, layer: target }
        );
      }
      targets.add(target);
    });
    allowedTargets.set(layer.name, targets);
  });

  const cycle = findPolicyCycle(allowedTargets);
  if (cycle) {
    const start = cycle[0] ?? '';
    throw new ConfigError(
      ErrorCodes.CYCLIC_LAYER_POLICY,
      `Allowed layer dependencies form a cycle: ${cycle.join(' → ')}`,
      { key: `layers[${names.get(start)}].can_import`, cycle }
    );
  }

  return { layers: [...names.keys()], entries, allowedTargets };
}

/**
 * Find a cycle in the allowed-target relation. Self references are ignored
 * because same-layer dependencies are always allowed.
 * Returns the cycle as a closed path (first = last), or null.
 */
export function findPolicyCycle(relation: ReadonlyMap<string, ReadonlySet<string>>): string[] | null {
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (layer: string): string[] | null => {
    state.set(layer, 'visiting');
    stack.push(layer);

    for (const target of relation.get(layer) ?? []) {
      if (target === layer) continue;
      const targetState = state.get(target);
      if (targetState === 'visiting') {
        return [...stack.slice(stack.indexOf(target)), target];
      }
      if (targetState === undefined) {
        const found = visit(target);
        if (found) return found;
      }
    }

    stack.pop();
    state.set(layer, 'done');
    return null;
  };

  for (const layer of relation.keys()) {
    if (state.has(layer)) continue;
    const found = visit(layer);
    if (found) return found;
  }
  return null;
}

function compileAliases(aliases: Record<string, string>): AliasEntry[] {
  const entries = Object.entries(aliases).map(([prefix, target]) => {
    const normalized = target.replace(/\\/g, '/');
    if (prefix === '' || normalized.startsWith('/') || normalized.split('/').includes('..')) {
      throw new ConfigError(
        ErrorCodes.INVALID_ALIAS,
        `Invalid alias '${prefix}' → '${target}': prefix must be non-empty and the target must stay inside the root`,
        { key: `resolve.aliases.${prefix}`, prefix, target }
      );
    }
    return { prefix, target: normalized };
  });
  return entries.sort((a, b) => b.prefix.length - a.prefix.length || a.prefix.localeCompare(b.prefix));
}

function compileRuleSettings(rules: Record<string, RuleSetting>): Map<RuleId, RuleSetting> {
  const result = new Map<RuleId, RuleSetting>();
  for (const [id, setting] of Object.entries(rules)) {
    const ruleId = RULE_IDS.find((r) => r === id);
    if (!ruleId) {
      throw new ConfigError(
        ErrorCodes.CONFIG_SCHEMA,
        `Unknown rule '${id}' (known rules: ${RULE_IDS.join(', ')})`,
        { key: `rules.${id}` }
      );
    }
    result.set(ruleId, setting);
  }
  return result;
}

/**
 * Compile a parsed Config into an AnalysisPolicy.
 * @throws ConfigError naming the offending key
 */
export function compilePolicy(config: Config): AnalysisPolicy {
  const layerPolicy = compileLayerPolicy(config);
  const layerNames = new Set(layerPolicy.layers);

  config.io_isolation.layers.forEach((layer, i) => {
    if (!layerNames.has(layer)) {
      throw new ConfigError(
        ErrorCodes.UNKNOWN_LAYER,
        `io_isolation names unknown layer '${layer}'`,
        { key: `io_isolation.layers[${i}]`, layer }
      );
    }
  });

  const overrides = new Map<string, Minimatch>();
  for (const [feature, pattern] of Object.entries(config.boundaries.public_api_overrides)) {
    overrides.set(feature.replace(/\/+$/, ''), compileGlob(pattern, `boundaries.public_api_overrides.${feature}`));
  }

  return {
    files: { include: [...config.files.include], ignore: [...config.files.ignore] },
    layerPolicy,
    resolve: {
      aliases: compileAliases(config.resolve.aliases),
      roots: config.resolve.roots.map((r) => r.replace(/\\/g, '/').replace(/\/+$/, '') || '.'),
    },
    io: {
      pureLayers: new Set(config.io_isolation.layers),
      deny: {
        typescript: compileDenyList(config.io_isolation.deny.typescript, 'io_isolation.deny.typescript'),
        python: compileDenyList(config.io_isolation.deny.python, 'io_isolation.deny.python'),
        go: compileDenyList(config.io_isolation.deny.go, 'io_isolation.deny.go'),
      },
    },
    boundaries: {
      featureDirs: config.boundaries.feature_dirs.map((p, i) => compileGlob(p, `boundaries.feature_dirs[${i}]`)),
      publicApi: compileGlob(config.boundaries.public_api, 'boundaries.public_api'),
      overrides,
    },
    cycleAllowList: config.cycles.allow.map(([a, b], i) => [
      compileGlob(a, `cycles.allow[${i}][0]`),
      compileGlob(b, `cycles.allow[${i}][1]`),
    ] as const),
    typeOnly: {
      declarationKinds: new Set(config.type_only.declaration_kinds),
      maxCallSites: config.type_only.max_call_sites,
    },
    rules: compileRuleSettings(config.rules),
    concurrency: config.ingest.concurrency,
  };
}

/**
 * Effective severity for a rule: configured override or the rule's default.
 */
export function effectiveSeverity(policy: AnalysisPolicy, ruleId: RuleId, fallback: Severity): Severity {
  return policy.rules.get(ruleId)?.severity ?? fallback;
}

/**
 * Whether a rule is enabled (rules are on unless switched off).
 */
export function isRuleEnabled(policy: AnalysisPolicy, ruleId: RuleId): boolean {
  return policy.rules.get(ruleId)?.enabled ?? true;
}
