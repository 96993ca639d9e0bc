/**
 * Configuration schema for `.strata/config.yaml`.
 */
import { z } from 'zod';
import defaultDenyList from './default-deny-list.json' with { type: 'json' };

/**
 * Makes an object field optional and applies the inner schema defaults when
 * it is missing. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Severity of a reported violation. */
export const SeveritySchema = z.enum(['error', 'warning', 'info']);

/** I/O primitive families that a deny-list entry can name. */
export const IoKindSchema = z.enum(['filesystem', 'network', 'database', 'clock', 'randomness', 'process']);

/** One deny-listed call or module pattern. */
export const DenyPatternSchema = z.object({
  pattern: z.string().min(1),
  kind: IoKindSchema,
});

/** Deny-list for a single language family. */
export const LanguageDenyListSchema = z.object({
  /** Call-site patterns: exact callee, `recv.*`, `recv.**` or `/regex/` */
  calls: z.array(DenyPatternSchema).default([]),
  /** External module specifiers (exact or glob) that count as I/O imports */
  modules: z.array(DenyPatternSchema).default([]),
});

/** Built-in deny-lists shipped in default-deny-list.json. */
export const BUILTIN_DENY_LIST = z.object({
  typescript: LanguageDenyListSchema,
  python: LanguageDenyListSchema,
  go: LanguageDenyListSchema,
}).parse(defaultDenyList);

/** Deny-lists per language family. Missing families fall back to the built-in lists. */
export const DenyListSchema = z.object({
  typescript: LanguageDenyListSchema.default(BUILTIN_DENY_LIST.typescript),
  python: LanguageDenyListSchema.default(BUILTIN_DENY_LIST.python),
  go: LanguageDenyListSchema.default(BUILTIN_DENY_LIST.go),
});

/** File discovery patterns. */
export const FilesConfigSchema = z.object({
  /** Glob patterns for files to ingest */
  include: z.array(z.string()).default([
    '**/*.ts', '**/*.tsx', '**/*.mts', '**/*.cts',
    '**/*.js', '**/*.jsx', '**/*.mjs', '**/*.cjs',
    '**/*.py', '**/*.go',
  ]),
  /** gitignore-style patterns for vendored/generated paths */
  ignore: z.array(z.string()).default([
    'node_modules/',
    'dist/',
    'build/',
    'vendor/',
    'coverage/',
    '.git/',
    '*.d.ts',
  ]),
});

/** Individual layer definition. */
export const LayerConfigSchema = z.object({
  /** Layer name (e.g., 'business', 'contracts') */
  name: z.string().min(1),
  /** Glob patterns for files in this layer, tried in order */
  paths: z.array(z.string()),
  /** Layers this layer may depend on */
  can_import: z.array(z.string()).default([]),
  /** Glob patterns to exclude from this layer */
  exclude: z.array(z.string()).default([]),
});

export const DEFAULT_LAYERS: z.input<typeof LayerConfigSchema>[] = [
  { name: 'infrastructure', paths: ['infra/**', 'infrastructure/**', 'src/infra/**', 'src/infrastructure/**'], can_import: ['contracts', 'business'] },
  { name: 'contracts', paths: ['contracts/**', 'src/contracts/**'], can_import: [] },
  { name: 'business', paths: ['business/**', 'domain/**', 'src/business/**', 'src/domain/**'], can_import: ['contracts'] },
];

/** Layers in priority order; first match wins. Missing or null falls back to DEFAULT_LAYERS. */
export const LayersConfigSchema = z.preprocess((val) => val ?? DEFAULT_LAYERS, z.array(LayerConfigSchema));

/** Import resolution settings. */
export const ResolveConfigSchema = z.object({
  /** Specifier prefix → directory relative to the root (e.g. '@/': 'src/') */
  aliases: z.record(z.string(), z.string()).default({}),
  /** Directories tried for bare specifiers after aliases */
  roots: z.array(z.string()).default(['.']),
});

/** I/O isolation rule settings. */
export const IoIsolationConfigSchema = z.object({
  /** Layers that must stay free of I/O */
  layers: z.array(z.string()).default(['business']),
  deny: withDefaults(DenyListSchema),
});

/** Feature boundary settings. */
export const BoundariesConfigSchema = z.object({
  /** Globs matching feature directories */
  feature_dirs: z.array(z.string()).default(['features/*', 'src/features/*']),
  /** Public entry file pattern, relative to the feature directory */
  public_api: z.string().default('index.*'),
  /** Per-feature overrides keyed by feature directory */
  public_api_overrides: z.record(z.string(), z.string()).default({}),
});

/** Circular dependency settings. */
export const CyclesConfigSchema = z.object({
  /** Acknowledged file pairs (globs); edges between them are ignored for cycle detection */
  allow: z.array(z.tuple([z.string(), z.string()])).default([]),
});

/** Declaration kinds an exported symbol can have. */
export const SymbolKindSettingSchema = z.enum(['interface', 'type', 'enum', 'class', 'function', 'variable', 're-export']);

/** Heuristic for type-only coupling in the direction rule. */
export const TypeOnlyConfigSchema = z.object({
  declaration_kinds: z.array(SymbolKindSettingSchema).default(['interface', 'type', 'enum']),
  max_call_sites: z.number().int().min(0).default(0),
});

/** Ingestion settings. */
export const IngestConfigSchema = z.object({
  /** Concurrent file reads (default: 75% of CPUs, min 2, max 16) */
  concurrency: z.number().int().min(1).max(64).optional(),
});

/** Per-rule switch and severity override. */
export const RuleSettingSchema = z.object({
  enabled: z.boolean().default(true),
  severity: SeveritySchema.optional(),
});

/** Complete config.yaml schema. */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  files: withDefaults(FilesConfigSchema),
  layers: LayersConfigSchema,
  resolve: withDefaults(ResolveConfigSchema),
  io_isolation: withDefaults(IoIsolationConfigSchema),
  boundaries: withDefaults(BoundariesConfigSchema),
  cycles: withDefaults(CyclesConfigSchema),
  type_only: withDefaults(TypeOnlyConfigSchema),
  ingest: withDefaults(IngestConfigSchema),
  rules: z.record(z.string(), RuleSettingSchema).default({}),
});

export type Severity = z.infer<typeof SeveritySchema>;
export type IoKind = z.infer<typeof IoKindSchema>;
export type SymbolKindSetting = z.infer<typeof SymbolKindSettingSchema>;
export type DenyPattern = z.infer<typeof DenyPatternSchema>;
export type LanguageDenyList = z.infer<typeof LanguageDenyListSchema>;
export type DenyList = z.infer<typeof DenyListSchema>;
export type FilesConfig = z.infer<typeof FilesConfigSchema>;
export type LayerConfig = z.infer<typeof LayerConfigSchema>;
export type ResolveConfig = z.infer<typeof ResolveConfigSchema>;
export type BoundariesConfig = z.infer<typeof BoundariesConfigSchema>;
export type TypeOnlyConfig = z.infer<typeof TypeOnlyConfigSchema>;
export type RuleSetting = z.infer<typeof RuleSettingSchema>;
export type Config = z.infer<typeof ConfigSchema>;
