/**
 * Module dependency graph types.
 */
import type { FileFacts, ImportRef } from '../ingest/types.js';

export type ResolutionKind = 'internal' | 'external' | 'ambiguous';

/**
 * An import after resolution against the analyzed file set.
 */
export interface ResolvedImport extends ImportRef {
  /** First target, or null when the import leaves the analyzed tree */
  readonly resolvedPath: string | null;
  /** Every module the import reaches (all files of a Go package) */
  readonly targets: readonly string[];
  readonly resolution: ResolutionKind;
  /** Competing files when the resolution is ambiguous */
  readonly candidates: readonly string[];
}

/**
 * One ingested file. Modules live in an arena sorted by path and are
 * addressed by index.
 */
export interface Module {
  readonly index: number;
  readonly path: string;
  /** Feature directory the module sits in, or null */
  readonly feature: string | null;
  readonly facts: FileFacts;
  /** All imports in source order */
  readonly imports: readonly ResolvedImport[];
  /** External and ambiguous imports only */
  readonly externals: readonly ResolvedImport[];
}

/**
 * `internal` when both ends share a feature directory (or neither is in one),
 * `direct` when the edge crosses a feature directory.
 */
export type EdgeKind = 'direct' | 'internal';

export interface DependencyEdge {
  readonly from: number;
  readonly to: number;
  readonly kind: EdgeKind;
  /** Line of the first import creating the edge */
  readonly line: number;
  readonly typeOnly: boolean;
  readonly specifier: string;
}

export interface ModuleGraph {
  readonly modules: readonly Module[];
  /** Importing-module order, then source order */
  readonly edges: readonly DependencyEdge[];
  /** Outgoing edge indices per module, sorted by target index */
  readonly outgoing: readonly (readonly number[])[];
  readonly indexByPath: ReadonlyMap<string, number>;
  /**
   * Circular-dependency groups (SCCs with more than one module) after
   * allow-listed edges are removed. Members sorted by path; groups by first member.
   */
  readonly cycles: readonly (readonly number[])[];
}
