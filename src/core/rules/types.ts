/**
 * Rule and violation type definitions.
 */
import type { IoKind, Severity } from '../config/schema.js';
import type { AnalysisPolicy } from '../config/policy.js';
import type { ClassifiedGraph } from '../layers/types.js';

/**
 * Every rule the engine knows, in registration order.
 */
export const RULE_IDS = [
  'layer-direction',
  'io-isolation',
  'module-boundary',
  'error-handling',
  'circular-dependency',
  'parse-failure',
  'unclassified-module',
  'ambiguous-import',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export type ViolationCategory =
  | 'direction'
  | 'io-isolation'
  | 'boundary'
  | 'error-shape'
  | 'cycle'
  | 'parse-failure'
  | 'config-gap'
  | 'resolution';

export const VIOLATION_CATEGORIES: readonly ViolationCategory[] = [
  'direction',
  'io-isolation',
  'boundary',
  'error-shape',
  'cycle',
  'parse-failure',
  'config-gap',
  'resolution',
];

/**
 * 1-based source span. `column` refers to `start`.
 */
export interface LineRange {
  readonly start: number;
  readonly end: number;
  readonly column: number;
}

interface ViolationBase {
  readonly ruleId: RuleId;
  readonly severity: Severity;
  /** Root-relative path of the offending module */
  readonly path: string;
  readonly lineRange: LineRange | null;
  readonly message: string;
  /** Suggested fix (human-readable) */
  readonly fixHint?: string;
}

export interface DirectionViolation extends ViolationBase {
  readonly category: 'direction';
  readonly target: string;
  readonly sourceLayer: string;
  readonly targetLayer: string;
  readonly typeOnly: boolean;
}

export interface IoIsolationViolation extends ViolationBase {
  readonly category: 'io-isolation';
  readonly layer: string;
  /** Callee or module specifier */
  readonly primitive: string;
  readonly ioKind: IoKind;
  readonly via: 'call' | 'import';
}

export interface BoundaryViolation extends ViolationBase {
  readonly category: 'boundary';
  readonly target: string;
  readonly feature: string;
}

export interface ErrorShapeViolation extends ViolationBase {
  readonly category: 'error-shape';
  readonly construct: string;
}

export interface CycleViolation extends ViolationBase {
  readonly category: 'cycle';
  /** The member this module imports next in the cycle */
  readonly target: string;
  /** All members of the cycle group, sorted by path */
  readonly members: readonly string[];
}

export interface ParseFailureViolation extends ViolationBase {
  readonly category: 'parse-failure';
  readonly errors: readonly string[];
}

export interface ConfigGapViolation extends ViolationBase {
  readonly category: 'config-gap';
}

export interface ResolutionViolation extends ViolationBase {
  readonly category: 'resolution';
  readonly specifier: string;
  readonly candidates: readonly string[];
}

/**
 * A located rule violation. Closed union over `category`.
 */
export type Violation =
  | DirectionViolation
  | IoIsolationViolation
  | BoundaryViolation
  | ErrorShapeViolation
  | CycleViolation
  | ParseFailureViolation
  | ConfigGapViolation
  | ResolutionViolation;

/**
 * Read-only input every rule evaluates.
 */
export interface RuleContext {
  readonly graph: ClassifiedGraph;
  readonly policy: AnalysisPolicy;
}

/**
 * A single architecture rule. Rules are pure and independent of each other.
 */
export interface Rule {
  readonly id: RuleId;
  readonly category: ViolationCategory;
  readonly defaultSeverity: Severity;
  readonly description: string;
  /**
   * @param severity - Effective severity after configuration overrides
   */
  evaluate(context: RuleContext, severity: Severity): Violation[];
}
