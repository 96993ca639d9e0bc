/**
 * Types for layer classification.
 */
import type { Module, ModuleGraph } from '../graph/types.js';

/**
 * A module with its layer label; null means Unclassified.
 */
export interface ClassifiedModule extends Module {
  readonly layer: string | null;
}

/**
 * Module graph whose modules carry layer labels. Produced once, never mutated.
 */
export interface ClassifiedGraph extends ModuleGraph {
  readonly modules: readonly ClassifiedModule[];
}
