/**
 * Composition type definitions.
 */
import type { MetadataValue, RuleType } from '../rules/types.js';
import type { InheritanceChain, InheritanceEdge } from '../inheritance/types.js';

/**
 * Kinds of conflict recorded while composing.
 * CIRCULAR_INHERITANCE and UNKNOWN_RULE are fatal for the rule being composed.
 */
export type ConflictKind =
  | 'TYPE_MISMATCH'
  | 'VARIABLE_CONFLICT'
  | 'SECTION_OVERRIDE'
  | 'CIRCULAR_INHERITANCE'
  | 'UNKNOWN_RULE';

export type ConflictSeverity = 'info' | 'warning' | 'error';

export interface ConflictEntry {
  /** Section name or metadata key involved */
  sectionOrKey: string;
  parentPath: string;
  childPath: string;
  kind: ConflictKind;
  /** What the engine did about it */
  resolution: string;
  severity: ConflictSeverity;
}

/**
 * A rule merged with its ancestors. Frozen once returned; a cache hit returns
 * the same object.
 */
export interface CompositionResult {
  readonly rulePath: string;
  /** Root-first chain the result was folded from */
  readonly chain: InheritanceChain;
  /** Links of the chain with their inheritance types, root-first */
  readonly links: readonly InheritanceEdge[];
  /** Type of the composed rule (the leaf's own) */
  readonly ruleType: RuleType | undefined;
  readonly composedSections: ReadonlyMap<string, string>;
  readonly composedMetadata: ReadonlyMap<string, MetadataValue>;
  /** Metadata keys that are variables in the composed result */
  readonly variableKeys: readonly string[];
  readonly conflicts: readonly ConflictEntry[];
  /** False only on a structural error (cycle, unknown rule) */
  readonly success: boolean;
  readonly warnings: readonly string[];
}

export type RenderFormat = 'markdown' | 'json' | 'yaml';
