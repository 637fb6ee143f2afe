/**
 * Validation type definitions.
 */
import type { ConflictEntry } from '../composition/types.js';
import type { InheritanceType } from '../inheritance/types.js';

export interface HierarchyStatistics {
  totalRules: number;
  /** Rules with a resolved parent */
  rulesWithInheritance: number;
  /** Longest chain (in rules) among rules outside a cycle */
  maxDepth: number;
  /** Conflict entries summed across every composed rule */
  totalConflicts: number;
  /** Resolved edges per inheritance type */
  inheritanceTypes: Record<InheritanceType, number>;
}

/**
 * Result of validating a whole hierarchy.
 */
export interface ValidationReport {
  /** True when there are no cycles and no error-level conflicts */
  valid: boolean;
  errors: string[];
  warnings: string[];
  /** Each cycle in walk order, closed: [A, B, C, A] */
  circularDependencies: string[][];
  /** Cycles among body references, closed: [A, B, A]. Reported as warnings */
  referenceCycles: string[][];
  /** Rules whose explicit `inherit` target does not exist */
  orphanedRules: string[];
  statistics: HierarchyStatistics;
  /** Rule path -> conflicts, for rules that have any */
  conflicts: Record<string, ConflictEntry[]>;
}
