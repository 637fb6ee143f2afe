/**
 * Hierarchy graph type definitions.
 */
import type { InheritanceType } from '../inheritance/types.js';
import type { RuleType } from '../rules/types.js';

/**
 * Node in the hierarchy graph.
 */
export interface GraphNode {
  /** Rule path */
  id: string;
  /** Display label */
  label: string;
  /** Rule type, absent for referenced paths missing from the set */
  ruleType?: RuleType;
  /** `missing` marks a reference target that is not a loaded rule */
  type: 'rule' | 'missing';
}

/**
 * Edge in the hierarchy graph. Inheritance edges point parent -> child.
 */
export interface GraphEdge {
  from: string;
  to: string;
  type: 'inherits' | 'references';
  /** Set on inheritance edges */
  inheritanceType?: InheritanceType;
}

export interface HierarchyGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export type GraphFormat = 'mermaid' | 'graphviz' | 'json';

export interface GraphOptions {
  /** Include body references (`mdc:` links, `@import`) */
  showReferences?: boolean;
  /** Restrict to this rule and its descendants */
  root?: string;
  /** Maximum descendant depth below `root` */
  maxDepth?: number;
}
