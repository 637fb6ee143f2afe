/**
 * Inheritance type definitions.
 */
import { z } from 'zod';

/**
 * Which parts of a parent a child absorbs.
 * - full: sections and metadata
 * - content: sections only
 * - metadata: metadata only
 * - variables: variable-flagged metadata only
 * - selective: the sections listed in `inherit_sections`
 */
export const InheritanceTypeSchema = z.enum(['full', 'content', 'metadata', 'variables', 'selective']);
export type InheritanceType = z.infer<typeof InheritanceTypeSchema>;

export const INHERITANCE_TYPES: readonly InheritanceType[] = InheritanceTypeSchema.options;

/** Directed child -> parent relationship. */
export interface InheritanceEdge {
  childPath: string;
  parentPath: string;
  inheritanceType: InheritanceType;
}

/**
 * Paths from root ancestor to the queried rule, inclusive.
 * A path appearing twice means the walk hit a cycle and was truncated there.
 */
export type InheritanceChain = readonly string[];

/** How a parent was found (or why none was). */
export type ParentSource = 'explicit' | 'convention' | 'none' | 'unresolved';

export interface ParentResolution {
  parentPath: string | undefined;
  source: ParentSource;
  /** The `inherit` target as written, when one was declared */
  declared?: string;
}
