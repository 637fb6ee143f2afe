/**
 * Rule document types.
 */
import { z } from 'zod';

/** Closed set of rule types. */
export const RuleTypeSchema = z.enum(['agent', 'context', 'workflow', 'general']);
export type RuleType = z.infer<typeof RuleTypeSchema>;

/** Source format of a rule document, detected from its extension. */
export type RuleFormat = 'markdown' | 'json' | 'yaml' | 'text';

/**
 * A metadata value. Scalars and string lists only, so merge logic can branch
 * on `typeof` / `Array.isArray` deterministically.
 */
export type MetadataValue = string | number | boolean | readonly string[];

export function isStringList(value: MetadataValue | undefined): value is readonly string[] {
  return Array.isArray(value);
}

/**
 * Render a metadata value as text (lists are comma-joined).
 */
export function metadataText(value: MetadataValue): string {
  return isStringList(value) ? value.join(', ') : String(value);
}

export const MetadataValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
]);

/** Metadata keys with a meaning to the engine. */
export const MetadataKeys = {
  INHERIT: 'inherit',
  INHERIT_MODE: 'inherit_mode',
  INHERIT_SECTIONS: 'inherit_sections',
  OVERRIDE: 'override',
  TYPE: 'type',
  PRIORITY: 'priority',
  VARIABLES: 'variables',
} as const;

/**
 * Keys that steer inheritance for the rule that declares them.
 * They are never inherited and never reported as conflicts.
 */
export const CONTROL_KEYS: ReadonlySet<string> = new Set([
  MetadataKeys.INHERIT,
  MetadataKeys.INHERIT_MODE,
  MetadataKeys.INHERIT_SECTIONS,
  MetadataKeys.OVERRIDE,
  MetadataKeys.TYPE,
]);

/**
 * One parsed rule document.
 */
export interface ParsedRule {
  /** Unique slash-delimited logical path */
  readonly path: string;
  readonly format: RuleFormat;
  /** Declared via `type` metadata or inferred from the path */
  readonly ruleType: RuleType;
  /** Section name -> text, in document order */
  readonly sections: ReadonlyMap<string, string>;
  readonly metadata: ReadonlyMap<string, MetadataValue>;
  /** Metadata keys that were declared under a `variables` block */
  readonly variableKeys: readonly string[];
  /** Rule paths linked from the body (`mdc:` links, `@import`) */
  readonly references: readonly string[];
  readonly rawContent: string;
  /** SHA-256 of rawContent (first 16 hex chars) */
  readonly checksum: string;
  readonly parseWarnings: readonly string[];
}

/**
 * A snapshot of the whole hierarchy, keyed by rule path.
 * Treated as immutable: reloading produces a new map.
 */
export type RuleSet = ReadonlyMap<string, ParsedRule>;

/** Raw documents as supplied by a rule source: path -> content. */
export type RawDocuments = Readonly<Record<string, string>> | ReadonlyMap<string, string>;
