import { z } from 'zod';
import { DEFAULT_PARENT_CANDIDATES } from '../inheritance/naming.js';
import { DEFAULT_RULE_EXCLUDES, DEFAULT_RULE_PATTERNS } from '../rules/source.js';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Where rule documents live and which files count as rules. */
export const RulesSettingsSchema = z.object({
  /** Rule directory, relative to the project root */
  root: z.string().min(1).default('.rulenest/rules'),
  include: z.array(z.string()).default([...DEFAULT_RULE_PATTERNS]),
  exclude: z.array(z.string()).default([...DEFAULT_RULE_EXCLUDES]),
});

/** Composition cache settings. */
export const CacheSettingsSchema = z.object({
  max_size: z.number().int().min(1).default(100),
  /** Lifetime of a composed result */
  default_ttl_seconds: z.number().positive().default(3600),
});

/** Parent discovery settings. */
export const InheritanceSettingsSchema = z.object({
  /** Convention parent names, highest priority first */
  parent_candidates: z.array(z.string().min(1)).min(1).default([...DEFAULT_PARENT_CANDIDATES]),
  /** Look for convention parents in enclosing directories */
  search_ancestors: z.boolean().default(true),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/**
 * Complete configuration schema.
 */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  rules: withDefaults(RulesSettingsSchema),
  cache: withDefaults(CacheSettingsSchema),
  inheritance: withDefaults(InheritanceSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RulesSettings = z.infer<typeof RulesSettingsSchema>;
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;
export type InheritanceSettings = z.infer<typeof InheritanceSettingsSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
