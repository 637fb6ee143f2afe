/**
 * Helpers for building rule documents in tests.
 */
import { stringify } from 'yaml';
import { loadHierarchy } from '../../src/core/rules/loader.js';
import type { RuleSet } from '../../src/core/rules/types.js';

/**
 * A markdown rule document with optional frontmatter.
 */
export function md(frontmatter: Record<string, unknown>, body: string): string {
  if (Object.keys(frontmatter).length === 0) {
    return body;
  }
  return `---\n${stringify(frontmatter)}---\n${body}`;
}

export function ruleSet(documents: Record<string, string>): RuleSet {
  return loadHierarchy(documents);
}
