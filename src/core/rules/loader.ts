/**
 * Builds a RuleSet from raw documents.
 */
import { logger } from '../../utils/logger.js';
import { parseRule } from './parser.js';
import type { ParsedRule, RawDocuments, RuleSet } from './types.js';

const log = logger.child('loader');

/**
 * Parse every raw document into a new RuleSet.
 * Parsing is lenient, so a malformed document never aborts the batch.
 */
export function loadHierarchy(rawDocuments: RawDocuments): RuleSet {
  const rules = new Map<string, ParsedRule>();
  let degraded = 0;

  for (const [path, content] of documentEntries(rawDocuments)) {
    const rule = parseRule(path, content);
    if (rule.parseWarnings.length > 0) {
      degraded++;
      log.debug(`Parsed '${path}' with warnings`, { warnings: [...rule.parseWarnings] });
    }
    rules.set(path, rule);
  }

  log.debug(`Loaded ${rules.size} rule(s)`, { withWarnings: degraded });
  return rules;
}

/**
 * Return a new RuleSet with one rule re-parsed from fresh content.
 * The input set is left untouched.
 */
export function replaceRule(rules: RuleSet, path: string, content: string): RuleSet {
  const next = new Map(rules);
  next.set(path, parseRule(path, content));
  return next;
}

function documentEntries(rawDocuments: RawDocuments): Iterable<readonly [string, string]> {
  return isReadonlyMap(rawDocuments) ? rawDocuments.entries() : Object.entries(rawDocuments);
}

function isReadonlyMap(value: RawDocuments): value is ReadonlyMap<string, string> {
  return value instanceof Map;
}
