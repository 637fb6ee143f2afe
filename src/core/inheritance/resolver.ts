/**
 * InheritanceResolver - finds parents, inheritance types and chains.
 *
 * Parent resolution order (first match wins):
 * 1. Explicit `inherit` metadata naming an existing rule
 * 2. Convention: candidate names in the rule's directory, then its ancestors
 * 3. No parent (root rule)
 *
 * The resolver never throws. An `inherit` target that does not exist leaves
 * the rule without a parent (an orphan candidate for the validator); a rule
 * naming itself is treated as a root.
 */
import * as path from 'node:path';
import { extensionOf, normalizeSectionName } from '../rules/parser.js';
import { MetadataKeys, isStringList, metadataText, type ParsedRule, type RuleSet } from '../rules/types.js';
import {
  DEFAULT_PARENT_CANDIDATES,
  conventionCandidates,
  splitRulePath,
  type CandidateNamingStrategy,
} from './naming.js';
import {
  InheritanceTypeSchema,
  type InheritanceChain,
  type InheritanceEdge,
  type InheritanceType,
  type ParentResolution,
} from './types.js';

export interface InheritanceResolverOptions {
  /** Ordered candidate base names for convention lookup */
  parentCandidates?: CandidateNamingStrategy;
  /** Also look in enclosing directories (default: true) */
  searchAncestors?: boolean;
}

export class InheritanceResolver {
  private readonly candidates: CandidateNamingStrategy;
  private readonly searchAncestors: boolean;

  constructor(options: InheritanceResolverOptions = {}) {
    this.candidates = options.parentCandidates ?? DEFAULT_PARENT_CANDIDATES;
    this.searchAncestors = options.searchAncestors ?? true;
  }

  /**
   * Resolve the direct parent path of a rule, if any.
   */
  resolveParent(rule: ParsedRule, rules: RuleSet): string | undefined {
    return this.resolveParentDetailed(rule, rules).parentPath;
  }

  /**
   * Resolve the direct parent and report how it was found.
   */
  resolveParentDetailed(rule: ParsedRule, rules: RuleSet): ParentResolution {
    const declared = rule.metadata.get(MetadataKeys.INHERIT);

    if (declared !== undefined) {
      const target = metadataText(declared).trim();
      if (typeof declared !== 'string' || target === '') {
        return { parentPath: undefined, source: 'unresolved', declared: target };
      }
      for (const candidate of explicitCandidates(rule.path, target)) {
        if (candidate === rule.path) {
          // Self-loop guard
          return { parentPath: undefined, source: 'none', declared: target };
        }
        if (rules.has(candidate)) {
          return { parentPath: candidate, source: 'explicit', declared: target };
        }
      }
      return { parentPath: undefined, source: 'unresolved', declared: target };
    }

    for (const candidate of conventionCandidates(rule.path, this.candidates, this.searchAncestors)) {
      if (rules.has(candidate)) {
        return { parentPath: candidate, source: 'convention' };
      }
    }

    return { parentPath: undefined, source: 'none' };
  }

  /**
   * Decide how a rule inherits from its parent.
   * An explicit `inherit_mode` wins; an `inherit_sections` list implies
   * selective; otherwise full. A rule without a parent is always full.
   */
  inferInheritanceType(rule: ParsedRule, parent?: ParsedRule): InheritanceType {
    if (!parent) return 'full';

    const mode = rule.metadata.get(MetadataKeys.INHERIT_MODE);
    if (typeof mode === 'string') {
      const result = InheritanceTypeSchema.safeParse(mode.trim().toLowerCase());
      if (result.success) return result.data;
    }

    if (rule.metadata.has(MetadataKeys.INHERIT_SECTIONS)) {
      return 'selective';
    }
    return 'full';
  }

  /**
   * The `inherit_mode` value when it is present but not a known type.
   */
  unknownInheritanceMode(rule: ParsedRule): string | undefined {
    const mode = rule.metadata.get(MetadataKeys.INHERIT_MODE);
    if (mode === undefined) return undefined;
    if (typeof mode === 'string' && InheritanceTypeSchema.safeParse(mode.trim().toLowerCase()).success) {
      return undefined;
    }
    return metadataText(mode);
  }

  /**
   * Section names a selective child pulls from its parent, normalized the
   * same way headings are.
   */
  selectedSections(rule: ParsedRule): string[] {
    const listed = rule.metadata.get(MetadataKeys.INHERIT_SECTIONS);
    const names: readonly string[] = isStringList(listed)
      ? listed
      : typeof listed === 'string'
        ? listed.split(',')
        : [];
    return [...new Set(names.map(normalizeSectionName).filter((name) => name !== ''))];
  }

  /**
   * Walk parent links upward from `rulePath` and return the chain root-first.
   * Stops at a root, at a missing rule, or when a path repeats; in the last
   * case the repeated path is included so callers can detect the cycle.
   */
  buildChain(rulePath: string, rules: RuleSet): InheritanceChain {
    const upward: string[] = [];
    const seen = new Set<string>();
    let current: string | undefined = rulePath;

    while (current !== undefined) {
      upward.push(current);
      if (seen.has(current)) break;
      seen.add(current);

      const rule = rules.get(current);
      if (!rule) break;
      current = this.resolveParent(rule, rules);
    }

    return upward.reverse();
  }

  /**
   * Every resolved child -> parent edge in the set.
   */
  buildEdges(rules: RuleSet): InheritanceEdge[] {
    const edges: InheritanceEdge[] = [];
    for (const rule of rules.values()) {
      const parentPath = this.resolveParent(rule, rules);
      const parent = parentPath === undefined ? undefined : rules.get(parentPath);
      if (parentPath !== undefined && parent) {
        edges.push({
          childPath: rule.path,
          parentPath,
          inheritanceType: this.inferInheritanceType(rule, parent),
        });
      }
    }
    return edges;
  }
}

/**
 * True when the chain contains a repeated path (a truncated cycle).
 */
export function hasCycle(chain: InheritanceChain): boolean {
  return new Set(chain).size !== chain.length;
}

/**
 * Paths an explicit `inherit` value may refer to, in lookup order:
 * as written, relative to the rule's directory (`./x`, `../x`), and each of
 * those with the rule's extension when the target has none.
 */
function explicitCandidates(rulePath: string, target: string): string[] {
  const { dir, ext } = splitRulePath(rulePath);
  const forms = [target];
  if (target.startsWith('./') || target.startsWith('../')) {
    forms.push(path.posix.normalize(path.posix.join(dir || '.', target)));
  }
  const withExtension = ext
    ? forms.filter((form) => extensionOf(form) === '').map((form) => `${form}${ext}`)
    : [];
  return [...new Set([...forms, ...withExtension])];
}
