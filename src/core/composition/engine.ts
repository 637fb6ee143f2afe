/**
 * CompositionEngine - folds a rule's inheritance chain into one composed rule.
 *
 * Results are cached under `<rulePath>#<fingerprint>`, where the fingerprint
 * covers every rule in the chain, so editing any ancestor changes the key.
 * A failing cache never fails composition; it only adds a warning.
 */
import { computeFingerprint } from '../../utils/checksum.js';
import { logger as rootLogger } from '../../utils/logger.js';
import { CacheStore } from '../cache/store.js';
import type { CacheStoreStats } from '../cache/types.js';
import { InheritanceResolver, hasCycle } from '../inheritance/resolver.js';
import type { InheritanceChain, InheritanceEdge } from '../inheritance/types.js';
import type { ParsedRule, RuleSet } from '../rules/types.js';
import { initialState, mergeStep } from './merge.js';
import type { CompositionResult, ConflictEntry } from './types.js';

const log = rootLogger.child('compose');

export interface CompositionEngineOptions {
  resolver?: InheritanceResolver;
  /** Shared result cache; a private one is created when omitted */
  cache?: CacheStore<CompositionResult>;
  /** TTL for cached results; the cache default when omitted */
  ttlMs?: number | null;
}

export class CompositionEngine {
  readonly resolver: InheritanceResolver;
  private readonly cache: CacheStore<CompositionResult>;
  private readonly ttlMs: number | null | undefined;

  constructor(options: CompositionEngineOptions = {}) {
    this.resolver = options.resolver ?? new InheritanceResolver();
    this.cache = options.cache ?? new CacheStore<CompositionResult>();
    this.ttlMs = options.ttlMs;
  }

  /**
   * Compose a rule with all of its ancestors.
   * Never throws: structural problems come back as `success: false`.
   */
  compose(rulePath: string, rules: RuleSet): CompositionResult {
    const target = rules.get(rulePath);
    if (!target) {
      log.debug(`Unknown rule: ${rulePath}`);
      return failure(rulePath, [rulePath], {
        sectionOrKey: rulePath,
        parentPath: '',
        childPath: rulePath,
        kind: 'UNKNOWN_RULE',
        resolution: 'composition aborted: rule not found',
        severity: 'error',
      });
    }

    const chain = this.resolver.buildChain(rulePath, rules);
    if (hasCycle(chain)) {
      const loop = cycleFrom(chain);
      log.debug(`Circular inheritance at ${rulePath}`, { cycle: loop });
      return failure(rulePath, chain, {
        sectionOrKey: 'inherit',
        parentPath: loop[1] ?? rulePath,
        childPath: loop[0] ?? rulePath,
        kind: 'CIRCULAR_INHERITANCE',
        resolution: `composition aborted: ${loop.join(' → ')}`,
        severity: 'error',
      });
    }

    const key = cacheKey(rulePath, chain, rules);
    const cacheWarnings: string[] = [];

    try {
      const cached = this.cache.get(key);
      if (cached) {
        log.debug(`Cache hit: ${rulePath}`);
        return cached;
      }
    } catch (error) {
      cacheWarnings.push(this.cacheFailure('lookup', rulePath, error));
    }

    log.debug(`Cache miss: ${rulePath}`);
    const draft = this.fold(target, chain, rules);

    try {
      this.cache.put(key, freeze(draft), this.ttlMs);
    } catch (error) {
      cacheWarnings.push(this.cacheFailure('store', rulePath, error));
    }

    if (cacheWarnings.length === 0) {
      return freeze(draft);
    }
    return freeze({ ...draft, warnings: [...draft.warnings, ...cacheWarnings] });
  }

  /**
   * Drop cached results keyed under a rule path. Returns the number removed.
   */
  invalidate(rulePath: string): number {
    return this.cache.invalidateWhere((key) => pathOfKey(key) === rulePath);
  }

  /** Drop every cached result. */
  invalidateAll(): void {
    this.cache.clear();
  }

  cacheStatus(): CacheStoreStats {
    return this.cache.stats();
  }

  private fold(target: ParsedRule, chain: InheritanceChain, rules: RuleSet): CompositionResult {
    const conflicts: ConflictEntry[] = [];
    const warnings: string[] = [];
    const links: InheritanceEdge[] = [];

    for (const path of chain) {
      const rule = rules.get(path);
      if (!rule) continue;
      for (const warning of rule.parseWarnings) {
        warnings.push(`${path}: ${warning}`);
      }
      const mode = this.resolver.unknownInheritanceMode(rule);
      if (mode !== undefined) {
        warnings.push(`${path}: unknown inherit_mode '${mode}', using inferred type`);
      }
    }

    // Type mismatches are reported per link, ahead of merge conflicts
    for (let i = 1; i < chain.length; i++) {
      const parent = rules.get(chain[i - 1] ?? '');
      const child = rules.get(chain[i] ?? '');
      if (parent && child && parent.ruleType !== child.ruleType) {
        conflicts.push({
          sectionOrKey: 'type',
          parentPath: parent.path,
          childPath: child.path,
          kind: 'TYPE_MISMATCH',
          resolution: `child type '${child.ruleType}' kept over '${parent.ruleType}'`,
          severity: 'warning',
        });
      }
    }

    let state = initialState(rules.get(chain[0] ?? target.path) ?? target);

    for (let i = 1; i < chain.length; i++) {
      const parent = rules.get(chain[i - 1] ?? '');
      const child = rules.get(chain[i] ?? '');
      if (!parent || !child) continue;

      const inheritanceType = this.resolver.inferInheritanceType(child, parent);
      links.push({ childPath: child.path, parentPath: parent.path, inheritanceType });

      const outcome = mergeStep(state, {
        parentPath: parent.path,
        child,
        inheritanceType,
        selectedSections: inheritanceType === 'selective' ? this.resolver.selectedSections(child) : [],
      });
      state = outcome.state;
      conflicts.push(...outcome.conflicts);
      warnings.push(...outcome.warnings);
    }

    return {
      rulePath: target.path,
      chain,
      links,
      ruleType: target.ruleType,
      composedSections: state.sections,
      composedMetadata: state.metadata,
      variableKeys: [...state.variableKeys],
      conflicts,
      success: true,
      warnings,
    };
  }

  private cacheFailure(operation: 'lookup' | 'store', rulePath: string, error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Cache ${operation} failed for ${rulePath}: ${message}`);
    return `cache ${operation} failed: ${message}`;
  }
}

/**
 * Cache key for a rule composed from `chain`.
 */
export function cacheKey(rulePath: string, chain: InheritanceChain, rules: RuleSet): string {
  const fingerprint = computeFingerprint(
    chain.map((path) => [path, rules.get(path)?.checksum ?? ''] as const)
  );
  return `${rulePath}#${fingerprint}`;
}

function pathOfKey(key: string): string {
  const hash = key.lastIndexOf('#');
  return hash === -1 ? key : key.slice(0, hash);
}

/**
 * The loop part of a truncated chain, child-first:
 * root-first [A, C, B, A] -> [A, B, C, A].
 */
function cycleFrom(chain: InheritanceChain): string[] {
  const repeated = chain[0];
  const upward = [...chain].reverse();
  const start = upward.indexOf(repeated ?? '');
  return upward.slice(start);
}

function failure(rulePath: string, chain: InheritanceChain, conflict: ConflictEntry): CompositionResult {
  return freeze({
    rulePath,
    chain,
    links: [],
    ruleType: undefined,
    composedSections: new Map(),
    composedMetadata: new Map(),
    variableKeys: [],
    conflicts: [conflict],
    success: false,
    warnings: [],
  });
}

function freeze(result: CompositionResult): CompositionResult {
  if (Object.isFrozen(result)) return result;
  Object.freeze(result.chain);
  Object.freeze(result.links);
  Object.freeze(result.variableKeys);
  Object.freeze(result.warnings);
  for (const conflict of result.conflicts) Object.freeze(conflict);
  Object.freeze(result.conflicts);
  return Object.freeze(result);
}
