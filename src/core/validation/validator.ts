/**
 * HierarchyValidator - checks a whole rule set for cycles, orphans and
 * conflicts, and gathers statistics.
 */
import { logger as rootLogger } from '../../utils/logger.js';
import type { CompositionEngine } from '../composition/engine.js';
import type { ConflictEntry } from '../composition/types.js';
import type { InheritanceType } from '../inheritance/types.js';
import { findReferenceCycles } from '../rules/dependencies.js';
import type { RuleSet } from '../rules/types.js';
import type { ValidationReport } from './types.js';

const log = rootLogger.child('validate');

type Colour = 'visiting' | 'visited';

/**
 * Find every cycle in a child -> parent map.
 *
 * Iterative walk with visiting/visited colouring. Each node has at most one
 * parent, so a walk is a single path; reaching a node that is still being
 * visited closes a cycle. Each cycle is reported once, starting from the
 * first of its members reached in iteration order.
 */
export function detectCycles(
  nodes: Iterable<string>,
  parentOf: ReadonlyMap<string, string>
): string[][] {
  const colour = new Map<string, Colour>();
  const cycles: string[][] = [];

  for (const start of nodes) {
    if (colour.has(start)) continue;

    const walk: string[] = [];
    let current: string | undefined = start;
    while (current !== undefined && !colour.has(current)) {
      colour.set(current, 'visiting');
      walk.push(current);
      current = parentOf.get(current);
    }

    if (current !== undefined && colour.get(current) === 'visiting') {
      const from = walk.indexOf(current);
      cycles.push([...walk.slice(from), current]);
    }

    for (const node of walk) {
      colour.set(node, 'visited');
    }
  }

  return cycles;
}

export class HierarchyValidator {
  constructor(private readonly engine: CompositionEngine) {}

  validate(rules: RuleSet): ValidationReport {
    const resolver = this.engine.resolver;
    const errors: string[] = [];
    const warnings: string[] = [];
    const orphanedRules: string[] = [];
    const parentOf = new Map<string, string>();
    const inheritanceTypes: Record<InheritanceType, number> = {
      full: 0,
      content: 0,
      metadata: 0,
      variables: 0,
      selective: 0,
    };

    // 1. Edges and orphans
    for (const rule of rules.values()) {
      const resolution = resolver.resolveParentDetailed(rule, rules);
      const parent = resolution.parentPath === undefined ? undefined : rules.get(resolution.parentPath);
      if (parent) {
        parentOf.set(rule.path, parent.path);
        inheritanceTypes[resolver.inferInheritanceType(rule, parent)] += 1;
      } else if (resolution.source === 'unresolved') {
        orphanedRules.push(rule.path);
        warnings.push(`Missing parent rule for ${rule.path}: ${resolution.declared ?? ''}`);
      }
    }

    // 2. Cycles
    const circularDependencies = detectCycles(rules.keys(), parentOf);
    const inCycle = new Set(circularDependencies.flat());
    for (const cycle of circularDependencies) {
      errors.push(`Circular inheritance: ${cycle.join(' → ')}`);
    }

    const referenceCycles = findReferenceCycles(rules);
    for (const cycle of referenceCycles) {
      warnings.push(`Circular reference: ${cycle.join(' → ')}`);
    }

    // 3. Compose everything (through the engine cache)
    const conflicts: Record<string, ConflictEntry[]> = {};
    let totalConflicts = 0;
    let hasErrorConflict = false;
    let maxDepth = 0;

    for (const rule of rules.values()) {
      const result = this.engine.compose(rule.path, rules);
      if (result.conflicts.length > 0) {
        conflicts[rule.path] = [...result.conflicts];
        totalConflicts += result.conflicts.length;
        const blocking = result.conflicts.filter((conflict) => conflict.severity === 'error');
        if (blocking.length > 0) {
          hasErrorConflict = true;
          for (const conflict of blocking) {
            if (conflict.kind !== 'CIRCULAR_INHERITANCE') {
              errors.push(`${rule.path}: ${conflict.kind} on '${conflict.sectionOrKey}' (${conflict.resolution})`);
            }
          }
        }
        const nonBlocking = result.conflicts.length - blocking.length;
        if (nonBlocking > 0) {
          warnings.push(`Inheritance conflicts in ${rule.path}: ${nonBlocking}`);
        }
      }

      if (!inCycle.has(rule.path)) {
        maxDepth = Math.max(maxDepth, new Set(result.chain).size);
      }
    }

    const report: ValidationReport = {
      valid: circularDependencies.length === 0 && !hasErrorConflict,
      errors,
      warnings,
      circularDependencies,
      referenceCycles,
      orphanedRules,
      statistics: {
        totalRules: rules.size,
        rulesWithInheritance: parentOf.size,
        maxDepth,
        totalConflicts,
        inheritanceTypes,
      },
      conflicts,
    };

    log.debug('Hierarchy validated', {
      rules: rules.size,
      cycles: circularDependencies.length,
      referenceCycles: referenceCycles.length,
      orphans: orphanedRules.length,
      conflicts: totalConflicts,
    });
    return report;
  }
}
