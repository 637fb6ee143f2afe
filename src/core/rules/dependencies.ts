/**
 * Reference dependencies between rules.
 *
 * A rule depends on every loaded rule its body links to (`mdc:` links and
 * `@import` lines). Unlike inheritance, references may form cycles; those are
 * reported, never thrown.
 */
import { logger as rootLogger } from '../../utils/logger.js';
import type { RuleSet } from './types.js';

const log = rootLogger.child('dependencies');

export interface DependencyResolution {
  rulePath: string;
  /** Loaded rules to read before `rulePath`, dependencies first, ending with `rulePath` */
  order: string[];
  /** Reference cycles met on the way, closed: [A, B, A] */
  cycles: string[][];
  /** Referenced paths that are not in the rule set */
  missing: string[];
}

type VisitState = 'visiting' | 'visited';

interface DependencyWalk {
  order: string[];
  cycles: string[][];
  missing: string[];
}

interface Frame {
  path: string;
  /** Index of the next reference to follow */
  next: number;
}

/**
 * Order the rules reachable from `rulePath` through references so that each
 * rule comes after the rules it references. An unknown `rulePath` yields an
 * empty order and is listed as missing.
 */
export function resolveDependencies(rulePath: string, rules: RuleSet): DependencyResolution {
  const walk: DependencyWalk = { order: [], cycles: [], missing: [] };

  if (!rules.has(rulePath)) {
    walk.missing.push(rulePath);
  } else {
    walkReferences(rulePath, rules, new Map(), walk);
  }

  log.debug(`Resolved ${walk.order.length} dependency rule(s) for ${rulePath}`, {
    cycles: walk.cycles.length,
    missing: walk.missing.length,
  });
  return { rulePath, ...walk };
}

/**
 * Every reference cycle in the rule set, each reported once.
 */
export function findReferenceCycles(rules: RuleSet): string[][] {
  const state = new Map<string, VisitState>();
  const walk: DependencyWalk = { order: [], cycles: [], missing: [] };
  for (const path of rules.keys()) {
    if (!state.has(path)) {
      walkReferences(path, rules, state, walk);
    }
  }
  return walk.cycles;
}

/**
 * Iterative depth-first walk. A reference back to a rule that is still on
 * the stack closes a cycle; rules are appended to `order` once all of their
 * references are done.
 */
function walkReferences(
  start: string,
  rules: RuleSet,
  state: Map<string, VisitState>,
  walk: DependencyWalk
): void {
  const stack: Frame[] = [{ path: start, next: 0 }];
  state.set(start, 'visiting');

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame === undefined) break;

    const references = rules.get(frame.path)?.references ?? [];
    if (frame.next >= references.length) {
      stack.pop();
      state.set(frame.path, 'visited');
      walk.order.push(frame.path);
      continue;
    }

    const target = references[frame.next];
    frame.next += 1;
    if (target === undefined || target === frame.path) continue;

    if (!rules.has(target)) {
      if (!walk.missing.includes(target)) walk.missing.push(target);
      continue;
    }

    const seen = state.get(target);
    if (seen === 'visiting') {
      const from = stack.findIndex((entry) => entry.path === target);
      walk.cycles.push([...stack.slice(from).map((entry) => entry.path), target]);
    } else if (seen === undefined) {
      state.set(target, 'visiting');
      stack.push({ path: target, next: 0 });
    }
  }
}
