/**
 * Convention-based parent discovery.
 *
 * A naming strategy is an ordered list of base names. A candidate file is a
 * base name plus the extension of the rule being resolved, so `base` matches
 * `base.mdc` for `.mdc` rules and plain `base` for extension-less paths.
 */
import { extensionOf } from '../rules/parser.js';

export const DEFAULT_PARENT_CANDIDATES: readonly string[] = ['index', 'base', 'parent', '_base'];

export type CandidateNamingStrategy = readonly string[];

/**
 * Split a rule path into directory, base name and extension.
 * `agents/review.mdc` -> { dir: 'agents', name: 'review', ext: '.mdc' }
 */
export function splitRulePath(rulePath: string): { dir: string; name: string; ext: string } {
  const slash = rulePath.lastIndexOf('/');
  const dir = slash === -1 ? '' : rulePath.slice(0, slash);
  const file = rulePath.slice(slash + 1);
  const ext = extensionOf(file);
  return { dir, name: ext ? file.slice(0, file.length - ext.length) : file, ext };
}

export function joinRulePath(dir: string, file: string): string {
  return dir ? `${dir}/${file}` : file;
}

function parentDirectory(dir: string): string | undefined {
  if (dir === '') return undefined;
  const slash = dir.lastIndexOf('/');
  return slash === -1 ? '' : dir.slice(0, slash);
}

/**
 * Ordered candidate parent paths for a rule.
 *
 * The rule's own directory comes first. A rule that is itself a candidate
 * only considers higher-ranked candidates there, so `index` and `base` in
 * one directory never point at each other. With `searchAncestors`, each
 * enclosing directory up to the root follows.
 */
export function conventionCandidates(
  rulePath: string,
  strategy: CandidateNamingStrategy = DEFAULT_PARENT_CANDIDATES,
  searchAncestors = true
): string[] {
  const { dir, name, ext } = splitRulePath(rulePath);
  const ownRank = strategy.findIndex((candidate) => candidate.toLowerCase() === name.toLowerCase());
  const siblings = ownRank === -1 ? strategy : strategy.slice(0, ownRank);

  const candidates = siblings.map((candidate) => joinRulePath(dir, `${candidate}${ext}`));

  if (searchAncestors) {
    for (let current = parentDirectory(dir); current !== undefined; current = parentDirectory(current)) {
      for (const candidate of strategy) {
        candidates.push(joinRulePath(current, `${candidate}${ext}`));
      }
    }
  }

  return candidates.filter((candidate) => candidate !== rulePath);
}
