/**
 * One fold step of composition: merge a child rule into the state composed
 * from its ancestors, according to the link's inheritance type.
 *
 * | type      | sections                    | metadata                 |
 * |-----------|-----------------------------|--------------------------|
 * | full      | parent + child overrides    | parent + child overrides |
 * | content   | parent + child overrides    | child only               |
 * | metadata  | child only                  | parent + child overrides |
 * | variables | child only                  | parent variables + child |
 * | selective | listed parent sections + child | child only            |
 *
 * Overwriting a different value records a conflict unless the child lists
 * the name under `override`. Control keys are never inherited.
 */
import {
  CONTROL_KEYS,
  MetadataKeys,
  isStringList,
  type MetadataValue,
  type ParsedRule,
} from '../rules/types.js';
import type { InheritanceType } from '../inheritance/types.js';
import type { ConflictEntry } from './types.js';

export interface ComposedState {
  sections: Map<string, string>;
  metadata: Map<string, MetadataValue>;
  variableKeys: Set<string>;
}

export interface MergeStep {
  parentPath: string;
  child: ParsedRule;
  inheritanceType: InheritanceType;
  /** Sections a selective child pulls from the parent */
  selectedSections: readonly string[];
}

export interface MergeOutcome {
  state: ComposedState;
  conflicts: ConflictEntry[];
  warnings: string[];
}

/**
 * Starting state: the root rule on its own.
 */
export function initialState(root: ParsedRule): ComposedState {
  return {
    sections: new Map(root.sections),
    metadata: new Map(root.metadata),
    variableKeys: new Set(root.variableKeys),
  };
}

/**
 * Merge one child into the accumulated parent state. The input state is not
 * modified.
 */
export function mergeStep(parent: ComposedState, step: MergeStep): MergeOutcome {
  const { child, inheritanceType, parentPath } = step;
  const intentional = intentionalOverrides(child);
  const conflicts: ConflictEntry[] = [];
  const warnings: string[] = [];

  // Sections
  let sections: Map<string, string>;
  switch (inheritanceType) {
    case 'full':
    case 'content':
      sections = new Map(parent.sections);
      break;
    case 'selective':
      sections = new Map();
      for (const name of step.selectedSections) {
        const text = parent.sections.get(name);
        if (text === undefined) {
          warnings.push(`${child.path}: section '${name}' requested from '${parentPath}' does not exist`);
        } else {
          sections.set(name, text);
        }
      }
      break;
    case 'metadata':
    case 'variables':
      sections = new Map();
      break;
  }

  for (const [name, text] of child.sections) {
    const inherited = sections.get(name);
    if (inherited !== undefined && inherited !== text && !intentional.has(name)) {
      conflicts.push({
        sectionOrKey: name,
        parentPath,
        childPath: child.path,
        kind: 'SECTION_OVERRIDE',
        resolution: 'child override applied',
        severity: 'warning',
      });
    }
    sections.set(name, text);
  }

  // Metadata
  const metadata = new Map<string, MetadataValue>();
  const variableKeys = new Set<string>();
  const inheritsMetadata = inheritanceType === 'full' || inheritanceType === 'metadata';

  if (inheritsMetadata || inheritanceType === 'variables') {
    for (const [key, value] of parent.metadata) {
      if (CONTROL_KEYS.has(key)) continue;
      const isVariable = parent.variableKeys.has(key);
      if (!inheritsMetadata && !isVariable) continue;
      metadata.set(key, value);
      if (isVariable) variableKeys.add(key);
    }
  }

  for (const [key, value] of child.metadata) {
    const inherited = metadata.get(key);
    if (
      inherited !== undefined &&
      !metadataEquals(inherited, value) &&
      !CONTROL_KEYS.has(key) &&
      !intentional.has(key)
    ) {
      conflicts.push({
        sectionOrKey: key,
        parentPath,
        childPath: child.path,
        kind: 'VARIABLE_CONFLICT',
        resolution: 'child value applied',
        severity: 'warning',
      });
    }
    metadata.set(key, value);
  }
  for (const key of child.variableKeys) {
    variableKeys.add(key);
  }

  return { state: { sections, metadata, variableKeys }, conflicts, warnings };
}

export function metadataEquals(a: MetadataValue, b: MetadataValue): boolean {
  if (isStringList(a) || isStringList(b)) {
    return isStringList(a) && isStringList(b) && a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

/**
 * Names the child declares as deliberate overrides (`override` metadata).
 */
function intentionalOverrides(child: ParsedRule): Set<string> {
  const declared = child.metadata.get(MetadataKeys.OVERRIDE);
  if (isStringList(declared)) return new Set(declared);
  if (typeof declared === 'string') {
    return new Set(declared.split(',').map((name) => name.trim()).filter((name) => name !== ''));
  }
  return new Set();
}
