/**
 * Tests for the human formatter.
 */
import { describe, it, expect } from 'vitest';
import { HumanFormatter } from '../../../../src/cli/formatters/human.js';
import type { ConflictEntry } from '../../../../src/core/composition/types.js';
import type { ValidationReport } from '../../../../src/core/validation/types.js';
import { CompositionEngine } from '../../../../src/core/composition/engine.js';
import { ruleSet } from '../../../helpers/rules.js';

const CYCLE_CONFLICT: ConflictEntry = {
  sectionOrKey: 'inherit',
  parentPath: 'b',
  childPath: 'a',
  kind: 'CIRCULAR_INHERITANCE',
  resolution: 'composition aborted: a → b → a',
  severity: 'error',
};

function invalidReport(): ValidationReport {
  return {
    valid: false,
    errors: ['Circular inheritance: a → b → a'],
    warnings: ['Missing parent rule for c: d'],
    circularDependencies: [['a', 'b', 'a']],
    referenceCycles: [],
    orphanedRules: ['c'],
    statistics: {
      totalRules: 3,
      rulesWithInheritance: 2,
      maxDepth: 0,
      totalConflicts: 2,
      inheritanceTypes: { full: 2, content: 0, metadata: 0, variables: 0, selective: 0 },
    },
    conflicts: { a: [CYCLE_CONFLICT] },
  };
}

describe('HumanFormatter', () => {
  describe('formatReport', () => {
    it('should list errors and warnings', () => {
      const output = new HumanFormatter({ colors: false }).formatReport(invalidReport());

      expect(output).toBe(
        [
          '✗ INVALID',
          '   Rules: 3, with inheritance: 2, max depth: 0, conflicts: 2',
          '   Inheritance types: full: 2',
          '',
          '   ERRORS (1):',
          '      Circular inheritance: a → b → a',
          '',
          '   WARNINGS (1):',
          '      Missing parent rule for c: d',
        ].join('\n')
      );
    });

    it('should list conflicts per rule when verbose', () => {
      const output = new HumanFormatter({ colors: false, verbose: true }).formatReport(invalidReport());

      expect(output.split('\n').slice(-3)).toEqual([
        '   CONFLICTS:',
        '      a',
        '        CIRCULAR_INHERITANCE inherit (b → a): composition aborted: a → b → a',
      ]);
    });
  });

  describe('formatSummary', () => {
    it('should show counts and roots', () => {
      const output = new HumanFormatter({ colors: false }).formatSummary(
        {
          totalRules: 2,
          ruleTypes: { agent: 0, context: 1, workflow: 0, general: 1 },
          formats: { markdown: 2, json: 0, yaml: 0, text: 0 },
          roots: [],
          rulesWithInheritance: 2,
          rulesWithWarnings: [],
        },
        '/rules'
      );

      expect(output.split('\n')).toEqual([
        'Rule hierarchy: /rules',
        '─'.repeat(50),
        'Rules: 2 (context: 1, general: 1)',
        'With inheritance: 2',
        'Roots: (none)',
      ]);
    });
  });

  describe('formatChain', () => {
    it('should indent each ancestor level', () => {
      const output = new HumanFormatter({ colors: false }).formatChain('leaf', ['root', 'mid', 'leaf']);
      expect(output).toBe('root\n  └─ mid\n    └─ leaf');
    });

    it('should flag a truncated cycle', () => {
      const output = new HumanFormatter({ colors: false }).formatChain('a', ['a', 'b', 'a']);
      expect(output.split('\n').pop()).toBe('⚠ circular inheritance while resolving a');
    });
  });

  describe('formatDiagnostics', () => {
    it('should list conflicts, then warnings', () => {
      const result = new CompositionEngine().compose(
        'child.md',
        ruleSet({
          'base.md': '# Intro\n\nX',
          'child.md': '---\ninherit: base.md\ninherit_mode: odd\n---\n# Intro\n\nY',
        })
      );

      expect(new HumanFormatter({ colors: false }).formatDiagnostics(result)).toBe(
        [
          'SECTION_OVERRIDE intro (base.md → child.md): child override applied',
          "⚠ child.md: unknown inherit_mode 'odd', using inferred type",
        ].join('\n')
      );
    });

    it('should return an empty string for a clean result', () => {
      const result = new CompositionEngine().compose('base.md', ruleSet({ 'base.md': 'x' }));
      expect(new HumanFormatter({ colors: false }).formatDiagnostics(result)).toBe('');
    });
  });
});
