/**
 * Tests for reference dependency resolution.
 */
import { describe, it, expect } from 'vitest';
import { findReferenceCycles, resolveDependencies } from '../../../../src/core/rules/dependencies.js';
import { ruleSet } from '../../../helpers/rules.js';

describe('resolveDependencies', () => {
  it('should list dependencies before the rules that reference them', () => {
    const rules = ruleSet({
      'guide.md': 'See [style](mdc:style.md) and @import "tone.md"',
      'style.md': 'Uses [tone](mdc:tone.md)',
      'tone.md': 'Tone',
    });

    expect(resolveDependencies('guide.md', rules)).toEqual({
      rulePath: 'guide.md',
      order: ['tone.md', 'style.md', 'guide.md'],
      cycles: [],
      missing: [],
    });
  });

  it('should report an A -> B -> A reference cycle without throwing', () => {
    const rules = ruleSet({
      'a.md': 'See [b](mdc:b.md)',
      'b.md': 'See [a](mdc:a.md)',
    });

    const resolution = resolveDependencies('a.md', rules);

    expect(resolution.order).toEqual(['b.md', 'a.md']);
    expect(resolution.cycles).toEqual([['a.md', 'b.md', 'a.md']]);
  });

  it('should collect missing targets and ignore self references', () => {
    const rules = ruleSet({
      'x.md': 'See [gone](mdc:gone.md), [self](mdc:x.md) and @import "gone.md"',
    });

    expect(resolveDependencies('x.md', rules)).toEqual({
      rulePath: 'x.md',
      order: ['x.md'],
      cycles: [],
      missing: ['gone.md'],
    });
  });

  it('should list an unknown rule as missing', () => {
    expect(resolveDependencies('nope.md', ruleSet({ 'a.md': 'a' }))).toEqual({
      rulePath: 'nope.md',
      order: [],
      cycles: [],
      missing: ['nope.md'],
    });
  });
});

describe('findReferenceCycles', () => {
  it('should report each cycle once', () => {
    const rules = ruleSet({
      'a.md': 'See [b](mdc:b.md)',
      'b.md': 'See [a](mdc:a.md)',
      'c.md': 'See [d](mdc:d.md)',
      'd.md': 'See [e](mdc:e.md)',
      'e.md': 'See [c](mdc:c.md) and [a](mdc:a.md)',
      'f.md': 'See [a](mdc:a.md)',
    });

    expect(findReferenceCycles(rules)).toEqual([
      ['a.md', 'b.md', 'a.md'],
      ['c.md', 'd.md', 'e.md', 'c.md'],
    ]);
  });

  it('should find nothing when references form a tree', () => {
    const rules = ruleSet({
      'a.md': 'See [b](mdc:b.md) and [c](mdc:c.md)',
      'b.md': 'See [c](mdc:c.md)',
      'c.md': 'c',
    });

    expect(findReferenceCycles(rules)).toEqual([]);
  });
});
