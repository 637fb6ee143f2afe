/**
 * Tests for the JSON formatter.
 */
import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../../../src/cli/formatters/json.js';
import { createFormatter, HumanFormatter } from '../../../../src/cli/formatters/index.js';
import { CompositionEngine } from '../../../../src/core/composition/engine.js';
import { ruleSet } from '../../../helpers/rules.js';

describe('JsonFormatter', () => {
  const formatter = new JsonFormatter();

  it('should format a chain', () => {
    expect(JSON.parse(formatter.formatChain('leaf', ['root', 'leaf']))).toEqual({
      rule: 'leaf',
      chain: ['root', 'leaf'],
    });
  });

  it('should format a summary with its root', () => {
    const output = JSON.parse(
      formatter.formatSummary(
        {
          totalRules: 1,
          ruleTypes: { agent: 0, context: 0, workflow: 0, general: 1 },
          formats: { markdown: 1, json: 0, yaml: 0, text: 0 },
          roots: ['a.md'],
          rulesWithInheritance: 0,
          rulesWithWarnings: [],
        },
        '/rules'
      )
    );

    expect(output.root).toBe('/rules');
    expect(output.roots).toEqual(['a.md']);
  });

  it('should format diagnostics only', () => {
    const result = new CompositionEngine().compose('ghost.md', ruleSet({}));
    const output = JSON.parse(formatter.formatDiagnostics(result));

    expect(Object.keys(output)).toEqual(['conflicts', 'warnings']);
    expect(output.conflicts[0].kind).toBe('UNKNOWN_RULE');
  });
});

describe('createFormatter', () => {
  it('should pick the formatter by output format', () => {
    expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
    expect(createFormatter('human')).toBeInstanceOf(HumanFormatter);
  });
});
