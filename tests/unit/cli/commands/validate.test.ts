/**
 * Tests for the validate command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { md } from '../../../helpers/rules.js';
import { runCli, writeRules } from '../../../helpers/cli.js';

vi.mock('chalk', () => {
  const plain = (text: string): string => text;
  return {
    default: { red: plain, green: plain, yellow: plain, cyan: plain, dim: plain, bold: plain, gray: plain, blue: plain },
  };
});

describe('validate command', () => {
  let rulesDir: string;

  beforeEach(async () => {
    rulesDir = join(tmpdir(), `rulenest-validate-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(rulesDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(rulesDir, { recursive: true, force: true });
  });

  it('should report a valid hierarchy with its warnings', async () => {
    await writeRules(rulesDir, {
      'index.md': '# Intro\n\nRoot intro',
      'agents/review.md': '# Intro\n\nReview intro',
    });

    const run = await runCli(['-r', rulesDir, 'validate']);

    expect(run.exitCode).toBe(0);
    expect(run.stdout).toBe(
      [
        '✓ VALID',
        '   Rules: 2, with inheritance: 1, max depth: 2, conflicts: 2',
        '   Inheritance types: full: 1',
        '',
        '   WARNINGS (1):',
        '      Inheritance conflicts in agents/review.md: 2',
      ].join('\n')
    );
  });

  it('should fail on circular inheritance', async () => {
    await writeRules(rulesDir, {
      'a.md': md({ inherit: 'b.md' }, 'a'),
      'b.md': md({ inherit: 'a.md' }, 'b'),
    });

    const run = await runCli(['-r', rulesDir, 'validate', '--json']);
    const report = JSON.parse(run.stdout);

    expect(run.exitCode).toBe(1);
    expect(report.valid).toBe(false);
    expect(report.circularDependencies).toEqual([['a.md', 'b.md', 'a.md']]);
  });

  it('should fail when the rule directory is missing', async () => {
    const run = await runCli(['-r', join(rulesDir, 'missing'), 'validate']);

    expect(run.exitCode).toBe(1);
    expect(run.stderr).toBe(`[ERROR] Rules directory not found: ${join(rulesDir, 'missing')}`);
  });
});
