/**
 * Tests for the compose command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { logger } from '../../../../src/utils/logger.js';
import { md } from '../../../helpers/rules.js';
import { runCli, writeRules } from '../../../helpers/cli.js';

vi.mock('chalk', () => {
  const plain = (text: string): string => text;
  return {
    default: { red: plain, green: plain, yellow: plain, cyan: plain, dim: plain, bold: plain, gray: plain, blue: plain },
  };
});

describe('compose command', () => {
  let rulesDir: string;

  beforeEach(async () => {
    rulesDir = join(tmpdir(), `rulenest-compose-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(rulesDir, { recursive: true });
    await writeRules(rulesDir, {
      'index.md': '# Intro\n\nRoot intro',
      'agents/review.md': md({ owner: 'qa' }, '# Intro\n\nReview intro\n\n# Checklist\n\nCheck tests'),
    });
  });

  afterEach(async () => {
    logger.setLevel('info');
    await rm(rulesDir, { recursive: true, force: true });
  });

  it('should print the composed rule as markdown', async () => {
    const run = await runCli(['-r', rulesDir, 'compose', 'agents/review.md']);

    expect(run.exitCode).toBe(0);
    expect(run.stdout).toBe('---\nowner: qa\n---\n\n# Intro\n\nReview intro\n\n# Checklist\n\nCheck tests\n');
  });

  it('should report conflicts on stderr', async () => {
    const run = await runCli(['-r', rulesDir, 'compose', 'agents/review.md']);

    expect(run.stderr).toContain('[WARN] Composition of agents/review.md reported issues:');
    expect(run.stderr).toContain(
      "TYPE_MISMATCH type (index.md → agents/review.md): child type 'agent' kept over 'general'"
    );
    expect(run.stderr).toContain('SECTION_OVERRIDE intro (index.md → agents/review.md): child override applied');
  });

  it('should print JSON', async () => {
    const run = await runCli(['-r', rulesDir, 'compose', 'agents/review.md', '--format', 'json']);
    const output = JSON.parse(run.stdout);

    expect(output.chain).toEqual(['index.md', 'agents/review.md']);
    expect(output.sections).toEqual({ intro: 'Review intro', checklist: 'Check tests' });
  });

  it('should fail for an unknown rule', async () => {
    const run = await runCli(['-r', rulesDir, 'compose', 'ghost.md']);

    expect(run.exitCode).toBe(1);
    expect(run.stdout).toBe('');
    expect(run.stderr).toContain('UNKNOWN_RULE ghost.md (ghost.md): composition aborted: rule not found');
  });

  it('should reject an unknown format', async () => {
    const run = await runCli(['-r', rulesDir, 'compose', 'index.md', '--format', 'html']);

    expect(run.exitCode).toBe(1);
    expect(run.stderr).toBe('[ERROR] Invalid format: html. Use: markdown, json, yaml');
  });
});
