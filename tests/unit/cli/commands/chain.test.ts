/**
 * Tests for the chain command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { md } from '../../../helpers/rules.js';
import { runCli, writeRules } from '../../../helpers/cli.js';
import { logger } from '../../../../src/utils/logger.js';

vi.mock('chalk', () => {
  const plain = (text: string): string => text;
  return {
    default: { red: plain, green: plain, yellow: plain, cyan: plain, dim: plain, bold: plain, gray: plain, blue: plain },
  };
});

describe('chain command', () => {
  let rulesDir: string;

  beforeEach(async () => {
    rulesDir = join(tmpdir(), `rulenest-chain-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(rulesDir, { recursive: true });
    await writeRules(rulesDir, {
      'index.md': 'Root',
      'agents/base.md': 'Agent defaults',
      'agents/review.md': md({ inherit: './base' }, 'Review'),
    });
  });

  afterEach(async () => {
    logger.setLevel('info');
    await rm(rulesDir, { recursive: true, force: true });
  });

  it('should print the chain root first', async () => {
    const run = await runCli(['-r', rulesDir, 'chain', 'agents/review.md']);

    expect(run.exitCode).toBe(0);
    expect(run.stdout).toBe('index.md\n  └─ agents/base.md\n    └─ agents/review.md');
  });

  it('should print JSON', async () => {
    const run = await runCli(['-r', rulesDir, 'chain', 'agents/base.md', '--json']);

    expect(JSON.parse(run.stdout)).toEqual({ rule: 'agents/base.md', chain: ['index.md', 'agents/base.md'] });
  });

  it('should fail for an unknown rule', async () => {
    const run = await runCli(['-r', rulesDir, 'chain', 'nope.md']);

    expect(run.exitCode).toBe(1);
    expect(run.stderr).toBe('[ERROR] Unknown rule: nope.md');
  });

  it('should report the hierarchy error code when verbose', async () => {
    const run = await runCli(['-r', rulesDir, '--verbose', 'chain', 'nope.md']);
    const lines = run.stderr.split('\n');

    expect(run.exitCode).toBe(1);
    expect(lines).toContain('[ERROR] Unknown rule: nope.md');
    expect(lines).toContain('[DEBUG] Error details');
    expect(lines).toContain('  "name": "HierarchyError",');
    expect(lines).toContain('  "code": "H001",');
    expect(lines).toContain('    "rulePath": "nope.md"');
  });
});
