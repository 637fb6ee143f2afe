/**
 * Tests for building rule sets and reading rule sources.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadHierarchy, replaceRule } from '../../../../src/core/rules/loader.js';
import { DirectoryRuleSource, InMemoryRuleSource } from '../../../../src/core/rules/source.js';
import { SystemError } from '../../../../src/utils/errors.js';

describe('loadHierarchy', () => {
  it('should parse a record of documents', () => {
    const rules = loadHierarchy({ 'a.md': '# A\nx', 'b.json': '{"sections": {"b": "y"}}' });

    expect([...rules.keys()]).toEqual(['a.md', 'b.json']);
    expect(rules.get('a.md')?.sections.get('a')).toBe('x');
    expect(rules.get('b.json')?.sections.get('b')).toBe('y');
  });

  it('should accept a Map', () => {
    const rules = loadHierarchy(new Map([['r.md', 'body']]));
    expect(rules.get('r.md')?.sections.get('content')).toBe('body');
  });

  it('should keep going past malformed documents', () => {
    const rules = loadHierarchy({ 'bad.json': '{', 'good.md': 'ok' });

    expect(rules.size).toBe(2);
    expect(rules.get('bad.json')?.parseWarnings).toHaveLength(1);
    expect(rules.get('good.md')?.parseWarnings).toEqual([]);
  });
});

describe('replaceRule', () => {
  it('should return a new set and leave the input untouched', () => {
    const before = loadHierarchy({ 'a.md': 'old', 'b.md': 'b' });
    const after = replaceRule(before, 'a.md', 'new');

    expect(after).not.toBe(before);
    expect(before.get('a.md')?.sections.get('content')).toBe('old');
    expect(after.get('a.md')?.sections.get('content')).toBe('new');
    expect(after.get('b.md')).toBe(before.get('b.md'));
  });
});

describe('DirectoryRuleSource', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `rulenest-source-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(testDir, 'agents'), { recursive: true });
    await mkdir(join(testDir, 'node_modules', 'pkg'), { recursive: true });
    await writeFile(join(testDir, 'index.mdc'), '# Root\nroot');
    await writeFile(join(testDir, 'agents', 'review.mdc'), '# Review\nreview');
    await writeFile(join(testDir, 'image.png'), 'binary');
    await writeFile(join(testDir, 'node_modules', 'pkg', 'readme.md'), 'ignored');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should read rule files keyed by relative path', async () => {
    const documents = await new DirectoryRuleSource(testDir).load();

    expect([...documents.keys()]).toEqual(['agents/review.mdc', 'index.mdc']);
    expect(documents.get('index.mdc')).toBe('# Root\nroot');
  });

  it('should apply custom include patterns', async () => {
    const documents = await new DirectoryRuleSource(testDir, { include: ['agents/**/*.mdc'] }).load();
    expect([...documents.keys()]).toEqual(['agents/review.mdc']);
  });

  it('should fail with a SystemError when the directory is missing', async () => {
    await expect(new DirectoryRuleSource(join(testDir, 'nope')).load()).rejects.toBeInstanceOf(SystemError);
  });
});

describe('InMemoryRuleSource', () => {
  it('should return a copy of its documents', async () => {
    const source = new InMemoryRuleSource({ 'a.md': 'x' });
    const first = await source.load();
    first.set('b.md', 'y');

    expect([...(await source.load()).keys()]).toEqual(['a.md']);
    expect(source.describe()).toBe('memory (1 document(s))');
  });
});
