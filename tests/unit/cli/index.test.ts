/**
 * Tests for the CLI program definition.
 */
import { describe, it, expect } from 'vitest';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should register every command', () => {
    const program = createCli();

    expect(program.name()).toBe('rulenest');
    expect(program.commands.map((command) => command.name())).toEqual([
      'build',
      'compose',
      'chain',
      'validate',
      'graph',
    ]);
  });

  it('should report the package version', () => {
    expect(createCli().version()).toBe('0.1.0');
  });

  it('should define the global options', () => {
    const flags = createCli().options.map((option) => option.long);
    expect(flags).toEqual(['--version', '--config', '--rules', '--verbose']);
  });
});
