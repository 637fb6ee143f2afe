/**
 * Shared setup for CLI commands: config, logging, rule loading.
 */
import * as path from 'node:path';
import type { Command } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { RuleOrchestrator } from '../core/orchestrator.js';
import { DirectoryRuleSource } from '../core/rules/source.js';
import type { RuleSet } from '../core/rules/types.js';
import { RuleNestError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Options defined on the root program. */
export interface GlobalOptions {
  config?: string;
  rules?: string;
  verbose?: boolean;
}

export interface CliSession {
  config: Config;
  orchestrator: RuleOrchestrator;
  rules: RuleSet;
  /** Absolute rule directory */
  rulesRoot: string;
}

export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return {
    config: typeof opts.config === 'string' ? opts.config : undefined,
    rules: typeof opts.rules === 'string' ? opts.rules : undefined,
    verbose: opts.verbose === true,
  };
}

/**
 * Load config and rules for one command run.
 */
export async function openSession(options: GlobalOptions, projectRoot = process.cwd()): Promise<CliSession> {
  const config = await loadConfig(projectRoot, options.config);
  logger.setLevel(options.verbose ? 'debug' : config.logging.level);

  const rulesRoot = path.resolve(projectRoot, options.rules ?? config.rules.root);
  const source = new DirectoryRuleSource(rulesRoot, {
    include: config.rules.include,
    exclude: config.rules.exclude,
  });

  const orchestrator = RuleOrchestrator.fromConfig(config);
  const rules = await orchestrator.loadFromSource(source);
  logger.debug(`Loaded ${rules.size} rule(s) from ${rulesRoot}`);

  return { config, orchestrator, rules, rulesRoot };
}

/**
 * Report a command failure and set a failing exit code.
 */
export function failCommand(error: unknown): void {
  logger.error(error instanceof Error ? error.message : 'Unknown error');
  if (error instanceof RuleNestError) {
    logger.debug('Error details', error.toJSON());
  }
  process.exitCode = 1;
}
