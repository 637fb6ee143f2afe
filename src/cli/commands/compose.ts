import { Command } from 'commander';
import { z } from 'zod';
import { createFormatter } from '../formatters/index.js';
import { failCommand, globalOptions, openSession } from '../session.js';
import { logger as log } from '../../utils/logger.js';

const RenderFormatSchema = z.enum(['markdown', 'json', 'yaml']);

interface ComposeOptions {
  format: string;
}

/**
 * Create the compose command.
 */
export function createComposeCommand(): Command {
  return new Command('compose')
    .description('Print a rule merged with its ancestors')
    .argument('<rule>', 'Rule path relative to the rule directory')
    .option('-f, --format <format>', 'Output format (markdown, json, yaml)', 'markdown')
    .action(async (rulePath: string, options: ComposeOptions, command: Command) => {
      try {
        const format = RenderFormatSchema.safeParse(options.format);
        if (!format.success) {
          throw new Error(`Invalid format: ${options.format}. Use: ${RenderFormatSchema.options.join(', ')}`);
        }

        const session = await openSession(globalOptions(command));
        const result = session.orchestrator.composeRule(rulePath, session.rules);

        // Diagnostics go to stderr so stdout stays the composed document
        const diagnostics = createFormatter('human').formatDiagnostics(result);
        if (diagnostics) {
          log.warn(`Composition of ${rulePath} reported issues:\n${diagnostics}`);
        }

        if (!result.success) {
          process.exitCode = 1;
          return;
        }
        console.log(session.orchestrator.render(result, format.data));
      } catch (error) {
        failCommand(error);
      }
    });
}
