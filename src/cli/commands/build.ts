import { Command } from 'commander';
import { createFormatter } from '../formatters/index.js';
import { failCommand, globalOptions, openSession } from '../session.js';

interface BuildOptions {
  json?: boolean;
}

/**
 * Create the build command.
 */
export function createBuildCommand(): Command {
  return new Command('build')
    .description('Load the rule directory and summarize the hierarchy')
    .option('--json', 'Output as JSON')
    .action(async (options: BuildOptions, command: Command) => {
      try {
        const session = await openSession(globalOptions(command));
        const summary = session.orchestrator.summarize(session.rules);
        const formatter = createFormatter(options.json ? 'json' : 'human');
        console.log(formatter.formatSummary(summary, session.rulesRoot));
      } catch (error) {
        failCommand(error);
      }
    });
}
