import { Command } from 'commander';
import { createFormatter } from '../formatters/index.js';
import { failCommand, globalOptions, openSession } from '../session.js';

interface ValidateOptions {
  json?: boolean;
}

/**
 * Create the validate command. Exits with code 1 when the hierarchy is invalid.
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check the hierarchy for cycles, orphans and conflicts')
    .option('--json', 'Output as JSON')
    .action(async (options: ValidateOptions, command: Command) => {
      try {
        const global = globalOptions(command);
        const session = await openSession(global);
        const report = session.orchestrator.validateHierarchy(session.rules);
        const formatter = createFormatter(options.json ? 'json' : 'human', { verbose: global.verbose });
        console.log(formatter.formatReport(report));
        if (!report.valid) {
          process.exitCode = 1;
        }
      } catch (error) {
        failCommand(error);
      }
    });
}
