import { Command } from 'commander';
import { createFormatter } from '../formatters/index.js';
import { failCommand, globalOptions, openSession } from '../session.js';
import { ErrorCodes, HierarchyError } from '../../utils/errors.js';

interface ChainOptions {
  json?: boolean;
}

/**
 * Create the chain command.
 */
export function createChainCommand(): Command {
  return new Command('chain')
    .description('Print the inheritance chain of a rule, root first')
    .argument('<rule>', 'Rule path relative to the rule directory')
    .option('--json', 'Output as JSON')
    .action(async (rulePath: string, options: ChainOptions, command: Command) => {
      try {
        const session = await openSession(globalOptions(command));
        if (!session.rules.has(rulePath)) {
          throw new HierarchyError(ErrorCodes.UNKNOWN_RULE, `Unknown rule: ${rulePath}`, { rulePath });
        }
        const chain = session.orchestrator.resolveInheritanceChain(rulePath, session.rules);
        console.log(createFormatter(options.json ? 'json' : 'human').formatChain(rulePath, chain));
      } catch (error) {
        failCommand(error);
      }
    });
}
