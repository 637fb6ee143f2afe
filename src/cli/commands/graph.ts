import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { failCommand, globalOptions, openSession } from '../session.js';
import { logger as log } from '../../utils/logger.js';

const GraphFormatSchema = z.enum(['mermaid', 'graphviz', 'json']);

interface GraphOptions {
  format: string;
  references: boolean;
  root?: string;
  maxDepth?: string;
}

/**
 * Create the graph command.
 */
export function createGraphCommand(): Command {
  return new Command('graph')
    .description('Visualize the rule hierarchy')
    .option('-f, --format <format>', 'Output format (mermaid, graphviz, json)', 'mermaid')
    .option('--no-references', 'Hide body references between rules')
    .option('--root <rule>', 'Filter to a rule and its descendants')
    .option('--max-depth <n>', 'Maximum depth below --root')
    .action(async (options: GraphOptions, command: Command) => {
      try {
        const format = GraphFormatSchema.safeParse(options.format);
        if (!format.success) {
          throw new Error(`Invalid format: ${options.format}. Use: ${GraphFormatSchema.options.join(', ')}`);
        }

        const session = await openSession(globalOptions(command));
        const graph = session.orchestrator.buildGraph(session.rules, {
          showReferences: options.references,
          root: options.root,
          maxDepth: options.maxDepth ? parseInt(options.maxDepth, 10) : undefined,
        });

        if (graph.nodes.length === 0) {
          log.warn('No rules found');
          return;
        }

        console.log(session.orchestrator.formatGraph(graph, format.data));
        if (format.data === 'json') {
          return;
        }

        const ruleCount = graph.nodes.filter((node) => node.type === 'rule').length;
        console.error(chalk.dim(`Rules: ${ruleCount}, Edges: ${graph.edges.length}`));
      } catch (error) {
        failCommand(error);
      }
    });
}
