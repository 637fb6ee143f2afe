import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createBuildCommand } from './commands/build.js';
import { createComposeCommand } from './commands/compose.js';
import { createChainCommand } from './commands/chain.js';
import { createValidateCommand } from './commands/validate.js';
import { createGraphCommand } from './commands/graph.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('rulenest')
    .description('Compose nested rule documents through inheritance')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to config file (default: .rulenest/config.yaml)')
    .option('-r, --rules <dir>', 'Rule directory (overrides rules.root)')
    .option('--verbose', 'Log debug output');
  [createBuildCommand, createComposeCommand, createChainCommand, createValidateCommand, createGraphCommand].forEach(
    (cmd) => program.addCommand(cmd())
  );
  return program;
}
