import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { buildCommandTree } from '../../core/tree/walker.js';
import { logger as log } from '../../utils/logger.js';
import { countCommands, formatTrackHeader, formatTree, treeToJson } from '../formatters/tree.js';
import { openSession } from './session-helpers.js';

/**
 * Create the tree command.
 */
export function createTreeCommand(): Command {
  return new Command('tree')
    .description('Load the whole command tree for a release track')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('-r, --root <dir>', 'Root group directory (overrides config)')
    .option('-t, --track <id>', 'Release track to load (GA, BETA, ALPHA)')
    .option('--json', 'Output as JSON')
    .action(async (options: TreeOptions) => {
      try {
        await runTree(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface TreeOptions {
  config: string;
  root?: string;
  track?: string;
  json?: boolean;
}

async function runTree(options: TreeOptions): Promise<void> {
  const session = await openSession(options);
  const tree = await buildCommandTree(session.loader, session.rootDir, session.rootName, session.track);

  if (options.json) {
    console.log(JSON.stringify(treeToJson(tree), null, 2));
    return;
  }

  console.log(formatTrackHeader(session.track));
  console.log();
  for (const line of formatTree(tree)) {
    console.log(line);
  }
  console.log();
  console.log(chalk.dim(`${countCommands(tree)} command(s)`));
}
