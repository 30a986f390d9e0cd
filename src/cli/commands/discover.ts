import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import type { CandidateSet } from '../../core/tree/types.js';
import { logger as log } from '../../utils/logger.js';
import { openSession } from './session-helpers.js';

/**
 * Create the discover command.
 */
export function createDiscoverCommand(): Command {
  return new Command('discover')
    .description('List the subgroups and subcommands found in a group directory')
    .argument('[dir]', 'Group directory (defaults to the configured root)')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--json', 'Output as JSON')
    .action(async (dir: string | undefined, options: DiscoverOptions) => {
      try {
        await runDiscover(dir, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface DiscoverOptions {
  config: string;
  json?: boolean;
}

async function runDiscover(dir: string | undefined, options: DiscoverOptions): Promise<void> {
  const session = await openSession(options);
  const groupDir = dir ? path.resolve(process.cwd(), dir) : session.rootDir;
  const treePath = dir ? [path.basename(groupDir)] : [session.rootName];

  const { groups, commands } = session.loader.findSubElements([groupDir], treePath);

  if (options.json) {
    console.log(JSON.stringify({
      groups: Object.fromEntries(groups),
      commands: Object.fromEntries(commands),
    }, null, 2));
    return;
  }

  console.log(chalk.bold(`${treePath.join('.')} (${groupDir})`));
  printCandidates('Groups', groups, groupDir);
  printCandidates('Commands', commands, groupDir);
}

function printCandidates(title: string, candidates: CandidateSet, groupDir: string): void {
  console.log();
  console.log(chalk.dim(`${title}:`));
  if (candidates.size === 0) {
    console.log(chalk.dim('  (none)'));
    return;
  }
  for (const [name, locations] of candidates) {
    const files = locations.map((location) => path.relative(groupDir, location)).join(', ');
    console.log(`  ${chalk.cyan(name)} ${chalk.dim(files)}`);
  }
}
