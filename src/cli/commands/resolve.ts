import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { findElement } from '../../core/tree/walker.js';
import { sortReleaseTracks } from '../../core/tracks/release-track.js';
import { logger as log } from '../../utils/logger.js';
import { formatTracks } from '../formatters/tree.js';
import { openSession } from './session-helpers.js';

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  return new Command('resolve')
    .description('Load one command or group and show which implementation serves a release track')
    .argument('[path...]', 'Names below the root, e.g. "compute instances create"')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('-r, --root <dir>', 'Root group directory (overrides config)')
    .option('-t, --track <id>', 'Release track to resolve (GA, BETA, ALPHA)')
    .option('--json', 'Output as JSON')
    .action(async (segments: string[], options: ResolveOptions) => {
      try {
        await runResolve(segments, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface ResolveOptions {
  config: string;
  root?: string;
  track?: string;
  json?: boolean;
}

async function runResolve(segments: string[], options: ResolveOptions): Promise<void> {
  const session = await openSession(options);
  const resolved = await findElement(session.loader, session.rootDir, session.rootName, segments, session.track);

  if (options.json) {
    console.log(JSON.stringify({
      path: resolved.path.join('.'),
      kind: resolved.kind,
      track: session.track,
      implementation: resolved.element.name,
      releaseTracks: sortReleaseTracks(resolved.element.validReleaseTracks()),
      locations: resolved.locations,
    }, null, 2));
    return;
  }

  console.log(chalk.bold.cyan(`${resolved.kind.toUpperCase()}: ${resolved.path.join(' ')}`));
  console.log(`  ${chalk.dim('Track:')} ${session.track}`);
  console.log(`  ${chalk.dim('Implementation:')} ${resolved.element.name}`);
  console.log(`  ${chalk.dim('Valid for:')} ${formatTracks(resolved.element)}`);
  console.log(`  ${chalk.dim('Sources:')}`);
  for (const location of resolved.locations) {
    console.log(`    • ${location}`);
  }
}
