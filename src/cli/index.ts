import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { logger } from '../utils/logger.js';
import { createDiscoverCommand } from './commands/discover.js';
import { createRenderCommand } from './commands/render.js';
import { createResolveCommand } from './commands/resolve.js';
import { createTreeCommand } from './commands/tree.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Version from the nearest package.json above this file (src/ or dist/src/).
 */
function readVersion(): string {
  let dir = __dirname;
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
  const pkg: unknown = JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('cmdtree')
    .description('Discover and load a filesystem command tree per release track')
    .version(readVersion())
    .option('-v, --verbose', 'Log loader activity')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        logger.setLevel('debug');
      }
    });
  [createDiscoverCommand, createResolveCommand, createRenderCommand, createTreeCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
