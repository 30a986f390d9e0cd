import { Command } from 'commander';
import * as path from 'node:path';
import { CommonYamlLoader } from '../../core/tree/common-yaml.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the render command.
 */
export function createRenderCommand(): Command {
  return new Command('render')
    .description('Print a command spec file with its common data includes and merges applied')
    .argument('<file>', 'Command spec file (.yaml)')
    .option('--json', 'Output as JSON')
    .action((file: string, options: RenderOptions) => {
      try {
        runRender(file, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface RenderOptions {
  json?: boolean;
}

function runRender(file: string, options: RenderOptions): void {
  const data = new CommonYamlLoader().load(path.resolve(process.cwd(), file));

  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  process.stdout.write(stringifyYaml(data));
}
