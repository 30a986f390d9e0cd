/**
 * Shared setup for commands that load the command tree.
 */
import { loadConfig, getCommandsRoot, getRootName } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { releaseTrackFromId, type ReleaseTrack } from '../../core/tracks/release-track.js';
import { CommandTreeLoader } from '../../core/tree/loader.js';
import { SpecCommandTranslator } from '../../core/translate/spec-translator.js';
import { logger } from '../../utils/logger.js';

export interface SessionOptions {
  config: string;
  track?: string;
  root?: string;
}

export interface CommandTreeSession {
  config: Config;
  loader: CommandTreeLoader;
  rootDir: string;
  rootName: string;
  track: ReleaseTrack;
}

/**
 * Load config and open a loading session with the default spec translator.
 */
export async function openSession(options: SessionOptions): Promise<CommandTreeSession> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  if (logger.getLevel() !== 'debug') {
    logger.setLevel(config.log_level);
  }

  const loader = new CommandTreeLoader({
    translator: new SpecCommandTranslator(),
    moduleExtensions: config.module_extensions,
  });

  return {
    config,
    loader,
    rootDir: getCommandsRoot(projectRoot, options.root ? { ...config, root: options.root } : config),
    rootName: getRootName(projectRoot, config),
    track: options.track ? releaseTrackFromId(options.track.toUpperCase()) : config.release_track,
  };
}
