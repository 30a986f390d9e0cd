import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../../utils/logger.js';
import { ReleaseTrackSchema } from '../tracks/release-track.js';

/** Configuration read from `.cmdtree.yaml`. */
export const ConfigSchema = z.object({
  /** Directory holding the root command group, relative to the project root. */
  root: z.string().default('commands'),
  /** Name of the root group, used as the first tree path segment. */
  name: z.string().optional(),
  /** Release track loaded when none is given on the command line. */
  release_track: ReleaseTrackSchema.default('GA'),
  /** Extensions of files imported as native command and group modules. */
  module_extensions: z
    .array(z.string().regex(/^\.[a-z0-9.]+$/, 'must start with a dot and be lowercase'))
    .min(1)
    .default(['.js', '.mjs']),
  log_level: z.enum(LOG_LEVEL_NAMES).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
