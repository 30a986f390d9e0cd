/**
 * Release tracks: the channels (stable, beta, alpha) a command or group can be
 * implemented for.
 */
import { z } from 'zod';
import { LayoutError, ErrorCodes } from '../../utils/errors.js';

export const ReleaseTrackSchema = z.enum(['GA', 'BETA', 'ALPHA']);

export type ReleaseTrack = z.infer<typeof ReleaseTrackSchema>;

export interface ReleaseTrackInfo {
  id: ReleaseTrack;
  /** Command-line prefix selecting the track, null for the stable channel. */
  prefix: string | null;
  /** Tag prepended to help text of elements on this track. */
  helpTag: string | null;
  description: string;
}

export const RELEASE_TRACKS: Record<ReleaseTrack, ReleaseTrackInfo> = {
  GA: {
    id: 'GA',
    prefix: null,
    helpTag: null,
    description: 'Generally available, stable commands.',
  },
  BETA: {
    id: 'BETA',
    prefix: 'beta',
    helpTag: '(BETA) ',
    description: 'Beta commands, feature complete but may still change.',
  },
  ALPHA: {
    id: 'ALPHA',
    prefix: 'alpha',
    helpTag: '(ALPHA) ',
    description: 'Alpha commands, may change without notice.',
  },
};

export const ALL_RELEASE_TRACKS: readonly ReleaseTrack[] = ReleaseTrackSchema.options;

/**
 * Look up a release track by its id.
 */
export function releaseTrackFromId(id: string): ReleaseTrack {
  const result = ReleaseTrackSchema.safeParse(id);
  if (!result.success) {
    throw new LayoutError(
      ErrorCodes.UNKNOWN_RELEASE_TRACK,
      `Unknown release track [${id}]. Valid tracks: ${ALL_RELEASE_TRACKS.join(', ')}`,
      { id }
    );
  }
  return result.data;
}

/**
 * Look up a release track by its command-line prefix.
 */
export function releaseTrackFromPrefix(prefix: string | null): ReleaseTrack | undefined {
  return ALL_RELEASE_TRACKS.find((track) => RELEASE_TRACKS[track].prefix === prefix);
}

/**
 * Order a set of tracks the way they are declared, for stable messages.
 */
export function sortReleaseTracks(tracks: Iterable<ReleaseTrack>): ReleaseTrack[] {
  const wanted = new Set(tracks);
  return ALL_RELEASE_TRACKS.filter((track) => wanted.has(track));
}
