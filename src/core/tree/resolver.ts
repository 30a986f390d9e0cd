/**
 * Picks the one implementation of an element that serves a release track.
 */
import { LayoutError, ReleaseTrackNotImplementedError, ErrorCodes } from '../../utils/errors.js';
import { sortReleaseTracks, type ReleaseTrack } from '../tracks/release-track.js';
import type { ElementType, ImplementationCandidate } from './types.js';

/**
 * Validate the candidates of one element and return the producer for `expectedTrack`.
 *
 * A lone candidate without declared tracks serves whatever track its parent was
 * loaded for. When there are several, each must declare its tracks and no track may
 * be claimed twice. The producer is returned unevaluated.
 *
 * @param implFile - Source location of the element, for error messages.
 */
export function extractReleaseTrackImplementation(
  implFile: string,
  expectedTrack: ReleaseTrack,
  implementations: readonly ImplementationCandidate[]
): () => ElementType {
  const [single] = implementations;
  if (implementations.length === 1 && single) {
    if (single.releaseTracks.size === 0 || single.releaseTracks.has(expectedTrack)) {
      return single.load;
    }
    throw new ReleaseTrackNotImplementedError(expectedTrack, implFile);
  }

  if (implementations.some(({ releaseTracks }) => releaseTracks.size === 0)) {
    throw new LayoutError(
      ErrorCodes.UNTRACKED_IMPLEMENTATION,
      `Multiple implementations defined for element: [${implFile}]. Each must explicitly declare valid release tracks.`,
      { implFile }
    );
  }

  const claims = new Map<ReleaseTrack, number>();
  for (const { releaseTracks } of implementations) {
    releaseTracks.forEach((track) => claims.set(track, (claims.get(track) ?? 0) + 1));
  }
  const duplicates = sortReleaseTracks([...claims].filter(([, count]) => count > 1).map(([track]) => track));
  if (duplicates.length > 0) {
    throw new LayoutError(
      ErrorCodes.DUPLICATE_TRACK,
      `Multiple definitions for release tracks [${duplicates.join(', ')}] for element: [${implFile}]`,
      { implFile, tracks: duplicates }
    );
  }

  const matching = implementations.filter(({ releaseTracks }) => releaseTracks.has(expectedTrack));
  const [match] = matching;
  if (matching.length !== 1 || !match) {
    throw new ReleaseTrackNotImplementedError(expectedTrack, implFile);
  }
  return match.load;
}
