/**
 * Base classes for native command and group implementations, and the check used
 * to pick implementations out of a module's exports.
 */
import type { ReleaseTrack } from '../tracks/release-track.js';
import type { ElementKind, ElementType } from './types.js';

/**
 * Base class for commands implemented in code.
 *
 * @example
 * export class Create extends CommandBase {
 *   static override releaseTracks = ['BETA', 'ALPHA'] as const;
 * }
 */
export abstract class CommandBase {
  static readonly kind: ElementKind = 'command';
  static releaseTracks: readonly ReleaseTrack[] = [];

  static validReleaseTracks(): ReadonlySet<ReleaseTrack> {
    return new Set(this.releaseTracks);
  }
}

/**
 * Base class for command groups implemented in code.
 */
export abstract class GroupBase {
  static readonly kind: ElementKind = 'group';
  static releaseTracks: readonly ReleaseTrack[] = [];

  static validReleaseTracks(): ReadonlySet<ReleaseTrack> {
    return new Set(this.releaseTracks);
  }
}

/**
 * True for exported classes that carry an element kind and a track accessor.
 * The base classes themselves are excluded so re-exporting them is harmless.
 */
export function isElementType(value: unknown): value is ElementType {
  if (typeof value !== 'function' || value === CommandBase || value === GroupBase) {
    return false;
  }
  if (!('kind' in value) || (value.kind !== 'command' && value.kind !== 'group')) {
    return false;
  }
  return 'validReleaseTracks' in value && typeof value.validReleaseTracks === 'function';
}
