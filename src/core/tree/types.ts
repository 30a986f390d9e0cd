/**
 * Shared types for discovering and loading the command tree.
 */
import type { ReleaseTrack } from '../tracks/release-track.js';

/**
 * Position of a node from the root of the command hierarchy, one name per level.
 */
export type TreePath = readonly string[];

export type ElementKind = 'command' | 'group';

/**
 * A loadable command or group implementation.
 *
 * Classes extending CommandBase or GroupBase satisfy this through their statics;
 * translators may return any object with the same shape.
 */
export interface ElementType {
  readonly kind: ElementKind;
  readonly name: string;
  /** Tracks this implementation is valid for; empty means whatever track the parent is on. */
  validReleaseTracks(): ReadonlySet<ReleaseTrack>;
}

/**
 * Logical element name mapped to every source location claiming to implement it.
 */
export type CandidateSet = Map<string, string[]>;

export interface SubElements {
  groups: CandidateSet;
  commands: CandidateSet;
}

/**
 * One competing implementation of an element.
 */
export interface ImplementationCandidate {
  /** Builds the implementation; only invoked for the candidate that wins resolution. */
  load: () => ElementType;
  releaseTracks: ReadonlySet<ReleaseTrack>;
}

/**
 * Exports of an imported module.
 */
export type ModuleNamespace = Readonly<Record<string, unknown>>;

/**
 * Imports the module at `file`. `moduleId` is unique per loading session and tree path.
 */
export type ModuleImporter = (file: string, moduleId: string) => Promise<ModuleNamespace>;

/**
 * One entry of a command spec document after include/merge resolution.
 */
export type SpecEntry = Record<string, unknown>;

/**
 * Turns a declarative command spec entry into a command implementation.
 */
export interface CommandTranslator {
  translate(path: TreePath, commandData: SpecEntry): ElementType;
}

/**
 * Render a tree path for messages.
 */
export function joinTreePath(path: TreePath): string {
  return path.join('.');
}
