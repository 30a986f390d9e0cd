/**
 * Builds the command tree for one release track by recursing through discovery.
 */
import { LoadFailure, ReleaseTrackNotImplementedError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ReleaseTrack } from '../tracks/release-track.js';
import type { CommandTreeLoader } from './loader.js';
import { joinTreePath, type ElementKind, type ElementType, type TreePath } from './types.js';

const log = logger.child('walker');

export interface CommandTreeNode {
  name: string;
  path: TreePath;
  kind: ElementKind;
  element: ElementType;
  locations: string[];
  /** Always empty for commands. */
  children: CommandTreeNode[];
}

export interface ResolvedElement {
  path: TreePath;
  kind: ElementKind;
  element: ElementType;
  locations: string[];
}

/**
 * Load the group at `rootDir` and everything below it for `releaseTrack`.
 *
 * Elements with no implementation for the track are left out of the tree, along with
 * their children. Any other load error aborts the walk.
 */
export async function buildCommandTree(
  loader: CommandTreeLoader,
  rootDir: string,
  rootName: string,
  releaseTrack: ReleaseTrack
): Promise<CommandTreeNode> {
  const root = await loadNode(loader, [rootDir], [rootName], 'group', releaseTrack);
  if (!root) {
    throw new ReleaseTrackNotImplementedError(releaseTrack, rootDir);
  }
  return root;
}

async function loadNode(
  loader: CommandTreeLoader,
  locations: string[],
  path: TreePath,
  kind: ElementKind,
  releaseTrack: ReleaseTrack
): Promise<CommandTreeNode | undefined> {
  let element: ElementType;
  try {
    element = await loader.loadCommonType(locations, path, releaseTrack, kind === 'command');
  } catch (error) {
    if (error instanceof ReleaseTrackNotImplementedError) {
      log.debug(`Skipping ${joinTreePath(path)}: not implemented for ${releaseTrack}`);
      return undefined;
    }
    throw error;
  }

  const node: CommandTreeNode = {
    name: path[path.length - 1] ?? '',
    path,
    kind,
    element,
    locations,
    children: [],
  };
  if (kind === 'command') {
    return node;
  }

  const { groups, commands } = loader.findSubElements(locations, path);
  for (const [name, groupLocations] of groups) {
    const child = await loadNode(loader, groupLocations, [...path, name], 'group', releaseTrack);
    if (child) node.children.push(child);
  }
  for (const [name, commandLocations] of commands) {
    const child = await loadNode(loader, commandLocations, [...path, name], 'command', releaseTrack);
    if (child) node.children.push(child);
  }
  return node;
}

/**
 * Load a single element addressed by the names below the root, without loading
 * its siblings. An empty `segments` list addresses the root group.
 */
export async function findElement(
  loader: CommandTreeLoader,
  rootDir: string,
  rootName: string,
  segments: readonly string[],
  releaseTrack: ReleaseTrack
): Promise<ResolvedElement> {
  let locations = [rootDir];
  let path: TreePath = [rootName];
  let kind: ElementKind = 'group';

  for (const segment of segments) {
    if (kind === 'command') {
      throw notFound([...path, segment]);
    }
    const { groups, commands } = loader.findSubElements(locations, path);
    path = [...path, segment];
    const groupLocations = groups.get(segment);
    const commandLocations = commands.get(segment);
    if (groupLocations) {
      locations = groupLocations;
      kind = 'group';
    } else if (commandLocations) {
      locations = commandLocations;
      kind = 'command';
    } else {
      throw notFound(path);
    }
  }

  const element = await loader.loadCommonType(locations, path, releaseTrack, kind === 'command');
  return { path, kind, element, locations };
}

function notFound(path: TreePath): LoadFailure {
  return new LoadFailure(
    joinTreePath(path),
    new Error('No command or group with this name'),
    ErrorCodes.ELEMENT_NOT_FOUND
  );
}
