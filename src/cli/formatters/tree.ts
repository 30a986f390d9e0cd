/**
 * Human-readable rendering of loaded elements.
 */
import chalk from 'chalk';
import { RELEASE_TRACKS, sortReleaseTracks, type ReleaseTrack } from '../../core/tracks/release-track.js';
import type { CommandTreeNode } from '../../core/tree/walker.js';
import type { ElementType } from '../../core/tree/types.js';

/**
 * Declared tracks of an element, or "all" for a wildcard implementation.
 */
export function formatTracks(element: ElementType): string {
  const tracks = sortReleaseTracks(element.validReleaseTracks());
  return tracks.length > 0 ? tracks.join(', ') : 'all';
}

/**
 * One line per node, indented by depth, groups before commands.
 */
export function formatTree(node: CommandTreeNode, depth: number = 0): string[] {
  const indent = '  '.repeat(depth);
  const label = node.kind === 'group' ? chalk.bold.cyan(node.name) : node.name;
  const lines = [`${indent}${label} ${chalk.dim(`[${formatTracks(node.element)}]`)}`];
  for (const child of node.children) {
    lines.push(...formatTree(child, depth + 1));
  }
  return lines;
}

/**
 * Count the commands in a tree.
 */
export function countCommands(node: CommandTreeNode): number {
  if (node.kind === 'command') return 1;
  return node.children.reduce((total, child) => total + countCommands(child), 0);
}

/**
 * Plain-data view of a tree for JSON output.
 */
export function treeToJson(node: CommandTreeNode): Record<string, unknown> {
  return {
    name: node.name,
    path: node.path.join('.'),
    kind: node.kind,
    implementation: node.element.name,
    releaseTracks: sortReleaseTracks(node.element.validReleaseTracks()),
    locations: node.locations,
    ...(node.kind === 'group' ? { children: node.children.map(treeToJson) } : {}),
  };
}

/**
 * Header line for a release track.
 */
export function formatTrackHeader(track: ReleaseTrack): string {
  const info = RELEASE_TRACKS[track];
  return `${chalk.bold(`Release track: ${info.id}`)} ${chalk.dim(info.description)}`;
}
