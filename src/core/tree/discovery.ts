/**
 * Maps a group directory to the names and source locations of its children.
 */
import * as path from 'node:path';
import { listDirectorySync, fileExistsSync } from '../../utils/file-system.js';
import { LayoutError, LoadFailure, ErrorCodes } from '../../utils/errors.js';
import { joinTreePath, type CandidateSet, type SubElements, type TreePath } from './types.js';

/** Extension of declarative command spec files. */
export const SPEC_EXTENSION = '.yaml';

/** Module extensions scanned when none are configured. */
export const DEFAULT_MODULE_EXTENSIONS: readonly string[] = ['.js', '.mjs'];

const INDEX_MODULE = 'index';
const NON_COMMAND_SUFFIXES = ['.d.ts', '.d.mts', '.test', '.spec'];

export interface DiscoveryOptions {
  moduleExtensions?: readonly string[];
}

/**
 * A child found in a group directory. Modules are named without their extension,
 * spec files keep theirs until the element name is derived.
 */
interface PackageEntry {
  name: string;
  location: string;
}

/**
 * Find all the subgroups and subcommands of a group.
 *
 * A group is implemented by exactly one directory; an element may be implemented by
 * several files (a module and a spec file, for different release tracks), so each
 * name maps to a list of locations.
 */
export function findSubElements(
  implPaths: readonly string[],
  treePath: TreePath,
  options: DiscoveryOptions = {}
): SubElements {
  const [implPath] = implPaths;
  if (implPaths.length > 1 || implPath === undefined) {
    throw new LoadFailure(
      joinTreePath(treePath),
      new Error('Command groups cannot be implemented in yaml'),
      ErrorCodes.SPLIT_GROUP
    );
  }

  const { groups, commands } = listPackage(
    implPath,
    options.moduleExtensions ?? DEFAULT_MODULE_EXTENSIONS
  );
  return {
    groups: generateElementInfo(groups),
    commands: generateElementInfo(commands),
  };
}

/**
 * Resolve a group or command location to the module file that implements it.
 * Groups are directories and are implemented by their index module.
 */
export function findIndexModule(
  dirPath: string,
  moduleExtensions: readonly string[] = DEFAULT_MODULE_EXTENSIONS
): string | undefined {
  return moduleExtensions
    .map((ext) => path.join(dirPath, `${INDEX_MODULE}${ext}`))
    .find((candidate) => fileExistsSync(candidate));
}

function listPackage(
  dirPath: string,
  moduleExtensions: readonly string[]
): { groups: PackageEntry[]; commands: PackageEntry[] } {
  const groups: PackageEntry[] = [];
  const commands: PackageEntry[] = [];

  for (const entry of listDirectorySync(dirPath)) {
    if (entry.name.startsWith('_') || entry.name.startsWith('.')) {
      continue;
    }
    const location = path.join(dirPath, entry.name);

    if (entry.isDirectory) {
      if (findIndexModule(location, moduleExtensions)) {
        groups.push({ name: entry.name, location });
      }
      continue;
    }
    if (!entry.isFile) {
      continue;
    }

    if (entry.name.endsWith(SPEC_EXTENSION)) {
      commands.push({ name: entry.name, location });
      continue;
    }
    const moduleName = stripModuleExtension(entry.name, moduleExtensions);
    if (moduleName && moduleName !== INDEX_MODULE && !isNonCommandModule(entry.name)) {
      commands.push({ name: moduleName, location });
    }
  }

  return { groups, commands };
}

function stripModuleExtension(
  fileName: string,
  moduleExtensions: readonly string[]
): string | undefined {
  const ext = moduleExtensions.find((candidate) => fileName.endsWith(candidate));
  return ext ? fileName.slice(0, -ext.length) : undefined;
}

function isNonCommandModule(fileName: string): boolean {
  return NON_COMMAND_SUFFIXES.some((suffix) => fileName.includes(`${suffix}.`) || fileName.endsWith(suffix));
}

function generateElementInfo(entries: readonly PackageEntry[]): CandidateSet {
  const elements: CandidateSet = new Map();
  for (const { name, location } of entries) {
    if (/[A-Z]/.test(name)) {
      throw new LayoutError(
        ErrorCodes.ILLEGAL_NAME,
        `Commands and groups cannot have capital letters: ${name}.`,
        { name, location }
      );
    }
    const elementName = name.endsWith(SPEC_EXTENSION) ? name.slice(0, -SPEC_EXTENSION.length) : name;

    const existing = elements.get(elementName);
    if (existing) {
      existing.push(location);
    } else {
      elements.set(elementName, [location]);
    }
  }
  return elements;
}
