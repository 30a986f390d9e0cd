/**
 * File system helpers used by discovery and the YAML loaders.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * A directory entry reduced to what discovery needs.
 */
export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
  isFile: boolean;
}

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file synchronously.
 */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a regular file exists (sync).
 */
export function fileExistsSync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory (sync).
 */
export function isDirectorySync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * List the immediate entries of a directory, sorted by name.
 * Symbolic links are reported by what they point at.
 */
export function listDirectorySync(dirPath: string): DirectoryEntry[] {
  return fs
    .readdirSync(dirPath, { withFileTypes: true })
    .map((entry) => {
      if (entry.isSymbolicLink()) {
        const target = path.join(dirPath, entry.name);
        return { name: entry.name, isDirectory: isDirectorySync(target), isFile: fileExistsSync(target) };
      }
      return { name: entry.name, isDirectory: entry.isDirectory(), isFile: entry.isFile() };
    })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
