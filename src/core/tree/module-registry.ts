/**
 * Session-scoped importing of native command and group modules.
 */
import { pathToFileURL } from 'node:url';
import { LoadFailure, ErrorCodes } from '../../utils/errors.js';
import { isDirectorySync } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_MODULE_EXTENSIONS, findIndexModule } from './discovery.js';
import { joinTreePath, type ModuleImporter, type ModuleNamespace, type TreePath } from './types.js';

const MODULE_ID_PREFIX = '__cmdtree__';

const log = logger.child('modules');

/**
 * Import through Node's ESM loader. The module id goes into the URL query so a
 * file loaded by two sessions yields two independent module instances.
 */
export const nativeImporter: ModuleImporter = async (file, moduleId) => {
  const url = `${pathToFileURL(file).href}?id=${encodeURIComponent(moduleId)}`;
  const namespace: unknown = await import(url);
  if (typeof namespace !== 'object' || namespace === null) {
    throw new Error(`Module ${file} did not produce a namespace`);
  }
  return Object.fromEntries(Object.entries(namespace));
};

/**
 * Internal id for the module implementing `treePath` in session `sessionId`.
 */
export function moduleIdFor(sessionId: string, treePath: TreePath): string {
  return `${MODULE_ID_PREFIX}.${sessionId}.${joinTreePath(treePath).replace(/-/g, '_')}`;
}

export interface LoadedModule {
  /** File the namespace was imported from. */
  file: string;
  namespace: ModuleNamespace;
}

/**
 * Imports modules for one loading session, at most once per tree path and file.
 */
export class ModuleRegistry {
  private readonly modules = new Map<string, Promise<LoadedModule>>();

  constructor(
    private readonly sessionId: string,
    private readonly importer: ModuleImporter = nativeImporter,
    private readonly moduleExtensions: readonly string[] = DEFAULT_MODULE_EXTENSIONS
  ) {}

  /**
   * Import the module at `implPath` (a module file, or a group directory holding an
   * index module). Any failure is reported as a LoadFailure for `treePath`.
   */
  load(implPath: string, treePath: TreePath): Promise<LoadedModule> {
    const moduleId = moduleIdFor(this.sessionId, treePath);
    // Module ids are not unique per file: foo-bar and foo_bar share one, as do foo.js and foo.mjs.
    const cacheKey = `${moduleId}:${implPath}`;
    const cached = this.modules.get(cacheKey);
    if (cached) {
      return cached;
    }
    const loading = this.importModule(implPath, treePath, moduleId);
    this.modules.set(cacheKey, loading);
    return loading;
  }

  get size(): number {
    return this.modules.size;
  }

  private async importModule(implPath: string, treePath: TreePath, moduleId: string): Promise<LoadedModule> {
    try {
      const file = this.resolveModuleFile(implPath);
      const namespace = await this.importer(file, moduleId);
      log.debug(`Imported ${file} as ${moduleId}`);
      return { file, namespace };
    } catch (error) {
      throw new LoadFailure(joinTreePath(treePath), error, ErrorCodes.MODULE_IMPORT_FAILED);
    }
  }

  private resolveModuleFile(implPath: string): string {
    if (!isDirectorySync(implPath)) {
      return implPath;
    }
    const indexModule = findIndexModule(implPath, this.moduleExtensions);
    if (!indexModule) {
      throw new Error(`No index module found in ${implPath}`);
    }
    return indexModule;
  }
}
