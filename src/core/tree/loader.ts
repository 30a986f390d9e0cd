/**
 * A loading session over a command tree on disk.
 */
import { randomUUID } from 'node:crypto';
import { LoadFailure, ErrorCodes } from '../../utils/errors.js';
import type { ReleaseTrack } from '../tracks/release-track.js';
import { CommonYamlLoader } from './common-yaml.js';
import { DEFAULT_MODULE_EXTENSIONS, SPEC_EXTENSION, findSubElements } from './discovery.js';
import { implementationsFromModule, implementationsFromSpec } from './implementations.js';
import { ModuleRegistry, nativeImporter } from './module-registry.js';
import { extractReleaseTrackImplementation } from './resolver.js';
import {
  joinTreePath,
  type CommandTranslator,
  type ElementType,
  type ImplementationCandidate,
  type ModuleImporter,
  type SubElements,
  type TreePath,
} from './types.js';

export interface CommandTreeLoaderOptions {
  /**
   * Unique id of this session. Module ids are derived from it, so concurrent
   * sessions in one process must not share one. Defaults to a random UUID.
   */
  constructionId?: string;
  /** Translates spec file entries into commands. Spec files fail to load without one. */
  translator?: CommandTranslator;
  importer?: ModuleImporter;
  moduleExtensions?: readonly string[];
}

/**
 * Discovers and loads commands and groups for one session.
 *
 * Common data documents and imported modules are cached for the lifetime of the
 * instance; create a new loader to pick up changes on disk.
 */
export class CommandTreeLoader {
  readonly constructionId: string;
  private readonly translator: CommandTranslator | undefined;
  private readonly moduleExtensions: readonly string[];
  private readonly modules: ModuleRegistry;
  private readonly yamlLoader = new CommonYamlLoader();

  constructor(options: CommandTreeLoaderOptions = {}) {
    this.constructionId = options.constructionId ?? randomUUID();
    this.translator = options.translator;
    this.moduleExtensions = options.moduleExtensions ?? DEFAULT_MODULE_EXTENSIONS;
    this.modules = new ModuleRegistry(
      this.constructionId,
      options.importer ?? nativeImporter,
      this.moduleExtensions
    );
  }

  /**
   * Enumerate the subgroups and subcommands of the group implemented at `implPaths`.
   */
  findSubElements(implPaths: readonly string[], treePath: TreePath): SubElements {
    return findSubElements(implPaths, treePath, { moduleExtensions: this.moduleExtensions });
  }

  /**
   * Load the single implementation of a command or group for `releaseTrack`.
   *
   * @param implPaths - Every location implementing the element, from discovery.
   * @param isCommand - Whether a command (rather than a group) is expected.
   */
  async loadCommonType(
    implPaths: readonly string[],
    treePath: TreePath,
    releaseTrack: ReleaseTrack,
    isCommand: boolean
  ): Promise<ElementType> {
    const [firstPath] = implPaths;
    if (firstPath === undefined) {
      throw new LoadFailure(joinTreePath(treePath), new Error('No implementation paths given'));
    }

    const implementations: ImplementationCandidate[] = [];
    for (const implFile of implPaths) {
      if (implFile.endsWith(SPEC_EXTENSION)) {
        if (!isCommand) {
          throw new LoadFailure(
            joinTreePath(treePath),
            new Error('Command groups cannot be implemented in yaml'),
            ErrorCodes.SPEC_GROUP
          );
        }
        const data = this.loadSpecDocument(implFile);
        implementations.push(...implementationsFromSpec(treePath, implFile, data, this.translator));
      } else {
        const { file, namespace } = await this.modules.load(implFile, treePath);
        implementations.push(...implementationsFromModule(file, namespace, isCommand));
      }
    }

    return extractReleaseTrackImplementation(firstPath, releaseTrack, implementations)();
  }

  /**
   * Parse a spec file with includes and merges resolved against its directory's
   * common data.
   */
  loadSpecDocument(implFile: string): unknown {
    return this.yamlLoader.load(implFile);
  }
}
