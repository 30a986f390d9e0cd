/**
 * Turn an imported module or a parsed spec document into implementation candidates.
 */
import { z } from 'zod';
import { LayoutError, LoadFailure, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { ReleaseTrackSchema } from '../tracks/release-track.js';
import { isElementType } from './base.js';
import {
  joinTreePath,
  type CommandTranslator,
  type ElementType,
  type ImplementationCandidate,
  type ModuleNamespace,
  type TreePath,
} from './types.js';

export const SpecEntrySchema = z
  .object({
    release_tracks: z.array(ReleaseTrackSchema).nullish(),
  })
  .passthrough();

export const SpecDocumentSchema = z.array(SpecEntrySchema);

/**
 * Collect the command or group classes a module exports.
 *
 * @param modFile - File the module was imported from, for error messages.
 */
export function implementationsFromModule(
  modFile: string,
  namespace: ModuleNamespace,
  isCommand: boolean
): ImplementationCandidate[] {
  const elements = Object.values(namespace).filter(isElementType);
  const commands = elements.filter((element) => element.kind === 'command');
  const groups = elements.filter((element) => element.kind === 'group');

  let found: ElementType[];
  if (isCommand) {
    if (groups.length > 0) {
      throw new LayoutError(
        ErrorCodes.UNEXPECTED_KIND,
        `You cannot define groups [${names(groups)}] in a command file: [${modFile}]`,
        { modFile }
      );
    }
    if (commands.length === 0) {
      throw new LayoutError(ErrorCodes.MISSING_KIND, `No commands defined in file: [${modFile}]`, { modFile });
    }
    found = commands;
  } else {
    if (commands.length > 0) {
      throw new LayoutError(
        ErrorCodes.UNEXPECTED_KIND,
        `You cannot define commands [${names(commands)}] in a command group file: [${modFile}]`,
        { modFile }
      );
    }
    if (groups.length === 0) {
      throw new LayoutError(ErrorCodes.MISSING_KIND, `No command groups defined in file: [${modFile}]`, {
        modFile,
      });
    }
    found = groups;
  }

  return found.map((element) => ({
    load: () => element,
    releaseTracks: element.validReleaseTracks(),
  }));
}

/**
 * One candidate per entry of a spec document, translated only when chosen.
 */
export function implementationsFromSpec(
  treePath: TreePath,
  implFile: string,
  data: unknown,
  translator: CommandTranslator | undefined
): ImplementationCandidate[] {
  if (!translator) {
    throw new LoadFailure(
      joinTreePath(treePath),
      new Error('No yaml command translator has been registered'),
      ErrorCodes.NO_TRANSLATOR
    );
  }

  const result = SpecDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new LayoutError(
      ErrorCodes.INVALID_SPEC_DOCUMENT,
      `Command spec [${implFile}] must be a list of command definitions: ${formatZodError(result.error)}`,
      { implFile, errors: result.error.issues }
    );
  }

  return result.data.map((entry) => ({
    load: () => translator.translate(treePath, entry),
    releaseTracks: new Set(entry.release_tracks ?? []),
  }));
}

function names(elements: readonly ElementType[]): string {
  return elements.map((element) => element.name).join(', ');
}
