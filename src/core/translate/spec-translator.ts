/**
 * Default translator for declarative command specs.
 */
import { z } from 'zod';
import { LayoutError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { ReleaseTrackSchema, type ReleaseTrack } from '../tracks/release-track.js';
import { joinTreePath, type CommandTranslator, type ElementType, type SpecEntry, type TreePath } from '../tree/types.js';

export const HelpTextSchema = z.object({
  brief: z.string(),
  description: z.string().optional(),
  examples: z.string().optional(),
});

export const SpecCommandSchema = z
  .object({
    release_tracks: z.array(ReleaseTrackSchema).nullish(),
    help_text: HelpTextSchema,
    hidden: z.boolean().default(false),
  })
  .passthrough();

export type SpecCommandData = z.infer<typeof SpecCommandSchema>;

/**
 * A command defined by a spec file entry.
 */
export class SpecCommand implements ElementType {
  readonly kind = 'command';
  readonly name: string;
  private readonly releaseTracks: ReadonlySet<ReleaseTrack>;

  constructor(
    readonly path: TreePath,
    readonly spec: SpecCommandData
  ) {
    this.name = path[path.length - 1] ?? '';
    this.releaseTracks = new Set(spec.release_tracks ?? []);
  }

  validReleaseTracks(): ReadonlySet<ReleaseTrack> {
    return this.releaseTracks;
  }

  get brief(): string {
    return this.spec.help_text.brief;
  }

  get hidden(): boolean {
    return this.spec.hidden;
  }
}

/**
 * Validates spec entries and wraps them in SpecCommand.
 */
export class SpecCommandTranslator implements CommandTranslator {
  translate(path: TreePath, commandData: SpecEntry): SpecCommand {
    const result = SpecCommandSchema.safeParse(commandData);
    if (!result.success) {
      throw new LayoutError(
        ErrorCodes.INVALID_SPEC_DOCUMENT,
        `Invalid command spec for [${joinTreePath(path)}]: ${formatZodError(result.error)}`,
        { path: joinTreePath(path), errors: result.error.issues }
      );
    }
    return new SpecCommand(path, result.data);
  }
}
