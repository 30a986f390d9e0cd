/**
 * Tests for translating spec entries into commands.
 */
import { describe, it, expect } from 'vitest';
import { SpecCommand, SpecCommandTranslator } from '../../../../src/core/translate/spec-translator.js';
import { LayoutError, ErrorCodes } from '../../../../src/utils/errors.js';

describe('SpecCommandTranslator', () => {
  const translator = new SpecCommandTranslator();

  it('should build a command named after the last path segment', () => {
    const command = translator.translate(['cli', 'compute', 'list'], {
      release_tracks: ['BETA'],
      help_text: { brief: 'List instances.' },
    });

    expect(command).toBeInstanceOf(SpecCommand);
    expect(command.kind).toBe('command');
    expect(command.name).toBe('list');
    expect(command.brief).toBe('List instances.');
    expect(command.hidden).toBe(false);
    expect([...command.validReleaseTracks()]).toEqual(['BETA']);
  });

  it('should treat missing tracks as valid on any track', () => {
    const command = translator.translate(['cli', 'show'], { help_text: { brief: 'Show.' }, hidden: true });

    expect(command.validReleaseTracks().size).toBe(0);
    expect(command.hidden).toBe(true);
  });

  it('should keep fields it does not know', () => {
    const command = translator.translate(['cli', 'show'], {
      help_text: { brief: 'Show.' },
      arguments: { params: [{ name: 'id' }] },
    });

    expect(command.spec['arguments']).toEqual({ params: [{ name: 'id' }] });
  });

  it('should reject entries without help text', () => {
    expect(() => translator.translate(['cli', 'show'], { release_tracks: ['GA'] })).toThrow(
      new LayoutError(ErrorCodes.INVALID_SPEC_DOCUMENT, 'Invalid command spec for [cli.show]: help_text: Required')
    );
  });

  it('should reject unknown release tracks', () => {
    expect(() =>
      translator.translate(['cli', 'show'], { release_tracks: ['NIGHTLY'], help_text: { brief: 'Show.' } })
    ).toThrow(LayoutError);
  });
});
