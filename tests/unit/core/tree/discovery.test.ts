/**
 * Tests for group directory discovery.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { findSubElements, findIndexModule } from '../../../../src/core/tree/discovery.js';
import { LayoutError, LoadFailure, ErrorCodes } from '../../../../src/utils/errors.js';
import { makeTempDir, removeTempDir, writeTree } from '../../../helpers/fs-tree.js';

describe('findSubElements', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('discovery');
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('should split subgroups from subcommands', () => {
    writeTree(root, {
      'index.js': '',
      'instances/index.js': '',
      'list.js': '',
      'describe.yaml': '',
    });

    const { groups, commands } = findSubElements([root], ['cli']);

    expect([...groups]).toEqual([['instances', [join(root, 'instances')]]]);
    expect([...commands]).toEqual([
      ['describe', [join(root, 'describe.yaml')]],
      ['list', [join(root, 'list.js')]],
    ]);
  });

  it('should collect a module and a spec file under one name', () => {
    writeTree(root, { 'create.js': '', 'create.yaml': '' });

    const { commands } = findSubElements([root], ['cli']);

    expect(commands.get('create')).toEqual([join(root, 'create.js'), join(root, 'create.yaml')]);
  });

  it('should skip directories without an index module', () => {
    writeTree(root, { 'assets/readme.txt': '', 'ops/index.mjs': '' });

    const { groups } = findSubElements([root], ['cli']);

    expect([...groups.keys()]).toEqual(['ops']);
  });

  it('should skip index, private, test and declaration files', () => {
    writeTree(root, {
      'index.js': '',
      '_common.yaml': '',
      '_helpers.js': '',
      '.hidden.yaml': '',
      'list.test.js': '',
      'list.spec.mjs': '',
      'notes.txt': '',
      'list.js': '',
    });

    const { commands } = findSubElements([root], ['cli']);

    expect([...commands.keys()]).toEqual(['list']);
  });

  it('should honour configured module extensions', () => {
    writeTree(root, { 'list.ts': '', 'types.d.ts': '', 'show.js': '' });

    const { commands } = findSubElements([root], ['cli'], { moduleExtensions: ['.ts'] });

    expect([...commands.keys()]).toEqual(['list']);
  });

  it.each([
    ['Create.yaml', 'Create.yaml'],
    ['Delete.js', 'Delete'],
    ['Compute/index.js', 'Compute'],
  ])('should reject %s for its capital letters', (file, name) => {
    writeTree(root, { [file]: '' });

    try {
      findSubElements([root], ['cli']);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(LayoutError);
      expect((error as LayoutError).code).toBe(ErrorCodes.ILLEGAL_NAME);
      expect((error as LayoutError).message).toBe(`Commands and groups cannot have capital letters: ${name}.`);
    }
  });

  it('should refuse groups implemented by more than one location', () => {
    writeTree(root, { 'a.yaml': '', 'b.yaml': '' });

    try {
      findSubElements([join(root, 'a.yaml'), join(root, 'b.yaml')], ['cli', 'compute']);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(LoadFailure);
      expect((error as LoadFailure).location).toBe('cli.compute');
      expect((error as LoadFailure).message).toBe(
        'Problem loading cli.compute: Command groups cannot be implemented in yaml.'
      );
    }
  });
});

describe('findIndexModule', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('index');
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('should return the first index module by extension order', () => {
    writeTree(root, { 'index.mjs': '', 'index.js': '' });

    expect(findIndexModule(root)).toBe(join(root, 'index.js'));
  });

  it('should return undefined without an index module', () => {
    expect(findIndexModule(root)).toBeUndefined();
  });
});
