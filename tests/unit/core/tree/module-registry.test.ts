/**
 * Tests for session-scoped module importing.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { isElementType } from '../../../../src/core/tree/base.js';
import { CommandTreeLoader } from '../../../../src/core/tree/loader.js';
import { ModuleRegistry, moduleIdFor, nativeImporter } from '../../../../src/core/tree/module-registry.js';
import type { ModuleImporter } from '../../../../src/core/tree/types.js';
import { LoadFailure, ErrorCodes } from '../../../../src/utils/errors.js';
import { makeTempDir, removeTempDir, writeTree } from '../../../helpers/fs-tree.js';

describe('moduleIdFor', () => {
  it('should combine the session id and the tree path', () => {
    expect(moduleIdFor('s1', ['cli', 'compute', 'list-all'])).toBe('__cmdtree__.s1.cli.compute.list_all');
  });

  it('should give different sessions different ids', () => {
    expect(moduleIdFor('a', ['cli'])).not.toBe(moduleIdFor('b', ['cli']));
  });
});

describe('ModuleRegistry', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('modules');
    writeTree(root, {
      'list.js': '',
      'compute/index.mjs': '',
      'assets/': '',
    });
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('should import a module file under its session id', async () => {
    const importer = vi.fn<ModuleImporter>(async () => ({ VERSION: '1' }));
    const registry = new ModuleRegistry('s1', importer);
    const file = join(root, 'list.js');

    const loaded = await registry.load(file, ['cli', 'list']);

    expect(loaded).toEqual({ file, namespace: { VERSION: '1' } });
    expect(importer).toHaveBeenCalledWith(file, '__cmdtree__.s1.cli.list');
  });

  it('should import each tree path once', async () => {
    const importer = vi.fn<ModuleImporter>(async () => ({}));
    const registry = new ModuleRegistry('s1', importer);
    const file = join(root, 'list.js');

    const first = registry.load(file, ['cli', 'list']);
    const second = registry.load(file, ['cli', 'list']);

    expect(second).toBe(first);
    await first;
    expect(importer).toHaveBeenCalledTimes(1);
    expect(registry.size).toBe(1);
  });

  it('should import the index module of a group directory', async () => {
    const importer = vi.fn<ModuleImporter>(async () => ({}));
    const registry = new ModuleRegistry('s1', importer);

    const loaded = await registry.load(join(root, 'compute'), ['cli', 'compute']);

    expect(loaded.file).toBe(join(root, 'compute', 'index.mjs'));
  });

  it('should only look for index modules with the configured extensions', async () => {
    const importer = vi.fn<ModuleImporter>(async () => ({}));
    const registry = new ModuleRegistry('s1', importer, ['.js']);
    const dir = join(root, 'compute');

    await expect(registry.load(dir, ['cli', 'compute'])).rejects.toThrow(
      `Problem loading cli.compute: No index module found in ${dir}.`
    );
    expect(importer).not.toHaveBeenCalled();
  });

  it('should report a directory without an index module as a load failure', async () => {
    const registry = new ModuleRegistry('s1', vi.fn<ModuleImporter>(async () => ({})));
    const dir = join(root, 'assets');

    await expect(registry.load(dir, ['cli', 'assets'])).rejects.toBeInstanceOf(LoadFailure);
  });

  it('should wrap importer errors with the element location', async () => {
    const cause = new Error('Unexpected token');
    const registry = new ModuleRegistry('s1', async () => {
      throw cause;
    });

    const error: unknown = await registry.load(join(root, 'list.js'), ['cli', 'list']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoadFailure);
    expect(error).toMatchObject({
      code: ErrorCodes.MODULE_IMPORT_FAILED,
      location: 'cli.list',
      message: 'Problem loading cli.list: Unexpected token.',
      cause,
    });
  });

  it('should wrap non-error rejections', async () => {
    const registry = new ModuleRegistry('s1', () => Promise.reject('missing export'));

    await expect(registry.load(join(root, 'list.js'), ['cli', 'list'])).rejects.toThrow(
      'Problem loading cli.list: missing export.'
    );
  });

  it('should import each file of tree paths that share a module id', async () => {
    writeTree(root, { 'foo-bar.js': '', 'foo_bar.js': '' });
    const importer = vi.fn<ModuleImporter>(async (file) => ({ file }));
    const registry = new ModuleRegistry('s1', importer);

    const dash = await registry.load(join(root, 'foo-bar.js'), ['g', 'foo-bar']);
    const under = await registry.load(join(root, 'foo_bar.js'), ['g', 'foo_bar']);

    expect(dash.namespace).toEqual({ file: join(root, 'foo-bar.js') });
    expect(under.namespace).toEqual({ file: join(root, 'foo_bar.js') });
    expect(importer).toHaveBeenCalledTimes(2);
  });

  it('should import every file implementing one element', async () => {
    writeTree(root, { 'foo.js': '', 'foo.mjs': '' });
    const importer = vi.fn<ModuleImporter>(async (file) => ({ file }));
    const registry = new ModuleRegistry('s1', importer);

    const js = await registry.load(join(root, 'foo.js'), ['g', 'foo']);
    const mjs = await registry.load(join(root, 'foo.mjs'), ['g', 'foo']);

    expect(js.namespace).toEqual({ file: join(root, 'foo.js') });
    expect(mjs.namespace).toEqual({ file: join(root, 'foo.mjs') });
    expect(registry.size).toBe(2);
  });
});

const LIST_MODULE = `
export class List {
  static kind = 'command';
  static validReleaseTracks() {
    return new Set(['GA']);
  }
}
export const helper = 1;
`;

describe('nativeImporter', () => {
  let root: string;
  let file: string;

  beforeEach(() => {
    root = makeTempDir('native');
    file = join(root, 'list.mjs');
    writeTree(root, { 'list.mjs': LIST_MODULE, 'broken.mjs': 'export const = ;\n' });
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('should return the exports of the module file', async () => {
    const namespace = await nativeImporter(file, moduleIdFor('s1', ['cli', 'list']));

    expect(Object.keys(namespace).sort()).toEqual(['List', 'helper']);
    expect(isElementType(namespace['List'])).toBe(true);
    expect(isElementType(namespace['helper'])).toBe(false);
  });

  it('should give separate sessions separate module instances', async () => {
    const first = new CommandTreeLoader({ constructionId: 'one' });
    const second = new CommandTreeLoader({ constructionId: 'two' });

    const fromFirst = await first.loadCommonType([file], ['cli', 'list'], 'GA', true);
    const fromFirstAgain = await first.loadCommonType([file], ['cli', 'list'], 'GA', true);
    const fromSecond = await second.loadCommonType([file], ['cli', 'list'], 'GA', true);

    expect(fromFirst.name).toBe('List');
    expect(fromFirstAgain).toBe(fromFirst);
    expect(fromSecond).not.toBe(fromFirst);
  });

  it('should report modules that fail to evaluate as load failures', async () => {
    const loader = new CommandTreeLoader({ constructionId: 'broken' });

    await expect(
      loader.loadCommonType([join(root, 'broken.mjs')], ['cli', 'broken'], 'GA', true)
    ).rejects.toBeInstanceOf(LoadFailure);
  });
});
