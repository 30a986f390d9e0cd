/**
 * YAML loading for command spec files with includes from shared common data.
 *
 * Each directory may hold a `_common.yaml` file. Spec files in that directory can
 * pull values out of it in two ways. Given
 *
 *   foo:
 *     a: b
 *     c: d
 *   baz:
 *     - e: f
 *     - g: h
 *
 * a scalar include replaces a tagged value:
 *
 *   bar: !COMMON foo.a          # bar: b
 *
 * and a merge key splices mappings or sequences into the node that holds it:
 *
 *   bar:                        # bar:
 *     _COMMON_: foo             #   a: b
 *     i: j                      #   c: d
 *                               #   i: j
 *   bar:                        # bar:
 *     - _COMMON_baz             #   - e: f
 *     - i: j                    #   - g: h
 *                               #   - i: j
 *
 * Documents are parsed first, with the include tag producing a marker, and the
 * markers and merge keys are then resolved bottom-up in a second pass.
 */
import * as path from 'node:path';
import type { ScalarTag } from 'yaml';
import { fileExistsSync } from '../../utils/file-system.js';
import { loadYamlSync } from '../../utils/yaml.js';
import { LayoutError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const COMMON_DATA_FILE = '_common.yaml';
export const INCLUDE_TAG = '!COMMON';
export const MERGE_KEY = '_COMMON_';

const log = logger.child('common-yaml');

type Mapping = Record<string, unknown>;

/**
 * Placeholder left in the parsed tree by the include tag.
 */
export class CommonReference {
  constructor(public readonly attributePath: string) {}
}

const includeTag: ScalarTag = {
  tag: INCLUDE_TAG,
  identify: (value) => value instanceof CommonReference,
  resolve: (value) => new CommonReference(value),
  stringify: (item) => (item.value instanceof CommonReference ? item.value.attributePath : String(item.value)),
};

/**
 * Assign as an own property, so a `__proto__` key stays a key.
 */
function setEntry(target: Mapping, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

function isMapping(value: unknown): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof CommonReference);
}

/**
 * Values an attribute path must not resolve to.
 */
function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return isMapping(value) && Object.keys(value).length === 0;
}

/**
 * Loads spec documents, caching the common data of each directory it visits.
 * One instance belongs to one loading session.
 */
export class CommonYamlLoader {
  private readonly commonData = new Map<string, unknown>();

  /**
   * Parse a spec file, resolving includes and merges against the common data
   * next to it. Fails without returning anything if any reference cannot be resolved.
   */
  load(implPath: string): unknown {
    const commonData = this.getCommonData(path.dirname(implPath));
    const parsed = loadYamlSync(implPath, { customTags: [includeTag] });
    return new CommonDataResolver(implPath, commonData).resolve(parsed);
  }

  /**
   * The common data document for a directory, or undefined when it has none.
   * Parsed at most once per directory.
   */
  getCommonData(dirPath: string): unknown {
    if (this.commonData.has(dirPath)) {
      return this.commonData.get(dirPath);
    }
    const commonFile = path.join(dirPath, COMMON_DATA_FILE);
    let data: unknown = undefined;
    if (fileExistsSync(commonFile)) {
      data = loadYamlSync(commonFile);
      log.debug(`Cached common data from ${commonFile}`);
    }
    this.commonData.set(dirPath, data);
    return data;
  }
}

/**
 * Second pass over one parsed document.
 */
class CommonDataResolver {
  constructor(
    private readonly implPath: string,
    private readonly commonData: unknown
  ) {}

  resolve(node: unknown): unknown {
    if (node instanceof CommonReference) {
      return this.getData(node.attributePath);
    }
    if (Array.isArray(node)) {
      return this.resolveSequence(node.map((item) => this.resolve(item)));
    }
    if (isMapping(node)) {
      const resolved: Mapping = {};
      for (const [key, value] of Object.entries(node)) {
        setEntry(resolved, key, this.resolve(value));
      }
      return this.resolveMapping(resolved);
    }
    return node;
  }

  private resolveMapping(data: Mapping): Mapping {
    if (!(MERGE_KEY in data)) {
      return data;
    }
    const attributePaths = data[MERGE_KEY];
    delete data[MERGE_KEY];
    if (isEmptyValue(attributePaths)) {
      return data;
    }
    if (typeof attributePaths !== 'string') {
      throw new LayoutError(
        ErrorCodes.MISSING_COMMON_ATTRIBUTE,
        `Command [${this.implPath}] uses ${MERGE_KEY} with a value that is not a comma-separated list of attribute paths.`,
        { implPath: this.implPath }
      );
    }

    for (const attributePath of splitAttributePaths(attributePaths)) {
      const value = this.getData(attributePath);
      if (!isMapping(value)) {
        throw new LayoutError(
          ErrorCodes.MISSING_COMMON_ATTRIBUTE,
          `Command [${this.implPath}] merges common data attribute path [${attributePath}] into a mapping but it is not a mapping.`,
          { implPath: this.implPath, attributePath }
        );
      }
      for (const [key, entry] of Object.entries(value)) {
        setEntry(data, key, entry);
      }
    }
    return data;
  }

  private resolveSequence(items: unknown[]): unknown[] {
    const result: unknown[] = [];
    for (const item of items) {
      if (typeof item !== 'string' || !item.startsWith(MERGE_KEY)) {
        result.push(item);
        continue;
      }
      for (const attributePath of splitAttributePaths(item.slice(MERGE_KEY.length))) {
        const value = this.getData(attributePath);
        if (!Array.isArray(value)) {
          throw new LayoutError(
            ErrorCodes.MISSING_COMMON_ATTRIBUTE,
            `Command [${this.implPath}] merges common data attribute path [${attributePath}] into a list but it is not a list.`,
            { implPath: this.implPath, attributePath }
          );
        }
        result.push(...value);
      }
    }
    return result;
  }

  /**
   * Walk a dotted attribute path through the common data. The result is copied so
   * documents never share structure with the cached common data.
   */
  private getData(attributePath: string): unknown {
    if (isEmptyValue(this.commonData)) {
      throw new LayoutError(
        ErrorCodes.MISSING_COMMON_DATA,
        `Command [${this.implPath}] references common command data [${attributePath}] but it does not exist.`,
        { implPath: this.implPath, attributePath }
      );
    }
    let value: unknown = this.commonData;
    for (const attribute of attributePath.split('.')) {
      value = isMapping(value) && Object.hasOwn(value, attribute) ? value[attribute] : undefined;
      if (isEmptyValue(value)) {
        throw new LayoutError(
          ErrorCodes.MISSING_COMMON_ATTRIBUTE,
          `Command [${this.implPath}] references common command data attribute [${attribute}] in path [${attributePath}] but it does not exist.`,
          { implPath: this.implPath, attribute, attributePath }
        );
      }
    }
    return structuredClone(value);
  }
}

function splitAttributePaths(attributePaths: string): string[] {
  return attributePaths.split(',').map((attributePath) => attributePath.trim());
}
