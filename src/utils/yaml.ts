/**
 * YAML parsing and serialization utilities.
 */
import { parse, stringify, type SchemaOptions } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile, readFileSync } from './file-system.js';

export type YamlParseOptions = Pick<SchemaOptions, 'customTags'>;

/**
 * Parse YAML content into plain data (mappings, sequences and scalars).
 */
export function parseYaml(content: string, options: YamlParseOptions = {}): unknown {
  try {
    return parse(content, options);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and parse a YAML file synchronously.
 */
export function loadYamlSync(filePath: string, options: YamlParseOptions = {}): unknown {
  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to read YAML file: ${filePath}`,
      { filePath, error }
    );
  }

  try {
    return parseYaml(content, options);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, {
        ...error.details,
        filePath,
      });
    }
    throw error;
  }
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  try {
    const content = await readFile(filePath);
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof SystemError) {
      // Re-throw with file path context
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to load YAML file: ${filePath}`,
      { filePath, error }
    );
  }
}

/**
 * Stringify data to YAML.
 */
export function stringifyYaml(data: unknown): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 100,
  });
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
