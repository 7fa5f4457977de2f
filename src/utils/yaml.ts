/**
 * YAML/JSON document parsing with zod validation.
 * JSON is a subset of YAML 1.2, so task suites may be written in either.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse a YAML (or JSON) document into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { error }
    );
  }
}

/**
 * Parse and validate a document with a zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(content: string, schema: T): z.infer<T> {
  const result = schema.safeParse(parseYaml(content));
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
 * Load a document from disk without validating it.
 */
export async function loadYaml(filePath: string): Promise<unknown> {
  const content = await readFile(filePath);
  try {
    return parseYaml(content);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
    }
    throw error;
  }
}

/**
 * Load and validate a document from disk.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(filePath: string, schema: T): Promise<z.infer<T>> {
  const content = await readFile(filePath);
  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof SystemError) {
      // Re-throw with file path context
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
    }
    throw error;
  }
}

/**
 * Format zod issues as `path: message; path: message`.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const issuePath = issue.path.map(String).join('.');
      return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
