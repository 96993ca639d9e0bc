/**
 * YAML parsing utilities.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ConfigError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
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
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed ?? {});

  if (!result.success) {
    const first = result.error.issues[0];
    throw new ConfigError(
      ErrorCodes.CONFIG_SCHEMA,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { key: first ? first.path.map(String).join('.') : '', errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Read a YAML file and validate it. Errors carry the file path in their
 * details and message.
 * @throws SystemError when the file cannot be read or is not valid YAML
 * @throws ConfigError when the content does not match the schema
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  const content = await readFile(filePath).catch((error: unknown) => {
    throw new SystemError(ErrorCodes.READ_ERROR, `Cannot read ${filePath}`, { filePath, error });
  });

  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
    }
    if (error instanceof SystemError) {
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
    }
    throw error;
  }
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.map(String).join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
