/**
 * Configuration loading for `.strata/config.yaml`.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { compilePolicy, type AnalysisPolicy } from './policy.js';
import { loadYamlWithSchema, fileExists, formatZodError } from '../../utils/index.js';
import { ConfigError, StrataError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.strata/config.yaml';

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the default file doesn't exist; an explicitly
 * named file that is missing is a config error.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    if (configPath) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Config file not found: ${fullPath}`,
        { key: 'config', path: fullPath }
      );
    }
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    if (error instanceof StrataError) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { key: 'config', path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Parse an in-memory config object, applying defaults.
 * @throws ConfigError when the value does not match the schema
 */
export function mergeConfig(partial: unknown): Config {
  const result = ConfigSchema.safeParse(partial ?? {});
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ConfigError(
      ErrorCodes.CONFIG_SCHEMA,
      `Invalid configuration: ${formatZodError(result.error)}`,
      { key: first ? first.path.map(String).join('.') : '' }
    );
  }
  return result.data;
}

/**
 * Load the config file and compile it into an AnalysisPolicy.
 */
export async function loadPolicy(projectRoot: string, configPath?: string): Promise<AnalysisPolicy> {
  return compilePolicy(await loadConfig(projectRoot, configPath));
}
