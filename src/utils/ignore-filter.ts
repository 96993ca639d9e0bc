/**
 * gitignore-style filtering for vendored and generated paths.
 * Patterns come from the `files.ignore` config key and an optional
 * `.strataignore` file at the project root.
 */
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { fileExists, readFile } from './file-system.js';
import { SystemError, ErrorCodes } from './errors.js';

export const IGNORE_FILENAME = '.strataignore';

/**
 * Path filter built from gitignore-style patterns.
 */
export interface IgnoreFilter {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from project root
   */
  ignores(filePath: string): boolean;

  /**
   * Filter an array of relative paths, returning only non-ignored ones.
   */
  filter(filePaths: string[]): string[];

  /**
   * Get all patterns being used.
   */
  patterns(): string[];
}

/**
 * Create an IgnoreFilter from patterns.
 */
export function createIgnoreFilter(patterns: string[]): IgnoreFilter {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(filePath: string): boolean {
      const normalizedPath = filePath.replace(/\\/g, '/');
      return ig.ignores(normalizedPath);
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter(fp => !this.ignores(fp));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

/**
 * Parse ignore file content.
 * Follows gitignore syntax: `#` comments, blank lines skipped, `!` negates.
 */
export function parseIgnoreFile(content: string): string[] {
  const patterns: string[] = [];

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    patterns.push(trimmed);
  }

  return patterns;
}

/**
 * Load `.strataignore` from the project root.
 * Returns no patterns when the file doesn't exist.
 */
export async function loadIgnoreFile(projectRoot: string): Promise<string[]> {
  const ignorePath = join(projectRoot, IGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return [];
  }

  try {
    return parseIgnoreFile(await readFile(ignorePath));
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to read ${IGNORE_FILENAME}: ${error instanceof Error ? error.message : String(error)}`,
      { path: ignorePath }
    );
  }
}
