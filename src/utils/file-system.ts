/**
 * File system access used by discovery and ingestion.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';

export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as raw bytes; decoding is left to the caller.
 */
export async function readFileBytes(filePath: string): Promise<Buffer> {
  return fs.promises.readFile(filePath);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Files under `cwd` matching the patterns, as root-relative paths with
 * forward slashes. Hidden entries and symlinked directories are skipped.
 */
export async function globFiles(
  patterns: string | readonly string[],
  options: { cwd: string; ignore?: readonly string[] }
): Promise<string[]> {
  const found = await fg(typeof patterns === 'string' ? patterns : [...patterns], {
    cwd: options.cwd,
    ignore: [...(options.ignore ?? [])],
    absolute: false,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: false,
  });
  return found.map(toPosixPath);
}

/**
 * Normalize a path to forward slashes.
 */
export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}
