/**
 * File system operations used by rule sources and the config loader.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';
import { SystemError, ErrorCodes } from './errors.js';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SystemError(
      ErrorCodes.READ_ERROR,
      `Failed to read file: ${filePath}`,
      { filePath, error: error instanceof Error ? error.message : String(error) }
    );
  }
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Find files matching glob patterns, relative to `cwd` unless `absolute` is set.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  const files = await fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? false,
    onlyFiles: true,
    dot: true,
  });
  return files.sort();
}

/**
 * Convert a file path relative to `root` into a slash-delimited rule path.
 */
export function toRulePath(root: string, filePath: string): string {
  const relative = path.isAbsolute(filePath) ? path.relative(root, filePath) : filePath;
  return relative.split(path.sep).join('/');
}
