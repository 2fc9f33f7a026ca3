/**
 * File system access for scanning sources and reading config.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';
import { ErrorCodes, SystemError } from './errors.js';

const DEFAULT_IGNORE = ['**/node_modules/**', '**/dist/**'];

/**
 * Read a UTF-8 file.
 * @throws SystemError (FILE_READ_ERROR) when the file cannot be read
 */
export async function readFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_READ_ERROR,
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { filePath }
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
 * Files matching any of `patterns`, de-duplicated and sorted so
 * descriptors come out in the same order on every run.
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
    cwd: options.cwd ?? process.cwd(),
    ignore: options.ignore ?? DEFAULT_IGNORE,
    absolute: options.absolute ?? true,
    onlyFiles: true,
    unique: true,
  });
  return files.sort();
}
