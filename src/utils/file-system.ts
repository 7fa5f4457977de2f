/**
 * File system operations used by the run and analyze commands.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { SystemError, ErrorCodes } from './errors.js';

/**
 * Read a UTF-8 file, raising a SystemError that names the path when it is missing.
 */
export async function readFile(filePath: string): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File does not exist: ${filePath}`, { filePath });
    }
    throw error;
  }
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Copy a file unless source and destination resolve to the same path.
 * Returns true when a copy was made.
 */
export async function copyFileIfDistinct(from: string, to: string): Promise<boolean> {
  if (path.resolve(from) === path.resolve(to)) {
    return false;
  }
  await ensureDir(path.dirname(to));
  await fs.promises.copyFile(from, to);
  return true;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
