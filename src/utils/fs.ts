import { promises as fs, constants as fsConstants } from 'fs';
import { createHash } from 'crypto';
import { dirname, basename, join } from 'path';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Read a file as text, or undefined when it does not exist
 */
export async function readTextFileIfExists(path: string): Promise<string | undefined> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file through a temp file + rename so readers never see a partial write
 */
export async function writeTextFile(path: string, content: string, mode?: number): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(tempPath, content, { encoding: 'utf8', mode });
    await fs.rename(tempPath, path);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Set permission bits on a file
 */
export async function setMode(path: string, mode: number): Promise<void> {
  try {
    await fs.chmod(path, mode);
  } catch (error) {
    throw new FileSystemError(`Failed to set mode on: ${path}`, { path, error });
  }
}

/**
 * List files in a directory (non-recursive), ascending by name
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile())
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * sha256 of text content, hex encoded
 */
export function computeContentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Write `content` unless the file already holds exactly that content.
 * @returns true when the file was written
 */
export async function writeTextFileIfChanged(path: string, content: string, mode?: number): Promise<boolean> {
  const current = await readTextFileIfExists(path);
  if (current !== undefined && computeContentHash(current) === computeContentHash(content)) {
    logger.debug(`Unchanged, skipping write: ${path}`);
    if (mode !== undefined) {
      await setMode(path, mode);
    }
    return false;
  }

  await writeTextFile(path, content, mode);
  if (mode !== undefined) {
    await setMode(path, mode);
  }
  return true;
}
