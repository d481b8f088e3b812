import { promises as fs, constants as fsConstants } from 'fs';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

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
 * Read a file as text. The system error text is kept in the message.
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FileSystemError(`cannot open ${path}: ${reason}`, { path, reason });
  }
}

/**
 * `<device>:<inode>` of a path (symlinks followed), or null if it cannot be stat'ed.
 */
export async function statFileIdentity(path: string): Promise<string | null> {
  try {
    const stats = await fs.stat(path, { bigint: true });
    return `${stats.dev}:${stats.ino}`;
  } catch (error) {
    logger.debug(`stat failed: ${path}`, { error: error instanceof Error ? error.message : String(error) });
    return null;
  }
}
