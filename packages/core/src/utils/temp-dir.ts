/**
 * Scoped temporary directories
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger, Logger } from './logger';

const defaultLogger = createLogger('TempDir');

/**
 * Create a fresh directory under `parent`, run `body` with it and remove the
 * directory afterwards on every exit path.
 *
 * When `body` throws, its error is what the caller sees; a failing removal is
 * only logged. When `body` succeeds, a failing removal is thrown.
 */
export async function withTempDir<T>(
  parent: string,
  prefix: string,
  body: (dir: string) => Promise<T>,
  logger: Logger = defaultLogger
): Promise<T> {
  await fs.mkdir(parent, { recursive: true });
  const dir = await fs.mkdtemp(path.join(parent, prefix));
  logger.debug('Created temp dir', { dir });

  let result: T;
  try {
    result = await body(dir);
  } catch (error) {
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (cleanupError) {
      logger.error('Failed to remove temp dir after error', { dir, error: cleanupError });
    }
    throw error;
  }

  await fs.rm(dir, { recursive: true, force: true });
  logger.debug('Removed temp dir', { dir });
  return result;
}
