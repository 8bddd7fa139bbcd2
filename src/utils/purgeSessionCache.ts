/**
 * Removes stale download state for one info hash
 * A partially downloaded prior attempt would otherwise look "already complete"
 */

import fs from 'fs';
import path from 'path';
import { ILogger } from '../domain/interfaces/ILogger';

/**
 * Deletes <cacheRoot>/<key> and <cacheRoot>/<key>.torrent
 * @returns Number of bytes freed
 */
export async function purgeSessionCache(cacheRoot: string, key: string, logger: ILogger): Promise<number> {
  const sessionDir = path.join(cacheRoot, key);
  const torrentFile = path.join(cacheRoot, `${key}.torrent`);

  let freed = 0;

  for (const target of [sessionDir, torrentFile]) {
    if (!fs.existsSync(target)) {
      continue;
    }

    try {
      freed += getDirSize(target).size;
      await fs.promises.rm(target, { recursive: true, force: true });
    } catch (error) {
      logger.error(`Failed to purge ${target}:`, error);
      throw new Error(
        `Failed to purge session cache: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  if (freed > 0) {
    logger.info(`🧹 Cleared cache for torrent ${key.slice(0, 8)}... (${(freed / 1024 / 1024).toFixed(2)} MB freed)`);
  } else {
    logger.debug(`No stale cache for torrent ${key.slice(0, 8)}...`);
  }

  return freed;
}

/**
 * Calculate total size of a file or directory recursively
 */
export function getDirSize(targetPath: string): { size: number; files: number } {
  let size = 0;
  let files = 0;

  let stats: fs.Stats;
  try {
    stats = fs.statSync(targetPath);
  } catch {
    return { size, files };
  }

  if (!stats.isDirectory()) {
    return { size: stats.size, files: 1 };
  }

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(targetPath, { withFileTypes: true });
  } catch {
    // Unreadable directory counts as empty
    return { size, files };
  }

  for (const entry of entries) {
    const sub = getDirSize(path.join(targetPath, entry.name));
    size += sub.size;
    files += sub.files;
  }

  return { size, files };
}
