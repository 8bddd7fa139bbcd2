/**
 * Finds the playable video (and an optional subtitle) in a download directory
 */

import fs from 'fs';
import path from 'path';
import config from '../../config';
import { MediaAsset } from '../../domain/entities';
import { ByteFormatter } from '../../utils/ByteFormatter';

export interface MediaLocatorOptions {
  videoExtensions: readonly string[];
  // Ordered by preference
  subtitleExtensions: readonly string[];
  minBytes: number;
  // Filesystems with coarse timestamps can report mtimes slightly in the past
  mtimeToleranceMs: number;
}

const DEFAULT_OPTIONS: MediaLocatorOptions = {
  videoExtensions: config.VIDEO_EXTENSIONS,
  subtitleExtensions: config.SUBTITLE_EXTENSIONS,
  minBytes: config.MIN_MEDIA_BYTES,
  mtimeToleranceMs: config.MTIME_TOLERANCE
};

interface FileEntry {
  path: string;
  size: number;
  mtimeMs: number;
}

export class MediaLocator {
  private readonly options: MediaLocatorOptions;

  constructor(options: Partial<MediaLocatorOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Largest video written during this session
   * Files older than the session start are leftovers and never match.
   */
  find(dir: string, sessionStartMs: number, includeSubtitle = true): MediaAsset | null {
    const earliest = sessionStartMs - this.options.mtimeToleranceMs;

    const video = walk(dir)
      .filter((file) => this.isVideo(file.path))
      .filter((file) => file.size >= this.options.minBytes && file.mtimeMs >= earliest)
      .reduce<FileEntry | null>((best, file) => (best === null || file.size > best.size ? file : best), null);

    if (video === null) {
      return null;
    }

    const asset: MediaAsset = { videoPath: video.path };
    if (includeSubtitle) {
      const subtitle = this.findSubtitle(path.dirname(video.path));
      if (subtitle !== null) {
        asset.subtitlePath = subtitle;
      }
    }
    return asset;
  }

  /**
   * First non-empty subtitle beside the video, by extension preference
   */
  findSubtitle(dir: string): string | null {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      return null;
    }

    const names = entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();

    for (const extension of this.options.subtitleExtensions) {
      for (const name of names) {
        if (path.extname(name).toLowerCase() !== extension) {
          continue;
        }
        const candidate = path.join(dir, name);
        if (sizeOf(candidate) > 0) {
          return candidate;
        }
      }
    }

    return null;
  }

  /**
   * Directory listing for diagnostics
   */
  describe(dir: string): string[] {
    const files = walk(dir);
    if (files.length === 0) {
      return [`${dir}: empty or missing`];
    }
    return files.map(
      (file) => `${path.relative(dir, file.path)} (${ByteFormatter.toHumanReadable(file.size)})`
    );
  }

  private isVideo(filePath: string): boolean {
    return this.options.videoExtensions.includes(path.extname(filePath).toLowerCase());
  }
}

function walk(dir: string): FileEntry[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    return [];
  }

  const files: FileEntry[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...walk(fullPath));
    } else if (entry.isFile()) {
      // May be removed between readdir and stat
      const stats = fs.statSync(fullPath, { throwIfNoEntry: false });
      if (stats) {
        files.push({ path: fullPath, size: stats.size, mtimeMs: stats.mtimeMs });
      }
    }
  }
  return files.sort((a, b) => a.path.localeCompare(b.path));
}

function sizeOf(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}
