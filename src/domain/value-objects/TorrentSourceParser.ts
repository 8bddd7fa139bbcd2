/**
 * Validation and normalization of the raw torrent source string
 */

import crypto from 'crypto';
import path from 'path';
import { TorrentSource } from '../entities/Session';
import { MagnetLink } from './MagnetLink';

export enum SourceParseError {
  EMPTY = 'EMPTY',
  MISSING_INFO_HASH = 'MISSING_INFO_HASH',
  NOT_FOUND = 'NOT_FOUND'
}

export type SourceParseResult =
  | { success: true; value: TorrentSource }
  | { success: false; error: SourceParseError; message: string };

/**
 * Strips line breaks and surrounding whitespace (pasted links often carry them)
 */
export function cleanSourceInput(raw: string): string {
  return raw.replace(/[\r\n]/g, '').trim();
}

export function parseTorrentSource(raw: string, fileExists: (filePath: string) => boolean): SourceParseResult {
  const cleaned = cleanSourceInput(raw);

  if (cleaned.length === 0) {
    return { success: false, error: SourceParseError.EMPTY, message: 'Torrent source is empty' };
  }

  if (cleaned.toLowerCase().startsWith('magnet:')) {
    const magnet = MagnetLink.parse(cleaned);
    if (!magnet) {
      return {
        success: false,
        error: SourceParseError.MISSING_INFO_HASH,
        message: `Magnet link has no valid btih info hash: '${cleaned}'`
      };
    }
    return { success: true, value: { kind: 'magnet', identifier: cleaned, infoHash: magnet.infoHash } };
  }

  if (!fileExists(cleaned)) {
    return {
      success: false,
      error: SourceParseError.NOT_FOUND,
      message: `Invalid torrent source: '${cleaned}' (expected a magnet link or a path to a .torrent file)`
    };
  }

  return { success: true, value: { kind: 'file', identifier: path.resolve(cleaned) } };
}

/**
 * Form handed to the backends: canonical magnet (with public trackers when it
 * carries none) or the absolute .torrent path
 */
export function normalizeTorrentSource(source: TorrentSource, publicTrackers: readonly string[]): string {
  if (source.kind === 'file') {
    return source.identifier;
  }

  const magnet = MagnetLink.parse(source.identifier);
  if (!magnet) {
    return source.identifier;
  }

  return magnet.hasTrackers() ? magnet.toString() : magnet.withTrackers(publicTrackers).toString();
}

/**
 * Stable key for the session's cache directory
 */
export function cacheKeyFor(source: TorrentSource): string {
  if (source.infoHash) {
    return source.infoHash;
  }
  return crypto.createHash('sha256').update(source.identifier).digest('hex').slice(0, 40);
}
