/**
 * Best-effort adapter over a backend's progress signal
 * Parsing misses leave fields undefined, they never throw
 */

export type ProgressSourceKind = 'text-log' | 'file-growth';

export interface ProgressReading {
  // Torrent-level progress reported by the backend itself
  percent?: number;
  bytesDownloaded?: number;
  rateBps?: number;
  peersConnected?: number;
  peersTotal?: number;
}

export interface IProgressSource {
  readonly kind: ProgressSourceKind;

  /**
   * Points the source at the media file once it is known
   */
  attachMedia(videoPath: string): void;

  read(): Promise<ProgressReading>;
}
