/**
 * Media inspection port used to size the playback buffer
 */

export interface MediaProbe {
  bitrateBytesPerSec: number | null;
  sizeBytes: number | null;
}

export interface IMediaProbe {
  /**
   * Resolves to null when nothing could be learned about the file
   */
  probe(mediaPath: string): Promise<MediaProbe | null>;
}
