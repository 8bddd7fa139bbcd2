/**
 * Progress from the growth of the media file on disk (primary backend)
 * Peers come from peerflix status lines when its output is captured:
 *   info streaming movie.mkv - 2.3MB/s from 12/48 peers
 */

import fs from 'fs';
import { IProgressSource, ProgressReading } from '../../domain/interfaces';
import { getDirSize } from '../../utils/purgeSessionCache';

const PEERS_PATTERN = /from (\d+)\/(\d+) peers/;

export interface FileGrowthOptions {
  // Measured before the media file is known
  downloadDir?: string;
  readOutput?: () => string;
  now?: () => number;
}

export class FileGrowthProgressSource implements IProgressSource {
  readonly kind = 'file-growth' as const;
  private videoPath: string | null = null;
  private lastSize: number | null = null;
  private lastSampleTime = 0;
  private readonly now: () => number;

  constructor(private readonly options: FileGrowthOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  attachMedia(videoPath: string): void {
    if (this.videoPath !== videoPath) {
      this.videoPath = videoPath;
      // Directory totals and file sizes are not comparable
      this.lastSize = null;
    }
  }

  async read(): Promise<ProgressReading> {
    const reading: ProgressReading = {};
    const size = await this.currentSize();
    const sampledAt = this.now();

    if (size !== null) {
      reading.bytesDownloaded = size;

      if (this.lastSize !== null && sampledAt > this.lastSampleTime) {
        const seconds = (sampledAt - this.lastSampleTime) / 1000;
        reading.rateBps = Math.max(0, (size - this.lastSize) / seconds);
      }

      this.lastSize = size;
      this.lastSampleTime = sampledAt;
    }

    if (this.options.readOutput) {
      Object.assign(reading, parsePeerLine(this.options.readOutput()));
    }

    return reading;
  }

  private async currentSize(): Promise<number | null> {
    if (this.videoPath !== null) {
      try {
        return (await fs.promises.stat(this.videoPath)).size;
      } catch {
        return null;
      }
    }

    if (this.options.downloadDir) {
      return getDirSize(this.options.downloadDir).size;
    }

    return null;
  }
}

/**
 * Peers from the most recent peerflix status line
 */
export function parsePeerLine(output: string): Pick<ProgressReading, 'peersConnected' | 'peersTotal'> {
  const lines = output.split(/[\r\n]+/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const match = PEERS_PATTERN.exec(lines[i]);
    if (match) {
      return { peersConnected: parseInt(match[1], 10), peersTotal: parseInt(match[2], 10) };
    }
  }
  return {};
}
