/**
 * Progress from the fallback backend's captured output
 *
 * transmission-cli rewrites one status line in place:
 *   Progress: 18.0%, dl from 18 of 49 peers (1.38 MB/s), ul to 0 (0 kB/s) [0.00]
 */

import fs from 'fs';
import { IProgressSource, ProgressReading } from '../../domain/interfaces';
import { ByteFormatter } from '../../utils/ByteFormatter';

const PERCENT_PATTERN = /Progress:\s*(\d+(?:\.\d+)?)%/;
const PEERS_PATTERN = /dl from (\d+) of (\d+) peers/;
const RATE_PATTERN = /\((\d+(?:\.\d+)?\s*[kmg]?i?b\/s)\)/i;

export class TextLogProgressSource implements IProgressSource {
  readonly kind = 'text-log' as const;
  private videoPath: string | null = null;

  constructor(private readonly readOutput: () => string) { }

  attachMedia(videoPath: string): void {
    this.videoPath = videoPath;
  }

  async read(): Promise<ProgressReading> {
    const reading = parseProgressLine(lastProgressLine(this.readOutput()));

    if (this.videoPath !== null) {
      reading.bytesDownloaded = await fs.promises.stat(this.videoPath).then(
        (stats) => stats.size,
        // Not materialized yet
        () => undefined
      );
    }

    return reading;
  }
}

export function lastProgressLine(output: string): string | null {
  const lines = output.split(/[\r\n]+/);
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].includes('Progress:')) {
      return lines[i];
    }
  }
  return null;
}

/**
 * Every field is optional, a partial line yields a partial reading
 */
export function parseProgressLine(line: string | null): ProgressReading {
  const reading: ProgressReading = {};
  if (line === null) {
    return reading;
  }

  const percent = PERCENT_PATTERN.exec(line);
  if (percent) {
    reading.percent = parseFloat(percent[1]);
  }

  const peers = PEERS_PATTERN.exec(line);
  if (peers) {
    reading.peersConnected = parseInt(peers[1], 10);
    reading.peersTotal = parseInt(peers[2], 10);
  }

  const rate = RATE_PATTERN.exec(line);
  if (rate) {
    const bytes = ByteFormatter.parse(rate[1]);
    if (bytes !== null) {
      reading.rateBps = bytes;
    }
  }

  return reading;
}
