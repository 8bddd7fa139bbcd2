/**
 * Single-slot status record
 * Keeps the latest snapshot in memory and mirrors it to a pipe-delimited file
 * that independent display processes read:
 *
 *   percent|speedBytesPerSec|peersConnected|peersTotal|sizeMB|state
 */

import fs from 'fs';
import path from 'path';
import { ProgressSnapshot, SnapshotState } from '../../domain/entities';
import { ILogger, IStatusRecord } from '../../domain/interfaces';
import { ByteFormatter } from '../../utils/ByteFormatter';

const FILE_STATES: readonly SnapshotState[] = ['ANALYZING', 'BUFFERING', 'READY', 'PLAYING'];

export interface StatusLine {
  percent: number;
  speedBytesPerSec: number;
  peersConnected: number;
  peersTotal: number;
  sizeMB: number;
  state: SnapshotState;
}

export class StatusRecord implements IStatusRecord {
  private current: ProgressSnapshot | null = null;

  constructor(
    private readonly logger: ILogger,
    private readonly filePath: string | null = null
  ) { }

  get path(): string | null {
    return this.filePath;
  }

  publish(snapshot: ProgressSnapshot): void {
    this.current = snapshot;

    // FAILED stays in memory only, readers treat a missing state as failure
    if (this.filePath === null || snapshot.state === 'FAILED') {
      return;
    }

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, `${StatusRecord.format(snapshot)}\n`);
    } catch (error) {
      this.logger.warn(`Failed to write status file ${this.filePath}:`, error);
    }
  }

  latest(): ProgressSnapshot | null {
    return this.current;
  }

  async clear(): Promise<void> {
    if (this.filePath !== null) {
      await fs.promises.rm(this.filePath, { force: true });
    }
  }

  static format(snapshot: ProgressSnapshot): string {
    return [
      Math.floor(snapshot.percent),
      Math.round(snapshot.downloadRateBps),
      snapshot.peersConnected,
      snapshot.peersTotal,
      ByteFormatter.toWholeMB(snapshot.bytesDownloaded),
      snapshot.state
    ].join('|');
  }

  /**
   * Parses a status line, null when it is not a well-formed record
   */
  static parse(line: string): StatusLine | null {
    const fields = line.trim().split('|');
    if (fields.length < 6) {
      return null;
    }

    const numbers = fields.slice(0, 5).map((field) => Number(field));
    if (numbers.some((value) => !Number.isFinite(value))) {
      return null;
    }

    const state = FILE_STATES.find((candidate) => candidate === fields[5]);
    if (state === undefined) {
      return null;
    }

    const [percent, speedBytesPerSec, peersConnected, peersTotal, sizeMB] = numbers;
    return { percent, speedBytesPerSec, peersConnected, peersTotal, sizeMB, state };
  }

  /**
   * Reader side for observers in another process
   */
  static async read(filePath: string): Promise<StatusLine | null> {
    try {
      return StatusRecord.parse(await fs.promises.readFile(filePath, 'utf8'));
    } catch {
      return null;
    }
  }
}
