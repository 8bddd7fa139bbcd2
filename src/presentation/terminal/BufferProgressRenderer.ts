/**
 * Single-line buffering display for the terminal
 *
 *   Buffering [████████░░░░░░░░░░░░] 42%  Down: 1.5 MB/s  S/L: 3/10
 */

import { ProgressSnapshot, SnapshotState } from '../../domain/entities';
import { ByteFormatter } from '../../utils/ByteFormatter';

const BAR_WIDTH = 20;
const FILLED = '█';
const EMPTY = '░';

const STATE_LABELS: Record<SnapshotState, string> = {
  ANALYZING: 'Analyzing',
  BUFFERING: 'Buffering',
  READY: 'Ready',
  PLAYING: 'Playing',
  FAILED: 'Failed'
};

export interface ProgressOutput {
  readonly isTTY?: boolean;
  write(chunk: string): boolean;
}

export function renderBar(percent: number, width: number = BAR_WIDTH): string {
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.floor((clamped / 100) * width);
  return `[${FILLED.repeat(filled)}${EMPTY.repeat(width - filled)}] ${Math.floor(clamped)}%`;
}

export function renderStats(snapshot: ProgressSnapshot): string {
  const rate = ByteFormatter.toRate(snapshot.downloadRateBps) || '--';
  return `Down: ${rate}  S/L: ${snapshot.peersConnected}/${snapshot.peersTotal}`;
}

export function renderLine(snapshot: ProgressSnapshot): string {
  return `${STATE_LABELS[snapshot.state]} ${renderBar(snapshot.percent)}  ${renderStats(snapshot)}`;
}

export class BufferProgressRenderer {
  private lastLength = 0;
  private active = false;

  constructor(private readonly output: ProgressOutput = process.stderr) { }

  /**
   * Redraws the line in place on a TTY, appends a line otherwise
   */
  render(snapshot: ProgressSnapshot): void {
    const line = renderLine(snapshot);

    if (!this.output.isTTY) {
      this.output.write(`${line}\n`);
      return;
    }

    const padding = ' '.repeat(Math.max(0, this.lastLength - line.length));
    this.output.write(`\r${line}${padding}`);
    this.lastLength = line.length;
    this.active = true;
  }

  /**
   * Moves past the progress line so later output starts on a fresh line
   */
  finish(): void {
    if (this.active) {
      this.output.write('\n');
      this.active = false;
      this.lastLength = 0;
    }
  }
}
