/**
 * Turns raw progress readings into buffering state
 * Driven by the orchestrator's tick, it never schedules itself
 */

import config from '../../config';
import { BufferTarget, ProgressSnapshot, SnapshotState } from '../../domain/entities';
import { ILogger, IProgressSource, IStatusRecord } from '../../domain/interfaces';
import { ByteFormatter } from '../../utils/ByteFormatter';

export interface ProgressMonitorOptions {
  // Denominator for the percent shown while no target is known
  analysisBytes: number;
  stallFloorBytes: number;
  stallSamples: number;
}

const DEFAULT_OPTIONS: ProgressMonitorOptions = {
  analysisBytes: config.ANALYSIS_BYTES,
  stallFloorBytes: config.STALL_FLOOR_BYTES,
  stallSamples: config.STALL_SAMPLES
};

const EMPTY_SNAPSHOT: ProgressSnapshot = {
  percent: 0,
  bytesDownloaded: 0,
  downloadRateBps: 0,
  peersConnected: 0,
  peersTotal: 0,
  state: 'ANALYZING'
};

export class ProgressMonitor {
  private target: BufferTarget | null = null;
  private widened = false;
  private ready = false;
  private terminal: 'PLAYING' | 'FAILED' | null = null;
  private lastBytes: number | null = null;
  private unchangedStreak = 0;
  private last: ProgressSnapshot = EMPTY_SNAPSHOT;
  private readonly options: ProgressMonitorOptions;

  constructor(
    private readonly statusRecord: IStatusRecord,
    private readonly logger: ILogger,
    options: Partial<ProgressMonitorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get bufferTarget(): BufferTarget | null {
    return this.target;
  }

  get state(): SnapshotState {
    if (this.terminal !== null) {
      return this.terminal;
    }
    if (this.ready) {
      return 'READY';
    }
    return this.target === null ? 'ANALYZING' : 'BUFFERING';
  }

  get latest(): ProgressSnapshot {
    return this.last;
  }

  /**
   * Sets the first target. Later calls are ignored, the target is frozen.
   */
  setTarget(target: BufferTarget): boolean {
    if (this.target !== null) {
      return false;
    }
    this.target = target;
    this.logger.info(
      `Buffer target: ${ByteFormatter.toHumanReadable(target.bytes)} (${target.basis})`
    );
    return true;
  }

  /**
   * Raises a heuristic target once. Bitrate-based targets are final.
   */
  widenTarget(target: BufferTarget): boolean {
    if (this.target === null) {
      return this.setTarget(target);
    }
    if (this.widened || this.target.basis === 'bitrate' || target.bytes <= this.target.bytes) {
      return false;
    }

    this.logger.info(
      `Buffer target widened: ${ByteFormatter.toHumanReadable(this.target.bytes)} -> ` +
      `${ByteFormatter.toHumanReadable(target.bytes)} (${target.basis})`
    );
    this.target = target;
    this.widened = true;
    return true;
  }

  /**
   * Whether a widening probe is still worth running
   */
  canWiden(): boolean {
    return this.target !== null && !this.widened && this.target.basis !== 'bitrate';
  }

  forceReady(): void {
    if (!this.ready) {
      this.logger.warn('Buffer wait expired, starting playback with what is downloaded');
      this.ready = true;
      this.publish({ ...this.last, state: this.state });
    }
  }

  markPlaying(): void {
    this.terminal = 'PLAYING';
    this.publish({ ...this.last, state: 'PLAYING' });
  }

  markFailed(): void {
    this.terminal = 'FAILED';
    this.publish({ ...this.last, state: 'FAILED' });
  }

  async sample(source: IProgressSource): Promise<ProgressSnapshot> {
    const reading = await source.read();
    const bytes = reading.bytesDownloaded ?? this.lastBytes ?? 0;

    this.unchangedStreak = this.lastBytes !== null && bytes === this.lastBytes ? this.unchangedStreak + 1 : 1;
    this.lastBytes = bytes;

    if (!this.ready) {
      if (this.target !== null && bytes >= this.target.bytes) {
        this.ready = true;
      } else if (this.unchangedStreak >= this.options.stallSamples && bytes >= this.options.stallFloorBytes) {
        this.logger.info(
          `Download stalled at ${ByteFormatter.toHumanReadable(bytes)}, treating buffer as ready`
        );
        this.ready = true;
      }
    }

    const snapshot: ProgressSnapshot = {
      percent: this.percentFor(source, reading.percent, bytes),
      bytesDownloaded: bytes,
      downloadRateBps: reading.rateBps ?? 0,
      peersConnected: reading.peersConnected ?? this.last.peersConnected,
      peersTotal: reading.peersTotal ?? this.last.peersTotal,
      state: this.state
    };

    this.publish(snapshot);
    return snapshot;
  }

  private percentFor(source: IProgressSource, reported: number | undefined, bytes: number): number {
    if (source.kind === 'text-log' && reported !== undefined) {
      return reported;
    }
    const denominator = this.target?.bytes ?? this.options.analysisBytes;
    return Math.min(100, (bytes / denominator) * 100);
  }

  private publish(snapshot: ProgressSnapshot): void {
    this.last = snapshot;
    this.statusRecord.publish(snapshot);
  }
}
