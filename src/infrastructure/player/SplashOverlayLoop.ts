/**
 * Mirrors buffering progress onto the splash player's OSD
 * Runs until the status turns READY (or PLAYING) or until stopped.
 */

import config from '../../config';
import { ProgressSnapshot } from '../../domain/entities';
import { isCancellation } from '../../domain/errors/SessionError';
import { ILogger, IPlayerControlChannel, IStatusRecord } from '../../domain/interfaces';
import { sleep } from '../../utils/poll';

const OSD_DURATION_MS = 1000;

export function formatOverlayText(title: string, snapshot: ProgressSnapshot): string {
  const percent = Math.floor(snapshot.percent);
  const speed = (snapshot.downloadRateBps / (1024 * 1024)).toFixed(1);
  return `${title}\nBuffering: ${percent}% | ${speed} MB/s | ${snapshot.peersConnected}/${snapshot.peersTotal} peers`;
}

export class SplashOverlayLoop {
  private loop: Promise<void> | null = null;
  private readonly abort = new AbortController();
  // Progress text on screen that no clear has replaced yet
  private showing = false;

  constructor(
    private readonly channel: IPlayerControlChannel,
    private readonly statusRecord: IStatusRecord,
    private readonly title: string,
    private readonly logger: ILogger,
    private readonly intervalMs: number = config.OVERLAY_INTERVAL
  ) { }

  get running(): boolean {
    return this.loop !== null && !this.abort.signal.aborted;
  }

  start(): void {
    if (this.loop === null) {
      this.loop = this.run();
    }
  }

  /**
   * Resolves once the loop has fully exited and will send nothing more.
   * Progress text left on the OSD is cleared first.
   */
  async stop(): Promise<void> {
    this.abort.abort();
    if (this.loop !== null) {
      await this.loop;
    }
    if (this.showing) {
      await this.clear();
    }
  }

  private async run(): Promise<void> {
    const signal = this.abort.signal;

    try {
      while (!signal.aborted) {
        const snapshot = this.statusRecord.latest();

        if (snapshot && (snapshot.state === 'READY' || snapshot.state === 'PLAYING')) {
          await this.clear();
          this.logger.debug('Splash overlay finished');
          return;
        }

        if (snapshot && await this.send(['show-text', formatOverlayText(this.title, snapshot), OSD_DURATION_MS])) {
          this.showing = true;
        }

        await sleep(this.intervalMs, signal);
      }
    } catch (error) {
      if (!isCancellation(error)) {
        this.logger.warn('Splash overlay stopped:', error);
      }
    }
  }

  private async clear(): Promise<void> {
    if (await this.send(['show-text', '', 0])) {
      this.showing = false;
    }
  }

  private async send(command: [string, ...Array<string | number>]): Promise<boolean> {
    try {
      await this.channel.send({ command });
      return true;
    } catch (error) {
      // Splash may be busy or gone, the next tick retries
      this.logger.debug('Overlay update failed:', error instanceof Error ? error.message : error);
      return false;
    }
  }
}
