/**
 * Supervises the download backend for one session
 *
 * IDLE -> LAUNCHING_PRIMARY -> DOWNLOADING -> [LAUNCHING_FALLBACK] -> LOCATING_MEDIA -> READY
 *
 * The primary (peerflix) streams over HTTP. When it dies inside the grace
 * window the supervisor switches, once, to the fallback (transmission-cli),
 * which only writes to the download directory. A fatal signature in its
 * output only labels that exit.
 */

import fs from 'fs';
import path from 'path';
import config from '../../config';
import { BackendKind, MediaAsset, SessionContext, SessionState } from '../../domain/entities';
import { SessionError, SessionErrorCode, isCancellation } from '../../domain/errors/SessionError';
import { ILogger, IManagedProcess, IProcessLauncher, ProcessExit } from '../../domain/interfaces';
import { pollUntil, sleep } from '../../utils/poll';
import { getDirSize, purgeSessionCache } from '../../utils/purgeSessionCache';
import { findFatalSignature } from './FatalSignatures';
import { MediaLocator } from './MediaLocator';
import { ScopedOverride, TransmissionConfigOverride } from './TransmissionConfigOverride';

export interface ClientSupervisorOptions {
  primaryBin: string;
  fallbackBin: string;
  streamPort: number;
  transmissionConfigDir: string;
  // Where captured backend output is written
  outputDir: string;
  gracePeriodMs: number;
  firstByteTimeoutMs: number;
  mediaLocateTimeoutMs: number;
  pollIntervalMs: number;
  killGraceMs: number;
}

export const DEFAULT_SUPERVISOR_OPTIONS: ClientSupervisorOptions = {
  primaryBin: config.PRIMARY_BACKEND_BIN,
  fallbackBin: config.FALLBACK_BACKEND_BIN,
  streamPort: config.PRIMARY_STREAM_PORT,
  transmissionConfigDir: config.TRANSMISSION_CONFIG_DIR,
  outputDir: config.RUNTIME_DIR,
  gracePeriodMs: config.LAUNCH_GRACE_PERIOD,
  firstByteTimeoutMs: config.FIRST_BYTE_TIMEOUT,
  mediaLocateTimeoutMs: config.MEDIA_LOCATE_TIMEOUT,
  pollIntervalMs: config.MEDIA_POLL_INTERVAL,
  killGraceMs: config.KILL_GRACE_PERIOD
};

export type SupervisorState =
  | SessionState.IDLE
  | SessionState.LAUNCHING_PRIMARY
  | SessionState.DOWNLOADING
  | SessionState.LAUNCHING_FALLBACK
  | SessionState.LOCATING_MEDIA
  | SessionState.READY
  | SessionState.FAILED;

export interface ActiveBackend {
  kind: BackendKind;
  process: IManagedProcess;
  outputFile: string;
  // Only the primary serves HTTP
  streamUrl?: string;
}

export type TransitionListener = (state: SupervisorState) => void;

/**
 * Builds a config override for the fallback's download directory
 */
export type OverrideFactory = (configDir: string, downloadDir: string) => ScopedOverride;

export class ClientSupervisor {
  private currentState: SupervisorState = SessionState.IDLE;
  private active: ActiveBackend | null = null;
  private override: ScopedOverride | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private readonly captured: string[] = [];
  private readonly options: ClientSupervisorOptions;
  private readonly createOverride: OverrideFactory;

  constructor(
    private readonly launcher: IProcessLauncher,
    private readonly locator: MediaLocator,
    private readonly logger: ILogger,
    options: Partial<ClientSupervisorOptions> = {},
    private readonly onTransition: TransitionListener = () => { },
    createOverride?: OverrideFactory
  ) {
    this.options = { ...DEFAULT_SUPERVISOR_OPTIONS, ...options };
    this.createOverride =
      createOverride ?? ((configDir, downloadDir) => new TransmissionConfigOverride(configDir, downloadDir, logger));
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get backend(): ActiveBackend | null {
    return this.active;
  }

  /**
   * Files holding captured backend output, for removal at cleanup
   */
  get outputFiles(): readonly string[] {
    return this.captured;
  }

  /**
   * Starts the primary and falls back once if it fails early
   */
  async launch(context: SessionContext): Promise<ActiveBackend> {
    try {
      return await this.launchBackends(context);
    } catch (error) {
      throw await this.fail(error);
    }
  }

  /**
   * Resolves once the download directory holds any data
   */
  async waitForFirstBytes(context: SessionContext): Promise<number> {
    try {
      const size = await pollUntil(
        () => {
          this.assertBackendAlive();
          const { size: bytes } = getDirSize(context.cacheDir);
          return bytes > 0 ? bytes : null;
        },
        {
          intervalMs: this.options.pollIntervalMs,
          timeoutMs: this.options.firstByteTimeoutMs,
          signal: context.signal
        }
      );

      if (size === null) {
        throw new SessionError(
          SessionErrorCode.FIRST_BYTE_TIMEOUT,
          `No data received within ${Math.round(this.options.firstByteTimeoutMs / 1000)}s`,
          {
            remediation: [
              'The torrent may have no active seeders, try another source',
              'Check that your network allows BitTorrent traffic'
            ],
            diagnostics: this.outputTail()
          }
        );
      }

      this.logger.info(`First bytes received (${size} bytes)`);
      return size;
    } catch (error) {
      throw await this.fail(error);
    }
  }

  /**
   * Polls the download directory until the video file appears
   */
  async locateMedia(context: SessionContext): Promise<MediaAsset> {
    try {
      this.transition(SessionState.LOCATING_MEDIA);

      const asset = await pollUntil(
        () => {
          this.assertBackendAlive();
          return this.locator.find(context.cacheDir, context.startedAt, context.options.enableSubtitles);
        },
        {
          intervalMs: this.options.pollIntervalMs,
          timeoutMs: this.options.mediaLocateTimeoutMs,
          signal: context.signal
        }
      );

      if (asset === null) {
        throw new SessionError(
          SessionErrorCode.MEDIA_NOT_FOUND,
          `No video file found in ${context.cacheDir}`,
          {
            remediation: ['The torrent may not contain a supported video file'],
            diagnostics: this.locator.describe(context.cacheDir)
          }
        );
      }

      if (this.active?.streamUrl) {
        asset.streamUrl = this.active.streamUrl;
      }

      this.logger.info(`Media located: ${path.basename(asset.videoPath)}`);
      if (asset.subtitlePath) {
        this.logger.info(`Subtitle found: ${path.basename(asset.subtitlePath)}`);
      }

      this.transition(SessionState.READY);
      return asset;
    } catch (error) {
      throw await this.fail(error);
    }
  }

  /**
   * Stops the backend and restores overridden config. Idempotent.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown();
    }
    return this.shutdownPromise;
  }

  /**
   * Runs the primary's interactive file listing on the user's terminal
   * @returns The listing's exit code
   */
  async listFiles(source: string): Promise<number | null> {
    const child = this.launcher.spawn(this.options.primaryBin, [source, '--list'], { inheritStdio: true });
    const exit = await child.exitPromise;
    if (exit.error) {
      throw new SessionError(SessionErrorCode.BACKEND_LAUNCH_FAILED, `Failed to run ${this.options.primaryBin}`, {
        remediation: [`Install ${this.options.primaryBin} (npm install -g peerflix)`],
        cause: exit.error
      });
    }
    return exit.code;
  }

  private async launchBackends(context: SessionContext): Promise<ActiveBackend> {
    this.transition(SessionState.LAUNCHING_PRIMARY);
    await fs.promises.mkdir(context.cacheDir, { recursive: true });

    const primary = this.spawnBackend(context, BackendKind.PRIMARY, this.options.primaryBin, this.primaryArgs(context));
    const primaryFailure = await this.watchLaunch(primary.process, context.signal);

    if (primaryFailure === null) {
      primary.streamUrl = `http://localhost:${this.options.streamPort}/`;
      this.active = primary;
      this.transition(SessionState.DOWNLOADING);
      this.logger.info(`Streaming with ${this.options.primaryBin} (pid ${primary.process.pid ?? 'unknown'})`);
      return primary;
    }

    this.logger.warn(`${this.options.primaryBin} failed: ${primaryFailure}, switching to ${this.options.fallbackBin}`);
    const primaryOutput = tail(primary.process.output());
    await primary.process.terminate(this.options.killGraceMs);

    return this.launchFallback(context, primaryOutput);
  }

  private async launchFallback(context: SessionContext, primaryOutput: string[]): Promise<ActiveBackend> {
    this.transition(SessionState.LAUNCHING_FALLBACK);

    if (!this.launcher.isAvailable(this.options.fallbackBin)) {
      throw new SessionError(
        SessionErrorCode.BACKEND_LAUNCH_FAILED,
        `${this.options.primaryBin} failed and ${this.options.fallbackBin} is not installed`,
        {
          remediation: [
            `Install ${this.options.fallbackBin} (brew install transmission-cli, or apt install transmission-cli)`
          ],
          diagnostics: primaryOutput
        }
      );
    }

    // The primary may have left partial data behind
    await purgeSessionCache(path.dirname(context.cacheDir), path.basename(context.cacheDir), this.logger);
    await fs.promises.mkdir(context.cacheDir, { recursive: true });

    this.override = this.createOverride(this.options.transmissionConfigDir, context.cacheDir);
    await this.override.apply();

    const fallback = this.spawnBackend(context, BackendKind.FALLBACK, this.options.fallbackBin, [
      '--config-dir', this.options.transmissionConfigDir,
      '--download-dir', context.cacheDir,
      context.normalizedSource
    ]);

    const fallbackFailure = await this.watchLaunch(fallback.process, context.signal);
    if (fallbackFailure !== null) {
      throw new SessionError(
        SessionErrorCode.BACKEND_LAUNCH_FAILED,
        `Both backends failed to start (${this.options.fallbackBin}: ${fallbackFailure})`,
        {
          remediation: ['Check that the magnet link or torrent file is valid'],
          diagnostics: [...primaryOutput, ...tail(fallback.process.output())]
        }
      );
    }

    this.active = fallback;
    this.transition(SessionState.DOWNLOADING);
    this.logger.info(`Downloading with ${this.options.fallbackBin} (pid ${fallback.process.pid ?? 'unknown'})`);
    return fallback;
  }

  private primaryArgs(context: SessionContext): string[] {
    const args = [
      context.normalizedSource,
      '--port', String(this.options.streamPort),
      '--path', context.cacheDir
    ];
    if (context.options.fileIndex !== undefined) {
      args.push('--index', String(context.options.fileIndex));
    }
    args.push('--remove');
    return args;
  }

  private spawnBackend(context: SessionContext, kind: BackendKind, bin: string, args: string[]): ActiveBackend {
    const outputFile = path.join(this.options.outputDir, `${context.sessionId}-${kind}.log`);
    this.captured.push(outputFile);
    const child = this.launcher.spawn(bin, args, { captureOutput: true, outputFile });
    // Tracked before the grace window so cancellation can stop it
    this.active = { kind, process: child, outputFile };
    return this.active;
  }

  /**
   * Waits out the grace window. A backend still running at its end is healthy,
   * whatever it printed.
   * @returns A failure reason, or null when the backend looks healthy
   */
  private async watchLaunch(child: IManagedProcess, signal: AbortSignal): Promise<string | null> {
    const exit = await Promise.race([
      child.exitPromise,
      sleep(this.options.gracePeriodMs, signal).then(() => null)
    ]);

    if (exit === null) {
      return null;
    }

    const signature = findFatalSignature(child.output());
    return signature === null ? describeExit(exit) : `${describeExit(exit)} (fatal output "${signature}")`;
  }

  private assertBackendAlive(): void {
    const exit = this.active?.process.exitInfo;
    if (exit) {
      throw new SessionError(SessionErrorCode.BACKEND_DIED, `Download backend ${describeExit(exit)}`, {
        diagnostics: this.outputTail()
      });
    }
  }

  private outputTail(): string[] {
    return this.active ? tail(this.active.process.output()) : [];
  }

  /**
   * Stops the backend and restores config before the failure propagates
   */
  private async fail(error: unknown): Promise<unknown> {
    if (isCancellation(error)) {
      return error;
    }

    try {
      await this.shutdown();
    } catch (shutdownError) {
      this.logger.warn('Backend cleanup after failure was incomplete:', shutdownError);
    }
    this.transition(SessionState.FAILED);
    return error;
  }

  private transition(state: SupervisorState): void {
    if (this.currentState === state) {
      return;
    }
    this.logger.debug(`Backend state: ${this.currentState} -> ${state}`);
    this.currentState = state;
    this.onTransition(state);
  }

  private async performShutdown(): Promise<void> {
    const backend = this.active;
    try {
      if (backend && !backend.process.exited) {
        this.logger.debug(`Stopping ${backend.process.command}`);
        await backend.process.terminate(this.options.killGraceMs);
      }
    } finally {
      if (this.override) {
        await this.override.release();
      }
    }
  }
}

function describeExit(exit: ProcessExit): string {
  if (exit.error) {
    return `could not start (${exit.error.message})`;
  }
  if (exit.signal) {
    return `was killed by ${exit.signal}`;
  }
  return `exited with code ${exit.code ?? 'unknown'}`;
}

function tail(output: string, lines = 20): string[] {
  return output
    .split(/[\r\n]+/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(-lines);
}
