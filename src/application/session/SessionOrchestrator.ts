/**
 * Runs one streaming session end to end
 *
 * source -> backend -> first bytes -> media -> buffer target -> READY
 *        -> player (fresh or splash transition) -> player exit -> cleanup
 *
 * The orchestrator is the only writer of SessionState. Every wait honours the
 * session's AbortSignal and every exit path goes through cleanup().
 */

import { randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import config from '../../config';
import {
  BackendKind,
  MediaAsset,
  PlayerKind,
  SessionContext,
  SessionExitCode,
  SessionOptions,
  SessionResult,
  SessionState,
  SplashTarget
} from '../../domain/entities';
import { SessionError, SessionErrorCode, isCancellation, isSessionError } from '../../domain/errors/SessionError';
import { ILogger, IMediaProbe, IPlayerControlChannel, IProcessLauncher, IProgressSource } from '../../domain/interfaces';
import { cacheKeyFor, normalizeTorrentSource, parseTorrentSource } from '../../domain/value-objects/TorrentSourceParser';
import { ActiveBackend, ClientSupervisor, ClientSupervisorOptions, OverrideFactory } from '../../infrastructure/backend/ClientSupervisor';
import { MediaLocator } from '../../infrastructure/backend/MediaLocator';
import { BufferTargetCalculator } from '../../infrastructure/buffer/BufferTargetCalculator';
import { ControlChannelFactory, PlayerBridge, PlayerBridgeOptions, PlayerHandle } from '../../infrastructure/player/PlayerBridge';
import { windowTitle } from '../../infrastructure/player/PlayerArgs';
import { detectPlayer } from '../../infrastructure/player/PlayerDetector';
import { SplashOverlayLoop } from '../../infrastructure/player/SplashOverlayLoop';
import { FileGrowthProgressSource } from '../../infrastructure/progress/FileGrowthProgressSource';
import { ProgressMonitor } from '../../infrastructure/progress/ProgressMonitor';
import { StatusRecord } from '../../infrastructure/progress/StatusRecord';
import { TextLogProgressSource } from '../../infrastructure/progress/TextLogProgressSource';
import { sleep } from '../../utils/poll';
import { purgeSessionCache } from '../../utils/purgeSessionCache';

export interface SessionDependencies {
  launcher: IProcessLauncher;
  mediaProbe: IMediaProbe;
  createChannel: ControlChannelFactory;
  logger: ILogger;
  createOverride?: OverrideFactory;
  fileExists?: (filePath: string) => boolean;
}

export interface OrchestratorOptions {
  cacheRoot: string;
  runtimeDir: string;
  statusFile: string;
  appTitle: string;
  trackers: readonly string[];
  sampleIntervalMs: number;
  bufferTimeoutMs: number;
  playerWatchTimeoutMs: number;
  analysisBytes: number;
  reprobeBytes: number;
  supervisor: Partial<ClientSupervisorOptions>;
  player: Partial<PlayerBridgeOptions>;
}

const DEFAULT_OPTIONS: OrchestratorOptions = {
  cacheRoot: config.CACHE_DIR,
  runtimeDir: config.RUNTIME_DIR,
  statusFile: path.join(config.RUNTIME_DIR, 'buffer.status'),
  appTitle: config.APP_TITLE,
  trackers: config.PUBLIC_TRACKERS,
  sampleIntervalMs: config.SAMPLE_INTERVAL,
  bufferTimeoutMs: config.BUFFER_TIMEOUT,
  playerWatchTimeoutMs: config.PLAYER_WATCH_TIMEOUT,
  analysisBytes: config.ANALYSIS_BYTES,
  reprobeBytes: config.REPROBE_BYTES,
  supervisor: {},
  player: {}
};

export type StateListener = (state: SessionState) => void;

export class SessionOrchestrator {
  private currentState: SessionState = SessionState.IDLE;
  private readonly abort = new AbortController();
  private readonly options: OrchestratorOptions;
  private readonly bridge: PlayerBridge;
  private readonly calculator: BufferTargetCalculator;
  private readonly listeners: StateListener[] = [];

  private started = false;
  private cleanupPromise: Promise<void> | null = null;
  private statusRecord: StatusRecord | null = null;
  private supervisor: ClientSupervisor | null = null;
  private monitor: ProgressMonitor | null = null;
  private overlay: SplashOverlayLoop | null = null;
  private overlayChannel: IPlayerControlChannel | null = null;
  private attaching = false;
  private player: PlayerHandle | null = null;
  // Splash window opened by this session from an image
  private ownedSplash: SplashTarget | null = null;

  constructor(
    private readonly deps: SessionDependencies,
    options: Partial<OrchestratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.bridge = new PlayerBridge(deps.launcher, deps.createChannel, deps.logger, {
      socketDir: this.options.runtimeDir,
      appTitle: this.options.appTitle,
      ...this.options.player
    });
    this.calculator = new BufferTargetCalculator(deps.mediaProbe);
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Latest progress published by this session, for status endpoints
   */
  get status(): StatusRecord | null {
    return this.statusRecord;
  }

  onStateChange(listener: StateListener): void {
    this.listeners.push(listener);
  }

  /**
   * Aborts every wait. start() then cleans up and resolves.
   */
  cancel(): void {
    if (!this.abort.signal.aborted) {
      this.deps.logger.info('Cancelling session...');
      this.abort.abort();
    }
  }

  async start(rawSource: string, sessionOptions: SessionOptions): Promise<SessionResult> {
    if (this.started) {
      throw new Error('A session orchestrator runs a single session');
    }
    this.started = true;

    try {
      const context = await this.prepare(rawSource, sessionOptions);
      const exitCode = await this.run(context);
      return { exitCode, state: this.currentState };
    } catch (error) {
      return this.toResult(error);
    } finally {
      await this.cleanup();
    }
  }

  /**
   * Idempotent, shared by every exit path
   */
  cleanup(): Promise<void> {
    if (!this.cleanupPromise) {
      this.cleanupPromise = this.performCleanup();
    }
    return this.cleanupPromise;
  }

  private async prepare(rawSource: string, sessionOptions: SessionOptions): Promise<SessionContext> {
    const { logger } = this.deps;
    const parsed = parseTorrentSource(rawSource, this.deps.fileExists ?? fs.existsSync);
    if (!parsed.success) {
      throw new SessionError(SessionErrorCode.INVALID_SOURCE, parsed.message, {
        remediation: ['Pass a magnet link (magnet:?xt=urn:btih:...) or a path to a .torrent file']
      });
    }

    const source = parsed.value;
    const key = cacheKeyFor(source);
    const cacheDir = path.join(this.options.cacheRoot, key);

    this.statusRecord = new StatusRecord(logger, this.options.statusFile);

    await purgeSessionCache(this.options.cacheRoot, key, logger);

    const context: SessionContext = {
      sessionId: randomUUID(),
      source,
      normalizedSource: normalizeTorrentSource(source, this.options.trackers),
      options: sessionOptions,
      startedAt: Date.now(),
      cacheDir,
      statusRecord: this.statusRecord,
      signal: this.abort.signal
    };

    logger.info(`Session ${context.sessionId} for ${source.kind} ${key.slice(0, 8)}...`);
    return context;
  }

  private async run(context: SessionContext): Promise<SessionExitCode> {
    const { logger } = this.deps;
    const player = this.resolvePlayer(context.options.preferredPlayer);
    const splash = await this.resolveSplash(context);

    const supervisor = new ClientSupervisor(
      this.deps.launcher,
      new MediaLocator(),
      logger,
      this.options.supervisor,
      (state) => this.mirrorSupervisorState(state),
      this.deps.createOverride
    );
    this.supervisor = supervisor;

    const backend = await supervisor.launch(context);
    const progressSource = this.createProgressSource(backend, context);
    const monitor = new ProgressMonitor(context.statusRecord, logger, { analysisBytes: this.options.analysisBytes });
    this.monitor = monitor;

    if (splash) {
      this.overlayChannel = this.deps.createChannel(splash.socketPath);
      this.overlay = new SplashOverlayLoop(
        this.overlayChannel,
        context.statusRecord,
        context.options.movieTitle,
        logger
      );
      this.overlay.start();
    }

    await this.withSampling(monitor, progressSource, context.signal, () => supervisor.waitForFirstBytes(context));
    const asset = await this.withSampling(monitor, progressSource, context.signal, () => supervisor.locateMedia(context));
    progressSource.attachMedia(asset.videoPath);

    this.setState(SessionState.BUFFERING);
    await this.bufferUntilReady(monitor, progressSource, asset, context.signal);
    this.setState(SessionState.READY);

    // The replace sequence must not interleave with OSD updates
    await this.stopOverlay();

    this.attaching = true;
    this.player = await this.bridge.attach(
      asset,
      { player, title: windowTitle(this.options.appTitle, context.options.movieTitle), splash: splash ?? undefined },
      context.signal
    );
    monitor.markPlaying();
    this.setState(SessionState.PLAYING);

    const exit = await this.player.waitForExit(context.signal, this.options.playerWatchTimeoutMs);
    if (exit.reason === 'timeout') {
      logger.warn('Player watch timed out, stopping the download');
      this.setState(SessionState.COMPLETED);
      return SessionExitCode.RETURN_TO_CATALOG;
    }

    this.setState(SessionState.COMPLETED);
    if (exit.signal !== null || (exit.code !== null && exit.code !== 0)) {
      logger.info(`Player ended abnormally (${exit.signal ?? `code ${exit.code}`})`);
      return SessionExitCode.RETURN_TO_CATALOG;
    }

    logger.info('Player closed');
    return SessionExitCode.COMPLETED;
  }

  private resolvePlayer(preferred?: PlayerKind): PlayerKind {
    const player = detectPlayer(this.deps.launcher, preferred);
    if (player === null) {
      throw new SessionError(SessionErrorCode.PLAYER_ATTACH_FAILED, 'No supported video player found', {
        remediation: ['Install mpv (recommended) or vlc']
      });
    }
    if (preferred && player !== preferred) {
      this.deps.logger.warn(`${preferred} is not installed, using ${player}`);
    }
    return player;
  }

  private async resolveSplash(context: SessionContext): Promise<SplashTarget | null> {
    if (context.options.splash) {
      return context.options.splash;
    }
    if (!context.options.splashImage) {
      return null;
    }

    try {
      this.ownedSplash = await this.bridge.launchSplash(
        context.options.splashImage,
        context.options.movieTitle,
        context.signal
      );
      return this.ownedSplash;
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      // Playback still works without the splash window
      this.deps.logger.warn('Splash screen unavailable:', error instanceof Error ? error.message : error);
      return null;
    }
  }

  private createProgressSource(backend: ActiveBackend, context: SessionContext): IProgressSource {
    const readOutput = (): string => backend.process.output();
    if (backend.kind === BackendKind.FALLBACK) {
      return new TextLogProgressSource(readOutput);
    }
    return new FileGrowthProgressSource({ downloadDir: context.cacheDir, readOutput });
  }

  private async bufferUntilReady(
    monitor: ProgressMonitor,
    source: IProgressSource,
    asset: MediaAsset,
    signal: AbortSignal
  ): Promise<void> {
    const deadline = Date.now() + this.options.bufferTimeoutMs;
    let reprobed = false;

    for (;;) {
      const snapshot = await monitor.sample(source);

      if (monitor.bufferTarget === null && snapshot.bytesDownloaded >= this.options.analysisBytes) {
        monitor.setTarget(await this.calculator.estimate(asset.videoPath, snapshot.downloadRateBps));
      } else if (!reprobed && monitor.canWiden() && snapshot.bytesDownloaded >= this.options.reprobeBytes) {
        reprobed = true;
        monitor.widenTarget(await this.calculator.estimate(asset.videoPath, snapshot.downloadRateBps));
      }

      if (monitor.state === 'READY') {
        return;
      }

      if (Date.now() >= deadline) {
        monitor.forceReady();
        return;
      }

      await sleep(this.options.sampleIntervalMs, signal);
    }
  }

  /**
   * Keeps progress flowing while a supervisor wait is in flight
   */
  private async withSampling<T>(
    monitor: ProgressMonitor,
    source: IProgressSource,
    signal: AbortSignal,
    work: () => Promise<T>
  ): Promise<T> {
    const ticker = new AbortController();
    const stopTicker = (): void => ticker.abort();
    signal.addEventListener('abort', stopTicker, { once: true });

    const sampling = (async () => {
      try {
        while (!ticker.signal.aborted) {
          await monitor.sample(source);
          await sleep(this.options.sampleIntervalMs, ticker.signal);
        }
      } catch (error) {
        if (!isCancellation(error)) {
          this.deps.logger.debug('Progress sampling stopped:', error);
        }
      }
    })();

    try {
      return await work();
    } finally {
      ticker.abort();
      signal.removeEventListener('abort', stopTicker);
      await sampling;
    }
  }

  private mirrorSupervisorState(state: SessionState): void {
    // Media located is not playback readiness, buffering follows
    if (state !== SessionState.READY) {
      this.setState(state);
    }
  }

  private setState(state: SessionState): void {
    if (this.currentState === state) {
      return;
    }
    this.deps.logger.debug(`Session state: ${this.currentState} -> ${state}`);
    this.currentState = state;
    for (const listener of this.listeners) {
      listener(state);
    }
  }

  private toResult(error: unknown): SessionResult {
    const { logger } = this.deps;
    const playing = this.currentState === SessionState.PLAYING;

    if (isCancellation(error)) {
      this.setState(SessionState.CANCELLED);
      return {
        exitCode: playing ? SessionExitCode.RETURN_TO_CATALOG : SessionExitCode.INTERRUPTED,
        state: SessionState.CANCELLED
      };
    }

    const sessionError = isSessionError(error)
      ? error
      : new SessionError(SessionErrorCode.BACKEND_DIED, error instanceof Error ? error.message : String(error), { cause: error });

    this.setState(SessionState.FAILED);
    this.monitor?.markFailed();

    logger.error(`Session failed: ${sessionError.message}`);
    for (const line of sessionError.diagnostics) {
      logger.warn(`  ${line}`);
    }

    return {
      exitCode: this.attaching && sessionError.code === SessionErrorCode.PLAYER_ATTACH_FAILED
        ? SessionExitCode.FAILED_TO_START
        : SessionExitCode.FATAL,
      state: SessionState.FAILED,
      error: sessionError
    };
  }

  private async stopOverlay(): Promise<void> {
    const overlay = this.overlay;
    const channel = this.overlayChannel;
    this.overlay = null;
    this.overlayChannel = null;
    if (overlay) {
      await overlay.stop();
    }
    if (channel) {
      await channel.close();
    }
  }

  private async performCleanup(): Promise<void> {
    const { logger } = this.deps;
    const steps: Array<[string, () => Promise<void>]> = [
      ['stop overlay', () => this.stopOverlay()],
      ['stop backend', async () => { await this.supervisor?.shutdown(); }],
      ['stop player', () => this.stopPlayer()],
      ['clear status', async () => { await this.statusRecord?.clear(); }],
      ['remove captured output', () => this.removeOutputFiles()]
    ];

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        logger.warn(`Cleanup step "${name}" failed:`, error);
      }
    }
  }

  /**
   * Players survive a normal session end, not a cancelled or failed one
   */
  private async stopPlayer(): Promise<void> {
    const interrupted = this.currentState === SessionState.CANCELLED || this.currentState === SessionState.FAILED;
    if (!interrupted) {
      return;
    }

    if (this.player && this.player.owned && this.player.isAlive()) {
      await this.player.terminate();
    } else if (!this.player && this.ownedSplash?.pid !== undefined) {
      this.deps.launcher.kill(this.ownedSplash.pid, 'SIGTERM');
    }
  }

  private async removeOutputFiles(): Promise<void> {
    const files = this.supervisor?.outputFiles ?? [];
    await Promise.all(files.map((file) => fs.promises.rm(file, { force: true })));
  }
}
