/**
 * Starts playback, either in a fresh player process or by transitioning an
 * already running mpv splash window over its IPC socket.
 */

import fs from 'fs';
import path from 'path';
import config from '../../config';
import { MediaAsset, PlayerKind, SplashTarget } from '../../domain/entities';
import { SessionError, SessionErrorCode } from '../../domain/errors/SessionError';
import {
  ILogger,
  IManagedProcess,
  IPlayerControlChannel,
  IProcessLauncher,
  PlayerCommand
} from '../../domain/interfaces';
import { pollUntil, sleep } from '../../utils/poll';
import { MPV_CACHE_PROPERTIES, buildPlayerArgs, buildSplashArgs, windowTitle } from './PlayerArgs';
import { playerBinary } from './PlayerDetector';
import { findSocketOwner } from './SocketOwnerLookup';

export type PlayerMode = 'fresh' | 'splash';

export interface PlayerExit {
  reason: 'exited' | 'timeout';
  // Unknown for players this session did not start
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface PlayerHandle {
  readonly pid: number;
  readonly mode: PlayerMode;
  // Whether this process started the player
  readonly owned: boolean;
  isAlive(): boolean;
  waitForExit(signal: AbortSignal, maxMs: number): Promise<PlayerExit>;
  terminate(): Promise<void>;
}

export interface AttachOptions {
  player: PlayerKind;
  title: string;
  splash?: SplashTarget;
}

export interface PlayerBridgeOptions {
  confirmDelayMs: number;
  commandGapMs: number;
  subtitleSettleMs: number;
  pollIntervalMs: number;
  killGraceMs: number;
  splashSocketTimeoutMs: number;
  socketDir: string;
  appTitle: string;
}

const DEFAULT_OPTIONS: PlayerBridgeOptions = {
  confirmDelayMs: config.PLAYER_CONFIRM_DELAY,
  commandGapMs: config.IPC_COMMAND_GAP,
  subtitleSettleMs: config.SUBTITLE_SETTLE_DELAY,
  pollIntervalMs: config.PLAYER_POLL_INTERVAL,
  killGraceMs: config.KILL_GRACE_PERIOD,
  splashSocketTimeoutMs: config.SPLASH_SOCKET_TIMEOUT,
  socketDir: config.RUNTIME_DIR,
  appTitle: config.APP_TITLE
};

export type ControlChannelFactory = (endpoint: string) => IPlayerControlChannel;

/**
 * Handle over a process this session spawned
 */
class ProcessPlayerHandle implements PlayerHandle {
  readonly owned = true;

  constructor(
    private readonly child: IManagedProcess,
    readonly pid: number,
    readonly mode: PlayerMode,
    private readonly killGraceMs: number
  ) { }

  isAlive(): boolean {
    return !this.child.exited;
  }

  async waitForExit(signal: AbortSignal, maxMs: number): Promise<PlayerExit> {
    const exit = await Promise.race([
      this.child.exitPromise,
      sleep(maxMs, signal).then(() => null)
    ]);
    if (exit === null) {
      return { reason: 'timeout', code: null, signal: null };
    }
    return { reason: 'exited', code: exit.code, signal: exit.signal };
  }

  terminate(): Promise<void> {
    return this.child.terminate(this.killGraceMs);
  }
}

/**
 * Handle over a player known only by pid (a splash started elsewhere)
 */
class PidPlayerHandle implements PlayerHandle {
  readonly mode: PlayerMode = 'splash';
  readonly owned = false;

  constructor(
    readonly pid: number,
    private readonly launcher: IProcessLauncher,
    private readonly pollIntervalMs: number,
    private readonly killGraceMs: number
  ) { }

  isAlive(): boolean {
    return this.launcher.isAlive(this.pid);
  }

  async waitForExit(signal: AbortSignal, maxMs: number): Promise<PlayerExit> {
    const gone = await pollUntil(() => (this.isAlive() ? null : true), {
      intervalMs: this.pollIntervalMs,
      timeoutMs: maxMs,
      signal
    });
    return { reason: gone ? 'exited' : 'timeout', code: null, signal: null };
  }

  async terminate(): Promise<void> {
    if (!this.launcher.kill(this.pid, 'SIGTERM')) {
      return;
    }
    const gone = await pollUntil(() => (this.isAlive() ? null : true), {
      intervalMs: Math.min(100, this.killGraceMs),
      timeoutMs: this.killGraceMs
    });
    if (!gone) {
      this.launcher.kill(this.pid, 'SIGKILL');
    }
  }
}

export class PlayerBridge {
  private readonly options: PlayerBridgeOptions;
  // Splash windows launched here, so their handles keep exit codes
  private readonly splashProcesses = new Map<string, IManagedProcess>();

  constructor(
    private readonly launcher: IProcessLauncher,
    private readonly createChannel: ControlChannelFactory,
    private readonly logger: ILogger,
    options: Partial<PlayerBridgeOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Starts playback of the asset and confirms the player is alive
   */
  async attach(asset: MediaAsset, attachOptions: AttachOptions, signal: AbortSignal): Promise<PlayerHandle> {
    const target = asset.streamUrl ?? asset.videoPath;

    const handle = attachOptions.splash
      ? await this.transitionSplash(attachOptions.splash, target, asset.subtitlePath, signal)
      : this.launchFresh(attachOptions.player, target, attachOptions.title, asset.subtitlePath);

    try {
      await sleep(this.options.confirmDelayMs, signal);
    } catch (error) {
      // Nobody else holds this handle yet
      if (handle.owned) {
        await handle.terminate();
      }
      throw error;
    }

    if (!handle.isAlive()) {
      throw new SessionError(
        SessionErrorCode.PLAYER_ATTACH_FAILED,
        `Player (pid ${handle.pid}) exited right after start`,
        {
          remediation: ['Check that the player can open the file manually', 'Run with TORRENT_DEBUG=true for details']
        }
      );
    }

    this.logger.info(`Playback started (${handle.mode}, pid ${handle.pid})`);
    return handle;
  }

  /**
   * Opens an idle mpv window on the image and waits for its IPC socket
   */
  async launchSplash(imagePath: string, movieTitle: string, signal?: AbortSignal): Promise<SplashTarget> {
    if (!fs.existsSync(imagePath)) {
      throw new SessionError(SessionErrorCode.PLAYER_ATTACH_FAILED, `Splash image not found: ${imagePath}`);
    }

    await fs.promises.mkdir(this.options.socketDir, { recursive: true });
    const socketPath = path.join(this.options.socketDir, `mpv-splash-${process.pid}-${Date.now()}.sock`);
    const title = windowTitle(this.options.appTitle, movieTitle);

    const child = this.launcher.spawn(playerBinary('mpv'), buildSplashArgs(imagePath, socketPath, title, movieTitle));

    const ready = await pollUntil(() => (fs.existsSync(socketPath) && !child.exited ? true : null), {
      intervalMs: 100,
      timeoutMs: this.options.splashSocketTimeoutMs,
      signal
    });

    if (!ready || child.pid === undefined) {
      await child.terminate(this.options.killGraceMs);
      await fs.promises.rm(socketPath, { force: true });
      throw new SessionError(SessionErrorCode.PLAYER_ATTACH_FAILED, 'Splash window did not open its control socket', {
        remediation: ['Check that mpv is installed and can open a window']
      });
    }

    this.splashProcesses.set(socketPath, child);
    this.logger.debug(`Splash running (pid ${child.pid}, socket ${socketPath})`);
    return { socketPath, pid: child.pid };
  }

  private launchFresh(player: PlayerKind, target: string, title: string, subtitlePath?: string): PlayerHandle {
    const binary = playerBinary(player);
    const child = this.launcher.spawn(binary, buildPlayerArgs(player, target, title, subtitlePath));

    if (child.pid === undefined) {
      throw new SessionError(SessionErrorCode.PLAYER_ATTACH_FAILED, `Failed to start ${binary}`, {
        remediation: [`Install ${binary} or choose another player`]
      });
    }

    return new ProcessPlayerHandle(child, child.pid, 'fresh', this.options.killGraceMs);
  }

  private async transitionSplash(
    splash: SplashTarget,
    target: string,
    subtitlePath: string | undefined,
    signal: AbortSignal
  ): Promise<PlayerHandle> {
    const channel = this.createChannel(splash.socketPath);

    try {
      await this.sendSequence(channel, target, subtitlePath, signal);
    } catch (error) {
      if (error instanceof SessionError) {
        throw error;
      }
      throw new SessionError(
        SessionErrorCode.PLAYER_ATTACH_FAILED,
        `Could not control splash player at ${splash.socketPath}`,
        { remediation: ['The splash window may have been closed, start again'], cause: error }
      );
    } finally {
      await channel.close();
    }

    const spawned = this.splashProcesses.get(splash.socketPath);
    if (spawned && spawned.pid !== undefined) {
      return new ProcessPlayerHandle(spawned, spawned.pid, 'splash', this.options.killGraceMs);
    }

    const pid = splash.pid ?? (await findSocketOwner(this.launcher, splash.socketPath, this.logger));
    if (pid === null) {
      throw new SessionError(SessionErrorCode.PLAYER_ATTACH_FAILED, 'Could not determine the splash player pid', {
        remediation: ['Install lsof, or pass the splash pid along with its socket']
      });
    }

    return new PidPlayerHandle(pid, this.launcher, this.options.pollIntervalMs, this.options.killGraceMs);
  }

  /**
   * Clear OSD, replace the file, re-apply cache settings, then subtitles
   */
  private async sendSequence(
    channel: IPlayerControlChannel,
    target: string,
    subtitlePath: string | undefined,
    signal: AbortSignal
  ): Promise<void> {
    const commands: PlayerCommand[] = [
      { command: ['show-text', ''] },
      { command: ['loadfile', target, 'replace'] },
      ...MPV_CACHE_PROPERTIES.map(([name, value]): PlayerCommand => ({ command: ['set_property', name, value] })),
      { command: ['set_property', 'keep-open', 'yes'] }
    ];

    for (const command of commands) {
      await channel.send(command);
      await sleep(this.options.commandGapMs, signal);
    }

    if (subtitlePath) {
      // mpv drops sub-add sent before the new file has loaded
      await sleep(this.options.subtitleSettleMs, signal);
      await channel.send({ command: ['sub-add', subtitlePath] });
      await sleep(this.options.commandGapMs, signal);
    }

    await channel.send({ command: ['set_property', 'osd-level', 1] });
  }
}
