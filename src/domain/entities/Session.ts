/**
 * Domain entities for a streaming session
 * Independent of processes, sockets and the filesystem
 */

import type { IStatusRecord } from '../interfaces/IStatusRecord';

export type TorrentSourceKind = 'magnet' | 'file';

export interface TorrentSource {
  readonly kind: TorrentSourceKind;
  readonly identifier: string;
  readonly infoHash?: string;
}

export enum BackendKind {
  PRIMARY = 'primary',
  FALLBACK = 'fallback'
}

export type SnapshotState = 'ANALYZING' | 'BUFFERING' | 'READY' | 'PLAYING' | 'FAILED';

export interface ProgressSnapshot {
  percent: number;
  bytesDownloaded: number;
  downloadRateBps: number;
  peersConnected: number;
  peersTotal: number;
  state: SnapshotState;
}

export type BufferTargetBasis = 'bitrate' | 'size-tier' | 'default';

export interface BufferTarget {
  bytes: number;
  basis: BufferTargetBasis;
}

export interface MediaAsset {
  videoPath: string;
  subtitlePath?: string;
  // HTTP stream exposed by the backend, preferred over the file path
  streamUrl?: string;
}

export enum SessionState {
  IDLE = 'IDLE',
  LAUNCHING_PRIMARY = 'LAUNCHING_PRIMARY',
  DOWNLOADING = 'DOWNLOADING',
  LAUNCHING_FALLBACK = 'LAUNCHING_FALLBACK',
  LOCATING_MEDIA = 'LOCATING_MEDIA',
  BUFFERING = 'BUFFERING',
  READY = 'READY',
  PLAYING = 'PLAYING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED'
}

export type PlayerKind = 'mpv' | 'vlc';

export interface SplashTarget {
  socketPath: string;
  pid?: number;
}

export interface SessionOptions {
  enableSubtitles: boolean;
  preferredPlayer?: PlayerKind;
  // Display only
  movieTitle: string;
  fileIndex?: number;
  splashImage?: string;
  splash?: SplashTarget;
}

/**
 * Exit codes surfaced to the caller of a session
 */
export enum SessionExitCode {
  COMPLETED = 0,
  FATAL = 1,
  INTERRUPTED = 2,
  RETURN_TO_CATALOG = 3,
  FAILED_TO_START = 4
}

export interface SessionResult {
  exitCode: SessionExitCode;
  state: SessionState;
  error?: Error;
}

/**
 * Per-session state passed by reference between components
 */
export interface SessionContext {
  readonly sessionId: string;
  readonly source: TorrentSource;
  readonly normalizedSource: string;
  readonly options: SessionOptions;
  readonly startedAt: number;
  // Download directory namespaced by info hash, exclusive to this session
  readonly cacheDir: string;
  readonly statusRecord: IStatusRecord;
  readonly signal: AbortSignal;
}
