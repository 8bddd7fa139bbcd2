/**
 * Configuration for torrent stream sessions
 */

import os from 'os';
import path from 'path';

export interface Config {
  // Runtime directory for logs, status artifacts and captured backend output
  RUNTIME_DIR: string;
  // Root of the per-infoHash download directories
  CACHE_DIR: string;
  DEBUG: boolean;

  PRIMARY_BACKEND_BIN: string;
  FALLBACK_BACKEND_BIN: string;
  FFPROBE_BIN: string;
  LSOF_BIN: string;
  MPV_BIN: string;
  VLC_BIN: string;
  PRIMARY_STREAM_PORT: number;
  // Directory holding the fallback backend's persisted settings.json
  TRANSMISSION_CONFIG_DIR: string;
  // Optional port for the HTTP status endpoint (0 = disabled)
  STATUS_PORT: number;
  PREFERENCES_FILE: string;
  APP_TITLE: string;

  // Buffer sizing (bytes)
  MIN_BUFFER: number;
  MAX_BUFFER: number;
  DEFAULT_BUFFER: number;
  ANALYSIS_BYTES: number;
  REPROBE_BYTES: number;
  STALL_FLOOR_BYTES: number;
  STALL_SAMPLES: number;
  MIN_MEDIA_BYTES: number;

  // Timing (milliseconds)
  SAMPLE_INTERVAL: number;
  LAUNCH_GRACE_PERIOD: number;
  FIRST_BYTE_TIMEOUT: number;
  MEDIA_LOCATE_TIMEOUT: number;
  MEDIA_POLL_INTERVAL: number;
  BUFFER_TIMEOUT: number;
  PLAYER_CONFIRM_DELAY: number;
  PLAYER_WATCH_TIMEOUT: number;
  PLAYER_POLL_INTERVAL: number;
  KILL_GRACE_PERIOD: number;
  MTIME_TOLERANCE: number;
  IPC_COMMAND_GAP: number;
  SUBTITLE_SETTLE_DELAY: number;
  OVERLAY_INTERVAL: number;
  SPLASH_SOCKET_TIMEOUT: number;

  VIDEO_EXTENSIONS: readonly string[];
  SUBTITLE_EXTENSIONS: readonly string[];
  PUBLIC_TRACKERS: readonly string[];
}

const MB = 1024 * 1024;
const runtimeDir = process.env.RUNTIME_DIR || path.join(os.tmpdir(), 'torrent-stream-session');

const config: Config = {
  RUNTIME_DIR: runtimeDir,
  CACHE_DIR: process.env.CACHE_DIR || path.join(os.tmpdir(), 'torrent-stream'),
  DEBUG: process.env.TORRENT_DEBUG === 'true',

  // Backends and helper tools
  PRIMARY_BACKEND_BIN: process.env.PRIMARY_BACKEND_BIN || 'peerflix',
  FALLBACK_BACKEND_BIN: process.env.FALLBACK_BACKEND_BIN || 'transmission-cli',
  FFPROBE_BIN: process.env.FFPROBE_BIN || 'ffprobe',
  LSOF_BIN: process.env.LSOF_BIN || 'lsof',
  MPV_BIN: process.env.MPV_BIN || 'mpv',
  VLC_BIN: process.env.VLC_BIN || 'vlc',
  PRIMARY_STREAM_PORT: Number(process.env.PRIMARY_STREAM_PORT) || 8888,
  TRANSMISSION_CONFIG_DIR:
    process.env.TRANSMISSION_CONFIG_DIR || path.join(os.homedir(), '.config', 'transmission'),
  STATUS_PORT: Number(process.env.STATUS_PORT) || 0,
  PREFERENCES_FILE:
    process.env.PREFERENCES_FILE || path.join(os.homedir(), '.config', 'torrent-stream-session', 'config'),
  APP_TITLE: 'Torrent Stream',

  // Buffer sizing
  MIN_BUFFER: 10 * MB,
  MAX_BUFFER: 200 * MB,
  DEFAULT_BUFFER: 50 * MB, // used when nothing is known about the media yet
  ANALYSIS_BYTES: 2 * MB, // downloaded before the first bitrate probe
  REPROBE_BYTES: 10 * MB, // a heuristic target may be widened once at this size
  STALL_FLOOR_BYTES: 20 * MB,
  STALL_SAMPLES: 10,
  MIN_MEDIA_BYTES: 1 * MB,

  // Timing
  SAMPLE_INTERVAL: 500,
  LAUNCH_GRACE_PERIOD: Number(process.env.LAUNCH_GRACE_PERIOD) || 2000,
  FIRST_BYTE_TIMEOUT: Number(process.env.FIRST_BYTE_TIMEOUT) || 5 * 60 * 1000,
  MEDIA_LOCATE_TIMEOUT: Number(process.env.MEDIA_LOCATE_TIMEOUT) || 60 * 1000,
  MEDIA_POLL_INTERVAL: 500,
  BUFFER_TIMEOUT: Number(process.env.BUFFER_TIMEOUT) || 5 * 60 * 1000,
  PLAYER_CONFIRM_DELAY: 1000,
  PLAYER_WATCH_TIMEOUT: 4 * 60 * 60 * 1000,
  PLAYER_POLL_INTERVAL: 1000,
  KILL_GRACE_PERIOD: 1000,
  MTIME_TOLERANCE: 2000,
  IPC_COMMAND_GAP: 50,
  SUBTITLE_SETTLE_DELAY: 500,
  OVERLAY_INTERVAL: 500,
  SPLASH_SOCKET_TIMEOUT: 2000,

  VIDEO_EXTENSIONS: ['.mp4', '.mkv', '.avi', '.mov', '.webm', '.m4v', '.flv', '.wmv'] as const,
  // Ordered by preference
  SUBTITLE_EXTENSIONS: ['.srt', '.vtt', '.ass', '.ssa'] as const,
  PUBLIC_TRACKERS: [
    'udp://tracker.opentrackr.org:1337/announce',
    'udp://tracker.openbittorrent.com:80/announce',
    'udp://open.stealth.si:80/announce',
    'udp://tracker.torrent.eu.org:451/announce',
    'udp://exodus.desync.com:6969/announce',
    'udp://tracker.moeking.me:6969/announce'
  ] as const
};

export default config;
