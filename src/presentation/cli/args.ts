/**
 * Command line parsing for the session CLI
 */

import { parseArgs } from 'util';
import { PlayerKind } from '../../domain/entities';
import { isPlayerKind } from '../../infrastructure/player/PlayerDetector';
import { StreamTorrentRequest } from '../../application/use-cases/StreamTorrentUseCase';

export const USAGE = `Usage: torrent-stream-session [options] <magnet-link | file.torrent>

Options:
  -t, --title <name>         Title shown in the player window
  -p, --player <mpv|vlc>     Player to use (default: saved preference, then auto-detect)
  -i, --index <n>            File index inside the torrent
      --no-subtitles         Do not look for subtitle files
      --splash-image <path>  Show a splash window with live progress while buffering
      --splash-socket <path> Hand playback to an mpv splash already listening on this socket
      --splash-pid <pid>     Pid of that splash window (found with lsof when omitted)
  -l, --list                 List the files in the torrent and exit
      --set-player <mpv|vlc|auto>  Save the preferred player and exit
  -h, --help                 Show this help

Environment:
  TORRENT_DEBUG=true         Verbose logging
  STATUS_PORT=<port>         Serve session status over HTTP`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'stream'; request: StreamTorrentRequest }
  | { kind: 'list'; source: string }
  | { kind: 'set-player'; player: PlayerKind | 'auto' };

export type CliParseResult =
  | { success: true; command: CliCommand }
  | { success: false; error: string };

const OPTIONS = {
  title: { type: 'string', short: 't' },
  player: { type: 'string', short: 'p' },
  index: { type: 'string', short: 'i' },
  'no-subtitles': { type: 'boolean' },
  'splash-image': { type: 'string' },
  'splash-socket': { type: 'string' },
  'splash-pid': { type: 'string' },
  list: { type: 'boolean', short: 'l' },
  'set-player': { type: 'string' },
  help: { type: 'boolean', short: 'h' }
} as const;

function readArgs(argv: readonly string[]) {
  return parseArgs({ args: [...argv], allowPositionals: true, options: OPTIONS });
}

export function parseCliArgs(argv: readonly string[]): CliParseResult {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  const { values, positionals } = parsed;

  if (values.help) {
    return { success: true, command: { kind: 'help' } };
  }

  const setPlayer = values['set-player'];
  if (setPlayer !== undefined) {
    if (setPlayer !== 'auto' && !isPlayerKind(setPlayer)) {
      return { success: false, error: `Unknown player: ${setPlayer} (expected mpv, vlc or auto)` };
    }
    return { success: true, command: { kind: 'set-player', player: setPlayer } };
  }

  // Magnet links may arrive split on whitespace by the shell
  const source = positionals.join(' ').trim();
  if (!source) {
    return { success: false, error: 'Missing torrent source' };
  }

  if (values.list) {
    return { success: true, command: { kind: 'list', source } };
  }

  const player = values.player;
  if (player !== undefined && !isPlayerKind(player)) {
    return { success: false, error: `Unknown player: ${player} (expected mpv or vlc)` };
  }

  const fileIndex = parseNonNegativeInt(values.index);
  if (fileIndex === null) {
    return { success: false, error: `Invalid file index: ${values.index}` };
  }

  const splashPid = parseNonNegativeInt(values['splash-pid']);
  if (splashPid === null) {
    return { success: false, error: `Invalid splash pid: ${values['splash-pid']}` };
  }

  return {
    success: true,
    command: {
      kind: 'stream',
      request: {
        source,
        movieTitle: values.title,
        enableSubtitles: !values['no-subtitles'],
        preferredPlayer: player,
        fileIndex,
        splashImage: values['splash-image'],
        splashSocket: values['splash-socket'],
        splashPid
      }
    }
  };
}

/**
 * undefined when absent, null when malformed
 */
function parseNonNegativeInt(value: string | undefined): number | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  return /^\d+$/.test(value) ? parseInt(value, 10) : null;
}
