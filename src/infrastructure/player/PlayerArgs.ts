/**
 * Command lines for the supported players
 */

import { PlayerKind } from '../../domain/entities';

// mpv cache settings applied on fresh launch and again after a splash loadfile
export const MPV_CACHE_PROPERTIES: ReadonlyArray<[string, string]> = [
  ['cache', 'yes'],
  ['cache-secs', '300'],
  ['demuxer-max-bytes', '512MiB'],
  ['demuxer-max-back-bytes', '256MiB']
];

const VLC_CACHING_MS = 10000;

export function windowTitle(appTitle: string, movieTitle: string): string {
  return movieTitle ? `${appTitle} - ${movieTitle}` : appTitle;
}

export function buildMpvArgs(target: string, title: string, subtitlePath?: string): string[] {
  const args = [
    '--force-window=immediate',
    `--title=${title}`,
    ...MPV_CACHE_PROPERTIES.map(([name, value]) => `--${name}=${value}`)
  ];
  if (subtitlePath) {
    args.push(`--sub-file=${subtitlePath}`, '--sid=1', '--sub-visibility=yes');
  }
  args.push(target);
  return args;
}

export function buildVlcArgs(target: string, subtitlePath?: string): string[] {
  const args = [`--file-caching=${VLC_CACHING_MS}`, `--network-caching=${VLC_CACHING_MS}`];
  if (subtitlePath) {
    args.push(`--sub-file=${subtitlePath}`);
  }
  args.push(target);
  return args;
}

export function buildPlayerArgs(player: PlayerKind, target: string, title: string, subtitlePath?: string): string[] {
  return player === 'mpv' ? buildMpvArgs(target, title, subtitlePath) : buildVlcArgs(target, subtitlePath);
}

/**
 * Idle mpv window showing an image until a loadfile arrives over IPC
 */
export function buildSplashArgs(imagePath: string, socketPath: string, title: string, movieTitle: string): string[] {
  return [
    `--input-ipc-server=${socketPath}`,
    '--image-display-duration=inf',
    '--keep-open=yes',
    `--title=${title}`,
    `--force-media-title=${movieTitle}`,
    '--osd-level=3',
    '--osd-font-size=48',
    '--osd-border-size=2',
    '--force-window=immediate',
    imagePath
  ];
}
