import config from '../../config';
import { PlayerKind } from '../../domain/entities';
import { IProcessLauncher } from '../../domain/interfaces';

const DETECTION_ORDER: readonly PlayerKind[] = ['mpv', 'vlc'];

export function playerBinary(player: PlayerKind): string {
  return player === 'mpv' ? config.MPV_BIN : config.VLC_BIN;
}

export function isPlayerKind(value: string): value is PlayerKind {
  return DETECTION_ORDER.some((kind) => kind === value);
}

/**
 * Preferred player when installed, otherwise the first one found on PATH
 */
export function detectPlayer(launcher: IProcessLauncher, preferred?: PlayerKind): PlayerKind | null {
  if (preferred && launcher.isAvailable(playerBinary(preferred))) {
    return preferred;
  }
  return DETECTION_ORDER.find((kind) => launcher.isAvailable(playerBinary(kind))) ?? null;
}
