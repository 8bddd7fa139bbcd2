/**
 * Control channel into a running player (mpv JSON IPC)
 */

export type PlayerCommandArg = string | number | boolean;

export interface PlayerCommand {
  command: [string, ...PlayerCommandArg[]];
}

export interface IPlayerControlChannel {
  readonly endpoint: string;

  /**
   * Fire-and-forget, no response is read back
   */
  send(command: PlayerCommand): Promise<void>;

  close(): Promise<void>;
}
