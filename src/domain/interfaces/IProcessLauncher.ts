/**
 * Port for spawning and supervising external processes
 * (download backends, players, helper tools)
 */

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  // Set when the process could not be started at all
  error?: Error;
}

export interface SpawnOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  // Capture stdout and stderr into memory (and into this file, when given)
  captureOutput?: boolean;
  outputFile?: string;
  // Hand the terminal to the child (interactive modes)
  inheritStdio?: boolean;
}

export interface IManagedProcess {
  readonly pid: number | undefined;
  readonly command: string;
  readonly exited: boolean;
  readonly exitInfo: ProcessExit | null;
  readonly exitPromise: Promise<ProcessExit>;

  /**
   * Captured combined output (bounded to the most recent bytes)
   */
  output(): string;

  /**
   * SIGTERM, then SIGKILL after the grace period. No-op once exited.
   */
  terminate(graceMs: number): Promise<void>;
}

export interface IProcessLauncher {
  spawn(command: string, args: readonly string[], options?: SpawnOptions): IManagedProcess;

  /**
   * Whether a command resolves to an executable on PATH
   */
  isAvailable(command: string): boolean;

  /**
   * Whether any process with this pid is alive
   */
  isAlive(pid: number): boolean;

  /**
   * Signals a process this launcher did not start (a player found by socket)
   * @returns false when the process is already gone
   */
  kill(pid: number, signal: NodeJS.Signals): boolean;
}
