/**
 * IProcessLauncher over node:child_process
 *
 * Each spawned process is tracked until it exits. Output is kept in a bounded
 * in-memory tail and optionally mirrored to a file for later inspection.
 */

import { ChildProcess, spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import {
  ILogger,
  IManagedProcess,
  IProcessLauncher,
  ProcessExit,
  SpawnOptions
} from '../../domain/interfaces';

// Enough to hold many progress lines while bounding memory
const OUTPUT_TAIL_BYTES = 64 * 1024;

class ManagedChildProcess implements IManagedProcess {
  readonly exitPromise: Promise<ProcessExit>;
  private exitState: ProcessExit | null = null;
  private tail = '';
  private outputStream: fs.WriteStream | null = null;

  constructor(
    private readonly child: ChildProcess,
    readonly command: string,
    private readonly logger: ILogger,
    options: SpawnOptions
  ) {
    if (options.outputFile) {
      fs.mkdirSync(path.dirname(options.outputFile), { recursive: true });
      this.outputStream = fs.createWriteStream(options.outputFile, { flags: 'w' });
      this.outputStream.on('error', (error) => {
        this.logger.warn(`Output capture for ${command} failed:`, error);
      });
    }

    if (options.captureOutput) {
      child.stdout?.on('data', (chunk: Buffer) => this.capture(chunk));
      child.stderr?.on('data', (chunk: Buffer) => this.capture(chunk));
    }

    this.exitPromise = new Promise<ProcessExit>((resolve) => {
      child.once('error', (error) => {
        // Spawn failures (ENOENT) never emit 'exit'
        this.finish({ code: null, signal: null, error }, resolve);
      });
      child.once('close', (code, signal) => {
        this.finish({ code, signal }, resolve);
      });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this.exitState !== null;
  }

  get exitInfo(): ProcessExit | null {
    return this.exitState;
  }

  output(): string {
    return this.tail;
  }

  async terminate(graceMs: number): Promise<void> {
    if (this.exited) {
      return;
    }

    this.signal('SIGTERM');

    const killTimer = setTimeout(() => {
      if (!this.exited) {
        this.logger.debug(`${this.command} ignored SIGTERM, sending SIGKILL`);
        this.signal('SIGKILL');
      }
    }, graceMs);

    try {
      await this.exitPromise;
    } finally {
      clearTimeout(killTimer);
    }
  }

  private signal(name: NodeJS.Signals): void {
    try {
      this.child.kill(name);
    } catch (error) {
      this.logger.debug(`Failed to send ${name} to ${this.command}:`, error);
    }
  }

  private capture(chunk: Buffer): void {
    const text = chunk.toString();
    this.tail += text;
    if (this.tail.length > OUTPUT_TAIL_BYTES) {
      this.tail = this.tail.slice(-OUTPUT_TAIL_BYTES);
    }
    this.outputStream?.write(text);
  }

  private finish(exit: ProcessExit, resolve: (exit: ProcessExit) => void): void {
    if (this.exitState !== null) {
      return;
    }
    this.exitState = exit;
    this.outputStream?.end();
    this.outputStream = null;
    this.logger.debug(
      `${this.command} exited (code: ${exit.code ?? 'none'}, signal: ${exit.signal ?? 'none'})` +
      (exit.error ? `: ${exit.error.message}` : '')
    );
    resolve(exit);
  }
}

export class ChildProcessLauncher implements IProcessLauncher {
  constructor(
    private readonly logger: ILogger,
    private readonly searchPath: string = process.env.PATH ?? ''
  ) { }

  spawn(command: string, args: readonly string[], options: SpawnOptions = {}): IManagedProcess {
    let stdio: 'inherit' | ['ignore', 'pipe' | 'ignore', 'pipe' | 'ignore'];
    if (options.inheritStdio) {
      stdio = 'inherit';
    } else {
      const sink = options.captureOutput ? 'pipe' : 'ignore';
      stdio = ['ignore', sink, sink];
    }

    this.logger.debug(`Spawning ${command} ${args.join(' ')}`);

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio
    });

    return new ManagedChildProcess(child, command, this.logger, options);
  }

  isAvailable(command: string): boolean {
    if (command.includes(path.sep)) {
      return isExecutable(command);
    }

    return this.searchPath
      .split(path.delimiter)
      .filter((dir) => dir.length > 0)
      .some((dir) => isExecutable(path.join(dir, command)));
  }

  isAlive(pid: number): boolean {
    try {
      // Signal 0 checks existence without delivering anything
      process.kill(pid, 0);
      return true;
    } catch (error) {
      // EPERM: exists but owned by someone else
      return error instanceof Error && 'code' in error && error.code === 'EPERM';
    }
  }

  kill(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (error) {
      this.logger.debug(`Failed to send ${signal} to pid ${pid}:`, error);
      return false;
    }
  }
}

function isExecutable(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}
