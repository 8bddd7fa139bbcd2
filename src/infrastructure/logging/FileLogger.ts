/**
 * File logger implementation
 * Appends timestamped lines to <RUNTIME_DIR>/logs, errors also go to a separate file
 */

import fs from 'fs';
import path from 'path';
import { ILogger } from '../../domain/interfaces';
import config from '../../config';

export class FileLogger implements ILogger {
  private logDir: string;
  private logFile: string;
  private errorFile: string;
  private writeStream: fs.WriteStream | null = null;
  private errorStream: fs.WriteStream | null = null;

  constructor(logDir?: string) {
    this.logDir = logDir || path.join(config.RUNTIME_DIR, 'logs');

    try {
      fs.mkdirSync(this.logDir, { recursive: true });
    } catch (error) {
      throw new Error(`Failed to create log directory: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    const day = new Date().toISOString().split('T')[0];
    this.logFile = path.join(this.logDir, `app-${day}.log`);
    this.errorFile = path.join(this.logDir, `error-${day}.log`);

    this.writeStream = fs.createWriteStream(this.logFile, { flags: 'a' });
    this.errorStream = fs.createWriteStream(this.errorFile, { flags: 'a' });

    // A broken log file must not take the session down
    this.writeStream.on('error', (err) => {
      console.error('Error writing to log file:', err);
      this.writeStream = null;
    });
    this.errorStream.on('error', (err) => {
      console.error('Error writing to error file:', err);
      this.errorStream = null;
    });
  }

  get files(): { log: string; error: string } {
    return { log: this.logFile, error: this.errorFile };
  }

  private formatMessage(level: string, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const argsStr = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
    return `[${timestamp}] [${level}] ${message}${argsStr}\n`;
  }

  private writeToFile(stream: fs.WriteStream | null, level: string, message: string, ...args: unknown[]): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(this.formatMessage(level, message, ...args));
  }

  log(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'LOG', message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.writeToFile(this.errorStream, 'ERROR', message, ...args);
    this.writeToFile(this.writeStream, 'ERROR', message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'WARN', message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'INFO', message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'DEBUG', message, ...args);
  }

  /**
   * Flush and close file streams (call on shutdown)
   */
  close(): Promise<void> {
    const pending = [this.writeStream, this.errorStream]
      .filter((stream): stream is fs.WriteStream => stream !== null && !stream.destroyed)
      .map((stream) => new Promise<void>((resolve) => stream.end(() => resolve())));
    this.writeStream = null;
    this.errorStream = null;
    return Promise.all(pending).then(() => undefined);
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}
