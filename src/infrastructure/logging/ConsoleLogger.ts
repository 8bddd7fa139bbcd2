/**
 * Console logger implementation
 * Debug output is only printed when verbose mode is on (TORRENT_DEBUG=true)
 */

import { ILogger } from '../../domain/interfaces';
import config from '../../config';

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  // Prefix such as "[supervisor]"
  scope?: string;
}

export class ConsoleLogger implements ILogger {
  private readonly verbose: boolean;
  private readonly prefix: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? config.DEBUG;
    this.prefix = options.scope ? `[${options.scope}] ` : '';
  }

  log(message: string, ...args: unknown[]): void {
    console.log(this.prefix + message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.prefix + message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.prefix + message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    console.info(this.prefix + message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.verbose) {
      return;
    }
    console.debug(this.prefix + message, ...args);
  }

  /**
   * Logger sharing this one's verbosity under a nested scope
   */
  child(scope: string): ConsoleLogger {
    const nested = this.prefix ? `${this.prefix.slice(1, -2)}:${scope}` : scope;
    return new ConsoleLogger({ verbose: this.verbose, scope: nested });
  }
}
