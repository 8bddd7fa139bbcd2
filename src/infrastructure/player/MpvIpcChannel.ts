/**
 * mpv JSON IPC over a Unix socket
 * Commands are newline-delimited JSON. Replies are drained and ignored.
 */

import net from 'net';
import { ILogger, IPlayerControlChannel, PlayerCommand } from '../../domain/interfaces';

export class MpvIpcChannel implements IPlayerControlChannel {
  private socket: net.Socket | null = null;
  private connecting: Promise<net.Socket> | null = null;

  constructor(
    readonly endpoint: string,
    private readonly logger: ILogger,
    private readonly connectTimeoutMs = 1000
  ) { }

  async send(command: PlayerCommand): Promise<void> {
    const socket = await this.connect();
    const payload = `${JSON.stringify(command)}\n`;

    await new Promise<void>((resolve, reject) => {
      socket.write(payload, (error) => (error ? reject(error) : resolve()));
    });

    this.logger.debug(`mpv <- ${payload.trim()}`);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.connecting = null;

    if (!socket || socket.destroyed) {
      return;
    }

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end();
      // The peer may never acknowledge the half-close
      setTimeout(() => {
        socket.destroy();
        resolve();
      }, 200).unref();
    });
  }

  private connect(): Promise<net.Socket> {
    if (this.socket && !this.socket.destroyed) {
      return Promise.resolve(this.socket);
    }
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private open(): Promise<net.Socket> {
    return new Promise<net.Socket>((resolve, reject) => {
      const socket = net.createConnection(this.endpoint);
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`Timed out connecting to ${this.endpoint}`));
      }, this.connectTimeoutMs);

      socket.once('connect', () => {
        clearTimeout(timer);
        socket.removeAllListeners('error');
        socket.on('error', (error) => {
          this.logger.debug(`mpv socket error: ${error.message}`);
        });
        // Replies and events are not used
        socket.on('data', () => { });
        this.socket = socket;
        resolve(socket);
      });

      socket.once('error', (error) => {
        clearTimeout(timer);
        reject(error);
      });
    });
  }
}
