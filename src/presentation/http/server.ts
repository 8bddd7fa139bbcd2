/**
 * HTTP status server for display processes that poll the running session
 *
 * Usage:
 *   STATUS_PORT=9090 torrent-stream-session <magnet>
 *
 * Then poll:
 *   http://localhost:9090/status
 */

import { Server } from 'http';
import { ILogger } from '../../domain/interfaces';
import { SessionStatusProvider } from '../../application/use-cases/GetSessionStatusUseCase';
import { createStatusApp } from './app';

export function startStatusServer(provider: SessionStatusProvider, port: number, logger: ILogger): Promise<Server> {
  const app = createStatusApp(provider);

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, '127.0.0.1', () => {
      logger.info(`📡 Status available on http://localhost:${port}/status`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopStatusServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
