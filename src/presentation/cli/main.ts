#!/usr/bin/env node

/**
 * Command line entry point: streams one torrent to a local player
 *
 * Usage:
 *   torrent-stream-session "magnet:?xt=urn:btih:..."
 *   torrent-stream-session --splash-image poster.jpg --title "Movie" movie.torrent
 *
 * The process exit code is the session's (0 closed, 1 fatal, 2 interrupted,
 * 3 return to catalog, 4 player failed to start).
 */

import { Server } from 'http';
import config from '../../config';
import { SessionExitCode, SessionState } from '../../domain/entities';
import { ILogger } from '../../domain/interfaces';
import { SessionOrchestrator } from '../../application/session/SessionOrchestrator';
import { StreamTorrentUseCase } from '../../application/use-cases/StreamTorrentUseCase';
import { ListTorrentFilesUseCase } from '../../application/use-cases/ListTorrentFilesUseCase';
import { ClientSupervisor } from '../../infrastructure/backend/ClientSupervisor';
import { MediaLocator } from '../../infrastructure/backend/MediaLocator';
import { FfprobeMediaProbe } from '../../infrastructure/buffer/FfprobeMediaProbe';
import { PreferencesStore } from '../../infrastructure/config/PreferencesStore';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { MpvIpcChannel } from '../../infrastructure/player/MpvIpcChannel';
import { ChildProcessLauncher } from '../../infrastructure/process/ChildProcessLauncher';
import { startStatusServer, stopStatusServer } from '../http/server';
import { BufferProgressRenderer } from '../terminal/BufferProgressRenderer';
import { CliCommand, USAGE, parseCliArgs } from './args';

// States during which the terminal shows the buffering line
const RENDERED_STATES: ReadonlySet<SessionState> = new Set([
  SessionState.DOWNLOADING,
  SessionState.LOCATING_MEDIA,
  SessionState.BUFFERING,
  SessionState.READY
]);

async function streamTorrent(command: Extract<CliCommand, { kind: 'stream' }>, logger: ILogger): Promise<number> {
  const launcher = new ChildProcessLauncher(logger);
  const orchestrator = new SessionOrchestrator({
    launcher,
    mediaProbe: new FfprobeMediaProbe(launcher, logger),
    createChannel: (endpoint) => new MpvIpcChannel(endpoint, logger),
    logger
  });

  const request = { ...command.request };
  if (!request.preferredPlayer) {
    request.preferredPlayer = new PreferencesStore().getPlayer() ?? undefined;
  }

  const renderer = new BufferProgressRenderer();
  const ticker = setInterval(() => {
    const snapshot = orchestrator.status?.latest();
    if (snapshot && RENDERED_STATES.has(orchestrator.state)) {
      renderer.render(snapshot);
    }
  }, config.SAMPLE_INTERVAL);
  orchestrator.onStateChange((state) => {
    if (!RENDERED_STATES.has(state)) {
      renderer.finish();
    }
  });

  let server: Server | null = null;
  if (config.STATUS_PORT > 0) {
    try {
      server = await startStatusServer(orchestrator, config.STATUS_PORT, logger);
    } catch (error) {
      logger.warn(`Status server unavailable on port ${config.STATUS_PORT}:`, error);
    }
  }

  const interrupt = (): void => {
    renderer.finish();
    logger.info('\n🛑 Stopping session...');
    orchestrator.cancel();
  };
  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  try {
    const result = await new StreamTorrentUseCase(orchestrator, logger).execute(request);

    // Failures inside the session are already logged by the orchestrator, diagnostics included
    if (result.error && orchestrator.state === SessionState.IDLE) {
      console.error(`❌ ${result.error}`);
      for (const line of result.diagnostics ?? []) {
        console.error(`   ${line}`);
      }
    }
    for (const line of result.remediation ?? []) {
      console.error(`   → ${line}`);
    }

    return result.exitCode;
  } finally {
    clearInterval(ticker);
    renderer.finish();
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
    if (server) {
      await stopStatusServer(server);
    }
  }
}

async function listFiles(source: string, logger: ILogger): Promise<number> {
  const supervisor = new ClientSupervisor(new ChildProcessLauncher(logger), new MediaLocator(), logger);
  const result = await new ListTorrentFilesUseCase(supervisor, logger).execute({ source });

  if (!result.success && result.error) {
    console.error(`❌ ${result.error}`);
    for (const line of result.remediation ?? []) {
      console.error(`   → ${line}`);
    }
  }
  return result.exitCode ?? SessionExitCode.FATAL;
}

export async function main(argv: readonly string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.success) {
    console.error(`${parsed.error}\n\n${USAGE}`);
    return SessionExitCode.FATAL;
  }

  const { command } = parsed;
  if (command.kind === 'help') {
    console.log(USAGE);
    return SessionExitCode.COMPLETED;
  }

  if (command.kind === 'set-player') {
    new PreferencesStore().setPlayer(command.player);
    console.log(`Player preference saved: ${command.player}`);
    return SessionExitCode.COMPLETED;
  }

  const logger = new CompositeLogger();
  try {
    return command.kind === 'list'
      ? await listFiles(command.source, logger)
      : await streamTorrent(command, logger);
  } finally {
    await logger.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error) => {
      console.error('Failed to run session:', error);
      process.exitCode = SessionExitCode.FATAL;
    });
}
