/**
 * Public API of torrent-stream-session
 */

export * from './domain/entities';
export * from './domain/interfaces';
export * from './domain/errors/SessionError';
export { MagnetLink } from './domain/value-objects/MagnetLink';
export { parseTorrentSource, normalizeTorrentSource, cacheKeyFor } from './domain/value-objects/TorrentSourceParser';

export { SessionOrchestrator } from './application/session/SessionOrchestrator';
export type { SessionDependencies, OrchestratorOptions, StateListener } from './application/session/SessionOrchestrator';
export { StreamTorrentUseCase } from './application/use-cases/StreamTorrentUseCase';
export type { StreamTorrentRequest, StreamTorrentResponse } from './application/use-cases/StreamTorrentUseCase';
export { ListTorrentFilesUseCase } from './application/use-cases/ListTorrentFilesUseCase';
export { GetSessionStatusUseCase } from './application/use-cases/GetSessionStatusUseCase';

export { BufferTargetCalculator, DEFAULT_BUFFER_POLICY } from './infrastructure/buffer/BufferTargetCalculator';
export { FfprobeMediaProbe } from './infrastructure/buffer/FfprobeMediaProbe';
export { ClientSupervisor } from './infrastructure/backend/ClientSupervisor';
export { MediaLocator } from './infrastructure/backend/MediaLocator';
export { PlayerBridge } from './infrastructure/player/PlayerBridge';
export { MpvIpcChannel } from './infrastructure/player/MpvIpcChannel';
export { ProgressMonitor } from './infrastructure/progress/ProgressMonitor';
export { StatusRecord } from './infrastructure/progress/StatusRecord';
export { ChildProcessLauncher } from './infrastructure/process/ChildProcessLauncher';
export { CompositeLogger } from './infrastructure/logging/CompositeLogger';
export { ConsoleLogger } from './infrastructure/logging/ConsoleLogger';
export { FileLogger } from './infrastructure/logging/FileLogger';

export { createStatusApp } from './presentation/http/app';
export { BufferProgressRenderer } from './presentation/terminal/BufferProgressRenderer';
