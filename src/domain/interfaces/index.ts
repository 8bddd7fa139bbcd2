/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './ILogger';
export * from './IStatusRecord';
export * from './IProgressSource';
export * from './IMediaProbe';
export * from './IProcessLauncher';
export * from './IPlayerControlChannel';
