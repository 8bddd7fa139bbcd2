/**
 * Use case for streaming a torrent to a local player
 * Validates the request, runs one session and maps the outcome to a response
 */

import path from 'path';
import { PlayerKind, SessionExitCode, SessionOptions, SessionResult, SessionState } from '../../domain/entities';
import { SessionErrorCode, isSessionError } from '../../domain/errors/SessionError';
import { ILogger } from '../../domain/interfaces';
import { MagnetLink } from '../../domain/value-objects/MagnetLink';
import { cleanSourceInput } from '../../domain/value-objects/TorrentSourceParser';

export interface StreamTorrentRequest {
    source: string;
    movieTitle?: string;
    enableSubtitles?: boolean;
    preferredPlayer?: PlayerKind;
    fileIndex?: number;
    splashImage?: string;
    splashSocket?: string;
    splashPid?: number;
}

export interface StreamTorrentResponse {
    success: boolean;
    exitCode: SessionExitCode;
    state: SessionState;
    errorCode?: SessionErrorCode;
    error?: string;
    remediation?: string[];
    diagnostics?: string[];
}

/**
 * What the use case needs from a session (SessionOrchestrator in production)
 */
export interface SessionRunner {
    start(rawSource: string, options: SessionOptions): Promise<SessionResult>;
}

export class StreamTorrentUseCase {
    constructor(
        private session: SessionRunner,
        private logger: ILogger
    ) { }

    async execute(request: StreamTorrentRequest): Promise<StreamTorrentResponse> {
        const source = cleanSourceInput(request.source);
        if (!source) {
            return invalid('Torrent source required');
        }

        if (request.fileIndex !== undefined && (!Number.isInteger(request.fileIndex) || request.fileIndex < 0)) {
            return invalid(`Invalid file index: ${request.fileIndex}`);
        }

        if (request.splashPid !== undefined && !request.splashSocket) {
            return invalid('A splash pid needs a splash socket');
        }

        const options: SessionOptions = {
            enableSubtitles: request.enableSubtitles ?? true,
            movieTitle: request.movieTitle?.trim() || defaultMovieTitle(source),
            preferredPlayer: request.preferredPlayer,
            fileIndex: request.fileIndex,
            splashImage: request.splashImage,
            splash: request.splashSocket ? { socketPath: request.splashSocket, pid: request.splashPid } : undefined
        };

        try {
            this.logger.info(`Streaming "${options.movieTitle}"`);
            const result = await this.session.start(source, options);
            return toResponse(result);
        } catch (error) {
            this.logger.error('Error in StreamTorrentUseCase:', error);
            const errorMessage = error instanceof Error ? error.message : 'Unknown error';
            return {
                success: false,
                exitCode: SessionExitCode.FATAL,
                state: SessionState.FAILED,
                error: errorMessage
            };
        }
    }
}

/**
 * Display name from the magnet's dn= parameter or the .torrent file name
 */
export function defaultMovieTitle(source: string): string {
    const magnet = MagnetLink.parse(source);
    if (magnet) {
        return magnet.displayName ?? magnet.infoHash.slice(0, 8);
    }
    return path.basename(source, path.extname(source));
}

function invalid(message: string): StreamTorrentResponse {
    return {
        success: false,
        exitCode: SessionExitCode.FATAL,
        state: SessionState.FAILED,
        errorCode: SessionErrorCode.INVALID_SOURCE,
        error: message
    };
}

function toResponse(result: SessionResult): StreamTorrentResponse {
    const response: StreamTorrentResponse = {
        success: result.exitCode === SessionExitCode.COMPLETED,
        exitCode: result.exitCode,
        state: result.state
    };

    if (isSessionError(result.error)) {
        response.errorCode = result.error.code;
        response.error = result.error.message;
        if (result.error.actionable) {
            response.remediation = [...result.error.remediation];
        }
        if (result.error.diagnostics.length > 0) {
            response.diagnostics = [...result.error.diagnostics];
        }
    } else if (result.error) {
        response.error = result.error.message;
    }

    return response;
}
