/**
 * Use case for browsing the files inside a torrent before picking one
 * The backend's own interactive listing takes over the terminal
 */

import fs from 'fs';
import config from '../../config';
import { ILogger } from '../../domain/interfaces';
import { normalizeTorrentSource, parseTorrentSource } from '../../domain/value-objects/TorrentSourceParser';
import { isSessionError } from '../../domain/errors/SessionError';

export interface ListTorrentFilesRequest {
    source: string;
}

export interface ListTorrentFilesResponse {
    success: boolean;
    exitCode?: number | null;
    error?: string;
    remediation?: string[];
}

/**
 * Anything that can list a torrent's files (ClientSupervisor in production)
 */
export interface TorrentFileLister {
    listFiles(source: string): Promise<number | null>;
}

export class ListTorrentFilesUseCase {
    constructor(
        private lister: TorrentFileLister,
        private logger: ILogger,
        private fileExists: (filePath: string) => boolean = fs.existsSync,
        private trackers: readonly string[] = config.PUBLIC_TRACKERS
    ) { }

    async execute(request: ListTorrentFilesRequest): Promise<ListTorrentFilesResponse> {
        const parsed = parseTorrentSource(request.source, this.fileExists);
        if (!parsed.success) {
            return {
                success: false,
                error: parsed.message
            };
        }

        try {
            const exitCode = await this.lister.listFiles(normalizeTorrentSource(parsed.value, this.trackers));
            return {
                success: exitCode === 0,
                exitCode
            };
        } catch (error) {
            this.logger.error('Error in ListTorrentFilesUseCase:', error);
            return {
                success: false,
                error: error instanceof Error ? error.message : 'Unknown error',
                remediation: isSessionError(error) ? [...error.remediation] : undefined
            };
        }
    }
}
