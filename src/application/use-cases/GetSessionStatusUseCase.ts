/**
 * Use case for reading the live status of the running session
 */

import { ProgressSnapshot, SessionState } from '../../domain/entities';
import { IStatusRecord } from '../../domain/interfaces';
import { StatusRecord } from '../../infrastructure/progress/StatusRecord';
import { ByteFormatter } from '../../utils/ByteFormatter';

/**
 * Read side of a session (SessionOrchestrator in production)
 */
export interface SessionStatusProvider {
  readonly state: SessionState;
  readonly status: IStatusRecord | null;
}

export interface SessionStatus {
  state: SessionState;
  snapshot: ProgressSnapshot;
  downloaded: string;
  speed: string;
  // Same pipe-delimited form as the status file, null for FAILED
  line: string | null;
}

export interface GetSessionStatusResponse {
  success: boolean;
  state: SessionState;
  status?: SessionStatus;
  error?: string;
}

export class GetSessionStatusUseCase {
  constructor(
    private provider: SessionStatusProvider
  ) {}

  execute(): GetSessionStatusResponse {
    const state = this.provider.state;
    const snapshot = this.provider.status?.latest() ?? null;

    if (!snapshot) {
      return {
        success: false,
        state,
        error: 'No progress reported yet'
      };
    }

    return {
      success: true,
      state,
      status: {
        state,
        snapshot,
        downloaded: ByteFormatter.toHumanReadable(snapshot.bytesDownloaded),
        speed: ByteFormatter.toRate(snapshot.downloadRateBps) || '0 B/s',
        line: snapshot.state === 'FAILED' ? null : StatusRecord.format(snapshot)
      }
    };
  }
}
