/**
 * Single-slot progress status shared between the monitor and its observers
 */

import { ProgressSnapshot } from '../entities/Session';

export interface IStatusRecord {
  /**
   * Overwrites the current snapshot (single writer)
   */
  publish(snapshot: ProgressSnapshot): void;

  /**
   * Latest published snapshot, or null before the first publish
   */
  latest(): ProgressSnapshot | null;

  /**
   * Removes any artifact the record keeps on disk
   */
  clear(): Promise<void>;
}
