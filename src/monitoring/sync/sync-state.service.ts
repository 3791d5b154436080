import { Injectable } from '@nestjs/common';
import { SyncProgress, SyncSnapshot } from '@types';

/**
 * State shared by the sampler and the reporter: the number of fully synced
 * samples in the current reporting window and the last observed snapshot.
 *
 * Every operation is synchronous and never spans I/O, so the event loop runs
 * each one to completion before the other periodic task can touch the state.
 * `takeSyncedCount` reads and resets in the same step: an increment lands
 * either before the reset (and is returned) or after it (and is kept for the
 * next window).
 */
@Injectable()
export class SyncStateService {
  private syncedCount = 0;
  private snapshot: SyncSnapshot | null = null;

  recordSynced(observedAt = new Date()): void {
    this.syncedCount++;
    this.snapshot = { synced: true, observedAt };
  }

  recordSyncing(progress: SyncProgress, observedAt = new Date()): void {
    this.snapshot = {
      synced: false,
      currentBlock: progress.currentBlock,
      highestBlock: progress.highestBlock,
      observedAt,
    };
  }

  /**
   * Return the synced count of the closing window and start a new one
   */
  takeSyncedCount(): number {
    const count = this.syncedCount;
    this.syncedCount = 0;
    return count;
  }

  peekSyncedCount(): number {
    return this.syncedCount;
  }

  /**
   * Last successfully observed status; `null` until the first sample succeeds
   */
  getSnapshot(): SyncSnapshot | null {
    return this.snapshot;
  }
}
