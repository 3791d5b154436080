/**
 * Node synchronization interfaces
 */

/**
 * Progress reported by `eth_syncing` while the node is still catching up
 */
export interface SyncProgress {
  startingBlock: bigint;
  currentBlock: bigint;
  highestBlock: bigint;
}

/**
 * Last successfully observed sync status of the node
 */
export type SyncSnapshot =
  | {
      synced: true;
      observedAt: Date;
    }
  | {
      synced: false;
      currentBlock: bigint;
      highestBlock: bigint;
      observedAt: Date;
    };
