import { formatDuration } from '@common/utils/duration';
import { SyncSnapshot } from '@types';

const UNKNOWN_BLOCK = 'unknown';

export function inSyncMessage(): string {
  return '🟢 your node is back in sync';
}

/**
 * Outage message. `since` carries the configured report interval, not the
 * time elapsed since the outage started.
 */
export function outOfSyncMessage(snapshot: SyncSnapshot | null, reportIntervalMs: number): string {
  const syncing = snapshot && !snapshot.synced ? snapshot : null;
  const currentBlock = syncing ? syncing.currentBlock.toString() : UNKNOWN_BLOCK;
  const highestBlock = syncing ? syncing.highestBlock.toString() : UNKNOWN_BLOCK;

  return (
    `🔴 your node is out of sync since ${formatDuration(reportIntervalMs)}\n` +
    `Current block: ${currentBlock}\n` +
    `Highest block: ${highestBlock}\n`
  );
}
