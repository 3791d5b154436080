import { inSyncMessage, outOfSyncMessage } from './sync.messages';

const observedAt = new Date('2026-01-01T00:00:00Z');

describe('sync messages', () => {
  it('builds the recovery message', () => {
    expect(inSyncMessage()).toBe('🟢 your node is back in sync');
  });

  it('builds the outage message from the last syncing snapshot', () => {
    const text = outOfSyncMessage({ synced: false, currentBlock: 100n, highestBlock: 200n, observedAt }, 5000);

    expect(text).toBe('🔴 your node is out of sync since 5s\nCurrent block: 100\nHighest block: 200\n');
  });

  it('renders the report interval, not the outage duration', () => {
    const text = outOfSyncMessage({ synced: false, currentBlock: 1n, highestBlock: 2n, observedAt }, 5400000);

    expect(text.split('\n')[0]).toBe('🔴 your node is out of sync since 1h30m0s');
  });

  it('marks block figures unknown when the node was never observed', () => {
    expect(outOfSyncMessage(null, 300000)).toBe(
      '🔴 your node is out of sync since 5m0s\nCurrent block: unknown\nHighest block: unknown\n',
    );
  });

  it('marks block figures unknown when the last snapshot was synced', () => {
    expect(outOfSyncMessage({ synced: true, observedAt }, 60000)).toBe(
      '🔴 your node is out of sync since 1m0s\nCurrent block: unknown\nHighest block: unknown\n',
    );
  });
});
