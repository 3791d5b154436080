import { RpcError } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { MetricsService } from '@metrics/metrics.service';
import { Logger } from '@nestjs/common';
import { SyncStateService } from './sync-state.service';
import { SyncSampler } from './sync.sampler';
import { FakeNodeClient, syncing } from './testing/fakes';

describe('SyncSampler', () => {
  let state: SyncStateService;
  let metrics: MetricsService;

  function createSampler(client: FakeNodeClient): SyncSampler {
    return new SyncSampler(client, state, metrics);
  }

  beforeEach(() => {
    state = new SyncStateService();
    metrics = new MetricsService(new ConfigService({}));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('counts a fully synced node', async () => {
    const sampler = createSampler(new FakeNodeClient([null]));

    await expect(sampler.sample()).resolves.toBe('synced');

    expect(state.peekSyncedCount()).toBe(1);
    expect(state.getSnapshot()).toMatchObject({ synced: true });
  });

  it('stores the block figures of a syncing node without counting it', async () => {
    const sampler = createSampler(new FakeNodeClient([syncing(100n, 200n)]));

    await expect(sampler.sample()).resolves.toBe('syncing');

    expect(state.peekSyncedCount()).toBe(0);
    expect(state.getSnapshot()).toMatchObject({ synced: false, currentBlock: 100n, highestBlock: 200n });
  });

  it('leaves count and snapshot untouched when the query fails', async () => {
    const sampler = createSampler(
      new FakeNodeClient([syncing(100n, 200n), new RpcError('connect ECONNREFUSED', 'localhost:8545', 'eth_syncing')]),
    );
    await sampler.sample();
    const before = state.getSnapshot();

    await expect(sampler.sample()).resolves.toBe('failed');

    expect(state.peekSyncedCount()).toBe(0);
    expect(state.getSnapshot()).toBe(before);
  });

  it('logs a failed query once, as raised by the node client', async () => {
    const logError = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const failure = new RpcError('connect ECONNREFUSED', 'localhost:8545', 'eth_syncing');
    const sampler = createSampler(new FakeNodeClient([failure]));

    await sampler.sample();

    expect(logError.mock.calls).toEqual([['RpcError(RPC_ERROR): connect ECONNREFUSED', failure.stack]]);
  });

  it('treats unexpected errors as a failed sample', async () => {
    const sampler = createSampler(new FakeNodeClient([new Error('socket closed')]));

    await expect(sampler.sample()).resolves.toBe('failed');
    expect(state.getSnapshot()).toBeNull();
  });

  it('accumulates synced samples across a window', async () => {
    const sampler = createSampler(new FakeNodeClient([null, syncing(1n, 2n), null, new Error('timeout'), null]));

    for (let i = 0; i < 5; i++) {
      await sampler.sample();
    }

    expect(state.peekSyncedCount()).toBe(3);
    expect(state.getSnapshot()).toMatchObject({ synced: true });
  });

  it('reports each outcome to the metrics service', async () => {
    const record = jest.spyOn(metrics, 'recordSyncSample');
    const sampler = createSampler(new FakeNodeClient([null, syncing(3n, 4n), new Error('timeout')]));

    await sampler.sample();
    await sampler.sample();
    await sampler.sample();

    expect(record.mock.calls).toEqual([['synced'], ['syncing', syncing(3n, 4n)], ['failed']]);
  });
});
