import { NODE_SYNC_CLIENT, NodeSyncClient } from '@common/interfaces';
import { ErrorHandler } from '@common/utils/error-handler';
import { MetricsService } from '@metrics/metrics.service';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { SampleOutcome, SyncProgress } from '@types';
import { SyncStateService } from './sync-state.service';

/**
 * Samples the node's sync status once per check interval
 */
@Injectable()
export class SyncSampler {
  private readonly logger = new Logger(SyncSampler.name);
  private readonly errorHandler = new ErrorHandler(SyncSampler.name);

  constructor(
    @Inject(NODE_SYNC_CLIENT) private readonly nodeClient: NodeSyncClient,
    private readonly syncState: SyncStateService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Query the node and record the result. A failed query leaves the state
   * untouched: it counts neither as synced nor as syncing.
   */
  async sample(): Promise<SampleOutcome> {
    let progress: SyncProgress | null;
    try {
      progress = await this.nodeClient.querySyncProgress();
    } catch (error) {
      this.errorHandler.handleError(error, 'error while checking sync status');
      this.metricsService.recordSyncSample('failed');
      return 'failed';
    }

    if (!progress) {
      this.syncState.recordSynced();
      this.logger.debug('Node is fully synced');
      this.metricsService.recordSyncSample('synced');
      return 'synced';
    }

    this.syncState.recordSyncing(progress);
    this.logger.debug(`Node is syncing: current block ${progress.currentBlock}, highest block ${progress.highestBlock}`);
    this.metricsService.recordSyncSample('syncing', progress);
    return 'syncing';
  }
}
