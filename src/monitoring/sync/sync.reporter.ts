import { NOTIFIER, Notifier } from '@common/interfaces';
import { ErrorHandler } from '@common/utils/error-handler';
import { MetricsService } from '@metrics/metrics.service';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { SyncMonitorConfig, SyncTransition } from '@types';
import { SYNC_MONITOR_CONFIG } from './sync.constants';
import { inSyncMessage, outOfSyncMessage } from './sync.messages';
import { SyncStateService } from './sync-state.service';
import { resolveTransition } from './sync.transition';

/**
 * Closes a reporting window: decides whether the node changed between in sync
 * and out of sync, and notifies the operator once per change
 */
@Injectable()
export class SyncReporter {
  private readonly logger = new Logger(SyncReporter.name);
  private readonly errorHandler = new ErrorHandler(SyncReporter.name);
  private alerting = false;
  private lastReportAt: Date | null = null;

  constructor(
    @Inject(SYNC_MONITOR_CONFIG) private readonly config: SyncMonitorConfig,
    @Inject(NOTIFIER) private readonly notifier: Notifier,
    private readonly syncState: SyncStateService,
    private readonly metricsService: MetricsService,
  ) {}

  isAlerting(): boolean {
    return this.alerting;
  }

  getLastReportAt(): Date | null {
    return this.lastReportAt;
  }

  /**
   * @returns the transition applied on this tick, or `null` when the state did not change
   */
  async report(): Promise<SyncTransition | null> {
    const syncedSamples = this.syncState.takeSyncedCount();
    this.lastReportAt = new Date();

    const transition = resolveTransition(syncedSamples, this.alerting);
    if (!transition) {
      this.logger.debug(
        `${syncedSamples} synced samples in window, still ${this.alerting ? 'out of sync' : 'in sync'}`,
      );
      return null;
    }

    // The state advances even if the notification below fails
    this.alerting = transition === 'out-of-sync';
    this.metricsService.recordAlertTransition(transition);

    const text = transition === 'back-in-sync' ? this.backInSync() : this.outOfSync();
    try {
      await this.notifier.sendMessage(this.config.alertGroup, text);
    } catch (error) {
      this.errorHandler.handleError(error, 'error sending message');
    }

    return transition;
  }

  private backInSync(): string {
    this.logger.log('node is back in sync');
    return inSyncMessage();
  }

  private outOfSync(): string {
    const snapshot = this.syncState.getSnapshot();
    if (snapshot && !snapshot.synced) {
      this.logger.warn(
        `node is out of sync: current block ${snapshot.currentBlock}, highest block ${snapshot.highestBlock}`,
      );
    } else {
      this.logger.warn('node is out of sync: no block figures observed');
    }
    return outOfSyncMessage(snapshot, this.config.reportIntervalMs);
  }
}
