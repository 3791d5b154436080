import { SCHEDULER } from '@common/constants/config';
import { formatDuration } from '@common/utils/duration';
import { getErrorMessage } from '@common/utils/error-handler';
import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { SyncMonitorConfig, SyncMonitorStatus } from '@types';
import { SYNC_MONITOR_CONFIG } from './sync.constants';
import { SyncReporter } from './sync.reporter';
import { SyncSampler } from './sync.sampler';
import { SyncStateService } from './sync-state.service';

interface IntervalOptions {
  runImmediately: boolean;
  exclusive: boolean;
}

/**
 * Runs the sampler and the reporter on their own intervals. The two tasks
 * only meet through SyncStateService.
 */
@Injectable()
export class SyncMonitorService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(SyncMonitorService.name);
  private readonly inFlight = new Set<string>();

  constructor(
    @Inject(SYNC_MONITOR_CONFIG) private readonly config: SyncMonitorConfig,
    private readonly sampler: SyncSampler,
    private readonly reporter: SyncReporter,
    private readonly syncState: SyncStateService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  /**
   * Runs after every module initialised, so a failed credential check stops
   * startup before anything is scheduled
   */
  onApplicationBootstrap(): void {
    const { checkIntervalMs, reportIntervalMs } = this.config;

    // First sample right away; first report after a full window. A report
    // settles its state before sending, so a slow send never holds back the next window.
    this.registerInterval(SCHEDULER.SAMPLER_INTERVAL, () => this.sampler.sample(), checkIntervalMs, {
      runImmediately: true,
      exclusive: true,
    });
    this.registerInterval(SCHEDULER.REPORTER_INTERVAL, () => this.reporter.report(), reportIntervalMs, {
      runImmediately: false,
      exclusive: false,
    });

    this.logger.log(
      `Sync monitoring started: checking every ${formatDuration(checkIntervalMs)}, ` +
        `reporting every ${formatDuration(reportIntervalMs)}`,
    );
  }

  onModuleDestroy(): void {
    this.deregisterInterval(SCHEDULER.SAMPLER_INTERVAL);
    this.deregisterInterval(SCHEDULER.REPORTER_INTERVAL);
    this.logger.log('Sync monitoring intervals deregistered');
  }

  getStatus(): SyncMonitorStatus {
    const snapshot = this.syncState.getSnapshot();
    const lastReportAt = this.reporter.getLastReportAt();

    return {
      alerting: this.reporter.isAlerting(),
      syncedSamplesInWindow: this.syncState.peekSyncedCount(),
      checkInterval: formatDuration(this.config.checkIntervalMs),
      reportInterval: formatDuration(this.config.reportIntervalMs),
      lastReportAt: lastReportAt ? lastReportAt.toISOString() : null,
      snapshot: !snapshot
        ? null
        : snapshot.synced
          ? { synced: true, observedAt: snapshot.observedAt.toISOString() }
          : {
              synced: false,
              currentBlock: snapshot.currentBlock.toString(),
              highestBlock: snapshot.highestBlock.toString(),
              observedAt: snapshot.observedAt.toISOString(),
            },
    };
  }

  private registerInterval(
    name: string,
    task: () => Promise<unknown>,
    intervalMs: number,
    options: IntervalOptions,
  ): void {
    if (this.schedulerRegistry.doesExist('interval', name)) {
      this.schedulerRegistry.deleteInterval(name);
    }

    if (options.runImmediately) {
      this.runTask(name, task, options.exclusive);
    }

    const interval = setInterval(() => this.runTask(name, task, options.exclusive), intervalMs);
    this.schedulerRegistry.addInterval(name, interval);
    this.logger.log(`Registered ${name} interval with ${intervalMs}ms period`);
  }

  private deregisterInterval(name: string): void {
    if (this.schedulerRegistry.doesExist('interval', name)) {
      this.schedulerRegistry.deleteInterval(name);
    }
  }

  /**
   * For an exclusive task, a tick that arrives while the previous run is
   * still pending is dropped
   */
  private runTask(name: string, task: () => Promise<unknown>, exclusive: boolean): void {
    if (!exclusive) {
      void task().catch(error => {
        this.logger.error(`Error in ${name}: ${getErrorMessage(error)}`);
      });
      return;
    }

    if (this.inFlight.has(name)) {
      this.logger.warn(`Previous ${name} run still in progress, skipping tick`);
      return;
    }

    this.inFlight.add(name);
    void task()
      .catch(error => {
        this.logger.error(`Error in ${name}: ${getErrorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(name);
      });
  }
}
