import { MEASUREMENTS } from '@common/constants/config';
import { getErrorMessage } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { InfluxDB, Point, WriteApi } from '@influxdata/influxdb-client';
import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { SampleOutcome, SyncProgress, SyncTransition } from '@types';

/**
 * InfluxDB Metrics Service
 * Records sync samples and alert transitions; a no-op unless InfluxDB is enabled
 */
@Injectable()
export class MetricsService implements OnModuleDestroy {
  private readonly logger = new Logger(MetricsService.name);
  private readonly writeApi: WriteApi | null = null;

  private readonly BATCH_SIZE = 20;
  private readonly FLUSH_INTERVAL = 5000; // 5 seconds

  constructor(configService: ConfigService) {
    const influxConfig = configService.getInfluxDbConfig();
    if (!influxConfig.enabled) {
      this.logger.log('InfluxDB metrics disabled');
      return;
    }

    this.logger.log(`Connecting to InfluxDB at ${influxConfig.url}, bucket ${influxConfig.bucket}`);
    const influxClient = new InfluxDB({ url: influxConfig.url, token: influxConfig.token, timeout: 30000 });
    this.writeApi = influxClient.getWriteApi(influxConfig.org, influxConfig.bucket, 'ms', {
      batchSize: this.BATCH_SIZE,
      flushInterval: this.FLUSH_INTERVAL,
      maxRetries: 3,
      writeFailed: (error: Error) => {
        this.logger.error(`Error writing metrics to InfluxDB: ${error.message}`);
      },
    });
  }

  get enabled(): boolean {
    return this.writeApi !== null;
  }

  /**
   * Record the outcome of one sync sample
   */
  recordSyncSample(outcome: SampleOutcome, progress?: SyncProgress): void {
    const point = new Point(MEASUREMENTS.SYNC_SAMPLE)
      .tag('outcome', outcome)
      .intField('synced', outcome === 'synced' ? 1 : 0)
      .timestamp(new Date());

    if (progress) {
      point
        .uintField('current_block', progress.currentBlock.toString())
        .uintField('highest_block', progress.highestBlock.toString());
    }

    this.writePoint(point);
  }

  /**
   * Record an alert state change
   */
  recordAlertTransition(transition: SyncTransition): void {
    this.writePoint(
      new Point(MEASUREMENTS.SYNC_ALERT)
        .tag('transition', transition)
        .booleanField('alerting', transition === 'out-of-sync')
        .timestamp(new Date()),
    );
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.writeApi) return;

    try {
      await this.writeApi.close();
      this.logger.log('InfluxDB write API closed');
    } catch (error) {
      this.logger.error(`Error closing InfluxDB write API: ${getErrorMessage(error)}`);
    }
  }

  private writePoint(point: Point): void {
    if (!this.writeApi) return;

    try {
      this.writeApi.writePoint(point);
    } catch (error) {
      this.logger.error(`Error writing point to InfluxDB: ${getErrorMessage(error)}`);
    }
  }
}
