import { AlertModule } from '@alerts/alert.module';
import { BlockchainModule } from '@blockchain/blockchain.module';
import { ConfigService } from '@config/config.service';
import { MetricsModule } from '@metrics/metrics.module';
import { SyncStateService } from '@monitoring/sync/sync-state.service';
import { SYNC_MONITOR_CONFIG } from '@monitoring/sync/sync.constants';
import { SyncMonitorService } from '@monitoring/sync/sync.monitor';
import { SyncReporter } from '@monitoring/sync/sync.reporter';
import { SyncSampler } from '@monitoring/sync/sync.sampler';
import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';

@Module({
  imports: [ScheduleModule.forRoot(), BlockchainModule, AlertModule, MetricsModule],
  providers: [
    {
      provide: SYNC_MONITOR_CONFIG,
      useFactory: (configService: ConfigService) => configService.getSyncMonitorConfig(),
      inject: [ConfigService],
    },
    SyncStateService,
    SyncSampler,
    SyncReporter,
    SyncMonitorService,
  ],
  exports: [SyncMonitorService],
})
export class MonitoringModule {}
