import { MetricsService } from '@metrics/metrics.service';
import { Module } from '@nestjs/common';

@Module({
  providers: [MetricsService],
  exports: [MetricsService],
})
export class MetricsModule {}
