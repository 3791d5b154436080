import { HealthController } from '@health/health.controller';
import { HealthService } from '@health/health.service';
import { MonitoringModule } from '@monitoring/monitoring.module';
import { Module } from '@nestjs/common';

@Module({
  imports: [MonitoringModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
