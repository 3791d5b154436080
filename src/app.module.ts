import { ConfigModule } from '@config/config.module';
import { HealthModule } from '@health/health.module';
import { LoggerModule } from '@logging/logger.module';
import { MonitoringModule } from '@monitoring/monitoring.module';
import { Module } from '@nestjs/common';

@Module({
  imports: [ConfigModule, LoggerModule, MonitoringModule, HealthModule],
})
export class AppModule {}
