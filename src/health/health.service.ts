import { ConfigService } from '@config/config.service';
import { SyncMonitorService } from '@monitoring/sync/sync.monitor';
import { Injectable } from '@nestjs/common';
import { SyncMonitorStatus } from '@types';

export interface HealthStatus {
  status: 'ok';
  uptime: number;
  timestamp: string;
  environment: string;
  services: {
    syncMonitor: {
      status: 'ok' | 'warning';
      details: SyncMonitorStatus;
    };
  };
}

@Injectable()
export class HealthService {
  private readonly startTime = Date.now();

  constructor(
    private readonly configService: ConfigService,
    private readonly syncMonitor: SyncMonitorService,
  ) {}

  /**
   * Get the health status of the application
   */
  getHealth(): HealthStatus {
    const details = this.syncMonitor.getStatus();

    return {
      status: 'ok',
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      timestamp: new Date().toISOString(),
      environment: this.configService.getEnvironment(),
      services: {
        syncMonitor: {
          status: details.alerting ? 'warning' : 'ok',
          details,
        },
      },
    };
  }
}
