import { HealthService, HealthStatus } from '@health/health.service';
import { Controller, Get } from '@nestjs/common';

@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * GET /api/health
   * Process uptime plus the sync monitor's alert state and last observed snapshot
   */
  @Get()
  getHealth(): HealthStatus {
    return this.healthService.getHealth();
  }
}
