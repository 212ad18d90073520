import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  @Get()
  @ApiOperation({ summary: 'Ledger, database and auth status' })
  @ApiResponse({ status: 200, description: 'Health report; status is degraded when a dependency is down' })
  public async getHealth(): Promise<AppHealthStatus> {
    return this.healthService.getHealthStatus();
  }
}
