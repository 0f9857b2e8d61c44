import { Controller, Get } from '@nestjs/common';
import { HealthResponseDto, HealthService } from './health.service';

@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * GET /api/health
   */
  @Get()
  async getHealth(): Promise<HealthResponseDto> {
    return this.healthService.getHealth();
  }
}
