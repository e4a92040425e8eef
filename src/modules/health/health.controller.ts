import { Controller, Get } from '@nestjs/common';
import { HealthService } from './health.service';
import { HealthResponseDto } from './dto/Health.response.dto';

@Controller('api/health')
export class HealthController {
  public constructor(private readonly healthService: HealthService) {}

  /** Liveness plus a `SELECT 1` probe. Answers 200 even when the database is down. */
  @Get()
  public async health(): Promise<HealthResponseDto> {
    const r = await this.healthService.check();
    return new HealthResponseDto({
      timestamp: r.timestamp,
      uptimeSec: r.uptimeSec,
      database: r.database,
    });
  }
}
