import { Injectable } from '@nestjs/common';
import { PostgresService } from '../postgres/postgres.service';
import type { DatabaseState } from './dto/Health.response.dto';

export interface HealthSnapshot {
  timestamp: string; // ISO-8601 timestamp
  uptimeSec: number;
  database: DatabaseState;
}

@Injectable()
export class HealthService {
  public constructor(private readonly pg: PostgresService) {}

  public async check(): Promise<HealthSnapshot> {
    const reachable = await this.pg.ping();
    return {
      timestamp: new Date().toISOString(),
      uptimeSec: Math.floor(process.uptime()),
      database: reachable ? 'up' : 'down',
    };
  }
}
