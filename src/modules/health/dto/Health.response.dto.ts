// Response DTO for GET /api/health

export type DatabaseState = 'up' | 'down';

export class HealthResponseDto {
  public readonly status: 'ok' | 'degraded';
  public readonly timestamp: string; // ISO-8601
  public readonly uptimeSec: number;
  public readonly database: DatabaseState;

  public constructor(args: {
    timestamp: string;
    uptimeSec: number;
    database: DatabaseState;
  }) {
    this.status = args.database === 'up' ? 'ok' : 'degraded';
    this.timestamp = args.timestamp;
    this.uptimeSec = args.uptimeSec;
    this.database = args.database;
  }
}
