import { Module } from '@nestjs/common';
import { PostgresService } from './postgres.service';

/**
 * Internal-only Postgres module.
 * No controllers; exports the service for the repositories.
 */
@Module({
  providers: [PostgresService],
  exports: [PostgresService],
})
export class PostgresModule {}
