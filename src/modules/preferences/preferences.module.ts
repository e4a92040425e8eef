import { Module } from '@nestjs/common';
import { PostgresModule } from '../postgres/postgres.module';
import { PreferencesController } from './preferences.controller';
import { PreferencesRepository } from './preferences.repository';

@Module({
  imports: [PostgresModule],
  controllers: [PreferencesController],
  providers: [PreferencesRepository],
  exports: [PreferencesRepository],
})
export class PreferencesModule {}
