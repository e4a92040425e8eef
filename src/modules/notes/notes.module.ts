import { Module } from '@nestjs/common';
import { PostgresModule } from '../postgres/postgres.module';
import { NotesController } from './notes.controller';
import { NotesRepository } from './notes.repository';

@Module({
  imports: [PostgresModule],
  controllers: [NotesController],
  providers: [NotesRepository],
  exports: [NotesRepository],
})
export class NotesModule {}
