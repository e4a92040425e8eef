import { Module } from '@nestjs/common';
import { PostgresModule } from '../postgres/postgres.module';
import { TodosController } from './todos.controller';
import { TodosRepository } from './todos.repository';

@Module({
  imports: [PostgresModule],
  controllers: [TodosController],
  providers: [TodosRepository],
  exports: [TodosRepository],
})
export class TodosModule {}
