import { Module } from '@nestjs/common';
import { PostgresModule } from '../postgres/postgres.module';
import { RecipesController } from './recipes.controller';
import { RecipesRepository } from './recipes.repository';

@Module({
  imports: [PostgresModule],
  controllers: [RecipesController],
  providers: [RecipesRepository],
  exports: [RecipesRepository],
})
export class RecipesModule {}
