import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { PostgresService } from '../postgres/postgres.service';
import { TableRepository } from '../postgres/table.repository';
import { ENTITY_FILTERS } from '../../lib/query/entity-filters';
import type { CreateRecipeInput, RecipePatch, RecipeRow } from './types';

function columns(input: RecipePatch): Record<string, unknown> {
  return {
    title: input.title,
    data: input.data,
    external_url: input.external_url,
    genre: input.genre,
    grocery_list: input.grocery_list,
    prep_time: input.prep_time,
    cook_time: input.cook_time,
    total_time: input.total_time,
    servings: input.servings,
    difficulty: input.difficulty,
    rating: input.rating,
    tags: input.tags,
    user_uid: input.user_uid,
    household_uid: input.household_uid,
  };
}

@Injectable()
export class RecipesRepository extends TableRepository<RecipeRow, string> {
  constructor(pg: PostgresService) {
    super(pg, {
      table: 'recipes',
      sortFields: ENTITY_FILTERS.recipes.sortFields,
    });
  }

  protected keyColumns(id: string): Record<string, unknown> {
    return { id };
  }

  protected describeKey(id: string): string {
    return id;
  }

  public async create(input: CreateRecipeInput): Promise<RecipeRow> {
    return this.insertRow({
      id: randomUUID(),
      ...columns(input),
      tags: input.tags ?? [],
    });
  }

  public async update(id: string, patch: RecipePatch): Promise<RecipeRow> {
    return this.updateRow(id, columns(patch));
  }
}
