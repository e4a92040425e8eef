import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { RecipesRepository } from './recipes.repository';
import { CreateRecipeRequestDto } from './dto/CreateRecipe.request.dto';
import { UpdateRecipeRequestDto } from './dto/UpdateRecipe.request.dto';
import { applyRecipeRanges } from './recipe.filters';
import type { RecipeRow } from './types';
import type { RawQuery } from '../../lib/query/types';
import { ENTITY_FILTERS } from '../../lib/query/entity-filters';
import { firstValue, parseListParams } from '../../lib/query/list-params';
import { toListOptions } from '../../lib/query/list-options';
import {
  RecordNotFoundError,
  UnsafeIdentifierError,
} from '../../lib/errors/RecordsError';

@Controller('api/recipes')
export class RecipesController {
  constructor(private readonly recipes: RecipesRepository) {}

  private mapDomainError(err: unknown): never {
    if (err instanceof RecordNotFoundError) {
      throw new NotFoundException(err.message);
    }
    if (err instanceof UnsafeIdentifierError) {
      throw new BadRequestException(err.message);
    }
    throw err;
  }

  @Post()
  async create(@Body() body: CreateRecipeRequestDto): Promise<RecipeRow> {
    try {
      return await this.recipes.create(body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  /** Paged list; also takes `min_rating` and `max_cook_time`. */
  @Get()
  async list(@Query() query: RawQuery): Promise<RecipeRow[]> {
    const { sortFields, filters } = ENTITY_FILTERS.recipes;
    const params = parseListParams(query, sortFields);
    applyRecipeRanges(params.filters, {
      min_rating: firstValue(query['min_rating']),
      max_cook_time: firstValue(query['max_cook_time']),
    });
    try {
      return await this.recipes.list(toListOptions(params, filters));
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<RecipeRow> {
    try {
      return await this.recipes.get(id);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Put(':id')
  async update(
    @Param('id') id: string,
    @Body() body: UpdateRecipeRequestDto,
  ): Promise<RecipeRow> {
    try {
      return await this.recipes.update(id, body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(@Param('id') id: string): Promise<void> {
    try {
      await this.recipes.delete(id);
    } catch (err) {
      this.mapDomainError(err);
    }
  }
}
