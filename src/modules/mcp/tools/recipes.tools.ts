import { Injectable, Logger } from '@nestjs/common';
import { RecipesRepository } from '../../recipes/recipes.repository';
import { applyRecipeRanges } from '../../recipes/recipe.filters';
import { ENTITY_FILTERS } from '../../../lib/query/entity-filters';
import { buildFiltersFromMCP } from '../../../lib/query/mcp-filters';
import { toListOptions } from '../../../lib/query/list-options';
import type { ToolArgs } from '../tool.args';
import type { ToolHandlerMap } from '../tool.handler';
import {
  describeError,
  errorResult,
  jsonResult,
  textResult,
} from '../tool.results';
import type { ToolCallResult } from '../types';

@Injectable()
export class RecipeTools {
  private readonly logger = new Logger(RecipeTools.name);

  constructor(private readonly recipes: RecipesRepository) {}

  handlers(): Pick<ToolHandlerMap, 'save_recipe' | 'find_recipes' | 'get_recipe'> {
    return {
      save_recipe: (args) => this.saveRecipe(args),
      find_recipes: (args) => this.findRecipes(args),
      get_recipe: (args) => this.getRecipe(args),
    };
  }

  async saveRecipe(args: ToolArgs): Promise<ToolCallResult> {
    const title = args.requiredString('title');
    const data = args.requiredString('data');
    const prepTime = args.integer('prep_time');
    const cookTime = args.integer('cook_time');
    const difficulty = args.integerInRange('difficulty', 1, 5);

    let totalTime: number | undefined;
    if (prepTime !== undefined && cookTime !== undefined && prepTime + cookTime > 0) {
      totalTime = prepTime + cookTime;
    }

    try {
      const recipe = await this.recipes.create({
        title,
        data,
        genre: args.string('genre'),
        grocery_list: args.string('grocery_list'),
        prep_time: prepTime,
        cook_time: cookTime,
        total_time: totalTime,
        servings: args.integer('servings'),
        difficulty: difficulty === undefined ? undefined : String(difficulty),
        rating: args.integerInRange('rating', 1, 5),
        user_uid: args.string('user_uid'),
        household_uid: args.string('household_uid'),
        tags: args.tags(),
      });
      this.logger.log(`Saved recipe ${recipe.id}`);
      return textResult(`Recipe saved successfully with ID: ${recipe.id}`);
    } catch (err) {
      return errorResult(`Failed to save recipe: ${describeError(err)}`);
    }
  }

  async findRecipes(args: ToolArgs): Promise<ToolCallResult> {
    const { filters: allowed } = ENTITY_FILTERS.recipes;
    const filters = applyRecipeRanges(buildFiltersFromMCP(args.all(), allowed), {
      min_rating: args.number('min_rating'),
      max_cook_time: args.number('max_cook_time'),
    });
    const options = toListOptions(
      {
        limit: args.limit(),
        offset: 0,
        sortBy: 'rating',
        sortDir: 'DESC',
        filters,
      },
      allowed,
    );
    try {
      return jsonResult(await this.recipes.list(options));
    } catch (err) {
      return errorResult(`Failed to find recipes: ${describeError(err)}`);
    }
  }

  async getRecipe(args: ToolArgs): Promise<ToolCallResult> {
    const recipeId = args.requiredString('recipe_id');
    try {
      return jsonResult(await this.recipes.get(recipeId));
    } catch (err) {
      return errorResult(`Recipe not found: ${describeError(err)}`);
    }
  }
}
