/**
 * Recipe Store
 *
 * In-memory recipe catalog loaded from a JSON file. Catalog order is kept
 * exactly as written in the file: the planner breaks score ties by it.
 */

import { RecipeFileSchema, type RecipeInput, type Recipe, type Ingredient } from '../types';
import { DataLoadError } from '../utils/errors';
import { readJsonFile } from './json';

export interface RecipeSource {
  getAllRecipes(): readonly Recipe[];
}

export function isToTasteUnit(unit: string): boolean {
  return unit.toLowerCase().includes('to taste');
}

export function toRecipe(input: RecipeInput): Recipe {
  const ingredients: Ingredient[] = input.ingredients.map((ing) => {
    const isToTaste = isToTasteUnit(ing.unit);
    return {
      name: ing.name,
      quantity: isToTaste ? 0 : ing.quantity ?? 0,
      unit: ing.unit,
      isToTaste,
    };
  });

  return Object.freeze({
    id: input.id,
    name: input.name,
    ingredients: Object.freeze(ingredients),
    cookingTimeMinutes: input.cooking_time_minutes,
    instructions: Object.freeze([...input.instructions]),
  });
}

export class RecipeStore implements RecipeSource {
  private readonly recipes: readonly Recipe[];
  private readonly byId: Map<string, Recipe>;

  constructor(recipes: readonly Recipe[]) {
    this.byId = new Map();
    for (const recipe of recipes) {
      if (this.byId.has(recipe.id)) {
        throw new DataLoadError('recipes', `duplicate recipe id '${recipe.id}'`);
      }
      this.byId.set(recipe.id, recipe);
    }
    this.recipes = [...recipes];
  }

  static fromFile(path: string): RecipeStore {
    const file = readJsonFile(path, RecipeFileSchema, 'recipes');
    return new RecipeStore(file.recipes.map(toRecipe));
  }

  getAllRecipes(): readonly Recipe[] {
    return [...this.recipes];
  }

  getRecipeById(id: string): Recipe | null {
    return this.byId.get(id) ?? null;
  }

  get size(): number {
    return this.recipes.length;
  }
}
