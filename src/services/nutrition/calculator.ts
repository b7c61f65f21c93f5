/**
 * Nutrition Calculator
 *
 * Computes ingredient and recipe nutrition from the ingredient store.
 *
 * Nutrition data is keyed per unit:
 * | Ingredient unit                          | Data key   | Formula                    |
 * |------------------------------------------|------------|----------------------------|
 * | g, gram(s), oz, ounce(s), serving, other | per_100g   | value × grams / 100        |
 * | scoop                                    | per_scoop  | value × quantity           |
 * | large                                    | per_large  | value × quantity           |
 *
 * When the mapped key is missing, the first of per_scoop, per_large, per_100g
 * present on the ingredient is used instead.
 */

import type { Ingredient, IngredientData, NutritionProfile, NutritionValues, Recipe } from '../../types';
import type { IngredientStore } from '../../data/ingredients';
import { IngredientNotFoundError } from '../../utils/errors';
import { ZERO_NUTRITION, addNutrition } from './aggregator';

export type NutritionUnitKey = 'per_100g' | 'per_scoop' | 'per_large';

export interface RecipeNutritionSource {
  calculateRecipeNutrition(recipe: Recipe): NutritionProfile;
}

export const GRAMS_PER_OUNCE = 28.35;
export const GRAMS_PER_SERVING = 100;

const UNIT_KEY_MAPPING: Record<string, NutritionUnitKey> = {
  g: 'per_100g',
  gram: 'per_100g',
  grams: 'per_100g',
  oz: 'per_100g',
  ounce: 'per_100g',
  ounces: 'per_100g',
  serving: 'per_100g',
  scoop: 'per_scoop',
  large: 'per_large',
};

const FALLBACK_KEY_ORDER: NutritionUnitKey[] = ['per_scoop', 'per_large', 'per_100g'];

export function findNutritionUnitKey(
  ingredient: Ingredient,
  data: IngredientData
): NutritionUnitKey | null {
  const mapped = UNIT_KEY_MAPPING[ingredient.unit.toLowerCase()];
  if (mapped && data[mapped]) {
    return mapped;
  }
  return FALLBACK_KEY_ORDER.find((key) => data[key] !== undefined) ?? null;
}

export function convertQuantityToGrams(ingredient: Ingredient): number {
  switch (ingredient.unit.toLowerCase()) {
    case 'oz':
    case 'ounce':
    case 'ounces':
      return ingredient.quantity * GRAMS_PER_OUNCE;
    case 'serving':
      return ingredient.quantity * GRAMS_PER_SERVING;
    default:
      // g, gram, grams, and anything unrecognised
      return ingredient.quantity;
  }
}

function scale(values: NutritionValues, factor: number): NutritionProfile {
  return {
    calories: values.calories * factor,
    proteinG: values.protein_g * factor,
    fatG: values.fat_g * factor,
    carbsG: values.carbs_g * factor,
  };
}

export class NutritionCalculator implements RecipeNutritionSource {
  constructor(private readonly ingredients: IngredientStore) {}

  /**
   * Nutrition of one ingredient.
   * Throws IngredientNotFoundError for unknown ingredients, to-taste
   * ingredients and ingredients without usable nutrition data.
   */
  calculateIngredientNutrition(ingredient: Ingredient): NutritionProfile {
    if (ingredient.isToTaste) {
      throw new IngredientNotFoundError(ingredient.name, "'to taste' ingredients carry no quantity");
    }

    const data = this.ingredients.getIngredientByName(ingredient.name);
    if (!data) {
      throw new IngredientNotFoundError(ingredient.name);
    }

    const unitKey = findNutritionUnitKey(ingredient, data);
    const values = unitKey ? data[unitKey] : undefined;
    if (!unitKey || !values) {
      throw new IngredientNotFoundError(ingredient.name, 'no matching nutrition unit found');
    }

    if (unitKey === 'per_100g') {
      return scale(values, convertQuantityToGrams(ingredient) / 100);
    }
    return scale(values, ingredient.quantity);
  }

  /**
   * Sum over the recipe's ingredients. To-taste and unknown ingredients
   * contribute nothing; use findUnresolvedIngredients to report the latter.
   */
  calculateRecipeNutrition(recipe: Recipe): NutritionProfile {
    return recipe.ingredients
      .filter((ingredient) => this.canCalculate(ingredient))
      .reduce<NutritionProfile>(
        (total, ingredient) => addNutrition(total, this.calculateIngredientNutrition(ingredient)),
        { ...ZERO_NUTRITION }
      );
  }

  canCalculate(ingredient: Ingredient): boolean {
    if (ingredient.isToTaste) return false;
    const data = this.ingredients.getIngredientByName(ingredient.name);
    return data !== null && findNutritionUnitKey(ingredient, data) !== null;
  }

  /**
   * Names of non-to-taste ingredients that cannot be resolved, in first-seen order.
   */
  findUnresolvedIngredients(recipes: readonly Recipe[]): string[] {
    const unresolved = new Set<string>();
    for (const recipe of recipes) {
      for (const ingredient of recipe.ingredients) {
        if (!ingredient.isToTaste && !this.canCalculate(ingredient)) {
          unresolved.add(ingredient.name);
        }
      }
    }
    return [...unresolved];
  }
}
