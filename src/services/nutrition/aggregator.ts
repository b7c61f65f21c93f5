/**
 * Nutrition Aggregation
 *
 * Field-wise sums of nutrition profiles. Pure and order-independent.
 */

import type { Meal, NutritionProfile, Recipe } from '../../types';

export const ZERO_NUTRITION: Readonly<NutritionProfile> = Object.freeze({
  calories: 0,
  proteinG: 0,
  fatG: 0,
  carbsG: 0,
});

export function addNutrition(a: NutritionProfile, b: NutritionProfile): NutritionProfile {
  return {
    calories: a.calories + b.calories,
    proteinG: a.proteinG + b.proteinG,
    fatG: a.fatG + b.fatG,
    carbsG: a.carbsG + b.carbsG,
  };
}

export function sumNutrition(profiles: readonly NutritionProfile[]): NutritionProfile {
  return profiles.reduce<NutritionProfile>(addNutrition, { ...ZERO_NUTRITION });
}

/**
 * Daily total of a set of meals. Empty input yields the zero profile.
 */
export function aggregateMeals(meals: readonly Meal[]): NutritionProfile {
  return sumNutrition(meals.map((meal) => meal.nutrition));
}

export function aggregateRecipes(
  recipes: readonly Recipe[],
  calculator: { calculateRecipeNutrition(recipe: Recipe): NutritionProfile }
): NutritionProfile {
  return sumNutrition(recipes.map((recipe) => calculator.calculateRecipeNutrition(recipe)));
}
