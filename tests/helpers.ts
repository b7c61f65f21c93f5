import type {
  Ingredient,
  Meal,
  MealContext,
  MealType,
  NutritionProfile,
  Recipe,
  UserProfile,
} from '../src/types';
import { buildGoals } from '../src/data/profile';
import type { RecipeNutritionSource } from '../src/services/nutrition/calculator';
import { containsAllergens, type RecipeScoring } from '../src/services/scoring';

export function nutrition(
  calories: number,
  proteinG: number,
  fatG: number,
  carbsG: number
): NutritionProfile {
  return { calories, proteinG, fatG, carbsG };
}

export function ingredient(name: string, quantity = 100, unit = 'g'): Ingredient {
  const isToTaste = unit === 'to taste';
  return { name, quantity: isToTaste ? 0 : quantity, unit, isToTaste };
}

export function makeRecipe(
  id: string,
  options: { cookingTimeMinutes?: number; ingredients?: Ingredient[]; name?: string } = {}
): Recipe {
  return {
    id,
    name: options.name ?? id,
    ingredients: options.ingredients ?? [ingredient(`${id} base`)],
    cookingTimeMinutes: options.cookingTimeMinutes ?? 5,
    instructions: [],
  };
}

export function makeMeal(
  mealType: MealType,
  profile: NutritionProfile,
  recipeId: string = mealType
): Meal {
  return { recipe: makeRecipe(recipeId), nutrition: profile, mealType, busynessLevel: 2 };
}

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    goals: buildGoals(2400, 150, 60, 80),
    schedule: { '07:00': 2, '12:00': 3, '18:00': 3 },
    likedFoods: [],
    dislikedFoods: [],
    allergies: [],
    ...overrides,
  };
}

export function makeContext(overrides: Partial<MealContext> = {}): MealContext {
  return {
    mealType: 'lunch',
    timeSlot: 'afternoon',
    cookingTimeMax: 30,
    targetCalories: 800,
    targetProtein: 50,
    targetFatMin: 20,
    targetFatMax: 30,
    targetCarbs: 100,
    satietyRequirement: 'medium',
    carbTimingPreference: 'maintenance',
    priorityMicronutrients: [],
    ...overrides,
  };
}

/** Nutrition looked up by recipe id; unknown ids are all zeros. */
export class FakeCalculator implements RecipeNutritionSource {
  constructor(private readonly byRecipeId: Record<string, NutritionProfile>) {}

  calculateRecipeNutrition(recipe: Recipe): NutritionProfile {
    return this.byRecipeId[recipe.id] ?? nutrition(0, 0, 0, 0);
  }
}

export interface ScoreCall {
  recipeId: string;
  mealType: MealType;
  currentNutrition: NutritionProfile;
}

/**
 * Scores from a fixed table; records every call. Allergen matching is the real one.
 */
export class FixedScorer implements RecipeScoring {
  readonly calls: ScoreCall[] = [];

  constructor(private readonly scores: Record<string, number> = {}) {}

  scoreRecipe(
    recipe: Recipe,
    context: MealContext,
    _profile: UserProfile,
    currentNutrition: NutritionProfile
  ): number {
    this.calls.push({
      recipeId: recipe.id,
      mealType: context.mealType,
      currentNutrition: { ...currentNutrition },
    });
    return this.scores[recipe.id] ?? 50;
  }

  containsAllergens(recipe: Recipe, allergies: readonly string[]): boolean {
    return containsAllergens(recipe, allergies);
  }
}
