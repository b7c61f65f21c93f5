/**
 * Recipe Scoring Components
 *
 * Pure functions, each returning 0-100 (higher = better).
 */

import type {
  CarbTimingPreference,
  MealContext,
  NutritionProfile,
  Recipe,
  TimeSlot,
  UserProfile,
} from '../../types';
import { NEUTRAL_SCORE, NUTRITION_SPLIT, PREFERENCES } from './constants';

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// ─────────────────────────────────────────────────────────────────────────────
// Nutrition match
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Calories curve:
 * | Deviation | Score      |
 * |-----------|------------|
 * | ≤ 10%     | 100        |
 * | 10-25%    | 100 → 70   |
 * | 25-50%    | 70 → 30    |
 * | > 50%     | 30 → 0     |
 */
export function scoreCalories(actual: number, target: number): number {
  if (target === 0) return NEUTRAL_SCORE;

  const deviation = Math.abs(actual - target) / target;
  if (deviation <= 0.1) return 100;
  if (deviation <= 0.25) return 100 - (deviation - 0.1) * (30 / 0.15);
  if (deviation <= 0.5) return 70 - (deviation - 0.25) * (40 / 0.25);
  return Math.max(0, 30 - (deviation - 0.5) * (30 / 0.5));
}

/**
 * Protein curve (15% / 30% / 50% breakpoints). The target itself shifts
 * with workout timing: ×0.8 pre-workout, ×1.2 post-workout.
 */
export function scoreProtein(actual: number, target: number, timeSlot: TimeSlot): number {
  if (target === 0) return NEUTRAL_SCORE;

  let adjustedTarget = target;
  if (timeSlot === 'pre_workout') adjustedTarget = target * 0.8;
  else if (timeSlot === 'post_workout') adjustedTarget = target * 1.2;

  const deviation = adjustedTarget > 0 ? Math.abs(actual - adjustedTarget) / adjustedTarget : 1;
  if (deviation <= 0.15) return 100;
  if (deviation <= 0.3) return 100 - (deviation - 0.15) * (30 / 0.15);
  if (deviation <= 0.5) return 70 - (deviation - 0.3) * (30 / 0.2);
  return Math.max(0, 40 - (deviation - 0.5) * (40 / 0.5));
}

/**
 * Fat is a range: 100 inside it, otherwise the gap is measured in range widths
 * (or relative to the bound when the range is a single point).
 */
export function scoreFat(actual: number, targetMin: number, targetMax: number): number {
  if (targetMin === 0 && targetMax === 0) return NEUTRAL_SCORE;

  const low = Math.min(targetMin, targetMax);
  const high = Math.max(targetMin, targetMax);
  if (actual >= low && actual <= high) return 100;

  const rangeSize = high - low;
  let deviation: number;
  if (actual < low) {
    const gap = low - actual;
    deviation = rangeSize > 0 ? gap / rangeSize : low > 0 ? gap / low : 1;
  } else {
    const gap = actual - high;
    deviation = rangeSize > 0 ? gap / rangeSize : high > 0 ? gap / high : 1;
  }

  if (deviation <= 0.2) return 100 - (deviation / 0.2) * 20;
  if (deviation <= 0.5) return 80 - ((deviation - 0.2) / 0.3) * 20;
  return Math.max(0, 60 - ((deviation - 0.5) / 0.5) * 60);
}

export function scoreCarbs(
  actual: number,
  target: number,
  timeSlot: TimeSlot,
  carbTiming: CarbTimingPreference
): number {
  if (target === 0) return NEUTRAL_SCORE;

  const deviation = target > 0 ? Math.abs(actual - target) / target : 1;
  let base: number;
  if (deviation <= 0.15) base = 100;
  else if (deviation <= 0.3) base = 100 - (deviation - 0.15) * (30 / 0.15);
  else if (deviation <= 0.5) base = 70 - (deviation - 0.3) * (30 / 0.2);
  else base = Math.max(0, 40 - (deviation - 0.5) * (40 / 0.5));

  if (timeSlot === 'pre_workout') {
    if (carbTiming === 'fast_digesting') return Math.min(100, base * 1.1);
    if (carbTiming === 'slow_digesting') return base * 0.8;
    return base;
  }
  if (timeSlot === 'post_workout') {
    // Recovery: reward reaching the carb target
    return actual >= target ? Math.min(100, base * 1.05) : base;
  }
  return base;
}

export function scoreNutritionMatch(nutrition: NutritionProfile, context: MealContext): number {
  return (
    scoreCalories(nutrition.calories, context.targetCalories) * NUTRITION_SPLIT.CALORIES +
    scoreProtein(nutrition.proteinG, context.targetProtein, context.timeSlot) *
      NUTRITION_SPLIT.PROTEIN +
    scoreFat(nutrition.fatG, context.targetFatMin, context.targetFatMax) * NUTRITION_SPLIT.FAT +
    scoreCarbs(
      nutrition.carbsG,
      context.targetCarbs,
      context.timeSlot,
      context.carbTimingPreference
    ) *
      NUTRITION_SPLIT.CARBS
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Schedule match
// ─────────────────────────────────────────────────────────────────────────────

/**
 * | Overage of the budget | Score     |
 * |-----------------------|-----------|
 * | none                  | 100       |
 * | 0-20%                 | 100 → 80  |
 * | 20-50%                | 80 → 30   |
 * | 50-100%               | 30 → 0    |
 * | > 100%                | 0         |
 */
export function scoreScheduleMatch(recipe: Recipe, context: MealContext): number {
  const recipeTime = recipe.cookingTimeMinutes;
  const maxTime = context.cookingTimeMax;
  if (recipeTime <= maxTime) return 100;

  const overage = maxTime > 0 ? (recipeTime - maxTime) / maxTime : 1;
  if (overage <= 0.2) return 100 - (overage / 0.2) * 20;
  if (overage <= 0.5) return 100 - (20 + ((overage - 0.2) / 0.3) * 50);
  if (overage <= 1) return Math.max(0, 100 - (50 + ((overage - 0.5) / 0.5) * 30));
  return 0;
}

// ─────────────────────────────────────────────────────────────────────────────
// Preferences
// ─────────────────────────────────────────────────────────────────────────────

function matchesAny(ingredientName: string, foods: readonly string[]): boolean {
  const name = ingredientName.toLowerCase();
  return foods.some((food) => {
    const f = food.toLowerCase();
    return name.includes(f) || f.includes(name);
  });
}

export function countMatchingIngredients(recipe: Recipe, foods: readonly string[]): number {
  if (foods.length === 0) return 0;
  return recipe.ingredients.filter((ing) => matchesAny(ing.name, foods)).length;
}

export function scorePreferenceMatch(recipe: Recipe, profile: UserProfile): number {
  let score: number = PREFERENCES.BASE;

  const disliked = countMatchingIngredients(recipe, profile.dislikedFoods);
  if (disliked > 0) {
    score -= Math.min(
      disliked * PREFERENCES.DISLIKED_PENALTY_PER_ITEM,
      PREFERENCES.DISLIKED_PENALTY_MAX
    );
  }

  const liked = countMatchingIngredients(recipe, profile.likedFoods);
  if (liked > 0) {
    score += Math.min(liked * PREFERENCES.LIKED_BOOST_PER_ITEM, PREFERENCES.LIKED_BOOST_MAX);
  }

  return clamp(score, 0, 100);
}

// ─────────────────────────────────────────────────────────────────────────────
// Satiety
// ─────────────────────────────────────────────────────────────────────────────

/** Pick the score of the first threshold the value reaches */
function tier(value: number, table: Array<[number, number]>, fallback: number): number {
  for (const [threshold, score] of table) {
    if (value >= threshold) return score;
  }
  return fallback;
}

function within(value: number, low: number, high: number): boolean {
  return value >= low && value <= high;
}

export function scoreSatietyMatch(nutrition: NutritionProfile, context: MealContext): number {
  const { calories, proteinG: protein, fatG: fat } = nutrition;

  if (context.satietyRequirement === 'high') {
    // Long fast ahead: more protein, fat and calories are more filling
    const proteinScore = tier(protein, [[50, 100], [40, 90], [30, 80], [20, 60]], 40);
    const fatScore = tier(fat, [[25, 100], [20, 90], [15, 80], [10, 60]], 40);
    const calorieScore = tier(calories, [[750, 100], [650, 90], [550, 80], [450, 60]], 40);
    return proteinScore * 0.4 + fatScore * 0.3 + calorieScore * 0.3;
  }

  if (context.satietyRequirement === 'low') {
    let calorieScore = 20;
    if (calories <= 300) calorieScore = 100;
    else if (calories <= 400) calorieScore = 80;
    else if (calories <= 500) calorieScore = 60;
    else if (calories <= 600) calorieScore = 40;

    let proteinScore = 40;
    if (within(protein, 15, 25)) proteinScore = 100;
    else if (within(protein, 10, 30)) proteinScore = 80;
    else if (protein < 10) proteinScore = 60;

    let fatScore = 40;
    if (within(fat, 5, 15)) fatScore = 100;
    else if (fat < 5) fatScore = 80;
    else if (fat <= 20) fatScore = 60;

    return calorieScore * 0.5 + proteinScore * 0.3 + fatScore * 0.2;
  }

  // medium
  let proteinScore = 40;
  if (within(protein, 25, 40)) proteinScore = 100;
  else if (within(protein, 20, 45)) proteinScore = 80;
  else if (within(protein, 15, 50)) proteinScore = 60;

  let fatScore = 40;
  if (within(fat, 15, 25)) fatScore = 100;
  else if (within(fat, 10, 30)) fatScore = 80;
  else if (within(fat, 5, 35)) fatScore = 60;

  let calorieScore = 40;
  if (within(calories, 450, 600)) calorieScore = 100;
  else if (within(calories, 400, 650)) calorieScore = 80;
  else if (within(calories, 350, 700)) calorieScore = 60;

  return proteinScore * 0.35 + fatScore * 0.35 + calorieScore * 0.3;
}

// ─────────────────────────────────────────────────────────────────────────────
// Micronutrient proxy
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Macro diversity as a stand-in for micronutrient density. The context's
 * priorityMicronutrients list is not consulted yet.
 */
export function scoreMicronutrientBonus(nutrition: NutritionProfile): number {
  const { calories, proteinG: protein, fatG: fat, carbsG: carbs } = nutrition;
  if (calories <= 0) return 50;

  if (protein > 0 && fat > 0 && carbs > 0) {
    const macroCalories = protein * 4 + fat * 9 + carbs * 4;
    const proteinPct = (protein * 4) / macroCalories;
    const fatPct = (fat * 9) / macroCalories;
    const carbsPct = (carbs * 4) / macroCalories;

    if (within(proteinPct, 0.15, 0.4) && within(fatPct, 0.2, 0.5) && within(carbsPct, 0.2, 0.6)) {
      return 100;
    }
    if (within(proteinPct, 0.1, 0.5) && within(fatPct, 0.15, 0.6) && within(carbsPct, 0.15, 0.7)) {
      return 90;
    }
    return 80;
  }

  const present = [protein, fat, carbs].filter((value) => value > 0).length;
  return present >= 2 ? 60 : 40;
}

// ─────────────────────────────────────────────────────────────────────────────
// Daily balance
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fit of the recipe into the rest of the day. Starts at 100 and subtracts
 * the relative overage ×100 for each of: calories above 110% of goal, fat
 * above its maximum, carbs above 110% of goal. Exceeding the profile's hard
 * calorie cap scores 0.
 */
export function scoreBalanceMatch(
  nutrition: NutritionProfile,
  profile: UserProfile,
  current: NutritionProfile
): number {
  const projectedCalories = current.calories + nutrition.calories;
  if (profile.maxDailyCalories !== undefined && projectedCalories > profile.maxDailyCalories) {
    return 0;
  }

  const { goals } = profile;
  let score = 100;

  if (goals.calories > 0 && projectedCalories > goals.calories * 1.1) {
    score -= ((projectedCalories - goals.calories) / goals.calories) * 100;
  }

  const projectedFat = current.fatG + nutrition.fatG;
  if (goals.fatGMax > 0 && projectedFat > goals.fatGMax) {
    score -= ((projectedFat - goals.fatGMax) / goals.fatGMax) * 100;
  }

  const projectedCarbs = current.carbsG + nutrition.carbsG;
  if (goals.carbsG > 0 && projectedCarbs > goals.carbsG * 1.1) {
    score -= ((projectedCarbs - goals.carbsG) / goals.carbsG) * 100;
  }

  return Math.max(0, score);
}
