/**
 * Recipe Scorer
 *
 * Ranks a recipe for one meal slot. Deterministic: the same recipe, context,
 * profile and running total always produce the same score.
 *
 * score = Σ component × weight, in [0, 100]
 *
 * Hard exclusions (score 0):
 * - any ingredient matches an allergy
 * - the profile has a daily calorie cap and the day's balance component is 0
 */

import type { MealContext, NutritionProfile, Recipe, UserProfile } from '../../types';
import type { RecipeNutritionSource } from '../nutrition/calculator';
import { DEFAULT_WEIGHTS, WEIGHT_SUM_TOLERANCE, type ScoringWeights } from './constants';
import {
  scoreBalanceMatch,
  scoreMicronutrientBonus,
  scoreNutritionMatch,
  scorePreferenceMatch,
  scoreSatietyMatch,
  scoreScheduleMatch,
} from './components';

export { DEFAULT_WEIGHTS, SCORER_VERSION } from './constants';
export type { ScoringWeights } from './constants';

export interface RecipeScoring {
  scoreRecipe(
    recipe: Recipe,
    context: MealContext,
    profile: UserProfile,
    currentNutrition: NutritionProfile
  ): number;
  containsAllergens(recipe: Recipe, allergies: readonly string[]): boolean;
}

export interface ScoreBreakdown {
  nutrition: number;
  schedule: number;
  preference: number;
  satiety: number;
  micronutrient: number;
  balance: number;
  final: number;
}

/**
 * True when any ingredient name (to-taste ones included) contains any
 * allergy string, case-insensitively.
 */
export function containsAllergens(recipe: Recipe, allergies: readonly string[]): boolean {
  if (allergies.length === 0) return false;

  const allergens = allergies.map((a) => a.toLowerCase());
  return recipe.ingredients.some((ingredient) => {
    const name = ingredient.name.toLowerCase();
    return allergens.some((allergen) => name.includes(allergen));
  });
}

export function validateWeights(weights: ScoringWeights): void {
  const values = Object.values(weights);
  if (values.some((w) => w < 0)) {
    throw new RangeError('All scoring weights must be non-negative');
  }
  const total = values.reduce((sum, w) => sum + w, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new RangeError(`Scoring weights must sum to 1.0, got ${total}`);
  }
}

export class RecipeScorer implements RecipeScoring {
  readonly weights: ScoringWeights;

  constructor(
    private readonly calculator: RecipeNutritionSource,
    weights: ScoringWeights = DEFAULT_WEIGHTS
  ) {
    validateWeights(weights);
    this.weights = { ...weights };
  }

  containsAllergens(recipe: Recipe, allergies: readonly string[]): boolean {
    return containsAllergens(recipe, allergies);
  }

  scoreRecipe(
    recipe: Recipe,
    context: MealContext,
    profile: UserProfile,
    currentNutrition: NutritionProfile
  ): number {
    return this.explainScore(recipe, context, profile, currentNutrition).final;
  }

  /**
   * Component-level breakdown of scoreRecipe. Components are all 0 when
   * the recipe is excluded by an allergy.
   */
  explainScore(
    recipe: Recipe,
    context: MealContext,
    profile: UserProfile,
    currentNutrition: NutritionProfile
  ): ScoreBreakdown {
    if (containsAllergens(recipe, profile.allergies)) {
      return {
        nutrition: 0,
        schedule: 0,
        preference: 0,
        satiety: 0,
        micronutrient: 0,
        balance: 0,
        final: 0,
      };
    }

    const nutrition = this.calculator.calculateRecipeNutrition(recipe);
    const breakdown = {
      nutrition: scoreNutritionMatch(nutrition, context),
      schedule: scoreScheduleMatch(recipe, context),
      preference: scorePreferenceMatch(recipe, profile),
      satiety: scoreSatietyMatch(nutrition, context),
      micronutrient: scoreMicronutrientBonus(nutrition),
      balance: scoreBalanceMatch(nutrition, profile, currentNutrition),
    };

    if (breakdown.balance === 0 && profile.maxDailyCalories !== undefined) {
      return { ...breakdown, final: 0 };
    }

    const w = this.weights;
    const final =
      breakdown.nutrition * w.nutrition +
      breakdown.schedule * w.schedule +
      breakdown.preference * w.preference +
      breakdown.satiety * w.satiety +
      breakdown.micronutrient * w.micronutrient +
      breakdown.balance * w.balance;

    return { ...breakdown, final };
  }
}
