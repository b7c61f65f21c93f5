/**
 * Daily Plan Validation
 *
 * Calories, protein and carbs must land within [90%, 110%] of their targets
 * (inclusive). Fat must lie inside [fatGMin, fatGMax]; its adherence figure
 * (against the range midpoint) is for display only. Missing the band adds a
 * warning and clears success, but never prevents the plan from being built.
 */

import type { Meal, NutritionGoals, TargetAdherence } from '../../types';
import { aggregateMeals } from '../nutrition/aggregator';
import { TOLERANCE } from './constants';

export interface ValidationResult {
  success: boolean;
  adherence: TargetAdherence;
  warnings: string[];
}

/**
 * actual / target × 100, or 0 when the target is not positive.
 * Multiplying first keeps exact ratios exact (2640 / 2400 → 110, not 110.00000000000001).
 */
export function adherencePct(actual: number, target: number): number {
  return target > 0 ? (actual * 100) / target : 0;
}

export function withinTolerance(pct: number): boolean {
  return pct >= TOLERANCE.MIN_PCT && pct <= TOLERANCE.MAX_PCT;
}

function toleranceWarning(
  label: string,
  pct: number,
  actualText: string,
  targetText: string
): string | null {
  if (pct < TOLERANCE.MIN_PCT) {
    return `${label} below target: ${actualText} / ${targetText} (${pct.toFixed(1)}%)`;
  }
  if (pct > TOLERANCE.MAX_PCT) {
    return `${label} above target: ${actualText} / ${targetText} (${pct.toFixed(1)}%)`;
  }
  return null;
}

export function validateDailyPlan(
  meals: readonly Meal[],
  goals: NutritionGoals
): ValidationResult {
  if (meals.length === 0) {
    return { success: false, adherence: {}, warnings: ['No meals planned'] };
  }

  const total = aggregateMeals(meals);
  const warnings: string[] = [];

  const caloriesPct = adherencePct(total.calories, goals.calories);
  const proteinPct = adherencePct(total.proteinG, goals.proteinG);
  const carbsPct = adherencePct(total.carbsG, goals.carbsG);
  const fatMidpoint = (goals.fatGMin + goals.fatGMax) / 2;
  const fatPct = adherencePct(total.fatG, fatMidpoint);

  const caloriesWarning = toleranceWarning(
    'Calories',
    caloriesPct,
    total.calories.toFixed(0),
    String(goals.calories)
  );
  if (caloriesWarning) warnings.push(caloriesWarning);

  const proteinWarning = toleranceWarning(
    'Protein',
    proteinPct,
    `${total.proteinG.toFixed(1)}g`,
    `${goals.proteinG.toFixed(1)}g`
  );
  if (proteinWarning) warnings.push(proteinWarning);

  const fatInRange = total.fatG >= goals.fatGMin && total.fatG <= goals.fatGMax;
  if (total.fatG < goals.fatGMin) {
    const pct = adherencePct(total.fatG, goals.fatGMin);
    warnings.push(
      `Fat below minimum: ${total.fatG.toFixed(1)}g / ${goals.fatGMin.toFixed(1)}g (${pct.toFixed(1)}%)`
    );
  } else if (total.fatG > goals.fatGMax) {
    const pct = adherencePct(total.fatG, goals.fatGMax);
    warnings.push(
      `Fat above maximum: ${total.fatG.toFixed(1)}g / ${goals.fatGMax.toFixed(1)}g (${pct.toFixed(1)}%)`
    );
  }

  const carbsWarning = toleranceWarning(
    'Carbs',
    carbsPct,
    `${total.carbsG.toFixed(1)}g`,
    `${goals.carbsG.toFixed(1)}g`
  );
  if (carbsWarning) warnings.push(carbsWarning);

  const success =
    withinTolerance(caloriesPct) &&
    withinTolerance(proteinPct) &&
    fatInRange &&
    withinTolerance(carbsPct);

  return {
    success,
    adherence: {
      calories: caloriesPct,
      protein: proteinPct,
      fat: fatPct,
      carbs: carbsPct,
    },
    warnings,
  };
}
