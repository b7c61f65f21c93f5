/**
 * Plan Formatters
 *
 * Markdown for people, snake_case JSON for the CLI `--output json` and the
 * HTTP API. Both accept either variant of PlanningResult.
 */

import type {
  AbortedPlanning,
  AdherenceKey,
  CompletedPlanning,
  Ingredient,
  Meal,
  MealType,
  NutritionGoals,
  NutritionProfile,
  PlanningResult,
  TargetAdherence,
} from '../../types';

const MEAL_LABELS: Record<MealType, string> = {
  breakfast: 'Breakfast',
  lunch: 'Lunch',
  dinner: 'Dinner',
};

const ADHERENCE_KEYS: readonly AdherenceKey[] = ['calories', 'protein', 'fat', 'carbs'];

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function formatQuantity(quantity: number): string {
  if (Number.isInteger(quantity)) return String(quantity);
  return quantity.toFixed(1).replace(/\.?0+$/, '');
}

/**
 * "200 g cream of rice", "2 large egg", "3 banana", "salt to taste".
 */
export function formatIngredient(ingredient: Ingredient): string {
  if (ingredient.isToTaste) {
    return `${ingredient.name} to taste`;
  }
  const quantity = formatQuantity(ingredient.quantity);
  return ingredient.unit
    ? `${quantity} ${ingredient.unit} ${ingredient.name}`
    : `${quantity} ${ingredient.name}`;
}

export function formatNutritionBreakdown(nutrition: NutritionProfile, indent = ''): string {
  return [
    `${indent}**Calories:** ${nutrition.calories.toFixed(0)} kcal`,
    `${indent}**Protein:** ${nutrition.proteinG.toFixed(1)}g`,
    `${indent}**Fat:** ${nutrition.fatG.toFixed(1)}g`,
    `${indent}**Carbs:** ${nutrition.carbsG.toFixed(1)}g`,
  ].join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────
// Markdown
// ─────────────────────────────────────────────────────────────────────────────

function warningLines(warnings: readonly string[]): string[] {
  if (warnings.length === 0) return [];
  return ['## Warnings', '', ...warnings.map((w) => `- ${w}`), ''];
}

function mealLines(meal: Meal, index: number): string[] {
  const { recipe } = meal;
  const lines = [
    `## Meal ${index}: ${recipe.name}`,
    `**Type:** ${MEAL_LABELS[meal.mealType]}`,
    `**Cooking Time:** ${recipe.cookingTimeMinutes} minutes`,
    '',
    '### Ingredients',
    ...recipe.ingredients.map((ing) => `- ${formatIngredient(ing)}`),
    '',
  ];

  if (recipe.instructions.length > 0) {
    lines.push('### Instructions');
    recipe.instructions.forEach((step, i) => lines.push(`${i + 1}. ${step}`));
    lines.push('');
  }

  lines.push('### Nutrition Breakdown', formatNutritionBreakdown(meal.nutrition), '');
  return lines;
}

function goalLines(goals: NutritionGoals, adherence: TargetAdherence): string[] {
  const lines = [
    '## Goals & Adherence',
    `**Target Calories:** ${goals.calories}`,
    `**Target Protein:** ${goals.proteinG.toFixed(1)}g`,
    `**Target Fat:** ${goals.fatGMin.toFixed(1)}g - ${goals.fatGMax.toFixed(1)}g`,
    `**Target Carbs:** ${goals.carbsG.toFixed(1)}g`,
    '',
    '**Adherence:**',
  ];
  for (const key of ADHERENCE_KEYS) {
    const pct = adherence[key];
    if (pct !== undefined) lines.push(`- ${capitalize(key)}: ${pct.toFixed(1)}%`);
  }
  lines.push('');
  return lines;
}

function completedMarkdown(result: CompletedPlanning): string[] {
  const plan = result.dailyPlan;
  const lines = ['# Daily Meal Plan', ''];
  if (plan.date) {
    lines.push(`**Date:** ${plan.date}`, '');
  }
  lines.push(
    result.success ? '✅ **Plan meets nutrition goals**' : '⚠️ **Plan has warnings**',
    ''
  );
  lines.push(...warningLines(result.warnings));
  plan.meals.forEach((meal, i) => lines.push(...mealLines(meal, i + 1)));
  lines.push('## Daily Totals', formatNutritionBreakdown(plan.totalNutrition), '');
  lines.push(...goalLines(plan.goals, result.targetAdherence));
  return lines;
}

function abortedMarkdown(result: AbortedPlanning): string[] {
  const lines = ['# Daily Meal Plan', ''];
  if (result.date) {
    lines.push(`**Date:** ${result.date}`, '');
  }
  lines.push(
    `⛔ **Planning aborted at ${result.abortedAt}**`,
    '',
    ...warningLines(result.warnings),
    '## Partial Totals',
    formatNutritionBreakdown(result.totalNutrition),
    ''
  );
  return lines;
}

export function formatPlanMarkdown(result: PlanningResult): string {
  const lines = result.status === 'complete' ? completedMarkdown(result) : abortedMarkdown(result);
  return lines.join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────
// JSON
// ─────────────────────────────────────────────────────────────────────────────

export interface NutritionJson {
  calories: number;
  protein_g: number;
  fat_g: number;
  carbs_g: number;
}

export interface GoalsJson {
  calories: number;
  protein_g: number;
  fat_g_min: number;
  fat_g_max: number;
  carbs_g: number;
}

export interface IngredientJson {
  name: string;
  quantity: number;
  unit: string;
  is_to_taste: boolean;
  display: string;
}

export interface MealJson {
  meal_type: MealType;
  scheduled_time: string | null;
  recipe: {
    id: string;
    name: string;
    ingredients: IngredientJson[];
    cooking_time_minutes: number;
    instructions: string[];
  };
  nutrition: NutritionJson;
  busyness_level: number;
}

export interface PlanJson {
  status: PlanningResult['status'];
  success: boolean;
  date: string | null;
  meals: MealJson[];
  total_nutrition: NutritionJson;
  goals: GoalsJson | null;
  target_adherence: TargetAdherence;
  warnings: string[];
  meets_goals: boolean;
  aborted_at?: MealType;
}

function nutritionJson(nutrition: NutritionProfile): NutritionJson {
  return {
    calories: round1(nutrition.calories),
    protein_g: round1(nutrition.proteinG),
    fat_g: round1(nutrition.fatG),
    carbs_g: round1(nutrition.carbsG),
  };
}

function goalsJson(goals: NutritionGoals): GoalsJson {
  return {
    calories: goals.calories,
    protein_g: goals.proteinG,
    fat_g_min: goals.fatGMin,
    fat_g_max: goals.fatGMax,
    carbs_g: goals.carbsG,
  };
}

function mealJson(meal: Meal): MealJson {
  const { recipe } = meal;
  return {
    meal_type: meal.mealType,
    scheduled_time: meal.scheduledTime ?? null,
    recipe: {
      id: recipe.id,
      name: recipe.name,
      ingredients: recipe.ingredients.map((ing) => ({
        name: ing.name,
        quantity: ing.quantity,
        unit: ing.unit,
        is_to_taste: ing.isToTaste,
        display: formatIngredient(ing),
      })),
      cooking_time_minutes: recipe.cookingTimeMinutes,
      instructions: [...recipe.instructions],
    },
    nutrition: nutritionJson(meal.nutrition),
    busyness_level: meal.busynessLevel,
  };
}

function adherenceJson(adherence: TargetAdherence): TargetAdherence {
  const rounded: TargetAdherence = {};
  for (const key of ADHERENCE_KEYS) {
    const pct = adherence[key];
    if (pct !== undefined) rounded[key] = round1(pct);
  }
  return rounded;
}

export function formatPlanJson(result: PlanningResult): PlanJson {
  if (result.status === 'aborted') {
    return {
      status: 'aborted',
      success: false,
      date: result.date || null,
      meals: [],
      total_nutrition: nutritionJson(result.totalNutrition),
      goals: null,
      target_adherence: adherenceJson(result.targetAdherence),
      warnings: [...result.warnings],
      meets_goals: false,
      aborted_at: result.abortedAt,
    };
  }

  const plan = result.dailyPlan;
  return {
    status: 'complete',
    success: result.success,
    date: plan.date || null,
    meals: plan.meals.map(mealJson),
    total_nutrition: nutritionJson(plan.totalNutrition),
    goals: goalsJson(plan.goals),
    target_adherence: adherenceJson(result.targetAdherence),
    warnings: [...result.warnings],
    meets_goals: plan.meetsGoals,
  };
}

export function formatPlanJsonString(result: PlanningResult, indent = 2): string {
  return JSON.stringify(formatPlanJson(result), null, indent);
}
