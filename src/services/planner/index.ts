/**
 * Meal Planner - Main Orchestrator
 *
 * Plans breakfast, lunch and dinner for one day:
 * 1. Distribute the daily goals into per-meal contexts
 * 2. For each slot in order: filter, score, pick, commit
 * 3. Validate the finished day against the goals
 *
 * Stages run strictly forward with no backtracking:
 *   SELECTING_BREAKFAST → SELECTING_LUNCH → SELECTING_DINNER → VALIDATING
 * A slot with no candidates ends planning at once with an "aborted" result.
 *
 * Synchronous and free of I/O; every call starts from fresh state.
 */

import type {
  AbortedPlanning,
  CompletedPlanning,
  DailySchedule,
  Meal,
  MealType,
  NutritionProfile,
  PlanningResult,
  PlanningTrace,
  Recipe,
  SlotTrace,
  UserProfile,
} from '../../types';
import type { RecipeSource } from '../../data/recipes';
import type { RecipeNutritionSource } from '../nutrition/calculator';
import { SCORER_VERSION, type RecipeScoring } from '../scoring';
import { ZERO_NUTRITION, addNutrition, aggregateMeals } from '../nutrition/aggregator';
import { MEAL_ORDER, PLANNER_VERSION } from './constants';
import { distributeDailyTargets } from './distribution';
import { createDailySchedule } from './schedule';
import { filterCandidates, isNonEmpty, selectBestRecipe } from './selection';
import { validateDailyPlan } from './validation';

export { PLANNER_VERSION };
export { createDailySchedule, parseTimeOfDay } from './schedule';
export { distributeDailyTargets } from './distribution';
export { validateDailyPlan } from './validation';

export interface PlannerDependencies {
  scorer: RecipeScoring;
  calculator: RecipeNutritionSource;
  /** Used when the request carries no explicit recipe list */
  recipeSource: RecipeSource;
}

export interface PlanDailyMealsInput {
  profile: UserProfile;
  schedule: DailySchedule;
  availableRecipes?: readonly Recipe[];
  /** ISO date (YYYY-MM-DD) stamped on the plan */
  date?: string;
}

/**
 * Running state threaded through the slots. Each commit returns a new state.
 */
interface SelectionState {
  readonly usedRecipeIds: ReadonlySet<string>;
  readonly totalSoFar: NutritionProfile;
  readonly meals: readonly Meal[];
}

const INITIAL_STATE: SelectionState = {
  usedRecipeIds: new Set<string>(),
  totalSoFar: ZERO_NUTRITION,
  meals: [],
};

function commitMeal(state: SelectionState, meal: Meal): SelectionState {
  return {
    usedRecipeIds: new Set([...state.usedRecipeIds, meal.recipe.id]),
    totalSoFar: addNutrition(state.totalSoFar, meal.nutrition),
    meals: [...state.meals, meal],
  };
}

function slotTimes(schedule: DailySchedule, mealType: MealType): { time: string; busyness: number } {
  switch (mealType) {
    case 'breakfast':
      return { time: schedule.breakfastTime, busyness: schedule.breakfastBusyness };
    case 'lunch':
      return { time: schedule.lunchTime, busyness: schedule.lunchBusyness };
    case 'dinner':
      return { time: schedule.dinnerTime, busyness: schedule.dinnerBusyness };
  }
}

export function planDailyMeals(
  deps: PlannerDependencies,
  input: PlanDailyMealsInput
): PlanningResult {
  const { profile, schedule } = input;
  const goals = profile.goals;
  const contexts = distributeDailyTargets(goals, schedule);
  const recipes = input.availableRecipes ?? deps.recipeSource.getAllRecipes();

  const slots: SlotTrace[] = [];
  const traceOf = (): PlanningTrace => ({
    version: PLANNER_VERSION,
    scorerVersion: SCORER_VERSION,
    slots,
  });
  let state = INITIAL_STATE;

  for (const mealType of MEAL_ORDER) {
    const context = contexts[mealType];
    const { candidates, rejected } = filterCandidates(
      recipes,
      context,
      profile,
      deps.scorer,
      state.usedRecipeIds
    );

    if (!isNonEmpty(candidates)) {
      slots.push({ mealType, context, rejected, scored: [], winner: null, tieBreaker: null });
      const aborted: AbortedPlanning = {
        status: 'aborted',
        success: false,
        dailyPlan: null,
        date: input.date ?? '',
        totalNutrition: { ...state.totalSoFar },
        targetAdherence: {},
        warnings: [`No recipes available for ${mealType}`],
        abortedAt: mealType,
        trace: traceOf(),
      };
      return aborted;
    }

    const selection = selectBestRecipe(
      candidates,
      context,
      profile,
      state.totalSoFar,
      deps.scorer
    );
    slots.push({
      mealType,
      context,
      rejected,
      scored: selection.scored,
      winner: selection.recipe.id,
      tieBreaker: selection.tieBreaker,
    });

    const { time, busyness } = slotTimes(schedule, mealType);
    const meal: Meal = Object.freeze({
      recipe: selection.recipe,
      nutrition: deps.calculator.calculateRecipeNutrition(selection.recipe),
      mealType,
      busynessLevel: busyness,
      scheduledTime: time,
    });
    state = commitMeal(state, meal);
  }

  const meals = [...state.meals];
  const validation = validateDailyPlan(meals, goals);
  const totalNutrition = aggregateMeals(meals);

  const completed: CompletedPlanning = {
    status: 'complete',
    success: validation.success,
    dailyPlan: {
      date: input.date ?? '',
      meals,
      totalNutrition,
      goals,
      meetsGoals: validation.success,
    },
    totalNutrition: { ...totalNutrition },
    targetAdherence: validation.adherence,
    warnings: validation.warnings,
    trace: traceOf(),
  };
  return completed;
}

/**
 * Derive the schedule from the profile, then plan. Schedule errors are thrown.
 */
export function planForProfile(
  deps: PlannerDependencies,
  profile: UserProfile,
  options: { availableRecipes?: readonly Recipe[]; date?: string } = {}
): PlanningResult {
  const schedule = createDailySchedule(profile.schedule);
  return planDailyMeals(deps, { profile, schedule, ...options });
}
