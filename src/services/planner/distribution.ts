/**
 * Target Distribution
 *
 * Splits the daily goals into three per-meal contexts. Each meal starts from
 * one third of every goal, then workout proximity and the meal's position in
 * the day adjust it:
 *
 * | Meal      | Condition     | Cal  | Prot | Fat  | Carbs |
 * |-----------|---------------|------|------|------|-------|
 * | breakfast | pre-workout   | 0.9  | 0.8  | 0.8  | 1.1   |
 * | lunch     | pre-workout   | 0.9  | 0.8  | 0.8  | 1.1   |
 * | lunch     | post-workout  | 1.1  | 1.2  | 1.0  | 1.1   |
 * | dinner    | post-workout  | 1.2  | 1.2  | 1.0  | 1.1   |
 * | dinner    | otherwise     | 1.1  | 1.1  | 1.0  | 1.0   |
 * | any       | otherwise     | 1.0  | 1.0  | 1.0  | 1.0   |
 */

import type {
  CarbTimingPreference,
  DailySchedule,
  MealContext,
  MealType,
  NutritionGoals,
  SatietyRequirement,
  TimeSlot,
} from '../../types';
import {
  COOKING_MINUTES_BY_BUSYNESS,
  DEFAULT_COOKING_MINUTES,
  HIGH_SATIETY_GAP_HOURS,
  MULTIPLIERS,
  WORKOUT_WINDOWS,
  type MacroMultipliers,
} from './constants';
import { hourOf } from './schedule';

export type MealContexts = Record<MealType, MealContext>;

export function busynessToCookingMinutes(busyness: number): number {
  return COOKING_MINUTES_BY_BUSYNESS[busyness] ?? DEFAULT_COOKING_MINUTES;
}

export function isPreWorkout(mealTime: string, workoutTime: string | undefined): boolean {
  if (!workoutTime) return false;
  const diff = hourOf(workoutTime) - hourOf(mealTime);
  return diff >= WORKOUT_WINDOWS.PRE_MIN_HOURS && diff <= WORKOUT_WINDOWS.PRE_MAX_HOURS;
}

export function isPostWorkout(mealTime: string, workoutTime: string | undefined): boolean {
  if (!workoutTime) return false;
  const diff = hourOf(mealTime) - hourOf(workoutTime);
  return diff >= WORKOUT_WINDOWS.POST_MIN_HOURS && diff <= WORKOUT_WINDOWS.POST_MAX_HOURS;
}

/**
 * Dinner precedes the overnight fast and is always "high". Earlier meals are
 * "high" when more than four whole hours pass before the next one.
 */
export function satietyFor(
  mealType: MealType,
  mealTime: string,
  nextMealTime: string | null
): SatietyRequirement {
  if (mealType === 'dinner' || nextMealTime === null) return 'high';
  return hourOf(nextMealTime) - hourOf(mealTime) > HIGH_SATIETY_GAP_HOURS ? 'high' : 'medium';
}

export function carbTimingFor(
  mealType: MealType,
  mealTime: string,
  workoutTime: string | undefined
): CarbTimingPreference {
  // Complex carbs before the overnight fast, whatever the workout
  if (mealType === 'dinner') return 'slow_digesting';
  if (isPreWorkout(mealTime, workoutTime)) return 'fast_digesting';
  if (isPostWorkout(mealTime, workoutTime)) return 'recovery';
  return 'maintenance';
}

function buildContext(
  mealType: MealType,
  goals: NutritionGoals,
  multipliers: MacroMultipliers,
  timeSlot: TimeSlot,
  busyness: number,
  satiety: SatietyRequirement,
  carbTiming: CarbTimingPreference
): MealContext {
  return {
    mealType,
    timeSlot,
    cookingTimeMax: busynessToCookingMinutes(busyness),
    targetCalories: (goals.calories / 3) * multipliers.calories,
    targetProtein: (goals.proteinG / 3) * multipliers.protein,
    targetFatMin: (goals.fatGMin / 3) * multipliers.fat,
    targetFatMax: (goals.fatGMax / 3) * multipliers.fat,
    targetCarbs: (goals.carbsG / 3) * multipliers.carbs,
    satietyRequirement: satiety,
    carbTimingPreference: carbTiming,
    priorityMicronutrients: [],
  };
}

export function distributeDailyTargets(
  goals: NutritionGoals,
  schedule: DailySchedule
): MealContexts {
  const { workoutTime } = schedule;

  const breakfastPre = isPreWorkout(schedule.breakfastTime, workoutTime);
  const breakfast = buildContext(
    'breakfast',
    goals,
    breakfastPre ? MULTIPLIERS.PRE_WORKOUT : MULTIPLIERS.NEUTRAL,
    breakfastPre ? 'pre_workout' : 'morning',
    schedule.breakfastBusyness,
    satietyFor('breakfast', schedule.breakfastTime, schedule.lunchTime),
    carbTimingFor('breakfast', schedule.breakfastTime, workoutTime)
  );

  const lunchPre = isPreWorkout(schedule.lunchTime, workoutTime);
  const lunchPost = isPostWorkout(schedule.lunchTime, workoutTime);
  let lunchMultipliers: MacroMultipliers = MULTIPLIERS.NEUTRAL;
  let lunchSlot: TimeSlot = 'afternoon';
  if (lunchPre) {
    lunchMultipliers = MULTIPLIERS.PRE_WORKOUT;
    lunchSlot = 'pre_workout';
  } else if (lunchPost) {
    lunchMultipliers = MULTIPLIERS.LUNCH_POST_WORKOUT;
    lunchSlot = 'post_workout';
  }
  const lunch = buildContext(
    'lunch',
    goals,
    lunchMultipliers,
    lunchSlot,
    schedule.lunchBusyness,
    satietyFor('lunch', schedule.lunchTime, schedule.dinnerTime),
    carbTimingFor('lunch', schedule.lunchTime, workoutTime)
  );

  const dinnerPost = isPostWorkout(schedule.dinnerTime, workoutTime);
  const dinner = buildContext(
    'dinner',
    goals,
    dinnerPost ? MULTIPLIERS.DINNER_POST_WORKOUT : MULTIPLIERS.DINNER,
    dinnerPost ? 'post_workout' : 'evening',
    schedule.dinnerBusyness,
    satietyFor('dinner', schedule.dinnerTime, null),
    carbTimingFor('dinner', schedule.dinnerTime, workoutTime)
  );

  return { breakfast, lunch, dinner };
}
