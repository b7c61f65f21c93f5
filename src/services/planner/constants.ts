/**
 * Meal Planner Constants
 *
 * Decision tables for target distribution and daily validation.
 */

import type { MealType } from '../../types';

export const PLANNER_VERSION = 'v0.4';

/** Slots are always filled in this order; later slots see earlier choices. */
export const MEAL_ORDER: readonly MealType[] = ['breakfast', 'lunch', 'dinner'];

export const MEALS_PER_DAY = 3;

/** Busyness level marking the workout entry of a schedule. */
export const WORKOUT_BUSYNESS = 0;

/**
 * Cooking-time budget per busyness level:
 * | Busyness | Meaning       | Minutes |
 * |----------|---------------|---------|
 * | 1        | snack only    | 5       |
 * | 2        | quick         | 15      |
 * | 3        | weeknight     | 30      |
 * | other    | unhurried     | 60      |
 */
export const COOKING_MINUTES_BY_BUSYNESS: Readonly<Record<number, number>> = {
  1: 5,
  2: 15,
  3: 30,
};
export const DEFAULT_COOKING_MINUTES = 60;

/** Whole-hour windows relative to the workout hour. */
export const WORKOUT_WINDOWS = {
  /** 1 ≤ workoutHour − mealHour ≤ 3 */
  PRE_MIN_HOURS: 1,
  PRE_MAX_HOURS: 3,
  /** 0 ≤ mealHour − workoutHour ≤ 3 */
  POST_MIN_HOURS: 0,
  POST_MAX_HOURS: 3,
} as const;

/** A gap longer than this (whole hours) to the next meal calls for a filling meal. */
export const HIGH_SATIETY_GAP_HOURS = 4;

export interface MacroMultipliers {
  calories: number;
  protein: number;
  fat: number;
  carbs: number;
}

/**
 * Multipliers applied to the per-meal baseline (daily goal / 3).
 */
export const MULTIPLIERS = {
  NEUTRAL: { calories: 1.0, protein: 1.0, fat: 1.0, carbs: 1.0 },
  PRE_WORKOUT: { calories: 0.9, protein: 0.8, fat: 0.8, carbs: 1.1 },
  LUNCH_POST_WORKOUT: { calories: 1.1, protein: 1.2, fat: 1.0, carbs: 1.1 },
  DINNER: { calories: 1.1, protein: 1.1, fat: 1.0, carbs: 1.0 },
  DINNER_POST_WORKOUT: { calories: 1.2, protein: 1.2, fat: 1.0, carbs: 1.1 },
} as const satisfies Record<string, MacroMultipliers>;

/** Inclusive adherence band for calories, protein and carbs. */
export const TOLERANCE = {
  MIN_PCT: 90,
  MAX_PCT: 110,
} as const;
