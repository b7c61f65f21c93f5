/**
 * User Profile Loading
 *
 * Profiles come either from a JSON file (CLI) or from a plan request body
 * (HTTP). Both derive the daily carb target from the calories left after
 * protein and the midpoint of the fat range.
 */

import {
  ProfileFileSchema,
  type NutritionGoals,
  type PlanRequest,
  type ProfileFile,
  type UserProfile,
} from '../types';
import { readJsonFile } from './json';

const KCAL_PER_G_PROTEIN = 4;
const KCAL_PER_G_FAT = 9;
const KCAL_PER_G_CARBS = 4;

/**
 * carbs = (calories - protein*4 - midpoint(fat)*9) / 4
 */
export function deriveCarbsTarget(
  calories: number,
  proteinG: number,
  fatGMin: number,
  fatGMax: number
): number {
  const medianFatG = (fatGMin + fatGMax) / 2;
  return (
    (calories - proteinG * KCAL_PER_G_PROTEIN - medianFatG * KCAL_PER_G_FAT) /
    KCAL_PER_G_CARBS
  );
}

export function buildGoals(
  calories: number,
  proteinG: number,
  fatGMin: number,
  fatGMax: number
): NutritionGoals {
  return {
    calories,
    proteinG,
    fatGMin,
    fatGMax,
    carbsG: deriveCarbsTarget(calories, proteinG, fatGMin, fatGMax),
  };
}

export function profileFromFile(data: ProfileFile): UserProfile {
  const goals = data.nutrition_goals;
  return {
    goals: buildGoals(
      goals.daily_calories,
      goals.daily_protein_g,
      goals.daily_fat_g.min,
      goals.daily_fat_g.max
    ),
    schedule: { ...data.schedule },
    likedFoods: [...data.preferences.liked_foods],
    dislikedFoods: [...data.preferences.disliked_foods],
    allergies: [...data.preferences.allergies],
    maxDailyCalories: goals.max_daily_calories,
  };
}

export function profileFromRequest(request: PlanRequest): UserProfile {
  return {
    goals: buildGoals(
      request.daily_calories,
      request.daily_protein_g,
      request.daily_fat_g_min,
      request.daily_fat_g_max
    ),
    schedule: { ...request.schedule },
    likedFoods: [...request.liked_foods],
    dislikedFoods: [...request.disliked_foods],
    allergies: [...request.allergies],
    maxDailyCalories: request.max_daily_calories,
  };
}

export function loadUserProfile(path: string): UserProfile {
  return profileFromFile(readJsonFile(path, ProfileFileSchema, 'user profile'));
}
