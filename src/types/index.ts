import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// File and request schemas (snake_case on the wire)
// ─────────────────────────────────────────────────────────────────────────────

export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export const BusynessLevelSchema = z.number().int().min(0).max(4);

export const ScheduleSchema = z.record(
  z.string().regex(TIME_OF_DAY_PATTERN, 'schedule keys must be HH:MM (24-hour)'),
  BusynessLevelSchema
);

export const NutritionValuesSchema = z.object({
  calories: z.number().min(0),
  protein_g: z.number().min(0),
  fat_g: z.number().min(0),
  carbs_g: z.number().min(0),
});

export const IngredientInputSchema = z.object({
  name: z.string().min(1),
  quantity: z.number().min(0).optional(),
  unit: z.string().default(''),
});

export const RecipeInputSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  ingredients: z.array(IngredientInputSchema).default([]),
  cooking_time_minutes: z.number().int().min(0),
  instructions: z.array(z.string()).default([]),
});

export const RecipeFileSchema = z.object({
  recipes: z.array(RecipeInputSchema).default([]),
});

export const IngredientDataSchema = z.object({
  name: z.string().min(1),
  aliases: z.array(z.string()).default([]),
  per_100g: NutritionValuesSchema.optional(),
  per_scoop: NutritionValuesSchema.optional(),
  per_large: NutritionValuesSchema.optional(),
  scoop_size_g: z.number().positive().optional(),
  large_size_g: z.number().positive().optional(),
});

export const IngredientFileSchema = z.object({
  ingredients: z.array(IngredientDataSchema).default([]),
});

const FatRangeSchema = z
  .object({
    min: z.number().min(0),
    max: z.number().min(0),
  })
  .refine((range) => range.min <= range.max, {
    message: 'daily_fat_g.min must not exceed daily_fat_g.max',
  });

export const ProfileFileSchema = z.object({
  nutrition_goals: z.object({
    daily_calories: z.number().positive(),
    daily_protein_g: z.number().min(0),
    daily_fat_g: FatRangeSchema,
    max_daily_calories: z.number().positive().optional(),
  }),
  schedule: ScheduleSchema,
  preferences: z
    .object({
      liked_foods: z.array(z.string()).default([]),
      disliked_foods: z.array(z.string()).default([]),
      allergies: z.array(z.string()).default([]),
    })
    .default({}),
});

export const PlanRequestSchema = z
  .object({
    daily_calories: z.number().positive(),
    daily_protein_g: z.number().min(0),
    daily_fat_g_min: z.number().min(0),
    daily_fat_g_max: z.number().min(0),
    max_daily_calories: z.number().positive().optional(),
    schedule: ScheduleSchema,
    liked_foods: z.array(z.string()).default([]),
    disliked_foods: z.array(z.string()).default([]),
    allergies: z.array(z.string()).default([]),
    date: z.string().date().optional(),
  })
  .refine((data) => data.daily_fat_g_min <= data.daily_fat_g_max, {
    message: 'daily_fat_g_min must not exceed daily_fat_g_max',
  });

export type NutritionValues = z.infer<typeof NutritionValuesSchema>;
export type RecipeInput = z.infer<typeof RecipeInputSchema>;
export type IngredientData = z.infer<typeof IngredientDataSchema>;
export type ProfileFile = z.infer<typeof ProfileFileSchema>;
export type PlanRequest = z.infer<typeof PlanRequestSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Domain types
// ─────────────────────────────────────────────────────────────────────────────

export interface NutritionProfile {
  calories: number;
  proteinG: number;
  fatG: number;
  carbsG: number;
}

export interface NutritionGoals {
  calories: number;
  proteinG: number;
  fatGMin: number;
  fatGMax: number;
  carbsG: number;
}

export interface Ingredient {
  name: string;
  quantity: number; // 0 for "to taste"
  unit: string;
  isToTaste: boolean;
}

export interface Recipe {
  readonly id: string;
  readonly name: string;
  readonly ingredients: readonly Ingredient[];
  readonly cookingTimeMinutes: number;
  readonly instructions: readonly string[];
}

export type Schedule = Record<string, number>;

export interface UserProfile {
  goals: NutritionGoals;
  schedule: Schedule; // "HH:MM" -> busyness 0-4 (0 = workout)
  likedFoods: string[];
  dislikedFoods: string[];
  allergies: string[];
  maxDailyCalories?: number; // calorie deficit mode: hard cap on the projected day
}

export interface DailySchedule {
  breakfastTime: string;
  breakfastBusyness: number;
  lunchTime: string;
  lunchBusyness: number;
  dinnerTime: string;
  dinnerBusyness: number;
  workoutTime?: string;
}

export const MEAL_TYPES = ['breakfast', 'lunch', 'dinner'] as const;
export type MealType = (typeof MEAL_TYPES)[number];

export type TimeSlot = 'morning' | 'afternoon' | 'evening' | 'pre_workout' | 'post_workout';
export type SatietyRequirement = 'low' | 'medium' | 'high';
export type CarbTimingPreference =
  | 'fast_digesting'
  | 'recovery'
  | 'slow_digesting'
  | 'maintenance';

export interface MealContext {
  mealType: MealType;
  timeSlot: TimeSlot;
  cookingTimeMax: number;
  targetCalories: number;
  targetProtein: number;
  targetFatMin: number;
  targetFatMax: number;
  targetCarbs: number;
  satietyRequirement: SatietyRequirement;
  carbTimingPreference: CarbTimingPreference;
  priorityMicronutrients: string[]; // reserved, always empty
}

export interface Meal {
  readonly recipe: Recipe;
  readonly nutrition: NutritionProfile;
  readonly mealType: MealType;
  readonly busynessLevel: number;
  readonly scheduledTime?: string;
}

export interface DailyMealPlan {
  date: string;
  meals: Meal[];
  totalNutrition: NutritionProfile;
  goals: NutritionGoals;
  meetsGoals: boolean;
}

export type AdherenceKey = 'calories' | 'protein' | 'fat' | 'carbs';
export type TargetAdherence = Partial<Record<AdherenceKey, number>>;

// ─────────────────────────────────────────────────────────────────────────────
// Planning trace
// ─────────────────────────────────────────────────────────────────────────────

export type RejectionReason = 'cooking_time' | 'allergen' | 'already_selected';

export interface RejectedCandidate {
  recipeId: string;
  reason: RejectionReason;
  detail: string;
}

export interface ScoredCandidate {
  recipeId: string;
  score: number;
}

export interface SlotTrace {
  mealType: MealType;
  context: MealContext;
  rejected: RejectedCandidate[];
  scored: ScoredCandidate[];
  winner: string | null;
  tieBreaker: 'highest_score' | 'first_in_catalog_order' | null;
}

export interface PlanningTrace {
  version: string;
  scorerVersion: string;
  slots: SlotTrace[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Planning result (tagged: a plan exists only when every slot was filled)
// ─────────────────────────────────────────────────────────────────────────────

export interface CompletedPlanning {
  status: 'complete';
  success: boolean;
  dailyPlan: DailyMealPlan;
  totalNutrition: NutritionProfile;
  targetAdherence: TargetAdherence;
  warnings: string[];
  trace: PlanningTrace;
}

export interface AbortedPlanning {
  status: 'aborted';
  success: false;
  dailyPlan: null;
  /** ISO date the plan was requested for, '' when none was given */
  date: string;
  totalNutrition: NutritionProfile;
  targetAdherence: TargetAdherence;
  warnings: string[];
  abortedAt: MealType;
  trace: PlanningTrace;
}

export type PlanningResult = CompletedPlanning | AbortedPlanning;

// ─────────────────────────────────────────────────────────────────────────────
// API
// ─────────────────────────────────────────────────────────────────────────────

export interface ApiError {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_SCHEDULE: 'INVALID_SCHEDULE',
  DATA_LOAD_FAILED: 'DATA_LOAD_FAILED',
  RECIPE_NOT_FOUND: 'RECIPE_NOT_FOUND',
  INGREDIENT_NOT_FOUND: 'INGREDIENT_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
