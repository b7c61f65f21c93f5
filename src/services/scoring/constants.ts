/**
 * Recipe Scoring Constants
 *
 * Component weights and the macro split used inside the nutrition component.
 */

export const SCORER_VERSION = 'v1.2';

export interface ScoringWeights {
  /** Calories and macros against the meal's targets */
  nutrition: number;
  /** Cooking time against the slot's budget */
  schedule: number;
  /** Liked / disliked ingredients */
  preference: number;
  /** Fit to the slot's satiety requirement */
  satiety: number;
  /** Macro-diversity proxy for micronutrient density */
  micronutrient: number;
  /** Fit into what is left of the day */
  balance: number;
}

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  nutrition: 0.35,
  schedule: 0.2,
  preference: 0.15,
  satiety: 0.1,
  micronutrient: 0.1,
  balance: 0.1,
});

export const WEIGHT_SUM_TOLERANCE = 0.001;

export const NUTRITION_SPLIT = {
  CALORIES: 0.3,
  PROTEIN: 0.3,
  FAT: 0.2,
  CARBS: 0.2,
} as const;

export const PREFERENCES = {
  BASE: 50,
  DISLIKED_PENALTY_PER_ITEM: 30,
  DISLIKED_PENALTY_MAX: 50,
  LIKED_BOOST_PER_ITEM: 5,
  LIKED_BOOST_MAX: 15,
} as const;

/** Score returned by a macro component when its target is zero */
export const NEUTRAL_SCORE = 50;
