/**
 * Candidate Filtering & Selection
 *
 * Hard constraints first (cooking time, allergens, no repeats within the
 * day), then the highest score wins. Ties go to the candidate that comes
 * first in catalog order, so filtering must never reorder recipes.
 */

import type {
  MealContext,
  NutritionProfile,
  Recipe,
  RejectedCandidate,
  ScoredCandidate,
  SlotTrace,
  UserProfile,
} from '../../types';
import type { RecipeScoring } from '../scoring';

export type NonEmptyArray<T> = readonly [T, ...T[]];

export function isNonEmpty<T>(items: readonly T[]): items is NonEmptyArray<T> {
  return items.length > 0;
}

export interface FilterResult {
  candidates: Recipe[];
  rejected: RejectedCandidate[];
}

export function filterCandidates(
  recipes: readonly Recipe[],
  context: MealContext,
  profile: UserProfile,
  scorer: Pick<RecipeScoring, 'containsAllergens'>,
  usedRecipeIds: ReadonlySet<string>
): FilterResult {
  const candidates: Recipe[] = [];
  const rejected: RejectedCandidate[] = [];

  for (const recipe of recipes) {
    if (recipe.cookingTimeMinutes > context.cookingTimeMax) {
      rejected.push({
        recipeId: recipe.id,
        reason: 'cooking_time',
        detail: `requires ${recipe.cookingTimeMinutes} min, ${context.cookingTimeMax} min available`,
      });
      continue;
    }

    if (scorer.containsAllergens(recipe, profile.allergies)) {
      rejected.push({
        recipeId: recipe.id,
        reason: 'allergen',
        detail: 'contains an ingredient matching an allergy',
      });
      continue;
    }

    if (usedRecipeIds.has(recipe.id)) {
      rejected.push({
        recipeId: recipe.id,
        reason: 'already_selected',
        detail: 'already chosen for an earlier meal today',
      });
      continue;
    }

    candidates.push(recipe);
  }

  return { candidates, rejected };
}

export interface Selection {
  recipe: Recipe;
  score: number;
  scored: ScoredCandidate[];
  tieBreaker: SlotTrace['tieBreaker'];
}

/**
 * Score every candidate and keep the first one with the strictly highest score.
 */
export function selectBestRecipe(
  candidates: NonEmptyArray<Recipe>,
  context: MealContext,
  profile: UserProfile,
  currentNutrition: NutritionProfile,
  scorer: Pick<RecipeScoring, 'scoreRecipe'>
): Selection {
  const scored: ScoredCandidate[] = candidates.map((recipe) => ({
    recipeId: recipe.id,
    score: scorer.scoreRecipe(recipe, context, profile, currentNutrition),
  }));

  let bestIndex = 0;
  for (let i = 1; i < scored.length; i++) {
    if (scored[i].score > scored[bestIndex].score) {
      bestIndex = i;
    }
  }

  const bestScore = scored[bestIndex].score;
  let tieBreaker: SlotTrace['tieBreaker'] = null;
  if (scored.length > 1) {
    const tied = scored.filter((c) => c.score === bestScore).length > 1;
    tieBreaker = tied ? 'first_in_catalog_order' : 'highest_score';
  }

  return { recipe: candidates[bestIndex], score: bestScore, scored, tieBreaker };
}
