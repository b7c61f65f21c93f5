import { RecipeStore } from './data/recipes';
import { IngredientStore } from './data/ingredients';
import { NutritionCalculator } from './services/nutrition/calculator';
import { RecipeScorer } from './services/scoring';
import type { PlannerDependencies } from './services/planner';

export interface DataPaths {
  recipesPath: string;
  ingredientsPath: string;
}

export interface Engine {
  recipes: RecipeStore;
  ingredients: IngredientStore;
  calculator: NutritionCalculator;
  planner: PlannerDependencies;
}

export function createEngine(recipes: RecipeStore, ingredients: IngredientStore): Engine {
  const calculator = new NutritionCalculator(ingredients);
  const scorer = new RecipeScorer(calculator);
  return {
    recipes,
    ingredients,
    calculator,
    planner: { scorer, calculator, recipeSource: recipes },
  };
}

/**
 * Load both data files and wire the planner. Ingredients that no recipe can
 * resolve are reported once here; they count as zero in every total.
 *
 * `log` defaults to stdout; the CLI passes a stderr logger so its rendering
 * stays alone on stdout.
 */
export function loadEngine(
  paths: DataPaths,
  log: (message: string) => void = (message) => console.log(message)
): Engine {
  const recipes = RecipeStore.fromFile(paths.recipesPath);
  const ingredients = IngredientStore.fromFile(paths.ingredientsPath);
  log(`[Data] Loaded ${recipes.size} recipes from ${paths.recipesPath}`);
  log(
    `[Data] Loaded ${ingredients.getAllIngredients().length} ingredients from ${paths.ingredientsPath}`
  );

  const engine = createEngine(recipes, ingredients);
  const unresolved = engine.calculator.findUnresolvedIngredients(recipes.getAllRecipes());
  if (unresolved.length > 0) {
    log(`[Data] No nutrition data for: ${unresolved.join(', ')} (counted as zero)`);
  }
  return engine;
}
