import { Router, type Request, type Response, type NextFunction } from 'express';
import type { RecipeStore } from '../data/recipes';
import { formatIngredient } from '../services/output/formatters';
import { RecipeNotFoundError } from '../utils/errors';

export function createRecipeRoutes(store: RecipeStore): Router {
  const router = Router();

  // GET /v1/recipes - List the catalog in file order
  router.get('/', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({
        recipes: store.getAllRecipes().map((recipe) => ({
          id: recipe.id,
          name: recipe.name,
          cooking_time_minutes: recipe.cookingTimeMinutes,
        })),
      });
    } catch (err) {
      next(err);
    }
  });

  // GET /v1/recipes/:id - Get a specific recipe
  router.get('/:id', (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const recipe = store.getRecipeById(req.params.id);
      if (!recipe) {
        throw new RecipeNotFoundError(req.params.id);
      }

      res.json({
        id: recipe.id,
        name: recipe.name,
        cooking_time_minutes: recipe.cookingTimeMinutes,
        ingredients: recipe.ingredients.map((ing) => ({
          name: ing.name,
          quantity: ing.quantity,
          unit: ing.unit,
          is_to_taste: ing.isToTaste,
          display: formatIngredient(ing),
        })),
        instructions: [...recipe.instructions],
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
