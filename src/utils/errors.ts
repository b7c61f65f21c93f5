import type { ErrorCodes, ApiError } from '../types';

export class AppError extends Error {
  constructor(
    public code: keyof typeof ErrorCodes,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toResponse(): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 400, details);
  }
}

/**
 * Schedule problems are configuration errors: they stop planning before it
 * starts and are never turned into warnings.
 */
export class InvalidScheduleError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_SCHEDULE', message, 400, details);
    this.name = 'InvalidScheduleError';
  }
}

export class DataLoadError extends AppError {
  constructor(source: string, message: string, details?: Record<string, unknown>) {
    super('DATA_LOAD_FAILED', `Failed to load ${source}: ${message}`, 500, {
      source,
      ...details,
    });
    this.name = 'DataLoadError';
  }
}

export class RecipeNotFoundError extends AppError {
  constructor(recipeId: string) {
    super('RECIPE_NOT_FOUND', `Recipe with ID ${recipeId} not found.`, 404);
  }
}

export class IngredientNotFoundError extends AppError {
  constructor(public ingredientName: string, reason?: string) {
    super(
      'INGREDIENT_NOT_FOUND',
      reason
        ? `Ingredient '${ingredientName}' has no usable nutrition data (${reason})`
        : `Ingredient '${ingredientName}' not found in nutrition database`,
      422,
      { ingredient: ingredientName }
    );
    this.name = 'IngredientNotFoundError';
  }
}
