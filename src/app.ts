import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, InvalidInputError } from './utils/errors';
import { ErrorCodes } from './types';
import type { RecipeStore } from './data/recipes';
import type { PlannerDependencies } from './services/planner';
import { createPlanRoutes } from './routes/plan';
import { createRecipeRoutes } from './routes/recipes';

export interface AppContext {
  recipes: RecipeStore;
  planner: PlannerDependencies;
  timeZone: string;
}

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(express.json());

  // Routes
  app.use('/v1/plan', createPlanRoutes({ planner: ctx.planner, timeZone: ctx.timeZone }));
  app.use('/v1/recipes', createRecipeRoutes(ctx.recipes));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      const inputError = new InvalidInputError('Validation failed', {
        issues: err.issues,
      });
      return res.status(inputError.statusCode).json(inputError.toResponse());
    }

    // express.json() rejects unparseable bodies with a SyntaxError
    if (err instanceof SyntaxError) {
      const inputError = new InvalidInputError('Request body is not valid JSON');
      return res.status(inputError.statusCode).json(inputError.toResponse());
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) console.error('[Server] Error:', err);
      return res.status(err.statusCode).json(err.toResponse());
    }

    console.error('[Server] Error:', err);
    return res.status(500).json({
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred.',
      },
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found.',
      },
    });
  });

  return app;
}
