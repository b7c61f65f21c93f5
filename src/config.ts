import { z } from 'zod';
import { InvalidInputError } from './utils/errors';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  NUTRIPLAN_RECIPES_PATH: z.string().min(1).default('data/recipes.json'),
  NUTRIPLAN_INGREDIENTS_PATH: z.string().min(1).default('data/ingredients.json'),
  NUTRIPLAN_PROFILE_PATH: z.string().min(1).default('config/profile.json'),
  NUTRIPLAN_TIMEZONE: z.string().min(1).default('UTC'),
});

export interface AppConfig {
  port: number;
  recipesPath: string;
  ingredientsPath: string;
  profilePath: string;
  timeZone: string;
}

/**
 * Read settings from the environment. Call dotenv's `config()` first if a
 * `.env` file should be honoured.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new InvalidInputError('Invalid environment configuration', {
      issues: result.error.issues,
    });
  }
  const parsed = result.data;
  return {
    port: parsed.PORT,
    recipesPath: parsed.NUTRIPLAN_RECIPES_PATH,
    ingredientsPath: parsed.NUTRIPLAN_INGREDIENTS_PATH,
    profilePath: parsed.NUTRIPLAN_PROFILE_PATH,
    timeZone: parsed.NUTRIPLAN_TIMEZONE,
  };
}
