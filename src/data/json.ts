import { readFileSync } from 'fs';
import type { ZodType, ZodTypeDef } from 'zod';
import { DataLoadError } from '../utils/errors';

/**
 * Read a JSON file and validate it against a schema.
 * Any failure (missing file, bad JSON, schema mismatch) becomes a DataLoadError.
 */
export function readJsonFile<T>(
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  source: string
): T {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new DataLoadError(source, `cannot read ${path}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DataLoadError(source, `${path} is not valid JSON`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DataLoadError(source, `${path} does not match the expected format`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}
