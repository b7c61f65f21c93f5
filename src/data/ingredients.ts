/**
 * Ingredient Store
 *
 * Nutrition data per ingredient, looked up case-insensitively by name or alias.
 */

import { IngredientFileSchema, type IngredientData } from '../types';
import { readJsonFile } from './json';

export class IngredientStore {
  private readonly entries: readonly IngredientData[];
  private readonly index: Map<string, IngredientData>;

  constructor(entries: readonly IngredientData[]) {
    this.entries = [...entries];
    this.index = new Map();

    // First entry wins when a name or alias repeats
    for (const entry of entries) {
      for (const key of [entry.name, ...entry.aliases]) {
        const normalized = key.trim().toLowerCase();
        if (!this.index.has(normalized)) {
          this.index.set(normalized, entry);
        }
      }
    }
  }

  static fromFile(path: string): IngredientStore {
    const file = readJsonFile(path, IngredientFileSchema, 'ingredients');
    return new IngredientStore(file.ingredients);
  }

  getAllIngredients(): readonly IngredientData[] {
    return [...this.entries];
  }

  getIngredientByName(name: string): IngredientData | null {
    return this.index.get(name.trim().toLowerCase()) ?? null;
  }
}
