import { describe, it, expect } from 'vitest';
import { IngredientStore } from '../src/data/ingredients';
import { IngredientDataSchema } from '../src/types';
import {
  NutritionCalculator,
  convertQuantityToGrams,
} from '../src/services/nutrition/calculator';
import { IngredientNotFoundError } from '../src/utils/errors';
import { ingredient, makeRecipe } from './helpers';

const store = new IngredientStore(
  [
    {
      name: 'rolled oats',
      aliases: ['oats'],
      per_100g: { calories: 380, protein_g: 13, fat_g: 6.5, carbs_g: 68 },
    },
    { name: 'chicken breast', per_100g: { calories: 160, protein_g: 30, fat_g: 4, carbs_g: 0 } },
    { name: 'whey protein', per_scoop: { calories: 120, protein_g: 24, fat_g: 1.5, carbs_g: 3 } },
    { name: 'egg', per_large: { calories: 72, protein_g: 6, fat_g: 5, carbs_g: 0.5 } },
    { name: 'mystery powder' },
  ].map((entry) => IngredientDataSchema.parse(entry))
);
const calculator = new NutritionCalculator(store);

describe('convertQuantityToGrams', () => {
  it('converts ounces and servings', () => {
    expect(convertQuantityToGrams(ingredient('x', 2, 'oz'))).toBeCloseTo(56.7, 9);
    expect(convertQuantityToGrams(ingredient('x', 1.5, 'serving'))).toBe(150);
    expect(convertQuantityToGrams(ingredient('x', 80, 'grams'))).toBe(80);
    expect(convertQuantityToGrams(ingredient('x', 3, 'cup'))).toBe(3);
  });
});

describe('NutritionCalculator.calculateIngredientNutrition', () => {
  it('scales per-100g values by weight', () => {
    const result = calculator.calculateIngredientNutrition(ingredient('rolled oats', 50, 'g'));
    expect(result).toEqual({ calories: 190, proteinG: 6.5, fatG: 3.25, carbsG: 34 });
  });

  it('converts ounces before scaling', () => {
    const result = calculator.calculateIngredientNutrition(ingredient('chicken breast', 2, 'oz'));
    expect(result.calories).toBeCloseTo(90.72, 9);
    expect(result.proteinG).toBeCloseTo(17.01, 9);
  });

  it('multiplies per-scoop and per-large values by quantity', () => {
    expect(calculator.calculateIngredientNutrition(ingredient('whey protein', 2, 'scoop'))).toEqual(
      { calories: 240, proteinG: 48, fatG: 3, carbsG: 6 }
    );
    expect(calculator.calculateIngredientNutrition(ingredient('egg', 3, 'large')).calories).toBe(
      216
    );
  });

  it('falls back to whatever unit the data has', () => {
    // No unit: egg only has per_large data
    expect(calculator.calculateIngredientNutrition(ingredient('egg', 2, '')).calories).toBe(144);
    // "scoop" on a per_100g ingredient reads the quantity as grams
    expect(
      calculator.calculateIngredientNutrition(ingredient('rolled oats', 50, 'scoop')).calories
    ).toBe(190);
  });

  it('finds ingredients by alias, ignoring case', () => {
    expect(calculator.calculateIngredientNutrition(ingredient('OATS', 100, 'g')).calories).toBe(380);
  });

  it('throws for unknown ingredients', () => {
    expect(() => calculator.calculateIngredientNutrition(ingredient('dragonfruit'))).toThrow(
      "Ingredient 'dragonfruit' not found in nutrition database"
    );
  });

  it('throws for to-taste ingredients', () => {
    expect(() =>
      calculator.calculateIngredientNutrition(ingredient('salt', 0, 'to taste'))
    ).toThrow(IngredientNotFoundError);
  });

  it('throws when the entry has no nutrition data', () => {
    expect(() =>
      calculator.calculateIngredientNutrition(ingredient('mystery powder', 10, 'g'))
    ).toThrow(
      "Ingredient 'mystery powder' has no usable nutrition data (no matching nutrition unit found)"
    );
  });
});

describe('NutritionCalculator.calculateRecipeNutrition', () => {
  it('sums known ingredients and skips to-taste and unknown ones', () => {
    const recipe = makeRecipe('porridge', {
      ingredients: [
        ingredient('rolled oats', 100, 'g'),
        ingredient('whey protein', 1, 'scoop'),
        ingredient('cinnamon', 0, 'to taste'),
        ingredient('dragonfruit', 50, 'g'),
      ],
    });

    expect(calculator.calculateRecipeNutrition(recipe)).toEqual({
      calories: 500,
      proteinG: 37,
      fatG: 8,
      carbsG: 71,
    });
  });

  it('returns zeros for a recipe with nothing measurable', () => {
    const recipe = makeRecipe('water', { ingredients: [ingredient('salt', 0, 'to taste')] });
    expect(calculator.calculateRecipeNutrition(recipe)).toEqual({
      calories: 0,
      proteinG: 0,
      fatG: 0,
      carbsG: 0,
    });
  });
});

describe('NutritionCalculator.findUnresolvedIngredients', () => {
  it('lists each unresolved name once, in first-seen order', () => {
    const recipes = [
      makeRecipe('a', { ingredients: [ingredient('dragonfruit'), ingredient('egg', 1, 'large')] }),
      makeRecipe('b', {
        ingredients: [
          ingredient('mystery powder'),
          ingredient('dragonfruit'),
          ingredient('pepper', 0, 'to taste'),
        ],
      }),
    ];

    expect(calculator.findUnresolvedIngredients(recipes)).toEqual(['dragonfruit', 'mystery powder']);
  });
});
