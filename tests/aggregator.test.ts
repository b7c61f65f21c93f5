import { describe, it, expect } from 'vitest';
import type { Meal } from '../src/types';
import {
  ZERO_NUTRITION,
  addNutrition,
  aggregateMeals,
  aggregateRecipes,
  sumNutrition,
} from '../src/services/nutrition/aggregator';
import { FakeCalculator, makeMeal, makeRecipe, nutrition } from './helpers';

/** Small deterministic PRNG so failures are reproducible. */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

function shuffled<T>(items: readonly T[], random: () => number): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

/** Multiples of 0.5 add exactly, so any order gives the same bits. */
function halfStep(random: () => number, max: number): number {
  return Math.floor(random() * max * 2) / 2;
}

describe('addNutrition', () => {
  it('adds field by field', () => {
    expect(addNutrition(nutrition(100, 10, 5, 20), nutrition(50, 2.5, 1, 7))).toEqual(
      nutrition(150, 12.5, 6, 27)
    );
  });
});

describe('aggregateMeals', () => {
  it('returns zeros for no meals', () => {
    expect(aggregateMeals([])).toEqual(ZERO_NUTRITION);
  });

  it('does not depend on meal order', () => {
    const random = seededRandom(42);

    for (let round = 0; round < 25; round++) {
      const meals: Meal[] = Array.from({ length: 2 + Math.floor(random() * 5) }, (_, i) =>
        makeMeal(
          'lunch',
          nutrition(
            halfStep(random, 1000),
            halfStep(random, 80),
            halfStep(random, 50),
            halfStep(random, 150)
          ),
          `r${i}`
        )
      );

      expect(aggregateMeals(shuffled(meals, random))).toEqual(aggregateMeals(meals));
    }
  });
});

describe('sumNutrition', () => {
  it('does not mutate the zero profile', () => {
    sumNutrition([nutrition(1, 1, 1, 1)]);
    expect(ZERO_NUTRITION).toEqual(nutrition(0, 0, 0, 0));
  });
});

describe('aggregateRecipes', () => {
  it('sums the nutrition of each recipe', () => {
    const calculator = new FakeCalculator({
      a: nutrition(300, 20, 10, 30),
      b: nutrition(450, 35, 12, 40),
    });

    expect(aggregateRecipes([makeRecipe('a'), makeRecipe('b')], calculator)).toEqual(
      nutrition(750, 55, 22, 70)
    );
  });
});
