import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../src/app';
import { createEngine } from '../src/engine';
import { IngredientStore } from '../src/data/ingredients';
import { RecipeStore } from '../src/data/recipes';
import { IngredientDataSchema } from '../src/types';
import { ingredient, makeRecipe } from './helpers';

const RECIPES = [
  makeRecipe('pb-oats', {
    name: 'Peanut Oats',
    ingredients: [ingredient('peanut butter', 30), ingredient('rolled oats', 80)],
  }),
  makeRecipe('pb-rice', {
    name: 'Peanut Rice',
    ingredients: [ingredient('peanut butter', 30), ingredient('white rice', 150)],
  }),
  makeRecipe('pb-chicken', {
    name: 'Peanut Chicken',
    ingredients: [ingredient('peanut butter', 30), ingredient('chicken breast', 200)],
  }),
];

const INGREDIENTS = [
  { name: 'peanut butter', per_100g: { calories: 600, protein_g: 25, fat_g: 50, carbs_g: 20 } },
  { name: 'rolled oats', per_100g: { calories: 380, protein_g: 13, fat_g: 7, carbs_g: 68 } },
  { name: 'white rice', per_100g: { calories: 130, protein_g: 2.5, fat_g: 0.5, carbs_g: 28 } },
  { name: 'chicken breast', per_100g: { calories: 165, protein_g: 31, fat_g: 3.5, carbs_g: 0 } },
].map((entry) => IngredientDataSchema.parse(entry));

const PLAN_REQUEST = {
  daily_calories: 2400,
  daily_protein_g: 150,
  daily_fat_g_min: 60,
  daily_fat_g_max: 80,
  schedule: { '07:00': 2, '12:00': 3, '18:00': 3 },
  date: '2026-03-02',
};

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);

  const engine = createEngine(new RecipeStore(RECIPES), new IngredientStore(INGREDIENTS));
  const app = createApp({ recipes: engine.recipes, planner: engine.planner, timeZone: 'UTC' });

  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  vi.restoreAllMocks();
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});

function postPlan(body: string) {
  return fetch(`${baseUrl}/v1/plan`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body,
  });
}

describe('POST /v1/plan', () => {
  it('returns a complete plan for the requested date', async () => {
    const res = await postPlan(JSON.stringify(PLAN_REQUEST));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'complete',
      date: '2026-03-02',
      meals: [{ meal_type: 'breakfast' }, { meal_type: 'lunch' }, { meal_type: 'dinner' }],
      goals: { calories: 2400, protein_g: 150, fat_g_min: 60, fat_g_max: 80 },
    });
  });

  it('answers 200 with the abort reason when allergies exclude every recipe', async () => {
    const res = await postPlan(JSON.stringify({ ...PLAN_REQUEST, allergies: ['peanut'] }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'aborted',
      success: false,
      date: '2026-03-02',
      meals: [],
      total_nutrition: { calories: 0, protein_g: 0, fat_g: 0, carbs_g: 0 },
      goals: null,
      target_adherence: {},
      warnings: ['No recipes available for breakfast'],
      meets_goals: false,
      aborted_at: 'breakfast',
    });
  });

  it('rejects a schedule with fewer than three meals', async () => {
    const res = await postPlan(JSON.stringify({ ...PLAN_REQUEST, schedule: { '07:00': 2 } }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: 'INVALID_SCHEDULE' } });
  });

  it('rejects a body that fails validation', async () => {
    const { daily_calories: _omitted, ...withoutCalories } = PLAN_REQUEST;
    const res = await postPlan(JSON.stringify(withoutCalories));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: { code: 'INVALID_INPUT', message: 'Validation failed' },
    });
  });

  it('rejects a body that is not JSON', async () => {
    const res = await postPlan('{');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_INPUT', message: 'Request body is not valid JSON' },
    });
  });
});

describe('GET /v1/recipes', () => {
  it('lists the catalog in file order', async () => {
    const res = await fetch(`${baseUrl}/v1/recipes`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      recipes: [
        { id: 'pb-oats', name: 'Peanut Oats', cooking_time_minutes: 5 },
        { id: 'pb-rice', name: 'Peanut Rice', cooking_time_minutes: 5 },
        { id: 'pb-chicken', name: 'Peanut Chicken', cooking_time_minutes: 5 },
      ],
    });
  });

  it('returns one recipe with display strings', async () => {
    const res = await fetch(`${baseUrl}/v1/recipes/pb-rice`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      id: 'pb-rice',
      name: 'Peanut Rice',
      cooking_time_minutes: 5,
      ingredients: [
        { name: 'peanut butter', quantity: 30, unit: 'g', is_to_taste: false, display: '30 g peanut butter' },
        { name: 'white rice', quantity: 150, unit: 'g', is_to_taste: false, display: '150 g white rice' },
      ],
      instructions: [],
    });
  });

  it('answers 404 for an unknown recipe', async () => {
    const res = await fetch(`${baseUrl}/v1/recipes/zzz`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'RECIPE_NOT_FOUND', message: 'Recipe with ID zzz not found.' },
    });
  });
});

describe('fallbacks', () => {
  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('answers 404 for an unknown endpoint', async () => {
    const res = await fetch(`${baseUrl}/v2/nothing`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Endpoint not found.' },
    });
  });
});
