import { describe, it, expect } from 'vitest';
import { parseCliArgs, siblingPaths } from '../src/commands/plan';
import { InvalidInputError } from '../src/utils/errors';

const DEFAULTS = {
  profilePath: 'config/profile.json',
  recipesPath: 'data/recipes.json',
  ingredientsPath: 'data/ingredients.json',
};

describe('parseCliArgs', () => {
  it('uses the defaults when no flags are given', () => {
    expect(parseCliArgs([], DEFAULTS)).toEqual({
      ...DEFAULTS,
      output: 'markdown',
      outputFile: undefined,
      date: undefined,
    });
  });

  it('reads every flag', () => {
    const options = parseCliArgs(
      [
        '--profile',
        'me.json',
        '--recipes',
        'r.json',
        '--ingredients',
        'i.json',
        '--output',
        'both',
        '--output-file',
        'out/plan.md',
        '--date',
        '2026-03-02',
      ],
      DEFAULTS
    );

    expect(options).toEqual({
      profilePath: 'me.json',
      recipesPath: 'r.json',
      ingredientsPath: 'i.json',
      output: 'both',
      outputFile: 'out/plan.md',
      date: '2026-03-02',
    });
  });

  it('returns null for --help', () => {
    expect(parseCliArgs(['--help'], DEFAULTS)).toBeNull();
    expect(parseCliArgs(['-h'], DEFAULTS)).toBeNull();
  });

  it('rejects an unknown output format', () => {
    expect(() => parseCliArgs(['--output', 'yaml'], DEFAULTS)).toThrow(InvalidInputError);
  });

  it('rejects a malformed date', () => {
    expect(() => parseCliArgs(['--date', '02/03/2026'], DEFAULTS)).toThrow(
      "--date must be YYYY-MM-DD (got '02/03/2026')"
    );
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--verbose'], DEFAULTS)).toThrow();
  });
});

describe('siblingPaths', () => {
  it('swaps the extension', () => {
    expect(siblingPaths('out/plan.md')).toEqual({ markdown: 'out/plan.md', json: 'out/plan.json' });
  });

  it('appends extensions to a bare name', () => {
    expect(siblingPaths('plan')).toEqual({ markdown: 'plan.md', json: 'plan.json' });
  });
});
