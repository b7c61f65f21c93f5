import { writeFileSync } from 'fs';
import { extname } from 'path';
import { parseArgs } from 'util';
import { config as loadDotenv } from 'dotenv';
import { loadConfig } from '../config';
import { loadEngine } from '../engine';
import { loadUserProfile } from '../data/profile';
import { planForProfile } from '../services/planner';
import { formatPlanJsonString, formatPlanMarkdown } from '../services/output/formatters';
import { todayInTimeZone } from '../utils/dates';
import { InvalidInputError } from '../utils/errors';

export type OutputFormat = 'markdown' | 'json' | 'both';

export interface CliOptions {
  profilePath: string;
  recipesPath: string;
  ingredientsPath: string;
  output: OutputFormat;
  outputFile?: string;
  date?: string;
}

const USAGE = `Usage: nutriplan [options]

  --profile <path>       user profile JSON (default: config/profile.json)
  --recipes <path>       recipe catalog JSON (default: data/recipes.json)
  --ingredients <path>   ingredient nutrition JSON (default: data/ingredients.json)
  --output <format>      markdown | json | both (default: markdown)
  --output-file <path>   write to a file instead of stdout
  --date <YYYY-MM-DD>    plan date (default: today)
  -h, --help             show this help`;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'markdown' || value === 'json' || value === 'both';
}

/**
 * Parse command-line flags. Defaults come from `defaults` (the environment
 * configuration), flags override them. Returns null when help was requested.
 */
export function parseCliArgs(
  argv: string[],
  defaults: Pick<CliOptions, 'profilePath' | 'recipesPath' | 'ingredientsPath'>
): CliOptions | null {
  const { values } = parseArgs({
    args: argv,
    options: {
      profile: { type: 'string' },
      recipes: { type: 'string' },
      ingredients: { type: 'string' },
      output: { type: 'string', default: 'markdown' },
      'output-file': { type: 'string' },
      date: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.help) return null;

  const output = values.output ?? 'markdown';
  if (!isOutputFormat(output)) {
    throw new InvalidInputError(`--output must be markdown, json or both (got '${output}')`);
  }
  if (values.date !== undefined && !DATE_PATTERN.test(values.date)) {
    throw new InvalidInputError(`--date must be YYYY-MM-DD (got '${values.date}')`);
  }

  return {
    profilePath: values.profile ?? defaults.profilePath,
    recipesPath: values.recipes ?? defaults.recipesPath,
    ingredientsPath: values.ingredients ?? defaults.ingredientsPath,
    output,
    outputFile: values['output-file'],
    date: values.date,
  };
}

/**
 * "plan.md" → "plan.md" / "plan.json"; "plan" → "plan.md" / "plan.json".
 */
export function siblingPaths(outputFile: string): { markdown: string; json: string } {
  const ext = extname(outputFile);
  const base = ext ? outputFile.slice(0, -ext.length) : outputFile;
  return { markdown: `${base}.md`, json: `${base}.json` };
}

function progress(message: string): void {
  console.error(message);
}

export function runPlanCommand(argv: string[]): number {
  loadDotenv();
  const config = loadConfig();

  const options = parseCliArgs(argv, {
    profilePath: config.profilePath,
    recipesPath: config.recipesPath,
    ingredientsPath: config.ingredientsPath,
  });
  if (!options) {
    console.log(USAGE);
    return 0;
  }

  progress(`[CLI] Loading user profile from ${options.profilePath}`);
  const profile = loadUserProfile(options.profilePath);
  const engine = loadEngine(
    { recipesPath: options.recipesPath, ingredientsPath: options.ingredientsPath },
    progress
  );

  const date = options.date ?? todayInTimeZone(config.timeZone);
  progress(`[CLI] Planning meals for ${date}`);
  const result = planForProfile(engine.planner, profile, { date });

  const markdown = formatPlanMarkdown(result);
  const json = formatPlanJsonString(result);

  if (options.outputFile) {
    if (options.output === 'both') {
      const paths = siblingPaths(options.outputFile);
      writeFileSync(paths.markdown, markdown);
      writeFileSync(paths.json, json);
      progress(`[CLI] Saved ${paths.markdown} and ${paths.json}`);
    } else {
      writeFileSync(options.outputFile, options.output === 'json' ? json : markdown);
      progress(`[CLI] Saved ${options.outputFile}`);
    }
  } else if (options.output === 'both') {
    console.log(markdown);
    console.log(`\n${'='.repeat(80)}\n`);
    console.log(json);
  } else {
    console.log(options.output === 'json' ? json : markdown);
  }

  if (result.status === 'aborted') {
    progress(`[CLI] Planning aborted at ${result.abortedAt}`);
  } else if (result.success) {
    progress('[CLI] Meal plan generated successfully');
  } else {
    progress('[CLI] Meal plan generated with warnings:');
  }
  for (const warning of result.warnings) {
    progress(`  - ${warning}`);
  }
  return 0;
}
