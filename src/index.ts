import { config as loadDotenv } from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { loadEngine } from './engine';

loadDotenv();

const config = loadConfig();
const engine = loadEngine({
  recipesPath: config.recipesPath,
  ingredientsPath: config.ingredientsPath,
});

const app = createApp({
  recipes: engine.recipes,
  planner: engine.planner,
  timeZone: config.timeZone,
});

app.listen(config.port, () => {
  console.log(`[Server] nutriplan listening on port ${config.port} (time zone ${config.timeZone})`);
});

export default app;
