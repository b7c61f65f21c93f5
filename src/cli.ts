#!/usr/bin/env node
import { runPlanCommand } from './commands/plan';

try {
  process.exitCode = runPlanCommand(process.argv.slice(2));
} catch (err) {
  console.error(`[CLI] Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
