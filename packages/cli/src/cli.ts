#!/usr/bin/env tsx
/**
 * Pump Advisor CLI
 */

import { program } from "commander";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { config } from "dotenv";
import { formatDefaults, runAnalyze, type AnalyzeOptions } from "./analyze.js";

// Load .env.local written by the local server's setup
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../.env.local") });

function fail(error: unknown): never {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

program
  .name("pump-advisor")
  .description("Basal rate recommendations from a Glooko export")
  .version("0.1.0");

program
  .command("analyze")
  .description("Analyze an export ZIP and print the recommendation")
  .argument("<zip>", "Glooko export archive")
  .option("--settings <json>", "Pump settings JSON file (see `defaults`)")
  .option("--units <unit>", "Glucose units: mmol/L or mg/dL")
  .option("--timezone <tz>", "Timezone the export was written in")
  .option("--dry-run", "Print the prompt instead of calling the model")
  .action(async (zip: string, options: AnalyzeOptions) => {
    try {
      console.log(await runAnalyze(zip, options));
    } catch (error) {
      fail(error);
    }
  });

program
  .command("defaults")
  .description("Print a default settings file to start from")
  .option("--units <unit>", "Glucose units: mmol/L or mg/dL")
  .action((options: { units?: string }) => {
    try {
      console.log(formatDefaults(options.units));
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
