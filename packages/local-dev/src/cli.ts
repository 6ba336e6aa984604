/**
 * Carelog local runner CLI
 *
 * Usage:
 *   npm run local -- classify batches/2024-03-01-north.json --dry-run
 *   npm run local -- summarise batches/*.json --table care-summaries-dev
 *   npm run local -- inspect batches/2024-03-01-north.json
 */

import { InvalidArgumentError, program } from "commander";
import { loadPipelineConfig, type DriverRun } from "@carelog/functions/visits";
import { loadLocalEnv } from "./env.js";
import { createLocalDeps, runLocal, type LocalCommand, type LocalRunOptions } from "./run.js";

loadLocalEnv();

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Print one line per object and flag failures in the exit code
 */
function printOutcomes(run: DriverRun): void {
  console.log("\n=== LOCAL RUN ===");
  for (const outcome of run.outcomes) {
    const name = outcome.ref.key;
    switch (outcome.state) {
      case "reported": {
        const { records, processed, skipped, failed, rejected, written } = outcome.report;
        console.log(
          `  ${name}: ${records} records, ${processed} processed, ${skipped} skipped, ${failed} failed, ${rejected} unreadable, ${written} written`
        );
        break;
      }
      case "empty":
        console.log(`  ${name}: no records`);
        break;
      case "failed":
        console.log(`  ${name}: failed at ${outcome.stage}`);
        process.exitCode = 1;
        break;
    }
  }
}

async function run(command: LocalCommand, files: string[], options: LocalRunOptions): Promise<void> {
  const config = loadPipelineConfig();
  if (!config.ok) {
    console.error(config.error.message);
    process.exit(1);
  }

  const result = await runLocal(command, files, options, createLocalDeps(config.value));
  if (!result.ok) {
    console.error(result.error.message);
    console.error("Pass --table <name> or --dry-run.");
    process.exit(1);
  }
  printOutcomes(result.value);
}

program
  .name("carelog-local")
  .description("Run the care visit batch pipelines against local files")
  .version("0.1.0");

program
  .command("classify")
  .description("Classify every visit note as red, amber or green")
  .argument("<files...>", "Batch files (JSON arrays of visit records)")
  .option("--dry-run", "Print items instead of writing to DynamoDB")
  .option("--table <name>", "Classifications table (default: $CLASSIFICATIONS_TABLE)")
  .option("--concurrency <n>", "Model calls in flight", parsePositiveInt)
  .action((files: string[], options: LocalRunOptions) => run("classify", files, options));

program
  .command("summarise")
  .description("Summarise each client's visits")
  .argument("<files...>", "Batch files (JSON arrays of visit records)")
  .option("--dry-run", "Print items instead of writing to DynamoDB")
  .option("--table <name>", "Summaries table (default: $SUMMARIES_TABLE)")
  .option("--concurrency <n>", "Model calls in flight", parsePositiveInt)
  .action((files: string[], options: LocalRunOptions) => run("summarise", files, options));

program
  .command("inspect")
  .description("Log batch structure without calling the model or the store")
  .argument("<files...>", "Batch files (JSON arrays of visit records)")
  .action((files: string[]) => run("inspect", files, {}));

program.parseAsync().catch((error: unknown) => {
  console.error("Local run error:", error);
  process.exit(1);
});
