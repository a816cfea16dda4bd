#!/usr/bin/env npx tsx
/**
 * Fitbit CLI
 *
 * Usage:
 *   npx tsx src/services/fitbit/cli.ts [command] [options]
 *
 * Commands:
 *   retrieve    Fetch a date range and save fitbit_data.json (default)
 *   process     Write the CSV tables of a saved dataset
 *   datasets    List saved datasets
 *
 * Examples:
 *   npx tsx src/services/fitbit/cli.ts retrieve --days 7
 *   npx tsx src/services/fitbit/cli.ts retrieve --from 2024-06-01 --to 2024-06-30 --device 1
 *   npx tsx src/services/fitbit/cli.ts process --dataset 2
 */

import { isAbsolute, resolve } from "node:path";
import { loadConfigFromEnv, type AppConfig } from "../../lib/config.js";
import { isPayloadDecodeError, isQuotaExceededError } from "../../lib/errors.js";
import { setLogFile, setLogLevel } from "../../lib/logger.js";
import { parseCliArgs, DEFAULT_DAYS, type CliOptions } from "./cli-args.js";
import { processDataset, retrieveAndSave } from "./orchestrator.js";
import { listDatasets } from "./storage.js";

function printUsage(): void {
  console.log("Usage: npx tsx src/services/fitbit/cli.ts [retrieve|process|datasets] [options]");
  console.log("");
  console.log("Options:");
  console.log(`  --days <n>          Number of days ending today (default: ${DEFAULT_DAYS})`);
  console.log("  --from <date>       Start date (YYYY-MM-DD), with --to");
  console.log("  --to <date>         End date (YYYY-MM-DD), before today");
  console.log("  --device <id|n>     Device id or list position (required with several devices)");
  console.log("  --dataset <path|n>  Dataset to process (default: most recent)");
  console.log("  --account <name>    Account directory (default: FITBIT_ACCOUNT or 'default')");
  console.log("  --log-level         Set log level (debug|info|warn|error)");
  console.log("  --log-file <path>   Also write every log line to a file");
  console.log("  --help, -h          Show this help message");
}

/**
 * A dataset argument is a 1-based position in the listing or a path.
 */
async function resolveDataset(config: AppConfig, selector: string | undefined): Promise<string> {
  const datasets = await listDatasets(config.dataDir, config.account);

  if (selector === undefined) {
    const latest = datasets.at(-1);
    if (latest === undefined) {
      throw new Error(`No datasets available for ${config.account}`);
    }
    return latest;
  }

  if (/^\d+$/.test(selector)) {
    const dataset = datasets[parseInt(selector, 10) - 1];
    if (dataset === undefined) {
      throw new Error(`Invalid dataset selection: ${selector} (${datasets.length} available)`);
    }
    return dataset;
  }

  return isAbsolute(selector) ? selector : resolve(selector);
}

async function run(options: CliOptions, config: AppConfig): Promise<void> {
  switch (options.command) {
    case "datasets": {
      const datasets = await listDatasets(config.dataDir, config.account);
      datasets.forEach((dataset, index) => console.log(`[${index + 1}] ${dataset}`));
      return;
    }

    case "process": {
      const dataset = await resolveDataset(config, options.dataset);
      const result = await processDataset(dataset);
      console.log(`[OK] Processed ${dataset}:`);
      console.log(`  Files written: ${result.files.length}`);
      console.log(`  Complete rows: ${result.completeRows}`);
      console.log(`  Incomplete rows: ${result.incompleteRows}`);
      return;
    }

    case "retrieve": {
      const result = await retrieveAndSave({
        config,
        range: options.range,
        device: options.device,
        onProgress: (completed, total, request) =>
          console.log(`[${completed}/${total}] ${request.date} ${request.resource}`),
      });
      console.log(`[OK] Fitbit retrieval completed:`);
      console.log(`  Device: ${result.deviceId}`);
      console.log(`  Dataset: ${result.datasetDir}`);
      console.log(`  Requests: ${result.stats.totalRequests}`);
      return;
    }
  }
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    printUsage();
    process.exit(1);
  }

  if (options.help) {
    printUsage();
    process.exit(0);
  }

  // Set log level before any retrieval
  setLogLevel(options.logLevel);
  if (options.logFile !== undefined) {
    setLogFile(options.logFile);
  }

  try {
    const env = loadConfigFromEnv();
    const config = options.account !== undefined ? { ...env, account: options.account } : env;
    await run(options, config);
    process.exit(0);
  } catch (error) {
    if (isQuotaExceededError(error) || isPayloadDecodeError(error)) {
      console.error(`[ERROR] ${error.message}`);
    } else {
      console.error(`[ERROR] Fitbit ${options.command} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`[ERROR] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
