/**
 * Strava CLI
 *
 * Usage:
 *   npx tsx src/services/strava/cli.ts [options]
 *
 * Options:
 *   --lookback-hours <n>   Buffer subtracted from the latest stored start (default: 6)
 *   --days <n>             Initial window when nothing is stored yet (default: 30)
 *   --commit-every <n>     Activities per commit (default: 25)
 *   --max-activities <n>   Stop after n activities (default: unlimited)
 *   --log-level            Set log level (debug|info|warn|error)
 *
 * Meant to be triggered by cron; exits 0 on success and 1 on any error.
 */

import { pathToFileURL } from "url";
import { syncActivities, type RunOptions } from "./orchestrator.js";
import { loadConfig } from "../../lib/config.js";
import { errorMessage } from "../../lib/errors.js";
import { isLogLevel, setLogLevel, VALID_LOG_LEVELS, type LogLevel } from "../../lib/logger.js";
import { COMMIT_EVERY_N_ACTIVITIES, DEFAULT_DAYS_IF_EMPTY, LOOKBACK_BUFFER_HOURS } from "./sync.js";

export interface ParsedArgs {
  help: boolean;
  lookbackHours: number;
  days: number;
  commitEvery: number;
  maxActivities?: number;
  logLevel?: LogLevel;
}

export function printUsage(): void {
  console.log("Usage: npx tsx src/services/strava/cli.ts [options]");
  console.log("");
  console.log("Options:");
  console.log(`  --lookback-hours <n>   Buffer subtracted from the latest stored start (default: ${LOOKBACK_BUFFER_HOURS})`);
  console.log(`  --days <n>             Initial window when nothing is stored yet (default: ${DEFAULT_DAYS_IF_EMPTY})`);
  console.log(`  --commit-every <n>     Activities per commit (default: ${COMMIT_EVERY_N_ACTIVITIES})`);
  console.log("  --max-activities <n>   Stop after n activities (default: unlimited)");
  console.log("  --log-level            Set log level (debug|info|warn|error)");
  console.log("  --help, -h             Show this help message");
}

function parsePositiveInt(flag: string, value: string | undefined, allowZero: boolean = false): number {
  const parsed = Number(value);
  const min = allowZero ? 0 : 1;
  if (value === undefined || !Number.isInteger(parsed) || parsed < min) {
    throw new Error(`Invalid ${flag} value. Must be a ${allowZero ? "non-negative" : "positive"} integer.`);
  }
  return parsed;
}

/**
 * Parse command-line arguments
 *
 * @throws Error on an invalid value or unknown option
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    help: false,
    lookbackHours: LOOKBACK_BUFFER_HOURS,
    days: DEFAULT_DAYS_IF_EMPTY,
    commitEvery: COMMIT_EVERY_N_ACTIVITIES,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        parsed.help = true;
        break;
      case "--lookback-hours":
        parsed.lookbackHours = parsePositiveInt(arg, args[++i], true);
        break;
      case "--days":
        parsed.days = parsePositiveInt(arg, args[++i]);
        break;
      case "--commit-every":
        parsed.commitEvery = parsePositiveInt(arg, args[++i]);
        break;
      case "--max-activities":
        parsed.maxActivities = parsePositiveInt(arg, args[++i]);
        break;
      case "--log-level": {
        const level = args[++i] ?? "";
        if (!isLogLevel(level)) {
          throw new Error(`Invalid --log-level value. Must be one of: ${VALID_LOG_LEVELS.join(", ")}`);
        }
        parsed.logLevel = level;
        break;
      }
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return parsed;
}

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    printUsage();
    process.exit(1);
  }

  if (args.help) {
    printUsage();
    process.exit(0);
  }

  try {
    // Config errors surface here, before any network or DB activity
    const config = loadConfig();
    setLogLevel(args.logLevel ?? config.logLevel ?? "info");

    const options: RunOptions = {
      config,
      lookbackHours: args.lookbackHours,
      defaultDays: args.days,
      commitEvery: args.commitEvery,
      maxActivities: args.maxActivities,
    };
    const result = await syncActivities(options);

    console.log(`[OK] Strava sync completed:`);
    console.log(`  Activities processed: ${result.activitiesProcessed}`);
    console.log(`  Streams upserted:     ${result.streamsUpserted}`);
    console.log(`  Activities skipped:   ${result.activitiesSkipped}`);
    console.log(`  Elapsed: ${(result.elapsedMs / 1000).toFixed(1)}s`);

    process.exit(0);
  } catch (error) {
    console.error(`[ERROR] Strava sync failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
}
