/**
 * Fitbit CLI - argument parsing
 */

import { isLogLevel, type LogLevel } from "../../lib/logger.js";
import type { DateRangeInput } from "./orchestrator.js";
import { parseIsoDate } from "./retrieval.js";

export const COMMANDS = ["retrieve", "process", "datasets"] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliOptions {
  command: Command;
  range: DateRangeInput;
  device?: string;
  dataset?: string;
  account?: string;
  logLevel: LogLevel;
  logFile?: string;
  help: boolean;
}

export const DEFAULT_DAYS = 7;

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * @throws Error describing the first invalid argument
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  let command: Command = "retrieve";
  let days: number | undefined;
  let from: string | undefined;
  let to: string | undefined;
  let device: string | undefined;
  let dataset: string | undefined;
  let account: string | undefined;
  let logLevel: LogLevel = "info";
  let logFile: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }

    if (i === 0 && !arg.startsWith("-")) {
      if (!isCommand(arg)) {
        throw new Error(`Unknown command: ${arg}. Must be one of: ${COMMANDS.join(", ")}`);
      }
      command = arg;
      continue;
    }

    if (value === undefined) {
      throw new Error(`Missing value for ${arg}`);
    }

    switch (arg) {
      case "--days": {
        const parsed = Number(value);
        if (!Number.isInteger(parsed) || parsed <= 0) {
          throw new Error("Invalid --days value. Must be a positive integer.");
        }
        days = parsed;
        break;
      }
      case "--from":
      case "--to":
        if (!parseIsoDate(value)) {
          throw new Error(`Invalid ${arg} value. Must be in YYYY-MM-DD format.`);
        }
        if (arg === "--from") from = value;
        else to = value;
        break;
      case "--device":
        device = value;
        break;
      case "--dataset":
        dataset = value;
        break;
      case "--account":
        account = value;
        break;
      case "--log-level":
        if (!isLogLevel(value)) {
          throw new Error("Invalid --log-level value. Must be one of: debug, info, warn, error");
        }
        logLevel = value;
        break;
      case "--log-file":
        logFile = value;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
    i++;
  }

  if ((from === undefined) !== (to === undefined)) {
    throw new Error("--from and --to must be given together");
  }
  if (from !== undefined && days !== undefined) {
    throw new Error("Use either --days or --from/--to, not both");
  }

  const range: DateRangeInput =
    from !== undefined && to !== undefined ? { from, to } : { days: days ?? DEFAULT_DAYS };

  return { command, range, device, dataset, account, logLevel, logFile, help };
}
