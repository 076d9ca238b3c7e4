import { isValidTimeZone } from "./config.js";
import { DailyRunOutcome } from "./daily-report.js";
import { ConfigError } from "./errors.js";
import { formatUsd } from "./summary.js";
import { AppConfig } from "./types.js";

export interface CliOptions {
  input?: string;
  dryRun?: boolean;
  timeZone?: string;
  skipIfEmpty?: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--input":
        options.input = args[++i];
        break;
      case "--tz":
        options.timeZone = args[++i];
        break;
      case "--dry-run":
        options.dryRun = true;
        break;
      case "--skip-if-empty":
        options.skipIfEmpty = true;
        break;
      default:
        console.warn(`Unknown option ignored: ${arg}`);
    }
  }

  return options;
}

/** Command-line flags win over the environment. */
export function applyCliOptions(config: AppConfig, options: CliOptions): AppConfig {
  if (options.timeZone !== undefined && !isValidTimeZone(options.timeZone)) {
    throw new ConfigError(`Unknown time zone: ${options.timeZone}`);
  }

  return {
    ...config,
    timeZone: options.timeZone ?? config.timeZone,
    dryRun: options.dryRun ?? config.dryRun,
    skipIfEmpty: options.skipIfEmpty ?? config.skipIfEmpty,
  };
}

export function describeOutcome(outcome: DailyRunOutcome): string {
  if (outcome.status === "skipped") {
    return (
      `ℹ️ No buys today and ${formatUsd(outcome.summary.totalProfit)} profit; ` +
      "skipping email (skip-if-empty is on)."
    );
  }
  return `✅ Email sent via ${outcome.notifier} with subject: ${outcome.subject}`;
}
