#!/usr/bin/env node
import dotenv from "dotenv";
import { applyCliOptions, describeOutcome, parseArgs } from "./cli.js";
import { loadAppConfig, loadLogColumns } from "./config.js";
import { runDailySummary } from "./daily-report.js";
import { errorMessage } from "./errors.js";
import { createFileRowSource } from "./file-source.js";
import { createNotifier } from "./notifiers/factory.js";
import { createSheetsRowSource } from "./sheets.js";

async function main(): Promise<void> {
  dotenv.config();
  const options = parseArgs(process.argv.slice(2));
  const config = applyCliOptions(loadAppConfig(), options);

  console.log("✉️  Daily trade summary mailer starting");

  const rowSource = options.input
    ? createFileRowSource(options.input)
    : createSheetsRowSource(config);
  const notifier = createNotifier(config.email, { dryRun: config.dryRun });

  const outcome = await runDailySummary({
    rowSource,
    notifier,
    timeZone: config.timeZone,
    skipIfEmpty: config.skipIfEmpty,
    columns: loadLogColumns(),
  });

  console.log(
    `Read ${outcome.rowCount} row(s) from ${rowSource.name}, ` +
      `${outcome.todayCount} logged today (${config.timeZone}).`
  );
  console.log(describeOutcome(outcome));
}

void main().catch((error) => {
  console.error("❌ Fatal error:", errorMessage(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
});
