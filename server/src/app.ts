import cors from "cors";
import express from "express";
import { previewDailySummary, runDailySummary } from "./daily-report.js";
import { ConfigError, DeliveryError, errorMessage } from "./errors.js";
import { createNotifier } from "./notifiers/factory.js";
import { createSheetsRowSource } from "./sheets.js";
import { AppConfig, DEFAULT_LOG_COLUMNS, LogColumns, Notifier, RowSource } from "./types.js";

export interface AppDependencies {
  columns?: LogColumns;
  rowSource?: () => RowSource;
  notifier?: () => Notifier;
  now?: () => Date;
}

function errorResponse(error: unknown): {
  status: number;
  body: { error: string; kind: "config" | "delivery" | "unexpected" };
} {
  const message = errorMessage(error);
  if (error instanceof DeliveryError) {
    return { status: 502, body: { error: message, kind: "delivery" } };
  }
  if (error instanceof ConfigError) {
    return { status: 500, body: { error: message, kind: "config" } };
  }
  return { status: 500, body: { error: message, kind: "unexpected" } };
}

export function createApp(config: AppConfig, deps: AppDependencies = {}) {
  const columns = deps.columns ?? DEFAULT_LOG_COLUMNS;
  const buildRowSource = deps.rowSource ?? (() => createSheetsRowSource(config));
  const buildNotifier =
    deps.notifier ?? (() => createNotifier(config.email, { dryRun: config.dryRun }));
  const now = deps.now ?? (() => new Date());

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/summary", async (_req, res) => {
    try {
      const preview = await previewDailySummary({
        rowSource: buildRowSource(),
        timeZone: config.timeZone,
        columns,
        now: now(),
      });
      res.json(preview);
    } catch (error) {
      console.error(error);
      const { status, body } = errorResponse(error);
      res.status(status).json(body);
    }
  });

  app.post("/api/summary/send", async (_req, res) => {
    try {
      const outcome = await runDailySummary({
        rowSource: buildRowSource(),
        notifier: buildNotifier(),
        timeZone: config.timeZone,
        skipIfEmpty: config.skipIfEmpty,
        columns,
        now: now(),
      });
      console.log(`Daily summary ${outcome.status}: ${outcome.subject}`);
      res.json(outcome);
    } catch (error) {
      console.error(error);
      const { status, body } = errorResponse(error);
      res.status(status).json(body);
    }
  });

  return app;
}
