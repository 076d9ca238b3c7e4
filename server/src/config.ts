import fs from "node:fs";
import path from "node:path";
import { getTimezoneOffset } from "date-fns-tz";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { AppConfig, DEFAULT_LOG_COLUMNS, LogColumns } from "./types.js";

export const DEFAULT_SHEET_NAME = "Trading Log";
export const DEFAULT_LOG_TAB = "log";
export const DEFAULT_TIME_ZONE = "America/Denver";
export const DEFAULT_MAILGUN_BASE_URL = "https://api.mailgun.net";
const DEFAULT_PORT = 4000;
const TRUTHY_FLAGS = new Set(["1", "true", "yes"]);

export const DEFAULT_COLUMNS_PATH = path.resolve(
  __dirname,
  "..",
  "config",
  "summary-log.json"
);

export function isValidTimeZone(timeZone: string): boolean {
  return !Number.isNaN(getTimezoneOffset(timeZone));
}

function trimmed(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

const optionalText = z.preprocess(trimmed, z.string().optional());

const flag = z.preprocess(
  (value) => TRUTHY_FLAGS.has((trimmed(value) ?? "").toLowerCase()),
  z.boolean()
);

function textWithDefault(fallback: string) {
  return z.preprocess((value) => trimmed(value) ?? fallback, z.string());
}

const envSchema = z.object({
  SHEET_NAME: textWithDefault(DEFAULT_SHEET_NAME),
  LOG_TAB: textWithDefault(DEFAULT_LOG_TAB),
  GOOGLE_SHEETS_SPREADSHEET_ID: optionalText,
  GOOGLE_CREDS_JSON: optionalText,
  GOOGLE_SHEETS_SERVICE_ACCOUNT_EMAIL: optionalText,
  GOOGLE_SHEETS_PRIVATE_KEY: optionalText,
  LOCAL_TZ: textWithDefault(DEFAULT_TIME_ZONE).refine(isValidTimeZone, {
    message: "LOCAL_TZ must be an IANA time zone such as America/Denver",
  }),
  EXIT_IF_EMPTY: flag,
  DRY_RUN: flag,
  PORT: textWithDefault(String(DEFAULT_PORT)).pipe(
    z.coerce.number().int().positive()
  ),
  EMAIL_PROVIDER: z.preprocess(
    (value) => (trimmed(value) ?? "mailgun").toLowerCase(),
    z.enum(["mailgun", "sendgrid", "console"])
  ),
  EMAIL_FROM: optionalText,
  EMAIL_TO: z.preprocess(
    (value) =>
      (trimmed(value) ?? "")
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean),
    z.array(z.string())
  ),
  MAILGUN_API_KEY: optionalText,
  MAILGUN_DOMAIN: optionalText,
  MAILGUN_BASE_URL: textWithDefault(DEFAULT_MAILGUN_BASE_URL),
  SENDGRID_API_KEY: optionalText,
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
    .join("; ");
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const values = parsed.data;

  return {
    sheetName: values.SHEET_NAME,
    logTab: values.LOG_TAB,
    google: {
      spreadsheetId: values.GOOGLE_SHEETS_SPREADSHEET_ID,
      credentialsJson: values.GOOGLE_CREDS_JSON,
      clientEmail: values.GOOGLE_SHEETS_SERVICE_ACCOUNT_EMAIL,
      privateKey: values.GOOGLE_SHEETS_PRIVATE_KEY,
    },
    timeZone: values.LOCAL_TZ,
    skipIfEmpty: values.EXIT_IF_EMPTY,
    dryRun: values.DRY_RUN,
    port: values.PORT,
    email: {
      provider: values.EMAIL_PROVIDER,
      from: values.EMAIL_FROM,
      to: values.EMAIL_TO,
      mailgun: {
        apiKey: values.MAILGUN_API_KEY,
        domain: values.MAILGUN_DOMAIN,
        baseUrl: values.MAILGUN_BASE_URL.replace(/\/+$/, ""),
      },
      sendgrid: {
        apiKey: values.SENDGRID_API_KEY,
      },
    },
  };
}

const columnsFileSchema = z.object({
  columns: z
    .object({
      timestamp: z
        .union([z.string(), z.array(z.string()).nonempty()])
        .transform((value) => (Array.isArray(value) ? value : [value])),
      action: z.string(),
      notional: z.string(),
      note: z.string(),
    })
    .partial()
    .default({}),
});

export function loadLogColumns(configPath = DEFAULT_COLUMNS_PATH): LogColumns {
  if (!fs.existsSync(configPath)) {
    return DEFAULT_LOG_COLUMNS;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read ${configPath}: ${errorMessage(error)}`);
  }

  const parsed = columnsFileSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid column config in ${configPath}: ${formatIssues(parsed.error)}`
    );
  }

  const columns = parsed.data.columns;
  return {
    timestamp: columns.timestamp ?? DEFAULT_LOG_COLUMNS.timestamp,
    action: columns.action ?? DEFAULT_LOG_COLUMNS.action,
    notional: columns.notional ?? DEFAULT_LOG_COLUMNS.notional,
    note: columns.note ?? DEFAULT_LOG_COLUMNS.note,
  };
}
