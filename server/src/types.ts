export type LogRow = Record<string, string>;

export interface LogColumns {
  /** Candidate timestamp headers, first non-empty value wins. */
  timestamp: string[];
  action: string;
  notional: string;
  note: string;
}

export const DEFAULT_LOG_COLUMNS: LogColumns = {
  timestamp: ["Timestamp", "Time"],
  action: "Action",
  notional: "NotionalUSD",
  note: "Note",
};

export interface DailySummary {
  boughtCount: number;
  totalProfit: number;
}

export interface RowSource {
  readonly name: string;
  readRows(): Promise<LogRow[]>;
}

export type NotifyResult = { ok: true } | { ok: false; reason: string };

export interface Notifier {
  readonly name: string;
  send(subject: string, htmlBody: string): Promise<NotifyResult>;
}

export type EmailProvider = "mailgun" | "sendgrid" | "console";

export interface EmailSettings {
  provider: EmailProvider;
  from?: string;
  to: string[];
  mailgun: {
    apiKey?: string;
    domain?: string;
    baseUrl: string;
  };
  sendgrid: {
    apiKey?: string;
  };
}

export interface GoogleSettings {
  credentialsJson?: string;
  clientEmail?: string;
  privateKey?: string;
  spreadsheetId?: string;
}

export interface AppConfig {
  sheetName: string;
  logTab: string;
  google: GoogleSettings;
  timeZone: string;
  skipIfEmpty: boolean;
  dryRun: boolean;
  port: number;
  email: EmailSettings;
}

/** Mail providers get this long to answer before the send counts as failed. */
export const DELIVERY_TIMEOUT_MS = 30_000;

export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string | URLSearchParams;
    signal?: AbortSignal;
  }
) => Promise<{ status: number; text(): Promise<string> }>;
