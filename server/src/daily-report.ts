import { rowsForTodayLocal } from "./daily-filter.js";
import { DeliveryError } from "./errors.js";
import { formatSubject, isEmptySummary, summarizeRows } from "./summary.js";
import {
  DailySummary,
  DEFAULT_LOG_COLUMNS,
  LogColumns,
  Notifier,
  RowSource,
} from "./types.js";

export const PLACEHOLDER_HTML_BODY = "&nbsp;";

export interface DailyReportOptions {
  rowSource: RowSource;
  timeZone: string;
  columns?: LogColumns;
  now?: Date;
}

export interface DailyRunOptions extends DailyReportOptions {
  notifier: Notifier;
  skipIfEmpty: boolean;
  htmlBody?: string;
}

export interface DailyPreview {
  subject: string;
  summary: DailySummary;
  rowCount: number;
  todayCount: number;
}

export type DailyRunOutcome = DailyPreview & {
  status: "sent" | "skipped";
  notifier: string;
};

export async function previewDailySummary(
  options: DailyReportOptions
): Promise<DailyPreview> {
  const columns = options.columns ?? DEFAULT_LOG_COLUMNS;
  const rows = await options.rowSource.readRows();
  const todayRows = rowsForTodayLocal(
    rows,
    options.timeZone,
    options.now ?? new Date(),
    columns
  );
  const summary = summarizeRows(todayRows, columns);

  return {
    subject: formatSubject(summary),
    summary,
    rowCount: rows.length,
    todayCount: todayRows.length,
  };
}

/**
 * Reads the log, summarizes today's rows and mails the subject line.
 *
 * @throws {DeliveryError} when the notifier reports a failure.
 */
export async function runDailySummary(
  options: DailyRunOptions
): Promise<DailyRunOutcome> {
  const preview = await previewDailySummary(options);
  const notifier = options.notifier.name;

  if (options.skipIfEmpty && isEmptySummary(preview.summary)) {
    return { ...preview, status: "skipped", notifier };
  }

  const result = await options.notifier.send(
    preview.subject,
    options.htmlBody ?? PLACEHOLDER_HTML_BODY
  );
  if (!result.ok) {
    throw new DeliveryError(result.reason, notifier);
  }

  return { ...preview, status: "sent", notifier };
}
