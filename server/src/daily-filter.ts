import { formatInTimeZone } from "date-fns-tz";
import { parseTimestamp } from "./timestamps.js";
import { DEFAULT_LOG_COLUMNS, LogColumns, LogRow } from "./types.js";

const LOCAL_DAY_FORMAT = "yyyy-MM-dd";

export function localDay(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, LOCAL_DAY_FORMAT);
}

export function rowTimestamp(
  row: LogRow,
  columns: LogColumns = DEFAULT_LOG_COLUMNS
): string {
  for (const header of columns.timestamp) {
    const value = row[header];
    if (value) {
      return value;
    }
  }
  return "";
}

/**
 * Keeps the rows logged on the current calendar day in `timeZone`. Rows with
 * a missing or malformed timestamp are dropped.
 */
export function rowsForTodayLocal(
  rows: LogRow[],
  timeZone: string,
  now: Date = new Date(),
  columns: LogColumns = DEFAULT_LOG_COLUMNS
): LogRow[] {
  const today = localDay(now, timeZone);

  return rows.filter((row) => {
    let instant: Date;
    try {
      instant = parseTimestamp(rowTimestamp(row, columns));
    } catch {
      return false;
    }
    return localDay(instant, timeZone) === today;
  });
}
