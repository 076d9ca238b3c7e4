import { DEFAULT_LOG_COLUMNS, LogColumns, LogRow } from "./types.js";

const NUMERIC_CHARS = new Set("0123456789.-");
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Pulls the percentage that follows "gain" out of a free-text note, e.g.
 * `"Closed, Gain 5.23%"` gives `5.23`.
 *
 * Leading characters are skipped until the first digit, `.` or `-`; the token
 * then runs until the first other character. Tokens that are not a number
 * (`"-"`, `"1.2.3"`) give `null`.
 */
export function extractGainPercent(note: string): number | null {
  if (!note) {
    return null;
  }
  const lower = note.toLowerCase();
  const marker = lower.indexOf("gain");
  if (marker === -1 || !lower.includes("%")) {
    return null;
  }

  let token = "";
  for (const ch of lower.slice(marker + "gain".length)) {
    if (NUMERIC_CHARS.has(ch)) {
      token += ch;
    } else if (token) {
      break;
    }
  }
  if (!token) {
    return null;
  }

  const parsed = Number(token);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * `"$1,250.00"` -> `1250`. Only plain decimal notation is read, so blank
 * values and forms such as `"0x1A"` give `null`.
 */
export function parseNotional(value: string | undefined): number | null {
  const cleaned = (value ?? "").replace(/[$,]/g, "").trim();
  if (!DECIMAL_NUMBER.test(cleaned)) {
    return null;
  }
  return Number(cleaned);
}

export function isAction(
  row: LogRow,
  action: "BUY" | "SELL",
  columns: LogColumns = DEFAULT_LOG_COLUMNS
): boolean {
  return (row[columns.action] ?? "").toUpperCase() === action;
}

/**
 * Estimates realized profit for a SELL row. The notional is the sale proceeds
 * and the note's gain is relative to cost basis, so
 * `profit = proceeds * g / (1 + g)` with `g = gain / 100`.
 *
 * A -100% gain has no cost basis to back out and gives `null`.
 */
export function profitFromSellRow(
  row: LogRow,
  columns: LogColumns = DEFAULT_LOG_COLUMNS
): number | null {
  if (!isAction(row, "SELL", columns)) {
    return null;
  }
  const marketValue = parseNotional(row[columns.notional]);
  if (marketValue === null) {
    return null;
  }
  const gainPercent = extractGainPercent(row[columns.note] ?? "");
  if (gainPercent === null) {
    return null;
  }

  const g = gainPercent / 100;
  const profit = marketValue * (g / (1 + g));
  return Number.isFinite(profit) ? profit : null;
}
