import { isAction, profitFromSellRow } from "./profit.js";
import { DailySummary, DEFAULT_LOG_COLUMNS, LogColumns, LogRow } from "./types.js";

export function summarizeRows(
  rows: LogRow[],
  columns: LogColumns = DEFAULT_LOG_COLUMNS
): DailySummary {
  let boughtCount = 0;
  let totalProfit = 0;

  rows.forEach((row) => {
    if (isAction(row, "BUY", columns)) {
      boughtCount += 1;
    }
    const profit = profitFromSellRow(row, columns);
    if (profit !== null) {
      totalProfit += profit;
    }
  });

  return { boughtCount, totalProfit };
}

// toFixed switches to exponent notation from here on
const FIXED_NOTATION_LIMIT = 1e21;

/** `42.5` -> `"$42.50"`, `-3` -> `"-$3.00"`. */
export function formatUsd(value: number): string {
  const sign = value < 0 ? "-" : "";
  const amount = Math.abs(value);
  const digits =
    amount >= FIXED_NOTATION_LIMIT && Number.isFinite(amount)
      ? `${BigInt(amount)}.00`
      : amount.toFixed(2);
  return `${sign}$${digits}`;
}

export function formatSubject(summary: DailySummary): string {
  return `bought ${summary.boughtCount} stocks, sold ${formatUsd(
    summary.totalProfit
  )} profit`;
}

/** True when there is nothing worth mailing: no buys and no profit to the cent. */
export function isEmptySummary(summary: DailySummary): boolean {
  return summary.boughtCount === 0 && Math.abs(summary.totalProfit) < 0.005;
}
