import { isValid } from "date-fns";
import { toDate } from "date-fns-tz";
import { ParseError } from "./errors.js";

const FULL_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}(?:$|[T ])/;

/**
 * Parses the sheet's ISO-8601 timestamps into an absolute instant.
 *
 * A trailing `Z` is stripped and the rest is read as UTC wall-clock time.
 * Strings without an offset are also read as UTC; an explicit offset such as
 * `+02:00` is honored. A full `yyyy-MM-dd` date is required.
 *
 * @throws {ParseError} when the value is empty or not a date-time.
 */
export function parseTimestamp(value: string): Date {
  const text = value.trim();
  if (!text) {
    throw new ParseError("Empty timestamp");
  }

  const local = text.endsWith("Z") ? text.slice(0, -1) : text;
  if (!FULL_DATE_PREFIX.test(local)) {
    throw new ParseError(`Invalid timestamp: ${value}`);
  }
  const parsed = toDate(local, { timeZone: "UTC" });
  if (!isValid(parsed)) {
    throw new ParseError(`Invalid timestamp: ${value}`);
  }
  return parsed;
}
