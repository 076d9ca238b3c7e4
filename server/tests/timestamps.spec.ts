import { ParseError } from "../src/errors";
import { parseTimestamp } from "../src/timestamps";

describe("parseTimestamp", () => {
  it("reads a Z-suffixed timestamp as UTC", () => {
    expect(parseTimestamp("2025-03-10T15:30:00Z").toISOString()).toBe(
      "2025-03-10T15:30:00.000Z"
    );
  });

  it("treats a timestamp without offset as UTC", () => {
    expect(parseTimestamp("2025-03-10T15:30:00").toISOString()).toBe(
      "2025-03-10T15:30:00.000Z"
    );
  });

  it("honors an explicit offset", () => {
    expect(parseTimestamp("2025-03-10T15:30:00+02:00").toISOString()).toBe(
      "2025-03-10T13:30:00.000Z"
    );
  });

  it("reads a bare date as UTC midnight", () => {
    expect(parseTimestamp("2025-03-10").toISOString()).toBe(
      "2025-03-10T00:00:00.000Z"
    );
  });

  it("rejects an empty value", () => {
    expect(() => parseTimestamp("")).toThrow(new ParseError("Empty timestamp"));
    expect(() => parseTimestamp("   ")).toThrow(ParseError);
  });

  it.each(["2025", "2025-03", "2025Z", "2025-03-1T10:00:00"])(
    "rejects the partial date %p",
    (value) => {
      expect(() => parseTimestamp(value)).toThrow(
        new ParseError(`Invalid timestamp: ${value}`)
      );
    }
  );

  it("rejects text that is not a date", () => {
    expect(() => parseTimestamp("not-a-date")).toThrow(ParseError);
  });
});
