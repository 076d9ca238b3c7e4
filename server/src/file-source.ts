import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { rowsFromValues } from "./sheets.js";
import { LogRow, RowSource } from "./types.js";

const gridSchema = z.array(
  z.array(z.union([z.string(), z.number(), z.boolean(), z.null()]))
);

/**
 * Reads an exported log from disk. The file holds the same cell grid the
 * Sheets API returns: header row first, then one array per row.
 */
export function readRowsFromFile(filePath: string): LogRow[] {
  const resolved = path.resolve(process.cwd(), filePath);
  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (error) {
    throw new ConfigError(`Failed to read or parse ${resolved}: ${errorMessage(error)}`);
  }

  const parsed = gridSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ConfigError(
      `${resolved} must contain an array of rows (arrays of cell values).`
    );
  }
  return rowsFromValues(parsed.data);
}

export function createFileRowSource(filePath: string): RowSource {
  return {
    name: `file:${filePath}`,
    readRows: async () => readRowsFromFile(filePath),
  };
}
