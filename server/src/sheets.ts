import { google } from "googleapis";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { GoogleSettings, LogRow, RowSource } from "./types.js";

type SheetsContext = {
  sheets: ReturnType<typeof google.sheets>;
  drive: ReturnType<typeof google.drive>;
  clientEmail: string;
};

export type SheetsSourceSettings = {
  sheetName: string;
  logTab: string;
  google: GoogleSettings;
};

export type CellValue = string | number | boolean | null | undefined;

const NEW_TAB_ROWS = 2000;
const NEW_TAB_COLUMNS = 20;
const SPREADSHEET_MIME_TYPE = "application/vnd.google-apps.spreadsheet";

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
});

export function resolveServiceAccount(settings: GoogleSettings): {
  clientEmail: string;
  privateKey: string;
} {
  if (settings.credentialsJson) {
    let payload: unknown;
    try {
      payload = JSON.parse(settings.credentialsJson);
    } catch {
      throw new ConfigError("GOOGLE_CREDS_JSON is not valid JSON.");
    }
    const parsed = serviceAccountSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ConfigError(
        "GOOGLE_CREDS_JSON must contain client_email and private_key."
      );
    }
    return {
      clientEmail: parsed.data.client_email,
      privateKey: parsed.data.private_key,
    };
  }

  if (settings.clientEmail && settings.privateKey) {
    return {
      clientEmail: settings.clientEmail,
      privateKey: settings.privateKey.replace(/\\n/g, "\n"),
    };
  }

  throw new ConfigError(
    "Missing Google credentials: set GOOGLE_CREDS_JSON or " +
      "GOOGLE_SHEETS_SERVICE_ACCOUNT_EMAIL and GOOGLE_SHEETS_PRIVATE_KEY."
  );
}

function getSheetsContext(settings: GoogleSettings): SheetsContext {
  const { clientEmail, privateKey } = resolveServiceAccount(settings);

  const auth = new google.auth.JWT({
    email: clientEmail,
    key: privateKey,
    scopes: [
      "https://www.googleapis.com/auth/spreadsheets",
      "https://www.googleapis.com/auth/drive.metadata.readonly",
    ],
  });

  return {
    sheets: google.sheets({ version: "v4", auth }),
    drive: google.drive({ version: "v3", auth }),
    clientEmail,
  };
}

function numberField(value: unknown, key: string): number | undefined {
  if (value && typeof value === "object" && key in value) {
    const field: unknown = Reflect.get(value, key);
    return typeof field === "number" ? field : undefined;
  }
  return undefined;
}

function apiErrorDetails(error: unknown): {
  status?: number;
  apiStatus?: string;
  apiMessage?: string;
} {
  const status =
    numberField(error, "status") ??
    numberField(error, "code") ??
    (error && typeof error === "object" && "response" in error
      ? numberField(error.response, "status")
      : undefined);

  const parsed = z
    .object({
      response: z.object({
        data: z.object({
          error: z.object({
            status: z.string().optional(),
            message: z.string().optional(),
          }),
        }),
      }),
    })
    .safeParse(error);

  return {
    status,
    apiStatus: parsed.success ? parsed.data.response.data.error.status : undefined,
    apiMessage: parsed.success ? parsed.data.response.data.error.message : undefined,
  };
}

export function formatSheetsError(
  error: unknown,
  spreadsheet: string,
  clientEmail: string,
  action: string
): Error {
  const { status, apiStatus, apiMessage } = apiErrorDetails(error);

  if (status === 403 || apiStatus === "PERMISSION_DENIED") {
    return new Error(
      `Google Sheets permission denied while ${action} for spreadsheet ${spreadsheet}. ` +
        `Share the sheet with the service account ${clientEmail}.`
    );
  }

  if (status === 404 || apiStatus === "NOT_FOUND") {
    return new Error(
      `Google Sheets spreadsheet not found while ${action}. ` +
        `Check GOOGLE_SHEETS_SPREADSHEET_ID or SHEET_NAME (${spreadsheet}).`
    );
  }

  if (apiMessage) {
    return new Error(`Google Sheets error while ${action}: ${apiMessage}`);
  }

  return error instanceof Error
    ? error
    : new Error(`Google Sheets error while ${action}.`);
}

/** A1 range for a whole tab, quoting the title as Sheets requires. */
export function tabRange(tab: string, cells = "A:ZZ"): string {
  return `'${tab.replace(/'/g, "''")}'!${cells}`;
}

/**
 * Turns a grid of cells into header-keyed rows. The first row is the header;
 * blank rows are dropped and short rows are padded with "".
 */
export function rowsFromValues(values: CellValue[][]): LogRow[] {
  if (!values.length) {
    return [];
  }

  const header = values[0].map((cell) => String(cell ?? "").trim());
  const rows: LogRow[] = [];

  for (const cells of values.slice(1)) {
    const hasValues = cells.some(
      (cell) => cell !== null && cell !== undefined && String(cell) !== ""
    );
    if (!hasValues) {
      continue;
    }
    const entry: LogRow = {};
    header.forEach((name, idx) => {
      const cell = cells[idx];
      entry[name] = cell === null || cell === undefined ? "" : String(cell);
    });
    rows.push(entry);
  }

  return rows;
}

async function findSpreadsheetId(
  context: SheetsContext,
  sheetName: string
): Promise<string> {
  const escaped = sheetName.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
  let response;
  try {
    response = await context.drive.files.list({
      q: `name = '${escaped}' and mimeType = '${SPREADSHEET_MIME_TYPE}' and trashed = false`,
      fields: "files(id, name)",
      pageSize: 1,
    });
  } catch (error) {
    throw formatSheetsError(
      error,
      sheetName,
      context.clientEmail,
      "looking up the spreadsheet by name"
    );
  }

  const id = response.data.files?.[0]?.id;
  if (!id) {
    throw new Error(
      `Spreadsheet '${sheetName}' not found. ` +
        `Share it with ${context.clientEmail} or set GOOGLE_SHEETS_SPREADSHEET_ID.`
    );
  }
  return id;
}

async function ensureLogTab(
  context: SheetsContext,
  spreadsheetId: string,
  tab: string
): Promise<boolean> {
  let response;
  try {
    response = await context.sheets.spreadsheets.get({
      spreadsheetId,
      fields: "sheets.properties(title)",
    });
  } catch (error) {
    throw formatSheetsError(
      error,
      spreadsheetId,
      context.clientEmail,
      "reading sheet metadata"
    );
  }

  const exists = (response.data.sheets ?? []).some(
    (entry) => entry.properties?.title === tab
  );
  if (exists) {
    return true;
  }

  try {
    await context.sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: {
        requests: [
          {
            addSheet: {
              properties: {
                title: tab,
                gridProperties: {
                  rowCount: NEW_TAB_ROWS,
                  columnCount: NEW_TAB_COLUMNS,
                },
              },
            },
          },
        ],
      },
    });
  } catch (error) {
    throw formatSheetsError(
      error,
      spreadsheetId,
      context.clientEmail,
      `creating the '${tab}' tab`
    );
  }
  console.log(`Created missing tab '${tab}' in spreadsheet ${spreadsheetId}.`);
  return false;
}

export async function readLogRows(settings: SheetsSourceSettings): Promise<LogRow[]> {
  const context = getSheetsContext(settings.google);
  const spreadsheetId =
    settings.google.spreadsheetId ??
    (await findSpreadsheetId(context, settings.sheetName));

  const hasTab = await ensureLogTab(context, spreadsheetId, settings.logTab);
  if (!hasTab) {
    return [];
  }

  let response;
  try {
    response = await context.sheets.spreadsheets.values.get({
      spreadsheetId,
      range: tabRange(settings.logTab),
    });
  } catch (error) {
    throw formatSheetsError(
      error,
      spreadsheetId,
      context.clientEmail,
      "reading log rows"
    );
  }

  const values: CellValue[][] = response.data.values ?? [];
  return rowsFromValues(values);
}

export function createSheetsRowSource(settings: SheetsSourceSettings): RowSource {
  return {
    name: `sheets:${settings.sheetName}/${settings.logTab}`,
    readRows: () => readLogRows(settings),
  };
}
