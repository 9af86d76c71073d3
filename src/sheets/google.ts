import { google, type sheets_v4 } from "googleapis";
import type { CellRows, RangeValues, SheetInfo, SheetsTransport } from "./transport.js";
import { AuthError, NotFoundError, errorMessage, httpStatusOf } from "../utils/errors.js";

type SheetsClient = sheets_v4.Sheets;

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets"];
const VALUE_INPUT = "RAW";

export interface GoogleSheetsOptions {
  readonly spreadsheetId: string;
  readonly credentialsPath: string;
  /** First sheet when unset. */
  readonly sheetName?: string;
}

interface ResolvedSheet {
  readonly id: number;
  readonly title: string;
  readonly spreadsheetTitle: string;
}

function mapSheetsError(err: unknown, what: string): Error {
  const status = httpStatusOf(err);
  const message = errorMessage(err);
  if (status === 401 || status === 403) {
    return new AuthError(
      `Google Sheets denied access during ${what}: ${message}. ` +
        "Share the spreadsheet with the service account's email address.",
      { cause: err },
    );
  }
  if (status === 404) {
    return new NotFoundError(`Spreadsheet not found during ${what}: ${message}`, { cause: err });
  }
  if (message.includes("has not been used") || message.includes("is disabled")) {
    return new AuthError(
      "The Google Sheets API is not enabled for the service account's project. " +
        'Enable "Google Sheets API" under APIs & Services in the Cloud Console.',
      { cause: err },
    );
  }
  return new Error(`Google Sheets ${what} failed: ${message}`, { cause: err });
}

function toGrid(values: CellRows): string[][] {
  return values.map((row) => [...row]);
}

export class GoogleSheetsTransport implements SheetsTransport {
  private readonly sheets: SheetsClient;
  private resolved: ResolvedSheet | undefined;

  constructor(private readonly opts: GoogleSheetsOptions) {
    const auth = new google.auth.GoogleAuth({ keyFile: opts.credentialsPath, scopes: SCOPES });
    this.sheets = google.sheets({ version: "v4", auth });
  }

  async verify(): Promise<SheetInfo> {
    const sheet = await this.sheet();
    return { spreadsheetTitle: sheet.spreadsheetTitle, sheetTitle: sheet.title };
  }

  async getValues(range: string): Promise<string[][]> {
    const scoped = await this.scoped(range);
    const res = await this.call("read", () =>
      this.sheets.spreadsheets.values.get({ spreadsheetId: this.opts.spreadsheetId, range: scoped }),
    );
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map((row) => row.map((cell) => (cell == null ? "" : String(cell))));
  }

  async updateValues(updates: readonly RangeValues[]): Promise<void> {
    const data: sheets_v4.Schema$ValueRange[] = [];
    for (const update of updates) {
      data.push({ range: await this.scoped(update.range), values: toGrid(update.values) });
    }
    await this.call("update", () =>
      this.sheets.spreadsheets.values.batchUpdate({
        spreadsheetId: this.opts.spreadsheetId,
        requestBody: { valueInputOption: VALUE_INPUT, data },
      }),
    );
  }

  async appendValues(range: string, values: CellRows): Promise<void> {
    const scoped = await this.scoped(range);
    await this.call("append", () =>
      this.sheets.spreadsheets.values.append({
        spreadsheetId: this.opts.spreadsheetId,
        range: scoped,
        valueInputOption: VALUE_INPUT,
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: toGrid(values) },
      }),
    );
  }

  async clearValues(range: string): Promise<void> {
    const scoped = await this.scoped(range);
    await this.call("clear", () =>
      this.sheets.spreadsheets.values.clear({ spreadsheetId: this.opts.spreadsheetId, range: scoped }),
    );
  }

  async formatHeader(columnCount: number): Promise<void> {
    const sheet = await this.sheet();
    await this.call("format", () =>
      this.sheets.spreadsheets.batchUpdate({
        spreadsheetId: this.opts.spreadsheetId,
        requestBody: {
          requests: [
            {
              repeatCell: {
                range: {
                  sheetId: sheet.id,
                  startRowIndex: 0,
                  endRowIndex: 1,
                  startColumnIndex: 0,
                  endColumnIndex: columnCount,
                },
                cell: {
                  userEnteredFormat: {
                    textFormat: { bold: true },
                    backgroundColor: { red: 0.9, green: 0.9, blue: 0.9 },
                  },
                },
                fields: "userEnteredFormat(textFormat,backgroundColor)",
              },
            },
          ],
        },
      }),
    );
  }

  private async sheet(): Promise<ResolvedSheet> {
    if (this.resolved) return this.resolved;

    const res = await this.call("verify", () =>
      this.sheets.spreadsheets.get({
        spreadsheetId: this.opts.spreadsheetId,
        fields: "properties.title,sheets.properties(sheetId,title)",
      }),
    );
    const sheets = res.data.sheets ?? [];
    const match = this.opts.sheetName
      ? sheets.find((s) => s.properties?.title === this.opts.sheetName)
      : sheets[0];
    const props = match?.properties;
    if (!props || props.sheetId == null || !props.title) {
      throw new NotFoundError(
        this.opts.sheetName
          ? `Sheet "${this.opts.sheetName}" not found in spreadsheet ${this.opts.spreadsheetId}`
          : `Spreadsheet ${this.opts.spreadsheetId} has no sheets`,
      );
    }

    this.resolved = {
      id: props.sheetId,
      title: props.title,
      spreadsheetTitle: res.data.properties?.title ?? "",
    };
    return this.resolved;
  }

  private async scoped(range: string): Promise<string> {
    const { title } = await this.sheet();
    return `'${title.replace(/'/g, "''")}'!${range}`;
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw mapSheetsError(err, what);
    }
  }
}
