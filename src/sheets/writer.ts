import type { OutputRow } from "../pipeline/types.js";
import type { Logger } from "../logging/logger.js";
import type { RangeValues, SheetInfo, SheetsTransport } from "./transport.js";
import { SchemaMismatchError } from "../utils/errors.js";
import { HEADERS, KEY_COLUMN, LAST_COLUMN, columnLetter, toCells } from "./format.js";

export type HeaderOutcome = "created" | "matched" | "replaced";

export type HeaderState = "empty" | "matched" | "mismatch";

export interface EnsureHeadersOptions {
  readonly overwrite?: boolean;
}

const HEADER_RANGE = `A1:${LAST_COLUMN}1`;
const DATA_RANGE = `A2:${LAST_COLUMN}`;
const KEY_LETTER = columnLetter(KEY_COLUMN);

function sameHeaders(actual: readonly string[]): boolean {
  return actual.length === HEADERS.length && HEADERS.every((h, i) => actual[i]?.trim() === h);
}

export class SheetWriter {
  private readonly log: Logger;

  constructor(
    private readonly transport: SheetsTransport,
    log: Logger,
  ) {
    this.log = log.child({ component: "sheets" });
  }

  verify(): Promise<SheetInfo> {
    return this.transport.verify();
  }

  /** Reads the header row without changing it. */
  async inspectHeaders(): Promise<HeaderState> {
    const [first = []] = await this.transport.getValues(HEADER_RANGE);
    const actual = first.map((cell) => cell.trim());
    if (sameHeaders(actual)) return "matched";
    return actual.every((cell) => cell === "") ? "empty" : "mismatch";
  }

  async ensureHeaders(opts: EnsureHeadersOptions = {}): Promise<HeaderOutcome> {
    const [first = []] = await this.transport.getValues(HEADER_RANGE);
    const actual = first.map((cell) => cell.trim());

    if (sameHeaders(actual)) return "matched";

    const empty = actual.every((cell) => cell === "");
    if (!empty && !opts.overwrite) {
      throw new SchemaMismatchError(HEADERS, actual);
    }

    await this.transport.updateValues([{ range: HEADER_RANGE, values: [[...HEADERS]] }]);
    await this.transport.formatHeader(HEADERS.length);
    this.log.info({ replaced: !empty }, "header row written");
    return empty ? "created" : "replaced";
  }

  async clear(): Promise<void> {
    await this.transport.clearValues(DATA_RANGE);
    this.log.info("cleared data rows");
  }

  /**
   * Updates rows whose "User ID" already exists and appends the rest, in the
   * given order. Later duplicates of an id replace earlier ones.
   */
  async upsertRows(rows: readonly OutputRow[]): Promise<number> {
    const byId = new Map<string, OutputRow>();
    for (const row of rows) byId.set(row.counterpartId, row);
    if (byId.size === 0) return 0;

    const keyCells = await this.transport.getValues(`${KEY_LETTER}2:${KEY_LETTER}`);
    const rowNumbers = new Map<string, number>();
    keyCells.forEach((cells, index) => {
      const id = cells[0]?.trim();
      if (id && !rowNumbers.has(id)) rowNumbers.set(id, index + 2);
    });

    const updates: RangeValues[] = [];
    const appends: string[][] = [];
    for (const [id, row] of byId) {
      const rowNumber = rowNumbers.get(id);
      if (rowNumber === undefined) {
        appends.push(toCells(row));
      } else {
        updates.push({ range: `A${rowNumber}:${LAST_COLUMN}${rowNumber}`, values: [toCells(row)] });
      }
    }

    if (updates.length > 0) await this.transport.updateValues(updates);
    if (appends.length > 0) await this.transport.appendValues(HEADER_RANGE, appends);

    this.log.info({ updated: updates.length, appended: appends.length }, "rows upserted");
    return byId.size;
  }
}
