export type CellRows = readonly (readonly string[])[];

export interface RangeValues {
  readonly range: string;
  readonly values: CellRows;
}

export interface SheetInfo {
  readonly spreadsheetTitle: string;
  readonly sheetTitle: string;
}

/**
 * Cell-level access to one sheet of a spreadsheet. Ranges are A1 notation
 * without a sheet prefix; the transport scopes them to its sheet.
 */
export interface SheetsTransport {
  verify(): Promise<SheetInfo>;
  getValues(range: string): Promise<string[][]>;
  updateValues(updates: readonly RangeValues[]): Promise<void>;
  appendValues(range: string, values: CellRows): Promise<void>;
  clearValues(range: string): Promise<void>;
  formatHeader(columnCount: number): Promise<void>;
}
