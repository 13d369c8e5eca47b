// CSV cells are always text or null; numbers, booleans and dates only come
// from workbooks.
export type Cell = string | number | boolean | Date | null;

export type Table = {
  sheetName?: string;
  headers: string[];
  rows: Cell[][];
};

export type TableFormat = "csv" | "xlsx";

export class EmptyTableError extends Error {
  constructor(message = "No rows found in file.") {
    super(message);
    this.name = "EmptyTableError";
  }
}

export class CsvSyntaxError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(message);
    this.name = "CsvSyntaxError";
    this.line = line;
  }
}
