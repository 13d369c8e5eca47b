import * as XLSX from "xlsx";
import { EmptyTableError } from "./types";
import type { Cell, Table } from "./types";

const DEFAULT_SHEET_NAME = "Sheet1";

const normalizeCell = (value: unknown): Cell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return value;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === "boolean") {
    return value;
  }
  const text = String(value);
  return text.length > 0 ? text : null;
};

const buildHeaders = (rawHeaders: unknown[]): string[] =>
  Array.from(rawHeaders, (header) => {
    const label = normalizeCell(header);
    if (label === null) {
      return "";
    }
    return label instanceof Date ? label.toISOString() : String(label);
  });

export const parseXlsxBuffer = (buffer: Buffer): Table => {
  const workbook = XLSX.read(buffer, { type: "buffer", cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new EmptyTableError("Workbook has no sheets.");
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    defval: null
  });
  const rawHeaders = rows[0] ?? [];
  if (rawHeaders.length === 0) {
    throw new EmptyTableError(`Sheet "${sheetName}" has no header row.`);
  }

  const headers = buildHeaders(rawHeaders);
  const dataRows = rows.slice(1).map((row) => headers.map((_, index) => normalizeCell(row[index])));

  return {
    sheetName,
    headers,
    rows: dataRows
  };
};

export const buildWorkbookBuffer = (table: Table): Buffer => {
  const sheet = XLSX.utils.aoa_to_sheet([table.headers, ...table.rows], { cellDates: true });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, table.sheetName ?? DEFAULT_SHEET_NAME);
  const output: unknown = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(output)) {
    throw new Error("Workbook serialization did not produce a buffer.");
  }
  return output;
};
