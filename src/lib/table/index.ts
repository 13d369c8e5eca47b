export { formatCsv } from "./formatCsv";
export { parseCsvText } from "./parseCsv";
export { buildWorkbookBuffer, parseXlsxBuffer } from "./parseXlsx";
export { detectFormat, readTable, writeTable } from "./tableFile";
export { CsvSyntaxError, EmptyTableError } from "./types";
export type { Cell, Table, TableFormat } from "./types";
