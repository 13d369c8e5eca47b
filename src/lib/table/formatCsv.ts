import type { Cell, Table } from "./types";

const needsQuoting = /[",\r\n]/;

const cellText = (value: Cell): string => {
  if (value === null) {
    return "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  return typeof value === "number" ? value.toString() : value;
};

const quote = (text: string): string => `"${text.replace(/"/g, '""')}"`;

// A lone blank field would read back as a blank line, which the parser skips.
const formatRecord = (values: Cell[]): string => {
  const fields = values.map(cellText);
  if (fields.length === 1 && fields[0].trim().length === 0) {
    return quote(fields[0]);
  }
  return fields.map((text) => (needsQuoting.test(text) ? quote(text) : text)).join(",");
};

export const formatCsv = (table: Table): string => {
  const lines = [formatRecord(table.headers), ...table.rows.map(formatRecord)];
  return `${lines.join("\n")}\n`;
};
