import { readFile, writeFile } from "fs/promises";
import { formatCsv } from "./formatCsv";
import { parseCsvText } from "./parseCsv";
import { buildWorkbookBuffer, parseXlsxBuffer } from "./parseXlsx";
import type { Table, TableFormat } from "./types";

const fileExtension = (path: string): string => {
  const name = path.split(/[\\/]/).pop() ?? "";
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : "";
};

export const detectFormat = (path: string): TableFormat =>
  fileExtension(path) === "xlsx" ? "xlsx" : "csv";

export const readTable = async (path: string): Promise<Table> => {
  if (detectFormat(path) === "xlsx") {
    const buffer = await readFile(path);
    return parseXlsxBuffer(buffer);
  }
  const text = await readFile(path, "utf8");
  return parseCsvText(text);
};

export const writeTable = async (
  path: string,
  table: Table,
  format: TableFormat = detectFormat(path)
): Promise<void> => {
  if (format === "xlsx") {
    await writeFile(path, buildWorkbookBuffer(table));
    return;
  }
  await writeFile(path, formatCsv(table), "utf8");
};
